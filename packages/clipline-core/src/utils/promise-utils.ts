export class PromiseTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Promise timed out after ${timeoutMs}ms`);
    this.name = 'PromiseTimeoutError';
  }
}

export function promiseWithTimeout<T>(promise: Promise<T>, timeout: number): Promise<T> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new PromiseTimeoutError(timeout));
    }, timeout);

    promise
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((error) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}
