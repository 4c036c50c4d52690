import { setTimeout } from 'node:timers/promises';

import type { BackoffStrategy } from '../backoff-strategy';

export type RetryOptions = {
  maxAttempts: number;
  backoffStrategy: BackoffStrategy;
  onRetry?: (input: { attempt: number; error: unknown; delayMs: number }) => void;
};

/**
 * Runs `operation` until it resolves or `maxAttempts` is reached, rethrowing the last error.
 */
export async function retryWithBackoff<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  let attempt = 0;

  for (;;) {
    try {
      return await operation();
    } catch (error) {
      attempt++;

      if (attempt >= options.maxAttempts) {
        throw error;
      }

      const delayMs = options.backoffStrategy({ retryAttempt: attempt - 1 });
      options.onRetry?.({ attempt, error, delayMs });
      await setTimeout(delayMs);
    }
  }
}
