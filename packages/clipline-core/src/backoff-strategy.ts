/** Input for calculating the next backoff delay. */
export type BackoffStrategyInput = {
  /** The number of retries already attempted (0 before the first retry). */
  retryAttempt: number;
};

export type DelayMs = number;

/**
 * A function that calculates how long to wait before the next attempt.
 */
export type BackoffStrategy = (input: BackoffStrategyInput) => DelayMs;

/**
 * Retries immediately. Mostly useful in tests.
 */
export function createNoBackoffStrategy(): BackoffStrategy {
  return (_input: BackoffStrategyInput) => 0;
}

export interface FixedBackoffStrategyConfig {
  /** The constant delay in milliseconds. */
  readonly delayMs: number;
}

export function createFixedBackoffStrategy(config: FixedBackoffStrategyConfig): BackoffStrategy {
  return (_input: BackoffStrategyInput) => config.delayMs;
}

export interface ExponentialBackoffStrategyConfig {
  /** Delay before the first retry, doubled for each one after it. */
  readonly baseDelayMs: number;
  /** Upper bound for a single delay. Defaults to Infinity. */
  readonly maxDelayMs?: number;
  /** `full` picks a random delay between 0 and the computed one. Defaults to 'none'. */
  readonly jitter?: 'none' | 'full';
}

/**
 * Delay = min(maxDelayMs, baseDelayMs * 2^retryAttempt), optionally jittered.
 */
export function createExponentialBackoffStrategy(config: ExponentialBackoffStrategyConfig): BackoffStrategy {
  const { baseDelayMs, maxDelayMs = Number.POSITIVE_INFINITY, jitter = 'none' } = config;

  return (input: BackoffStrategyInput) => {
    const cappedDelay = Math.min(maxDelayMs, baseDelayMs * 2 ** input.retryAttempt);

    switch (jitter) {
      case 'full':
        return Math.floor(Math.random() * cappedDelay);
      case 'none':
        return cappedDelay;
      default: {
        const _exhaustiveCheck: never = jitter;
        throw new Error(`Unknown jitter type ${String(_exhaustiveCheck)}`);
      }
    }
  };
}

export type BackoffStrategyOptions =
  | { type: 'none' }
  | ({ type: 'fixed' } & FixedBackoffStrategyConfig)
  | ({ type: 'exponential' } & ExponentialBackoffStrategyConfig);

const DEFAULT_BACKOFF_STRATEGY: BackoffStrategyOptions = {
  type: 'exponential',
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  jitter: 'full',
};

export function backoffStrategyFactory(options: BackoffStrategyOptions = DEFAULT_BACKOFF_STRATEGY): BackoffStrategy {
  switch (options.type) {
    case 'none':
      return createNoBackoffStrategy();
    case 'fixed':
      return createFixedBackoffStrategy(options);
    case 'exponential':
      return createExponentialBackoffStrategy(options);
    default: {
      const _exhaustiveCheck: never = options;
      throw new Error(`Unknown backoff strategy ${JSON.stringify(_exhaustiveCheck)}`);
    }
  }
}
