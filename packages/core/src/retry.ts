export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (event: RetryEvent) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface RetryEvent {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export const DEFAULT_RETRY_MAX_ATTEMPTS = 6;
export const DEFAULT_RETRY_BASE_DELAY_MS = 1_000;
export const DEFAULT_RETRY_MAX_DELAY_MS = 60_000;

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

// Full jitter: uniform in [0, min(max, base * 2^(attempt - 1))).
export const computeBackoffDelay = (
  attempt: number,
  options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs'> = {},
  random: () => number = Math.random
): number => {
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_RETRY_MAX_DELAY_MS;
  const ceiling = Math.min(maxDelayMs, baseDelayMs * 2 ** Math.max(0, attempt - 1));
  return Math.floor(random() * ceiling);
};

export const retryWithBackoff = async <T>(operation: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> => {
  const maxAttempts = Math.max(1, Math.trunc(options.maxAttempts ?? DEFAULT_RETRY_MAX_ATTEMPTS));
  const sleep = options.sleep ?? defaultSleep;
  const random = options.random ?? Math.random;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      const retryable = options.shouldRetry ? options.shouldRetry(error) : true;
      if (!retryable || attempt >= maxAttempts) {
        throw error;
      }

      const delayMs = computeBackoffDelay(attempt, options, random);
      options.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs);
    }
  }
};
