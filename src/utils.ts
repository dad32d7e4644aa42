import { CancelledError } from './exceptions.js';

/**
 * Retry configuration options
 */
export interface RetryOptions {
  /** Maximum number of attempts, first call included (default: 3) */
  maxAttempts?: number;
  /** Delay between retries in milliseconds (default: 1000) */
  delayMs?: number;
  /** Exponential backoff multiplier (default: 1 = no backoff) */
  backoffMultiplier?: number;
  /** Maximum delay in milliseconds for exponential backoff (default: 30000) */
  maxDelayMs?: number;
  /** Function to determine if error is retryable (default: all errors retryable) */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Callback called on each retry attempt */
  onRetry?: (error: unknown, attempt: number, nextDelayMs: number) => void;
  /** Aborts the pending delay and any further attempts */
  signal?: AbortSignal;
}

export const throwIfAborted = (signal?: AbortSignal) => {
  if (signal?.aborted) {
    throw new CancelledError();
  }
};

/**
 * Resolve after `ms`, or reject with CancelledError as soon as `signal` aborts.
 */
export const sleep = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export class TimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Race a promise against a timer and an optional abort signal. The underlying
 * work is not cancelled; its late result is discarded.
 */
export const withTimeout = <T>(
  work: Promise<T>,
  timeoutMs: number,
  label: string,
  signal?: AbortSignal
): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const cleanup = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };
    const onAbort = () => {
      cleanup();
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);
    signal?.addEventListener('abort', onAbort, { once: true });

    work.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });

/**
 * Retry an async function with configurable attempts and delays
 * Implements exponential backoff with jitter
 *
 * @returns The result of the function
 * @throws The last error if all retries fail, or CancelledError once aborted
 *
 * @example
 * const result = await retryAsync(
 *   async () => await fetchData(),
 *   { maxAttempts: 3, delayMs: 1000, backoffMultiplier: 2 }
 * );
 */
export async function retryAsync<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    delayMs = 1000,
    backoffMultiplier = 1,
    maxDelayMs = 30000,
    shouldRetry = () => true,
    onRetry,
    signal,
  } = options;

  const attempts = Math.max(1, maxAttempts);
  for (let attempt = 1; ; attempt++) {
    throwIfAborted(signal);
    try {
      return await fn(attempt);
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }

      const isLastAttempt = attempt >= attempts;
      if (isLastAttempt || !shouldRetry(error, attempt)) {
        throw error;
      }

      // Calculate delay with exponential backoff and jitter
      const baseDelay = delayMs * Math.pow(backoffMultiplier, attempt - 1);
      const jitter = Math.random() * 0.3 * baseDelay; // Add up to 30% jitter
      const nextDelay = Math.min(baseDelay + jitter, maxDelayMs);

      onRetry?.(error, attempt, nextDelay);

      await sleep(nextDelay, signal);
    }
  }
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  !!value && typeof value === 'object' && !Array.isArray(value);

export const truncate = (text: string, maxLength = 200) => {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength - 3)}...`;
};
