/**
 * Resolve after `ms`, or reject early when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface RetryOptions {
  /** Attempts after the first one */
  retries: number;
  /** Pause before each retry */
  delayMs?: number;
  /** Errors for which this returns false are rethrown at once */
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

/**
 * Thrown when every attempt failed; carries the last error
 */
export class RetriesExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(
      `Gave up after ${attempts} attempts: ${lastError instanceof Error ? lastError.message : String(lastError)}`
    );
    this.name = 'RetriesExhaustedError';
  }
}

/**
 * Run `operation` until it resolves or the retry budget is spent
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const isRetryable = options.isRetryable ?? (() => true);
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      return await operation(attempt);
    } catch (error) {
      if (!isRetryable(error)) throw error;
      if (attempt > options.retries) {
        throw new RetriesExhaustedError(attempt, error);
      }
      options.onRetry?.(error, attempt);
      if (options.delayMs) {
        await sleep(options.delayMs);
      }
    }
  }
}
