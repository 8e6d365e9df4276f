// Exponential backoff helpers for backend connects

export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryOptions extends BackoffOptions {
  maxRetries: number; // retries after the first attempt
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

export class RetriesExhaustedError extends Error {
  public readonly attempts: number;
  public readonly lastError: Error;

  constructor(attempts: number, lastError: Error) {
    super(`Gave up after ${attempts} attempt(s): ${lastError.message}`);
    this.name = 'RetriesExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Delay before retry `attempt` (1-based)
 */
export function backoffDelay(attempt: number, options: BackoffOptions): number {
  return Math.min(options.baseDelayMs * Math.pow(2, attempt - 1), options.maxDelayMs);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason ?? new Error('Aborted'));
      return;
    }

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason ?? new Error('Aborted'));
    };

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `fn` until it succeeds or `maxRetries` retries have failed
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  let lastError: Error = new Error('No attempt made');
  const totalAttempts = options.maxRetries + 1;
  let attempts = 0;

  for (let attempt = 1; attempt <= totalAttempts; attempt++) {
    attempts = attempt;
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= totalAttempts || options.signal?.aborted) {
        break;
      }

      const delay = backoffDelay(attempt, options);
      options.onRetry?.(lastError, attempt, delay);
      await sleep(delay, options.signal);
    }
  }

  throw new RetriesExhaustedError(attempts, lastError);
}
