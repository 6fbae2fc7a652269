export interface RetryOptions {
  /** Total number of attempts, including the first (default: 3) */
  maxAttempts: number;
  /** Delay before the first retry in milliseconds (default: 500) */
  baseDelayMs: number;
  /** Multiplier applied to the delay after every retry (default: 1, fixed backoff) */
  backoffFactor: number;
  /** Maximum delay cap in milliseconds (default: 20000) */
  maxDelayMs: number;
  /** Maximum random jitter to add in milliseconds (default: 0) */
  jitterMs: number;
  /** Callback invoked before each retry attempt */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  /** Decides whether a failure is worth another attempt (default: every failure is) */
  isRetryable?: (error: Error) => boolean;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 500,
  backoffFactor: 1,
  maxDelayMs: 20000,
  jitterMs: 0,
};

/**
 * Delay before retry number `attempt` (0-based).
 *
 * Formula: min(maxDelay, baseDelay * factor^attempt) + random(0, jitter)
 */
export function calculateRetryDelay(
  attempt: number,
  options: Pick<RetryOptions, 'baseDelayMs' | 'backoffFactor' | 'maxDelayMs' | 'jitterMs'>,
): number {
  const scaled = options.baseDelayMs * Math.pow(options.backoffFactor, attempt);
  const capped = Math.min(scaled, options.maxDelayMs);
  const jitter = options.jitterMs > 0 ? Math.random() * options.jitterMs : 0;
  return capped + jitter;
}

/**
 * Executes a function with retry logic. Rethrows the last error once the
 * attempts are exhausted or a non-retryable error is hit.
 *
 * @example
 * const result = await withRetry(
 *   () => store.appendBlock(path, content),
 *   {
 *     maxAttempts: 3,
 *     onRetry: (error, attempt) => log.warn('Retrying', { attempt, error: error.message }),
 *   }
 * );
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const maxAttempts = Math.max(1, opts.maxAttempts);
  let lastError: Error | undefined;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn(attempt + 1);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (opts.isRetryable && !opts.isRetryable(lastError)) {
        throw lastError;
      }

      if (attempt < maxAttempts - 1) {
        const delay = calculateRetryDelay(attempt, opts);
        opts.onRetry?.(lastError, attempt + 1, delay);
        await sleep(delay);
      }
    }
  }

  throw lastError;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sleep that resolves early (without rejecting) when the signal aborts.
 */
export function interruptibleSleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (!signal) return sleep(ms);
  if (signal.aborted) return Promise.resolve();

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
