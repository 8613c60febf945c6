/**
 * Retry and timeout helpers for outbound judge calls.
 *
 * Judge adapters never retry on their own; the transport applies whatever
 * retry policy the caller configured (none by default).
 */

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

export type ErrorCategory =
  | 'rate_limit'     // 429
  | 'server_error'   // 500/502/503
  | 'timeout'        // attempt exceeded its deadline
  | 'auth_error'     // 401/403 or missing key
  | 'invalid_reply'  // reply was not the JSON we asked for
  | 'unknown';

export function classifyError(error: unknown): ErrorCategory {
  if (error instanceof TimeoutError) return 'timeout';

  const message = error instanceof Error ? error.message : String(error);
  const lowerMsg = message.toLowerCase();

  if (/\b429\b/.test(message) || lowerMsg.includes('rate limit') || lowerMsg.includes('too many requests')) {
    return 'rate_limit';
  }
  if (/\b(500|502|503)\b/.test(message) || lowerMsg.includes('internal server error') || lowerMsg.includes('service unavailable')) {
    return 'server_error';
  }
  if (/\b(401|403)\b/.test(message) || lowerMsg.includes('unauthorized') || lowerMsg.includes('api key')) {
    return 'auth_error';
  }
  if (lowerMsg.includes('timed out') || lowerMsg.includes('timeout')) {
    return 'timeout';
  }
  if (lowerMsg.includes('json')) {
    return 'invalid_reply';
  }
  return 'unknown';
}

// ---------------------------------------------------------------------------
// Retry
// ---------------------------------------------------------------------------

export interface RetryConfig {
  /** Retries after the first attempt (default: 0). */
  maxRetries?: number;
  /** Delay before the first retry in milliseconds (default: 1000). */
  initialDelayMs?: number;
  /** Backoff multiplier (default: 2). */
  backoffMultiplier?: number;
  /** Upper bound for a single delay (default: 30000). */
  maxDelayMs?: number;
  /** Per-attempt timeout; 0 disables it (default: 0). */
  timeoutMs?: number;
  /** Categories worth another attempt. */
  retryOn?: ErrorCategory[];
  abortSignal?: AbortSignal;
  onRetry?: (attempt: number, error: Error, category: ErrorCategory, delayMs: number) => void;
}

export interface RetryResult<T> {
  result: T;
  attempts: number;
}

/**
 * Run `fn` until it succeeds, a non-retryable error is thrown, or the
 * retry allowance is spent. The last error is rethrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = {},
): Promise<RetryResult<T>> {
  const {
    maxRetries = 0,
    initialDelayMs = 1000,
    backoffMultiplier = 2,
    maxDelayMs = 30000,
    timeoutMs = 0,
    retryOn = ['rate_limit', 'server_error', 'timeout'],
    abortSignal,
    onRetry,
  } = config;

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (abortSignal?.aborted) {
      throw new AbortError('Operation aborted');
    }

    try {
      const result = await withTimeout(fn(attempt), timeoutMs, abortSignal);
      return { result, attempts: attempt + 1 };
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      const category = classifyError(err);
      if (!retryOn.includes(category) || attempt >= maxRetries) {
        throw lastError;
      }

      const delay = Math.min(initialDelayMs * Math.pow(backoffMultiplier, attempt), maxDelayMs);
      onRetry?.(attempt + 1, lastError, category, delay);
      await sleep(delay, abortSignal);
    }
  }

  throw lastError ?? new Error('Retry failed with no error captured');
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Reject with TimeoutError when `promise` has not settled after `timeoutMs`. */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  abortSignal?: AbortSignal,
): Promise<T> {
  if (timeoutMs <= 0 || timeoutMs === Infinity) return promise;

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      abortSignal?.removeEventListener('abort', onAbort);
      reject(new TimeoutError(`Operation timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortError('Operation aborted'));
    };
    abortSignal?.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        clearTimeout(timer);
        abortSignal?.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        abortSignal?.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

export function sleep(ms: number, abortSignal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (abortSignal?.aborted) {
      reject(new AbortError('Operation aborted'));
      return;
    }
    const timer = setTimeout(() => {
      abortSignal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortError('Operation aborted during retry delay'));
    };
    abortSignal?.addEventListener('abort', onAbort, { once: true });
  });
}

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export class AbortError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AbortError';
  }
}
