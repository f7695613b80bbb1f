import { logger } from './logger.js';
import { isTransientError, TimeoutError } from './errors.js';
import { sleep } from './time.js';

/**
 * Retry configuration options
 */
export interface RetryOptions {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  jitter: number;
  retryOn?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

/**
 * Default retry options
 */
export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  multiplier: 2,
  jitter: 0.1,
};

export type BackoffOptions = Pick<RetryOptions, 'initialDelayMs' | 'maxDelayMs' | 'multiplier'> &
  Partial<Pick<RetryOptions, 'jitter'>>;

/**
 * Exponential backoff delay for a zero-based attempt, clamped and jittered
 */
export function calculateDelay(attempt: number, options: BackoffOptions): number {
  const exponentialDelay = options.initialDelayMs * Math.pow(options.multiplier, attempt);
  const clampedDelay = Math.min(exponentialDelay, options.maxDelayMs);
  const jitter = options.jitter ?? 0;
  const jitterAmount = clampedDelay * jitter * (Math.random() * 2 - 1);
  return Math.round(clampedDelay + jitterAmount);
}

/**
 * Check if an error is retryable (default implementation)
 */
function isRetryableError(error: unknown): boolean {
  if (isTransientError(error)) {
    return true;
  }

  // Retry on network errors
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    if (
      message.includes('network') ||
      message.includes('timeout') ||
      message.includes('econnrefused') ||
      message.includes('econnreset') ||
      message.includes('etimedout') ||
      message.includes('socket hang up')
    ) {
      return true;
    }

    // Retry on rate limit errors (429)
    if (message.includes('429') || message.includes('rate limit') || message.includes('too many requests')) {
      return true;
    }
  }

  return false;
}

/**
 * Execute a function with retry logic
 */
export async function retry<T>(fn: () => Promise<T>, options: Partial<RetryOptions> = {}): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const log = logger('Retry');

  let lastError: unknown;

  for (let attempt = 0; attempt < opts.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      const shouldRetry = opts.retryOn ? opts.retryOn(error) : isRetryableError(error);

      if (!shouldRetry || attempt === opts.maxAttempts - 1) {
        throw error;
      }

      const delayMs = calculateDelay(attempt, opts);

      if (opts.onRetry) {
        opts.onRetry(attempt + 1, error, delayMs);
      } else {
        log.warn(`Attempt ${attempt + 1} failed, retrying in ${delayMs}ms`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }

      await sleep(delayMs);
    }
  }

  // Unreachable: the loop either returns or throws
  throw lastError;
}

/**
 * Race a promise against a deadline. The underlying call is not aborted, its
 * result is simply ignored once the deadline passes.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, { timeoutMs }));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}
