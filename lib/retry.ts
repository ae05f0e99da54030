import { ExtendedError, RemoteError } from './errors';
import { createLogger } from './logger';

const logger = createLogger('retry');

export interface RetryOptions {
  maxRetries?: number;
  initialDelay?: number;
  maxDelay?: number;
  backoffMultiplier?: number;
  onRetry?: (error: Error, attempt: number, delay: number) => void;
  shouldRetry?: (error: Error) => boolean;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxRetries: 5,
  initialDelay: 300,
  maxDelay: 10000,
  backoffMultiplier: 2,
  onRetry: () => {},
  shouldRetry: isRetryableError,
};

function statusCodeOf(error: Error): number | undefined {
  if (error instanceof ExtendedError && error.details) {
    const statusCode = error.details.statusCode;
    if (typeof statusCode === 'number') return statusCode;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Determines if an error should be retried based on its kind, status code or message
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof RemoteError) {
    return error.kind === 'transient';
  }

  const statusCode = statusCodeOf(error);
  if (statusCode) {
    // Retry on rate limit (429) and server errors (5xx)
    if (statusCode === 429) return true;
    if (statusCode >= 500 && statusCode < 600) return true;

    // Don't retry client errors (4xx) except 429
    if (statusCode >= 400 && statusCode < 500) return false;
  }

  const message = error.message?.toLowerCase() || '';
  if (
    message.includes('network') ||
    message.includes('timeout') ||
    message.includes('econnreset') ||
    message.includes('econnrefused') ||
    message.includes('etimedout')
  ) {
    return true;
  }

  // Don't retry authentication errors
  if (
    message.includes('unauthorized') ||
    message.includes('forbidden') ||
    message.includes('invalid_grant')
  ) {
    return false;
  }

  // Default: retry unknown errors
  return true;
}

/**
 * Calculates delay with exponential backoff and jitter
 */
function calculateDelay(
  attempt: number,
  initialDelay: number,
  maxDelay: number,
  backoffMultiplier: number
): number {
  const exponentialDelay = initialDelay * Math.pow(backoffMultiplier, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelay);

  // Add jitter (randomize between 0% and 100% of the delay)
  const jitter = cappedDelay * Math.random();

  return Math.floor(cappedDelay + jitter);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Retries an async operation with exponential backoff
 *
 * @param fn - The async function to retry
 * @param options - Retry configuration options
 * @returns The result of the successful operation
 * @throws The last error if all retries are exhausted
 *
 * @example
 * ```ts
 * const folders = await retryWithBackoff(
 *   () => store.listFoldersAt(null),
 *   {
 *     maxRetries: 3,
 *     onRetry: (error, attempt, delay) => {
 *       logger.warn(`Retry ${attempt}/3 after ${delay}ms: ${error.message}`);
 *     }
 *   }
 * );
 * ```
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  let attempt = 0;
  for (;;) {
    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      // If the operation was explicitly aborted, don't retry
      if (lastError.name === 'AbortError') {
        logger.info('Operation aborted, not retrying', {
          error: lastError.message,
        });
        throw lastError;
      }

      if (!opts.shouldRetry(lastError)) {
        logger.debug('Error is not retryable, throwing immediately', {
          error: lastError.message,
          attempt,
        });
        throw lastError;
      }

      if (attempt >= opts.maxRetries) {
        logger.warn('Max retries exhausted', {
          error: lastError.message,
          attempts: attempt + 1,
        });
        throw lastError;
      }

      const delay = calculateDelay(
        attempt,
        opts.initialDelay,
        opts.maxDelay,
        opts.backoffMultiplier
      );

      logger.info('Retrying operation after error', {
        error: lastError.message,
        attempt: attempt + 1,
        maxRetries: opts.maxRetries,
        delayMs: delay,
      });

      opts.onRetry(lastError, attempt + 1, delay);

      await sleep(delay);
      attempt++;
    }
  }
}
