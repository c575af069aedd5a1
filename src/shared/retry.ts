/**
 * Retry Handler
 *
 * Exponential backoff with jitter for idempotent GETs against the
 * authorization server (discovery, JWKS). Token grants are never retried:
 * a replayed code or refresh token may be rejected or rotate twice.
 */

import { createLogger } from "./logger.js";
import { OidcApiError } from "./errors.js";
import { TimeoutError, sleep } from "./timeout.js";
import { MAX_RETRY_ATTEMPTS, RETRY_BASE_DELAY_MS, RETRY_MAX_DELAY_MS } from "./constants.js";

const logger = createLogger("RetryHandler");

export interface RetryOptions {
  /** Maximum number of retry attempts */
  maxRetries: number;
  /** Base delay in milliseconds for exponential backoff */
  baseDelayMs: number;
  /** Maximum delay cap in milliseconds */
  maxDelayMs: number;
  /** Add randomization to prevent thundering herd */
  jitter: boolean;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: MAX_RETRY_ATTEMPTS,
  baseDelayMs: RETRY_BASE_DELAY_MS,
  maxDelayMs: RETRY_MAX_DELAY_MS,
  jitter: true,
};

/**
 * Execute a function with retry logic.
 *
 * Retries only transient failures: timeouts, network errors and 5xx responses.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      if (!isRetryable(error)) {
        logger.debug("Non-retryable error", { error: message });
        throw error;
      }

      if (attempt >= opts.maxRetries) {
        logger.warn("All retry attempts exhausted", {
          attempts: opts.maxRetries + 1,
          error: message,
        });
        throw error;
      }

      const delay = calculateDelay(attempt, opts);

      logger.debug("Retrying after failure", {
        attempt: attempt + 1,
        maxRetries: opts.maxRetries,
        delayMs: delay,
        error: message,
      });

      await sleep(delay);
    }
  }
}

/**
 * Calculate delay for exponential backoff with optional jitter.
 */
function calculateDelay(attempt: number, options: RetryOptions): number {
  let delay = options.baseDelayMs * Math.pow(2, attempt);

  delay = Math.min(delay, options.maxDelayMs);

  // Random between 50% and 100% of calculated delay
  if (options.jitter) {
    delay = delay * (0.5 + Math.random() * 0.5);
  }

  return Math.round(delay);
}

/**
 * Check if an error is worth another attempt.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof TimeoutError) {
    return true;
  }

  if (error instanceof OidcApiError) {
    // No response at all: judge the transport failure underneath
    if (error.rawResponse === undefined) {
      return error.cause !== undefined && isRetryable(error.cause);
    }
    return error.rawResponse.status >= 500;
  }

  // undici reports connection failures as "TypeError: fetch failed"
  return error instanceof TypeError && error.message.toLowerCase().includes("fetch failed");
}
