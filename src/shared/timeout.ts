/**
 * Timeout Utilities
 *
 * Timeout wrappers for async operations so that no call to the
 * authorization server can block indefinitely.
 */

import { createLogger } from "./logger.js";

const logger = createLogger("timeout");

/** Timeout error thrown when operations exceed time limit */
export class TimeoutError extends Error {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`Operation '${operation}' timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Wraps an async operation with a timeout.
 *
 * @param operation - Name of the operation for error messages
 * @param fn - Async function to execute; should honour the signal it receives
 * @param timeoutMs - Timeout in milliseconds
 * @param signal - Optional AbortSignal to cancel the operation
 * @returns Promise that resolves with the operation result or rejects with TimeoutError
 */
export async function withTimeout<T>(
  operation: string,
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const combinedSignal = signal
    ? createCombinedSignal(signal, controller.signal)
    : controller.signal;

  const timeoutId = setTimeout(() => {
    logger.warn(`Operation timed out`, { operation, timeoutMs });
    controller.abort(new TimeoutError(operation, timeoutMs));
  }, timeoutMs);

  try {
    return await fn(combinedSignal);
  } catch (error) {
    if (error instanceof TimeoutError) {
      throw error;
    }

    // fetch rejects with the abort reason or a generic AbortError
    if (controller.signal.aborted && controller.signal.reason instanceof TimeoutError) {
      throw controller.signal.reason;
    }

    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Creates a combined AbortSignal that triggers when either signal is aborted.
 */
function createCombinedSignal(signal1: AbortSignal, signal2: AbortSignal): AbortSignal {
  const controller = new AbortController();

  const abort1 = (): void => {
    controller.abort(signal1.reason);
  };
  const abort2 = (): void => {
    controller.abort(signal2.reason);
  };

  if (signal1.aborted) {
    controller.abort(signal1.reason);
  } else {
    signal1.addEventListener("abort", abort1, { once: true });
  }

  if (signal2.aborted) {
    controller.abort(signal2.reason);
  } else {
    signal2.addEventListener("abort", abort2, { once: true });
  }

  return controller.signal;
}

/**
 * Resolve after `ms` milliseconds, or reject early when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
