/**
 * Timeout and cancellation helpers for external calls.
 *
 * Every provider call gets its own deadline. The operation receives an
 * AbortSignal that fires on timeout or when the caller's signal aborts, so
 * providers that honour it stop work early.
 */

import { TimeoutError, createCancelledError } from '../api/errors.js';

/**
 * Execute an operation with a deadline
 *
 * @param operation - Receives a signal that aborts on timeout or caller abort
 * @param timeoutMs - Timeout in milliseconds
 * @param label - Operation name for the error message
 * @param parentSignal - Caller's signal; aborting it rejects with Cancelled
 * @throws {TimeoutError} if the deadline is reached first
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label = 'Operation',
  parentSignal?: AbortSignal
): Promise<T> {
  if (parentSignal?.aborted) {
    throw createCancelledError(label);
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);

    if (parentSignal) {
      onParentAbort = () => {
        controller.abort();
        reject(createCancelledError(label));
      };
      parentSignal.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
    if (parentSignal && onParentAbort) {
      parentSignal.removeEventListener('abort', onParentAbort);
    }
  }
}

/**
 * Stop waiting for a shared promise when the caller's signal aborts.
 *
 * The underlying work keeps running for other waiters; only this caller's
 * promise rejects with Cancelled.
 */
export async function abandonOnAbort<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  label: string
): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    throw createCancelledError(label);
  }

  let onAbort: (() => void) | undefined;
  const abandoned = new Promise<never>((_, reject) => {
    onAbort = () => reject(createCancelledError(label));
    signal.addEventListener('abort', onAbort, { once: true });
  });

  try {
    return await Promise.race([promise, abandoned]);
  } finally {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

export function throwIfAborted(signal: AbortSignal | undefined, label: string): void {
  if (signal?.aborted) {
    throw createCancelledError(label);
  }
}
