/**
 * Cooperative cancellation helpers.
 */

import { SearchAbortedError } from '../types/errors.js';

function normalizeReason(reason: unknown): string {
  if (reason instanceof Error) {
    return reason.message || 'Cancelled';
  }
  if (typeof reason === 'string' && reason.trim().length > 0) {
    return reason;
  }
  if (reason === undefined || reason === null) {
    return 'Cancelled';
  }
  return String(reason);
}

export function getAbortReason(signal?: AbortSignal): string {
  return normalizeReason(signal?.reason);
}

/**
 * Throws a {@link SearchAbortedError} when the signal has fired. Called at
 * natural checkpoints such as between files or between plan steps.
 */
export function throwIfAborted(signal?: AbortSignal, context?: string): void {
  if (!signal?.aborted) {
    return;
  }
  const reason = getAbortReason(signal);
  throw new SearchAbortedError(context ? `${context}: ${reason}` : reason);
}

export function isAbortError(error: unknown): boolean {
  if (error instanceof SearchAbortedError) {
    return true;
  }
  if (!(error instanceof Error)) {
    return false;
  }
  const code = 'code' in error ? error.code : undefined;
  return error.name === 'AbortError' || error.name === 'TimeoutError' || code === 'ABORT_ERR';
}
