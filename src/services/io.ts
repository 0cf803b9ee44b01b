/**
 * Timeout and cancellation helpers for store and catalog I/O
 */

import { StoreUnavailableError } from '../errors';

export function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error
    ? signal.reason
    : new StoreUnavailableError('operation aborted');
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
}

/**
 * Run work with a deadline. The work receives a signal that aborts on expiry or
 * when the parent signal aborts; the returned promise rejects with onTimeout()
 * or the parent's reason in those cases.
 */
export function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    return Promise.reject(abortReason(parent));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const err = onTimeout();
      controller.abort(err);
      reject(err);
    }, timeoutMs);

    const onParentAbort = () => {
      const err = parent ? abortReason(parent) : new StoreUnavailableError('operation aborted');
      controller.abort(err);
      reject(err);
    };
    parent?.addEventListener('abort', onParentAbort, { once: true });

    void work(controller.signal)
      .then(resolve, reject)
      .finally(() => {
        clearTimeout(timer);
        parent?.removeEventListener('abort', onParentAbort);
      });
  });
}
