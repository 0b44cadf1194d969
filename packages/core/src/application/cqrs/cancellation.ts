/**
 * @fileoverview Dispatch Cancellation Helpers
 *
 * @packageDocumentation
 * @module @tessera/core/application/cqrs
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * One dispatch gets one AbortSignal, linked to the caller's signal and to an
 * optional timeout. Its `reason` is always an OperationCancelledError.
 *
 * @version 1.0.0
 */

import { OperationCancelledError } from './cqrs.errors';

/**
 * Signal for one dispatch plus its cleanup.
 *
 * @internal
 */
export interface ILinkedCancellation {
  readonly signal: AbortSignal;

  /**
   * Clear the timer and detach from the caller's signal.
   */
  dispose(): void;
}

/**
 * Link the caller's signal and a timeout into one signal.
 *
 * @internal
 */
export function linkCancellation(parent?: AbortSignal, timeoutMs?: number): ILinkedCancellation {
  const controller = new AbortController();

  const onParentAbort = (): void => {
    controller.abort(new OperationCancelledError('aborted', undefined, { cause: parent?.reason }));
  };

  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  const timer =
    timeoutMs !== undefined
      ? setTimeout(() => {
          controller.abort(
            new OperationCancelledError('timeout', `Operation timed out after ${timeoutMs}ms`),
          );
        }, timeoutMs)
      : undefined;

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * The cancellation error carried by an aborted signal.
 *
 * @internal
 */
export function cancellationError(signal: AbortSignal): OperationCancelledError {
  const reason: unknown = signal.reason;
  return reason instanceof OperationCancelledError
    ? reason
    : new OperationCancelledError('aborted', undefined, { cause: reason });
}

/**
 * @throws OperationCancelledError if the signal has fired
 *
 * @internal
 */
export function throwIfCancelled(signal: AbortSignal): void {
  if (signal.aborted) {
    throw cancellationError(signal);
  }
}

/**
 * Settle with `work`, or reject as soon as the signal fires.
 *
 * @remarks
 * A late result or failure of `work` after cancellation is ignored.
 *
 * @internal
 */
export function raceCancellation<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(cancellationError(signal));
    };

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
