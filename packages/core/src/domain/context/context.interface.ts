/**
 * @fileoverview IContext - Request Context Abstraction
 *
 * @packageDocumentation
 * @module @tessera/core/domain/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Per-request data (trace id, user id, ...) and cooperative cancellation.
 * How the context is stored and propagated is an infrastructure concern
 * (AsyncLocalStorage).
 *
 * The context carries data only. Scopes and the container are always passed
 * explicitly and never stored here.
 *
 * @version 1.0.0
 */

import { type ContextKey } from './context-key';

/**
 * Initial data accepted by `RequestContext.run()`.
 *
 * @remarks
 * Field names are the ids of the well-known keys (`TRACE_ID_KEY`, ...).
 * Extra fields are stored under their own name.
 */
export interface IRequestContextData {
  traceId?: string | undefined;

  requestId?: string | undefined;

  userId?: string | undefined;

  /** Epoch milliseconds */
  timestamp?: number | undefined;

  [key: string]: unknown;
}

/**
 * Called when the context is cancelled.
 */
export type CancelCallback = () => void | Promise<void>;

/**
 * IContext - Request-scoped data bag with cancellation.
 *
 * @example
 * ```typescript
 * function audit(ctx: IContext, action: string): void {
 *   const traceId = ctx.get(TRACE_ID_KEY);
 *   const userId = ctx.get(USER_ID_KEY);
 *   auditLog.write({ traceId, userId, action });
 * }
 * ```
 */
export interface IContext {
  /**
   * Read a value, falling back to the key's default.
   */
  get<T>(key: ContextKey<T>): T | undefined;

  set<T>(key: ContextKey<T>, value: T): void;

  has(key: ContextKey<unknown>): boolean;

  /**
   * @returns True if the key existed
   */
  delete(key: ContextKey<unknown>): boolean;

  /**
   * Snapshot of every stored value, keyed by key id.
   */
  getAll(): Readonly<Record<string, unknown>>;

  isCancelled(): boolean;

  /**
   * Mark the context cancelled and run every registered callback once.
   *
   * @remarks
   * Cancellation is cooperative: long-running work checks `isCancelled()`.
   */
  cancel(): void;

  /**
   * Register a cancellation callback.
   *
   * @remarks
   * Runs immediately if the context is already cancelled.
   *
   * @returns Unsubscribe function
   */
  onCancel(callback: CancelCallback): () => void;
}
