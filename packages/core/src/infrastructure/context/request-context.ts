/**
 * @fileoverview RequestContext - AsyncLocalStorage-based Context Implementation
 *
 * @packageDocumentation
 * @module @tessera/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Implements IContext on top of Node.js AsyncLocalStorage, so request data
 * flows through Promise chains without being passed around.
 *
 * ```typescript
 * await RequestContext.run({ traceId: 'trace-1' }, async () => {
 *   await doWork();
 *   RequestContext.current()?.get(TRACE_ID_KEY); // 'trace-1'
 * });
 * ```
 *
 * @version 1.0.0
 */

import { AsyncLocalStorage } from 'node:async_hooks';

import {
  type IContext,
  type IRequestContextData,
  type CancelCallback,
  type ContextKey,
} from '../../domain/context';

/**
 * Backing state of one context.
 *
 * @internal
 */
interface IContextStore {
  readonly data: Map<string, unknown>;

  readonly cancelCallbacks: Set<CancelCallback>;

  /**
   * Once true, stays true.
   */
  cancelled: boolean;

  readonly createdAt: number;
}

/**
 * Process-wide storage. Must stay a single instance for propagation to work.
 *
 * @internal
 */
const contextStorage = new AsyncLocalStorage<IContextStore>();

/**
 * @internal
 */
function createContextStore(initialData: IRequestContextData): IContextStore {
  const data = new Map<string, unknown>();
  for (const [key, value] of Object.entries(initialData)) {
    if (value !== undefined) {
      data.set(key, value);
    }
  }

  return {
    data,
    cancelCallbacks: new Set(),
    cancelled: false,
    createdAt: Date.now(),
  };
}

/**
 * Run a cancellation callback, reporting failures without interrupting the
 * remaining callbacks.
 *
 * @internal
 */
function invokeCancelCallback(callback: CancelCallback): void {
  try {
    const result = callback();
    if (result instanceof Promise) {
      result.catch((error: unknown) => {
        console.error('Error in cancellation callback:', error);
      });
    }
  } catch (error) {
    console.error('Error in cancellation callback:', error);
  }
}

/**
 * RequestContext - IContext implementation using AsyncLocalStorage.
 *
 * @remarks
 * Each `run()` gets its own isolated store; concurrent dispatches never see
 * each other's data.
 *
 * @example With cancellation
 * ```typescript
 * RequestContext.run({}, async () => {
 *   const ctx = RequestContext.require();
 *   ctx.onCancel(() => stream.destroy());
 *   res.on('close', () => ctx.cancel());
 *   await pump(stream, res);
 * });
 * ```
 */
export class RequestContext implements IContext {
  private readonly store: IContextStore;

  private constructor(store: IContextStore) {
    this.store = store;
  }

  // ============================================================================
  // Static Factory Methods
  // ============================================================================

  /**
   * Create a new context and run `callback` inside it.
   *
   * @remarks
   * The context stays active for every async operation started by the
   * callback.
   */
  static run<R>(initialData: IRequestContextData, callback: () => R): R {
    return contextStorage.run(createContextStore(initialData), callback);
  }

  /**
   * Get the current context, if any.
   */
  static current(): RequestContext | undefined {
    const store = contextStorage.getStore();
    return store ? new RequestContext(store) : undefined;
  }

  /**
   * Get the current context or throw if not available.
   *
   * @throws Error if no context is active
   */
  static require(): RequestContext {
    const ctx = RequestContext.current();
    if (!ctx) {
      throw new Error(
        'RequestContext.require() called outside of context scope. ' +
          'Ensure you are within RequestContext.run() or ContextBehavior is in the pipeline.',
      );
    }
    return ctx;
  }

  static hasContext(): boolean {
    return contextStorage.getStore() !== undefined;
  }

  // ============================================================================
  // IContext Implementation - Get/Set Operations
  // ============================================================================

  get<T>(key: ContextKey<T>): T | undefined;
  get(key: ContextKey<unknown>): unknown {
    if (!this.store.data.has(key.id)) {
      return key.defaultValue;
    }
    return this.store.data.get(key.id);
  }

  set<T>(key: ContextKey<T>, value: T): void {
    this.store.data.set(key.id, value);
  }

  has(key: ContextKey<unknown>): boolean {
    return this.store.data.has(key.id);
  }

  delete(key: ContextKey<unknown>): boolean {
    return this.store.data.delete(key.id);
  }

  getAll(): Readonly<Record<string, unknown>> {
    return Object.freeze(Object.fromEntries(this.store.data));
  }

  // ============================================================================
  // IContext Implementation - Cancellation
  // ============================================================================

  isCancelled(): boolean {
    return this.store.cancelled;
  }

  cancel(): void {
    if (this.store.cancelled) {
      return;
    }

    this.store.cancelled = true;

    for (const callback of this.store.cancelCallbacks) {
      invokeCancelCallback(callback);
    }

    this.store.cancelCallbacks.clear();
  }

  onCancel(callback: CancelCallback): () => void {
    if (this.store.cancelled) {
      invokeCancelCallback(callback);
      return () => undefined;
    }

    this.store.cancelCallbacks.add(callback);

    return () => {
      this.store.cancelCallbacks.delete(callback);
    };
  }

  // ============================================================================
  // Utility Methods
  // ============================================================================

  /**
   * Age of this context in milliseconds.
   */
  getAge(): number {
    return Date.now() - this.store.createdAt;
  }

  toString(): string {
    return `RequestContext(keys=${this.store.data.size}, cancelled=${this.store.cancelled}, age=${this.getAge()}ms)`;
  }
}
