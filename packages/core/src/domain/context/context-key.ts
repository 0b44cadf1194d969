/**
 * @fileoverview ContextKey<T> - Type-Safe Context Key
 *
 * @packageDocumentation
 * @module @tessera/core/domain/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A key carries the type of the value stored under it, so reads come back
 * typed and writes are checked:
 *
 * ```typescript
 * const TENANT_ID = new ContextKey<string>('tenantId');
 * ctx.set(TENANT_ID, 'acme');        // OK
 * ctx.set(TENANT_ID, 42);            // Compile error
 * const tenant = ctx.get(TENANT_ID); // string | undefined
 * ```
 *
 * @version 1.0.0
 */

/**
 * @internal
 */
const CONTEXT_KEY_BRAND = Symbol('ContextKey');

/**
 * ContextKey<T> - A type-safe key for storing values in context.
 *
 * @template T - The type of value this key stores
 *
 * @remarks
 * Keys are immutable and hold no value themselves, so one module-level
 * constant can be shared by every request.
 *
 * @example With default value
 * ```typescript
 * const LOCALE = new ContextKey<string>('locale', { defaultValue: 'en' });
 *
 * ctx.get(LOCALE); // 'en'
 * ctx.set(LOCALE, 'de');
 * ctx.get(LOCALE); // 'de'
 * ```
 */
export class ContextKey<T> {
  /**
   * @internal
   */
  readonly [CONTEXT_KEY_BRAND]: true = true;

  /**
   * Storage key.
   */
  readonly id: string;

  readonly description?: string;

  /**
   * Returned by `get()` when nothing is stored under this key.
   */
  readonly defaultValue?: T;

  /**
   * Phantom type field. Never set at runtime.
   * @internal
   */
  declare readonly _type: T;

  constructor(
    id: string,
    options?: {
      description?: string;
      defaultValue?: T;
    },
  ) {
    this.id = id;
    if (options?.description !== undefined) this.description = options.description;
    if (options?.defaultValue !== undefined) this.defaultValue = options.defaultValue;
    Object.freeze(this);
  }

  toString(): string {
    return `ContextKey(${this.id})`;
  }

  /**
   * Check if a value is a ContextKey instance.
   */
  static isContextKey(value: unknown): value is ContextKey<unknown> {
    return (
      typeof value === 'object' &&
      value !== null &&
      CONTEXT_KEY_BRAND in value &&
      value[CONTEXT_KEY_BRAND] === true
    );
  }
}

/**
 * Extract the value type from a ContextKey.
 *
 * @example
 * ```typescript
 * const ATTEMPT = new ContextKey<number>('attempt');
 * type Attempt = ContextKeyValue<typeof ATTEMPT>; // number
 * ```
 */
export type ContextKeyValue<K> = K extends ContextKey<infer V> ? V : never;

// ============================================================================
// Well-known Keys
// ============================================================================
//
// Ids match the field names of IRequestContextData, so data passed to
// RequestContext.run() is readable through these keys.

/**
 * Correlation id shared by every log line of one dispatch.
 *
 * @example
 * ```typescript
 * RequestContext.run({ traceId: 'trace-1' }, () => {
 *   RequestContext.current()?.get(TRACE_ID_KEY); // 'trace-1'
 * });
 * ```
 */
export const TRACE_ID_KEY = new ContextKey<string>('traceId', {
  description: 'Distributed tracing correlation ID',
});

/**
 * Unique identifier of the request being dispatched.
 */
export const REQUEST_ID_KEY = new ContextKey<string>('requestId', {
  description: 'Unique identifier for this request',
});

/**
 * Authenticated user identifier.
 */
export const USER_ID_KEY = new ContextKey<string>('userId', {
  description: 'Authenticated user identifier',
});

/**
 * Context start timestamp.
 */
export const TIMESTAMP_KEY = new ContextKey<number>('timestamp', {
  description: 'Context start timestamp (epoch ms)',
});
