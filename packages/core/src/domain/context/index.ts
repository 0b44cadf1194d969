/**
 * @fileoverview Domain Context Module Exports
 *
 * @packageDocumentation
 * @module @tessera/core/domain/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * - **ContextKey<T>**: type-safe context key
 * - **IContext**: request data and cooperative cancellation
 * - **Well-known keys**: TRACE_ID_KEY, REQUEST_ID_KEY, USER_ID_KEY, TIMESTAMP_KEY
 */

export {
  ContextKey,
  type ContextKeyValue,
  TRACE_ID_KEY,
  REQUEST_ID_KEY,
  USER_ID_KEY,
  TIMESTAMP_KEY,
} from './context-key';

export { type IContext, type IRequestContextData, type CancelCallback } from './context.interface';
