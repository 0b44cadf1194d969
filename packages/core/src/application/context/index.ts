/**
 * @fileoverview Application Context Module Exports
 *
 * @packageDocumentation
 * @module @tessera/core/application/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Pipeline integration for context propagation. ContextBehavior gives every
 * dispatch its own RequestContext.
 *
 * ## Usage
 *
 * ```typescript
 * import { ContextBehavior, MediatorBuilder } from '@tessera/core';
 *
 * new MediatorBuilder(services).addBehavior(ContextBehavior, { order: -100 });
 * ```
 */

export {
  ContextBehavior,
  defaultExtractContextData,
  type IContextBehaviorOptions,
} from './context.behavior';
