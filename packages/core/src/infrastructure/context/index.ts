/**
 * @fileoverview Infrastructure Context Module Exports
 *
 * @packageDocumentation
 * @module @tessera/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * AsyncLocalStorage-based implementation of IContext.
 */

export { RequestContext } from './request-context';
