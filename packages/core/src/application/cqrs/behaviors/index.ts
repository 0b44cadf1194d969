/**
 * @fileoverview Built-in Pipeline Behaviors
 *
 * @module @tessera/core/application/cqrs/behaviors
 * @license Apache-2.0
 */

export { LoggingBehavior } from './logging.behavior';
export { ValidationBehavior } from './validation.behavior';
