/**
 * @fileoverview CQRS Module Exports
 *
 * @packageDocumentation
 * @module @tessera/core/application/cqrs
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * ## Usage
 *
 * ```typescript
 * import { MediatorBuilder, ServiceCollection, withScope } from '@tessera/core';
 *
 * const services = new ServiceCollection();
 * const builder = new MediatorBuilder(services)
 *   .addHandler(GetOrder, GetOrderHandler)
 *   .addBehavior(LoggingBehavior);
 *
 * const mediator = builder.build(services.build());
 * ```
 */

// ============================================================================
// Contracts
// ============================================================================

export {
  Request,
  type IRequest,
  type RequestType,
  type ResultOf,
  type IHandlerContext,
  type IRequestHandler,
  type NextDelegate,
  type IPipelineBehavior,
  type BehaviorFilter,
  type ValidationFailure,
  type IRequestValidator,
  type ISendOptions,
  type Result,
} from './cqrs.interface';

// ============================================================================
// Errors
// ============================================================================

export {
  DuplicateHandlerError,
  MissingHandlerError,
  PipelineContractError,
  HandlerNotFoundError,
  HandlerError,
  ValidationError,
  OperationCancelledError,
  type CancellationReason,
} from './cqrs.errors';

// ============================================================================
// Catalogs & Pipeline
// ============================================================================

export {
  HandlerCatalog,
  type HandlerIdentifier,
  type IHandlerDescriptor,
} from './handler-catalog';

export {
  PipelineComposer,
  type BehaviorIdentifier,
  type IBehaviorDescriptor,
  type IBehaviorOptions,
} from './pipeline-composer';

export {
  ValidatorCatalog,
  VALIDATOR_CATALOG_TOKEN,
  type ValidatorIdentifier,
} from './validator-catalog';

// ============================================================================
// Mediator
// ============================================================================

export { Mediator, type IMediator, type IMediatorOptions } from './mediator';

export { MediatorBuilder, type IBehaviorRegistrationOptions } from './mediator-builder';

// ============================================================================
// Built-in Behaviors
// ============================================================================

export { LoggingBehavior, ValidationBehavior } from './behaviors';
