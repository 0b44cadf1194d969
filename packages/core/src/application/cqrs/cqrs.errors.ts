/**
 * @fileoverview CQRS Errors
 *
 * @packageDocumentation
 * @module @tessera/core/application/cqrs
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * ```
 * DIError
 * ├─ ConfigurationError
 * │  ├─ DuplicateHandlerError      two handlers for one request type
 * │  ├─ MissingHandlerError        declared request without a usable handler
 * │  └─ PipelineContractError      a behavior called next() twice
 * └─ ResolutionError
 *    └─ HandlerNotFoundError       dispatch of an unknown request type
 *
 * HandlerError                     business failure, returned by trySend()
 * └─ ValidationError
 *
 * OperationCancelledError          caller abort or timeout
 * ```
 *
 * @version 1.0.0
 */

import { ConfigurationError, ResolutionError } from '../../domain/di';

import { type ValidationFailure } from './cqrs.interface';

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Thrown at startup when a request type has more than one handler.
 */
export class DuplicateHandlerError extends ConfigurationError {
  public readonly requestName: string;

  public readonly handlerNames: readonly string[];

  constructor(requestName: string, handlerNames: readonly string[]) {
    super(
      `Request '${requestName}' has ${handlerNames.length} handlers (${handlerNames.join(', ')}). ` +
        `Exactly one handler per request type is allowed.`,
    );
    this.requestName = requestName;
    this.handlerNames = handlerNames;
  }
}

/**
 * Thrown at startup when a declared request type has no handler, or its
 * handler is not registered in the container.
 */
export class MissingHandlerError extends ConfigurationError {
  public readonly requestName: string;

  constructor(requestName: string, detail: string) {
    super(`Request '${requestName}' ${detail}.`);
    this.requestName = requestName;
  }
}

/**
 * Thrown when a pipeline behavior calls `next()` more than once.
 */
export class PipelineContractError extends ConfigurationError {
  public readonly behaviorName: string;

  constructor(behaviorName: string) {
    super(
      `Pipeline behavior '${behaviorName}' called next() more than once. ` +
        `A behavior must call next() at most once.`,
    );
    this.behaviorName = behaviorName;
  }
}

// ============================================================================
// Resolution Errors
// ============================================================================

/**
 * Thrown when a request type has no registered handler.
 */
export class HandlerNotFoundError extends ResolutionError {
  public readonly requestName: string;

  constructor(requestName: string) {
    super(
      `No handler registered for request '${requestName}'. ` +
        `Register one with MediatorBuilder.addHandler().`,
      [`${requestName} (NO HANDLER)`],
    );
    this.requestName = requestName;
  }
}

// ============================================================================
// Business Errors
// ============================================================================

/**
 * Business failure reported by a handler or a short-circuiting behavior.
 *
 * @remarks
 * The only failure kind `mediator.trySend()` turns into a result value.
 *
 * @example
 * ```typescript
 * if (stock < request.quantity) {
 *   throw new HandlerError('Not enough stock', 'OUT_OF_STOCK', { sku: request.sku });
 * }
 * ```
 */
export class HandlerError extends Error {
  /**
   * Machine-readable error code.
   */
  public readonly code: string;

  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    message: string,
    code = 'HANDLER_ERROR',
    details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown by ValidationBehavior when a request fails validation.
 */
export class ValidationError extends HandlerError {
  public readonly failures: readonly ValidationFailure[];

  constructor(requestName: string, failures: readonly ValidationFailure[]) {
    super(
      `Validation failed for '${requestName}': ` +
        failures.map((f) => (f.field ? `${f.field} ${f.message}` : f.message)).join('; '),
      'VALIDATION_FAILED',
      { request: requestName },
    );
    this.failures = failures;
  }
}

// ============================================================================
// Cancellation
// ============================================================================

/**
 * Why a dispatch was cancelled.
 */
export type CancellationReason = 'aborted' | 'timeout';

/**
 * Thrown when a dispatch is aborted by the caller's signal or times out.
 */
export class OperationCancelledError extends Error {
  public readonly reason: CancellationReason;

  constructor(reason: CancellationReason, message?: string, options?: ErrorOptions) {
    super(
      message ?? (reason === 'timeout' ? 'Operation timed out' : 'Operation was cancelled'),
      options,
    );
    this.name = new.target.name;
    this.reason = reason;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}
