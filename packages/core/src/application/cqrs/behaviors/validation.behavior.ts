/**
 * @fileoverview ValidationBehavior - Request Validation Short-Circuit
 *
 * @packageDocumentation
 * @module @tessera/core/application/cqrs/behaviors
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * @version 1.0.0
 */

import { ValidationError } from '../cqrs.errors';
import {
  type IHandlerContext,
  type IPipelineBehavior,
  type IRequest,
  type NextDelegate,
  type ValidationFailure,
} from '../cqrs.interface';
import { type ValidatorCatalog, VALIDATOR_CATALOG_TOKEN } from '../validator-catalog';

/**
 * ValidationBehavior - runs the request type's validators before the
 * handler.
 *
 * @remarks
 * Validators are resolved from the dispatch scope and run in registration
 * order. Failures of every validator are collected; if there are any the
 * pipeline stops with ValidationError and the handler never runs.
 */
export class ValidationBehavior implements IPipelineBehavior {
  static inject = [VALIDATOR_CATALOG_TOKEN] as const;

  constructor(private readonly validators: ValidatorCatalog) {}

  async handle(request: IRequest, next: NextDelegate, context: IHandlerContext): Promise<unknown> {
    const failures: ValidationFailure[] = [];

    for (const identifier of this.validators.validatorsFor(context.requestType)) {
      const validator = await context.scope.resolve(identifier);
      failures.push(...(await validator.validate(request)));
    }

    if (failures.length > 0) {
      throw new ValidationError(context.requestType.name, failures);
    }

    return next();
  }
}
