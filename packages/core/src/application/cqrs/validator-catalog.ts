/**
 * @fileoverview ValidatorCatalog - Request Type to Validators Mapping
 *
 * @packageDocumentation
 * @module @tessera/core/application/cqrs
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * @version 1.0.0
 */

import {
  type ServiceIdentifier,
  type ServiceToken,
  ConfigurationError,
  createToken,
} from '../../domain/di';

import { type IRequest, type IRequestValidator, type RequestType } from './cqrs.interface';

/**
 * Identifier of a validator in the container.
 */
export type ValidatorIdentifier = ServiceIdentifier<IRequestValidator<IRequest>>;

/**
 * ValidatorCatalog - validators per request type, in registration order.
 *
 * @remarks
 * Registered as a singleton instance under {@link VALIDATOR_CATALOG_TOKEN}
 * by the MediatorBuilder and read by ValidationBehavior.
 */
export class ValidatorCatalog {
  // eslint-disable-next-line @typescript-eslint/ban-types
  private readonly validators = new Map<Function, ValidatorIdentifier[]>();

  private frozen = false;

  add(requestType: RequestType, validatorIdentifier: ValidatorIdentifier): this {
    if (this.frozen) {
      throw new ConfigurationError(
        'The validator catalog is frozen. Add validators before building the mediator.',
      );
    }

    const existing = this.validators.get(requestType);
    if (existing) {
      existing.push(validatorIdentifier);
    } else {
      this.validators.set(requestType, [validatorIdentifier]);
    }

    return this;
  }

  // eslint-disable-next-line @typescript-eslint/ban-types
  validatorsFor(requestType: Function): readonly ValidatorIdentifier[] {
    return this.validators.get(requestType) ?? [];
  }

  /**
   * Every validator identifier, for startup checks.
   */
  allValidators(): readonly ValidatorIdentifier[] {
    return Array.from(this.validators.values()).flat();
  }

  freeze(): void {
    this.frozen = true;
  }
}

/**
 * Token for the ValidatorCatalog.
 */
export const VALIDATOR_CATALOG_TOKEN: ServiceToken<ValidatorCatalog> =
  createToken<ValidatorCatalog>('ValidatorCatalog');
