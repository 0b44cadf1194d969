/**
 * @fileoverview HandlerCatalog - Request Type to Handler Mapping
 *
 * @packageDocumentation
 * @module @tessera/core/application/cqrs
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Filled at startup, validated once, then frozen. Duplicate and missing
 * handlers are configuration errors raised by `validate()`, never at
 * dispatch time.
 *
 * @version 1.0.0
 */

import { type ServiceIdentifier, ConfigurationError, getServiceName } from '../../domain/di';

import { DuplicateHandlerError, MissingHandlerError } from './cqrs.errors';
import { type IRequest, type IRequestHandler, type RequestType } from './cqrs.interface';

/**
 * Identifier of a handler in the container.
 */
export type HandlerIdentifier = ServiceIdentifier<IRequestHandler<IRequest, unknown>>;

/**
 * Routing entry for one request type.
 */
export interface IHandlerDescriptor {
  readonly requestType: RequestType;

  readonly handlerIdentifier: HandlerIdentifier;

  /**
   * Optional description of the result, for diagnostics.
   */
  readonly resultType?: string | undefined;
}

/**
 * HandlerCatalog - maps each request type to exactly one handler.
 *
 * @example
 * ```typescript
 * const catalog = new HandlerCatalog();
 * catalog.registerHandler(PlaceOrder, PlaceOrderHandler, 'OrderReceipt');
 * catalog.declareRequest(CancelOrder);
 *
 * catalog.validate((id) => provider.isRegistered(id));
 * // MissingHandlerError: Request 'CancelOrder' has no handler.
 * ```
 */
export class HandlerCatalog {
  /**
   * Every registration per request type, so duplicates can be reported.
   */
  private readonly registrations = new Map<RequestType, IHandlerDescriptor[]>();

  /**
   * Request types that must have a handler.
   */
  private readonly declared = new Set<RequestType>();

  /**
   * First registration per request type, keyed by constructor.
   */
  // eslint-disable-next-line @typescript-eslint/ban-types
  private readonly routes = new Map<Function, IHandlerDescriptor>();

  private frozen = false;

  registerHandler(
    requestType: RequestType,
    handlerIdentifier: HandlerIdentifier,
    resultType?: string,
  ): this {
    this.ensureNotFrozen();

    const descriptor: IHandlerDescriptor = Object.freeze({
      requestType,
      handlerIdentifier,
      resultType,
    });
    const existing = this.registrations.get(requestType);
    if (existing) {
      existing.push(descriptor);
    } else {
      this.registrations.set(requestType, [descriptor]);
      this.routes.set(requestType, descriptor);
    }

    return this;
  }

  /**
   * Mark a request type that must have a handler at startup.
   */
  declareRequest(requestType: RequestType): this {
    this.ensureNotFrozen();
    this.declared.add(requestType);
    return this;
  }

  /**
   * Find the handler of a request type, by constructor identity.
   */
  // eslint-disable-next-line @typescript-eslint/ban-types
  lookup(requestType: Function): IHandlerDescriptor | undefined {
    return this.routes.get(requestType);
  }

  /**
   * All request types that have at least one handler or were declared.
   */
  requestTypes(): readonly RequestType[] {
    return Array.from(new Set([...this.registrations.keys(), ...this.declared]));
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Check every request type and freeze the catalog.
   *
   * @param isRegistered - Whether a handler identifier is resolvable
   * @throws DuplicateHandlerError for more than one handler
   * @throws MissingHandlerError for none, or for one the container lacks
   */
  validate(isRegistered: (identifier: ServiceIdentifier) => boolean): void {
    this.ensureNotFrozen();

    for (const requestType of this.requestTypes()) {
      const descriptors = this.registrations.get(requestType) ?? [];
      const [descriptor] = descriptors;

      if (descriptor === undefined) {
        throw new MissingHandlerError(requestType.name, 'has no handler');
      }

      if (descriptors.length > 1) {
        throw new DuplicateHandlerError(
          requestType.name,
          descriptors.map((d) => getServiceName(d.handlerIdentifier)),
        );
      }

      if (!isRegistered(descriptor.handlerIdentifier)) {
        throw new MissingHandlerError(
          requestType.name,
          `is handled by '${getServiceName(descriptor.handlerIdentifier)}', ` +
            `which is not registered in the container`,
        );
      }
    }

    this.frozen = true;
  }

  private ensureNotFrozen(): void {
    if (this.frozen) {
      throw new ConfigurationError(
        'The handler catalog is frozen. Register handlers before building the mediator.',
      );
    }
  }
}
