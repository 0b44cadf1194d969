/**
 * @fileoverview MediatorBuilder - Startup Registration of Handlers and Behaviors
 *
 * @packageDocumentation
 * @module @tessera/core/application/cqrs
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Registers handler, behavior and validator classes in the service
 * collection and records their routing. `build()` validates everything
 * against the built provider; the resulting Mediator has no mutation API.
 *
 * @version 1.0.0
 */

import {
  type Constructor,
  type IServiceCollection,
  type IServiceProvider,
  type ServiceIdentifier,
  ConfigurationError,
  ServiceLifetime,
  createClassDescriptor,
  getServiceName,
} from '../../domain/di';

import {
  type IPipelineBehavior,
  type IRequest,
  type IRequestHandler,
  type IRequestValidator,
  type RequestType,
  type ResultOf,
} from './cqrs.interface';
import { HandlerCatalog } from './handler-catalog';
import { type IMediatorOptions, Mediator } from './mediator';
import { type IBehaviorOptions, PipelineComposer } from './pipeline-composer';
import { ValidatorCatalog, VALIDATOR_CATALOG_TOKEN } from './validator-catalog';

/**
 * Options for `addBehavior()`.
 */
export interface IBehaviorRegistrationOptions extends IBehaviorOptions {
  /**
   * Used when the behavior class is not registered yet.
   *
   * Default: Transient
   */
  lifetime?: ServiceLifetime;
}

/**
 * MediatorBuilder - composition-root API for the mediator.
 *
 * @example
 * ```typescript
 * const services = new ServiceCollection();
 * services.addSingletonInstance(LOGGER_TOKEN, new ConsoleLogger());
 * services.addScoped(IOrderRepository, SqlOrderRepository);
 *
 * const builder = new MediatorBuilder(services, { defaultTimeoutMs: 10_000 })
 *   .addHandler(PlaceOrder, PlaceOrderHandler)
 *   .addValidator(PlaceOrder, PlaceOrderValidator)
 *   .addBehavior(ContextBehavior, { order: -100 })
 *   .addBehavior(LoggingBehavior, { order: -50 })
 *   .addBehavior(ValidationBehavior);
 *
 * const provider = services.build();
 * const mediator = builder.build(provider);
 * ```
 */
export class MediatorBuilder {
  private readonly catalog = new HandlerCatalog();

  private readonly composer = new PipelineComposer();

  private readonly validators = new ValidatorCatalog();

  constructor(
    private readonly services: IServiceCollection,
    private readonly options: IMediatorOptions = {},
  ) {
    services.addSingletonInstance(VALIDATOR_CATALOG_TOKEN, this.validators);
  }

  /**
   * Register the handler of a request type.
   *
   * @remarks
   * The handler class is registered in the collection unless it already is.
   * A second handler for the same request type surfaces as
   * DuplicateHandlerError in `build()`.
   */
  addHandler<TRequest extends IRequest>(
    requestType: RequestType<TRequest>,
    handlerClass: Constructor<IRequestHandler<TRequest, ResultOf<TRequest>>>,
    lifetime: ServiceLifetime = ServiceLifetime.Transient,
    resultType?: string,
  ): this {
    this.registerClass(handlerClass, lifetime);
    this.catalog.registerHandler(requestType, handlerClass, resultType);
    return this;
  }

  /**
   * Add a pipeline behavior.
   *
   * @throws ConfigurationError for a non-finite `order`
   */
  addBehavior(
    behaviorClass: Constructor<IPipelineBehavior>,
    options: IBehaviorRegistrationOptions = {},
  ): this {
    this.composer.addBehavior(behaviorClass, options);
    this.registerClass(behaviorClass, options.lifetime ?? ServiceLifetime.Transient);
    return this;
  }

  /**
   * Add a validator for a request type. Validators run in registration
   * order inside ValidationBehavior.
   */
  addValidator<TRequest extends IRequest>(
    requestType: RequestType<TRequest>,
    validatorClass: Constructor<IRequestValidator<TRequest>>,
    lifetime: ServiceLifetime = ServiceLifetime.Transient,
  ): this {
    this.registerClass(validatorClass, lifetime);
    this.validators.add(requestType, validatorClass);
    return this;
  }

  /**
   * Require a handler for `requestType` at build time.
   */
  declareRequest(requestType: RequestType): this {
    this.catalog.declareRequest(requestType);
    return this;
  }

  /**
   * Validate the registrations against `provider` and create the Mediator.
   *
   * @throws DuplicateHandlerError / MissingHandlerError for handler problems
   * @throws ConfigurationError when a behavior or validator is not resolvable
   */
  build(provider: IServiceProvider): Mediator {
    const isRegistered = (identifier: ServiceIdentifier): boolean =>
      provider.isRegistered(identifier);

    this.catalog.validate(isRegistered);

    for (const { behaviorIdentifier } of this.composer.getBehaviors()) {
      this.ensureRegistered(behaviorIdentifier, 'Pipeline behavior', isRegistered);
    }
    for (const validator of this.validators.allValidators()) {
      this.ensureRegistered(validator, 'Validator', isRegistered);
    }

    this.composer.freeze();
    this.validators.freeze();

    return new Mediator(this.catalog, this.composer, this.options);
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  private registerClass<T>(implementation: Constructor<T>, lifetime: ServiceLifetime): void {
    if (!this.services.has(implementation)) {
      this.services.register(createClassDescriptor(implementation, lifetime, implementation));
    }
  }

  private ensureRegistered(
    identifier: ServiceIdentifier,
    kind: string,
    isRegistered: (identifier: ServiceIdentifier) => boolean,
  ): void {
    if (!isRegistered(identifier)) {
      throw new ConfigurationError(
        `${kind} '${getServiceName(identifier)}' is not registered in the container.`,
      );
    }
  }
}
