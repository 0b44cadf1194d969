/**
 * @fileoverview ServiceCollection - Service Registration Implementation
 *
 * @packageDocumentation
 * @module @tessera/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Implements IServiceCollection with a fluent API. Registrations are keyed
 * by the identifier value; `build()` seals the collection and hands a copy
 * of the registrations to the provider.
 *
 * @version 1.0.0
 */

import {
  type ServiceIdentifier,
  type Constructor,
  type IServiceDescriptor,
  type IServiceDescriptorOptions,
  type ServiceFactory,
  type DecoratorConstructor,
  type DecoratorFactory,
  type IServiceCollection,
  type IServiceCollectionOptions,
  type IServiceProvider,
  type IBuildOptions,
  ServiceLifetime,
  getServiceName,
  createClassDescriptor,
  createFactoryDescriptor,
  createInstanceDescriptor,
  createDecoratorDescriptor,
  validateDescriptor,
  ConfigurationError,
  ContainerSealedError,
  DuplicateRegistrationError,
} from '../../domain/di';

import { ServiceProvider } from './service-provider';

/**
 * ServiceCollection - Fluent API for service registration.
 *
 * @remarks
 * **Duplicate registrations:** by default the last registration of an
 * identifier replaces the earlier one, which lets tests and environment
 * modules swap implementations. With `allowOverrides: false` a duplicate
 * throws DuplicateRegistrationError; `decorate()` is never a duplicate.
 *
 * ServiceCollection is meant for application startup only.
 *
 * @example Complete application setup
 * ```typescript
 * const services = new ServiceCollection({ allowOverrides: false });
 *
 * // Infrastructure
 * services.addSingletonInstance(LOGGER_TOKEN, new ConsoleLogger());
 * services.addSingletonFactory(IDatabase, async () => connect(process.env.DB_URL));
 *
 * // Persistence
 * services.addScoped(IUnitOfWork, SqlUnitOfWork);
 * services.addScoped(IOrderRepository, SqlOrderRepository);
 * services.decorate(IOrderRepository, CachingOrderRepository);
 *
 * // Handlers
 * services.addTransient(PlaceOrderHandler);
 *
 * const provider = services.build();
 * ```
 */
export class ServiceCollection implements IServiceCollection {
  /**
   * Current descriptor per identifier.
   */
  private readonly descriptors = new Map<ServiceIdentifier, IServiceDescriptor>();

  private readonly allowOverrides: boolean;

  /**
   * Whether the collection has been built (sealed).
   */
  private sealed = false;

  constructor(options: IServiceCollectionOptions = {}) {
    this.allowOverrides = options.allowOverrides ?? true;
  }

  // ============================================================================
  // Generic Registration
  // ============================================================================

  register<T>(descriptor: IServiceDescriptor<T>): this {
    this.ensureNotSealed();
    validateDescriptor(descriptor);

    if (!this.allowOverrides && this.descriptors.has(descriptor.serviceIdentifier)) {
      throw new DuplicateRegistrationError(descriptor.serviceIdentifier);
    }

    this.descriptors.set(descriptor.serviceIdentifier, descriptor);
    return this;
  }

  // ============================================================================
  // Singleton Registration
  // ============================================================================

  /**
   * Register a singleton service.
   *
   * @remarks
   * Two overloads:
   * 1. Self-registration: `addSingleton(SystemClock)`
   * 2. Interface-to-impl: `addSingleton(IClock, SystemClock)`
   */
  addSingleton<T>(implementation: Constructor<T>): this;
  addSingleton<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): this;
  addSingleton<T>(
    identifierOrImpl: ServiceIdentifier<T> | Constructor<T>,
    implementation?: Constructor<T>,
  ): this {
    const [identifier, impl] = this.normalizeArgs(identifierOrImpl, implementation);

    return this.register(createClassDescriptor(identifier, ServiceLifetime.Singleton, impl));
  }

  /**
   * Register a singleton using a (possibly async) factory function.
   */
  addSingletonFactory<T>(
    identifier: ServiceIdentifier<T>,
    factory: ServiceFactory<T>,
    options?: IServiceDescriptorOptions,
  ): this {
    return this.register(
      createFactoryDescriptor(identifier, ServiceLifetime.Singleton, factory, options),
    );
  }

  /**
   * Register a pre-created instance as singleton.
   */
  addSingletonInstance<T>(identifier: ServiceIdentifier<T>, instance: T): this {
    return this.register(createInstanceDescriptor(identifier, instance));
  }

  // ============================================================================
  // Scoped Registration
  // ============================================================================

  addScoped<T>(implementation: Constructor<T>): this;
  addScoped<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): this;
  addScoped<T>(
    identifierOrImpl: ServiceIdentifier<T> | Constructor<T>,
    implementation?: Constructor<T>,
  ): this {
    const [identifier, impl] = this.normalizeArgs(identifierOrImpl, implementation);

    return this.register(createClassDescriptor(identifier, ServiceLifetime.Scoped, impl));
  }

  addScopedFactory<T>(
    identifier: ServiceIdentifier<T>,
    factory: ServiceFactory<T>,
    options?: IServiceDescriptorOptions,
  ): this {
    return this.register(
      createFactoryDescriptor(identifier, ServiceLifetime.Scoped, factory, options),
    );
  }

  // ============================================================================
  // Transient Registration
  // ============================================================================

  addTransient<T>(implementation: Constructor<T>): this;
  addTransient<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): this;
  addTransient<T>(
    identifierOrImpl: ServiceIdentifier<T> | Constructor<T>,
    implementation?: Constructor<T>,
  ): this {
    const [identifier, impl] = this.normalizeArgs(identifierOrImpl, implementation);

    return this.register(createClassDescriptor(identifier, ServiceLifetime.Transient, impl));
  }

  addTransientFactory<T>(
    identifier: ServiceIdentifier<T>,
    factory: ServiceFactory<T>,
    options?: IServiceDescriptorOptions,
  ): this {
    return this.register(
      createFactoryDescriptor(identifier, ServiceLifetime.Transient, factory, options),
    );
  }

  // ============================================================================
  // Decoration
  // ============================================================================

  /**
   * Wrap the current registration of `identifier`.
   *
   * @example
   * ```typescript
   * services
   *   .addSingleton(IMailer, SmtpMailer)
   *   .decorate(IMailer, LoggingMailer)
   *   .decorate(IMailer, (inner) => new RetryingMailer(inner, 3));
   *
   * // resolve(IMailer): RetryingMailer -> LoggingMailer -> SmtpMailer
   * ```
   */
  decorate<T>(
    identifier: ServiceIdentifier<T>,
    decorator: DecoratorConstructor<T> | DecoratorFactory<T>,
    options?: IServiceDescriptorOptions,
  ): this {
    this.ensureNotSealed();

    const inner = this.getDescriptor(identifier);
    if (!inner) {
      throw new ConfigurationError(
        `Cannot decorate '${getServiceName(identifier)}': it is not registered. ` +
          `Register the service before decorating it.`,
      );
    }

    const descriptor = createDecoratorDescriptor(inner, decorator, options);
    validateDescriptor(descriptor);
    this.descriptors.set(identifier, descriptor);

    return this;
  }

  // ============================================================================
  // Utility Methods
  // ============================================================================

  has(identifier: ServiceIdentifier): boolean {
    return this.descriptors.has(identifier);
  }

  getDescriptors(): readonly IServiceDescriptor[] {
    return Array.from(this.descriptors.values());
  }

  getDescriptor<T>(identifier: ServiceIdentifier<T>): IServiceDescriptor<T> | undefined {
    return this.descriptors.get(identifier) as IServiceDescriptor<T> | undefined;
  }

  /**
   * Remove a service registration, decorations included.
   */
  remove(identifier: ServiceIdentifier): boolean {
    this.ensureNotSealed();
    return this.descriptors.delete(identifier);
  }

  /**
   * Build the service provider and seal the collection.
   */
  build(options?: IBuildOptions): IServiceProvider {
    this.sealed = true;

    return new ServiceProvider(new Map(this.descriptors), options);
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  /**
   * @throws ContainerSealedError if sealed
   */
  private ensureNotSealed(): void {
    if (this.sealed) {
      throw new ContainerSealedError();
    }
  }

  /**
   * Normalize registration arguments.
   *
   * Handles two overload patterns:
   * 1. `add*(Implementation)` - self-registration
   * 2. `add*(Identifier, Implementation)` - interface-to-impl
   */
  private normalizeArgs<T>(
    identifierOrImpl: ServiceIdentifier<T> | Constructor<T>,
    implementation?: Constructor<T>,
  ): [ServiceIdentifier<T>, Constructor<T>] {
    if (implementation !== undefined) {
      return [identifierOrImpl, implementation];
    }

    if (typeof identifierOrImpl === 'function') {
      // Only the single-argument overload reaches here, which takes a Constructor<T>.
      const impl = identifierOrImpl as Constructor<T>;
      return [impl, impl];
    }

    throw new TypeError(
      `Invalid registration: expected a constructor or [identifier, implementation], ` +
        `got ${typeof identifierOrImpl}`,
    );
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Create a new ServiceCollection.
 *
 * @example
 * ```typescript
 * const services = createServiceCollection({ allowOverrides: false });
 * services.addSingleton(SystemClock);
 * const provider = services.build();
 * ```
 */
export function createServiceCollection(options?: IServiceCollectionOptions): IServiceCollection {
  return new ServiceCollection(options);
}
