/**
 * @fileoverview DI Interfaces - Core Dependency Injection Contracts
 *
 * @packageDocumentation
 * @module @tessera/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * These contracts define WHAT the container does: registration
 * (IServiceCollection), root resolution (IServiceProvider) and unit-of-work
 * resolution (IServiceScope).
 *
 * ## Explicit Scopes
 *
 * A scope is a value passed to whoever needs it. Nothing looks a scope up
 * from ambient state:
 *
 * ```
 * provider ──createScope()──► scope ──resolve()──► scoped / transient instances
 *     │                         │
 *     └─ singletons             └─ dispose(): LIFO release of what it owns
 * ```
 *
 * @version 1.0.0
 */

import { type ILogger } from '../logging';

import {
  type IServiceDescriptor,
  type IServiceDescriptorOptions,
  type IServiceResolver,
  type ServiceFactory,
  type DecoratorConstructor,
  type DecoratorFactory,
} from './service-descriptor';
import {
  type ServiceIdentifier,
  type ServiceToken,
  type Constructor,
  createToken,
} from './service-identifier';

// ============================================================================
// IDisposable - Resource Cleanup Interface
// ============================================================================

/**
 * Interface for objects that need cleanup when their owner is disposed.
 *
 * @remarks
 * - Scoped and transient instances: released by `scope.dispose()`
 * - Singletons (and transients resolved at root): released by `provider.dispose()`
 *
 * Each tracked instance is released exactly once, newest first.
 *
 * @example
 * ```typescript
 * class DatabaseSession implements IDisposable {
 *   async dispose(): Promise<void> {
 *     await this.connection.release();
 *   }
 * }
 * ```
 */
export interface IDisposable {
  dispose(): void | Promise<void>;
}

/**
 * Check if an object implements IDisposable.
 */
export function isDisposable(obj: unknown): obj is IDisposable {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'dispose' in obj &&
    typeof obj.dispose === 'function'
  );
}

// ============================================================================
// IServiceCollection - Service Registration (Registry)
// ============================================================================

/**
 * IServiceCollection - Fluent API for registering services.
 *
 * @remarks
 * Used at startup only. `build()` seals the collection.
 *
 * @example
 * ```typescript
 * const services = new ServiceCollection();
 *
 * services
 *   .addSingletonInstance(LOGGER_TOKEN, new ConsoleLogger())
 *   .addSingleton(IClock, SystemClock)
 *   .addScoped(IUnitOfWork, SqlUnitOfWork)
 *   .addScoped(IOrderRepository, SqlOrderRepository)
 *   .addTransient(PlaceOrderHandler)
 *   .decorate(IOrderRepository, CachingOrderRepository);
 *
 * const provider = services.build();
 * ```
 */
export interface IServiceCollection {
  addSingleton<T>(implementation: Constructor<T>): this;
  addSingleton<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): this;
  addSingletonFactory<T>(
    identifier: ServiceIdentifier<T>,
    factory: ServiceFactory<T>,
    options?: IServiceDescriptorOptions,
  ): this;
  addSingletonInstance<T>(identifier: ServiceIdentifier<T>, instance: T): this;

  addScoped<T>(implementation: Constructor<T>): this;
  addScoped<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): this;
  addScopedFactory<T>(
    identifier: ServiceIdentifier<T>,
    factory: ServiceFactory<T>,
    options?: IServiceDescriptorOptions,
  ): this;

  addTransient<T>(implementation: Constructor<T>): this;
  addTransient<T>(identifier: ServiceIdentifier<T>, implementation: Constructor<T>): this;
  addTransientFactory<T>(
    identifier: ServiceIdentifier<T>,
    factory: ServiceFactory<T>,
    options?: IServiceDescriptorOptions,
  ): this;

  /**
   * Register a prepared descriptor.
   */
  register<T>(descriptor: IServiceDescriptor<T>): this;

  /**
   * Wrap the current registration of `identifier`.
   *
   * @remarks
   * Decorations compose in call order: the last decorator is outermost.
   *
   * @throws ConfigurationError if `identifier` is not registered yet
   */
  decorate<T>(
    identifier: ServiceIdentifier<T>,
    decorator: DecoratorConstructor<T> | DecoratorFactory<T>,
    options?: IServiceDescriptorOptions,
  ): this;

  has(identifier: ServiceIdentifier): boolean;

  /**
   * Look up the current descriptor of a capability.
   */
  getDescriptor<T>(identifier: ServiceIdentifier<T>): IServiceDescriptor<T> | undefined;

  getDescriptors(): readonly IServiceDescriptor[];

  /**
   * Remove a registration, decorations included.
   *
   * @returns True if something was removed
   */
  remove(identifier: ServiceIdentifier): boolean;

  /**
   * Build the service provider and seal the collection.
   *
   * @throws CircularDependencyError / ServiceNotRegisteredError /
   * ScopeMismatchError when the dependency graph is invalid
   */
  build(options?: IBuildOptions): IServiceProvider;
}

// ============================================================================
// IServiceProvider - Root Resolution (Container)
// ============================================================================

/**
 * IServiceProvider - Root of the object graph.
 *
 * @remarks
 * Resolves singletons and root-level transients. Scoped services need a
 * scope from {@link IServiceProvider.createScope}.
 *
 * **Resolution Algorithm:**
 *
 * ```
 * resolve(identifier)
 *   1. Look up descriptor            -> ServiceNotRegisteredError
 *   2. Verify the declared graph     -> CircularDependencyError (nothing built)
 *   3. Branch on lifetime:
 *      - Singleton: provider cache (in-flight creation shared)
 *      - Scoped:    scope cache, or NoActiveScopeError at root
 *      - Transient: always create, owner tracks disposal
 *   4. Resolve declared dependencies depth-first, then construct
 * ```
 */
export interface IServiceProvider extends IServiceResolver {
  isRegistered(identifier: ServiceIdentifier): boolean;

  /**
   * Create a new scope for one unit of work.
   */
  createScope(): IServiceScope;

  /**
   * Release every disposable singleton and root-owned transient.
   *
   * @throws DisposalError after all instances were released, if any failed
   */
  dispose(): Promise<void>;
}

// ============================================================================
// IServiceScope - Unit-of-Work Resolution
// ============================================================================

/**
 * IServiceScope - Bounded resolution context.
 *
 * @remarks
 * Owns the scoped and transient instances it produced. Must not be shared
 * between concurrent units of work; within one unit, concurrent first
 * resolutions of the same scoped service still construct it once.
 *
 * @example
 * ```typescript
 * const scope = provider.createScope();
 * try {
 *   const uow = await scope.resolve(IUnitOfWork);
 *   await uow.commit();
 * } finally {
 *   await scope.dispose();
 * }
 * ```
 */
export interface IServiceScope extends IServiceResolver, IDisposable {
  /**
   * The provider this scope was created from.
   */
  readonly provider: IServiceProvider;

  isDisposed(): boolean;

  /**
   * Release owned instances exactly once, newest first.
   *
   * @throws DisposalError after all instances were released, if any failed
   */
  dispose(): Promise<void>;
}

/**
 * Factory for creating service scopes.
 *
 * @example
 * ```typescript
 * class OutboxRelay {
 *   static inject = [SERVICE_SCOPE_FACTORY_TOKEN] as const;
 *
 *   constructor(private readonly scopes: IServiceScopeFactory) {}
 *
 *   async flush(): Promise<void> {
 *     const scope = this.scopes.createScope();
 *     try {
 *       const outbox = await scope.resolve(IOutbox);
 *       await outbox.publishPending();
 *     } finally {
 *       await scope.dispose();
 *     }
 *   }
 * }
 * ```
 */
export interface IServiceScopeFactory {
  createScope(): IServiceScope;
}

// ============================================================================
// Built-in Tokens
// ============================================================================

/**
 * Resolves to the root service provider.
 */
export const SERVICE_PROVIDER_TOKEN: ServiceToken<IServiceProvider> =
  createToken<IServiceProvider>('IServiceProvider');

/**
 * Resolves to the scope the resolution happens in.
 */
export const SERVICE_SCOPE_TOKEN: ServiceToken<IServiceScope> =
  createToken<IServiceScope>('IServiceScope');

/**
 * Resolves to a scope factory bound to the root provider.
 */
export const SERVICE_SCOPE_FACTORY_TOKEN: ServiceToken<IServiceScopeFactory> =
  createToken<IServiceScopeFactory>('IServiceScopeFactory');

// ============================================================================
// Options
// ============================================================================

/**
 * Options for a service collection.
 */
export interface IServiceCollectionOptions {
  /**
   * Let a second registration of the same capability replace the first.
   *
   * @remarks
   * Default: true. When false, a duplicate raises
   * `DuplicateRegistrationError`; use `decorate()` to wrap instead.
   */
  allowOverrides?: boolean;
}

/**
 * Options for building the service provider.
 */
export interface IBuildOptions {
  /**
   * Reject singletons that (directly or through transients) depend on
   * scoped services.
   *
   * Default: true
   */
  validateScopes?: boolean;

  /**
   * Verify the whole declared dependency graph at build time (cycles and
   * unregistered dependencies).
   *
   * @remarks
   * When false, the same checks run lazily per capability on first
   * resolution, still before anything is constructed.
   *
   * Default: true
   */
  validateOnBuild?: boolean;

  /**
   * Logger used for disposal failures.
   *
   * Default: ConsoleLogger at 'info'
   */
  logger?: ILogger;
}
