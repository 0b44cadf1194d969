/**
 * @fileoverview DependencyResolver - Core Dependency Resolution Engine
 *
 * @packageDocumentation
 * @module @tessera/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Turns a service identifier into an instance, honouring lifetimes, the
 * decoration chain and the owner (root provider or scope) that asked.
 *
 * ## Resolution Algorithm
 *
 * ```
 * resolve(identifier, owner, stack)
 *   1. identifier already on the stack     -> CircularDependencyError
 *   2. Built-in token?                     -> provider / scope / scope factory
 *   3. Find descriptor                     -> ServiceNotRegisteredError
 *   4. Verify declared graph (memoised)    -> CircularDependencyError /
 *                                             ServiceNotRegisteredError,
 *                                             before anything is constructed
 *   5. Based on lifetime:
 *      - Singleton: root cache, resolved against the root owner
 *      - Scoped:    owner's cache, NoActiveScopeError without a scope
 *      - Transient: always create, owner adopts it for disposal
 *   6. Produce: inner chain first, then declared dependencies in order,
 *      then the constructor / factory / decorator
 * ```
 *
 * The stack is passed down explicitly; concurrent resolutions never share
 * one. Cycles that only appear between concurrent resolutions are caught by
 * the owner's InstanceCache before a caller waits on another's creation.
 *
 * @version 1.0.0
 */

import {
  type ServiceIdentifier,
  type IServiceDescriptor,
  type IServiceResolver,
  type IServiceProvider,
  type IServiceScope,
  type IServiceScopeFactory,
  ServiceLifetime,
  getServiceName,
  isDisposable,
  canDependOn,
  decorationChain,
  DIError,
  ServiceNotRegisteredError,
  CircularDependencyError,
  ScopeMismatchError,
  NoActiveScopeError,
  ServiceCreationError,
  SERVICE_PROVIDER_TOKEN,
  SERVICE_SCOPE_TOKEN,
  SERVICE_SCOPE_FACTORY_TOKEN,
} from '../../domain/di';
import { type ILogger } from '../../domain/logging';

import { type InstanceCache } from './instance-cache';

/**
 * Who a resolution happens for.
 *
 * @remarks
 * `cache` holds the owner's shared instances and disposal list; `scope` is
 * undefined at root.
 *
 * @internal
 */
export interface IResolutionOwner {
  readonly cache: InstanceCache;
  readonly scope: IServiceScope | undefined;
}

/**
 * Lifetimes of the built-in tokens, used by graph and scope validation.
 *
 * @internal
 */
const BUILT_IN_LIFETIMES: ReadonlyMap<ServiceIdentifier, ServiceLifetime> = new Map<
  ServiceIdentifier,
  ServiceLifetime
>([
  [SERVICE_PROVIDER_TOKEN, ServiceLifetime.Singleton],
  [SERVICE_SCOPE_FACTORY_TOKEN, ServiceLifetime.Singleton],
  [SERVICE_SCOPE_TOKEN, ServiceLifetime.Scoped],
]);

/**
 * @internal
 */
function toNames(stack: readonly ServiceIdentifier[]): string[] {
  return stack.map(getServiceName);
}

/**
 * DependencyResolver - resolution engine shared by the provider and its
 * scopes.
 *
 * @remarks
 * Holds no per-request state: the owner and the resolution stack come in
 * with every call.
 *
 * @internal
 */
export class DependencyResolver {
  /**
   * Identifiers whose declared subgraph is known to be acyclic and fully
   * registered.
   */
  private readonly verified = new Set<ServiceIdentifier>();

  /**
   * Disposable transients already reported as resolved at root.
   */
  private readonly rootTransientsReported = new Set<ServiceIdentifier>();

  private readonly rootOwner: IResolutionOwner;

  private readonly scopeFactory: IServiceScopeFactory;

  constructor(
    private readonly descriptors: ReadonlyMap<ServiceIdentifier, IServiceDescriptor>,
    private readonly provider: IServiceProvider,
    rootCache: InstanceCache,
    private readonly logger: ILogger,
  ) {
    this.rootOwner = { cache: rootCache, scope: undefined };
    this.scopeFactory = { createScope: () => provider.createScope() };
  }

  // ============================================================================
  // Resolution
  // ============================================================================

  /**
   * Resolve `identifier` for `owner`.
   *
   * @param stack - Identifiers currently being resolved by this call chain
   */
  async resolve<T>(
    identifier: ServiceIdentifier<T>,
    owner: IResolutionOwner,
    stack: readonly ServiceIdentifier[] = [],
  ): Promise<T> {
    // The descriptor map is heterogeneous; the identifier carries T.
    return (await this.resolveInternal(identifier, owner, stack)) as T;
  }

  /**
   * Check if an identifier can be resolved.
   */
  isRegistered(identifier: ServiceIdentifier): boolean {
    return BUILT_IN_LIFETIMES.has(identifier) || this.descriptors.has(identifier);
  }

  private async resolveInternal(
    identifier: ServiceIdentifier,
    owner: IResolutionOwner,
    stack: readonly ServiceIdentifier[],
  ): Promise<unknown> {
    owner.cache.ensureNotDisposed();

    if (stack.includes(identifier)) {
      throw new CircularDependencyError(identifier, toNames(stack));
    }

    if (BUILT_IN_LIFETIMES.has(identifier)) {
      return this.resolveBuiltIn(identifier, owner, stack);
    }

    const descriptor = this.descriptors.get(identifier);
    if (!descriptor) {
      throw new ServiceNotRegisteredError(identifier, toNames(stack));
    }

    this.verifyGraph(identifier, stack);

    switch (descriptor.lifetime) {
      case ServiceLifetime.Singleton: {
        const root = this.rootOwner;
        return root.cache.getOrCreate(identifier, stack, () =>
          this.produce(descriptor, root, stack),
        );
      }

      case ServiceLifetime.Scoped:
        if (owner.scope === undefined) {
          throw new NoActiveScopeError(identifier, toNames(stack));
        }
        return owner.cache.getOrCreate(identifier, stack, () =>
          this.produce(descriptor, owner, stack),
        );

      case ServiceLifetime.Transient:
        return this.produce(descriptor, owner, stack);

      default:
        throw new Error(`Unknown lifetime: ${String(descriptor.lifetime)}`);
    }
  }

  private resolveBuiltIn(
    identifier: ServiceIdentifier,
    owner: IResolutionOwner,
    stack: readonly ServiceIdentifier[],
  ): unknown {
    if (identifier === SERVICE_PROVIDER_TOKEN) {
      return this.provider;
    }

    if (identifier === SERVICE_SCOPE_FACTORY_TOKEN) {
      return this.scopeFactory;
    }

    if (owner.scope === undefined) {
      throw new NoActiveScopeError(identifier, toNames(stack));
    }
    return owner.scope;
  }

  /**
   * Create one instance of `descriptor`, including every decorator link.
   *
   * @remarks
   * Each link's instance is adopted by `owner` as soon as it exists, so the
   * inner instance is released after the decorator wrapping it.
   */
  private async produce(
    descriptor: IServiceDescriptor,
    owner: IResolutionOwner,
    stack: readonly ServiceIdentifier[],
  ): Promise<unknown> {
    const inner =
      descriptor.decorates !== undefined
        ? await this.produce(descriptor.decorates, owner, stack)
        : undefined;

    const path = [...stack, descriptor.serviceIdentifier];
    const dependencies: unknown[] = [];
    for (const dependency of descriptor.dependencies) {
      dependencies.push(await this.resolveInternal(dependency, owner, path));
    }

    let instance: unknown;
    try {
      instance = await this.invokeProducer(
        descriptor,
        inner,
        dependencies,
        this.createResolver(owner, path),
      );
    } catch (error) {
      if (error instanceof DIError) {
        throw error;
      }
      throw new ServiceCreationError(
        descriptor.serviceIdentifier,
        error instanceof Error ? error : new Error(String(error)),
        toNames(stack),
      );
    }

    await owner.cache.adopt(instance);

    if (
      stack.length === 0 &&
      descriptor.lifetime === ServiceLifetime.Transient &&
      owner.cache === this.rootOwner.cache &&
      isDisposable(instance)
    ) {
      this.reportRootTransient(descriptor.serviceIdentifier);
    }

    return instance;
  }

  /**
   * Warn once per identifier: the provider keeps every disposable transient
   * it resolved until `provider.dispose()`.
   */
  private reportRootTransient(identifier: ServiceIdentifier): void {
    if (this.rootTransientsReported.has(identifier)) {
      return;
    }
    this.rootTransientsReported.add(identifier);

    this.logger.warn(
      `Disposable transient '${getServiceName(identifier)}' was resolved from the root ` +
        `provider and is kept until provider.dispose(). Resolve it from a scope instead.`,
    );
  }

  private async invokeProducer(
    descriptor: IServiceDescriptor,
    inner: unknown,
    dependencies: unknown[],
    resolver: IServiceResolver,
  ): Promise<unknown> {
    const name = getServiceName(descriptor.serviceIdentifier);

    if (descriptor.implementationType) {
      const Implementation = descriptor.implementationType;
      return descriptor.decorates !== undefined
        ? new Implementation(inner, ...dependencies)
        : new Implementation(...dependencies);
    }

    if (descriptor.decoratorFactory) {
      return descriptor.decoratorFactory(inner, resolver);
    }

    if (descriptor.factory) {
      return descriptor.factory(resolver);
    }

    throw new Error(`No factory or implementation type for '${name}'`);
  }

  /**
   * Create the resolver handed to factories.
   *
   * @remarks
   * Resolutions made through it continue the caller's stack, so a cycle that
   * goes through a factory is still detected.
   */
  private createResolver(
    owner: IResolutionOwner,
    stack: readonly ServiceIdentifier[],
  ): IServiceResolver {
    return {
      resolve: <T>(identifier: ServiceIdentifier<T>): Promise<T> =>
        this.resolve(identifier, owner, stack),
      tryResolve: async <T>(identifier: ServiceIdentifier<T>): Promise<T | undefined> =>
        this.isRegistered(identifier) ? this.resolve(identifier, owner, stack) : undefined,
    };
  }

  // ============================================================================
  // Validation
  // ============================================================================

  /**
   * Verify the declared dependency graph of every registration.
   *
   * @throws CircularDependencyError or ServiceNotRegisteredError
   */
  verifyAll(): void {
    for (const identifier of this.descriptors.keys()) {
      this.verifyGraph(identifier, []);
    }
  }

  /**
   * Walk the declared dependencies of `root` (decorator links included)
   * without constructing anything.
   *
   * @param prefix - Resolution stack leading to `root`, used in error paths
   */
  private verifyGraph(root: ServiceIdentifier, prefix: readonly ServiceIdentifier[]): void {
    if (this.verified.has(root)) {
      return;
    }

    const visit = (identifier: ServiceIdentifier, path: readonly ServiceIdentifier[]): void => {
      if (this.verified.has(identifier) || BUILT_IN_LIFETIMES.has(identifier)) {
        return;
      }

      if (path.includes(identifier)) {
        throw new CircularDependencyError(identifier, toNames(path));
      }

      const descriptor = this.descriptors.get(identifier);
      if (!descriptor) {
        throw new ServiceNotRegisteredError(identifier, toNames(path));
      }

      const next = [...path, identifier];
      for (const link of decorationChain(descriptor)) {
        for (const dependency of link.dependencies) {
          visit(dependency, next);
        }
      }

      this.verified.add(identifier);
    };

    visit(root, prefix);
  }

  /**
   * Reject singletons that reach a scoped service through their declared
   * dependencies (directly or via transients).
   *
   * @throws ScopeMismatchError
   */
  validateScopes(): void {
    for (const descriptor of this.descriptors.values()) {
      if (descriptor.lifetime === ServiceLifetime.Singleton) {
        this.assertLifetimes(descriptor, descriptor, [descriptor.serviceIdentifier], new Set());
      }
    }
  }

  private assertLifetimes(
    dependent: IServiceDescriptor,
    current: IServiceDescriptor,
    path: readonly ServiceIdentifier[],
    visited: Set<ServiceIdentifier>,
  ): void {
    for (const link of decorationChain(current)) {
      for (const dependency of link.dependencies) {
        if (visited.has(dependency)) {
          continue;
        }
        visited.add(dependency);

        const descriptor = this.descriptors.get(dependency);
        const lifetime = BUILT_IN_LIFETIMES.get(dependency) ?? descriptor?.lifetime;
        if (lifetime === undefined) {
          continue;
        }

        if (!canDependOn(dependent.lifetime, lifetime)) {
          throw new ScopeMismatchError(
            dependent.serviceIdentifier,
            dependency,
            dependent.lifetime,
            lifetime,
            toNames(path),
          );
        }

        if (lifetime === ServiceLifetime.Transient && descriptor) {
          this.assertLifetimes(dependent, descriptor, [...path, dependency], visited);
        }
      }
    }
  }
}
