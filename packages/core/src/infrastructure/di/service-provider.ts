/**
 * @fileoverview ServiceProvider - Root Container
 *
 * @packageDocumentation
 * @module @tessera/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * The provider owns the sealed registrations, the singleton cache and every
 * transient resolved at root. Scopes are created from it and share its
 * resolver.
 *
 * ```
 * ServiceProvider ──────────────────────────────┐
 * │  descriptors (sealed)                        │
 * │  root cache: singletons, root transients     │
 * │                                              │
 * │  ScopedContainer #1     ScopedContainer #2   │
 * │  └─ scoped/transient    └─ scoped/transient  │
 * └──────────────────────────────────────────────┘
 * ```
 *
 * @version 1.0.0
 */

import {
  type ServiceIdentifier,
  type IServiceDescriptor,
  type IServiceProvider,
  type IServiceScope,
  type IBuildOptions,
  DisposalError,
} from '../../domain/di';
import { ConsoleLogger } from '../logging';

import { DependencyResolver, type IResolutionOwner } from './dependency-resolver';
import { InstanceCache } from './instance-cache';
import { ScopedContainer } from './scoped-container';

/**
 * ServiceProvider - IServiceProvider implementation.
 *
 * @remarks
 * **Lifecycle Management:**
 *
 * - Singleton: cached in the root cache, one in-flight creation at a time
 * - Scoped: cached in the scope that resolved it; NoActiveScopeError here
 * - Transient: never cached; disposables are released with the provider
 *
 * @example
 * ```typescript
 * const provider = services.build();
 *
 * const clock = await provider.resolve(IClock);
 *
 * await withScope(provider, async (scope) => {
 *   const uow = await scope.resolve(IUnitOfWork);
 *   await uow.commit();
 * });
 *
 * await provider.dispose();
 * ```
 */
export class ServiceProvider implements IServiceProvider {
  private readonly options: Required<IBuildOptions>;

  private readonly cache = new InstanceCache('provider');

  private readonly resolver: DependencyResolver;

  private readonly owner: IResolutionOwner;

  /**
   * @throws CircularDependencyError / ServiceNotRegisteredError when
   * `validateOnBuild` is on, ScopeMismatchError when `validateScopes` is on
   */
  constructor(
    descriptors: ReadonlyMap<ServiceIdentifier, IServiceDescriptor>,
    options?: IBuildOptions,
  ) {
    this.options = {
      validateScopes: options?.validateScopes ?? true,
      validateOnBuild: options?.validateOnBuild ?? true,
      logger: options?.logger ?? new ConsoleLogger(),
    };

    this.resolver = new DependencyResolver(descriptors, this, this.cache, this.options.logger);
    this.owner = { cache: this.cache, scope: undefined };

    if (this.options.validateOnBuild) {
      this.resolver.verifyAll();
    }

    if (this.options.validateScopes) {
      this.resolver.validateScopes();
    }
  }

  // ============================================================================
  // IServiceProvider Implementation
  // ============================================================================

  /**
   * Resolve a service at root.
   *
   * @remarks
   * Scoped services fail with NoActiveScopeError; use a scope.
   *
   * A disposable transient resolved here is owned by the provider and only
   * released by `dispose()`, so repeated root resolutions keep every
   * instance alive. The first such resolution of each identifier is logged
   * at 'warn'.
   */
  resolve<T>(identifier: ServiceIdentifier<T>): Promise<T> {
    return this.resolver.resolve(identifier, this.owner);
  }

  /**
   * Resolve a service, or `undefined` when it is not registered.
   *
   * @remarks
   * Only a missing registration of `identifier` itself yields `undefined`;
   * a missing dependency further down still throws.
   */
  async tryResolve<T>(identifier: ServiceIdentifier<T>): Promise<T | undefined> {
    if (!this.isRegistered(identifier)) {
      return undefined;
    }
    return this.resolve(identifier);
  }

  isRegistered(identifier: ServiceIdentifier): boolean {
    return this.resolver.isRegistered(identifier);
  }

  createScope(): IServiceScope {
    this.cache.ensureNotDisposed();
    return new ScopedContainer(this, this.resolver, this.options.logger);
  }

  /**
   * Dispose the provider and every singleton it created.
   *
   * @remarks
   * Scopes are owned by their callers and are not disposed here.
   */
  async dispose(): Promise<void> {
    const errors = await this.cache.disposeAll();

    if (errors.length > 0) {
      const error = new DisposalError(errors);
      this.options.logger.error(`Error disposing service provider: ${error.message}`);
      throw error;
    }
  }

  isDisposed(): boolean {
    return this.cache.isDisposed();
  }
}
