/**
 * @fileoverview ScopedContainer - Unit-of-Work Service Management
 *
 * @packageDocumentation
 * @module @tessera/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * A scope is created explicitly by its caller and passed to whatever needs
 * it:
 *
 * ```
 * withScope(provider, async (scope) => { ... }) ───────────┐
 * │                                                          │
 * │  ScopedContainer                                         │
 * │    cache:        IUnitOfWork -> instance-1               │
 * │                  OrderService -> instance-1              │
 * │    disposables:  [IUnitOfWork, AuditWriter (transient)]  │
 * │                                                          │
 * └──── dispose(): AuditWriter, then IUnitOfWork ────────────┘
 * ```
 *
 * **Lifecycle:**
 *
 * 1. `provider.createScope()` creates the container
 * 2. Scoped services are cached; disposable transients are adopted
 * 3. `scope.dispose()` releases everything newest first, exactly once
 *
 * @version 1.0.0
 */

import {
  type ServiceIdentifier,
  type IServiceProvider,
  type IServiceScope,
  DisposalError,
} from '../../domain/di';
import { type ILogger } from '../../domain/logging';

import { type DependencyResolver, type IResolutionOwner } from './dependency-resolver';
import { InstanceCache } from './instance-cache';

/**
 * ScopedContainer - IServiceScope implementation.
 *
 * @remarks
 * **Responsibilities:**
 *
 * 1. Cache scoped instances for this scope
 * 2. Delegate singletons to the root provider's cache
 * 3. Adopt disposable transients it creates
 * 4. Release all of them when the scope ends
 *
 * One unit of work uses one scope; concurrent first resolutions inside it
 * still construct each scoped service once.
 *
 * @example With Unit of Work
 * ```typescript
 * const scope = provider.createScope();
 * try {
 *   const orders = await scope.resolve(OrderService);
 *   await orders.place(command);
 *   const uow = await scope.resolve(IUnitOfWork);
 *   await uow.commit();
 * } finally {
 *   await scope.dispose(); // rolls back an uncommitted unit of work
 * }
 * ```
 */
export class ScopedContainer implements IServiceScope {
  private readonly cache = new InstanceCache('scope');

  private readonly owner: IResolutionOwner;

  constructor(
    readonly provider: IServiceProvider,
    private readonly resolver: DependencyResolver,
    private readonly logger: ILogger,
  ) {
    this.owner = { cache: this.cache, scope: this };
  }

  // ============================================================================
  // IServiceScope Implementation
  // ============================================================================

  resolve<T>(identifier: ServiceIdentifier<T>): Promise<T> {
    return this.resolver.resolve(identifier, this.owner);
  }

  async tryResolve<T>(identifier: ServiceIdentifier<T>): Promise<T | undefined> {
    if (!this.resolver.isRegistered(identifier)) {
      return undefined;
    }
    return this.resolve(identifier);
  }

  isDisposed(): boolean {
    return this.cache.isDisposed();
  }

  /**
   * Release every owned instance, newest first.
   *
   * @remarks
   * Idempotent. Release failures are collected, logged, and thrown as one
   * DisposalError once all instances have been released.
   */
  async dispose(): Promise<void> {
    const errors = await this.cache.disposeAll();

    if (errors.length > 0) {
      const error = new DisposalError(errors);
      this.logger.error(`Error disposing scope: ${error.message}`);
      throw error;
    }
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Run a function within a new scope.
 *
 * @remarks
 * The scope is disposed on every exit path. When the callback fails and the
 * disposal fails too, the callback's error is rethrown; the disposal error
 * has already been logged by the scope.
 *
 * @example
 * ```typescript
 * const receipt = await withScope(provider, async (scope) => {
 *   return mediator.send(new PlaceOrder('sku-1', 2), scope);
 * });
 * ```
 */
export async function withScope<T>(
  provider: IServiceProvider,
  callback: (scope: IServiceScope) => T | Promise<T>,
): Promise<T> {
  const scope = provider.createScope();

  let result: T;
  try {
    result = await callback(scope);
  } catch (error) {
    await scope.dispose().catch((disposalError: unknown) => {
      if (!(disposalError instanceof DisposalError)) {
        throw disposalError;
      }
    });
    throw error;
  }

  await scope.dispose();
  return result;
}
