/**
 * @fileoverview ServiceLifetime - Instance Sharing Policy
 *
 * @packageDocumentation
 * @module @tessera/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * ```
 * ┌────────────┬──────────────────────────┬──────────────────────────┐
 * │ Lifetime   │ Shared by                │ Released by              │
 * ├────────────┼──────────────────────────┼──────────────────────────┤
 * │ Singleton  │ every resolution         │ provider.dispose()       │
 * │ Scoped     │ resolutions in one scope │ scope.dispose()          │
 * │ Transient  │ nobody (new each time)   │ the resolving scope      │
 * └────────────┴──────────────────────────┴──────────────────────────┘
 * ```
 *
 * @version 1.0.0
 */

/**
 * Lifecycle scope of a registered service.
 */
export enum ServiceLifetime {
  /**
   * Singleton: one instance per container.
   *
   * @remarks
   * - Created lazily on first resolution
   * - Concurrent first resolutions share one in-flight creation
   * - Lives until `provider.dispose()`
   *
   * Never store request-specific state in a singleton. A singleton and its
   * whole dependency subgraph are resolved at the root, so a scoped service
   * can never be captured by one.
   */
  Singleton = 'singleton',

  /**
   * Scoped: one instance per scope (typically one unit of work).
   *
   * @remarks
   * Resolving a scoped service without a scope fails with
   * `NoActiveScopeError`; it is never silently turned into a transient.
   *
   * @example
   * ```typescript
   * class SqlUnitOfWork implements IDisposable {
   *   async dispose(): Promise<void> {
   *     if (!this.committed) await this.tx.rollback();
   *   }
   * }
   *
   * services.addScoped(IUnitOfWork, SqlUnitOfWork);
   * ```
   */
  Scoped = 'scoped',

  /**
   * Transient: new instance on every resolution.
   *
   * @remarks
   * Disposable transients are tracked by the scope that resolved them (or the
   * provider, at root) so they are released with it.
   */
  Transient = 'transient',
}

/**
 * Check if a lifetime caches instances.
 *
 * @internal
 */
export function isCacheable(lifetime: ServiceLifetime): boolean {
  return lifetime === ServiceLifetime.Singleton || lifetime === ServiceLifetime.Scoped;
}

/**
 * Check if a service with `from` lifetime can depend on a service with `to` lifetime.
 *
 * @remarks
 * Only Singleton → Scoped is rejected: the singleton would keep the first
 * scope's instance alive after that scope ended. A transient created for a
 * singleton is owned by the provider and lives as long as the singleton.
 *
 * @example
 * ```typescript
 * canDependOn(ServiceLifetime.Singleton, ServiceLifetime.Scoped); // false
 * canDependOn(ServiceLifetime.Singleton, ServiceLifetime.Transient); // true
 * canDependOn(ServiceLifetime.Scoped, ServiceLifetime.Transient); // true
 * canDependOn(ServiceLifetime.Transient, ServiceLifetime.Scoped); // true
 * ```
 */
export function canDependOn(from: ServiceLifetime, to: ServiceLifetime): boolean {
  return !(from === ServiceLifetime.Singleton && to === ServiceLifetime.Scoped);
}

/**
 * Get a human-readable name for a lifetime.
 */
export function getLifetimeName(lifetime: ServiceLifetime): string {
  switch (lifetime) {
    case ServiceLifetime.Singleton:
      return 'Singleton';
    case ServiceLifetime.Scoped:
      return 'Scoped';
    case ServiceLifetime.Transient:
      return 'Transient';
    default:
      return 'Unknown';
  }
}
