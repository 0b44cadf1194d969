/**
 * @fileoverview Infrastructure DI Module Exports
 *
 * @packageDocumentation
 * @module @tessera/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Concrete container implementations, used in the composition root.
 *
 * ## Usage
 *
 * ```typescript
 * import { createServiceCollection, withScope } from '@tessera/core';
 *
 * const services = createServiceCollection();
 * services
 *   .addSingleton(SystemClock)
 *   .addScoped(IUnitOfWork, SqlUnitOfWork)
 *   .addTransient(PlaceOrderHandler);
 *
 * const provider = services.build();
 *
 * await withScope(provider, async (scope) => {
 *   const handler = await scope.resolve(PlaceOrderHandler);
 *   await handler.handle(command);
 * });
 * ```
 */

// ============================================================================
// ServiceCollection - Service Registration
// ============================================================================

export { ServiceCollection, createServiceCollection } from './service-collection';

// ============================================================================
// ServiceProvider - Root Resolution
// ============================================================================

export { ServiceProvider } from './service-provider';

// ============================================================================
// ScopedContainer - Scoped Service Management
// ============================================================================

export { ScopedContainer, withScope } from './scoped-container';
