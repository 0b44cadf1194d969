/**
 * @fileoverview Infrastructure Layer Exports
 *
 * The Infrastructure layer holds the adapters: AsyncLocalStorage context,
 * the console logger and the DI container.
 *
 * @module @tessera/core/infrastructure
 * @license Apache-2.0
 */

// ============================================================================
// Context - AsyncLocalStorage implementation
// ============================================================================
export * from './context';

// ============================================================================
// Logging - Console adapter
// ============================================================================
export * from './logging';

// ============================================================================
// DI - Dependency Injection implementation
// ============================================================================
export * from './di';
