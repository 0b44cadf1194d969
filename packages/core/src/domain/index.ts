/**
 * @fileoverview Domain Layer Exports
 *
 * Technology-agnostic contracts. NO infrastructure dependencies are allowed
 * here (Hexagonal Architecture).
 *
 * @module @tessera/core/domain
 * @license Apache-2.0
 */

// ============================================================================
// Context - Type-safe context propagation interfaces
// ============================================================================
export * from './context';

// ============================================================================
// Logging - Logger port
// ============================================================================
export * from './logging';

// ============================================================================
// DI - Dependency Injection interfaces and types
// ============================================================================
export * from './di';
