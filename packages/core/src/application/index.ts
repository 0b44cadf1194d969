/**
 * @fileoverview Application Layer Exports
 *
 * The Application layer orchestrates use cases: the CQRS mediator and its
 * pipeline behaviors.
 *
 * @module @tessera/core/application
 * @license Apache-2.0
 */

// ============================================================================
// CQRS - Mediator, catalogs and pipeline
// ============================================================================
export * from './cqrs';

// ============================================================================
// Context - Pipeline context integration
// ============================================================================
export * from './context';
