/**
 * @fileoverview @tessera/core - Main Entry Point
 *
 * Lifetime-scoped dependency container and in-process CQRS mediator for
 * Node.js, organised along Hexagonal Architecture layers.
 *
 * @packageDocumentation
 * @module @tessera/core
 * @version 1.0.0-alpha.1
 * @license Apache-2.0
 *
 * @example
 * ```typescript
 * import {
 *   ConsoleLogger,
 *   ContextBehavior,
 *   LOGGER_TOKEN,
 *   LoggingBehavior,
 *   MediatorBuilder,
 *   Request,
 *   ServiceCollection,
 *   withScope,
 * } from '@tessera/core';
 *
 * class GetGreeting extends Request<string> {
 *   constructor(readonly name: string) {
 *     super();
 *   }
 * }
 *
 * class GetGreetingHandler {
 *   handle(request: GetGreeting): string {
 *     return `Hello, ${request.name}`;
 *   }
 * }
 *
 * const services = new ServiceCollection();
 * services.addSingletonInstance(LOGGER_TOKEN, new ConsoleLogger());
 *
 * const builder = new MediatorBuilder(services)
 *   .addHandler(GetGreeting, GetGreetingHandler)
 *   .addBehavior(ContextBehavior, { order: -100 })
 *   .addBehavior(LoggingBehavior);
 *
 * const provider = services.build();
 * const mediator = builder.build(provider);
 *
 * const greeting = await withScope(provider, (scope) =>
 *   mediator.send(new GetGreeting('Ada'), scope),
 * );
 * ```
 */

// ============================================================================
// Domain Layer Exports
// Pure contracts - NO external dependencies
// ============================================================================
export * from './domain';

// ============================================================================
// Application Layer Exports
// CQRS mediator and pipeline behaviors
// ============================================================================
export * from './application';

// ============================================================================
// Infrastructure Layer Exports
// Adapters: AsyncLocalStorage context, console logger, DI container
// ============================================================================
export * from './infrastructure';

// ============================================================================
// Version
// ============================================================================
export const VERSION = '1.0.0-alpha.1';
