/**
 * @fileoverview Domain DI Module Exports
 *
 * @packageDocumentation
 * @module @tessera/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * DI contracts, descriptor helpers and the error taxonomy. The Infrastructure
 * layer implements them.
 *
 * ```typescript
 * import { createToken } from '@tessera/core';
 *
 * interface IClock { now(): Date; }
 * const IClock = createToken<IClock>('IClock');
 *
 * class InvoiceService {
 *   static inject = [IClock] as const;
 *   constructor(private readonly clock: IClock) {}
 * }
 * ```
 */

// ============================================================================
// Service Identifier
// ============================================================================

export {
  type ServiceIdentifier,
  type ServiceToken,
  type Constructor,
  type AbstractConstructor,
  type IInjectableConstructor,
  isServiceIdentifier,
  getServiceName,
  hasInjectProperty,
  getInjectDependencies,
  createToken,
} from './service-identifier';

// ============================================================================
// Service Lifetime
// ============================================================================

export { ServiceLifetime, isCacheable, canDependOn, getLifetimeName } from './service-lifetime';

// ============================================================================
// Service Descriptor
// ============================================================================

export {
  type IServiceDescriptor,
  type IServiceDescriptorOptions,
  type ServiceFactory,
  type DecoratorFactory,
  type DecoratorConstructor,
  type IServiceResolver,
  createClassDescriptor,
  createFactoryDescriptor,
  createInstanceDescriptor,
  createDecoratorDescriptor,
  decorationChain,
  validateDescriptor,
} from './service-descriptor';

// ============================================================================
// DI Interfaces
// ============================================================================

export {
  type IDisposable,
  type IServiceCollection,
  type IServiceCollectionOptions,
  type IServiceProvider,
  type IServiceScope,
  type IServiceScopeFactory,
  type IBuildOptions,
  isDisposable,
  SERVICE_PROVIDER_TOKEN,
  SERVICE_SCOPE_TOKEN,
  SERVICE_SCOPE_FACTORY_TOKEN,
} from './di.interface';

// ============================================================================
// DI Errors
// ============================================================================

export {
  DIError,
  ConfigurationError,
  ResolutionError,
  DisposalError,
  ContainerSealedError,
  DuplicateRegistrationError,
  ScopeMismatchError,
  ServiceNotRegisteredError,
  CircularDependencyError,
  NoActiveScopeError,
  ServiceCreationError,
  ScopeDisposedError,
} from './di.errors';
