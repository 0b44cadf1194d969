/**
 * @fileoverview DI Errors - Dependency Injection Error Classes
 *
 * @packageDocumentation
 * @module @tessera/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * ## Error Taxonomy
 *
 * ```
 * DIError
 * ├─ ConfigurationError      detected at startup, aborts boot
 * │  ├─ ContainerSealedError
 * │  ├─ DuplicateRegistrationError
 * │  └─ ScopeMismatchError
 * ├─ ResolutionError         fatal to the current resolution / dispatch
 * │  ├─ ServiceNotRegisteredError
 * │  ├─ CircularDependencyError
 * │  ├─ NoActiveScopeError
 * │  ├─ ServiceCreationError
 * │  └─ ScopeDisposedError
 * └─ DisposalError           raised after every owned instance was released
 * ```
 *
 * Every error carries the resolution path that led to it.
 *
 * @version 1.0.0
 */

import { type ServiceIdentifier, getServiceName } from './service-identifier';
import { type ServiceLifetime, getLifetimeName } from './service-lifetime';

/**
 * Base error class for all DI-related errors.
 *
 * @example
 * ```typescript
 * try {
 *   await scope.resolve(CheckoutService);
 * } catch (error) {
 *   if (error instanceof DIError) {
 *     logger.error(error.message);
 *     logger.error(error.dependencyGraph);
 *   }
 * }
 * ```
 */
export abstract class DIError extends Error {
  /**
   * The resolution path leading to this error.
   *
   * @remarks
   * ```
   * CheckoutService -> PaymentGateway -> IHttpClient (UNREGISTERED)
   * ```
   */
  public readonly resolutionPath: string[];

  /**
   * Indented rendering of the resolution path.
   */
  public readonly dependencyGraph: string;

  constructor(message: string, resolutionPath: string[] = [], options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.resolutionPath = resolutionPath;
    this.dependencyGraph = this.buildDependencyGraph();

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * @internal
   */
  private buildDependencyGraph(): string {
    return this.resolutionPath
      .map((entry, i) => `${'  '.repeat(i)}${i === 0 ? '' : '└─ '}${entry}`)
      .join('\n');
  }
}

// ============================================================================
// Taxonomy Roots
// ============================================================================

/**
 * Invalid registrations, detected before any dispatch.
 */
export class ConfigurationError extends DIError {}

/**
 * A capability could not be produced for the current call.
 */
export class ResolutionError extends DIError {}

/**
 * One or more owned instances failed while being released.
 *
 * @remarks
 * Raised only after every other instance has been released; one failure
 * never skips the rest.
 */
export class DisposalError extends DIError {
  /**
   * Every failure, in release order.
   */
  public readonly errors: readonly Error[];

  constructor(errors: readonly Error[]) {
    super(
      `${errors.length} error(s) while releasing owned instances:\n` +
        errors.map((error, i) => `  ${i + 1}. ${error.message}`).join('\n'),
    );
    this.errors = errors;
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Thrown when trying to modify a sealed service collection.
 */
export class ContainerSealedError extends ConfigurationError {
  constructor() {
    super(
      'Cannot register services after the container has been built. ' +
        'Register all services before calling build().',
    );
  }
}

/**
 * Thrown when a capability is registered twice and overrides are disabled.
 *
 * @example
 * ```typescript
 * const services = new ServiceCollection({ allowOverrides: false });
 * services.addSingleton(IClock, SystemClock);
 * services.addSingleton(IClock, FakeClock); // DuplicateRegistrationError
 *
 * // To wrap the first registration instead:
 * services.decorate(IClock, (inner) => new OffsetClock(inner));
 * ```
 */
export class DuplicateRegistrationError extends ConfigurationError {
  public readonly serviceIdentifier: ServiceIdentifier;

  constructor(identifier: ServiceIdentifier) {
    const name = getServiceName(identifier);
    super(
      `Service '${name}' is already registered. ` +
        `Use decorate(${name}, ...) to wrap it, or enable allowOverrides to replace it.`,
    );
    this.serviceIdentifier = identifier;
  }
}

/**
 * Thrown when a longer-lived service would capture a scoped one.
 *
 * @remarks
 * A singleton holding a scoped instance would hand the first scope's
 * instance to every later scope. Inject `IServiceScopeFactory` and create a
 * scope per operation instead, or shorten the singleton's lifetime.
 */
export class ScopeMismatchError extends ConfigurationError {
  public readonly dependentIdentifier: ServiceIdentifier;

  public readonly dependencyIdentifier: ServiceIdentifier;

  public readonly dependentLifetime: ServiceLifetime;

  public readonly dependencyLifetime: ServiceLifetime;

  constructor(
    dependentId: ServiceIdentifier,
    dependencyId: ServiceIdentifier,
    dependentLifetime: ServiceLifetime,
    dependencyLifetime: ServiceLifetime,
    resolutionPath: string[] = [],
  ) {
    const dependentName = getServiceName(dependentId);
    const dependencyName = getServiceName(dependencyId);
    const dependentLifetimeName = getLifetimeName(dependentLifetime);
    const dependencyLifetimeName = getLifetimeName(dependencyLifetime);

    super(
      `Scope mismatch: ${dependentLifetimeName} service '${dependentName}' ` +
        `cannot depend on ${dependencyLifetimeName} service '${dependencyName}'.`,
      [...resolutionPath, `${dependencyName} (${dependencyLifetimeName}) ← SCOPE MISMATCH`],
    );

    this.dependentIdentifier = dependentId;
    this.dependencyIdentifier = dependencyId;
    this.dependentLifetime = dependentLifetime;
    this.dependencyLifetime = dependencyLifetime;
  }
}

// ============================================================================
// Resolution Errors
// ============================================================================

/**
 * Thrown when a requested service is not registered.
 */
export class ServiceNotRegisteredError extends ResolutionError {
  public readonly serviceIdentifier: ServiceIdentifier;

  constructor(identifier: ServiceIdentifier, resolutionPath: string[] = []) {
    const name = getServiceName(identifier);
    const requiredBy = resolutionPath[resolutionPath.length - 1];

    super(
      `Service '${name}' is not registered in the container` +
        (requiredBy !== undefined ? ` (required by '${requiredBy}').` : '.'),
      [...resolutionPath, `${name} (UNREGISTERED)`],
    );
    this.serviceIdentifier = identifier;
  }
}

/**
 * Thrown when a dependency cycle is detected.
 *
 * @remarks
 * Cycles are always errors: there is no lazy or property injection to defer
 * one side. Extract the shared part into a third service.
 */
export class CircularDependencyError extends ResolutionError {
  public readonly serviceIdentifier: ServiceIdentifier;

  /**
   * The full cycle, first and last entries equal.
   */
  public readonly cyclePath: string[];

  constructor(identifier: ServiceIdentifier, resolutionPath: string[]) {
    const name = getServiceName(identifier);
    const start = resolutionPath.indexOf(name);
    const cyclePath = [...(start >= 0 ? resolutionPath.slice(start) : resolutionPath), name];

    super(`Circular dependency detected: ${cyclePath.join(' -> ')}`, [
      ...resolutionPath,
      `${name} (CIRCULAR!)`,
    ]);
    this.serviceIdentifier = identifier;
    this.cyclePath = cyclePath;
  }
}

/**
 * Thrown when resolving a Scoped service outside of a scope.
 *
 * @example
 * ```typescript
 * await provider.resolve(IUnitOfWork); // NoActiveScopeError
 *
 * await withScope(provider, async (scope) => {
 *   const uow = await scope.resolve(IUnitOfWork); // OK
 * });
 * ```
 */
export class NoActiveScopeError extends ResolutionError {
  public readonly serviceIdentifier: ServiceIdentifier;

  constructor(identifier: ServiceIdentifier, resolutionPath: string[] = []) {
    const name = getServiceName(identifier);

    super(
      `Cannot resolve Scoped service '${name}' outside of a scope. ` +
        `Create one with provider.createScope() or withScope().`,
      [...resolutionPath, `${name} (NO SCOPE)`],
    );
    this.serviceIdentifier = identifier;
  }
}

/**
 * Thrown when a constructor or factory fails.
 *
 * @remarks
 * The original error is preserved as `cause`.
 */
export class ServiceCreationError extends ResolutionError {
  public readonly serviceIdentifier: ServiceIdentifier;

  constructor(identifier: ServiceIdentifier, cause: Error, resolutionPath: string[] = []) {
    const name = getServiceName(identifier);

    super(
      `Failed to create service '${name}': ${cause.message}`,
      [...resolutionPath, `${name} (CREATION FAILED)`],
      { cause },
    );
    this.serviceIdentifier = identifier;
  }
}

/**
 * Thrown when trying to use a disposed scope or provider.
 */
export class ScopeDisposedError extends ResolutionError {
  constructor(what = 'scope') {
    super(`Cannot resolve services from a disposed ${what}.`);
  }
}
