/**
 * @fileoverview ServiceIdentifier - Capability Identity
 *
 * @packageDocumentation
 * @module @tessera/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A capability is identified by a class constructor, a symbol token or a
 * string. The identifier value itself is the registry key, so two classes
 * that happen to share a name never collide.
 *
 * Dependencies are declared explicitly through a `static inject` array:
 *
 * ```typescript
 * const IClock = createToken<IClock>('IClock');
 *
 * class InvoiceService {
 *   static inject = [IClock, InvoiceRepository] as const;
 *   constructor(clock: IClock, repo: InvoiceRepository) {}
 * }
 * ```
 *
 * @version 1.0.0
 */

/**
 * Type representing a constructor function.
 *
 * @template T - The instance type created by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = any> = new (...args: any[]) => T;

/**
 * Abstract constructor type for abstract base classes used as identifiers.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractConstructor<T = any> = abstract new (...args: any[]) => T;

/**
 * Symbol token carrying the service type as a phantom.
 *
 * @remarks
 * At runtime this is a plain `symbol`; the `__serviceType` member only
 * exists for the compiler so `resolve(token)` infers `T`.
 */
export type ServiceToken<T> = symbol & { readonly __serviceType?: T };

/**
 * ServiceIdentifier - Unified type for identifying services in the container.
 *
 * @template T - The service instance type
 *
 * @remarks
 * Use tokens for interfaces and constructors for concrete classes:
 *
 * ```typescript
 * const IUserRepository = createToken<IUserRepository>('IUserRepository');
 *
 * services.addScoped(IUserRepository, SqlUserRepository);
 * services.addScoped(UserService);
 *
 * const repo = await scope.resolve(IUserRepository); // IUserRepository
 * ```
 *
 * String identifiers are accepted for configuration-driven wiring but give
 * up type inference.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type ServiceIdentifier<T = any> = Constructor<T> | AbstractConstructor<T> | ServiceToken<T> | string;

/**
 * Check if a value is a valid ServiceIdentifier.
 *
 * @example
 * ```typescript
 * isServiceIdentifier(UserService); // true
 * isServiceIdentifier(Symbol('ILogger')); // true
 * isServiceIdentifier('my-service'); // true
 * isServiceIdentifier(42); // false
 * ```
 */
export function isServiceIdentifier(value: unknown): value is ServiceIdentifier {
  const type = typeof value;
  return type === 'symbol' || type === 'string' || type === 'function';
}

/**
 * Get a human-readable name for a ServiceIdentifier.
 *
 * @remarks
 * Used in error messages and resolution paths.
 *
 * @example
 * ```typescript
 * getServiceName(UserService); // 'UserService'
 * getServiceName(Symbol('ILogger')); // 'ILogger'
 * getServiceName('my-service'); // 'my-service'
 * ```
 */
export function getServiceName(identifier: ServiceIdentifier): string {
  if (typeof identifier === 'symbol') {
    return identifier.description ?? identifier.toString();
  }

  if (typeof identifier === 'string') {
    return identifier;
  }

  return identifier.name || 'AnonymousClass';
}

// ============================================================================
// Static Inject Pattern
// ============================================================================

/**
 * Constructor declaring its dependencies through a static `inject` array.
 *
 * @remarks
 * The order of `inject` must match the constructor parameter order.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export interface IInjectableConstructor<T = any> extends Constructor<T> {
  inject?: readonly ServiceIdentifier[];
}

/**
 * Check if a constructor has a static inject array.
 */
export function hasInjectProperty(ctor: Constructor): ctor is IInjectableConstructor {
  return 'inject' in ctor && Array.isArray(ctor.inject);
}

/**
 * Get dependencies from a constructor's static inject property.
 */
export function getInjectDependencies(ctor: Constructor): readonly ServiceIdentifier[] {
  if (hasInjectProperty(ctor)) {
    return ctor.inject ?? [];
  }
  return [];
}

// ============================================================================
// Token Creation
// ============================================================================

/**
 * Create a typed service token for an interface.
 *
 * @template T - The interface type this token represents
 * @param description - Name shown in errors and logs
 *
 * @example
 * ```typescript
 * interface IMailer {
 *   send(to: string, body: string): Promise<void>;
 * }
 *
 * const IMailer = createToken<IMailer>('IMailer');
 * services.addSingleton(IMailer, SmtpMailer);
 * ```
 */
export function createToken<T>(description: string): ServiceToken<T> {
  return Symbol(description) as ServiceToken<T>;
}
