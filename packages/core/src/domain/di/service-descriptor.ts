/**
 * @fileoverview IServiceDescriptor - Service Registration Metadata
 *
 * @packageDocumentation
 * @module @tessera/core/domain/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A descriptor holds everything needed to produce one capability: its
 * identifier, lifetime, producer and declared dependencies. Descriptors are
 * frozen once created; decoration produces a new descriptor that points at
 * the one it wraps.
 *
 * @version 1.0.0
 */

import {
  type ServiceIdentifier,
  type Constructor,
  getInjectDependencies,
  getServiceName,
} from './service-identifier';
import { ServiceLifetime } from './service-lifetime';

/**
 * Resolver handed to factories.
 *
 * @remarks
 * Resolutions made through it share the caller's resolution path, so a
 * cycle that goes through a factory is still reported.
 */
export interface IServiceResolver {
  /**
   * Resolve a service by its identifier.
   */
  resolve<T>(identifier: ServiceIdentifier<T>): Promise<T>;

  /**
   * Resolve a service, or `undefined` when it is not registered.
   */
  tryResolve<T>(identifier: ServiceIdentifier<T>): Promise<T | undefined>;
}

/**
 * Factory function for creating service instances.
 *
 * @example
 * ```typescript
 * const poolFactory: ServiceFactory<Pool> = async (resolver) => {
 *   const config = await resolver.resolve(IDatabaseConfig);
 *   const pool = new Pool(config.url);
 *   await pool.connect();
 *   return pool;
 * };
 * ```
 */
export type ServiceFactory<T> = (resolver: IServiceResolver) => T | Promise<T>;

/**
 * Factory wrapping a previously registered producer.
 *
 * @example
 * ```typescript
 * services.decorate(IMailer, (inner) => new RetryingMailer(inner, 3));
 * ```
 */
export type DecoratorFactory<T> = (inner: T, resolver: IServiceResolver) => T | Promise<T>;

/**
 * Decorator class: the first constructor parameter is the wrapped instance,
 * the remaining ones come from its static `inject` array.
 *
 * @example
 * ```typescript
 * class CachingCatalog implements ICatalog {
 *   static inject = [ICache] as const;
 *   constructor(private readonly inner: ICatalog, private readonly cache: ICache) {}
 * }
 *
 * services.decorate(ICatalog, CachingCatalog);
 * ```
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type DecoratorConstructor<T> = new (inner: T, ...dependencies: any[]) => T;

/**
 * IServiceDescriptor - Complete metadata for a registered service.
 *
 * @template T - The service instance type
 *
 * @remarks
 * **Producers** (exactly one per descriptor):
 *
 * - `implementationType`: class built from its `static inject` dependencies;
 *   for a decorating descriptor, the decorator class
 * - `factory`: function receiving an {@link IServiceResolver}
 * - `decoratorFactory`: function receiving the inner instance (decorating
 *   descriptors only)
 *
 * **Decoration chain:**
 *
 * ```
 * resolve(IMailer)
 *   └─ RetryingMailer        (decorates ↓)
 *      └─ LoggingMailer      (decorates ↓)
 *         └─ SmtpMailer      (original registration)
 * ```
 */
export interface IServiceDescriptor<T = unknown> {
  /**
   * The identifier used to request this service.
   */
  readonly serviceIdentifier: ServiceIdentifier<T>;

  /**
   * The lifecycle scope of this service.
   */
  readonly lifetime: ServiceLifetime;

  /**
   * The concrete (or decorator) class.
   */
  readonly implementationType?: Constructor<T> | undefined;

  /**
   * Factory function for creating instances.
   */
  readonly factory?: ServiceFactory<T> | undefined;

  /**
   * Factory function wrapping the inner instance.
   *
   * @remarks
   * Method syntax keeps `IServiceDescriptor<T>` assignable to
   * `IServiceDescriptor`.
   */
  decoratorFactory?(inner: T, resolver: IServiceResolver): T | Promise<T>;

  /**
   * The descriptor this one decorates.
   */
  readonly decorates?: IServiceDescriptor<T> | undefined;

  /**
   * Declared dependencies, resolved before the producer runs.
   *
   * @remarks
   * For classes this is the `static inject` array. For factories it is the
   * `inject` option; the factory may still resolve other services through
   * its resolver, but only declared ones take part in graph validation.
   */
  readonly dependencies: readonly ServiceIdentifier[];

  /**
   * Optional human-readable name for debugging.
   */
  readonly name?: string | undefined;

  /**
   * Optional tags for filtering and discovery.
   */
  readonly tags?: readonly string[] | undefined;

  /**
   * Custom metadata for application-specific purposes.
   */
  readonly metadata?: Readonly<Record<string, unknown>> | undefined;
}

/**
 * Options for creating a descriptor.
 */
export interface IServiceDescriptorOptions {
  /**
   * Dependencies a factory declares for graph validation.
   */
  inject?: readonly ServiceIdentifier[];

  /**
   * Tags for service discovery.
   */
  tags?: string[];

  /**
   * Custom metadata.
   */
  metadata?: Record<string, unknown>;

  /**
   * Human-readable name.
   */
  name?: string;
}

/**
 * Create a descriptor for a class-based registration.
 *
 * @example
 * ```typescript
 * const descriptor = createClassDescriptor(
 *   IUserRepository,
 *   ServiceLifetime.Scoped,
 *   SqlUserRepository,
 *   { tags: ['repository'] },
 * );
 * ```
 */
export function createClassDescriptor<T>(
  serviceIdentifier: ServiceIdentifier<T>,
  lifetime: ServiceLifetime,
  implementationType: Constructor<T>,
  options?: IServiceDescriptorOptions,
): IServiceDescriptor<T> {
  return Object.freeze({
    serviceIdentifier,
    lifetime,
    implementationType,
    dependencies: Object.freeze([...getInjectDependencies(implementationType)]),
    name: options?.name,
    tags: options?.tags,
    metadata: options?.metadata,
  });
}

/**
 * Create a descriptor for a factory-based registration.
 */
export function createFactoryDescriptor<T>(
  serviceIdentifier: ServiceIdentifier<T>,
  lifetime: ServiceLifetime,
  factory: ServiceFactory<T>,
  options?: IServiceDescriptorOptions,
): IServiceDescriptor<T> {
  return Object.freeze({
    serviceIdentifier,
    lifetime,
    factory,
    dependencies: Object.freeze([...(options?.inject ?? [])]),
    name: options?.name,
    tags: options?.tags,
    metadata: options?.metadata,
  });
}

/**
 * Create a descriptor for a pre-created instance.
 *
 * @remarks
 * Instance registrations are always Singleton.
 */
export function createInstanceDescriptor<T>(
  serviceIdentifier: ServiceIdentifier<T>,
  instance: T,
  options?: IServiceDescriptorOptions,
): IServiceDescriptor<T> {
  return createFactoryDescriptor(serviceIdentifier, ServiceLifetime.Singleton, () => instance, {
    ...options,
    inject: [],
  });
}

/**
 * Create a descriptor that wraps `inner`.
 *
 * @remarks
 * The result keeps the inner lifetime: decorating a scoped service yields one
 * decorated instance per scope.
 */
export function createDecoratorDescriptor<T>(
  inner: IServiceDescriptor<T>,
  decorator: DecoratorConstructor<T> | DecoratorFactory<T>,
  options?: IServiceDescriptorOptions,
): IServiceDescriptor<T> {
  const base = {
    serviceIdentifier: inner.serviceIdentifier,
    lifetime: inner.lifetime,
    decorates: inner,
    name: options?.name ?? inner.name,
    tags: options?.tags ?? inner.tags,
    metadata: options?.metadata ?? inner.metadata,
  };

  if (isDecoratorConstructor(decorator)) {
    return Object.freeze({
      ...base,
      implementationType: decorator,
      dependencies: Object.freeze([...getInjectDependencies(decorator)]),
    });
  }

  return Object.freeze({
    ...base,
    decoratorFactory: decorator,
    dependencies: Object.freeze([...(options?.inject ?? [])]),
  });
}

/**
 * Tell a decorator class from a decorator function.
 *
 * @remarks
 * Classes have a non-writable `prototype`; arrow functions have none and
 * plain functions have a writable one.
 *
 * @internal
 */
function isDecoratorConstructor<T>(
  decorator: DecoratorConstructor<T> | DecoratorFactory<T>,
): decorator is DecoratorConstructor<T> {
  const descriptor = Object.getOwnPropertyDescriptor(decorator, 'prototype');
  return descriptor !== undefined && descriptor.writable === false;
}

/**
 * Walk a decoration chain from the outermost descriptor to the original.
 *
 * @internal
 */
export function* decorationChain<T>(descriptor: IServiceDescriptor<T>): Generator<IServiceDescriptor<T>> {
  let current: IServiceDescriptor<T> | undefined = descriptor;
  while (current) {
    yield current;
    current = current.decorates;
  }
}

/**
 * Validate a descriptor.
 *
 * @throws TypeError if descriptor is invalid
 *
 * @internal
 */
export function validateDescriptor<T>(descriptor: IServiceDescriptor<T>): void {
  const name = getServiceName(descriptor.serviceIdentifier);
  const producers = [
    descriptor.implementationType,
    descriptor.factory,
    descriptor.decoratorFactory,
  ].filter((producer) => producer !== undefined);

  if (producers.length !== 1) {
    throw new TypeError(
      `Descriptor for '${name}' must have exactly one of implementationType, factory or decoratorFactory`,
    );
  }

  if (producers[0] !== undefined && typeof producers[0] !== 'function') {
    throw new TypeError(`Producer for '${name}' must be a function or class`);
  }

  if (descriptor.decoratorFactory !== undefined && descriptor.decorates === undefined) {
    throw new TypeError(`decoratorFactory for '${name}' requires the descriptor it decorates`);
  }

  if (descriptor.factory !== undefined && descriptor.decorates !== undefined) {
    throw new TypeError(`Decorating descriptor for '${name}' cannot use a plain factory`);
  }
}
