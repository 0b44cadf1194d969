/**
 * @fileoverview InstanceCache - Per-Owner Instance Bookkeeping
 *
 * @packageDocumentation
 * @module @tessera/core/infrastructure/di
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Every owner (the root provider, each scope) has one cache holding:
 *
 * ```
 * pending:     identifier -> Promise<instance>   (Singleton / Scoped only)
 * disposables: [first created, ..., last created] (released last-to-first)
 * ```
 *
 * The Promise is stored before construction starts, so concurrent first
 * resolutions of one identifier await the same creation. A failed creation
 * is evicted and the next resolution retries.
 *
 * While creations are in flight the cache also records which of them waits
 * on which. A caller about to wait on a creation that (transitively) waits
 * on something the caller is producing gets CircularDependencyError
 * instead of a deadlock:
 *
 * ```
 * call 1: A -> factory -> resolve(B)   waits on call 2's B
 * call 2: B -> factory -> resolve(A)   A waits on B: B -> A -> B
 * ```
 *
 * @version 1.0.0
 */

import {
  type IDisposable,
  type ServiceIdentifier,
  getServiceName,
  isDisposable,
  CircularDependencyError,
  ScopeDisposedError,
} from '../../domain/di';

/**
 * @internal
 */
interface IPendingCreation {
  readonly promise: Promise<unknown>;
  settled: boolean;
}

/**
 * InstanceCache - Shared-instance cache and disposal list of one owner.
 *
 * @internal
 */
export class InstanceCache {
  private readonly pending = new Map<ServiceIdentifier, IPendingCreation>();

  /**
   * In-flight creation -> in-flight creations it is currently awaiting.
   */
  private readonly waits = new Map<ServiceIdentifier, ServiceIdentifier[]>();

  /**
   * Disposable instances in creation order.
   */
  private readonly disposables: IDisposable[] = [];

  private readonly tracked = new Set<unknown>();

  private disposed = false;

  /**
   * @param ownerName - 'scope' or 'provider', used in ScopeDisposedError
   */
  constructor(private readonly ownerName: string) {}

  /**
   * Return the cached (or in-flight) instance, starting `create` only for the
   * first caller.
   *
   * @param stack - Identifiers the calling chain is producing
   * @throws CircularDependencyError when waiting on the in-flight creation
   * would wait on the caller itself
   */
  getOrCreate(
    identifier: ServiceIdentifier,
    stack: readonly ServiceIdentifier[],
    create: () => Promise<unknown>,
  ): Promise<unknown> {
    this.ensureNotDisposed();

    const existing = this.pending.get(identifier);
    if (existing) {
      return existing.settled
        ? existing.promise
        : this.awaitInFlight(identifier, existing.promise, stack);
    }

    const creation: Promise<unknown> = create().then(
      (instance) => {
        entry.settled = true;
        return instance;
      },
      (error: unknown) => {
        if (this.pending.get(identifier) === entry) {
          this.pending.delete(identifier);
        }
        throw error;
      },
    );
    const entry: IPendingCreation = { promise: creation, settled: false };
    this.pending.set(identifier, entry);

    return creation;
  }

  private async awaitInFlight(
    identifier: ServiceIdentifier,
    creation: Promise<unknown>,
    stack: readonly ServiceIdentifier[],
  ): Promise<unknown> {
    const cycle = this.findWaitPath(identifier, new Set(stack));
    if (cycle) {
      const [producing, ...chain] = cycle;
      throw new CircularDependencyError(
        producing,
        [...stack, identifier, ...chain].map(getServiceName),
      );
    }

    const waiters = stack.filter((s) => this.pending.get(s)?.settled === false);
    for (const waiter of waiters) {
      const awaited = this.waits.get(waiter) ?? [];
      awaited.push(identifier);
      this.waits.set(waiter, awaited);
    }

    try {
      return await creation;
    } finally {
      for (const waiter of waiters) {
        const awaited = this.waits.get(waiter);
        if (awaited) {
          awaited.splice(awaited.indexOf(identifier), 1);
          if (awaited.length === 0) {
            this.waits.delete(waiter);
          }
        }
      }
    }
  }

  /**
   * Follow the recorded waits from `from` until one reaches an identifier in
   * `targets`.
   *
   * @returns The reached identifier followed by the in-flight creations
   * between `from` and it, or undefined
   */
  private findWaitPath(
    from: ServiceIdentifier,
    targets: ReadonlySet<ServiceIdentifier>,
  ): [ServiceIdentifier, ...ServiceIdentifier[]] | undefined {
    const visited = new Set<ServiceIdentifier>();

    const visit = (
      node: ServiceIdentifier,
      via: readonly ServiceIdentifier[],
    ): [ServiceIdentifier, ...ServiceIdentifier[]] | undefined => {
      for (const next of this.waits.get(node) ?? []) {
        if (targets.has(next)) {
          return [next, ...via];
        }
        if (!visited.has(next)) {
          visited.add(next);
          const found = visit(next, [...via, next]);
          if (found) {
            return found;
          }
        }
      }
      return undefined;
    };

    return visit(from, []);
  }

  /**
   * Take ownership of a freshly created instance.
   *
   * @remarks
   * Non-disposable instances are ignored; an instance tracked twice (for
   * example a decorator function returning its inner value) is released
   * once. If the owner was disposed while the instance was being created,
   * the instance is released immediately and ScopeDisposedError is thrown.
   */
  async adopt(instance: unknown): Promise<void> {
    if (!isDisposable(instance) || this.tracked.has(instance)) {
      return;
    }

    if (this.disposed) {
      await instance.dispose();
      throw new ScopeDisposedError(this.ownerName);
    }

    this.tracked.add(instance);
    this.disposables.push(instance);
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  ensureNotDisposed(): void {
    if (this.disposed) {
      throw new ScopeDisposedError(this.ownerName);
    }
  }

  /**
   * Release every tracked instance, newest first.
   *
   * @remarks
   * A failing release never stops the remaining ones. Calling this again is
   * a no-op.
   *
   * @returns The failures, in release order
   */
  async disposeAll(): Promise<Error[]> {
    if (this.disposed) {
      return [];
    }

    this.disposed = true;
    const errors: Error[] = [];

    for (let i = this.disposables.length - 1; i >= 0; i--) {
      const instance = this.disposables[i];
      if (instance === undefined) {
        continue;
      }
      try {
        await instance.dispose();
      } catch (error) {
        errors.push(error instanceof Error ? error : new Error(String(error)));
      }
    }

    this.disposables.length = 0;
    this.tracked.clear();
    this.pending.clear();
    this.waits.clear();

    return errors;
  }
}
