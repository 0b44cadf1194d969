/**
 * @fileoverview ScopedContainer Unit Tests
 *
 * Scope identity, disposal order and withScope() exit paths.
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import {
  createToken,
  DisposalError,
  ScopeDisposedError,
  type IDisposable,
  type IServiceProvider,
  type IServiceScope,
} from '../../../src/domain/di';
import { type ILogger } from '../../../src/domain/logging';
import { ServiceCollection, withScope } from '../../../src/infrastructure/di';

// ============================================================================
// Test Fixtures
// ============================================================================

let released: string[] = [];

class Session implements IDisposable {
  dispose(): void {
    released.push('Session');
  }
}

class UnitOfWork implements IDisposable {
  static inject = [Session] as const;

  constructor(readonly session: Session) {}

  async dispose(): Promise<void> {
    await Promise.resolve();
    released.push('UnitOfWork');
  }
}

class AuditWriter implements IDisposable {
  dispose(): void {
    released.push('AuditWriter');
  }
}

class Pool implements IDisposable {
  dispose(): void {
    released.push('Pool');
  }
}

const IFlaky = createToken<IDisposable>('IFlaky');
const ISlow = createToken<IDisposable>('ISlow');

const tick = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies ILogger;
}

// ============================================================================
// Tests
// ============================================================================

describe('ScopedContainer', () => {
  let logger: ReturnType<typeof createLogger>;
  let provider: IServiceProvider;

  beforeEach(() => {
    released = [];
    logger = createLogger();

    const services = new ServiceCollection();
    services
      .addSingleton(Pool)
      .addScoped(Session)
      .addScoped(UnitOfWork)
      .addTransient(AuditWriter)
      .addScopedFactory(IFlaky, () => ({
        dispose: () => {
          released.push('IFlaky');
          throw new Error('flush failed');
        },
      }))
      .addScopedFactory(ISlow, async () => {
        await tick(10);
        return { dispose: () => void released.push('ISlow') };
      });
    provider = services.build({ logger });
  });

  describe('dispose', () => {
    it('should release owned instances in reverse creation order', async () => {
      const scope = provider.createScope();
      await scope.resolve(UnitOfWork);
      await scope.resolve(AuditWriter);

      await scope.dispose();

      expect(released).toEqual(['AuditWriter', 'UnitOfWork', 'Session']);
    });

    it('should release each instance exactly once', async () => {
      const scope = provider.createScope();
      await scope.resolve(Session);
      await scope.resolve(Session);

      await scope.dispose();
      await scope.dispose();

      expect(released).toEqual(['Session']);
      expect(scope.isDisposed()).toBe(true);
    });

    it('should track every transient it creates', async () => {
      const scope = provider.createScope();
      await scope.resolve(AuditWriter);
      await scope.resolve(AuditWriter);

      await scope.dispose();

      expect(released).toEqual(['AuditWriter', 'AuditWriter']);
    });

    it('should leave singletons to the provider', async () => {
      const scope = provider.createScope();
      await scope.resolve(Pool);

      await scope.dispose();
      expect(released).toEqual([]);

      await provider.dispose();
      expect(released).toEqual(['Pool']);
    });

    it('should release everything before raising DisposalError', async () => {
      const scope = provider.createScope();
      await scope.resolve(Session);
      await scope.resolve(IFlaky);
      await scope.resolve(AuditWriter);

      const error: unknown = await scope.dispose().catch((e: unknown) => e);

      expect(released).toEqual(['AuditWriter', 'IFlaky', 'Session']);
      expect(error).toBeInstanceOf(DisposalError);
      if (error instanceof DisposalError) {
        expect(error.errors.map((e) => e.message)).toEqual(['flush failed']);
      }
      expect(logger.error).toHaveBeenCalledWith(
        'Error disposing scope: 1 error(s) while releasing owned instances:\n  1. flush failed',
      );
    });

    it('should refuse resolution once disposed', async () => {
      const scope = provider.createScope();
      await scope.dispose();

      await expect(scope.resolve(Session)).rejects.toBeInstanceOf(ScopeDisposedError);
      await expect(scope.resolve(Session)).rejects.toThrow(
        'Cannot resolve services from a disposed scope.',
      );
    });

    it('should release an instance that finishes after the scope ended', async () => {
      const scope = provider.createScope();
      const pending = scope.resolve(ISlow);

      await scope.dispose();

      await expect(pending).rejects.toBeInstanceOf(ScopeDisposedError);
      expect(released).toEqual(['ISlow']);
    });
  });

  describe('withScope', () => {
    it('should return the callback result and dispose the scope', async () => {
      let captured: IServiceScope | undefined;

      const result = await withScope(provider, async (scope) => {
        captured = scope;
        await scope.resolve(Session);
        return 'done';
      });

      expect(result).toBe('done');
      expect(captured?.isDisposed()).toBe(true);
      expect(released).toEqual(['Session']);
    });

    it('should dispose the scope when the callback fails', async () => {
      await expect(
        withScope(provider, async (scope) => {
          await scope.resolve(UnitOfWork);
          throw new Error('handler failed');
        }),
      ).rejects.toThrow('handler failed');

      expect(released).toEqual(['UnitOfWork', 'Session']);
    });

    it('should rethrow the callback error when disposal fails too', async () => {
      await expect(
        withScope(provider, async (scope) => {
          await scope.resolve(IFlaky);
          throw new Error('handler failed');
        }),
      ).rejects.toThrow('handler failed');

      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it('should raise DisposalError when only disposal fails', async () => {
      await expect(
        withScope(provider, async (scope) => {
          await scope.resolve(IFlaky);
        }),
      ).rejects.toBeInstanceOf(DisposalError);
    });
  });

  it('should create independent scopes', async () => {
    const first = provider.createScope();
    const second = provider.createScope();

    await first.resolve(Session);
    await first.dispose();

    expect(second.isDisposed()).toBe(false);
    await expect(second.resolve(Session)).resolves.toBeInstanceOf(Session);
  });
});
