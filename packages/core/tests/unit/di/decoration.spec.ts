/**
 * @fileoverview Decorator Registration Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach } from 'vitest';

import {
  createToken,
  ServiceNotRegisteredError,
  type IDisposable,
} from '../../../src/domain/di';
import { ServiceCollection } from '../../../src/infrastructure/di';
import { silentLogger } from '../../../src/infrastructure/logging';

// ============================================================================
// Test Fixtures
// ============================================================================

interface IMailer {
  send(to: string): Promise<string>;
}

interface IClock {
  now(): number;
}

const IMailer = createToken<IMailer>('IMailer');
const IClock = createToken<IClock>('IClock');

let calls: string[] = [];

class SmtpMailer implements IMailer {
  async send(to: string): Promise<string> {
    calls.push('original');
    return `sent:${to}`;
  }
}

class AuditingMailer implements IMailer {
  constructor(private readonly inner: IMailer) {}

  async send(to: string): Promise<string> {
    calls.push('decorator1');
    return this.inner.send(to);
  }
}

class StampingMailer implements IMailer {
  static inject = [IClock] as const;

  constructor(
    private readonly inner: IMailer,
    private readonly clock: IClock,
  ) {}

  async send(to: string): Promise<string> {
    return `${await this.inner.send(to)}@${this.clock.now()}`;
  }
}

// ============================================================================
// Tests
// ============================================================================

describe('decorate()', () => {
  let services: ServiceCollection;

  beforeEach(() => {
    calls = [];
    services = new ServiceCollection();
  });

  it('should run the last decorator outermost', async () => {
    services
      .addSingleton(IMailer, SmtpMailer)
      .decorate(IMailer, AuditingMailer)
      .decorate(IMailer, (inner) => ({
        send: async (to: string) => {
          calls.push('decorator2');
          return inner.send(to);
        },
      }));

    const mailer = await services.build({ logger: silentLogger }).resolve(IMailer);
    const result = await mailer.send('ops@example.test');

    expect(calls).toEqual(['decorator2', 'decorator1', 'original']);
    expect(result).toBe('sent:ops@example.test');
  });

  it('should pass static inject dependencies after the inner instance', async () => {
    services
      .addSingletonInstance(IClock, { now: () => 99 })
      .addTransient(IMailer, SmtpMailer)
      .decorate(IMailer, StampingMailer);

    const mailer = await services.build({ logger: silentLogger }).resolve(IMailer);

    expect(mailer).toBeInstanceOf(StampingMailer);
    expect(await mailer.send('a')).toBe('sent:a@99');
  });

  it('should give decorator functions a resolver', async () => {
    services
      .addSingletonInstance(IClock, { now: () => 5 })
      .addSingleton(IMailer, SmtpMailer)
      .decorate(
        IMailer,
        async (inner, resolver) => {
          const clock = await resolver.resolve(IClock);
          return { send: async (to: string) => `${await inner.send(to)}#${clock.now()}` };
        },
        { inject: [IClock] },
      );

    const mailer = await services.build({ logger: silentLogger }).resolve(IMailer);

    expect(await mailer.send('b')).toBe('sent:b#5');
  });

  it('should keep the original lifetime for the whole chain', async () => {
    services.addScoped(IMailer, SmtpMailer).decorate(IMailer, AuditingMailer);
    const provider = services.build({ logger: silentLogger });
    const first = provider.createScope();
    const second = provider.createScope();

    const a1 = await first.resolve(IMailer);
    const a2 = await first.resolve(IMailer);
    const b1 = await second.resolve(IMailer);

    expect(a1).toBe(a2);
    expect(a1).not.toBe(b1);
    expect(a1).toBeInstanceOf(AuditingMailer);
  });

  it('should validate decorator dependencies at build', () => {
    services.addSingleton(IMailer, SmtpMailer).decorate(IMailer, StampingMailer);

    expect(() => services.build({ logger: silentLogger })).toThrow(ServiceNotRegisteredError);
    expect(() => services.build({ logger: silentLogger })).toThrow(
      "Service 'IClock' is not registered in the container (required by 'IMailer').",
    );
  });

  describe('disposal', () => {
    interface IResource extends IDisposable {
      readonly label: string;
    }

    const IResource = createToken<IResource>('IResource');
    let released: string[];

    class FileResource implements IResource {
      readonly label = 'file';

      dispose(): void {
        released.push('file');
      }
    }

    class BufferedResource implements IResource {
      readonly label = 'buffered';

      constructor(private readonly inner: IResource) {}

      dispose(): void {
        released.push(`buffered(${this.inner.label})`);
      }
    }

    beforeEach(() => {
      released = [];
    });

    it('should release the decorator before the instance it wraps', async () => {
      services.addScoped(IResource, FileResource).decorate(IResource, BufferedResource);
      const scope = services.build({ logger: silentLogger }).createScope();
      await scope.resolve(IResource);

      await scope.dispose();

      expect(released).toEqual(['buffered(file)', 'file']);
    });

    it('should release an instance returned by several links once', async () => {
      services.addScoped(IResource, FileResource).decorate(IResource, (inner) => inner);
      const scope = services.build({ logger: silentLogger }).createScope();
      await scope.resolve(IResource);

      await scope.dispose();

      expect(released).toEqual(['file']);
    });
  });
});
