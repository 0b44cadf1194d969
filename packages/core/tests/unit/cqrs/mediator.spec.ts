/**
 * @fileoverview Mediator Unit Tests
 *
 * Dispatch through MediatorBuilder-built mediators: routing, behavior order,
 * validation, trySend(), cancellation and scope ownership.
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import {
  HandlerCatalog,
  Mediator,
  MediatorBuilder,
  PipelineComposer,
  Request,
  HandlerError,
  HandlerNotFoundError,
  DuplicateHandlerError,
  MissingHandlerError,
  OperationCancelledError,
  ValidationError,
  ValidationBehavior,
  type IHandlerContext,
  type IPipelineBehavior,
  type IRequest,
  type IRequestHandler,
  type IRequestValidator,
  type NextDelegate,
  type ValidationFailure,
} from '../../../src/application/cqrs';
import {
  ConfigurationError,
  NoActiveScopeError,
  ScopeDisposedError,
  ServiceLifetime,
  type IDisposable,
  type IServiceProvider,
} from '../../../src/domain/di';
import { ServiceCollection, withScope } from '../../../src/infrastructure/di';
import { silentLogger } from '../../../src/infrastructure/logging';

// ============================================================================
// Test Fixtures
// ============================================================================

let log: string[] = [];
let released: string[] = [];
let handled = 0;

class Ping extends Request<string> {
  constructor(readonly message = 'ping') {
    super();
  }
}

class PingHandler implements IRequestHandler<Ping, string> {
  handle(request: Ping): string {
    handled++;
    log.push('handler');
    return `pong:${request.message}`;
  }
}

class OtherPingHandler implements IRequestHandler<Ping, string> {
  handle(): string {
    return 'other';
  }
}

class Unrouted extends Request<number> {}

class CreateUser extends Request<string> {
  constructor(readonly email: string) {
    super();
  }
}

class CreateUserHandler implements IRequestHandler<CreateUser, string> {
  handle(request: CreateUser): string {
    handled++;
    return `user:${request.email}`;
  }
}

class EmailValidator implements IRequestValidator<CreateUser> {
  validate(request: CreateUser): ValidationFailure[] {
    return request.email.includes('@')
      ? []
      : [{ field: 'email', message: 'must contain @', code: 'format' }];
  }
}

class Session implements IDisposable {
  dispose(): void {
    released.push('Session');
  }
}

class UnitOfWork implements IDisposable {
  static inject = [Session] as const;

  constructor(readonly session: Session) {}

  dispose(): void {
    released.push('UnitOfWork');
  }
}

class PlaceOrder extends Request<string> {
  constructor(readonly quantity: number) {
    super();
  }
}

class PlaceOrderHandler implements IRequestHandler<PlaceOrder, string> {
  static inject = [UnitOfWork] as const;

  constructor(readonly uow: UnitOfWork) {}

  handle(request: PlaceOrder): string {
    if (request.quantity > 3) {
      throw new HandlerError('Not enough stock', 'OUT_OF_STOCK', { quantity: request.quantity });
    }
    return 'order-1';
  }
}

class SlowQuery extends Request<string> {}

class QueryConnection implements IDisposable {
  dispose(): void {
    released.push('QueryConnection');
  }
}

let slowHandlerCreated = 0;

class SlowQueryHandler implements IRequestHandler<SlowQuery, string> {
  static inject = [QueryConnection] as const;

  constructor(readonly connection: QueryConnection) {
    slowHandlerCreated++;
  }

  async handle(_request: SlowQuery, context: IHandlerContext): Promise<string> {
    await new Promise<void>((resolve) => {
      context.signal.addEventListener('abort', () => resolve(), { once: true });
    });
    return 'late';
  }
}

function tracing(name: string) {
  return class implements IPipelineBehavior {
    async handle(_request: IRequest, next: NextDelegate): Promise<unknown> {
      log.push(`${name}:before`);
      const result = await next();
      log.push(`${name}:after`);
      return result;
    }
  };
}

const AuditBehavior = tracing('audit');
const TracingBehavior = tracing('tracing');
const MetricsBehavior = tracing('metrics');

const tick = (ms = 5): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (error: unknown) => error,
  );
}

// ============================================================================
// Tests
// ============================================================================

describe('Mediator', () => {
  let services: ServiceCollection;
  let builder: MediatorBuilder;

  beforeEach(() => {
    log = [];
    released = [];
    handled = 0;
    slowHandlerCreated = 0;
    services = new ServiceCollection();
    builder = new MediatorBuilder(services, { logger: silentLogger });
  });

  const build = () => {
    const provider: IServiceProvider = services.build({ logger: silentLogger });
    return { provider, mediator: builder.build(provider) };
  };

  // ============================================================================
  // Routing
  // ============================================================================

  describe('send', () => {
    it('should route a request to its handler', async () => {
      builder.addHandler(Ping, PingHandler);
      const { provider, mediator } = build();

      const result = await withScope(provider, (scope) => mediator.send(new Ping('hi'), scope));

      expect(result).toBe('pong:hi');
    });

    it('should resolve the handler in the caller scope', async () => {
      builder.addHandler(PlaceOrder, PlaceOrderHandler, ServiceLifetime.Scoped);
      services.addScoped(Session).addScoped(UnitOfWork);
      const { provider, mediator } = build();
      const scope = provider.createScope();

      await mediator.send(new PlaceOrder(1), scope);
      const handler = await scope.resolve(PlaceOrderHandler);

      expect(handler.uow).toBe(await scope.resolve(UnitOfWork));
    });

    it('should reject unknown request types', async () => {
      builder.addHandler(Ping, PingHandler);
      const { provider, mediator } = build();
      const scope = provider.createScope();

      await expect(mediator.send(new Unrouted(), scope)).rejects.toBeInstanceOf(
        HandlerNotFoundError,
      );
      await expect(mediator.send(new Unrouted(), scope)).rejects.toThrow(
        "No handler registered for request 'Unrouted'.",
      );
    });

    it('should require a scope', async () => {
      builder.addHandler(Ping, PingHandler);
      const { mediator } = build();

      await expect(mediator.send(new Ping(), undefined)).rejects.toBeInstanceOf(
        NoActiveScopeError,
      );
      expect(handled).toBe(0);
    });

    it('should reject a disposed scope', async () => {
      builder.addHandler(Ping, PingHandler);
      const { provider, mediator } = build();
      const scope = provider.createScope();
      await scope.dispose();

      await expect(mediator.send(new Ping(), scope)).rejects.toBeInstanceOf(ScopeDisposedError);
    });

    it('should log failed dispatches at debug', async () => {
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const local = new ServiceCollection();
      const localBuilder = new MediatorBuilder(local, { logger });
      const provider = local.build({ logger: silentLogger });
      const mediator = localBuilder.build(provider);

      await expect(mediator.send(new Ping(), provider.createScope())).rejects.toThrow();

      expect(logger.debug).toHaveBeenCalledWith(
        "Dispatch of 'Ping' failed: No handler registered for request 'Ping'. " +
          'Register one with MediatorBuilder.addHandler().',
      );
    });
  });

  // ============================================================================
  // Startup Validation
  // ============================================================================

  describe('build', () => {
    it('should reject duplicate handlers before any dispatch', () => {
      builder.addHandler(Ping, PingHandler).addHandler(Ping, OtherPingHandler);
      const provider = services.build({ logger: silentLogger });

      expect(() => builder.build(provider)).toThrow(DuplicateHandlerError);
      expect(handled).toBe(0);
    });

    it('should reject declared requests without handler', () => {
      builder.addHandler(Ping, PingHandler).declareRequest(Unrouted);
      const provider = services.build({ logger: silentLogger });

      expect(() => builder.build(provider)).toThrow(MissingHandlerError);
    });

    it('should reject a handler removed from the container', () => {
      builder.addHandler(Ping, PingHandler);
      services.remove(PingHandler);
      const provider = services.build({ logger: silentLogger });

      expect(() => builder.build(provider)).toThrow(
        "Request 'Ping' is handled by 'PingHandler', which is not registered in the container.",
      );
    });

    it('should refuse a handler catalog that was never validated', () => {
      const catalog = new HandlerCatalog()
        .registerHandler(Ping, PingHandler)
        .registerHandler(Ping, OtherPingHandler);

      expect(
        () => new Mediator(catalog, new PipelineComposer(), { logger: silentLogger }),
      ).toThrow(ConfigurationError);
      expect(
        () => new Mediator(catalog, new PipelineComposer(), { logger: silentLogger }),
      ).toThrow('The handler catalog has not been validated.');
    });

    it('should not build twice', () => {
      builder.addHandler(Ping, PingHandler);
      const { provider } = build();

      expect(() => builder.build(provider)).toThrow(ConfigurationError);
    });

    it('should keep an existing handler registration', () => {
      services.addSingleton(PingHandler);
      builder.addHandler(Ping, PingHandler);

      expect(services.getDescriptor(PingHandler)?.lifetime).toBe(ServiceLifetime.Singleton);
    });
  });

  // ============================================================================
  // Pipeline
  // ============================================================================

  describe('behaviors', () => {
    it('should run behaviors by order, then registration', async () => {
      builder
        .addHandler(Ping, PingHandler)
        .addBehavior(AuditBehavior, { order: 20 })
        .addBehavior(TracingBehavior, { order: 10 })
        .addBehavior(MetricsBehavior, { order: 10 });
      const { provider, mediator } = build();

      await withScope(provider, (scope) => mediator.send(new Ping(), scope));

      expect(log).toEqual([
        'tracing:before',
        'metrics:before',
        'audit:before',
        'handler',
        'audit:after',
        'metrics:after',
        'tracing:after',
      ]);
    });

    it('should only run behaviors that apply to the request', async () => {
      builder
        .addHandler(Ping, PingHandler)
        .addHandler(CreateUser, CreateUserHandler)
        .addBehavior(AuditBehavior, { appliesTo: [CreateUser] });
      const { provider, mediator } = build();

      await withScope(provider, (scope) => mediator.send(new Ping(), scope));

      expect(log).toEqual(['handler']);
    });
  });

  describe('validation', () => {
    beforeEach(() => {
      builder
        .addHandler(CreateUser, CreateUserHandler)
        .addValidator(CreateUser, EmailValidator)
        .addBehavior(ValidationBehavior);
    });

    it('should short-circuit invalid requests', async () => {
      const { provider, mediator } = build();

      const error = await rejection(
        withScope(provider, (scope) => mediator.send(new CreateUser('nobody'), scope)),
      );

      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.message).toBe("Validation failed for 'CreateUser': email must contain @");
        expect(error.code).toBe('VALIDATION_FAILED');
        expect(error.failures).toEqual([
          { field: 'email', message: 'must contain @', code: 'format' },
        ]);
      }
      expect(handled).toBe(0);
    });

    it('should pass valid requests through', async () => {
      const { provider, mediator } = build();

      const result = await withScope(provider, (scope) =>
        mediator.send(new CreateUser('ada@example.test'), scope),
      );

      expect(result).toBe('user:ada@example.test');
      expect(handled).toBe(1);
    });
  });

  // ============================================================================
  // trySend
  // ============================================================================

  describe('trySend', () => {
    beforeEach(() => {
      builder.addHandler(PlaceOrder, PlaceOrderHandler);
      services.addScoped(Session).addScoped(UnitOfWork);
    });

    it('should wrap successful results', async () => {
      const { provider, mediator } = build();

      const outcome = await withScope(provider, (scope) => mediator.trySend(new PlaceOrder(1), scope));

      expect(outcome).toEqual({ ok: true, value: 'order-1' });
    });

    it('should return handler errors as values', async () => {
      const { provider, mediator } = build();

      const outcome = await withScope(provider, (scope) => mediator.trySend(new PlaceOrder(5), scope));

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error.code).toBe('OUT_OF_STOCK');
        expect(outcome.error.details).toEqual({ quantity: 5 });
      }
    });

    it('should still throw infrastructure errors', async () => {
      const { provider, mediator } = build();

      await expect(
        withScope(provider, (scope) => mediator.trySend(new Unrouted(), scope)),
      ).rejects.toBeInstanceOf(HandlerNotFoundError);
    });

    it('should release the scope exactly once after a handler error', async () => {
      const { provider, mediator } = build();

      await expect(
        withScope(provider, (scope) => mediator.send(new PlaceOrder(9), scope)),
      ).rejects.toBeInstanceOf(HandlerError);

      expect(released).toEqual(['UnitOfWork', 'Session']);
    });
  });

  // ============================================================================
  // Cancellation
  // ============================================================================

  describe('cancellation', () => {
    beforeEach(() => {
      builder.addHandler(SlowQuery, SlowQueryHandler);
      services.addScoped(QueryConnection);
    });

    it('should reject as soon as the caller aborts', async () => {
      const { provider, mediator } = build();
      const controller = new AbortController();

      const error = await rejection(
        withScope(provider, async (scope) => {
          const pending = mediator.send(new SlowQuery(), scope, { signal: controller.signal });
          await tick();
          controller.abort();
          return pending;
        }),
      );

      expect(error).toBeInstanceOf(OperationCancelledError);
      expect(error).toHaveProperty('reason', 'aborted');
    });

    it('should release instances created before the abort with the scope', async () => {
      const { provider, mediator } = build();
      const controller = new AbortController();

      await rejection(
        withScope(provider, async (scope) => {
          const pending = mediator.send(new SlowQuery(), scope, { signal: controller.signal });
          await tick();
          controller.abort();
          return pending;
        }),
      );

      expect(slowHandlerCreated).toBe(1);
      expect(released).toEqual(['QueryConnection']);
    });

    it('should reject after the timeout', async () => {
      const { provider, mediator } = build();

      const error = await rejection(
        withScope(provider, (scope) => mediator.send(new SlowQuery(), scope, { timeoutMs: 20 })),
      );

      expect(error).toBeInstanceOf(OperationCancelledError);
      expect(error).toHaveProperty('reason', 'timeout');
      expect(error).toHaveProperty('message', 'Operation timed out after 20ms');
      expect(released).toEqual(['QueryConnection']);
    });

    it('should apply the default timeout', async () => {
      const local = new ServiceCollection();
      local.addScoped(QueryConnection);
      const localBuilder = new MediatorBuilder(local, {
        logger: silentLogger,
        defaultTimeoutMs: 15,
      }).addHandler(SlowQuery, SlowQueryHandler);
      const provider = local.build({ logger: silentLogger });
      const mediator = localBuilder.build(provider);

      const error = await rejection(
        withScope(provider, (scope) => mediator.send(new SlowQuery(), scope)),
      );

      expect(error).toHaveProperty('message', 'Operation timed out after 15ms');
    });

    it('should not start work for an already aborted signal', async () => {
      const { provider, mediator } = build();
      const controller = new AbortController();
      controller.abort();

      const error = await rejection(
        withScope(provider, (scope) =>
          mediator.send(new SlowQuery(), scope, { signal: controller.signal }),
        ),
      );

      expect(error).toBeInstanceOf(OperationCancelledError);
      expect(slowHandlerCreated).toBe(0);
      expect(released).toEqual([]);
    });
  });
});
