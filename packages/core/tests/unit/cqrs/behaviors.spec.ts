/**
 * @fileoverview Built-in Pipeline Behavior Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import {
  LoggingBehavior,
  Request,
  ValidationBehavior,
  ValidationError,
  ValidatorCatalog,
  type IHandlerContext,
  type IRequestValidator,
  type ValidationFailure,
} from '../../../src/application/cqrs';
import { type IServiceScope } from '../../../src/domain/di';
import { type ILogger } from '../../../src/domain/logging';
import { RequestContext } from '../../../src/infrastructure/context';
import { ServiceCollection } from '../../../src/infrastructure/di';
import { silentLogger } from '../../../src/infrastructure/logging';

// ============================================================================
// Test Fixtures
// ============================================================================

class Ping extends Request<string> {}

class Register extends Request<void> {
  constructor(
    readonly email: string,
    readonly password: string,
  ) {
    super();
  }
}

class EmailValidator implements IRequestValidator<Register> {
  validate(request: Register): ValidationFailure[] {
    return request.email.includes('@') ? [] : [{ field: 'email', message: 'must contain @' }];
  }
}

class PasswordValidator implements IRequestValidator<Register> {
  async validate(request: Register): Promise<ValidationFailure[]> {
    return request.password.length >= 8 ? [] : [{ message: 'password too short' }];
  }
}

function createLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies ILogger;
}

function createScope(configure?: (services: ServiceCollection) => void): IServiceScope {
  const services = new ServiceCollection();
  configure?.(services);
  return services.build({ logger: silentLogger }).createScope();
}

function contextFor(requestType: IHandlerContext['requestType'], scope: IServiceScope): IHandlerContext {
  return { requestType, scope, signal: new AbortController().signal };
}

// ============================================================================
// LoggingBehavior
// ============================================================================

describe('LoggingBehavior', () => {
  let logger: ReturnType<typeof createLogger>;
  let behavior: LoggingBehavior;
  let context: IHandlerContext;

  beforeEach(() => {
    logger = createLogger();
    behavior = new LoggingBehavior(logger);
    context = contextFor(Ping, createScope());
  });

  it('should log start and completion with the trace id', async () => {
    const result = await RequestContext.run({ traceId: 'trace-7' }, () =>
      behavior.handle(new Ping(), async () => 'pong', context),
    );

    expect(result).toBe('pong');
    expect(logger.debug).toHaveBeenCalledWith('[trace-7] Handling Ping');
    expect(logger.info).toHaveBeenCalledTimes(1);
    expect(logger.info.mock.calls[0]?.[0]).toMatch(/^\[trace-7\] Handled Ping in \d+ms$/);
  });

  it('should omit the tag outside a request context', async () => {
    await behavior.handle(new Ping(), async () => 'pong', context);

    expect(logger.debug).toHaveBeenCalledWith('Handling Ping');
  });

  it('should log and rethrow failures', async () => {
    const failure = new Error('boom');

    await expect(
      RequestContext.run({ traceId: 'trace-8' }, () =>
        behavior.handle(new Ping(), () => Promise.reject(failure), context),
      ),
    ).rejects.toBe(failure);

    expect(logger.info).not.toHaveBeenCalled();
    expect(logger.error.mock.calls[0]?.[0]).toMatch(/^\[trace-8\] Ping failed after \d+ms: boom$/);
  });
});

// ============================================================================
// ValidationBehavior
// ============================================================================

describe('ValidationBehavior', () => {
  let catalog: ValidatorCatalog;
  let context: IHandlerContext;

  beforeEach(() => {
    catalog = new ValidatorCatalog()
      .add(Register, EmailValidator)
      .add(Register, PasswordValidator);
    context = contextFor(
      Register,
      createScope((services) => services.addTransient(EmailValidator).addTransient(PasswordValidator)),
    );
  });

  it('should call next for valid requests', async () => {
    const behavior = new ValidationBehavior(catalog);
    const next = vi.fn(async () => 'done');

    const result = await behavior.handle(new Register('ada@example.test', 'long-enough'), next, context);

    expect(result).toBe('done');
    expect(next).toHaveBeenCalledTimes(1);
  });

  it('should collect failures of every validator', async () => {
    const behavior = new ValidationBehavior(catalog);
    const next = vi.fn(async () => 'done');

    const error = await behavior
      .handle(new Register('ada', 'short'), next, context)
      .then(() => undefined, (e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toHaveProperty(
      'message',
      "Validation failed for 'Register': email must contain @; password too short",
    );
    expect(error).toHaveProperty('failures', [
      { field: 'email', message: 'must contain @' },
      { message: 'password too short' },
    ]);
    expect(next).not.toHaveBeenCalled();
  });

  it('should pass request types without validators', async () => {
    const behavior = new ValidationBehavior(catalog);

    const result = await behavior.handle(
      new Ping(),
      async () => 'pong',
      contextFor(Ping, createScope()),
    );

    expect(result).toBe('pong');
  });
});
