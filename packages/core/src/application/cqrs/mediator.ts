/**
 * @fileoverview Mediator - In-Process Request Dispatch
 *
 * @packageDocumentation
 * @module @tessera/core/application/cqrs
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * ## Dispatch
 *
 * ```
 * send(request, scope)
 *   1. request.constructor      -> HandlerCatalog lookup (HandlerNotFoundError)
 *   2. scope.resolve(handler)   -> in the caller's scope
 *   3. composer.compose(type)   -> behaviors resolved in the same scope
 *   4. composer.execute(...)    -> outermost behavior first, handler last
 *   5. result or failure        -> back to the caller unchanged
 * ```
 *
 * The caller owns the scope. The mediator never creates or disposes one.
 *
 * @version 1.0.0
 */

import { type IServiceScope, ConfigurationError, NoActiveScopeError } from '../../domain/di';
import { type ILogger } from '../../domain/logging';
import { ConsoleLogger } from '../../infrastructure/logging';

import { linkCancellation, raceCancellation, throwIfCancelled } from './cancellation';
import { HandlerError, HandlerNotFoundError } from './cqrs.errors';
import {
  type IHandlerContext,
  type IPipelineBehavior,
  type IRequest,
  type ISendOptions,
  type Result,
} from './cqrs.interface';
import { type HandlerCatalog } from './handler-catalog';
import { type PipelineComposer } from './pipeline-composer';

/**
 * Options for the Mediator.
 */
export interface IMediatorOptions {
  /**
   * Receives failed dispatches at 'debug'.
   *
   * Default: ConsoleLogger at 'info'
   */
  logger?: ILogger | undefined;

  /**
   * Timeout applied when `send()` is given none.
   *
   * Default: none
   */
  defaultTimeoutMs?: number | undefined;
}

/**
 * IMediator - request dispatch port.
 */
export interface IMediator {
  /**
   * Dispatch a request to its handler through the behavior pipeline.
   *
   * @throws NoActiveScopeError when no scope is given
   * @throws HandlerNotFoundError when the request type has no handler
   * @throws OperationCancelledError when the signal fires or the timeout elapses
   */
  send<TResult>(
    request: IRequest<TResult>,
    scope: IServiceScope | undefined,
    options?: ISendOptions,
  ): Promise<TResult>;

  /**
   * Like `send()`, with HandlerError failures returned as values.
   *
   * @remarks
   * Configuration, resolution and cancellation errors are still thrown.
   */
  trySend<TResult>(
    request: IRequest<TResult>,
    scope: IServiceScope | undefined,
    options?: ISendOptions,
  ): Promise<Result<TResult>>;
}

/**
 * Mediator - built by MediatorBuilder, immutable afterwards.
 *
 * @remarks
 * The constructor only accepts a catalog that passed `validate()`, so
 * duplicate and missing handlers never reach dispatch.
 *
 * @example
 * ```typescript
 * const receipt = await withScope(provider, (scope) =>
 *   mediator.send(new PlaceOrder('sku-1', 2), scope, { timeoutMs: 5_000 }),
 * );
 *
 * const outcome = await withScope(provider, (scope) =>
 *   mediator.trySend(new PlaceOrder('sku-1', 0), scope),
 * );
 * if (!outcome.ok) {
 *   console.warn(outcome.error.code);
 * }
 * ```
 */
export class Mediator implements IMediator {
  private readonly logger: ILogger;

  private readonly defaultTimeoutMs: number | undefined;

  constructor(
    private readonly catalog: HandlerCatalog,
    private readonly composer: PipelineComposer,
    options: IMediatorOptions = {},
  ) {
    if (!catalog.isFrozen()) {
      throw new ConfigurationError(
        'The handler catalog has not been validated. ' +
          'Create the mediator with MediatorBuilder.build().',
      );
    }

    this.logger = options.logger ?? new ConsoleLogger();
    this.defaultTimeoutMs = options.defaultTimeoutMs;
  }

  async send<TResult>(
    request: IRequest<TResult>,
    scope: IServiceScope | undefined,
    options: ISendOptions = {},
  ): Promise<TResult> {
    const requestName = request.constructor.name;

    if (scope === undefined) {
      throw new NoActiveScopeError(requestName);
    }

    const route = this.catalog.lookup(request.constructor);
    if (!route) {
      throw new HandlerNotFoundError(requestName);
    }

    const cancellation = linkCancellation(
      options.signal,
      options.timeoutMs ?? this.defaultTimeoutMs,
    );
    const { signal } = cancellation;

    try {
      throwIfCancelled(signal);

      const handler = await raceCancellation(scope.resolve(route.handlerIdentifier), signal);

      const behaviors: IPipelineBehavior[] = [];
      for (const behavior of this.composer.compose(route.requestType)) {
        behaviors.push(await raceCancellation(scope.resolve(behavior.behaviorIdentifier), signal));
      }

      const context: IHandlerContext = { requestType: route.requestType, scope, signal };

      const result = await raceCancellation(
        this.composer.execute(behaviors, request, context, async () =>
          handler.handle(request, context),
        ),
        signal,
      );

      // The catalog routes this request type to a handler producing TResult.
      return result as TResult;
    } catch (error) {
      this.logger.debug(
        `Dispatch of '${requestName}' failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw error;
    } finally {
      cancellation.dispose();
    }
  }

  async trySend<TResult>(
    request: IRequest<TResult>,
    scope: IServiceScope | undefined,
    options?: ISendOptions,
  ): Promise<Result<TResult>> {
    try {
      return { ok: true, value: await this.send(request, scope, options) };
    } catch (error) {
      if (error instanceof HandlerError) {
        return { ok: false, error };
      }
      throw error;
    }
  }
}
