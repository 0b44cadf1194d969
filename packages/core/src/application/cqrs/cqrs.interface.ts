/**
 * @fileoverview CQRS Contracts - Requests, Handlers and Pipeline Behaviors
 *
 * @packageDocumentation
 * @module @tessera/core/application/cqrs
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * ```
 * ┌──────────────┐
 * │   Request    │  (command or query, identified by its class)
 * └──────┬───────┘
 *        ▼
 * ┌──────────────────────────────────────────────────┐
 * │              Pipeline Behaviors                  │
 * │  ┌─────────┐  ┌─────────┐  ┌──────────────┐      │
 * │  │ Context │→ │ Logging │→ │  Validation  │  ... │
 * │  └─────────┘  └─────────┘  └──────────────┘      │
 * └──────────────────────────────────────────────────┘
 *        ▼
 * ┌──────────────┐
 * │   Handler    │
 * └──────────────┘
 * ```
 *
 * @version 1.0.0
 */

import { type Constructor, type IServiceScope } from '../../domain/di';

import { type HandlerError } from './cqrs.errors';

// ============================================================================
// Requests
// ============================================================================

/**
 * Marker interface for requests (commands and queries).
 *
 * @template TResult - The type produced by the request's handler
 *
 * @remarks
 * `__resultType` is a phantom member: it never holds a value, it lets
 * `mediator.send()` infer the result type from the request.
 */
export interface IRequest<TResult = unknown> {
  readonly __resultType?: TResult;
}

/**
 * Base class for requests.
 *
 * @example
 * ```typescript
 * class PlaceOrder extends Request<OrderReceipt> {
 *   constructor(readonly sku: string, readonly quantity: number) {
 *     super();
 *   }
 * }
 *
 * const receipt = await mediator.send(new PlaceOrder('sku-1', 2), scope); // OrderReceipt
 * ```
 */
export abstract class Request<TResult = void> implements IRequest<TResult> {
  declare readonly __resultType?: TResult;
}

/**
 * The class of a request. Requests are routed by their constructor.
 */
export type RequestType<TRequest extends IRequest = IRequest> = Constructor<TRequest>;

/**
 * Extract the result type of a request.
 */
export type ResultOf<TRequest> = TRequest extends IRequest<infer R> ? R : never;

// ============================================================================
// Handler Context
// ============================================================================

/**
 * Per-dispatch context handed to behaviors and the handler.
 */
export interface IHandlerContext {
  /**
   * The routed request class.
   */
  readonly requestType: RequestType;

  /**
   * The caller's scope. Behaviors and the handler were resolved from it.
   */
  readonly scope: IServiceScope;

  /**
   * Fires when the caller aborts or the dispatch times out.
   */
  readonly signal: AbortSignal;
}

// ============================================================================
// Handlers
// ============================================================================

/**
 * Handles exactly one request type.
 *
 * @example
 * ```typescript
 * class PlaceOrderHandler implements IRequestHandler<PlaceOrder, OrderReceipt> {
 *   static inject = [IOrderRepository] as const;
 *
 *   constructor(private readonly orders: IOrderRepository) {}
 *
 *   async handle(request: PlaceOrder, ctx: IHandlerContext): Promise<OrderReceipt> {
 *     const order = Order.place(request.sku, request.quantity);
 *     await this.orders.save(order, ctx.signal);
 *     return { orderId: order.id };
 *   }
 * }
 * ```
 */
export interface IRequestHandler<TRequest extends IRequest = IRequest, TResult = ResultOf<TRequest>> {
  handle(request: TRequest, context: IHandlerContext): TResult | Promise<TResult>;
}

// ============================================================================
// Pipeline Behaviors
// ============================================================================

/**
 * Invokes the rest of the pipeline. May be called at most once.
 */
export type NextDelegate<TResult = unknown> = () => Promise<TResult>;

/**
 * Pipeline behavior - wraps handler execution.
 *
 * @remarks
 * A behavior either calls `next()` once and may post-process its result,
 * or short-circuits by returning or throwing without calling it.
 *
 * @example
 * ```typescript
 * class TimingBehavior implements IPipelineBehavior {
 *   async handle(request: IRequest, next: NextDelegate, ctx: IHandlerContext): Promise<unknown> {
 *     const started = performance.now();
 *     try {
 *       return await next();
 *     } finally {
 *       metrics.observe(ctx.requestType.name, performance.now() - started);
 *     }
 *   }
 * }
 * ```
 */
export interface IPipelineBehavior<TRequest extends IRequest = IRequest, TResult = unknown> {
  handle(
    request: TRequest,
    next: NextDelegate<TResult>,
    context: IHandlerContext,
  ): Promise<TResult>;
}

/**
 * Which request types a behavior applies to.
 *
 * @remarks
 * Omitted means every request.
 */
export type BehaviorFilter = readonly RequestType[] | ((requestType: RequestType) => boolean);

// ============================================================================
// Validation
// ============================================================================

/**
 * One validation failure.
 */
export interface ValidationFailure {
  /** Offending field, if any */
  readonly field?: string;

  readonly message: string;

  /** Machine-readable code, e.g. 'required' */
  readonly code?: string;
}

/**
 * Validates one request type. An empty list means valid.
 *
 * @example
 * ```typescript
 * class PlaceOrderValidator implements IRequestValidator<PlaceOrder> {
 *   validate(request: PlaceOrder): ValidationFailure[] {
 *     return request.quantity > 0
 *       ? []
 *       : [{ field: 'quantity', message: 'must be positive', code: 'min' }];
 *   }
 * }
 * ```
 */
export interface IRequestValidator<TRequest extends IRequest = IRequest> {
  validate(
    request: TRequest,
  ): readonly ValidationFailure[] | Promise<readonly ValidationFailure[]>;
}

// ============================================================================
// Dispatch Options & Results
// ============================================================================

/**
 * Options for one `send()` call.
 */
export interface ISendOptions {
  /**
   * Caller's cancellation signal.
   */
  signal?: AbortSignal;

  /**
   * Abort the dispatch after this many milliseconds.
   *
   * Default: the mediator's `defaultTimeoutMs`, if any
   */
  timeoutMs?: number;
}

/**
 * Outcome of `trySend()`: business failures as values.
 */
export type Result<TValue, TError extends HandlerError = HandlerError> =
  | { readonly ok: true; readonly value: TValue }
  | { readonly ok: false; readonly error: TError };
