/**
 * @fileoverview ContextBehavior - Request Context for Every Dispatch
 *
 * @packageDocumentation
 * @module @tessera/core/application/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * ## Pipeline Position
 *
 * ```
 * ┌─────────────┐
 * │   Request   │
 * └──────┬──────┘
 *        ▼
 * ┌─────────────────────────────────────────────────────────┐
 * │                   Pipeline Behaviors                     │
 * │  ┌─────────────┐  ┌─────────────┐  ┌─────────────────┐  │
 * │  │   Context   │→ │  Logging    │→ │   Validation    │  │
 * │  │  Behavior   │  │  Behavior   │  │    Behavior     │  │
 * │  └─────────────┘  └─────────────┘  └─────────────────┘  │
 * └─────────────────────────────────────────────────────────┘
 *        ▼
 * ┌─────────────┐
 * │   Handler   │
 * └─────────────┘
 * ```
 *
 * Register it with the lowest order so every later behavior and the
 * handler run inside the context. The context carries data only: the
 * scope travels in IHandlerContext.
 *
 * @version 1.0.0
 */

import { randomUUID } from 'node:crypto';

import { type IRequestContextData, TRACE_ID_KEY } from '../../domain/context';
import { RequestContext } from '../../infrastructure/context';
import {
  type IHandlerContext,
  type IPipelineBehavior,
  type IRequest,
  type NextDelegate,
} from '../cqrs';

/**
 * Configuration for ContextBehavior.
 */
export interface IContextBehaviorOptions {
  /**
   * Extract initial context data from a request.
   * Default: reads string `traceId`, `userId` and `requestId` fields.
   */
  extractContextData?: (request: IRequest) => IRequestContextData;

  /**
   * Generate a trace id when neither the request nor an enclosing context
   * has one.
   * Default: `crypto.randomUUID()`
   */
  generateTraceId?: () => string;

  /**
   * Cancel the context when the dispatch signal aborts.
   * Default: true
   */
  propagateCancellation?: boolean;
}

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Default context data extractor.
 */
export function defaultExtractContextData(request: IRequest): IRequestContextData {
  const data: IRequestContextData = {};

  const traceId = readString(request, 'traceId');
  if (traceId !== undefined) data.traceId = traceId;

  const userId = readString(request, 'userId');
  if (userId !== undefined) data.userId = userId;

  const requestId = readString(request, 'requestId');
  if (requestId !== undefined) data.requestId = requestId;

  return data;
}

/**
 * ContextBehavior - runs the rest of the pipeline inside a RequestContext.
 *
 * @remarks
 * The trace id comes from the request, then from an enclosing context (for
 * example one opened by HTTP middleware), then from `generateTraceId`.
 *
 * Resolved by the container with default options. To configure it, register
 * it before `addBehavior()`:
 *
 * @example
 * ```typescript
 * services.addSingletonFactory(
 *   ContextBehavior,
 *   () => new ContextBehavior({ generateTraceId: () => `orders-${Date.now()}` }),
 * );
 * builder.addBehavior(ContextBehavior, { order: -100 });
 * ```
 */
export class ContextBehavior implements IPipelineBehavior {
  private readonly extractContextData: (request: IRequest) => IRequestContextData;

  private readonly generateTraceId: () => string;

  private readonly propagateCancellation: boolean;

  constructor(options: IContextBehaviorOptions = {}) {
    this.extractContextData = options.extractContextData ?? defaultExtractContextData;
    this.generateTraceId = options.generateTraceId ?? randomUUID;
    this.propagateCancellation = options.propagateCancellation ?? true;
  }

  handle(request: IRequest, next: NextDelegate, context: IHandlerContext): Promise<unknown> {
    const extracted = this.extractContextData(request);

    const initialData: IRequestContextData = {
      ...extracted,
      traceId:
        extracted.traceId ??
        RequestContext.current()?.get(TRACE_ID_KEY) ??
        this.generateTraceId(),
      timestamp: Date.now(),
    };

    return RequestContext.run(initialData, async () => {
      const ctx = RequestContext.require();

      if (!this.propagateCancellation) {
        return next();
      }

      const { signal } = context;
      const onAbort = (): void => ctx.cancel();

      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }

      try {
        return await next();
      } finally {
        signal.removeEventListener('abort', onAbort);
      }
    });
  }
}
