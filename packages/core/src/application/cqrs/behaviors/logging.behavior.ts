/**
 * @fileoverview LoggingBehavior - Dispatch Logging
 *
 * @packageDocumentation
 * @module @tessera/core/application/cqrs/behaviors
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * @version 1.0.0
 */

import { TRACE_ID_KEY } from '../../../domain/context';
import { type ILogger, LOGGER_TOKEN } from '../../../domain/logging';
import { RequestContext } from '../../../infrastructure/context';
import {
  type IHandlerContext,
  type IPipelineBehavior,
  type IRequest,
  type NextDelegate,
} from '../cqrs.interface';

/**
 * LoggingBehavior - logs start, completion and failure of every dispatch.
 *
 * @remarks
 * Lines carry the trace id of the current RequestContext, so place this
 * behavior after ContextBehavior:
 *
 * ```
 * [DEBUG] [trace-1] Handling PlaceOrder
 * [INFO] [trace-1] Handled PlaceOrder in 12ms
 * ```
 */
export class LoggingBehavior implements IPipelineBehavior {
  static inject = [LOGGER_TOKEN] as const;

  constructor(private readonly logger: ILogger) {}

  async handle(
    _request: IRequest,
    next: NextDelegate,
    context: IHandlerContext,
  ): Promise<unknown> {
    const name = context.requestType.name;
    const traceId = RequestContext.current()?.get(TRACE_ID_KEY);
    const tag = traceId ? `[${traceId}] ` : '';
    const started = Date.now();

    this.logger.debug(`${tag}Handling ${name}`);

    try {
      const result = await next();
      this.logger.info(`${tag}Handled ${name} in ${Date.now() - started}ms`);
      return result;
    } catch (error) {
      this.logger.error(
        `${tag}${name} failed after ${Date.now() - started}ms: ` +
          (error instanceof Error ? error.message : String(error)),
      );
      throw error;
    }
  }
}
