/**
 * @fileoverview PipelineComposer - Ordered Behavior Chains
 *
 * @packageDocumentation
 * @module @tessera/core/application/cqrs
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * ## Ordering
 *
 * Behaviors run by ascending `order` (default 0); equal orders keep their
 * registration order. The first behavior is the outermost:
 *
 * ```
 * addBehavior(Audit,   { order: 20 })
 * addBehavior(Tracing, { order: 10 })
 * addBehavior(Metrics, { order: 10 })
 *
 * Tracing → Metrics → Audit → handler → Audit → Metrics → Tracing
 * ```
 *
 * @version 1.0.0
 */

import { type ServiceIdentifier, ConfigurationError, getServiceName } from '../../domain/di';

import { throwIfCancelled } from './cancellation';
import { PipelineContractError } from './cqrs.errors';
import {
  type BehaviorFilter,
  type IHandlerContext,
  type IPipelineBehavior,
  type IRequest,
  type NextDelegate,
  type RequestType,
} from './cqrs.interface';

/**
 * Identifier of a behavior in the container.
 */
export type BehaviorIdentifier = ServiceIdentifier<IPipelineBehavior>;

/**
 * One registered behavior.
 */
export interface IBehaviorDescriptor {
  readonly behaviorIdentifier: BehaviorIdentifier;

  readonly order: number;

  /**
   * Omitted: applies to every request type.
   */
  readonly appliesTo?: BehaviorFilter | undefined;

  readonly registrationIndex: number;
}

/**
 * Options for `addBehavior()`.
 */
export interface IBehaviorOptions {
  /**
   * Lower runs first (outermost). Default: 0
   */
  order?: number;

  appliesTo?: BehaviorFilter;
}

/**
 * PipelineComposer - builds and runs behavior chains.
 */
export class PipelineComposer {
  private readonly behaviors: IBehaviorDescriptor[] = [];

  private readonly chains = new Map<RequestType, readonly IBehaviorDescriptor[]>();

  private frozen = false;

  addBehavior(behaviorIdentifier: BehaviorIdentifier, options: IBehaviorOptions = {}): this {
    if (this.frozen) {
      throw new ConfigurationError(
        'The pipeline is frozen. Add behaviors before building the mediator.',
      );
    }

    const order = options.order ?? 0;
    if (!Number.isFinite(order)) {
      throw new ConfigurationError(
        `Pipeline behavior '${getServiceName(behaviorIdentifier)}' has order ${order}; ` +
          `use a finite number.`,
      );
    }

    this.behaviors.push(
      Object.freeze({
        behaviorIdentifier,
        order,
        appliesTo: options.appliesTo,
        registrationIndex: this.behaviors.length,
      }),
    );

    return this;
  }

  /**
   * Every registered behavior, in registration order.
   */
  getBehaviors(): readonly IBehaviorDescriptor[] {
    return this.behaviors;
  }

  /**
   * Stop accepting behaviors. Called when the mediator is built.
   */
  freeze(): void {
    this.frozen = true;
  }

  /**
   * Behaviors applying to `requestType`, outermost first.
   *
   * @remarks
   * Cached per request type once the composer is frozen.
   */
  compose(requestType: RequestType): readonly IBehaviorDescriptor[] {
    const cached = this.chains.get(requestType);
    if (cached) {
      return cached;
    }

    const chain = Object.freeze(
      this.behaviors
        .filter((behavior) => applies(behavior.appliesTo, requestType))
        .sort((a, b) => a.order - b.order || a.registrationIndex - b.registrationIndex),
    );

    if (this.frozen) {
      this.chains.set(requestType, chain);
    }

    return chain;
  }

  /**
   * Run `behaviors` around `handler`.
   *
   * @remarks
   * The signal is checked before every step. A second call of the same
   * `next` rejects with PipelineContractError.
   */
  execute(
    behaviors: readonly IPipelineBehavior[],
    request: IRequest,
    context: IHandlerContext,
    handler: NextDelegate,
  ): Promise<unknown> {
    const invoke = async (index: number): Promise<unknown> => {
      throwIfCancelled(context.signal);

      const behavior = behaviors[index];
      if (behavior === undefined) {
        return handler();
      }

      let called = false;
      const next: NextDelegate = () => {
        if (called) {
          return Promise.reject(new PipelineContractError(behavior.constructor.name));
        }
        called = true;
        return invoke(index + 1);
      };

      return behavior.handle(request, next, context);
    };

    return invoke(0);
  }
}

function applies(filter: BehaviorFilter | undefined, requestType: RequestType): boolean {
  if (filter === undefined) {
    return true;
  }
  if (typeof filter === 'function') {
    return filter(requestType);
  }
  return filter.includes(requestType);
}
