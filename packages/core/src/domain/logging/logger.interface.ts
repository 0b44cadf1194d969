/**
 * @fileoverview ILogger - Logging Port
 *
 * @packageDocumentation
 * @module @tessera/core/domain/logging
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * The container and the mediator only ever talk to this interface. Adapters
 * (console, pino, winston, ...) live outside the domain.
 *
 * @version 1.0.0
 */

import { type ServiceToken, createToken } from '../di/service-identifier';

/**
 * Minimal logger contract.
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Log levels, lowest first.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Numeric rank of each level.
 *
 * @internal
 */
export const LOG_LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Dependency injection token for ILogger.
 *
 * @example
 * ```typescript
 * services.addSingletonInstance(LOGGER_TOKEN, new ConsoleLogger({ level: 'debug' }));
 *
 * class PaymentService {
 *   static inject = [LOGGER_TOKEN] as const;
 *   constructor(private readonly logger: ILogger) {}
 * }
 * ```
 */
export const LOGGER_TOKEN: ServiceToken<ILogger> = createToken<ILogger>('ILogger');
