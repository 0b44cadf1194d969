/**
 * @fileoverview ConsoleLogger - Console Adapter for ILogger
 *
 * @packageDocumentation
 * @module @tessera/core/infrastructure/logging
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Writes `[LEVEL] message` through the matching `console` method.
 *
 * @version 1.0.0
 */

import { type ILogger, type LogLevel, LOG_LEVEL_RANK } from '../../domain/logging';

/**
 * Options for ConsoleLogger.
 */
export interface IConsoleLoggerOptions {
  /**
   * Messages below this level are dropped.
   *
   * Default: 'info'
   */
  level?: LogLevel;

  /**
   * Text placed between the level tag and the message, e.g. `'[orders]'`.
   */
  prefix?: string;
}

/**
 * Default logger.
 *
 * @example
 * ```typescript
 * const logger = new ConsoleLogger({ level: 'debug', prefix: '[billing]' });
 * logger.debug('charge created', { id: 'ch_1' });
 * // console.debug('[DEBUG] [billing] charge created', { id: 'ch_1' })
 * ```
 */
export class ConsoleLogger implements ILogger {
  private readonly threshold: number;

  private readonly prefix: string;

  constructor(options: IConsoleLoggerOptions = {}) {
    this.threshold = LOG_LEVEL_RANK[options.level ?? 'info'];
    this.prefix = options.prefix ? `${options.prefix} ` : '';
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('debug')) console.debug(`[DEBUG] ${this.prefix}${message}`, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) console.info(`[INFO] ${this.prefix}${message}`, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('warn')) console.warn(`[WARN] ${this.prefix}${message}`, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled('error')) console.error(`[ERROR] ${this.prefix}${message}`, ...args);
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LOG_LEVEL_RANK[level] >= this.threshold;
  }
}

/**
 * Logger that drops everything.
 */
export const silentLogger: ILogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
