/**
 * @fileoverview Domain Logging Module Exports
 *
 * @module @tessera/core/domain/logging
 * @license Apache-2.0
 */

export { type ILogger, type LogLevel, LOG_LEVEL_RANK, LOGGER_TOKEN } from './logger.interface';
