/**
 * @fileoverview Infrastructure Logging Module Exports
 *
 * @module @tessera/core/infrastructure/logging
 * @license Apache-2.0
 */

export { ConsoleLogger, silentLogger, type IConsoleLoggerOptions } from './console-logger';
