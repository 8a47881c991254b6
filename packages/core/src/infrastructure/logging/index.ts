/**
 * @fileoverview Infrastructure Logging Module Exports
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/logging
 * @license Apache-2.0
 */

export {
  type LogLevel,
  type Logger,
  type LoggerOptions,
  type LoggerConfig,
  LOG_LEVELS,
  createLogger,
  getDefaultLevel,
  logger,
  withContext,
} from './logger';
