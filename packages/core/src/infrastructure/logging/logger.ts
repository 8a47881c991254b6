/**
 * @fileoverview Logger - Structured Pino Logging
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/logging
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Structured JSON logging for the container, Unit of Work, dispatcher
 * and cache. Every framework component takes a `Logger` in its options and
 * falls back to the module-level default.
 *
 * @version 1.0.0
 */

import pino, { type Logger, type LoggerOptions } from 'pino';
import { z } from 'zod';

import {
  type IContext,
  DISPATCH_ID_KEY,
  MESSAGE_TYPE_KEY,
  TRACE_ID_KEY,
} from '../../domain/context';
import { ConfigurationError } from '../config/configuration.error';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LevelEnvSchema = z.object({ LOG_LEVEL: z.enum(LOG_LEVELS).optional() });

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
  /** Log level (default: from LOG_LEVEL, then NODE_ENV) */
  level?: LogLevel;
  /** Service name bound to every entry */
  serviceName?: string;
}

/**
 * Default level: LOG_LEVEL wins, otherwise silent under test,
 * info in production and debug elsewhere.
 *
 * @throws ConfigurationError if LOG_LEVEL is not one of LOG_LEVELS
 */
export function getDefaultLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const parsed = LevelEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError('environment configuration', parsed.error.issues);
  }
  if (parsed.data.LOG_LEVEL) {
    return parsed.data.LOG_LEVEL;
  }

  switch (env.NODE_ENV) {
    case 'production':
      return 'info';
    case 'test':
      return 'silent';
    default:
      return 'debug';
  }
}

function createLoggerOptions(config: LoggerConfig = {}): LoggerOptions {
  const { level = getDefaultLevel(), serviceName = 'weavearc' } = config;

  return {
    level,
    name: serviceName,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: serviceName,
      env: process.env.NODE_ENV ?? 'development',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    messageKey: 'msg',
  };
}

/**
 * Create a logger instance.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  return pino(createLoggerOptions(config));
}

/**
 * Default logger instance.
 */
export const logger: Logger = createLogger({
  serviceName: process.env.WEAVEARC_SERVICE_NAME ?? 'weavearc',
});

/**
 * Bind trace, dispatch and message identifiers of an execution context.
 *
 * @param parent - Logger to derive from
 * @param context - Context to read; without one the parent is returned
 *
 * @example
 * ```typescript
 * const log = withContext(logger, ExecutionContext.current());
 * log.info('loading order');
 * // {"traceId":"...","dispatchId":"...","msg":"loading order"}
 * ```
 */
export function withContext(parent: Logger, context: IContext | undefined): Logger {
  if (!context) {
    return parent;
  }

  const bindings: Record<string, string> = {};
  const traceId = context.get(TRACE_ID_KEY);
  const dispatchId = context.get(DISPATCH_ID_KEY);
  const messageType = context.get(MESSAGE_TYPE_KEY);

  if (traceId !== undefined) bindings['traceId'] = traceId;
  if (dispatchId !== undefined) bindings['dispatchId'] = dispatchId;
  if (messageType !== undefined) bindings['messageType'] = messageType;

  return parent.child(bindings);
}

export type { Logger, LoggerOptions } from 'pino';
