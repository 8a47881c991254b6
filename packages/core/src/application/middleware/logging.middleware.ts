/**
 * @fileoverview loggingMiddleware - Dispatch Lifecycle Logging
 *
 * @packageDocumentation
 * @module @weavearc/core/application/middleware
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 */

import { type Middleware } from '../../domain/dispatch';
import { type Logger, logger as defaultLogger } from '../../infrastructure/logging';

/**
 * Log start, completion with duration, and failure of every dispatch.
 * Register it first to time the whole onion.
 *
 * @example
 * ```
 * {"level":"info","traceId":"...","dispatchId":"...","messageType":"PlaceOrder","durationMs":4,"msg":"Dispatch completed"}
 * ```
 */
export function loggingMiddleware(logger: Logger = defaultLogger): Middleware {
  return async (message, { handler }, next) => {
    const log = logger.child({
      traceId: handler.traceId,
      dispatchId: handler.dispatchId,
      messageType: message.type,
      kind: message.kind,
    });

    const startedAt = Date.now();
    log.debug('Dispatch started');

    try {
      const result = await next(message);
      log.info({ durationMs: Date.now() - startedAt }, 'Dispatch completed');
      return result;
    } catch (error) {
      log.error({ err: error, durationMs: Date.now() - startedAt }, 'Dispatch failed');
      throw error;
    }
  };
}
