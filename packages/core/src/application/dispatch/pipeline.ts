/**
 * @fileoverview Middleware Pipeline Composition
 *
 * @packageDocumentation
 * @module @weavearc/core/application/dispatch
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * @version 1.0.0
 */

import {
  type Middleware,
  type MiddlewareContext,
  type NextFunction,
} from '../../domain/dispatch';

/**
 * Fold middleware around a terminal step. The first middleware is the
 * outermost.
 *
 * @throws Error from the returned function if a middleware calls `next`
 *   more than once
 *
 * @example
 * ```typescript
 * const run = composeMiddleware([logging, validation], context, (message) => handler(message));
 * await run(message);
 * ```
 */
export function composeMiddleware(
  middlewares: readonly Middleware[],
  context: MiddlewareContext,
  terminal: NextFunction,
): NextFunction {
  return middlewares.reduceRight<NextFunction>((next, middleware) => {
    return (message) => {
      let called = false;
      const guardedNext: NextFunction = (forwarded) => {
        if (called) {
          return Promise.reject(new Error('next() called multiple times'));
        }
        called = true;
        return next(forwarded);
      };
      return middleware(message, context, guardedNext);
    };
  }, terminal);
}
