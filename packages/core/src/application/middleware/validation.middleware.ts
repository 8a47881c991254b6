/**
 * @fileoverview validationMiddleware - Payload Schema Check
 *
 * @packageDocumentation
 * @module @weavearc/core/application/middleware
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 */

import { type Middleware, ValidationError } from '../../domain/dispatch';

/**
 * Check payloads against the zod schema given to `registerHandler`.
 *
 * @remarks
 * The handler receives the parsed payload, so schema defaults and
 * transforms apply. Messages registered without a schema pass through.
 *
 * @throws ValidationError before the handler runs
 */
export function validationMiddleware(): Middleware {
  return async (message, { registration }, next) => {
    const { validate } = registration;
    if (!validate) {
      return next(message);
    }

    const result = validate(message.payload);
    if (!result.success) {
      throw new ValidationError(message.type, result.issues);
    }

    return next(Object.freeze({ ...message, payload: result.data }));
  };
}
