/**
 * @fileoverview FrameworkError - Common Error Base
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/common
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Every error raised by the framework extends FrameworkError, so callers
 * can branch on `instanceof FrameworkError` or on the stable `code`:
 *
 * ```typescript
 * try {
 *   await dispatcher.dispatch(PlaceOrder.create(payload));
 * } catch (error) {
 *   if (error instanceof FrameworkError && error.code === 'PARTIAL_COMMIT') {
 *     // ...
 *   }
 *   throw error;
 * }
 * ```
 *
 * @version 1.0.0
 */

export abstract class FrameworkError extends Error {
  /**
   * Stable, machine-readable error code.
   */
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Normalise a thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
