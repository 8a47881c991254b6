/**
 * @fileoverview ContextKey<T> - Type-Safe Context Key
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Core)
 *
 * String keys give no type information back:
 *
 * ```typescript
 * ctx.set('unitOfWork', uow);
 * const uow = ctx.get('unitOfWork'); // unknown
 * ```
 *
 * ContextKey<T> carries the value type at compile time:
 *
 * ```typescript
 * const UNIT_OF_WORK = new ContextKey<IUnitOfWork>('weavearc:unitOfWork');
 * ctx.set(UNIT_OF_WORK, uow);
 * const current = ctx.get(UNIT_OF_WORK); // IUnitOfWork | undefined
 * ```
 *
 * @version 1.0.0
 */

/**
 * Brand used for runtime discrimination.
 * @internal
 */
const CONTEXT_KEY_BRAND = Symbol('ContextKey');

/**
 * ContextKey<T> - A typed key for values stored in an execution context.
 *
 * @template T - The type of value this key stores
 *
 * @remarks
 * The key wraps a string id (the actual Map key) and a phantom type.
 * Instances are frozen and safe to share across async boundaries.
 *
 * @example
 * ```typescript
 * const ATTEMPT = new ContextKey<number>('attempt', { defaultValue: 1 });
 *
 * ctx.get(ATTEMPT); // 1 until set
 * ctx.set(ATTEMPT, 2);
 * ```
 */
export class ContextKey<T> {
  /** @internal */
  readonly [CONTEXT_KEY_BRAND]: true = true;

  /**
   * Unique identifier, used as the key in the underlying store.
   */
  readonly id: string;

  readonly description?: string;

  /**
   * Returned by `get()` when the key has no stored value.
   */
  readonly defaultValue?: T;

  /**
   * Phantom field carrying the value type. Never set at runtime.
   * @internal
   */
  declare readonly _type: T;

  constructor(
    id: string,
    options?: {
      description?: string;
      defaultValue?: T;
    },
  ) {
    this.id = id;
    if (options?.description !== undefined) this.description = options.description;
    if (options?.defaultValue !== undefined) this.defaultValue = options.defaultValue;
    Object.freeze(this);
  }

  toString(): string {
    return `ContextKey(${this.id})`;
  }

  static isContextKey(value: unknown): value is ContextKey<unknown> {
    return (
      typeof value === 'object' &&
      value !== null &&
      CONTEXT_KEY_BRAND in value &&
      (value as Record<symbol, unknown>)[CONTEXT_KEY_BRAND] === true
    );
  }
}

/**
 * Extract the value type from a ContextKey.
 *
 * @example
 * ```typescript
 * type Attempt = ContextKeyValue<typeof ATTEMPT>; // number
 * ```
 */
export type ContextKeyValue<K> = K extends ContextKey<infer V> ? V : never;

// ============================================================================
// Pre-defined Context Keys
// ============================================================================

// Ids match the string fields of IExecutionContextData, so
// `ctx.get(TRACE_ID_KEY)` and `ctx.get('traceId')` read the same slot.

/**
 * Distributed tracing correlation ID.
 */
export const TRACE_ID_KEY = new ContextKey<string>('traceId', {
  description: 'Distributed tracing correlation ID',
});

/**
 * Identifier of the dispatch that opened the context.
 */
export const DISPATCH_ID_KEY = new ContextKey<string>('dispatchId', {
  description: 'Unique identifier of the current dispatch',
});

/**
 * Type of the message being dispatched.
 */
export const MESSAGE_TYPE_KEY = new ContextKey<string>('messageType', {
  description: 'Command or query type of the current dispatch',
});

export const USER_ID_KEY = new ContextKey<string>('userId', {
  description: 'Authenticated user identifier',
});

export const TIMESTAMP_KEY = new ContextKey<number>('timestamp', {
  description: 'Context start timestamp (epoch ms)',
});
