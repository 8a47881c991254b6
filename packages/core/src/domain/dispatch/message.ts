/**
 * @fileoverview Messages - Commands, Queries and Their Definitions
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/dispatch
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A message is a frozen `{ kind, type, payload }` value describing one
 * intended use-case invocation. Messages are created from definitions,
 * which carry the payload and result types to the dispatcher:
 *
 * ```typescript
 * const PlaceOrder = defineCommand<{ sku: string; quantity: number }, string>('PlaceOrder');
 * const GetOrder = defineQuery<{ id: string }, OrderView | undefined>('GetOrder');
 *
 * const orderId = await dispatcher.dispatch(PlaceOrder.create({ sku: 'A-1', quantity: 2 }));
 * //    ^? string
 * ```
 *
 * @version 1.0.0
 */

import { type CommandContext, type HandlerContext, type QueryContext } from './handler.interface';

export type MessageKind = 'command' | 'query';

/**
 * Message - Immutable use-case invocation.
 *
 * @template TKind - 'command' or 'query'
 * @template TPayload - Payload type
 * @template TResult - Result type of the handler
 *
 * @remarks
 * The message object itself is frozen; the payload is not copied.
 */
export interface Message<TKind extends MessageKind = MessageKind, TPayload = unknown, TResult = unknown> {
  readonly kind: TKind;
  readonly type: string;
  readonly payload: TPayload;

  /**
   * Result type carrier. Never present at runtime.
   * @internal
   */
  readonly __result?: TResult;
}

/**
 * MessageDefinition - Typed factory and matcher for one message type.
 */
export interface MessageDefinition<
  TKind extends MessageKind,
  TPayload,
  TResult,
  TContext extends HandlerContext,
> {
  readonly kind: TKind;
  readonly type: string;

  create(payload: TPayload): Message<TKind, TPayload, TResult>;

  /**
   * True when `message` was created by a definition of the same kind and
   * type.
   */
  is(message: Message): message is Message<TKind, TPayload, TResult>;

  /**
   * Narrow a dispatch context to the one handlers of this definition
   * receive.
   * @internal
   */
  contextFor(context: HandlerContext): TContext;
}

export type CommandDefinition<TPayload, TResult = void> = MessageDefinition<
  'command',
  TPayload,
  TResult,
  CommandContext
>;

export type QueryDefinition<TPayload, TResult> = MessageDefinition<
  'query',
  TPayload,
  TResult,
  QueryContext
>;

export type Command<TPayload = unknown, TResult = unknown> = Message<'command', TPayload, TResult>;

export type Query<TPayload = unknown, TResult = unknown> = Message<'query', TPayload, TResult>;

export type PayloadOf<D> = D extends MessageDefinition<MessageKind, infer P, unknown, HandlerContext> ? P : never;

export type ResultOf<D> = D extends MessageDefinition<MessageKind, unknown, infer R, HandlerContext> ? R : never;

function defineMessage<TKind extends MessageKind, TPayload, TResult, TContext extends HandlerContext>(
  kind: TKind,
  type: string,
  contextFor: (context: HandlerContext) => TContext,
): MessageDefinition<TKind, TPayload, TResult, TContext> {
  if (type.trim() === '') {
    throw new TypeError('Message type must be a non-empty string');
  }

  const definition: MessageDefinition<TKind, TPayload, TResult, TContext> = {
    kind,
    type,
    create: (payload) => {
      const message: Message<TKind, TPayload, TResult> = { kind, type, payload };
      return Object.freeze(message);
    },
    is: (message): message is Message<TKind, TPayload, TResult> =>
      message.kind === kind && message.type === type,
    contextFor,
  };

  return Object.freeze(definition);
}

/**
 * Define a command: a message handled inside a Unit of Work whose pending
 * changes are committed when the handler returns.
 */
export function defineCommand<TPayload, TResult = void>(
  type: string,
): CommandDefinition<TPayload, TResult> {
  return defineMessage<'command', TPayload, TResult, CommandContext>('command', type, (context) => {
    if (context.kind !== 'command') {
      throw new TypeError(`Command '${type}' cannot be handled in a ${context.kind} context`);
    }
    return context;
  });
}

/**
 * Define a query: a read-only message handled inside a read scope.
 */
export function defineQuery<TPayload, TResult>(type: string): QueryDefinition<TPayload, TResult> {
  return defineMessage<'query', TPayload, TResult, QueryContext>('query', type, (context) => {
    if (context.kind !== 'query') {
      throw new TypeError(`Query '${type}' cannot be handled in a ${context.kind} context`);
    }
    return context;
  });
}

export function isMessage(value: unknown): value is Message {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    (value.kind === 'command' || value.kind === 'query') &&
    'type' in value &&
    typeof value.type === 'string' &&
    'payload' in value
  );
}
