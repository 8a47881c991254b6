/**
 * @fileoverview Handler Binding - Functions and Capabilities as Handlers
 *
 * @packageDocumentation
 * @module @weavearc/core/application/dispatch
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * @version 1.0.0
 */

import { type Constructor } from '../../domain/di';
import {
  type HandlerBinding,
  type HandlerContext,
  type HandlerFunction,
  type IMessageHandler,
  type Message,
  type MessageKind,
} from '../../domain/dispatch';

/** @internal */
export type BoundHandler<TKind extends MessageKind, TPayload, TResult, TContext> = (
  message: Message<TKind, TPayload, TResult>,
  context: TContext,
) => Promise<TResult>;

/**
 * A class with a `handle` method on its prototype is a handler class; any
 * other function is a handler function.
 */
function isHandlerClass<TKind extends MessageKind, TPayload, TResult, TContext>(
  binding:
    | HandlerFunction<TKind, TPayload, TResult, TContext>
    | Constructor<IMessageHandler<TKind, TPayload, TResult, TContext>>,
): binding is Constructor<IMessageHandler<TKind, TPayload, TResult, TContext>> {
  const prototype: unknown = binding.prototype;
  return (
    typeof prototype === 'object' &&
    prototype !== null &&
    'handle' in prototype &&
    typeof prototype.handle === 'function'
  );
}

/**
 * Turn a binding into a uniform async call. Capability handlers are
 * resolved from the dispatch's scope on every call.
 *
 * @internal
 */
export function bindHandler<
  TKind extends MessageKind,
  TPayload,
  TResult,
  TContext extends HandlerContext,
>(
  binding: HandlerBinding<TKind, TPayload, TResult, TContext>,
): BoundHandler<TKind, TPayload, TResult, TContext> {
  if (typeof binding !== 'function' || isHandlerClass(binding)) {
    const capability = binding;
    return async (message, context) => {
      const handler = await context.services.resolveAsync<
        IMessageHandler<TKind, TPayload, TResult, TContext>
      >(capability);
      return handler.handle(message, context);
    };
  }

  const handle = binding;
  return async (message, context) => handle(message, context);
}
