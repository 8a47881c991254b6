/**
 * @fileoverview Domain Dispatch Module Exports
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/dispatch
 * @license Apache-2.0
 */

export {
  type MessageKind,
  type Message,
  type MessageDefinition,
  type CommandDefinition,
  type QueryDefinition,
  type Command,
  type Query,
  type PayloadOf,
  type ResultOf,
  defineCommand,
  defineQuery,
  isMessage,
} from './message';

export {
  type CommandContext,
  type QueryContext,
  type HandlerContext,
  type HandlerFunction,
  type IMessageHandler,
  type ICommandHandler,
  type IQueryHandler,
  type HandlerBinding,
  type CacheOptions,
  type HandlerOptions,
  type PayloadValidation,
  type HandlerRegistration,
  type NextFunction,
  type MiddlewareContext,
  type Middleware,
  type DispatchOptions,
  type IUseCaseDispatcher,
  DISPATCHER_TOKEN,
} from './handler.interface';

export {
  DispatchError,
  DuplicateHandlerError,
  UnregisteredHandlerError,
  ValidationError,
  DispatchCancelledError,
} from './dispatch.errors';
