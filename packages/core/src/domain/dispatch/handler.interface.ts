/**
 * @fileoverview Handlers and Middleware - Dispatch Contracts
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/dispatch
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * ## Middleware Onion
 *
 * Middleware runs in registration order, each wrapping the next:
 *
 * ```
 * dispatcher.use(loggingMiddleware(log))      // outermost
 *           .use(validationMiddleware())
 *           .use(cachingMiddleware(cache));   // innermost, right before the handler
 *
 * logging ─> validation ─> caching ─> handler
 *    <──────────<─────────────<──────────┘
 * ```
 *
 * @version 1.0.0
 */

import { type ZodIssue, type ZodType, type ZodTypeDef } from 'zod';

import { type IContext } from '../context/context.interface';
import { type Capability, createToken } from '../di/capability';
import { type IScope } from '../di/container.interface';
import { type IReadScope, type IUnitOfWork } from '../uow/unit-of-work.interface';

import { type Message, type MessageDefinition, type MessageKind } from './message';

// ============================================================================
// Handler Context
// ============================================================================

interface HandlerContextBase {
  readonly dispatchId: string;
  readonly traceId: string;
  readonly messageType: string;

  /** Execution context opened for this dispatch */
  readonly execution: IContext;

  /** Dependency scope of this dispatch's Unit of Work or read scope */
  readonly services: IScope;

  /** Aborted when the dispatch is cancelled */
  readonly signal: AbortSignal;
}

/**
 * Context of a command handler.
 */
export interface CommandContext extends HandlerContextBase {
  readonly kind: 'command';
  readonly unitOfWork: IUnitOfWork;
  /** The Unit of Work, seen as a read scope */
  readonly reads: IReadScope;
}

/**
 * Context of a query handler. No Unit of Work: queries never mutate.
 */
export interface QueryContext extends HandlerContextBase {
  readonly kind: 'query';
  readonly reads: IReadScope;
}

export type HandlerContext = CommandContext | QueryContext;

// ============================================================================
// Handlers
// ============================================================================

export type HandlerFunction<TKind extends MessageKind, TPayload, TResult, TContext> = (
  message: Message<TKind, TPayload, TResult>,
  context: TContext,
) => TResult | Promise<TResult>;

/**
 * Object form of a handler, resolved from the dispatch's scope.
 *
 * @example
 * ```typescript
 * class PlaceOrderHandler implements ICommandHandler<PlaceOrderPayload, string> {
 *   static inject = [IClock] as const;
 *
 *   constructor(private readonly clock: IClock) {}
 *
 *   async handle(command: Command<PlaceOrderPayload, string>, context: CommandContext) {
 *     const order = Order.place(command.payload, this.clock.now());
 *     context.unitOfWork.registerNew(order);
 *     return order.id;
 *   }
 * }
 * ```
 */
export interface IMessageHandler<TKind extends MessageKind, TPayload, TResult, TContext> {
  handle(message: Message<TKind, TPayload, TResult>, context: TContext): TResult | Promise<TResult>;
}

export type ICommandHandler<TPayload, TResult = void> = IMessageHandler<
  'command',
  TPayload,
  TResult,
  CommandContext
>;

export type IQueryHandler<TPayload, TResult> = IMessageHandler<'query', TPayload, TResult, QueryContext>;

/**
 * A handler function, or a capability (class with `static inject`,
 * token or string) resolving to an IMessageHandler.
 */
export type HandlerBinding<TKind extends MessageKind, TPayload, TResult, TContext> =
  | HandlerFunction<TKind, TPayload, TResult, TContext>
  | Capability<IMessageHandler<TKind, TPayload, TResult, TContext>>;

// ============================================================================
// Registration
// ============================================================================

export interface CacheOptions {
  /** Tags added to those derived from the entity types the handler read */
  tags?: readonly string[];
  ttlMs?: number;
}

export interface HandlerOptions<TPayload> {
  /**
   * Mark the message cacheable. Commands are only memoised when marked.
   */
  cache?: CacheOptions | boolean;

  /**
   * Payload schema checked by validationMiddleware.
   */
  schema?: ZodType<TPayload, ZodTypeDef, unknown>;
}

export type PayloadValidation =
  | { readonly success: true; readonly data: unknown }
  | { readonly success: false; readonly issues: ZodIssue[] };

/**
 * What middleware can see of a handler registration.
 */
export interface HandlerRegistration {
  readonly kind: MessageKind;
  readonly type: string;
  /** Present when the message is cacheable */
  readonly cache: CacheOptions | undefined;
  /** Present when a schema was registered */
  readonly validate: ((payload: unknown) => PayloadValidation) | undefined;
}

// ============================================================================
// Middleware
// ============================================================================

export type NextFunction = (message: Message) => Promise<unknown>;

export interface MiddlewareContext {
  readonly handler: HandlerContext;
  readonly registration: HandlerRegistration;
  /**
   * Defer `action` until the dispatch's changes are durable: after a
   * command's Unit of Work commits, straight away for a query. Dropped
   * when the command fails or rolls back.
   */
  afterCommit(action: () => void): void;
}

/**
 * Middleware - one layer of the dispatch onion.
 *
 * @remarks
 * May replace the message passed to `next`, short-circuit by not calling
 * it, or translate errors. It must not discard them.
 */
export type Middleware = (
  message: Message,
  context: MiddlewareContext,
  next: NextFunction,
) => Promise<unknown>;

// ============================================================================
// Dispatcher
// ============================================================================

export interface DispatchOptions {
  /** Cancels the dispatch; its Unit of Work is rolled back */
  signal?: AbortSignal;
  /** Trace id to propagate; defaults to the caller's context or a new id */
  traceId?: string;
  userId?: string;
}

export interface IUseCaseDispatcher {
  /**
   * @throws DuplicateHandlerError if the message type already has a handler
   */
  registerHandler<TKind extends MessageKind, TPayload, TResult, TContext extends HandlerContext>(
    definition: MessageDefinition<TKind, TPayload, TResult, TContext>,
    handler: HandlerBinding<TKind, TPayload, TResult, TContext>,
    options?: HandlerOptions<TPayload>,
  ): this;

  use(middleware: Middleware): this;

  /**
   * @throws UnregisteredHandlerError if no handler is registered
   * @throws NestedScopeError for a command dispatched inside a Unit of Work
   * @throws DispatchCancelledError if `options.signal` aborts
   */
  dispatch<TResult>(message: Message<MessageKind, unknown, TResult>, options?: DispatchOptions): Promise<TResult>;

  hasHandler(type: string): boolean;
}

export const DISPATCHER_TOKEN = createToken<IUseCaseDispatcher>('IUseCaseDispatcher');
