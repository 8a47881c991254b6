/**
 * @fileoverview UseCaseDispatcher - Commands and Queries Through Middleware
 *
 * @packageDocumentation
 * @module @weavearc/core/application/dispatch
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * ## Dispatch Lifecycle
 *
 * ```
 * dispatch(message)
 *   1. look up the handler               -> UnregisteredHandlerError
 *   2. command inside a Unit of Work     -> NestedScopeError
 *   3. open an execution context (traceId, dispatchId, messageType)
 *   4. command: begin a Unit of Work     query: begin a read scope
 *   5. middleware onion -> handler
 *   6. command: commit (PartialCommitError on failure)
 *      query:   close the read scope
 *   on error: roll back, rethrow unchanged
 * ```
 *
 * ## Cancellation
 *
 * Aborting `options.signal` cancels the dispatch's execution context,
 * which rolls back its Unit of Work, and rejects the dispatch with
 * DispatchCancelledError without waiting for the handler.
 *
 * @version 1.0.0
 */

import { randomUUID } from 'crypto';

import { type IContext, TRACE_ID_KEY, USER_ID_KEY } from '../../domain/context';
import {
  type CommandContext,
  type DispatchOptions,
  type HandlerBinding,
  type HandlerContext,
  type HandlerOptions,
  type HandlerRegistration,
  type IUseCaseDispatcher,
  type Message,
  type MessageDefinition,
  type MessageKind,
  type Middleware,
  type PayloadValidation,
  type QueryContext,
  type CacheOptions,
  DispatchCancelledError,
  DuplicateHandlerError,
  UnregisteredHandlerError,
} from '../../domain/dispatch';
import {
  type IUnitOfWork,
  type IUnitOfWorkFactory,
  NestedScopeError,
  UNIT_OF_WORK_KEY,
  UnitOfWorkState,
} from '../../domain/uow';
import { ExecutionContext } from '../../infrastructure/context';
import { type Logger, logger as defaultLogger, withContext } from '../../infrastructure/logging';

import { bindHandler } from './handler-binding';
import { composeMiddleware } from './pipeline';

interface DispatchIds {
  readonly dispatchId: string;
  readonly traceId: string;
  readonly signal: AbortSignal | undefined;
}

interface RegisteredHandler extends HandlerRegistration {
  invoke(message: Message, context: HandlerContext): Promise<unknown>;
}

export interface UseCaseDispatcherOptions {
  unitOfWorkFactory: IUnitOfWorkFactory;
  logger?: Logger;
  /** Dispatch and trace id generator (default: randomUUID) */
  generateId?: () => string;
}

function normalizeCacheOptions(cache: CacheOptions | boolean | undefined): CacheOptions | undefined {
  if (cache === undefined || cache === false) {
    return undefined;
  }
  return cache === true ? {} : cache;
}

/**
 * UseCaseDispatcher - IUseCaseDispatcher implementation.
 *
 * @example
 * ```typescript
 * const dispatcher = new UseCaseDispatcher({ unitOfWorkFactory })
 *   .use(loggingMiddleware(logger))
 *   .use(validationMiddleware())
 *   .registerHandler(PlaceOrder, PlaceOrderHandler, { schema: PlaceOrderSchema })
 *   .registerHandler(GetOrder, getOrder, { cache: { ttlMs: 30_000 } });
 *
 * const orderId = await dispatcher.dispatch(PlaceOrder.create({ sku: 'A-1', quantity: 2 }));
 * ```
 */
export class UseCaseDispatcher implements IUseCaseDispatcher {
  private readonly handlers = new Map<string, RegisteredHandler>();

  private readonly middlewares: Middleware[] = [];

  private readonly unitOfWorkFactory: IUnitOfWorkFactory;

  private readonly log: Logger;

  private readonly generateId: () => string;

  constructor(options: UseCaseDispatcherOptions) {
    this.unitOfWorkFactory = options.unitOfWorkFactory;
    this.log = (options.logger ?? defaultLogger).child({ component: 'dispatcher' });
    this.generateId = options.generateId ?? randomUUID;
  }

  // ============================================================================
  // Registration
  // ============================================================================

  registerHandler<TKind extends MessageKind, TPayload, TResult, TContext extends HandlerContext>(
    definition: MessageDefinition<TKind, TPayload, TResult, TContext>,
    handler: HandlerBinding<TKind, TPayload, TResult, TContext>,
    options: HandlerOptions<TPayload> = {},
  ): this {
    if (this.handlers.has(definition.type)) {
      throw new DuplicateHandlerError(definition.type);
    }

    const call = bindHandler(handler);
    const { schema } = options;

    this.handlers.set(definition.type, {
      kind: definition.kind,
      type: definition.type,
      cache: normalizeCacheOptions(options.cache),
      validate: schema
        ? (payload): PayloadValidation => {
            const result = schema.safeParse(payload);
            return result.success
              ? { success: true, data: result.data }
              : { success: false, issues: result.error.issues };
          }
        : undefined,
      invoke: async (message, context) => {
        if (!definition.is(message)) {
          throw new TypeError(
            `Handler of ${definition.kind} '${definition.type}' received ${message.kind} '${message.type}'`,
          );
        }
        return call(message, definition.contextFor(context));
      },
    });

    this.log.debug({ messageType: definition.type, kind: definition.kind }, 'Handler registered');
    return this;
  }

  use(middleware: Middleware): this {
    this.middlewares.push(middleware);
    return this;
  }

  hasHandler(type: string): boolean {
    return this.handlers.has(type);
  }

  // ============================================================================
  // Dispatch
  // ============================================================================

  async dispatch<TResult>(
    message: Message<MessageKind, unknown, TResult>,
    options: DispatchOptions = {},
  ): Promise<TResult> {
    const registration = this.handlers.get(message.type);
    if (!registration || registration.kind !== message.kind) {
      throw new UnregisteredHandlerError(message.type);
    }

    const outer = ExecutionContext.current();
    if (message.kind === 'command') {
      const active = outer?.get(UNIT_OF_WORK_KEY);
      if (active?.isActive()) {
        throw new NestedScopeError(active.id);
      }
    }

    const dispatchId = this.generateId();
    const traceId = options.traceId ?? outer?.get(TRACE_ID_KEY) ?? this.generateId();

    if (options.signal?.aborted) {
      throw new DispatchCancelledError(message.type, dispatchId, options.signal.reason);
    }

    const result = await ExecutionContext.run(
      {
        traceId,
        dispatchId,
        messageType: message.type,
        userId: options.userId ?? outer?.get(USER_ID_KEY),
        timestamp: Date.now(),
      },
      () => this.execute(message, registration, { dispatchId, traceId, signal: options.signal }),
    );

    // The registration was looked up by the message's own type
    return result as TResult;
  }

  private async execute(
    message: Message,
    registration: RegisteredHandler,
    dispatch: DispatchIds,
  ): Promise<unknown> {
    const { signal } = dispatch;
    const execution = ExecutionContext.require();
    const log = withContext(this.log, execution);

    if (registration.kind === 'command') {
      const unitOfWork = this.unitOfWorkFactory.begin();
      const context: CommandContext = {
        kind: 'command',
        unitOfWork,
        reads: unitOfWork,
        ...this.describe(message, execution, unitOfWork.scope, dispatch),
      };

      const committed: (() => void)[] = [];
      try {
        const result = await this.runPipeline(message, context, registration, signal, (action) => {
          committed.push(action);
        });
        if (unitOfWork.isActive()) {
          await unitOfWork.commit();
        }
        if (unitOfWork.state === UnitOfWorkState.Committed) {
          this.runAfterCommit(committed, log);
        }
        return result;
      } catch (error) {
        await this.abandon(unitOfWork, log);
        throw error;
      }
    }

    const reads = this.unitOfWorkFactory.beginRead();
    const context: QueryContext = {
      kind: 'query',
      reads,
      ...this.describe(message, execution, reads.scope, dispatch),
    };

    try {
      return await this.runPipeline(message, context, registration, signal, (action) => {
        this.runAfterCommit([action], log);
      });
    } finally {
      await reads.close();
    }
  }

  private describe(
    message: Message,
    execution: IContext,
    services: HandlerContext['services'],
    { dispatchId, traceId }: DispatchIds,
  ): Omit<CommandContext, 'kind' | 'unitOfWork' | 'reads'> {
    // Aborted when the execution context is cancelled, which an aborted
    // dispatch signal does
    const controller = new AbortController();
    execution.onCancel(() => controller.abort());

    return {
      dispatchId,
      traceId,
      messageType: message.type,
      execution,
      services,
      signal: controller.signal,
    };
  }

  /**
   * Run the middleware onion, racing it against `signal`.
   */
  private runPipeline(
    message: Message,
    context: HandlerContext,
    registration: RegisteredHandler,
    signal: AbortSignal | undefined,
    afterCommit: (action: () => void) => void,
  ): Promise<unknown> {
    const run = composeMiddleware(
      this.middlewares,
      { handler: context, registration, afterCommit },
      (forwarded) => registration.invoke(forwarded, context),
    );

    const pending = run(message);
    if (!signal) {
      return pending;
    }

    return new Promise((resolve, reject) => {
      let cancelled = false;

      const onAbort = (): void => {
        cancelled = true;
        context.execution.cancel();
        reject(new DispatchCancelledError(message.type, context.dispatchId, signal.reason));
      };
      signal.addEventListener('abort', onAbort, { once: true });

      pending.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          if (cancelled) {
            this.log.debug(
              { err: error, dispatchId: context.dispatchId },
              'Cancelled handler settled with an error',
            );
          }
          reject(error);
        },
      );
    });
  }

  /**
   * Run actions middleware deferred until the commit. The commit stands
   * whatever they do, so a failing action is logged, not rethrown.
   */
  private runAfterCommit(actions: readonly (() => void)[], log: Logger): void {
    for (const action of actions) {
      try {
        action();
      } catch (error) {
        log.error({ err: error }, 'After-commit action failed');
      }
    }
  }

  /**
   * Roll back after a failure unless the Unit of Work already finished.
   */
  private async abandon(unitOfWork: IUnitOfWork, log: Logger): Promise<void> {
    if (unitOfWork.state === UnitOfWorkState.Committed || unitOfWork.state === UnitOfWorkState.Committing) {
      return;
    }
    await unitOfWork.rollback();
    log.debug({ unitOfWorkId: unitOfWork.id }, 'Dispatch failed; Unit of Work rolled back');
  }
}
