/**
 * @fileoverview ExecutionContext - AsyncLocalStorage-based Context Implementation
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Concrete IContext backed by Node.js AsyncLocalStorage. A context opened
 * with `ExecutionContext.run()` follows every Promise chain started inside
 * the callback, so the Unit of Work bound to it is visible to handlers,
 * repositories and scoped services without being passed around.
 *
 * ## Isolation
 *
 * ```
 * dispatch(A) ── ExecutionContext.run() ── UnitOfWork #1 ── IdentityMap #1
 * dispatch(B) ── ExecutionContext.run() ── UnitOfWork #2 ── IdentityMap #2
 * ```
 *
 * Concurrent dispatches never share a store.
 *
 * @version 1.0.0
 */

import { AsyncLocalStorage } from 'async_hooks';

import {
  type IContext,
  type IContextProvider,
  type IExecutionContextData,
  type CancelCallback,
  type ContextKey,
} from '../../domain/context';
import { logger } from '../logging';

/**
 * What AsyncLocalStorage holds for one context. Every handle returned by
 * `current()` inside the same `run()` wraps the same store.
 */
interface ContextStore {
  /** Values keyed by ContextKey id or string key */
  readonly data: Map<string, unknown>;
  readonly cancelCallbacks: Set<CancelCallback>;
  cancelled: boolean;
}

const contextStorage = new AsyncLocalStorage<ContextStore>();

function keyId(key: ContextKey<unknown> | string): string {
  return typeof key === 'string' ? key : key.id;
}

function invokeCancelCallback(callback: CancelCallback): void {
  try {
    const result = callback();
    if (result instanceof Promise) {
      result.catch((error: unknown) => {
        logger.error({ err: error }, 'Error in cancellation callback');
      });
    }
  } catch (error) {
    logger.error({ err: error }, 'Error in cancellation callback');
  }
}

/**
 * ExecutionContext - IContext implementation using AsyncLocalStorage.
 *
 * @template TData - Context data type
 *
 * @example
 * ```typescript
 * await ExecutionContext.run({ traceId: 'abc' }, async () => {
 *   const ctx = ExecutionContext.require();
 *   ctx.set(ATTEMPT, 1);
 *   await dispatcher.dispatch(GetOrder.create({ id: 'o-1' }));
 * });
 * ```
 */
export class ExecutionContext<
  TData extends IExecutionContextData = IExecutionContextData,
> implements IContext<TData> {
  private readonly store: ContextStore;

  private constructor(store: ContextStore) {
    this.store = store;
  }

  // ============================================================================
  // Static Factory Methods
  // ============================================================================

  /**
   * Open a new context scope and run a function within it.
   *
   * @remarks
   * The scope covers the callback and every async operation it starts.
   */
  static run<TData extends IExecutionContextData = IExecutionContextData, R = unknown>(
    initialData: Partial<TData>,
    callback: () => R,
  ): R {
    const data = new Map<string, unknown>();
    for (const [key, value] of Object.entries(initialData)) {
      if (value !== undefined) {
        data.set(key, value);
      }
    }
    return contextStorage.run({ data, cancelCallbacks: new Set(), cancelled: false }, callback);
  }

  static current<TData extends IExecutionContextData = IExecutionContextData>():
    | ExecutionContext<TData>
    | undefined {
    const store = contextStorage.getStore();
    return store ? new ExecutionContext<TData>(store) : undefined;
  }

  /**
   * Get the current context or throw if there is none.
   */
  static require<
    TData extends IExecutionContextData = IExecutionContextData,
  >(): ExecutionContext<TData> {
    const ctx = ExecutionContext.current<TData>();
    if (!ctx) {
      throw new Error(
        'ExecutionContext.require() called outside of a context scope. ' +
          'Wrap the call in ExecutionContext.run() or dispatch it through the UseCaseDispatcher.',
      );
    }
    return ctx;
  }

  static hasContext(): boolean {
    return contextStorage.getStore() !== undefined;
  }

  // ============================================================================
  // Get/Set Operations
  // ============================================================================

  get<T>(key: ContextKey<T>): T | undefined;
  get<K extends keyof TData>(key: K): TData[K] | undefined;
  get(key: ContextKey<unknown> | string): unknown {
    const value = this.store.data.get(keyId(key));

    if (value === undefined && typeof key === 'object' && 'defaultValue' in key) {
      return key.defaultValue;
    }

    return value;
  }

  set<T>(key: ContextKey<T>, value: T): void;
  set<K extends keyof TData>(key: K, value: TData[K]): void;
  set(key: ContextKey<unknown> | string, value: unknown): void {
    this.store.data.set(keyId(key), value);
  }

  has(key: ContextKey<unknown> | string): boolean {
    return this.store.data.has(keyId(key));
  }

  delete(key: ContextKey<unknown> | string): boolean {
    return this.store.data.delete(keyId(key));
  }

  // ============================================================================
  // Cancellation
  // ============================================================================

  isCancelled(): boolean {
    return this.store.cancelled;
  }

  cancel(): void {
    if (this.store.cancelled) {
      return;
    }

    this.store.cancelled = true;

    for (const callback of this.store.cancelCallbacks) {
      invokeCancelCallback(callback);
    }

    this.store.cancelCallbacks.clear();
  }

  onCancel(callback: CancelCallback): () => void {
    if (this.store.cancelled) {
      invokeCancelCallback(callback);
      return () => {};
    }

    this.store.cancelCallbacks.add(callback);

    return () => {
      this.store.cancelCallbacks.delete(callback);
    };
  }
}

/**
 * Default IContextProvider, registered by `createApplication` under
 * CONTEXT_PROVIDER_TOKEN.
 */
export class ExecutionContextProvider<
  TData extends IExecutionContextData = IExecutionContextData,
> implements IContextProvider<TData> {
  run<R>(initialData: Partial<TData>, callback: () => R): R {
    return ExecutionContext.run(initialData, callback);
  }

  current(): ExecutionContext<TData> | undefined {
    return ExecutionContext.current<TData>();
  }

  hasContext(): boolean {
    return ExecutionContext.hasContext();
  }
}
