/**
 * @fileoverview IContext - Execution Context Abstraction
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Core)
 *
 * This interface defines the contract for the per-dispatch execution
 * context without specifying HOW it is stored or propagated. The
 * AsyncLocalStorage implementation lives in the Infrastructure layer.
 *
 * Every dispatch runs inside its own execution context. The context is
 * where the active Unit of Work and its service scope are bound, which is
 * what keeps concurrent dispatches from seeing each other's entities.
 *
 * ```
 * Domain Layer (this file)
 *     ↑ depends on nothing external
 *     |
 * Application Layer
 *     ↑ depends on Domain interfaces
 *     |
 * Infrastructure Layer
 *     ↑ implements Domain interfaces
 * ```
 *
 * @version 1.0.0
 */

import { type ContextKey } from './context-key';

/**
 * Standard data carried by an execution context.
 *
 * @remarks
 * Extend it for application-specific fields:
 *
 * ```typescript
 * interface TenantContextData extends IExecutionContextData {
 *   tenantId: string;
 * }
 * ```
 */
export interface IExecutionContextData {
  /** Distributed tracing correlation ID */
  traceId?: string;

  /** Unique identifier of the dispatch that opened this context */
  dispatchId?: string;

  /** Message type being dispatched */
  messageType?: string;

  /** Authenticated user identifier */
  userId?: string;

  /** Context start timestamp (epoch milliseconds) */
  timestamp?: number;

  /** Additional custom properties */
  [key: string]: unknown;
}

/**
 * Cancellation callback function type.
 * Called when context is cancelled.
 */
export type CancelCallback = () => void | Promise<void>;

/**
 * IContext - Execution context contract.
 *
 * @template TData - Type of context data
 *
 * @remarks
 * Two access patterns are supported:
 *
 * 1. **Type-Safe Access (Recommended)**: `ctx.get(UNIT_OF_WORK_KEY)`
 * 2. **String Key Access**: `ctx.get('traceId')`, typed through `TData`
 *
 * Cancellation is cooperative. A cancelled context runs its registered
 * callbacks once; the Unit of Work registers one that rolls it back.
 */
export interface IContext<TData extends IExecutionContextData = IExecutionContextData> {
  /**
   * Get a value using a type-safe ContextKey.
   * Returns the key's default value when nothing is stored.
   */
  get<T>(key: ContextKey<T>): T | undefined;

  /** Get a value using a string key typed through TData. */
  get<K extends keyof TData>(key: K): TData[K] | undefined;

  /** Set a value using a type-safe ContextKey. */
  set<T>(key: ContextKey<T>, value: T): void;

  /** Set a value using a string key typed through TData. */
  set<K extends keyof TData>(key: K, value: TData[K]): void;

  has(key: ContextKey<unknown> | string): boolean;

  delete(key: ContextKey<unknown> | string): boolean;

  isCancelled(): boolean;

  /**
   * Cancel this context and invoke every registered callback once.
   * Cancellation is irreversible.
   */
  cancel(): void;

  /**
   * Register a callback to run on cancellation.
   *
   * @returns Unsubscribe function
   *
   * @remarks
   * If the context is already cancelled the callback runs immediately.
   */
  onCancel(callback: CancelCallback): () => void;
}

/**
 * IContextProvider - Factory for execution contexts.
 *
 * @remarks
 * Application code that must open contexts depends on this interface
 * rather than on the AsyncLocalStorage implementation.
 */
export interface IContextProvider<TData extends IExecutionContextData = IExecutionContextData> {
  run<R>(initialData: Partial<TData>, callback: () => R): R;

  current(): IContext<TData> | undefined;

  hasContext(): boolean;
}

/**
 * Dependency injection token for IContextProvider.
 */
export const CONTEXT_PROVIDER_TOKEN = Symbol('IContextProvider');
