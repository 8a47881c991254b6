/**
 * @fileoverview Domain Context Module Exports
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/context
 * @license Apache-2.0
 */

// ============================================================================
// ContextKey - Type-Safe Context Keys
// ============================================================================

export {
  ContextKey,
  type ContextKeyValue,
  // Pre-defined keys
  TRACE_ID_KEY,
  DISPATCH_ID_KEY,
  MESSAGE_TYPE_KEY,
  USER_ID_KEY,
  TIMESTAMP_KEY,
} from './context-key';

// ============================================================================
// IContext - Context Interface
// ============================================================================

export {
  type IContext,
  type IContextProvider,
  type IExecutionContextData,
  type CancelCallback,
  CONTEXT_PROVIDER_TOKEN,
} from './context.interface';
