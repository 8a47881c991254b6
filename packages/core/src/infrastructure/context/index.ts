/**
 * @fileoverview Infrastructure Context Module Exports
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/context
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * AsyncLocalStorage implementation of the domain context contracts.
 */

export { ExecutionContext, ExecutionContextProvider } from './execution-context';
