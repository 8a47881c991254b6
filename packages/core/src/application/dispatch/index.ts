/**
 * @fileoverview Application Dispatch Module Exports
 *
 * @packageDocumentation
 * @module @weavearc/core/application/dispatch
 * @license Apache-2.0
 */

export { UseCaseDispatcher, type UseCaseDispatcherOptions } from './use-case-dispatcher';

export { composeMiddleware } from './pipeline';
