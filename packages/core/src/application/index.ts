/**
 * @fileoverview Application Layer Exports
 *
 * Use-case dispatch, built-in middleware and the composition root.
 *
 * @module @weavearc/core/application
 * @license Apache-2.0
 */

export * from './dispatch';
export * from './middleware';
export * from './bootstrap';
