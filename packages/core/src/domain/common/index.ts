/**
 * @fileoverview Domain Common Module Exports
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/common
 * @license Apache-2.0
 */

export { FrameworkError, toError } from './framework-error';
