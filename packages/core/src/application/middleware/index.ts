/**
 * @fileoverview Application Middleware Module Exports
 *
 * @packageDocumentation
 * @module @weavearc/core/application/middleware
 * @license Apache-2.0
 */

export { validationMiddleware } from './validation.middleware';

export { cachingMiddleware, type CachingMiddlewareOptions } from './caching.middleware';

export { loggingMiddleware } from './logging.middleware';
