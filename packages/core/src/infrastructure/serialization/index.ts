/**
 * @fileoverview Infrastructure Serialization Module Exports
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/serialization
 * @license Apache-2.0
 */

export {
  SerializationError,
  SuperJsonSerializer,
  type SerializableClass,
} from './superjson.serializer';
