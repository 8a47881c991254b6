/**
 * @fileoverview Domain Serialization Module Exports
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/serialization
 * @license Apache-2.0
 */

export { type IPayloadSerializer, PAYLOAD_SERIALIZER_TOKEN } from './serializer.interface';
