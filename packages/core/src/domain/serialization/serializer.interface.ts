/**
 * @fileoverview IPayloadSerializer - Serialization Boundary
 *
 * @packageDocumentation
 * @module @weavearc/core/domain/serialization
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Port)
 *
 * The core never encodes data itself. It asks a serializer to
 * canonicalize payloads into fingerprints and to carry cached results.
 *
 * @version 1.0.0
 */

import { createToken } from '../di/capability';

export interface IPayloadSerializer {
  /**
   * Deterministic text for a value: structurally equal values produce
   * equal text regardless of key insertion order.
   */
  canonicalize(value: unknown): string;

  serialize(value: unknown): string;

  /**
   * Inverse of `serialize`.
   */
  deserialize(text: string): unknown;
}

export const PAYLOAD_SERIALIZER_TOKEN = createToken<IPayloadSerializer>('IPayloadSerializer');
