/**
 * @fileoverview Message Fingerprints
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/cache
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * @version 1.0.0
 */

import { createHash } from 'crypto';

import { type IPayloadSerializer } from '../../domain/serialization';

/**
 * Cache key of a message: SHA-256 (hex) of its type and canonical payload.
 *
 * @example
 * ```typescript
 * fingerprint('GetOrder', { id: 'o-1' }, serializer);
 * // sha256('GetOrder\n{"id":"o-1"}')
 * ```
 */
export function fingerprint(type: string, payload: unknown, serializer: IPayloadSerializer): string {
  return createHash('sha256')
    .update(`${type}\n${serializer.canonicalize(payload)}`)
    .digest('hex');
}
