/**
 * @fileoverview cachingMiddleware - Fingerprint Memoisation of Results
 *
 * @packageDocumentation
 * @module @weavearc/core/application/middleware
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Register it last so it sits right around the handler:
 *
 * ```
 * hit   -> deserialize the stored result, handler not called
 * miss  -> beginWrite, run handler, commitWrite(serialized result, tags)
 *          tags = declared tags + entity types the query read
 *          a command's write waits until its Unit of Work has committed
 * ```
 *
 * @version 1.0.0
 */

import { type CacheWriteResult, type IQueryCache } from '../../domain/cache';
import { type Middleware } from '../../domain/dispatch';
import { type IPayloadSerializer } from '../../domain/serialization';
import { fingerprint } from '../../infrastructure/cache';
import { type Logger, logger as defaultLogger } from '../../infrastructure/logging';

export interface CachingMiddlewareOptions {
  logger?: Logger;
}

/**
 * Serve and store results of messages registered with `cache`.
 *
 * @remarks
 * Results are stored serialized; every hit returns a fresh copy. A
 * command's entry is tagged with its declared tags only, since the types
 * it reads are usually the ones its own commit invalidates. It is stored
 * only once that commit succeeds.
 */
export function cachingMiddleware(
  cache: IQueryCache<string>,
  serializer: IPayloadSerializer,
  options: CachingMiddlewareOptions = {},
): Middleware {
  const log = (options.logger ?? defaultLogger).child({ component: 'caching-middleware' });

  return async (message, { handler, registration, afterCommit }, next) => {
    const cacheOptions = registration.cache;
    if (!cacheOptions) {
      return next(message);
    }

    const fp = fingerprint(message.type, message.payload, serializer);
    const hit = cache.get(fp);
    if (hit) {
      log.debug({ messageType: message.type, dispatchId: handler.dispatchId }, 'Cache hit');
      return serializer.deserialize(hit.value);
    }

    const ticket = cache.beginWrite(fp);
    const result = await next(message);

    const tags = new Set(cacheOptions.tags ?? []);
    if (handler.kind === 'query') {
      for (const type of handler.reads.readTypes()) {
        tags.add(type);
      }
    }

    const serialized = serializer.serialize(result);
    const store = (): CacheWriteResult<string> => {
      const outcome = cache.commitWrite(ticket, serialized, { tags, ttlMs: cacheOptions.ttlMs });
      if (outcome.status === 'stale') {
        log.debug({ messageType: message.type }, 'Result invalidated while computing; not cached');
      }
      return outcome;
    };

    if (handler.kind === 'command') {
      afterCommit(() => {
        store();
      });
      return result;
    }

    const outcome = store();
    return outcome.status === 'lost-race' ? serializer.deserialize(outcome.entry.value) : result;
  };
}
