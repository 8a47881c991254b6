/**
 * @fileoverview QueryCache - In-Memory Tagged Result Store
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/cache
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * ## Invalidation Generations
 *
 * Every `invalidateTags()` and `clear()` advances a global generation and
 * stamps the invalidated tags with it. A write begun at generation `g`
 * is discarded when one of its tags was stamped after `g`:
 *
 * ```
 * t0  beginWrite(fp)            ticket.generation = 4
 * t1  commit mutates 'Order'    invalidateTags(['Order']) -> 'Order' @ 5
 * t2  commitWrite(ticket, v, { tags: ['Order'] })         -> 'stale'
 * ```
 *
 * @version 1.0.0
 */

import {
  type CacheEntry,
  type CacheSetOptions,
  type CacheStats,
  type CacheWriteResult,
  type CacheWriteTicket,
  type IQueryCache,
} from '../../domain/cache';
import { type Logger, logger as defaultLogger } from '../logging';

export interface QueryCacheOptions {
  /** Default validity window (default: 60000) */
  ttlMs?: number;
  /** Oldest entries are evicted past this size (default: 1000) */
  maxEntries?: number;
  /** Clock, for tests */
  now?: () => number;
  logger?: Logger;
}

/**
 * QueryCache - IQueryCache kept in process memory.
 *
 * @remarks
 * Nothing survives a restart. Eviction is by insertion order.
 */
export class QueryCache<V = unknown> implements IQueryCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();

  /** Fingerprints by tag */
  private readonly tagIndex = new Map<string, Set<string>>();

  /** Generation at which each tag was last invalidated */
  private readonly tagGenerations = new Map<string, number>();

  private generation = 0;

  private clearedAt = 0;

  private readonly ttlMs: number;

  private readonly maxEntries: number;

  private readonly now: () => number;

  private readonly log: Logger;

  private readonly counters = {
    hits: 0,
    misses: 0,
    writes: 0,
    discardedWrites: 0,
    evictions: 0,
    invalidations: 0,
  };

  constructor(options: QueryCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? 60_000;
    this.maxEntries = options.maxEntries ?? 1_000;
    this.now = options.now ?? Date.now;
    this.log = (options.logger ?? defaultLogger).child({ component: 'query-cache' });

    if (this.ttlMs <= 0) {
      throw new RangeError(`ttlMs must be positive, got ${this.ttlMs}`);
    }
    if (!Number.isInteger(this.maxEntries) || this.maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${this.maxEntries}`);
    }
  }

  get(fingerprint: string): CacheEntry<V> | undefined {
    const entry = this.live(fingerprint);
    if (entry) {
      this.counters.hits += 1;
    } else {
      this.counters.misses += 1;
    }
    return entry;
  }

  beginWrite(fingerprint: string): CacheWriteTicket {
    return { fingerprint, generation: this.generation };
  }

  commitWrite(ticket: CacheWriteTicket, value: V, options: CacheSetOptions = {}): CacheWriteResult<V> {
    const { fingerprint } = ticket;

    const existing = this.live(fingerprint);
    if (existing) {
      this.counters.discardedWrites += 1;
      return { status: 'lost-race', entry: existing };
    }

    const tags = new Set(options.tags ?? []);
    if (this.invalidatedSince(ticket.generation, tags)) {
      this.counters.discardedWrites += 1;
      this.log.debug({ fingerprint }, 'Discarded cache write invalidated while computing');
      return { status: 'stale' };
    }

    const storedAt = this.now();
    const entry: CacheEntry<V> = {
      fingerprint,
      value,
      tags,
      storedAt,
      expiresAt: storedAt + (options.ttlMs ?? this.ttlMs),
    };

    this.entries.set(fingerprint, entry);
    for (const tag of tags) {
      let fingerprints = this.tagIndex.get(tag);
      if (!fingerprints) {
        fingerprints = new Set();
        this.tagIndex.set(tag, fingerprints);
      }
      fingerprints.add(fingerprint);
    }
    this.counters.writes += 1;

    this.evictOverflow();
    return { status: 'stored', entry };
  }

  set(fingerprint: string, value: V, options?: CacheSetOptions): CacheWriteResult<V> {
    return this.commitWrite(this.beginWrite(fingerprint), value, options);
  }

  invalidateTags(tags: Iterable<string>): number {
    this.generation += 1;

    let removed = 0;
    for (const tag of tags) {
      this.tagGenerations.set(tag, this.generation);

      const fingerprints = this.tagIndex.get(tag);
      if (!fingerprints) {
        continue;
      }
      for (const fingerprint of Array.from(fingerprints)) {
        if (this.remove(fingerprint)) {
          removed += 1;
        }
      }
    }

    this.counters.invalidations += removed;
    if (removed > 0) {
      this.log.debug({ removed }, 'Invalidated cache entries');
    }
    return removed;
  }

  clear(): void {
    this.generation += 1;
    this.clearedAt = this.generation;
    this.entries.clear();
    this.tagIndex.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    return { ...this.counters, size: this.entries.size };
  }

  /**
   * Entry for `fingerprint` unless expired; expired entries are dropped.
   */
  private live(fingerprint: string): CacheEntry<V> | undefined {
    const entry = this.entries.get(fingerprint);
    if (entry && entry.expiresAt <= this.now()) {
      this.remove(fingerprint);
      return undefined;
    }
    return entry;
  }

  private invalidatedSince(generation: number, tags: ReadonlySet<string>): boolean {
    if (this.clearedAt > generation) {
      return true;
    }
    for (const tag of tags) {
      if ((this.tagGenerations.get(tag) ?? 0) > generation) {
        return true;
      }
    }
    return false;
  }

  private remove(fingerprint: string): boolean {
    const entry = this.entries.get(fingerprint);
    if (!entry) {
      return false;
    }

    this.entries.delete(fingerprint);
    for (const tag of entry.tags) {
      const fingerprints = this.tagIndex.get(tag);
      fingerprints?.delete(fingerprint);
      if (fingerprints?.size === 0) {
        this.tagIndex.delete(tag);
      }
    }
    return true;
  }

  private evictOverflow(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        return;
      }
      this.remove(oldest.value);
      this.counters.evictions += 1;
    }
  }
}
