/**
 * LRU (Least Recently Used) Cache with a staleness ceiling
 *
 * Age is measured on a logical clock rather than wall time: every hit or
 * insert advances the clock by one tick and stamps the touched entry with it,
 * so the most recently used entry always has age 0. An entry whose age
 * (`clock - lastAccess`) exceeds `maxAge` is evicted even when the cache is
 * under capacity.
 */

import { getLogger } from './logger.js';

const logger = getLogger('lru-cache');

interface CacheEntry<V> {
  value: V;
  lastAccess: number;
}

export type EvictionReason = 'capacity' | 'age';

export interface CacheStats {
  hits: number;
  misses: number;
  capacityEvictions: number;
  ageEvictions: number;
  hitRate: number;
  size: number;
  maxSize: number;
  maxAge: number;
  clock: number;
}

export interface LRUCacheOptions {
  maxSize?: number;
  maxAge?: number;
}

function assertBound(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}

export class LRUCache<K, V> {
  // Map order is recency order: least recently used first
  private cache = new Map<K, CacheEntry<V>>();
  private clock = 0;
  private stats = {
    hits: 0,
    misses: 0,
    capacityEvictions: 0,
    ageEvictions: 0
  };
  readonly maxSize: number;
  readonly maxAge: number;

  constructor(options: LRUCacheOptions = {}) {
    this.maxSize = options.maxSize ?? 100;
    this.maxAge = options.maxAge ?? Number.MAX_SAFE_INTEGER;
    assertBound('maxSize', this.maxSize);
    assertBound('maxAge', this.maxAge);
  }

  get(key: K): V | undefined {
    const entry = this.cache.get(key);
    if (entry === undefined) {
      this.stats.misses++;
      return undefined;
    }
    if (this.isStale(entry)) {
      this.evict(key, 'age');
      this.stats.misses++;
      return undefined;
    }

    this.stats.hits++;
    this.touch(key, entry);
    this.sweep();
    return entry.value;
  }

  /**
   * Read a value without refreshing its recency or advancing the clock
   */
  peek(key: K): V | undefined {
    const entry = this.cache.get(key);
    return entry === undefined || this.isStale(entry) ? undefined : entry.value;
  }

  set(key: K, value: V): void {
    const existing = this.cache.get(key);
    if (existing !== undefined && !this.isStale(existing)) {
      existing.value = value;
      this.touch(key, existing);
      this.sweep();
      return;
    }

    if (existing !== undefined) {
      this.evict(key, 'age');
    }
    this.clock++;
    this.cache.set(key, { value, lastAccess: this.clock });

    // Evict oldest while over limit
    while (this.cache.size > this.maxSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.evict(oldest.value, 'capacity');
    }
    this.sweep();
  }

  /**
   * Live entry with the greatest key not above `key` under `compare`.
   * A hit counts as an access of that entry.
   */
  closest(key: K, compare: (a: K, b: K) => number): { key: K; value: V } | undefined {
    let best: { key: K; entry: CacheEntry<V> } | undefined;

    for (const [candidate, entry] of this.cache) {
      if (this.isStale(entry) || compare(candidate, key) > 0) continue;
      if (best === undefined || compare(candidate, best.key) > 0) {
        best = { key: candidate, entry };
      }
    }

    if (best === undefined) {
      this.stats.misses++;
      return undefined;
    }

    this.stats.hits++;
    this.touch(best.key, best.entry);
    this.sweep();
    return { key: best.key, value: best.entry.value };
  }

  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  size(): number {
    return this.cache.size;
  }

  has(key: K): boolean {
    const entry = this.cache.get(key);
    return entry !== undefined && !this.isStale(entry);
  }

  /**
   * Keys from least to most recently used
   */
  keys(): IterableIterator<K> {
    return this.cache.keys();
  }

  /**
   * Remove every entry older than maxAge
   */
  prune(): number {
    return this.sweep();
  }

  getClock(): number {
    return this.clock;
  }

  getStats(): CacheStats {
    const total = this.stats.hits + this.stats.misses;
    const hitRate = total > 0 ? this.stats.hits / total : 0;

    return {
      ...this.stats,
      hitRate: Math.round(hitRate * 100) / 100,
      size: this.cache.size,
      maxSize: this.maxSize,
      maxAge: this.maxAge,
      clock: this.clock
    };
  }

  /**
   * Deep copy of entries, clock and statistics
   */
  clone(): LRUCache<K, V> {
    const copy = new LRUCache<K, V>({ maxSize: this.maxSize, maxAge: this.maxAge });
    for (const [key, entry] of this.cache) {
      copy.cache.set(key, { ...entry });
    }
    copy.clock = this.clock;
    copy.stats = { ...this.stats };
    return copy;
  }

  private isStale(entry: CacheEntry<V>): boolean {
    return this.clock - entry.lastAccess > this.maxAge;
  }

  private touch(key: K, entry: CacheEntry<V>): void {
    this.clock++;
    entry.lastAccess = this.clock;
    // Move to end (most recently used)
    this.cache.delete(key);
    this.cache.set(key, entry);
  }

  private evict(key: K, reason: EvictionReason): void {
    if (!this.cache.delete(key)) return;

    if (reason === 'capacity') {
      this.stats.capacityEvictions++;
    } else {
      this.stats.ageEvictions++;
    }
    logger.debug({
      module: 'lru-cache',
      action: 'evict',
      key: String(key),
      reason,
      clock: this.clock
    }, `Evicted ${String(key)} (${reason})`);
  }

  // Oldest entries sit at the front, so the sweep stops at the first live one
  private sweep(): number {
    let swept = 0;
    for (const [key, entry] of this.cache) {
      if (!this.isStale(entry)) break;
      this.evict(key, 'age');
      swept++;
    }
    return swept;
  }
}
