// Filename: core/TtlCache.ts

import type { Clock } from '../utils/clock.js';
import { systemClock } from '../utils/clock.js';
import { log, LOG, TMI, WARN } from '../utils/log.js';

// Cache specific emoji
const LOG_EMOJI = '🗄️';

export interface TtlCacheOptions {
  ttlSeconds: number;
  maxSize: number;
  clock?: Clock;
  /** Deep-copy values on put and get. Defaults to true. */
  cloneValues?: boolean;
}

interface CacheEntry<V> {
  key: string;
  value: V;
  storedAt: number;
  expiresAt: number;
  /** Insertion sequence; breaks expiresAt ties during eviction. */
  seq: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  stores: number;
  evictions: number;
  /** Expired entries removed lazily or by purgeExpired(). */
  expirations: number;
  currentSize: number;
  maxSize: number;
  ttlSeconds: number;
  hitRatePercent: number;
}

/**
 * In-memory key/value store with one fixed TTL and a hard capacity.
 *
 * Expiry is lazy: an entry past its expiresAt reads as absent and is removed
 * when touched. When a new key arrives at capacity, the entry with the
 * earliest expiresAt (first inserted on ties) is evicted.
 *
 * All operations are synchronous, so each one runs to completion before any
 * other request's code can observe the map. Nothing here throws.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly ttlMs: number;
  private readonly clock: Clock;
  private readonly cloneValues: boolean;
  private seq = 0;

  private hits = 0;
  private misses = 0;
  private stores = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(private readonly options: TtlCacheOptions) {
    this.ttlMs = options.ttlSeconds * 1000;
    this.clock = options.clock ?? systemClock;
    this.cloneValues = options.cloneValues ?? true;
    log(`${LOG_EMOJI} Cache initialized: TTL=${options.ttlSeconds}s, Max size=${options.maxSize}`, LOG);
  }

  public get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      log(`${LOG_EMOJI} Cache MISS for ${key}`, TMI);
      return undefined;
    }

    if (this.isExpired(entry, this.clock.now())) {
      this.entries.delete(key);
      this.expirations++;
      this.misses++;
      log(`${LOG_EMOJI} Cache EXPIRED for ${key}`, TMI);
      return undefined;
    }

    try {
      const value = this.copy(entry.value);
      this.hits++;
      log(`${LOG_EMOJI} Cache HIT for ${key}`, TMI);
      return value;
    } catch (error) {
      this.misses++;
      log(`${LOG_EMOJI} ⚠️ Cached value for ${key} could not be read, treating as miss: ${describe(error)}`, WARN);
      return undefined;
    }
  }

  public put(key: string, value: V): void {
    let stored: V;
    try {
      stored = this.copy(value);
    } catch (error) {
      log(`${LOG_EMOJI} ⚠️ Value for ${key} could not be stored: ${describe(error)}`, WARN);
      return;
    }

    const now = this.clock.now();
    const existing = this.entries.get(key);

    if (existing && !this.isExpired(existing, now)) {
      // Overwrite of a live key: refresh in place, no store counted, size unchanged.
      this.entries.delete(key);
      this.entries.set(key, this.createEntry(key, stored, now));
      log(`${LOG_EMOJI} Cache overwrite for ${key}`, TMI);
      return;
    }

    if (existing) {
      this.entries.delete(key);
      this.expirations++;
    }

    if (this.entries.size >= this.options.maxSize) {
      this.evictOne();
    }

    this.entries.set(key, this.createEntry(key, stored, now));
    this.stores++;
    log(`${LOG_EMOJI} Cached data for ${key}`, TMI);
  }

  /** True when a live entry exists. Does not count as a hit or miss. */
  public has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && !this.isExpired(entry, this.clock.now());
  }

  public invalidate(key: string): boolean {
    const removed = this.entries.delete(key);
    if (removed) {
      log(`${LOG_EMOJI} Invalidated cache entry ${key}`, TMI);
    }
    return removed;
  }

  public clear(): void {
    this.entries.clear();
    log(`${LOG_EMOJI} Cache cleared`, LOG);
  }

  /**
   * Removes every expired entry.
   * @returns Number of entries removed.
   */
  public purgeExpired(): number {
    const now = this.clock.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        removed++;
      }
    }
    this.expirations += removed;
    if (removed > 0) {
      log(`${LOG_EMOJI} Cleaned up ${removed} expired entries`, LOG);
    }
    return removed;
  }

  public stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      stores: this.stores,
      evictions: this.evictions,
      expirations: this.expirations,
      currentSize: this.entries.size,
      maxSize: this.options.maxSize,
      ttlSeconds: this.options.ttlSeconds,
      hitRatePercent: lookups === 0 ? 0 : Math.round((this.hits / lookups) * 10000) / 100,
    };
  }

  private createEntry(key: string, value: V, now: number): CacheEntry<V> {
    return { key, value, storedAt: now, expiresAt: now + this.ttlMs, seq: this.seq++ };
  }

  private isExpired(entry: CacheEntry<V>, now: number): boolean {
    return now > entry.expiresAt;
  }

  private evictOne(): void {
    let victim: CacheEntry<V> | undefined;
    for (const entry of this.entries.values()) {
      if (
        !victim ||
        entry.expiresAt < victim.expiresAt ||
        (entry.expiresAt === victim.expiresAt && entry.seq < victim.seq)
      ) {
        victim = entry;
      }
    }
    if (!victim) {
      return;
    }
    this.entries.delete(victim.key);
    this.evictions++;
    log(`${LOG_EMOJI} 🗑️ Evicted ${victim.key} (expires ${new Date(victim.expiresAt).toISOString()})`, TMI);
  }

  private copy(value: V): V {
    return this.cloneValues ? structuredClone(value) : value;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
