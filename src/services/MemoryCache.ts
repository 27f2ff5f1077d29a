import type {
  CacheKey,
  EvictionReason,
  MemoryCacheEntry,
  MemoryCacheOptions,
  MemoryCacheStats,
} from "../types/cache.types.js";
import { ValidationError } from "../types/errors.js";
import { cacheKeySlot, cacheKeysMatch } from "../utils/cacheKey.js";

/**
 * Size-weighted LRU cache keyed by identifier + variant.
 *
 * Entries live in a Map whose insertion order is the recency order (oldest
 * first); a hit or a put re-inserts the entry at the end. A secondary index
 * groups slots by identifier so "any variant" operations scan only the
 * entries of one identifier.
 */
export class LruMemoryCache<V> {
  private entries = new Map<string, MemoryCacheEntry<V>>();
  private slotsByIdentifier = new Map<string, Set<string>>();
  private currentSize = 0;
  private maxSize: number;
  private readonly sizeOf: (key: CacheKey, value: V) => number;
  private readonly onEvict?: (key: CacheKey, value: V, reason: EvictionReason) => void;
  private readonly now: () => number;
  private stats = {
    hits: 0,
    misses: 0,
    puts: 0,
    evictions: 0,
    expirations: 0,
  };

  constructor(options: MemoryCacheOptions<V>) {
    this.maxSize = LruMemoryCache.validateMaxSize(options.maxSize);
    this.sizeOf = options.sizeOf ?? (() => 1);
    this.onEvict = options.onEvict;
    this.now = options.now ?? Date.now;
  }

  get(key: CacheKey): V | null {
    const slot = cacheKeySlot(key);
    const entry = this.entries.get(slot);
    if (!entry) {
      this.stats.misses++;
      return null;
    }

    if (this.isExpired(entry)) {
      this.detach(slot, entry, "expired");
      this.stats.expirations++;
      this.stats.misses++;
      return null;
    }

    this.touch(slot, entry);
    this.stats.hits++;
    return entry.value;
  }

  /**
   * Insert or replace an entry and mark it most recently used.
   * Returns the value it replaced, if any.
   */
  put(key: CacheKey, value: V, expiry: number | null = null): V | null {
    const size = this.sizeOf(key, value);
    if (!Number.isFinite(size) || size < 0) {
      throw new ValidationError(
        `Entry size must be a non-negative number, got ${size}`,
        "size",
        size,
        { operation: "put", service: "LruMemoryCache", identifier: key.identifier },
      );
    }

    const slot = cacheKeySlot(key);
    const previous = this.entries.get(slot);
    if (previous) {
      this.detach(slot, previous, "replaced");
    }

    this.entries.set(slot, { key: { ...key }, value, size, expiry });
    this.currentSize += size;
    this.indexSlot(key.identifier, slot);
    this.stats.puts++;

    this.trimToSize(this.maxSize);
    return previous ? previous.value : null;
  }

  remove(key: CacheKey): V | null {
    const slot = cacheKeySlot(key);
    const entry = this.entries.get(slot);
    if (!entry) {
      return null;
    }
    this.detach(slot, entry, "removed");
    return entry.value;
  }

  /**
   * Remove every entry matching key under partial equality; a key with a
   * null variant removes all variants of its identifier.
   */
  removeMatching(key: CacheKey): number {
    const slots = this.slotsByIdentifier.get(key.identifier);
    if (!slots) {
      return 0;
    }

    let removed = 0;
    for (const slot of Array.from(slots)) {
      const entry = this.entries.get(slot);
      if (entry && cacheKeysMatch(entry.key, key)) {
        this.detach(slot, entry, "removed");
        removed++;
      }
    }
    return removed;
  }

  containsKey(key: CacheKey): boolean {
    const slot = cacheKeySlot(key);
    const entry = this.entries.get(slot);
    if (!entry) {
      return false;
    }
    if (this.isExpired(entry)) {
      this.detach(slot, entry, "expired");
      this.stats.expirations++;
      return false;
    }
    return true;
  }

  containsMatching(key: CacheKey): boolean {
    const slots = this.slotsByIdentifier.get(key.identifier);
    if (!slots) {
      return false;
    }
    for (const slot of slots) {
      const entry = this.entries.get(slot);
      if (entry && !this.isExpired(entry) && cacheKeysMatch(entry.key, key)) {
        return true;
      }
    }
    return false;
  }

  evictAll(): void {
    for (const [slot, entry] of Array.from(this.entries)) {
      this.detach(slot, entry, "cleared");
    }
  }

  setMaxSize(maxSize: number): void {
    this.maxSize = LruMemoryCache.validateMaxSize(maxSize);
    this.trimToSize(this.maxSize);
  }

  getMaxSize(): number {
    return this.maxSize;
  }

  /**
   * Total weighted size of the entries currently held
   */
  size(): number {
    return this.currentSize;
  }

  entryCount(): number {
    return this.entries.size;
  }

  /**
   * Keys from least to most recently used
   */
  keys(): CacheKey[] {
    return Array.from(this.entries.values(), entry => ({ ...entry.key }));
  }

  getStats(): MemoryCacheStats {
    const lookups = this.stats.hits + this.stats.misses;
    return {
      entryCount: this.entries.size,
      size: this.currentSize,
      maxSize: this.maxSize,
      ...this.stats,
      hitRate: lookups > 0 ? this.stats.hits / lookups : 0,
    };
  }

  private trimToSize(maxSize: number): void {
    while (this.currentSize > maxSize) {
      const eldest = this.entries.entries().next();
      if (eldest.done) {
        break;
      }
      const [slot, entry] = eldest.value;
      this.detach(slot, entry, "capacity");
      this.stats.evictions++;
    }
  }

  private touch(slot: string, entry: MemoryCacheEntry<V>): void {
    this.entries.delete(slot);
    this.entries.set(slot, entry);
  }

  private detach(slot: string, entry: MemoryCacheEntry<V>, reason: EvictionReason): void {
    this.entries.delete(slot);
    this.currentSize -= entry.size;

    const slots = this.slotsByIdentifier.get(entry.key.identifier);
    if (slots) {
      slots.delete(slot);
      if (slots.size === 0) {
        this.slotsByIdentifier.delete(entry.key.identifier);
      }
    }

    this.onEvict?.(entry.key, entry.value, reason);
  }

  private indexSlot(identifier: string, slot: string): void {
    const slots = this.slotsByIdentifier.get(identifier);
    if (slots) {
      slots.add(slot);
    } else {
      this.slotsByIdentifier.set(identifier, new Set([slot]));
    }
  }

  private isExpired(entry: MemoryCacheEntry<V>, now = this.now()): boolean {
    return entry.expiry !== null && entry.expiry < now;
  }

  private static validateMaxSize(maxSize: number): number {
    if (!Number.isFinite(maxSize) || maxSize <= 0) {
      throw new ValidationError(
        `maxSize must be a positive number, got ${maxSize}`,
        "maxSize",
        maxSize,
        { service: "LruMemoryCache" },
      );
    }
    return maxSize;
  }
}
