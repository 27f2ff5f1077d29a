import type { Writable } from "node:stream";

/**
 * Memory cache key: the logical identifier plus the display variant
 * it was decoded for. A null variant stands for "any variant" when keys
 * are compared with cacheKeysMatch.
 */
export interface CacheKey {
  identifier: string;
  variant: string | null;
}

export type EvictionReason = "capacity" | "expired" | "removed" | "replaced" | "cleared";

export interface MemoryCacheOptions<V> {
  /** Capacity in the units returned by sizeOf */
  maxSize: number;
  /** Weight of one entry; defaults to 1 per entry */
  sizeOf?: (key: CacheKey, value: V) => number;
  onEvict?: (key: CacheKey, value: V, reason: EvictionReason) => void;
  now?: () => number;
}

export interface MemoryCacheEntry<V> {
  key: CacheKey;
  value: V;
  size: number;
  /** Milliseconds since epoch; null never expires */
  expiry: number | null;
}

export interface MemoryCacheStats {
  entryCount: number;
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  puts: number;
  evictions: number;
  expirations: number;
  hitRate: number;
}

export interface DiskCacheStats {
  directory: string;
  entryCount: number;
  size: number;
  maxSize: number;
}

export interface CacheStats {
  memory: MemoryCacheStats | null;
  disk: DiskCacheStats | null;
  diskCacheReady: boolean;
}

/**
 * Maps an identifier to the file name its disk record is stored under.
 * Must be deterministic and collision resistant.
 */
export interface DiskCacheFileNameGenerator {
  generate(identifier: string): string;
}

/**
 * Transport that writes the payload of an identifier into a sink.
 * Resolves to the expiry timestamp (ms since epoch) of the payload,
 * or a negative number when the download failed or was cancelled.
 */
export interface Downloader {
  downloadToStream(
    identifier: string,
    sink: Writable,
    signal?: AbortSignal,
  ): Promise<number>;
}

export interface ImageCacheConfig {
  memoryCacheEnabled: boolean;
  /** Memory tier capacity in bytes of decoded pixels */
  memoryCacheSize: number;
  diskCacheEnabled: boolean;
  /** Disk tier capacity in bytes, clamped to free space when opened */
  diskCacheSize: number;
  diskCachePath: string;
  /** Freshness given to downloads that carry no expiry of their own */
  defaultExpiryMs: number;
  debug: boolean;
}
