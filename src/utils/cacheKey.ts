import type { CacheKey } from "../types/cache.types.js";

export function createCacheKey(
  identifier: string,
  variant: string | null = null,
): CacheKey {
  return { identifier, variant };
}

/**
 * Exact equality: same identifier and same variant (null only equals null).
 */
export function cacheKeysEqual(a: CacheKey, b: CacheKey): boolean {
  return a.identifier === b.identifier && a.variant === b.variant;
}

/**
 * Partial equality: identifiers are equal and either side leaves the
 * variant unset, or both variants are equal.
 */
export function cacheKeysMatch(a: CacheKey, b: CacheKey): boolean {
  if (a.identifier !== b.identifier) {
    return false;
  }
  if (a.variant !== null && b.variant !== null) {
    return a.variant === b.variant;
  }
  return true;
}

/**
 * Unambiguous string form used as the storage slot of a key
 */
export function cacheKeySlot(key: CacheKey): string {
  return JSON.stringify([key.identifier, key.variant]);
}
