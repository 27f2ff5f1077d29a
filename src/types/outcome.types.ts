import type { ImageCacheError } from "./errors.js";

/**
 * Result of a fallible step whose failure degrades functionality
 * instead of aborting the caller's request
 */
export type Outcome<T, E extends ImageCacheError = ImageCacheError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function success<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function failure<E extends ImageCacheError>(
  error: E,
): { ok: false; error: E } {
  return { ok: false, error };
}
