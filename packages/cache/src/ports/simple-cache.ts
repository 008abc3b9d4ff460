import type { CacheEntry } from "./cache-entry"
import type { CacheKey } from "./cache-key"
import type { CacheTtl } from "./cache-ttl"

/**
 * SimpleCache is the capability contract shared by every backend
 * (memory, flat-file, JSON file, remote).
 *
 * @remarks
 * Keys are validated before any I/O: an empty or non-string key throws
 * `InvalidKeyError` and leaves no side effect. Batch inputs that are not
 * iterable throw `InvalidArgumentError`.
 *
 * Batch semantics differ per backend:
 *
 * | backend | `setMultiple` | `deleteMultiple` |
 * |---|---|---|
 * | file / JSON file | best-effort, always `true` | best-effort, always `true` |
 * | memory | always `true` | `false` if any key was absent |
 * | remote | `false` if any pipelined ack is not `OK` | `true` if anything was deleted |
 *
 * TTL handling also differs: file caches store zero or negative TTLs as an
 * already-past expiry, the memory cache ignores TTLs, and remote caches clamp
 * TTLs to at least one second.
 */
export interface SimpleCache<T> {
  /**
   * Retrieve a value, or `defaultValue` (`null` when omitted) on a miss or
   * an expired entry.
   */
  get(key: CacheKey, defaultValue?: T | null): Promise<T | null>

  /**
   * Store a value, overwriting any previous entry.
   *
   * @returns `true` when the backend confirmed the write.
   */
  set(key: CacheKey, value: T, ttl?: CacheTtl): Promise<boolean>

  /**
   * Remove an entry.
   *
   * @returns `true` when an entry was removed; deleting an absent key is not
   * an error but reports `false`.
   */
  delete(key: CacheKey): Promise<boolean>

  /** Remove every entry owned by this cache. */
  clear(): Promise<boolean>

  /**
   * `true` when a live entry exists.
   *
   * @remarks
   * File caches define this as `get(key)` returning a value other than
   * `null`, so a stored `null` reads as absent.
   */
  has(key: CacheKey): Promise<boolean>

  /**
   * Retrieve several values. The returned map iterates in input key order and
   * holds `defaultValue` for every miss.
   */
  getMultiple(
    keys: Iterable<CacheKey>,
    defaultValue?: T | null,
  ): Promise<Map<CacheKey, T | null>>

  /** Store several values sharing one TTL. */
  setMultiple(entries: Iterable<CacheEntry<T>>, ttl?: CacheTtl): Promise<boolean>

  /** Remove several entries. */
  deleteMultiple(keys: Iterable<CacheKey>): Promise<boolean>
}
