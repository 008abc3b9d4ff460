import { CacheError, type CacheErrorCode } from "./cache-error"

/**
 * Type guard for errors raised by this package, optionally narrowed to one
 * code.
 *
 * @example
 * ```ts
 * try {
 *   await cache.get(key)
 * } catch (err) {
 *   if (isCacheError(err, "corrupt_record")) {
 *     await cache.delete(key)
 *   }
 * }
 * ```
 */
export function isCacheError<C extends CacheErrorCode>(
  err: unknown,
  code?: C,
): err is CacheError<C> {
  if (!(err instanceof CacheError)) return false

  return code === undefined || err.code === code
}
