import type { CacheRecord } from "./cache-record"

/**
 * RecordCodec converts a {@link CacheRecord} to and from the bytes stored in
 * a single cache file.
 *
 * @remarks
 * Codecs are pure transforms. `decode` must throw `CorruptRecordError` when
 * the bytes do not hold exactly a `(value, expiration)` record; file caches
 * let that error reach the caller.
 */
export interface RecordCodec<T> {
  /** Short format name used in logs (e.g. `"binary"`, `"json"`). */
  readonly name: string

  /**
   * File name suffix appended to the key digest (e.g. `".json"`), or `""`.
   *
   * Caches whose codec uses an extension only sweep files carrying it, and
   * temp files left by interrupted writes to them, on `clear()`.
   * Extension-less caches own the whole root directory.
   */
  readonly extension: string

  encode(record: CacheRecord<T>): Uint8Array

  decode(bytes: Uint8Array): CacheRecord<T>
}
