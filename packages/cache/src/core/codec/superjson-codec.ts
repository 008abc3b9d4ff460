import superjson from "superjson"
import type { StringCodec } from "../../ports/string-codec"
import { CorruptRecordError } from "../errors/cache-error"

/**
 * String codec on superjson: plain JSON on the wire, with `Date`, `Map`,
 * `Set`, `bigint` and `undefined` restored on read.
 */
export function createSuperjsonCodec<T>(): StringCodec<T> {
  return {
    encode: (value: T) => superjson.stringify(value),
    decode: (payload: string) => {
      try {
        return superjson.parse<T>(payload)
      } catch (err) {
        throw new CorruptRecordError("Remote cache value is not valid superjson", {
          cause: err,
        })
      }
    },
  }
}
