import { deserialize, serialize } from "node:v8"
import { z } from "zod"
import type { CacheRecord } from "../../ports/cache-record"
import type { RecordCodec } from "../../ports/record-codec"
import { CorruptRecordError } from "../errors/cache-error"

/**
 * Encodes records with Node's structured serializer.
 *
 * @remarks
 * Round-trips everything the structured clone algorithm supports, keeping
 * the original type: `Uint8Array`/`Buffer`, `Date`, `Map`, `Set`, `bigint`,
 * `RegExp`, nested arrays and plain objects. Class instances come back as
 * plain objects and functions cannot be stored at all.
 */
export class BinaryRecordCodec<T> implements RecordCodec<T> {
  readonly name = "binary"
  readonly extension = ""

  private readonly schema = z.strictObject({
    value: z.custom<T>(),
    expiration: z.number().int().nullable(),
  })

  encode(record: CacheRecord<T>): Uint8Array {
    return serialize({ value: record.value, expiration: record.expiresAt })
  }

  decode(bytes: Uint8Array): CacheRecord<T> {
    let raw: unknown

    try {
      raw = deserialize(bytes)
    } catch (err) {
      throw new CorruptRecordError("Cache record is not valid serialized data", {
        cause: err,
        context: { byteLength: bytes.byteLength },
      })
    }

    if (typeof raw !== "object" || raw === null || !("value" in raw)) {
      throw new CorruptRecordError("Cache record has no value field")
    }

    const parsed = this.schema.safeParse(raw)

    if (!parsed.success) {
      throw new CorruptRecordError("Cache record does not match the expected shape", {
        cause: parsed.error,
      })
    }

    return { value: parsed.data.value, expiresAt: parsed.data.expiration }
  }
}
