import { z } from "zod"
import type { CacheRecord } from "../../ports/cache-record"
import type { JsonValue } from "../../ports/json-value"
import type { RecordCodec } from "../../ports/record-codec"
import { CorruptRecordError } from "../errors/cache-error"

const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8", { fatal: true })

/**
 * Encodes records as human-readable JSON:
 *
 * ```json
 * {"value": <any JSON value>, "expiration": <integer epoch seconds> | null}
 * ```
 *
 * @remarks
 * Only JSON-representable values can be stored. Rich types such as `Date`,
 * `Map` or `Uint8Array` are not restored on read; use the binary codec when
 * they matter.
 */
export class JsonRecordCodec<T extends JsonValue> implements RecordCodec<T> {
  readonly name = "json"
  readonly extension = ".json"

  private readonly schema = z.strictObject({
    value: z.custom<T>((value) => value !== undefined, "value is required"),
    expiration: z.number().int().nullable(),
  })

  encode(record: CacheRecord<T>): Uint8Array {
    return encoder.encode(
      JSON.stringify({ value: record.value, expiration: record.expiresAt }),
    )
  }

  decode(bytes: Uint8Array): CacheRecord<T> {
    let raw: unknown

    try {
      raw = JSON.parse(decoder.decode(bytes))
    } catch (err) {
      throw new CorruptRecordError("Cache record is not valid JSON", {
        cause: err,
        context: { byteLength: bytes.byteLength },
      })
    }

    const parsed = this.schema.safeParse(raw)

    if (!parsed.success) {
      throw new CorruptRecordError(
        `Cache record does not match the expected shape:\n${z.prettifyError(parsed.error)}`,
        { cause: parsed.error },
      )
    }

    return { value: parsed.data.value, expiresAt: parsed.data.expiration }
  }
}
