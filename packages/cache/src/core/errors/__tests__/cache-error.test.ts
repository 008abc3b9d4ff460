import {
  CacheConfigError,
  CacheError,
  CorruptRecordError,
  InvalidKeyError,
  serializeCacheError,
} from "../cache-error"
import { isCacheError } from "../is-cache-error"

describe("CacheError", () => {
  it("subclasses carry their code and name", () => {
    const err = new InvalidKeyError("Key cannot be empty")

    expect(err).toBeInstanceOf(CacheError)
    expect(err).toBeInstanceOf(Error)
    expect(err.code).toBe("invalid_key")
    expect(err.name).toBe("InvalidKeyError")
    expect(err.isOperational).toBe(true)
    expect(err.isRetryable).toBe(false)
  })

  it("freezes the context", () => {
    const err = new InvalidKeyError("bad", { type: "number" })

    expect(Object.isFrozen(err.context)).toBe(true)
  })

  it("config errors are not operational", () => {
    expect(new CacheConfigError("bad config").isOperational).toBe(false)
  })

  it("keeps the cause", () => {
    const cause = new SyntaxError("Unexpected end of JSON input")
    const err = new CorruptRecordError("Cache record is not valid JSON", { cause })

    expect(err.cause).toBe(cause)
  })
})

describe("serializeCacheError", () => {
  it("serializes a cache error with its cause chain", () => {
    const err = new CorruptRecordError("Cache record is not valid JSON", {
      cause: new SyntaxError("Unexpected token"),
      context: { byteLength: 3 },
    })

    expect(serializeCacheError(err)).toMatchObject({
      name: "CorruptRecordError",
      code: "corrupt_record",
      message: "Cache record is not valid JSON",
      context: { byteLength: 3 },
      isOperational: true,
      cause: { name: "SyntaxError", code: "unknown", message: "Unexpected token" },
    })
  })

  it("omits the stack unless asked", () => {
    const err = new InvalidKeyError("bad")

    expect(serializeCacheError(err).stack).toBeUndefined()
    expect(serializeCacheError(err, { includeStack: true }).stack).toBe(err.stack)
  })

  it("wraps a thrown string", () => {
    expect(serializeCacheError("boom")).toMatchObject({
      name: "NonErrorThrown",
      code: "unknown",
      message: "boom",
      context: { value: "boom" },
    })
  })

  it("toJSON uses the same shape", () => {
    const err = new InvalidKeyError("bad")

    expect(JSON.parse(JSON.stringify(err))).toMatchObject({ code: "invalid_key", message: "bad" })
  })
})

describe("isCacheError", () => {
  it("narrows by code", () => {
    const err = new InvalidKeyError("bad")

    expect(isCacheError(err)).toBe(true)
    expect(isCacheError(err, "invalid_key")).toBe(true)
    expect(isCacheError(err, "corrupt_record")).toBe(false)
    expect(isCacheError(new Error("bad"))).toBe(false)
  })
})
