import { InvalidArgumentError, InvalidKeyError } from "../../errors/cache-error"
import { toBatch, validateKey, validateKeys } from "../validate-key"

describe("validateKey", () => {
  it("accepts a non-empty string", () => {
    expect(() => validateKey("k")).not.toThrow()
  })

  it("rejects the empty string", () => {
    expect(() => validateKey("")).toThrow(InvalidKeyError)
    expect(() => validateKey("")).toThrow("Key cannot be empty")
  })

  it("rejects non-strings and records the type", () => {
    let caught: unknown

    try {
      validateKey(42)
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(InvalidKeyError)
    expect(caught).toMatchObject({ code: "invalid_key", context: { type: "number" } })
  })

  it("validateKeys stops at the first invalid key", () => {
    expect(() => validateKeys(["a", "", null])).toThrow("Key cannot be empty")
  })
})

describe("toBatch", () => {
  it("materializes arrays, sets and generators", () => {
    function* gen() {
      yield "x"
      yield "y"
    }

    expect(toBatch(["a"], "Keys")).toStrictEqual(["a"])
    expect(toBatch(new Set(["a", "b"]), "Keys")).toStrictEqual(["a", "b"])
    expect(toBatch(gen(), "Keys")).toStrictEqual(["x", "y"])
  })

  it("turns a Map into its entries", () => {
    expect(toBatch(new Map([["k", 1]]), "Values")).toStrictEqual([["k", 1]])
  })

  it("rejects non-iterables with the argument name", () => {
    const input = null as unknown as Iterable<string>

    expect(() => toBatch(input, "Values")).toThrow(InvalidArgumentError)
    expect(() => toBatch(input, "Values")).toThrow("Values must be an iterable")
  })

  it("rejects a bare string", () => {
    expect(() => toBatch("ab", "Keys")).toThrow(InvalidArgumentError)
  })
})
