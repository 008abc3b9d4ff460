import type { CacheKey } from "../../ports/cache-key"
import { InvalidArgumentError, InvalidKeyError } from "../errors/cache-error"

/**
 * Throws `InvalidKeyError` unless `key` is a non-empty string.
 *
 * Every public cache operation calls this before touching storage.
 */
export function validateKey(key: unknown): asserts key is CacheKey {
  if (typeof key !== "string") {
    throw new InvalidKeyError("Key must be a string", { type: typeof key })
  }

  if (key === "") {
    throw new InvalidKeyError("Key cannot be empty")
  }
}

export function validateKeys(keys: readonly unknown[]): asserts keys is readonly CacheKey[] {
  for (const key of keys) validateKey(key)
}

function isIterable(input: unknown): input is Iterable<unknown> {
  return (
    typeof input === "object" &&
    input !== null &&
    typeof Reflect.get(input, Symbol.iterator) === "function"
  )
}

/**
 * Materialize a batch input, throwing `InvalidArgumentError` when it is not
 * an iterable object. Strings are rejected: a string is not a list of keys.
 *
 * @param what Name of the argument, used in the error message.
 */
export function toBatch<T>(input: Iterable<T>, what: "Keys" | "Values"): T[] {
  const candidate: unknown = input

  if (!isIterable(candidate)) {
    throw new InvalidArgumentError(`${what} must be an iterable`, {
      type: candidate === null ? "null" : typeof candidate,
    })
  }

  return Array.from(input)
}
