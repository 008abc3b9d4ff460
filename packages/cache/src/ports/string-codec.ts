/**
 * StringCodec defines a bidirectional transformation between a typed value
 * `T` and the string payload stored by a remote key-value server.
 */
export interface StringCodec<T> {
  encode(value: T): string

  decode(payload: string): T
}
