/**
 * A source of raw configuration values.
 *
 * A ConfigSource only loads values. It does not validate, coerce or merge
 * them. Sources are applied in order; later sources override earlier ones,
 * and a key whose value is `undefined` counts as not provided.
 */
export interface ConfigSource {
  /**
   * Name used in error messages.
   * Example: "env", "dotenv:.env"
   */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
