import type { ConfigSource } from "../../ports/config-source"

export type EnvSourceOptions = {
  /**
   * Read only variables starting with this prefix, with the prefix removed:
   * `APP_CACHE_DRIVER` becomes `CACHE_DRIVER` under `prefix: "APP_"`.
   */
  prefix?: string

  /** @default process.env */
  env?: Record<string, string | undefined>
}

/**
 * Configuration from environment variables. A variable set to the empty
 * string counts as unset, so `CACHE_DIR=` falls back to earlier sources or
 * the schema default.
 */
export class EnvSource implements ConfigSource {
  readonly name = "env"

  constructor(private readonly options: EnvSourceOptions = {}) {}

  async load(): Promise<Record<string, unknown>> {
    const prefix = this.options.prefix ?? ""
    const values: Record<string, string> = {}

    for (const [name, value] of Object.entries(this.options.env ?? process.env)) {
      if (value === undefined || value === "" || !name.startsWith(prefix)) continue

      values[name.slice(prefix.length)] = value
    }

    return values
  }
}
