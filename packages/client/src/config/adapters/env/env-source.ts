import { ConfigError } from "../../../errors/client-errors"
import type { ConfigSource } from "../../ports/source"

export const DEFAULT_ENV_PREFIX = "FERRUM_"

export type EnvSourceOptions = {
  /** Only variables starting with this are read, with it stripped. */
  prefix?: string
  env?: Record<string, string | undefined>
}

/**
 * Reads the client's settings from prefixed environment variables.
 *
 * An empty variable counts as unset, so `FERRUM_URL=` falls back to the
 * default URL instead of failing validation.
 */
export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    const prefix = options.prefix ?? DEFAULT_ENV_PREFIX

    if (!prefix) {
      throw new ConfigError("EnvSource needs a non-empty prefix")
    }

    this.prefix = prefix
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    const values: Record<string, string> = {}

    for (const [name, value] of Object.entries(this.env)) {
      if (!value || name.length <= this.prefix.length || !name.startsWith(this.prefix)) continue

      values[name.slice(this.prefix.length)] = value
    }

    return values
  }
}
