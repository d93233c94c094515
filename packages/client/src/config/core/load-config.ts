import type { Logger } from "@ferrum/logger"
import { type ZodType, z } from "zod"
import { ConfigError } from "../../errors/client-errors"
import { EnvSource } from "../adapters/env/env-source"
import type { LoadedConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  /** Defaults to a single `EnvSource`. */
  sources?: ConfigSource[]
  /** Receives a warning for keys the schema does not know. */
  logger?: Logger
}

const DEFAULT = "default"

class MergedConfig<T extends Record<string, unknown>> implements LoadedConfig<T> {
  constructor(
    readonly value: T,
    private readonly provenance: ReadonlyMap<string, string>,
    private readonly unknown: readonly string[],
  ) {
    Object.freeze(value)
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance.get(key) ?? DEFAULT
  }

  sourcesUsed(): string[] {
    return [...new Set(this.provenance.values())]
  }

  unknownKeys(): string[] {
    return [...this.unknown]
  }
}

/**
 * Merges the sources in order (later wins), validates the result and keeps
 * track of which source supplied each key.
 *
 * @throws ConfigError listing every failing key when validation fails.
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources = [new EnvSource()],
  logger,
}: LoadConfigOptions<T>): Promise<LoadedConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance = new Map<string, string>()

  for (const source of sources) {
    for (const [key, value] of Object.entries(await source.load())) {
      if (value === undefined) continue

      merged[key] = value
      provenance.set(key, source.name)
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigError(`Configuration validation failed:\n${z.prettifyError(result.error)}`, {
      keys: result.error.issues.map((issue) => issue.path.map(String).join(".")),
      sources: sources.map((source) => source.name),
    })
  }

  const known = new Set(Object.keys(result.data))
  const unknown = Object.keys(merged).filter((key) => !known.has(key))

  for (const key of unknown) provenance.delete(key)

  if (unknown.length > 0) {
    logger?.warn("unknown config keys", { keys: unknown })
  }

  return new MergedConfig(result.data, provenance, unknown)
}
