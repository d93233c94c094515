/**
 * Validated configuration with provenance.
 *
 * @example
 * ```ts
 * const config = await loadClientConfig({ sources: [new EnvSource()] })
 *
 * config.value.URL       // "redis://127.0.0.1:6379"
 * config.explain("URL")  // "default"
 * ```
 */
export interface LoadedConfig<T extends Record<string, unknown>> {
  readonly value: T

  /** Name of the source that provided `key`, or `"default"`. */
  explain<K extends keyof T & string>(key: K): string

  /** Names of the sources that provided at least one value. */
  sourcesUsed(): string[]

  /** Keys the sources provided that the schema does not know. */
  unknownKeys(): string[]
}
