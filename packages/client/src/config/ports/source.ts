/**
 * A source of raw configuration values.
 *
 * @remarks
 * Sources only load. Validation, coercion and merging happen in
 * `loadConfig`. Later sources override earlier ones; a key mapped to
 * `undefined` counts as not provided.
 */
export interface ConfigSource {
  /** Name reported by `explain()`, e.g. `"env"`. */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
