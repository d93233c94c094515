import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit. Entries below it are dropped.
   */
  level: LogLevelName

  /**
   * Pretty-print for humans instead of emitting one JSON object per line.
   *
   * @remarks
   * Meant for local development only.
   */
  prettify?: boolean
}
