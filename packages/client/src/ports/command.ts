/**
 * A prepared command as seen by the call pipeline.
 *
 * @remarks
 * The pipeline only prefixes, renders and reads the destination of a command.
 * Building the arguments is the command layer's business.
 */
export interface Command {
  /**
   * Annotates the command with the client's key prefix.
   * Called once per call, before any interceptor sees the command.
   */
  prefix(prefix: string | null): void

  /** Host the command was written to. `null` until a transport sets it. */
  writeHost: string | null

  toString(): string
}

/** A single command argument as sent on the wire. */
export type WireArg = string | Uint8Array

/** A command an adapter can put on the wire. */
export interface WireCommand extends Command {
  /** Command name followed by its arguments, with the prefix applied to keys. */
  toArgs(): WireArg[]
}
