import type { WireCommand } from "./command"
import type { ReplyParser } from "./reply"

/** Connection mode an adapter runs in. */
export const useTypes = ["pooling", "cluster", "sentinel", "single-inside"] as const

export type UseType = (typeof useTypes)[number]

/**
 * Dispatches commands to a server.
 *
 * @remarks
 * Adapters own the protocol, connections, topology and failover. They set
 * `command.writeHost` once a destination is chosen and hand the raw reply to
 * `parse`, which decides whether it is a value or an error.
 */
export interface Adapter {
  readonly useType: UseType

  call<T>(command: WireCommand, parse: ReplyParser<T>): Promise<T>

  /** Releases connections. Called at most once by the owning client. */
  dispose(): Promise<void>
}
