import type { WireArg, WireCommand } from "../../ports/command"

export type CommandPacketInit = {
  /** Arguments in key positions. These receive the client prefix. */
  keys?: readonly string[]
  /** Arguments after the keys. */
  args?: readonly WireArg[]
}

/**
 * A command name with its key and value arguments.
 *
 * @example
 * ```ts
 * const cmd = new CommandPacket("SET", { keys: ["user:1"], args: ["ada", "PX", "500"] })
 * cmd.prefix("app:")
 * cmd.toString() // "SET app:user:1 ada PX 500"
 * ```
 */
export class CommandPacket implements WireCommand {
  writeHost: string | null = null

  private keyPrefix: string | null = null
  private readonly rawKeys: readonly string[]
  private readonly rawArgs: readonly WireArg[]

  constructor(
    readonly name: string,
    init: CommandPacketInit = {},
  ) {
    this.rawKeys = init.keys ?? []
    this.rawArgs = init.args ?? []
  }

  /** Sets the key prefix. A later call replaces the earlier prefix. */
  prefix(prefix: string | null): void {
    this.keyPrefix = prefix === "" ? null : prefix
  }

  get keys(): string[] {
    const prefix = this.keyPrefix
    return prefix === null ? [...this.rawKeys] : this.rawKeys.map((key) => prefix + key)
  }

  get args(): readonly WireArg[] {
    return this.rawArgs
  }

  toArgs(): WireArg[] {
    return [this.name, ...this.keys, ...this.rawArgs]
  }

  toString(): string {
    return this.toArgs().map(renderArg).join(" ")
  }
}

function renderArg(arg: WireArg): string {
  return typeof arg === "string" ? arg : Buffer.from(arg).toString("utf8")
}
