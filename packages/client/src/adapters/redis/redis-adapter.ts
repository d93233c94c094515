import { createNullLogger, type Logger } from "@ferrum/logger"
import { ErrorReply } from "redis"
import { ConnectionError } from "../../errors/client-errors"
import type { Adapter, UseType } from "../../ports/adapter"
import type { WireArg, WireCommand } from "../../ports/command"
import type { InfoNotice } from "../../ports/notice"
import type { ReplyParser } from "../../ports/reply"
import type { RedisCommandClient } from "./redis-command-client"

export type RedisAdapterDeps = {
  client: RedisCommandClient
  logger?: Logger
  /** Receives connection events. */
  onInfo?: (notice: InfoNotice) => void
}

export type RedisAdapterOptions = {
  /** Server URL. Its host is reported as the write host of every command. */
  url: string
  useType?: UseType
}

/**
 * Sends commands through a node-redis client.
 *
 * @remarks
 * - Connects lazily on the first call; concurrent first calls share one connect.
 * - Server error replies go to the reply parser; transport failures become
 *   `ConnectionError`.
 * - `dispose()` quits the client when it is open.
 */
export class RedisAdapter implements Adapter {
  readonly useType: UseType
  readonly host: string

  private readonly logger: Logger
  private connecting: Promise<void> | null = null

  constructor(
    private readonly deps: RedisAdapterDeps,
    opts: RedisAdapterOptions,
  ) {
    this.useType = opts.useType ?? "pooling"
    this.host = new URL(opts.url).host
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "redis-adapter",
      host: this.host,
    })

    this.listen()
  }

  async call<T>(command: WireCommand, parse: ReplyParser<T>): Promise<T> {
    await this.ensureOpen()

    command.writeHost = this.host

    let reply: unknown
    try {
      reply = await this.deps.client.sendCommand(command.toArgs().map(toRedisArg))
    } catch (error) {
      if (error instanceof ErrorReply) {
        return parse({ kind: "error", message: error.message })
      }

      throw this.connectionError("Command failed", error)
    }

    return parse({ kind: "value", value: reply })
  }

  async dispose(): Promise<void> {
    if (!this.deps.client.isOpen) return

    await this.deps.client.quit()
  }

  private async ensureOpen(): Promise<void> {
    if (this.deps.client.isOpen) return

    this.connecting ??= this.connect()
    await this.connecting
  }

  private async connect(): Promise<void> {
    try {
      await this.deps.client.connect()
    } catch (error) {
      throw this.connectionError("Connect failed", error)
    } finally {
      this.connecting = null
    }
  }

  private listen(): void {
    const { client } = this.deps

    client.on("connect", () => this.info(`${this.host} connected`))
    client.on("ready", () => this.info(`${this.host} ready`))
    client.on("reconnecting", () => this.info(`${this.host} reconnecting`))
    client.on("end", () => this.info(`${this.host} connection closed`))
    client.on("error", (error) => this.info(`${this.host} connection error`, error))
  }

  private info(log: string, error?: Error): void {
    if (error) {
      this.logger.warn(log, { err: error })
    } else {
      this.logger.debug(log)
    }

    this.deps.onInfo?.({ type: "info", log, ...(error && { error }) })
  }

  private connectionError(message: string, cause: unknown): ConnectionError {
    const detail = cause instanceof Error ? cause.message : String(cause)

    return new ConnectionError(`${message} on ${this.host}: ${detail}`, {
      cause,
      context: { host: this.host },
    })
  }
}

function toRedisArg(arg: WireArg): string | Buffer {
  if (typeof arg === "string" || Buffer.isBuffer(arg)) return arg

  return Buffer.from(arg.buffer, arg.byteOffset, arg.byteLength)
}
