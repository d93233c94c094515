import type { MonotonicClock } from "@ferrum/clock"
import { createNullLogger, type Logger } from "@ferrum/logger"
import { ClientUsageError, DisposedError } from "../../errors/client-errors"
import type { Adapter, UseType } from "../../ports/adapter"
import type { CodecHooks } from "../../ports/codec-hooks"
import type { WireArg } from "../../ports/command"
import type { InterceptedClient } from "../../ports/interceptor"
import type { ReplyParser } from "../../ports/reply"
import type { DecodeOptions, TextEncoding, ValueType } from "../../ports/value-type"
import { decodeValue } from "../codec/decode-value"
import { encodeValue, type WireValue } from "../codec/encode-value"
import { text } from "../codec/value-types"
import { CommandPacket } from "../command/command-packet"
import { NoticeSink } from "../notice/notice-sink"
import { CallPipeline, type ResultGuard } from "../pipeline/call-pipeline"
import { InterceptorRegistry } from "../registry/interceptor-registry"
import { asArray, asInteger, asPayload, asText } from "../reply/reply-values"
import { throwOrValue, valueParser } from "../reply/throw-or-value"
import { DisposeGuard } from "./dispose-guard"

export type RedisClientDeps = {
  adapter: Adapter
  logger?: Logger
  clock?: MonotonicClock
  /** Shared with the adapter when it reports connection events. */
  notices?: NoticeSink
}

export type RedisClientOptions = {
  /** Prepended to every key. */
  prefix?: string
  /** Text encoding for decoding replies. Defaults to `utf8`. */
  encoding?: TextEncoding
  hooks?: CodecHooks
}

export type SetOptions = {
  /** Expiry in milliseconds. */
  px?: number
  /** Only set when the key does not exist. */
  nx?: boolean
  /** Only set when the key already exists. */
  xx?: boolean
}

const anyValue = (_value: unknown): _value is unknown => true
const isString = (value: unknown): value is string => typeof value === "string"
const isNumber = (value: unknown): value is number => typeof value === "number"
const isBoolean = (value: unknown): value is boolean => typeof value === "boolean"
const isVoid = (value: unknown): value is void => value === undefined

/**
 * Releases adapters of clients that were collected without `dispose()`.
 * The held guard never references its client.
 */
const finalizer = new FinalizationRegistry<DisposeGuard>((guard) => {
  void guard.run()
})

/**
 * Entry point for issuing commands.
 *
 * @remarks
 * Every command goes through the call pipeline: prefixing, registered
 * interceptors and, while someone listens, a call notice.
 *
 * Call `dispose()` when done. Repeated and concurrent calls release the
 * adapter once.
 */
export class RedisClient implements InterceptedClient {
  readonly notices: NoticeSink
  readonly interceptors: InterceptorRegistry

  private readonly adapter: Adapter
  private readonly pipeline: CallPipeline
  private readonly guard: DisposeGuard
  private readonly logger: Logger
  private readonly decodeOptions: DecodeOptions

  constructor(
    deps: RedisClientDeps,
    private readonly opts: RedisClientOptions = {},
  ) {
    this.adapter = deps.adapter
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "client",
      useType: deps.adapter.useType,
      ...(opts.prefix ? { prefix: opts.prefix } : {}),
    })

    this.notices = deps.notices ?? new NoticeSink()
    this.interceptors = new InterceptorRegistry(this.logger)
    this.pipeline = new CallPipeline({
      client: this,
      interceptors: this.interceptors,
      notices: this.notices,
      prefix: opts.prefix || null,
      ...(deps.clock && { clock: deps.clock }),
    })

    this.decodeOptions = {
      encoding: opts.encoding ?? "utf8",
      ...(opts.hooks && { hooks: opts.hooks }),
    }

    const adapter = deps.adapter
    this.guard = new DisposeGuard(() => adapter.dispose(), this.logger)
    finalizer.register(this, this.guard, this.guard)
  }

  get useType(): UseType {
    return this.adapter.useType
  }

  get isDisposed(): boolean {
    return this.guard.isDisposed
  }

  /** Runs a prepared command and returns the raw reply value. */
  call(command: CommandPacket): Promise<unknown> {
    return this.execute(command, throwOrValue, anyValue)
  }

  ping(message?: string): Promise<string> {
    const command = new CommandPacket("PING", { args: message === undefined ? [] : [message] })
    return this.execute(command, this.textParser(), isString)
  }

  echo(message: WireArg): Promise<string> {
    return this.execute(new CommandPacket("ECHO", { args: [message] }), this.textParser(), isString)
  }

  get(key: string): Promise<string | null>
  get<T>(key: string, type: ValueType<T>): Promise<T>
  get(key: string, type: ValueType<unknown> = text): Promise<unknown> {
    return this.execute(
      new CommandPacket("GET", { keys: [key] }),
      valueParser((value) => this.decode(asPayload(value), type)),
      (value): value is unknown => type.is(value),
    )
  }

  mGet(keys: readonly string[]): Promise<(string | null)[]>
  mGet<T>(keys: readonly string[], type: ValueType<T>): Promise<T[]>
  mGet(keys: readonly string[], type: ValueType<unknown> = text): Promise<unknown[]> {
    return this.execute(
      new CommandPacket("MGET", { keys }),
      valueParser((value) => asArray(value).map((item) => this.decode(asPayload(item), type))),
      (value): value is unknown[] => Array.isArray(value) && value.every((v) => type.is(v)),
    )
  }

  /** Resolves `false` when `nx` or `xx` prevented the write. */
  async set(key: string, value: unknown, options: SetOptions = {}): Promise<boolean> {
    const args: WireArg[] = [this.encode(value) ?? ""]
    if (options.px !== undefined) args.push("PX", String(options.px))
    if (options.nx) args.push("NX")
    if (options.xx) args.push("XX")

    return this.execute(
      new CommandPacket("SET", { keys: [key], args }),
      valueParser((reply) => reply !== null),
      isBoolean,
    )
  }

  del(...keys: string[]): Promise<number> {
    return this.execute(new CommandPacket("DEL", { keys }), valueParser(asInteger), isNumber)
  }

  exists(...keys: string[]): Promise<number> {
    return this.execute(new CommandPacket("EXISTS", { keys }), valueParser(asInteger), isNumber)
  }

  incrBy(key: string, increment: number): Promise<number> {
    return this.execute(
      new CommandPacket("INCRBY", { keys: [key], args: [String(increment)] }),
      valueParser(asInteger),
      isNumber,
    )
  }

  /** Switches the logical database. Not available in cluster or sentinel mode. */
  async select(index: number): Promise<void> {
    this.checkUseTypeOrThrow("cluster", "sentinel")

    await this.execute(
      new CommandPacket("SELECT", { args: [String(index)] }),
      valueParser(() => undefined),
      isVoid,
    )
  }

  encode(value: unknown): WireValue | null {
    return encodeValue(value, this.opts.hooks)
  }

  decode<T>(payload: Uint8Array | null | undefined, type: ValueType<T>): T {
    return decodeValue(payload, type, this.decodeOptions)
  }

  /** Releases the adapter. Safe to call repeatedly; never rejects. */
  dispose(): Promise<void> {
    finalizer.unregister(this.guard)
    return this.guard.run()
  }

  private checkUseTypeOrThrow(...unsupported: UseType[]): void {
    if (unsupported.includes(this.adapter.useType)) {
      throw new ClientUsageError(this.adapter.useType)
    }
  }

  private textParser(): ReplyParser<string> {
    const encoding = this.decodeOptions.encoding ?? "utf8"
    return valueParser((value) => asText(value, encoding))
  }

  private async execute<T>(
    command: CommandPacket,
    parse: ReplyParser<T>,
    accepts: ResultGuard<T>,
  ): Promise<T> {
    if (this.guard.isDisposed) throw new DisposedError()

    return this.pipeline.run(command, () => this.adapter.call(command, parse), accepts)
  }
}
