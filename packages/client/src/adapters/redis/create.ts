import type { MonotonicClock } from "@ferrum/clock"
import {
  createPinoLogger,
  type Logger,
  type LogLevelName,
  logLevelNames,
  type PinoLoggerDeps,
} from "@ferrum/logger"
import { type ClientConfig, redactUrl } from "../../config/core/client-config"
import { RedisClient, type RedisClientOptions } from "../../core/client/redis-client"
import { createNoticeLogger } from "../../core/notice/notice-logger"
import { NoticeSink } from "../../core/notice/notice-sink"
import type { UseType } from "../../ports/adapter"
import { RedisAdapter } from "./redis-adapter"
import { createRedisCommandClient, type RedisCommandClient } from "./redis-command-client"

export type CreateRedisClientOptions = RedisClientOptions & {
  url: string
  useType?: UseType
}

export type CreateRedisClientDeps = {
  logger?: Logger
  clock?: MonotonicClock
  /** Defaults to a node-redis client for `url`. */
  client?: RedisCommandClient
}

/**
 * Wires a node-redis client, a `RedisAdapter` and a `RedisClient` together.
 * Connection events of the adapter are published on `client.notices`.
 */
export function createRedisClient(
  options: CreateRedisClientOptions,
  deps: CreateRedisClientDeps = {},
): RedisClient {
  const { url, useType, ...clientOptions } = options
  const notices = new NoticeSink()

  const adapter = new RedisAdapter(
    {
      client: deps.client ?? createRedisCommandClient({ url }),
      onInfo: (notice) => notices.emit(notice),
      ...(deps.logger && { logger: deps.logger }),
    },
    { url, ...(useType && { useType }) },
  )

  return new RedisClient(
    {
      adapter,
      notices,
      ...(deps.logger && { logger: deps.logger }),
      ...(deps.clock && { clock: deps.clock }),
    },
    clientOptions,
  )
}

export type CreateFromConfigDeps = Omit<CreateRedisClientDeps, "logger"> & {
  /** Where log lines go. Defaults to stdout. */
  destination?: PinoLoggerDeps["destination"]
}

/**
 * Builds a client from loaded configuration with a pino logger.
 *
 * @remarks
 * At `debug` and below every call is logged through a notice subscriber,
 * which turns off the uninstrumented call path.
 */
export function createRedisClientFromConfig(
  config: ClientConfig,
  deps: CreateFromConfigDeps = {},
): RedisClient {
  const { destination, ...rest } = deps
  const logger = createPinoLogger(
    { level: config.LOG_LEVEL, prettify: config.LOG_PRETTY },
    {},
    { ...(destination && { destination }) },
  )

  const client = createRedisClient(
    {
      url: config.URL,
      useType: config.USE_TYPE,
      encoding: config.ENCODING,
      ...(config.PREFIX ? { prefix: config.PREFIX } : {}),
    },
    { ...rest, logger },
  )

  logger.info("redis client created", {
    url: redactUrl(config.URL),
    useType: config.USE_TYPE,
  })

  if (logsCalls(config.LOG_LEVEL)) {
    client.notices.subscribe(createNoticeLogger(logger))
  }

  return client
}

function logsCalls(level: LogLevelName): boolean {
  return logLevelNames.indexOf(level) <= logLevelNames.indexOf("debug")
}
