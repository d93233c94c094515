export { createRedisClient, createRedisClientFromConfig } from "./adapters/redis/create"
export type {
  CreateFromConfigDeps,
  CreateRedisClientDeps,
  CreateRedisClientOptions,
} from "./adapters/redis/create"
export { RedisAdapter } from "./adapters/redis/redis-adapter"
export type { RedisAdapterDeps, RedisAdapterOptions } from "./adapters/redis/redis-adapter"
export { createRedisCommandClient } from "./adapters/redis/redis-command-client"
export type {
  RedisCommandClient,
  RedisCommandClientOptions,
} from "./adapters/redis/redis-command-client"
export { DEFAULT_ENV_PREFIX, EnvSource } from "./config/adapters/env/env-source"
export type { EnvSourceOptions } from "./config/adapters/env/env-source"
export { ObjectSource } from "./config/adapters/object/object-source"
export { clientConfigSchema, loadClientConfig, redactUrl } from "./config/core/client-config"
export type { ClientConfig, LoadClientConfigOptions } from "./config/core/client-config"
export { loadConfig } from "./config/core/load-config"
export type { LoadConfigOptions } from "./config/core/load-config"
export type { LoadedConfig } from "./config/ports/config"
export type { ConfigSource } from "./config/ports/source"
export { RedisClient } from "./core/client/redis-client"
export type { RedisClientDeps, RedisClientOptions, SetOptions } from "./core/client/redis-client"
export { decodeValue } from "./core/codec/decode-value"
export { Duration } from "./core/codec/duration"
export { encodeValue } from "./core/codec/encode-value"
export type { WireValue } from "./core/codec/encode-value"
export {
  boolean,
  bytes,
  char,
  custom,
  dateTime,
  duration,
  flags,
  float64,
  int32,
  int64,
  json,
  optional,
  parseable,
  text,
  uuid,
} from "./core/codec/value-types"
export type { CustomSpec, ParseableSpec } from "./core/codec/value-types"
export { CommandPacket } from "./core/command/command-packet"
export type { CommandPacketInit } from "./core/command/command-packet"
export { createNoticeLogger } from "./core/notice/notice-logger"
export { NoticeSink } from "./core/notice/notice-sink"
export { CallPipeline, NOT_CONNECTED } from "./core/pipeline/call-pipeline"
export type { CallPipelineDeps, ResultGuard } from "./core/pipeline/call-pipeline"
export { InterceptorRegistry } from "./core/registry/interceptor-registry"
export type { RemoveInterceptor } from "./core/registry/interceptor-registry"
export { throwOrValue, valueParser } from "./core/reply/throw-or-value"
export { BaseError } from "./errors/base-error"
export type { BaseErrorOptions, ErrorCode, ErrorContext } from "./errors/base-error"
export {
  ClientUsageError,
  ConfigError,
  ConnectionError,
  ConversionError,
  DisposedError,
  ReplyError,
} from "./errors/client-errors"
export { useTypes } from "./ports/adapter"
export type { Adapter, UseType } from "./ports/adapter"
export type { CallOutcome } from "./ports/call-outcome"
export type { CodecHooks } from "./ports/codec-hooks"
export type { Command, WireArg, WireCommand } from "./ports/command"
export type {
  InterceptedClient,
  Interceptor,
  InterceptorAfterContext,
  InterceptorBeforeContext,
  InterceptorFactory,
} from "./ports/interceptor"
export type {
  CallNotice,
  InfoNotice,
  Notice,
  NoticeListener,
  NoticeType,
  Unsubscribe,
} from "./ports/notice"
export type { RedisReply, ReplyParser } from "./ports/reply"
export { textEncodings } from "./ports/value-type"
export type {
  DecodeOptions,
  DecodeRule,
  ParseResult,
  TextEncoding,
  ValueType,
} from "./ports/value-type"
