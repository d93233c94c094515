import { createClient, RESP_TYPES, type RedisClientOptions } from "redis"

/**
 * The part of a node-redis client the adapter uses. Bulk strings arrive as
 * `Buffer`.
 */
export type RedisCommandClient = {
  isOpen: boolean

  connect(): Promise<unknown>
  quit(): Promise<unknown>

  sendCommand(args: Array<string | Buffer>): Promise<unknown>

  on(event: "connect" | "ready" | "end" | "reconnecting", listener: () => void): unknown
  on(event: "error", listener: (error: Error) => void): unknown
}

export type RedisCommandClientOptions = { url: string } & Omit<RedisClientOptions, "url">

export function createRedisCommandClient(options: RedisCommandClientOptions): RedisCommandClient {
  return createClient({ ...options, url: options.url }).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisCommandClient
}
