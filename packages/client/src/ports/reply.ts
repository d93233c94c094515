/**
 * A single reply as handed to a reply parser by an adapter.
 */
export type RedisReply =
  | { kind: "value"; value: unknown }
  | { kind: "error"; message: string }

export type ReplyParser<T> = (reply: RedisReply) => T
