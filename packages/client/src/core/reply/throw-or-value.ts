import { ReplyError } from "../../errors/client-errors"
import type { RedisReply, ReplyParser } from "../../ports/reply"

/** Returns the reply value, or throws `ReplyError` for a server error reply. */
export function throwOrValue(reply: RedisReply): unknown {
  if (reply.kind === "error") {
    throw new ReplyError(reply.message)
  }

  return reply.value
}

/** Builds a parser that checks for error replies before mapping the value. */
export function valueParser<T>(map: (value: unknown) => T): ReplyParser<T> {
  return (reply) => map(throwOrValue(reply))
}
