import superjson from "superjson"
import type { CodecHooks } from "../../ports/codec-hooks"
import { Duration } from "./duration"
import { formatDateTime, isWireDate } from "./format-date-time"

/** What a value becomes on its way into a command. */
export type WireValue = string | Uint8Array

const GENERIC_TO_STRING = new Set<unknown>([Object.prototype.toString, Array.prototype.toString])

/**
 * Converts a native value into its wire form.
 *
 * @remarks
 * Rules apply in order: nullish, text and bytes, booleans (`"1"`/`"0"`),
 * dates, durations (tick count), numbers, then the serialize hook, then a
 * generic conversion. Dates the wire format cannot hold (invalid, or outside
 * years 1-9999) take the hook or generic path. Errors thrown by the hook are
 * not caught; nothing else throws.
 */
export function encodeValue(value: unknown, hooks?: CodecHooks): WireValue | null {
  if (value === null || value === undefined) return null
  if (typeof value === "string" || value instanceof Uint8Array) return value
  if (typeof value === "boolean") return value ? "1" : "0"
  if (value instanceof Date && isWireDate(value)) return formatDateTime(value)
  if (value instanceof Duration) return value.ticks.toString()
  if (typeof value === "number" || typeof value === "bigint") return String(value)

  if (hooks?.serialize) return hooks.serialize(value)

  return convertToText(value)
}

function convertToText(value: unknown): string {
  if (typeof value !== "object" || value === null) return String(value)

  const toString: unknown = Reflect.get(value, "toString")
  if (typeof toString === "function" && !GENERIC_TO_STRING.has(toString)) {
    return String(value)
  }

  return superjson.stringify(value)
}
