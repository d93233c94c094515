import { ConversionError } from "../../errors/client-errors"
import type { TextEncoding } from "../../ports/value-type"

export function asPayload(value: unknown): Uint8Array | null {
  if (value === null || value === undefined) return null
  if (value instanceof Uint8Array) return value
  if (typeof value === "string") return Buffer.from(value, "utf8")
  if (typeof value === "number" || typeof value === "bigint") return Buffer.from(String(value))

  throw unexpected("a bulk string", value)
}

export function asText(value: unknown, encoding: TextEncoding): string {
  if (typeof value === "string") return value

  const payload = asPayload(value)
  if (payload === null) return ""

  return Buffer.from(payload).toString(encoding)
}

/** Integers beyond `Number.MAX_SAFE_INTEGER` are rejected, never rounded. */
export function asInteger(value: unknown): number {
  if (typeof value === "number" && Number.isInteger(value)) return safe(value, value)
  if (typeof value === "bigint") return safe(Number(value), value)

  if (typeof value === "string" || value instanceof Uint8Array) {
    const digits = typeof value === "string" ? value : Buffer.from(value).toString("utf8")
    const parsed = Number(digits)
    if (Number.isInteger(parsed)) return safe(parsed, digits)
  }

  throw unexpected("an integer", value)
}

function safe(parsed: number, raw: number | bigint | string): number {
  if (Number.isSafeInteger(parsed)) return parsed

  throw new ConversionError(`Integer reply ${String(raw)} is outside the safe integer range`, {
    reply: String(raw),
  })
}

export function asArray(value: unknown): unknown[] {
  if (Array.isArray(value)) return value

  throw unexpected("an array", value)
}

function unexpected(expected: string, value: unknown): ConversionError {
  const actual = value === null ? "null" : typeof value

  return new ConversionError(`Expected ${expected} reply, got ${actual}`, { expected, actual })
}
