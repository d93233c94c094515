import type { ParseResult } from "../../ports/value-type"

const INTEGER = /^\s*([+-]?\d+)\s*$/
const DECIMAL = /^\s*([+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?)\s*$/
const SPECIAL = new Map<string, number>([
  ["Infinity", Number.POSITIVE_INFINITY],
  ["+Infinity", Number.POSITIVE_INFINITY],
  ["-Infinity", Number.NEGATIVE_INFINITY],
  ["NaN", Number.NaN],
])

const INT32_MIN = -(2 ** 31)
const INT32_MAX = 2 ** 31 - 1

export function parseBigInteger(
  text: string,
  min: bigint,
  max: bigint,
): ParseResult<bigint> {
  const match = INTEGER.exec(text)
  if (!match?.[1]) return { ok: false }

  const value = BigInt(match[1])
  if (value < min || value > max) return { ok: false }

  return { ok: true, value }
}

export function parseInt32(text: string): ParseResult<number> {
  const match = INTEGER.exec(text)
  if (!match?.[1]) return { ok: false }

  const value = Number(match[1])
  if (value < INT32_MIN || value > INT32_MAX) return { ok: false }

  // Normalise "-0" to 0.
  return { ok: true, value: value === 0 ? 0 : value }
}

export function parseFloat64(text: string): ParseResult<number> {
  const trimmed = text.trim()
  const special = SPECIAL.get(trimmed)
  if (special !== undefined) return { ok: true, value: special }

  const match = DECIMAL.exec(trimmed)
  if (!match?.[1]) return { ok: false }

  return { ok: true, value: Number(match[1]) }
}
