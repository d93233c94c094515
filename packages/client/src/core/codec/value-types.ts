import superjson from "superjson"
import { NIL as NIL_UUID, validate as isUuid } from "uuid"
import type { ZodType } from "zod"
import type { ParseResult, TextEncoding, ValueType } from "../../ports/value-type"
import { Duration, MAX_TICKS, MIN_TICKS } from "./duration"
import { parseBigInteger, parseFloat64, parseInt32 } from "./parse-number"

const INT64_MIN = MIN_TICKS
const INT64_MAX = MAX_TICKS
const ASCII_ONE = 0x31

/** 0001-01-01T00:00:00Z, the earliest representable date-time. */
const MIN_DATE_MS = -62_135_596_800_000

export function decodeText(payload: Uint8Array, encoding: TextEncoding): string {
  return Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength).toString(encoding)
}

/** Raw payload bytes, copied out of the reply buffer. */
export const bytes: ValueType<Uint8Array | null> = {
  name: "bytes",
  optional: false,
  rule: { kind: "payload", read: (payload) => Uint8Array.from(payload) },
  defaultValue: () => null,
  is: (value): value is Uint8Array | null => value === null || value instanceof Uint8Array,
}

export const text: ValueType<string | null> = {
  name: "text",
  optional: false,
  rule: { kind: "payload", read: decodeText },
  defaultValue: () => null,
  is: (value): value is string | null => value === null || typeof value === "string",
}

/** One flag per payload byte, set when the byte is ASCII `'1'`. */
export const flags: ValueType<boolean[] | null> = {
  name: "flags",
  optional: false,
  rule: { kind: "payload", read: (payload) => Array.from(payload, (b) => b === ASCII_ONE) },
  defaultValue: () => null,
  is: (value): value is boolean[] | null =>
    value === null || (Array.isArray(value) && value.every((v) => typeof v === "boolean")),
}

export const boolean: ValueType<boolean> = {
  name: "boolean",
  optional: false,
  rule: { kind: "boolean", tryParse: (text) => ({ ok: true, value: text === "1" }) },
  defaultValue: () => false,
  is: (value): value is boolean => typeof value === "boolean",
}

/** A single character, i.e. one code point. */
export const char: ValueType<string> = {
  name: "char",
  optional: false,
  rule: {
    kind: "char",
    tryParse: (text) => {
      const codePoint = text.codePointAt(0)
      if (codePoint === undefined) return { ok: false }

      return { ok: true, value: String.fromCodePoint(codePoint) }
    },
  },
  defaultValue: () => "",
  is: (value): value is string => typeof value === "string" && [...value].length === 1,
}

export const duration: ValueType<Duration> = {
  name: "duration",
  optional: false,
  rule: {
    kind: "duration",
    tryParse: (text) => {
      const ticks = parseBigInteger(text, MIN_TICKS, MAX_TICKS)
      if (!ticks.ok) return { ok: false }

      return { ok: true, value: Duration.fromTicks(ticks.value) }
    },
  },
  defaultValue: () => Duration.zero,
  is: (value): value is Duration => value instanceof Duration,
}

export const int32: ValueType<number> = parseable({
  name: "int32",
  tryParse: parseInt32,
  defaultValue: () => 0,
  is: (value): value is number => Number.isInteger(value),
})

export const int64: ValueType<bigint> = parseable({
  name: "int64",
  tryParse: (text) => parseBigInteger(text, INT64_MIN, INT64_MAX),
  defaultValue: () => 0n,
  is: (value): value is bigint => typeof value === "bigint",
})

export const float64: ValueType<number> = parseable({
  name: "float64",
  tryParse: parseFloat64,
  defaultValue: () => 0,
  is: (value): value is number => typeof value === "number",
})

export const dateTime: ValueType<Date> = parseable({
  name: "dateTime",
  tryParse: (text) => {
    const ms = Date.parse(text)
    if (Number.isNaN(ms)) return { ok: false }

    return { ok: true, value: new Date(ms) }
  },
  defaultValue: () => new Date(MIN_DATE_MS),
  is: (value): value is Date => value instanceof Date,
})

/** A UUID string, normalised to lower case. */
export const uuid: ValueType<string> = parseable({
  name: "uuid",
  tryParse: (text) => {
    const candidate = text.trim().toLowerCase()
    if (!isUuid(candidate)) return { ok: false }

    return { ok: true, value: candidate }
  },
  defaultValue: () => NIL_UUID,
  is: (value): value is string => typeof value === "string" && isUuid(value),
})

export type ParseableSpec<T> = {
  name: string
  tryParse(text: string): ParseResult<T>
  defaultValue(): T
  is(value: unknown): value is T
}

/**
 * Declares a type that knows how to parse itself from text. A failed parse
 * decodes to the type default.
 */
export function parseable<T>(spec: ParseableSpec<T>): ValueType<T> {
  return {
    name: spec.name,
    optional: false,
    rule: { kind: "parse", tryParse: (text) => spec.tryParse(text) },
    defaultValue: () => spec.defaultValue(),
    is: (value): value is T => spec.is(value),
  }
}

export type CustomSpec<T> = {
  name: string
  defaultValue(): T
  is(value: unknown): value is T
  /** Generic conversion used when no deserialize hook is configured. May throw. */
  convert?: (text: string) => T
}

/**
 * Declares a type decoded through the client's deserialize hook. Without a
 * hook it falls back to `convert`; without either, decoding it is an error.
 */
export function custom<T>(spec: CustomSpec<T>): ValueType<T> {
  return {
    name: spec.name,
    optional: false,
    rule: { kind: "convert", ...(spec.convert && { convert: spec.convert }) },
    defaultValue: () => spec.defaultValue(),
    is: (value): value is T => spec.is(value),
  }
}

/**
 * Structured data stored with superjson and checked against `schema`.
 *
 * @remarks
 * A payload that is not valid superjson, or does not satisfy the schema, is a
 * hard error rather than a default.
 */
export function json<T>(name: string, schema: ZodType<T>): ValueType<T | null> {
  return custom<T | null>({
    name,
    defaultValue: () => null,
    is: (value): value is T | null => value === null || schema.safeParse(value).success,
    convert: (text) => schema.parse(superjson.parse(text)),
  })
}

/**
 * Wraps a type so that missing and unparsable payloads decode to `null`.
 */
export function optional<T>(inner: ValueType<T>): ValueType<T | null> {
  return {
    name: `${inner.name}?`,
    optional: true,
    rule: inner.rule,
    defaultValue: () => null,
    is: (value): value is T | null => value === null || inner.is(value),
  }
}
