import type { CodecHooks } from "./codec-hooks"

/** Text encodings a payload may be decoded with. */
export const textEncodings = ["utf8", "utf16le", "latin1", "ascii", "base64", "hex"] as const

export type TextEncoding = (typeof textEncodings)[number]

export type ParseResult<T> = { ok: true; value: T } | { ok: false }

/**
 * How a value type turns a payload into a value.
 *
 * @remarks
 * - `payload` rules read the raw bytes and run before any text decoding.
 * - `boolean`, `char`, `duration` and `parse` rules read the decoded text and
 *   fall back to the type default when `tryParse` fails.
 * - `convert` rules defer to the codec hooks first; `convert` itself is the
 *   generic conversion and may throw. Without it the type has no conversion.
 */
export type DecodeRule<T> =
  | { kind: "payload"; read(payload: Uint8Array, encoding: TextEncoding): T }
  | {
      kind: "boolean" | "char" | "duration" | "parse"
      tryParse(text: string): ParseResult<T>
    }
  | { kind: "convert"; convert?: (text: string) => T }

/**
 * Runtime descriptor of a decode target.
 *
 * @typeParam T - The value produced when decoding with this type.
 */
export interface ValueType<T> {
  readonly name: string

  /** `true` for the optional-of-T wrapper produced by `optional()`. */
  readonly optional: boolean

  readonly rule: DecodeRule<T>

  /** Value returned for a missing, empty or unparsable payload. */
  defaultValue(): T

  /** Whether a runtime value belongs to this type. */
  is(value: unknown): value is T
}

export type DecodeOptions = {
  encoding?: TextEncoding
  hooks?: CodecHooks
}
