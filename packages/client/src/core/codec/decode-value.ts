import { ConversionError } from "../../errors/client-errors"
import type { CodecHooks } from "../../ports/codec-hooks"
import type { DecodeOptions, ValueType } from "../../ports/value-type"
import { decodeText } from "./value-types"

/**
 * Converts a raw payload into a value of `type`.
 *
 * @remarks
 * Never throws for missing, empty or malformed payloads: those decode to
 * `type.defaultValue()`. The only errors come from the deserialize hook, a
 * hook result of the wrong type, or a type whose generic conversion fails or
 * does not exist.
 *
 * Order: raw payload rules (bytes, text, flags), then text decoding, then the
 * empty check, then the text rule of the type (optional wrappers carry their
 * inner type's rule), then hook and generic conversion.
 */
export function decodeValue<T>(
  payload: Uint8Array | null | undefined,
  type: ValueType<T>,
  options: DecodeOptions = {},
): T {
  if (payload === null || payload === undefined) return type.defaultValue()

  const encoding = options.encoding ?? "utf8"
  const rule = type.rule

  if (rule.kind === "payload") return rule.read(payload, encoding)

  const text = decodeText(payload, encoding)
  if (text.length === 0) return type.defaultValue()

  switch (rule.kind) {
    case "boolean":
    case "char":
    case "duration":
    case "parse": {
      const parsed = rule.tryParse(text)
      return parsed.ok ? parsed.value : type.defaultValue()
    }
    case "convert":
      return convertText(text, type, rule.convert, options.hooks)
  }
}

function convertText<T>(
  text: string,
  type: ValueType<T>,
  convert: ((text: string) => T) | undefined,
  hooks: CodecHooks | undefined,
): T {
  if (hooks?.deserialize) {
    const value = hooks.deserialize(text, type)
    if (type.is(value)) return value

    throw new ConversionError(`Deserialize hook did not return a ${type.name}`, {
      type: type.name,
    })
  }

  if (convert) return convert(text)

  throw new ConversionError(`No conversion from text to ${type.name}`, { type: type.name })
}
