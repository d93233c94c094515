import { z } from "zod"
import { ConversionError } from "../../../errors/client-errors"
import type { ValueType } from "../../../ports/value-type"
import { decodeValue } from "../decode-value"
import { Duration } from "../duration"
import { encodeValue } from "../encode-value"
import {
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
} from "../value-types"

const utf8 = (value: string) => Buffer.from(value, "utf8")

function toPayload(wire: string | Uint8Array | null): Uint8Array | null {
  if (wire === null) return null
  return typeof wire === "string" ? utf8(wire) : wire
}

function roundTrip<T>(value: unknown, type: ValueType<T>): T {
  return decodeValue(toPayload(encodeValue(value)), type)
}

const Profile = z.object({ name: z.string(), visits: z.number() })

const allTypes: ValueType<unknown>[] = [
  bytes,
  text,
  flags,
  boolean,
  char,
  duration,
  int32,
  int64,
  float64,
  dateTime,
  uuid,
  optional(int32),
  json("profile", Profile),
]

describe("decodeValue", () => {
  describe("round trips", () => {
    it.each(["hello", "héllo wörld", "", "line\r\nbreak"])("text %j", (value) => {
      expect(roundTrip(value, text)).toBe(value)
    })

    it.each([true, false])("boolean %s", (value) => {
      expect(roundTrip(value, boolean)).toBe(value)
    })

    it.each([0, 42, -7, 2_147_483_647, -2_147_483_648])("int32 %d", (value) => {
      expect(roundTrip(value, int32)).toBe(value)
    })

    it.each([3.25, -0.5, 1e21, 5e-324, Number.MAX_VALUE])("float64 %d", (value) => {
      expect(roundTrip(value, float64)).toBe(value)
    })

    it("int64 beyond the safe integer range", () => {
      expect(roundTrip(9_007_199_254_740_993n, int64)).toBe(9_007_199_254_740_993n)
    })

    it.each([0, 1, 1_500, -250])("duration %d ms", (ms) => {
      const value = Duration.fromMilliseconds(ms)

      expect(roundTrip(value, duration).ticks).toBe(value.ticks)
    })

    it.each(["x", "7", "😀"])("char %j", (value) => {
      expect(roundTrip(value, char)).toBe(value)
    })

    it("bytes, as a copy", () => {
      const value = new Uint8Array([0, 255, 10])
      const decoded = roundTrip(value, bytes)

      expect(decoded).toEqual(new Uint8Array([0, 255, 10]))
      expect(decoded).not.toBe(value)
    })

    it("dates at seconds precision", () => {
      const value = new Date("2024-06-01T12:30:45Z")

      expect(roundTrip(value, dateTime)).toEqual(value)
    })

    it("structured data through the superjson fallback", () => {
      const value = { name: "ada", visits: 3 }

      expect(roundTrip(value, json("profile", Profile))).toEqual(value)
    })
  })

  describe("defaults", () => {
    it.each(allTypes.map((type) => [type.name, type] as const))(
      "null payload decodes %s to its default",
      (_, type) => {
        expect(decodeValue(null, type)).toEqual(type.defaultValue())
        expect(decodeValue(undefined, type)).toEqual(type.defaultValue())
      },
    )

    it.each(
      allTypes
        .filter((type) => type.rule.kind !== "payload")
        .map((type) => [type.name, type] as const),
    )("empty payload decodes %s to its default", (_, type) => {
      expect(decodeValue(new Uint8Array(0), type)).toEqual(type.defaultValue())
    })

    it("concrete default values", () => {
      expect(boolean.defaultValue()).toBe(false)
      expect(char.defaultValue()).toBe("")
      expect(int32.defaultValue()).toBe(0)
      expect(int64.defaultValue()).toBe(0n)
      expect(duration.defaultValue()).toBe(Duration.zero)
      expect(dateTime.defaultValue().toISOString()).toBe("0001-01-01T00:00:00.000Z")
      expect(uuid.defaultValue()).toBe("00000000-0000-0000-0000-000000000000")
      expect(text.defaultValue()).toBeNull()
      expect(optional(int32).defaultValue()).toBeNull()
    })

    it("keeps empty payloads for raw payload types", () => {
      expect(decodeValue(new Uint8Array(0), text)).toBe("")
      expect(decodeValue(new Uint8Array(0), flags)).toEqual([])
      expect(decodeValue(new Uint8Array(0), bytes)).toEqual(new Uint8Array(0))
    })
  })

  describe("booleans", () => {
    it("is true only for the text 1", () => {
      expect(decodeValue(utf8("1"), boolean)).toBe(true)
      expect(decodeValue(utf8("0"), boolean)).toBe(false)
      expect(decodeValue(utf8(""), boolean)).toBe(false)
      expect(decodeValue(utf8("true"), boolean)).toBe(false)
      expect(decodeValue(utf8("yes"), boolean)).toBe(false)
    })

    it("decodes one flag per byte", () => {
      expect(decodeValue(utf8("1011"), flags)).toEqual([true, false, true, true])
      expect(decodeValue(new Uint8Array([1, 49, 0x30]), flags)).toEqual([false, true, false])
    })
  })

  describe("malformed text", () => {
    const cases: [string, ValueType<unknown>, string, unknown][] = [
      ["int32", int32, "abc", 0],
      ["int32", int32, "12abc", 0],
      ["int32", int32, "99999999999", 0],
      ["int64", int64, "1.5", 0n],
      ["float64", float64, "1.2.3", 0],
      ["boolean", boolean, "maybe", false],
    ]

    it.each(cases)("%s from %j decodes to the default", (_, type, input, expected) => {
      expect(decodeValue(utf8(input), type)).toBe(expected)
    })

    it("duration", () => {
      expect(decodeValue(utf8("1.5"), duration)).toBe(Duration.zero)
      expect(decodeValue(utf8("99999999999999999999"), duration)).toBe(Duration.zero)
    })

    it("dateTime", () => {
      expect(decodeValue(utf8("yesterday"), dateTime).getTime()).toBe(-62_135_596_800_000)
    })

    it("uuid", () => {
      expect(decodeValue(utf8("not-a-uuid"), uuid)).toBe("00000000-0000-0000-0000-000000000000")
    })
  })

  describe("optional types", () => {
    it("decode like the inner type when the text parses", () => {
      expect(decodeValue(utf8("5"), optional(int32))).toBe(5)
      expect(decodeValue(utf8("1"), optional(boolean))).toBe(true)
    })

    it("decode to null when the text does not parse", () => {
      expect(decodeValue(utf8("abc"), optional(int32))).toBeNull()
    })

    it("are named after the inner type", () => {
      expect(optional(float64).name).toBe("float64?")
      expect(optional(float64).optional).toBe(true)
    })
  })

  describe("text encodings", () => {
    it("decodes text with the given encoding", () => {
      expect(decodeValue(new Uint8Array([0xe9]), text, { encoding: "latin1" })).toBe("é")
      expect(decodeValue(utf8("é"), text)).toBe("é")
    })

    it("decodes numbers with the given encoding", () => {
      expect(decodeValue(Buffer.from("42", "utf16le"), int32, { encoding: "utf16le" })).toBe(42)
    })
  })

  describe("chars", () => {
    it("takes the first code point", () => {
      expect(decodeValue(utf8("abc"), char)).toBe("a")
      expect(decodeValue(utf8("😀!"), char)).toBe("😀")
    })
  })

  describe("uuids", () => {
    it("normalises to lower case", () => {
      expect(decodeValue(utf8("3F2504E0-4F89-41D3-9A0C-0305E82C3301"), uuid)).toBe(
        "3f2504e0-4f89-41d3-9a0c-0305e82c3301",
      )
    })
  })

  describe("parseable types", () => {
    type Point = { x: number; y: number }

    const point = parseable<Point>({
      name: "point",
      tryParse: (text: string) => {
        const [x, y, ...rest] = text.split(",").map(Number)
        if (x === undefined || y === undefined || rest.length > 0) return { ok: false }
        if (Number.isNaN(x) || Number.isNaN(y)) return { ok: false }

        return { ok: true, value: { x, y } }
      },
      defaultValue: () => ({ x: 0, y: 0 }),
      is: (value: unknown): value is Point =>
        typeof value === "object" && value !== null && "x" in value && "y" in value,
    })

    it("use their own parser", () => {
      expect(decodeValue(utf8("3,4"), point)).toEqual({ x: 3, y: 4 })
    })

    it("decode to the default when parsing fails", () => {
      expect(decodeValue(utf8("3;4"), point)).toEqual({ x: 0, y: 0 })
    })

    it("take precedence over the deserialize hook", () => {
      const deserialize = vi.fn(() => ({ x: 9, y: 9 }))

      expect(decodeValue(utf8("1,2"), point, { hooks: { deserialize } })).toEqual({
        x: 1,
        y: 2,
      })
      expect(deserialize).not.toHaveBeenCalled()
    })
  })

  describe("types without a parser", () => {
    const tag = custom({
      name: "tag",
      defaultValue: () => "",
      is: (value: unknown): value is string => typeof value === "string",
    })

    it("use the deserialize hook", () => {
      const deserialize = vi.fn((text: string) => `#${text}`)

      expect(decodeValue(utf8("red"), tag, { hooks: { deserialize } })).toBe("#red")
      expect(deserialize).toHaveBeenCalledWith("red", tag)
    })

    it("reject hook results of the wrong type", () => {
      const run = () => decodeValue(utf8("red"), tag, { hooks: { deserialize: () => 42 } })

      expect(run).toThrow(ConversionError)
      expect(run).toThrow("Deserialize hook did not return a tag")
    })

    it("propagate hook errors unmodified", () => {
      const failure = new Error("hook failed")
      const deserialize = () => {
        throw failure
      }

      expect(() => decodeValue(utf8("red"), tag, { hooks: { deserialize } })).toThrow(failure)
    })

    it("fail without a hook or a generic conversion", () => {
      expect(() => decodeValue(utf8("red"), tag)).toThrow("No conversion from text to tag")
    })

    it("still default on empty payloads", () => {
      expect(decodeValue(new Uint8Array(0), tag)).toBe("")
    })

    it("treat a failing generic conversion as a hard error", () => {
      const profile = json("profile", Profile)

      expect(() => decodeValue(utf8("{not json"), profile)).toThrow(SyntaxError)
      expect(() => decodeValue(utf8('{"json":{"name":1}}'), profile)).toThrow(z.ZodError)
    })

    it("let the deserialize hook override the generic conversion", () => {
      const profile = json("profile", Profile)
      const deserialize = () => ({ name: "hooked", visits: 0 })

      expect(decodeValue(utf8("ignored"), profile, { hooks: { deserialize } })).toEqual({
        name: "hooked",
        visits: 0,
      })
    })
  })
})
