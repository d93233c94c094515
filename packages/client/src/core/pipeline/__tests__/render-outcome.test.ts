import { renderOutcome, renderValue } from "../render-outcome"

describe("renderValue", () => {
  it.each([
    [null, ""],
    [undefined, ""],
    ["text", "text"],
    [42, "42"],
    [true, "true"],
    [[1, 2, 3], "[1, 2, 3]"],
    [[], "[]"],
    [["a", null, [1, 2]], "[a, , [1, 2]]"],
  ])("renders %j as %j", (value, expected) => {
    expect(renderValue(value)).toBe(expected)
  })

  it("renders bigints in decimal", () => {
    expect(renderValue(10n)).toBe("10")
    expect(renderValue([1n, 2n])).toBe("[1, 2]")
  })

  it("decodes bytes as UTF-8", () => {
    expect(renderValue(Buffer.from("héllo"))).toBe("héllo")
    expect(renderValue(new Uint8Array([0x4f, 0x4b]))).toBe("OK")
  })

  it("renders dates in ISO-8601", () => {
    expect(renderValue(new Date("2024-05-06T07:08:09.010Z"))).toBe("2024-05-06T07:08:09.010Z")
    expect(renderValue(new Date(Number.NaN))).toBe("Invalid Date")
  })
})

describe("renderOutcome", () => {
  it("renders an error by its message", () => {
    expect(renderOutcome({ ok: false, error: new TypeError("bad") })).toBe("bad")
  })

  it("renders a non-error rejection as a value", () => {
    expect(renderOutcome({ ok: false, error: "plain" })).toBe("plain")
  })

  it("renders a value", () => {
    expect(renderOutcome({ ok: true, value: ["x", "y"] })).toBe("[x, y]")
  })
})
