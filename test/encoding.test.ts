import { describe, expect, test } from "vitest"

import { encodeFieldValue, encodeTagValue, renderEntry } from "../src/encoding.js"
import { EncodingError } from "../src/errors.js"
import { classifyValue } from "../src/models.js"

describe("encodeFieldValue", () => {
  test("wraps strings in double quotes", () => {
    expect(encodeFieldValue({ kind: "string", value: "x" })).toBe('"x"')
  })

  test("leaves embedded quotes untouched", () => {
    expect(encodeFieldValue({ kind: "string", value: 'say "hi"' })).toBe('"say "hi""')
  })

  test("writes booleans as true/false", () => {
    expect(encodeFieldValue({ kind: "bool", value: true })).toBe("true")
    expect(encodeFieldValue({ kind: "bool", value: false })).toBe("false")
  })

  test("suffixes integers with i", () => {
    expect(encodeFieldValue({ kind: "integer", value: 42 })).toBe("42i")
    expect(encodeFieldValue({ kind: "integer", value: -7 })).toBe("-7i")
    expect(encodeFieldValue({ kind: "integer", value: 9007199254740993n })).toBe("9007199254740993i")
  })

  test("writes floats as plain decimals", () => {
    expect(encodeFieldValue({ kind: "float", value: 3.14 })).toBe("3.14")
    expect(encodeFieldValue({ kind: "float", value: 2 })).toBe("2")
  })

  test("rejects non-finite floats", () => {
    expect(() => encodeFieldValue({ kind: "float", value: Number.NaN })).toThrow(EncodingError)
  })

  test("never encodes a boolean sample as an integer", () => {
    expect(encodeFieldValue(classifyValue(true))).toBe("true")
    expect(encodeFieldValue(classifyValue(42))).toBe("42i")
    expect(encodeFieldValue(classifyValue(3.14))).toBe("3.14")
  })
})

describe("encodeTagValue", () => {
  test("escapes every space in strings", () => {
    expect(encodeTagValue("a b")).toBe("a\\ b")
    expect(encodeTagValue("Meter  1 ")).toBe("Meter\\ \\ 1\\ ")
  })

  test("stringifies other values as-is", () => {
    expect(encodeTagValue(0)).toBe("0")
    expect(encodeTagValue(true)).toBe("true")
    expect(encodeTagValue(null)).toBe("null")
  })
})

describe("renderEntry", () => {
  test("renders tags, fields and timestamp", () => {
    const line = renderEntry(
      "power",
      { type: "energy", device: encodeTagValue("Meter 1") },
      { power: "1234i" },
      1497677091000000000n,
    )
    expect(line).toBe("power,type=energy,device=Meter\\ 1 power=1234i 1497677091000000000")
  })

  test("keeps insertion order of map fields", () => {
    const line = renderEntry(
      "energy",
      new Map([
        ["type", "gateway"],
        ["id", "3"],
      ]),
      new Map([
        ["power", "10i"],
        ["voltage", "230.5"],
      ]),
      5n,
    )
    expect(line).toBe("energy,type=gateway,id=3 power=10i,voltage=230.5 5")
  })

  test("omits the timestamp segment when none is given", () => {
    expect(renderEntry("power", { type: "energy" }, { power: "1i" })).toBe("power,type=energy power=1i")
  })

  test("writes a single encoded value under the value field", () => {
    expect(renderEntry("temperature", { type: "sensor" }, "21.5", 10n)).toBe("temperature,type=sensor value=21.5 10")
  })

  test("refuses an entry without fields", () => {
    expect(() => renderEntry("power", { type: "energy" }, {})).toThrow(EncodingError)
  })
})
