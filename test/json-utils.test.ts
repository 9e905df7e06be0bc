import { LosslessNumber } from "lossless-json"
import { describe, expect, test } from "vitest"

import { parseJsonDocuments, readObject, tryParseJsonObject } from "../src/json-utils.js"

describe("json-utils", () => {
  test("parses direct JSON object", () => {
    expect(tryParseJsonObject('{"ok":true}')).toEqual({ ok: true })
  })

  test("returns null for non-object JSON", () => {
    expect(tryParseJsonObject("[]")).toBeNull()
    expect(tryParseJsonObject('"x"')).toBeNull()
    expect(tryParseJsonObject("not-json")).toBeNull()
  })

  test("reads nested objects and ignores anything else", () => {
    expect(readObject({ backend: { url: "x" } }, "backend")).toEqual({ url: "x" })
    expect(readObject({ backend: ["x"] }, "backend")).toEqual({})
    expect(readObject(null, "backend")).toEqual({})
  })
})

describe("parseJsonDocuments", () => {
  test("accepts a single object, an array and newline-delimited objects", () => {
    const one = new LosslessNumber("1")
    const two = new LosslessNumber("2")
    expect(parseJsonDocuments('{"a":1}')).toEqual([{ a: one }])
    expect(parseJsonDocuments('[{"a":1},{"a":2}]')).toEqual([{ a: one }, { a: two }])
    expect(parseJsonDocuments('{"a":1}\r\n\n{"a":2}\n')).toEqual([{ a: one }, { a: two }])
  })

  test("keeps the source text of numbers", () => {
    expect(parseJsonDocuments('{"value":230.0,"id":7}')).toEqual([
      { value: new LosslessNumber("230.0"), id: new LosslessNumber("7") },
    ])
  })

  test("returns an empty list for a blank body", () => {
    expect(parseJsonDocuments("  \n")).toEqual([])
  })

  test("returns null when any line is not JSON", () => {
    expect(parseJsonDocuments('{"a":1}\n{oops')).toBeNull()
    expect(parseJsonDocuments("not-json")).toBeNull()
  })
})
