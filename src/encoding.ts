import { EncodingError } from "./errors.js"
import type { AttributeValue, MetricValue } from "./models.js"

export function encodeFieldValue(value: MetricValue): string {
  switch (value.kind) {
    case "string":
      // Line protocol would need `"` and `\` escaped here; values are sent verbatim.
      return `"${value.value}"`
    case "bool":
      return value.value ? "true" : "false"
    case "integer":
      return `${BigInt(value.value).toString()}i`
    case "float":
      if (!Number.isFinite(value.value)) {
        throw new EncodingError(`Cannot encode non-finite float: ${value.value}`)
      }
      return String(value.value)
  }
}

export function encodeTagValue(raw: AttributeValue): string {
  if (typeof raw === "string") {
    return raw.replace(/ /g, "\\ ")
  }
  return String(raw)
}

function joinPairs(pairs: Iterable<[string, string]>): string {
  return Array.from(pairs, ([key, value]) => `${key}=${value}`).join(",")
}

/**
 * Renders one line-protocol record:
 * `<family>,<tag>=<value>,... <field>=<value>,... [<timestamp_ns>]`.
 *
 * A plain string for `fields` is treated as an already encoded single value and
 * written as `value=<fields>`.
 */
export function renderEntry(
  family: string,
  tags: Map<string, string> | Record<string, string>,
  fields: Map<string, string> | Record<string, string> | string,
  timestampNs?: bigint,
): string {
  const tagPairs = tags instanceof Map ? tags.entries() : Object.entries(tags)
  const fieldSegment =
    typeof fields === "string"
      ? `value=${fields}`
      : joinPairs(fields instanceof Map ? fields.entries() : Object.entries(fields))
  if (!fieldSegment) {
    throw new EncodingError(`Entry for ${family} has no fields`)
  }
  const timestampSegment = timestampNs === undefined ? "" : ` ${timestampNs.toString()}`
  return `${family},${joinPairs(tagPairs)} ${fieldSegment}${timestampSegment}`
}
