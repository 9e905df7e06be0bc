import { isLosslessNumber } from "lossless-json"

import { SampleValidationError } from "./errors.js"
import { isRecord } from "./json-utils.js"

export type MetricValue =
  | { kind: "string"; value: string }
  | { kind: "bool"; value: boolean }
  | { kind: "integer"; value: number | bigint }
  | { kind: "float"; value: number }

export type AttributeValue = string | number | boolean | bigint | null

export interface MetricSample {
  source: string
  family: string
  name: string
  /** Seconds since the epoch. */
  timestamp: number
  value: MetricValue
  attributes: Record<string, AttributeValue>
}

export interface Definition {
  tags: string[]
  description?: string
  unit?: string
  mtype?: string
}

/** source -> family -> metric name -> definition */
export type DefinitionMap = Record<string, Record<string, Record<string, Definition>>>

/** Ordered tag key to escaped tag value. Always starts with `type`. */
export type TagSet = Map<string, string>

export interface Group {
  timestampNs: bigint
  tags: TagSet
  fields: Map<string, string>
  lastTouchedMs: number
}

const RESERVED_KEYS = new Set([
  "source",
  "type",
  "family",
  "metric",
  "name",
  "timestamp",
  "value",
  "value_type",
])

const NANOS_PER_SECOND = 1_000_000_000n

export function toNanoseconds(seconds: number): bigint {
  if (Number.isInteger(seconds)) {
    return BigInt(seconds) * NANOS_PER_SECOND
  }
  return BigInt(Math.round(seconds * 1_000_000)) * 1_000n
}

const INTEGER_TEXT = /^-?\d+$/

/** Classifies a number by its JSON source text: `230.0` is a float, `230` an integer. */
function classifyNumberText(text: string, hint?: "integer" | "float"): MetricValue {
  const numeric = Number(text)
  if (INTEGER_TEXT.test(text) && hint !== "float") {
    return { kind: "integer", value: Number.isSafeInteger(numeric) ? numeric : BigInt(text) }
  }
  return classifyValue(numeric, hint ?? "float")
}

function numericOf(value: unknown): number | undefined {
  if (typeof value === "number") {
    return value
  }
  return isLosslessNumber(value) ? Number(value.value) : undefined
}

export function classifyValue(raw: unknown, hint?: "integer" | "float"): MetricValue {
  if (isLosslessNumber(raw)) {
    return classifyNumberText(raw.value, hint)
  }
  if (typeof raw === "string") {
    return { kind: "string", value: raw }
  }
  // booleans first: they must never be treated as integers
  if (typeof raw === "boolean") {
    return { kind: "bool", value: raw }
  }
  if (typeof raw === "bigint") {
    return hint === "float" ? { kind: "float", value: Number(raw) } : { kind: "integer", value: raw }
  }
  if (typeof raw === "number") {
    if (!Number.isFinite(raw)) {
      throw new SampleValidationError(`Metric value must be finite: ${raw}`)
    }
    if (hint === "float") {
      return { kind: "float", value: raw }
    }
    if (hint === "integer") {
      if (!Number.isInteger(raw)) {
        throw new SampleValidationError(`Metric value marked integer is fractional: ${raw}`)
      }
      return { kind: "integer", value: raw }
    }
    return Number.isInteger(raw) ? { kind: "integer", value: raw } : { kind: "float", value: raw }
  }
  throw new SampleValidationError(`Unsupported metric value type: ${raw === null ? "null" : typeof raw}`)
}

function requireString(payload: Record<string, unknown>, keys: string[]): string {
  for (const key of keys) {
    const value = payload[key]
    if (typeof value === "string" && value !== "") {
      return value
    }
  }
  throw new SampleValidationError(`Sample is missing ${keys.join("/")}`)
}

function readAttribute(value: unknown): AttributeValue | undefined {
  if (isLosslessNumber(value)) {
    return value.value
  }
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    typeof value === "bigint"
  ) {
    return value
  }
  return undefined
}

/**
 * Validates a host payload such as
 * `{"source": "Gateway", "type": "energy", "metric": "power", "timestamp": 1497677091, "device": "Meter 1", "value": 1234}`.
 */
export function parseSample(input: unknown): MetricSample {
  if (!isRecord(input)) {
    throw new SampleValidationError("Sample must be a JSON object")
  }

  const source = requireString(input, ["source"])
  const family = requireString(input, ["type", "family"])
  const name = requireString(input, ["metric", "name"])

  const timestamp = numericOf(input.timestamp)
  if (timestamp === undefined || !Number.isFinite(timestamp) || timestamp < 0) {
    throw new SampleValidationError(`Sample for ${name} has an invalid timestamp`)
  }

  const hint = input.value_type
  if (hint !== undefined && hint !== "integer" && hint !== "float") {
    throw new SampleValidationError(`Unknown value_type: ${String(hint)}`)
  }

  const attributes: Record<string, AttributeValue> = {}
  for (const [key, value] of Object.entries(input)) {
    if (RESERVED_KEYS.has(key)) {
      continue
    }
    const attribute = readAttribute(value)
    if (attribute !== undefined) {
      attributes[key] = attribute
    }
  }

  return {
    source,
    family,
    name,
    timestamp,
    value: classifyValue(input.value, hint),
    attributes,
  }
}
