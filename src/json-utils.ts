import { parse as parseLossless } from "lossless-json"

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value)
}

export function readObject(input: unknown, key: string): Record<string, unknown> {
  const root = isRecord(input) ? input : {}
  const value = root[key]
  return isRecord(value) ? value : {}
}

export function tryParseJsonObject(input: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(input)
    return isRecord(parsed) ? parsed : null
  } catch (error) {
    if (error instanceof SyntaxError) {
      return null
    }
    throw error
  }
}

/**
 * Parses a request body holding one JSON object, a JSON array, or
 * newline-delimited JSON objects. Returns null when any part is not JSON.
 *
 * Numbers are kept as `LosslessNumber` so `230.0` stays distinguishable from
 * `230`.
 */
export function parseJsonDocuments(text: string): unknown[] | null {
  const candidate = text.trim()
  if (!candidate) {
    return []
  }

  try {
    const parsed = parseLossless(candidate)
    return Array.isArray(parsed) ? parsed : [parsed]
  } catch (error) {
    if (!(error instanceof SyntaxError)) {
      throw error
    }
  }

  const documents: unknown[] = []
  for (const line of candidate.split(/\r?\n/)) {
    const trimmed = line.trim()
    if (!trimmed) {
      continue
    }
    try {
      documents.push(parseLossless(trimmed))
    } catch (error) {
      if (error instanceof SyntaxError) {
        return null
      }
      throw error
    }
  }
  return documents
}
