import { Agent, fetch as undiciFetch } from "undici"

import type { WriteTarget } from "./config.js"
import { DeliveryError, RelayError } from "./errors.js"
import { tryParseJsonObject } from "./json-utils.js"

export interface JsonRequestOptions {
  timeoutMs?: number
}

/** GETs `url` and returns its body as a JSON object. */
export async function requestJsonObject(url: string, options: JsonRequestOptions = {}): Promise<Record<string, unknown>> {
  const timeoutMs = options.timeoutMs ?? 10_000
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), timeoutMs)
  try {
    const response = await fetch(url, { signal: controller.signal })
    const raw = await response.text()
    if (!response.ok) {
      throw new RelayError(`HTTP ${response.status} ${response.statusText} for ${url}: ${raw.slice(0, 500)}`, "HTTP_STATUS")
    }

    const parsed = tryParseJsonObject(raw)
    if (!parsed) {
      throw new RelayError(`Invalid JSON response payload from ${url}: ${raw.slice(0, 500)}`, "HTTP_PAYLOAD")
    }
    return parsed
  } catch (error) {
    if (error instanceof RelayError) {
      throw error
    }
    if (error instanceof Error && error.name === "AbortError") {
      throw new RelayError(`Request timed out after ${timeoutMs}ms: ${url}`, "HTTP_TIMEOUT")
    }
    throw new RelayError(`Request failed for ${url}: ${String(error)}`, "HTTP_TRANSPORT")
  } finally {
    clearTimeout(timer)
  }
}

export interface WriteResult {
  status: number
  body: string
}

/** Sends one newline-joined batch of line-protocol entries. */
export interface WriteClient {
  write(target: WriteTarget, body: string): Promise<WriteResult>
}

export const REQUESTED_WITH = "metric-line-relay"

export function basicAuthHeader(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`, "utf-8").toString("base64")}`
}

export function writeHeaders(target: WriteTarget): Record<string, string> {
  const headers: Record<string, string> = {
    "content-type": "text/plain; charset=utf-8",
    ...target.headers,
  }
  if (target.auth) {
    headers.authorization = basicAuthHeader(target.auth.username, target.auth.password)
  }
  return headers
}

/** Posts to `{url}/write?db={database}` with TLS certificate verification disabled. */
export class InfluxWriteClient implements WriteClient {
  private readonly dispatcher: Agent

  constructor(dispatcher?: Agent) {
    this.dispatcher = dispatcher ?? new Agent({ connect: { rejectUnauthorized: false } })
  }

  async write(target: WriteTarget, body: string): Promise<WriteResult> {
    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), target.timeoutMs)
    try {
      const response = await undiciFetch(target.endpoint, {
        method: "POST",
        headers: writeHeaders(target),
        body,
        dispatcher: this.dispatcher,
        signal: controller.signal,
      })
      return { status: response.status, body: await response.text() }
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new DeliveryError(`Write timed out after ${target.timeoutMs}ms: ${target.endpoint}`)
      }
      throw new DeliveryError(`Write failed for ${target.endpoint}: ${String(error)}`)
    } finally {
      clearTimeout(timer)
    }
  }

  async close(): Promise<void> {
    await this.dispatcher.close()
  }
}
