import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http"
import type { AddressInfo } from "node:net"

import { WebSocketServer, type RawData, type WebSocket } from "ws"

import { errorCodeOf } from "./errors.js"
import { parseJsonDocuments } from "./json-utils.js"
import { errorMessage, logError, logInfo, logWarn } from "./logger.js"
import type { RelayIngestResult, RelayStats } from "./relay.js"

export const MAX_BODY_BYTES = 1024 * 1024

export interface IngestTarget {
  ingest(raw: unknown): RelayIngestResult
  stats(): RelayStats
}

export interface IngestSummary {
  accepted: number
  dropped: number
  errors: number
}

class PayloadTooLargeError extends Error {
  constructor() {
    super(`Request body exceeds ${MAX_BODY_BYTES} bytes`)
    this.name = "PayloadTooLargeError"
  }
}

export function ingestDocuments(target: IngestTarget, documents: unknown[]): IngestSummary {
  const summary: IngestSummary = { accepted: 0, dropped: 0, errors: 0 }
  for (const document of documents) {
    const result = target.ingest(document)
    if (result.status === "dropped") {
      summary.dropped += 1
    } else if (result.status === "error") {
      summary.errors += 1
    } else {
      summary.accepted += 1
    }
  }
  return summary
}

/**
 * HTTP and WebSocket front door for the host process:
 * `POST /samples`, `GET /health`, `GET /stats`, and one sample (or array) per
 * WebSocket text message.
 */
export class IngestServer {
  private readonly server: Server
  private readonly wss: WebSocketServer

  constructor(private readonly target: IngestTarget) {
    this.server = createServer((request, response) => {
      this.handleRequest(request, response).catch((error: unknown) => {
        logError("Unhandled ingest request failure", error, { phase: "ingest.serve-request" })
        if (!response.headersSent) {
          json(response, 500, { error: errorMessage(error), errorCode: errorCodeOf(error) })
        }
      })
    })
    this.wss = new WebSocketServer({ server: this.server, maxPayload: MAX_BODY_BYTES })
    this.wss.on("connection", (socket, request) => this.handleConnection(socket, request.socket.remoteAddress))
  }

  listen(port: number, host = "127.0.0.1"): Promise<AddressInfo> {
    return new Promise((resolvePromise, rejectPromise) => {
      this.server.once("error", rejectPromise)
      this.server.listen(port, host, () => {
        this.server.off("error", rejectPromise)
        const address = this.server.address()
        if (!address || typeof address === "string") {
          rejectPromise(new Error("Ingest server did not bind to a TCP port"))
          return
        }
        logInfo("Ingest server listening", { phase: "ingest.listen", host: address.address, port: address.port })
        resolvePromise(address)
      })
    })
  }

  async close(): Promise<void> {
    for (const client of this.wss.clients) {
      client.terminate()
    }
    await new Promise<void>((resolvePromise) => this.wss.close(() => resolvePromise()))
    await new Promise<void>((resolvePromise, rejectPromise) => {
      this.server.close((error) => (error ? rejectPromise(error) : resolvePromise()))
    })
  }

  private async handleRequest(request: IncomingMessage, response: ServerResponse): Promise<void> {
    const path = new URL(request.url ?? "/", "http://localhost").pathname

    if (request.method === "GET" && path === "/health") {
      json(response, 200, { status: "ok" })
      return
    }

    if (request.method === "GET" && path === "/stats") {
      json(response, 200, { ...this.target.stats() })
      return
    }

    if (path !== "/samples") {
      json(response, 404, { error: "not_found" })
      return
    }

    if (request.method !== "POST") {
      json(response, 405, { error: "method_not_allowed" })
      return
    }

    let body: string
    try {
      body = await readBody(request)
    } catch (error) {
      if (error instanceof PayloadTooLargeError) {
        json(response, 413, { error: error.message })
        return
      }
      throw error
    }

    const documents = parseJsonDocuments(body)
    if (!documents) {
      logWarn("Invalid JSON in ingest request body", { phase: "ingest.parse-body", bytes: body.length })
      json(response, 400, { error: "invalid json" })
      return
    }

    json(response, 202, { ...ingestDocuments(this.target, documents) })
  }

  private handleConnection(socket: WebSocket, remoteAddress: string | undefined): void {
    logInfo("Ingest stream connected", { phase: "ingest.ws-connection", remoteAddress })

    socket.on("message", (data) => {
      const documents = parseJsonDocuments(rawDataToString(data))
      if (!documents) {
        logWarn("Invalid JSON in ingest stream message", { phase: "ingest.ws-message", remoteAddress })
        socket.send(JSON.stringify({ error: "invalid json" }))
        return
      }
      socket.send(JSON.stringify(ingestDocuments(this.target, documents)))
    })

    socket.on("error", (error) => {
      logWarn("Ingest stream error", { phase: "ingest.ws-error", remoteAddress, error: errorMessage(error) })
    })

    socket.on("close", () => {
      logInfo("Ingest stream disconnected", { phase: "ingest.ws-close", remoteAddress })
    })
  }
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf-8")
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf-8")
  }
  return data.toString("utf-8")
}

function readBody(request: IncomingMessage): Promise<string> {
  return new Promise((resolvePromise, rejectPromise) => {
    const chunks: Buffer[] = []
    let size = 0
    request.on("data", (chunk: Buffer) => {
      size += chunk.length
      if (size > MAX_BODY_BYTES) {
        rejectPromise(new PayloadTooLargeError())
        request.resume()
        return
      }
      chunks.push(Buffer.from(chunk))
    })
    request.on("end", () => resolvePromise(Buffer.concat(chunks).toString("utf-8")))
    request.on("error", rejectPromise)
  })
}

function json(response: ServerResponse, statusCode: number, payload: Record<string, unknown>): void {
  const body = JSON.stringify(payload)
  response.statusCode = statusCode
  response.setHeader("content-type", "application/json; charset=utf-8")
  response.end(body)
}
