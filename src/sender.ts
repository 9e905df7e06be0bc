import { setTimeout as delay } from "node:timers/promises"

import type { WriteTarget } from "./config.js"
import type { WriteClient } from "./http.js"
import { errorMessage, logError, logInfo, logWarn } from "./logger.js"
import { formatSummary, MetricsRegistry, SeriesWindow } from "./metrics.js"
import type { DispatchQueue } from "./queue.js"

export const STATS_INTERVAL_MS = 30 * 60 * 1000

export interface BatchSenderOptions {
  intervalMs?: number
  statsIntervalMs?: number
  metrics?: MetricsRegistry
  now?: () => number
}

export type CycleResult =
  | { status: "idle" }
  | { status: "sent"; entries: number }
  | { status: "rejected"; entries: number; httpStatus: number }
  | { status: "failed"; entries: number; error: string }

/**
 * Drains the dispatch queue in batches of at most `batchSize` entries.
 *
 * Delivery is at most once: a batch that is rejected or fails in transit has
 * already left the queue and is discarded.
 */
export class BatchSender {
  readonly batchSizes = new SeriesWindow()
  readonly queueSizes = new SeriesWindow()

  private readonly intervalMs: number
  private readonly statsIntervalMs: number
  private readonly metrics: MetricsRegistry
  private readonly now: () => number
  private statsReportedAt = 0
  private abort: AbortController | null = null
  private loop: Promise<void> | null = null

  constructor(
    private readonly queue: DispatchQueue,
    private readonly client: WriteClient,
    private readonly target: () => WriteTarget,
    options: BatchSenderOptions = {},
  ) {
    this.intervalMs = options.intervalMs ?? 100
    this.statsIntervalMs = options.statsIntervalMs ?? STATS_INTERVAL_MS
    this.metrics = options.metrics ?? new MetricsRegistry()
    this.now = options.now ?? Date.now
  }

  get running(): boolean {
    return this.loop !== null
  }

  start(): void {
    if (this.loop) {
      return
    }
    const abort = new AbortController()
    this.abort = abort
    this.loop = this.run(abort.signal)
  }

  async stop(): Promise<void> {
    this.abort?.abort()
    const loop = this.loop
    this.loop = null
    this.abort = null
    await loop
  }

  async runOnce(): Promise<CycleResult> {
    const target = this.target()
    const batch = this.queue.drain(target.batchSize)
    if (batch.length === 0) {
      return { status: "idle" }
    }

    this.batchSizes.record(batch.length)
    this.queueSizes.record(this.queue.length)

    const result = await this.deliver(target, batch)
    this.reportStats()
    return result
  }

  /** Runs cycles back to back until the queue is empty. */
  async flush(): Promise<number> {
    let sent = 0
    while (this.queue.length > 0) {
      const result = await this.runOnce()
      if (result.status === "idle") {
        break
      }
      if (result.status === "sent") {
        sent += result.entries
      }
    }
    return sent
  }

  private async deliver(target: WriteTarget, batch: string[]): Promise<CycleResult> {
    try {
      const response = await this.client.write(target, batch.join("\n"))
      if (response.status !== 204) {
        logWarn("Send failed", {
          phase: "sender.deliver",
          httpStatus: response.status,
          response: response.body.slice(0, 500),
          entries: batch.length,
        })
        this.metrics.increment("batches_sent_total", { outcome: "rejected" })
        this.metrics.increment("entries_discarded_total", undefined, batch.length)
        return { status: "rejected", entries: batch.length, httpStatus: response.status }
      }
      this.metrics.increment("batches_sent_total", { outcome: "success" })
      this.metrics.increment("entries_sent_total", undefined, batch.length)
      return { status: "sent", entries: batch.length }
    } catch (error) {
      logError("Error sending from queue", error, { phase: "sender.deliver", entries: batch.length })
      this.metrics.increment("batches_sent_total", { outcome: "error" })
      this.metrics.increment("entries_discarded_total", undefined, batch.length)
      return { status: "failed", entries: batch.length, error: errorMessage(error) }
    }
  }

  private reportStats(): void {
    const now = this.now()
    if (this.statsReportedAt >= now - this.statsIntervalMs) {
      return
    }
    this.statsReportedAt = now
    const queue = this.queueSizes.summary()
    const batches = this.batchSizes.summary()
    if (queue && batches) {
      logInfo(`Queue size stats: ${formatSummary(queue)}`, { phase: "sender.stats", ...queue })
      logInfo(`Batch size stats: ${formatSummary(batches)}`, { phase: "sender.stats", ...batches })
    }
    this.queueSizes.reset()
    this.batchSizes.reset()
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.runOnce()
      } catch (error) {
        logError("Error in send cycle", error, { phase: "sender.run" })
      }
      try {
        await delay(this.intervalMs, undefined, { signal })
      } catch (error) {
        if (error instanceof Error && error.name === "AbortError") {
          return
        }
        throw error
      }
    }
  }
}
