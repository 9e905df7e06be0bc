import { resolveWriteTarget, validateConfig, type RelayConfig, type WriteTarget } from "./config.js"
import {
  DefinitionLoader,
  DefinitionStore,
  FileDefinitionSource,
  HttpDefinitionSource,
  type DefinitionSource,
} from "./definitions.js"
import { errorCodeOf } from "./errors.js"
import { SampleFilter } from "./filters.js"
import { GroupingTable, type DropReason, type IngestOutcome } from "./grouping.js"
import { InfluxWriteClient, type WriteClient } from "./http.js"
import { logDebug, logError, logInfo, setLogLevel } from "./logger.js"
import { MetricsRegistry } from "./metrics.js"
import { parseSample } from "./models.js"
import { DispatchQueue } from "./queue.js"
import { BatchSender } from "./sender.js"

export type RelayIngestResult = IngestOutcome | { status: "error"; errorCode: string }

export interface RelayDependencies {
  client?: WriteClient
  definitionSource?: DefinitionSource | null
  senderIntervalMs?: number
  now?: () => number
}

export interface RelayStats {
  enabled: boolean
  definitionsLoaded: boolean
  queueLength: number
  openGroups: number
  counters: Record<string, number>
}

interface ConfigSnapshot {
  config: RelayConfig
  target: WriteTarget
  filter: SampleFilter
}

function snapshotOf(config: RelayConfig): ConfigSnapshot {
  return {
    config,
    target: resolveWriteTarget(config),
    filter: new SampleFilter(config.filters.include, config.filters.exclude),
  }
}

export function definitionSourceFor(config: RelayConfig): DefinitionSource | null {
  if (config.definitions.url) {
    return new HttpDefinitionSource(config.definitions.url, config.backend.timeoutMs)
  }
  if (config.definitions.file) {
    return new FileDefinitionSource(config.definitions.file)
  }
  return null
}

/**
 * Owns every piece of pipeline state: config snapshot, definitions, open
 * groups, the dispatch queue and the background sender and loader.
 */
export class Relay {
  readonly definitions = new DefinitionStore()
  readonly queue = new DispatchQueue()
  readonly metrics = new MetricsRegistry()
  readonly table: GroupingTable
  readonly sender: BatchSender

  private current: ConfigSnapshot
  private readonly loader: DefinitionLoader | null
  private sweepTimer: NodeJS.Timeout | null = null
  private started = false
  private readonly ownedClient: InfluxWriteClient | null

  constructor(config: RelayConfig, dependencies: RelayDependencies = {}) {
    this.current = snapshotOf(validateConfig(config))
    setLogLevel(config.logLevel)
    const now = dependencies.now ?? Date.now

    this.table = new GroupingTable(this.definitions, this.queue, {
      isEnabled: () => this.current.target.enabled,
      filter: () => this.current.filter,
      now,
    })
    let client: WriteClient
    if (dependencies.client) {
      client = dependencies.client
      this.ownedClient = null
    } else {
      this.ownedClient = new InfluxWriteClient()
      client = this.ownedClient
    }
    this.sender = new BatchSender(this.queue, client, () => this.current.target, {
      intervalMs: dependencies.senderIntervalMs,
      metrics: this.metrics,
      now,
    })

    const source = dependencies.definitionSource === undefined ? definitionSourceFor(config) : dependencies.definitionSource
    this.loader = source ? new DefinitionLoader(source, this.definitions, config.definitions.retryDelayMs) : null
    this.logEnabled()
  }

  get config(): RelayConfig {
    return this.current.config
  }

  get enabled(): boolean {
    return this.current.target.enabled
  }

  /** Never throws: every failure is logged and the sample dropped. */
  ingest(raw: unknown): RelayIngestResult {
    this.metrics.increment("samples_received_total")
    // disabled and not-yet-loaded relays drop without reading the payload
    if (!this.enabled) {
      return this.dropped("disabled")
    }
    if (!this.definitions.isLoaded()) {
      return this.dropped("definitions-pending")
    }
    try {
      const outcome = this.table.ingest(parseSample(raw))
      if (outcome.status === "dropped") {
        return this.dropped(outcome.reason)
      }
      if (outcome.status === "rotated") {
        this.metrics.increment("groups_closed_total", { trigger: "timestamp" })
      }
      return outcome
    } catch (error) {
      const errorCode = errorCodeOf(error)
      this.metrics.increment("samples_dropped_total", { reason: "error" })
      logError("Error receiving metrics", error, { phase: "relay.ingest" })
      return { status: "error", errorCode }
    }
  }

  /** Swaps in a complete new config; takes effect for the next sample and the next send cycle. */
  applyConfig(config: RelayConfig): void {
    this.current = snapshotOf(validateConfig(config))
    setLogLevel(config.logLevel)
    this.logEnabled()
    if (this.started) {
      this.scheduleSweep()
    }
  }

  start(): void {
    if (this.started) {
      return
    }
    this.started = true
    if (this.loader) {
      // The loader handles its own failures and resolves once installed or stopped.
      void this.loader.start()
    } else {
      logInfo("No definitions source configured, all samples will be dropped", { phase: "relay.start" })
    }
    this.sender.start()
    this.scheduleSweep()
  }

  async stop(): Promise<void> {
    this.started = false
    this.clearSweep()
    await this.loader?.stop()
    await this.sender.stop()
    const flushed = this.flushOpenGroups()
    const sent = this.enabled ? await this.sender.flush() : 0
    await this.ownedClient?.close()
    logInfo("Relay stopped", { phase: "relay.stop", flushedGroups: flushed, sentEntries: sent, dropped: this.queue.length })
  }

  flushIdle(nowMs?: number): number {
    const flushed = this.table.flushIdle(this.config.grouping.idleFlushMs, nowMs)
    if (flushed > 0) {
      this.metrics.increment("groups_closed_total", { trigger: "idle" }, flushed)
      logDebug("Flushed idle groups", { phase: "relay.flush-idle", flushed })
    }
    return flushed
  }

  flushOpenGroups(): number {
    const flushed = this.table.flushAll()
    if (flushed > 0) {
      this.metrics.increment("groups_closed_total", { trigger: "shutdown" }, flushed)
    }
    return flushed
  }

  stats(): RelayStats {
    return {
      enabled: this.enabled,
      definitionsLoaded: this.definitions.isLoaded(),
      queueLength: this.queue.length,
      openGroups: this.table.openGroupCount(),
      counters: this.metrics.snapshot().counters,
    }
  }

  private dropped(reason: DropReason): IngestOutcome {
    this.metrics.increment("samples_dropped_total", { reason })
    logDebug("Sample dropped", { phase: "relay.ingest", reason })
    return { status: "dropped", reason }
  }

  private scheduleSweep(): void {
    this.clearSweep()
    const idleFlushMs = this.config.grouping.idleFlushMs
    if (idleFlushMs <= 0) {
      return
    }
    this.sweepTimer = setInterval(() => this.flushIdle(), Math.max(1_000, Math.floor(idleFlushMs / 4)))
    this.sweepTimer.unref()
  }

  private clearSweep(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer)
      this.sweepTimer = null
    }
  }

  private logEnabled(): void {
    logInfo(`Backend writes are ${this.enabled ? "enabled" : "disabled"}`, {
      phase: "relay.config",
      endpoint: this.enabled ? this.current.target.endpoint : undefined,
    })
  }
}
