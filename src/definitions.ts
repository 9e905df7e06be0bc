import { readFile } from "node:fs/promises"
import { setTimeout as delay } from "node:timers/promises"

import { DefinitionsError } from "./errors.js"
import { requestJsonObject } from "./http.js"
import { isRecord } from "./json-utils.js"
import { errorMessage, logError, logInfo, logWarn } from "./logger.js"
import type { Definition, DefinitionMap } from "./models.js"

export class DefinitionStore {
  private snapshot: DefinitionMap | null = null

  isLoaded(): boolean {
    return this.snapshot !== null
  }

  /** Installs the first snapshot; the store is read-only afterwards. */
  install(definitions: DefinitionMap): boolean {
    if (this.snapshot !== null) {
      logWarn("Metric definitions already installed, ignoring new snapshot", { phase: "definitions.install" })
      return false
    }
    this.snapshot = deepFreeze(definitions)
    return true
  }

  lookup(source: string, family: string, name: string): Definition | undefined {
    if (!this.snapshot || !Object.hasOwn(this.snapshot, source)) {
      return undefined
    }
    const families = this.snapshot[source]
    if (!Object.hasOwn(families, family)) {
      return undefined
    }
    const metrics = families[family]
    return Object.hasOwn(metrics, name) ? metrics[name] : undefined
  }

  count(): number {
    if (!this.snapshot) {
      return 0
    }
    let total = 0
    for (const families of Object.values(this.snapshot)) {
      for (const metrics of Object.values(families)) {
        total += Object.keys(metrics).length
      }
    }
    return total
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
    Object.freeze(value)
  }
  return value
}

function parseDefinition(raw: unknown, path: string): Definition {
  if (!isRecord(raw)) {
    throw new DefinitionsError(`Definition ${path} must be an object`)
  }
  const tags = raw.tags
  if (!Array.isArray(tags) || tags.some((tag) => typeof tag !== "string")) {
    throw new DefinitionsError(`Definition ${path} must declare tags as a list of strings`)
  }
  const definition: Definition = { tags: tags.map(String) }
  if (typeof raw.description === "string") {
    definition.description = raw.description
  }
  if (typeof raw.unit === "string") {
    definition.unit = raw.unit
  }
  if (typeof raw.mtype === "string") {
    definition.mtype = raw.mtype
  }
  return definition
}

/**
 * Parses `{success, definitions}` as returned by the definitions service.
 * Returns null while the service reports `success: false`.
 */
export function parseDefinitionsPayload(raw: unknown): DefinitionMap | null {
  if (!isRecord(raw)) {
    throw new DefinitionsError("Definitions response must be a JSON object")
  }
  if (raw.success !== true) {
    return null
  }
  if (!isRecord(raw.definitions)) {
    throw new DefinitionsError("Definitions response is missing the definitions map")
  }

  const result: DefinitionMap = {}
  for (const [source, families] of Object.entries(raw.definitions)) {
    if (!isRecord(families)) {
      throw new DefinitionsError(`Definitions for source ${source} must be an object`)
    }
    result[source] = {}
    for (const [family, metrics] of Object.entries(families)) {
      if (!isRecord(metrics)) {
        throw new DefinitionsError(`Definitions for ${source}/${family} must be an object`)
      }
      result[source][family] = {}
      for (const [name, definition] of Object.entries(metrics)) {
        result[source][family][name] = parseDefinition(definition, `${source}/${family}/${name}`)
      }
    }
  }
  return result
}

export interface DefinitionSource {
  readonly description: string
  fetchDefinitions(): Promise<unknown>
}

export class HttpDefinitionSource implements DefinitionSource {
  constructor(
    private readonly url: string,
    private readonly timeoutMs = 10_000,
  ) {}

  get description(): string {
    return this.url
  }

  fetchDefinitions(): Promise<unknown> {
    return requestJsonObject(this.url, { timeoutMs: this.timeoutMs })
  }
}

export class FileDefinitionSource implements DefinitionSource {
  constructor(private readonly path: string) {}

  get description(): string {
    return this.path
  }

  async fetchDefinitions(): Promise<unknown> {
    const raw = await readFile(this.path, "utf-8")
    return JSON.parse(raw) as unknown
  }
}

/** Polls a definition source until one snapshot is installed, then exits. */
export class DefinitionLoader {
  private abort: AbortController | null = null
  private running: Promise<void> | null = null

  constructor(
    private readonly source: DefinitionSource,
    private readonly store: DefinitionStore,
    private readonly retryDelayMs = 5_000,
  ) {}

  get done(): Promise<void> {
    return this.running ?? Promise.resolve()
  }

  start(): Promise<void> {
    if (!this.running) {
      const abort = new AbortController()
      this.abort = abort
      this.running = this.run(abort.signal)
    }
    return this.running
  }

  async stop(): Promise<void> {
    this.abort?.abort()
    const running = this.running
    this.abort = null
    this.running = null
    await running
  }

  async loadOnce(): Promise<boolean> {
    if (this.store.isLoaded()) {
      return true
    }
    try {
      const definitions = parseDefinitionsPayload(await this.source.fetchDefinitions())
      if (!definitions) {
        logWarn("Definitions service not ready, retrying", {
          phase: "definitions.load",
          source: this.source.description,
        })
        return false
      }
      this.store.install(definitions)
      logInfo("Definitions loaded", {
        phase: "definitions.load",
        source: this.source.description,
        metrics: this.store.count(),
      })
      return true
    } catch (error) {
      logError("Error loading definitions, retrying", error, {
        phase: "definitions.load",
        source: this.source.description,
      })
      return false
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      if (await this.loadOnce()) {
        return
      }
      try {
        await delay(this.retryDelayMs, undefined, { signal })
      } catch (error) {
        if (error instanceof Error && error.name === "AbortError") {
          return
        }
        logWarn("Definition loader wait failed", { phase: "definitions.wait", error: errorMessage(error) })
      }
    }
  }
}
