import { mkdir, readFile, writeFile } from "node:fs/promises"
import { dirname, resolve } from "node:path"

import { ConfigError } from "./errors.js"
import { REQUESTED_WITH } from "./http.js"
import { isRecord, readObject } from "./json-utils.js"
import { isLogLevel, type LogLevel } from "./logger.js"

export const DEFAULT_CONFIG_PATH = "~/.metric-line-relay/config.json"

export interface BackendConfig {
  url: string
  database: string
  username: string
  password: string
  batchSize: number
  timeoutMs: number
}

export interface DefinitionsConfig {
  url: string
  file: string
  retryDelayMs: number
}

export interface RelayConfig {
  backend: BackendConfig
  definitions: DefinitionsConfig
  ingest: {
    host: string
    port: number
  }
  grouping: {
    /** Groups untouched for this long are flushed; 0 keeps them open. */
    idleFlushMs: number
  }
  filters: {
    include: string[]
    exclude: string[]
  }
  logLevel: LogLevel
}

export interface WriteTarget {
  enabled: boolean
  url: string
  database: string
  endpoint: string
  auth: { username: string; password: string } | null
  headers: Record<string, string>
  batchSize: number
  timeoutMs: number
}

export interface ConfigFieldDescription {
  name: string
  type: "str" | "int" | "list"
  description: string
}

export const CONFIG_DESCRIPTION: ConfigFieldDescription[] = [
  { name: "backend.url", type: "str", description: "The HTTP endpoint of the time-series backend, e.g. http://10.0.0.5:8086" },
  { name: "backend.username", type: "str", description: "Optional username for basic authentication." },
  { name: "backend.password", type: "str", description: "Optional password for basic authentication." },
  { name: "backend.database", type: "str", description: "The database the entries are written to." },
  { name: "backend.batchSize", type: "int", description: "The maximum number of entries sent in one request." },
  { name: "backend.timeoutMs", type: "int", description: "Client timeout for one write request, in milliseconds." },
  { name: "definitions.url", type: "str", description: "URL returning the metric definitions." },
  { name: "definitions.file", type: "str", description: "JSON file holding the metric definitions, used when no URL is set." },
  { name: "definitions.retryDelayMs", type: "int", description: "Delay between attempts to load the definitions." },
  { name: "ingest.host", type: "str", description: "Interface the sample ingest server binds to." },
  { name: "ingest.port", type: "int", description: "Port of the sample ingest server." },
  { name: "grouping.idleFlushMs", type: "int", description: "Flush groups that received no sample for this long (0 disables)." },
  { name: "filters.include", type: "list", description: "Glob patterns over source/family/metric; when set only matching samples are kept." },
  { name: "filters.exclude", type: "list", description: "Glob patterns over source/family/metric that are dropped." },
]

export function defaultConfig(): RelayConfig {
  return {
    backend: {
      url: "",
      database: "metrics",
      username: "",
      password: "",
      batchSize: 10,
      timeoutMs: 10_000,
    },
    definitions: {
      url: "",
      file: "",
      retryDelayMs: 5_000,
    },
    ingest: {
      host: "127.0.0.1",
      port: 8787,
    },
    grouping: {
      idleFlushMs: 600_000,
    },
    filters: {
      include: [],
      exclude: [],
    },
    logLevel: "info",
  }
}

/** Reads a raw JSON object into a full config, falling back to defaults for absent keys. */
export function parseConfig(payload: unknown): RelayConfig {
  const defaults = defaultConfig()
  const backend = readObject(payload, "backend")
  const definitions = readObject(payload, "definitions")
  const ingest = readObject(payload, "ingest")
  const grouping = readObject(payload, "grouping")
  const filters = readObject(payload, "filters")
  const root = isRecord(payload) ? payload : {}

  return validateConfig({
    backend: {
      url: readString(backend, "url", defaults.backend.url).replace(/\/+$/, ""),
      database: readString(backend, "database", defaults.backend.database),
      username: readString(backend, "username", defaults.backend.username),
      password: readString(backend, "password", defaults.backend.password),
      batchSize: readInteger(backend, ["batchSize", "batch_size"], defaults.backend.batchSize),
      timeoutMs: readInteger(backend, ["timeoutMs", "timeout_ms"], defaults.backend.timeoutMs),
    },
    definitions: {
      url: readString(definitions, "url", defaults.definitions.url),
      file: readString(definitions, "file", defaults.definitions.file),
      retryDelayMs: readInteger(definitions, ["retryDelayMs", "retry_delay_ms"], defaults.definitions.retryDelayMs),
    },
    ingest: {
      host: readString(ingest, "host", defaults.ingest.host),
      port: readInteger(ingest, ["port"], defaults.ingest.port),
    },
    grouping: {
      idleFlushMs: readInteger(grouping, ["idleFlushMs", "idle_flush_ms"], defaults.grouping.idleFlushMs),
    },
    filters: {
      include: readStringList(filters, "include"),
      exclude: readStringList(filters, "exclude"),
    },
    logLevel: readLogLevel(root.logLevel, defaults.logLevel),
  })
}

export function validateConfig(config: RelayConfig): RelayConfig {
  const problems: string[] = []
  if (config.backend.url && !/^https?:\/\//i.test(config.backend.url)) {
    problems.push("backend.url must start with http:// or https://")
  }
  if (config.backend.batchSize < 1) {
    problems.push("backend.batchSize must be at least 1")
  }
  if (config.backend.timeoutMs < 1) {
    problems.push("backend.timeoutMs must be at least 1")
  }
  if (config.backend.password && !config.backend.username) {
    problems.push("backend.password requires backend.username")
  }
  if (config.definitions.retryDelayMs < 0) {
    problems.push("definitions.retryDelayMs must not be negative")
  }
  if (config.ingest.port < 0 || config.ingest.port > 65_535) {
    problems.push("ingest.port must be between 0 and 65535")
  }
  if (config.grouping.idleFlushMs < 0) {
    problems.push("grouping.idleFlushMs must not be negative")
  }
  if (problems.length > 0) {
    throw new ConfigError(`Invalid relay config: ${problems.join("; ")}`)
  }
  return config
}

/** Merges a partial update over the current config and validates the result. */
export function applyConfigPatch(current: RelayConfig, patch: Record<string, unknown>): RelayConfig {
  const merged: Record<string, unknown> = { logLevel: current.logLevel }
  for (const section of ["backend", "definitions", "ingest", "grouping", "filters"] as const) {
    merged[section] = { ...current[section], ...readObject(patch, section) }
  }
  if (patch.logLevel !== undefined) {
    merged.logLevel = patch.logLevel
  }
  return parseConfig(merged)
}

export function resolveWriteTarget(config: RelayConfig): WriteTarget {
  const { url, database, username, password, batchSize, timeoutMs } = config.backend
  return {
    enabled: url !== "" && database !== "",
    url,
    database,
    endpoint: `${url}/write?db=${encodeURIComponent(database)}`,
    auth: username === "" ? null : { username, password },
    headers: { "X-Requested-With": REQUESTED_WITH },
    batchSize,
    timeoutMs,
  }
}

export function maskConfig(config: RelayConfig): RelayConfig {
  const masked = structuredClone(config)
  if (masked.backend.password) {
    masked.backend.password = "***"
  }
  return masked
}

export async function loadConfig(configPath = DEFAULT_CONFIG_PATH, createIfMissing = false): Promise<RelayConfig> {
  const absolutePath = normalizePath(configPath)
  let raw: string
  try {
    raw = await readFile(absolutePath, "utf-8")
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
      throw error
    }
    if (!createIfMissing) {
      throw new ConfigError(`Relay config file not found: ${absolutePath}`)
    }
    const config = defaultConfig()
    await saveConfig(config, absolutePath)
    return config
  }

  let payload: unknown
  try {
    payload = JSON.parse(raw)
  } catch (error) {
    throw new ConfigError(`Invalid relay config JSON in ${absolutePath}: ${String(error)}`)
  }
  return parseConfig(payload)
}

export async function saveConfig(config: RelayConfig, configPath = DEFAULT_CONFIG_PATH): Promise<string> {
  const absolutePath = normalizePath(configPath)
  await mkdir(dirname(absolutePath), { recursive: true })
  await writeFile(absolutePath, `${JSON.stringify(config, null, 2)}\n`, "utf-8")
  return absolutePath
}

export async function initConfig(options?: { configPath?: string; force?: boolean }): Promise<string> {
  const configPath = normalizePath(options?.configPath ?? DEFAULT_CONFIG_PATH)

  try {
    await readFile(configPath, "utf-8")
    if (options?.force !== true) {
      throw new ConfigError(`Relay config already exists: ${configPath}. Use --force to overwrite.`)
    }
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== "ENOENT") {
      throw error
    }
  }

  return saveConfig(defaultConfig(), configPath)
}

export function normalizePath(path: string): string {
  return resolve(path.replace(/^~(?=\/)/, process.env.HOME ?? "~"))
}

function readString(section: Record<string, unknown>, key: string, fallback: string): string {
  const value = section[key]
  if (value === undefined || value === null) {
    return fallback
  }
  if (typeof value !== "string") {
    throw new ConfigError(`Config field ${key} must be a string`)
  }
  return value.trim()
}

function readInteger(section: Record<string, unknown>, keys: string[], fallback: number): number {
  for (const key of keys) {
    const value = section[key]
    if (value === undefined || value === null || value === "") {
      continue
    }
    const parsed = typeof value === "string" ? Number(value) : value
    if (typeof parsed !== "number" || !Number.isInteger(parsed)) {
      throw new ConfigError(`Config field ${key} must be an integer`)
    }
    return parsed
  }
  return fallback
}

function readStringList(section: Record<string, unknown>, key: string): string[] {
  const value = section[key]
  if (value === undefined || value === null) {
    return []
  }
  if (!Array.isArray(value) || value.some((item) => typeof item !== "string")) {
    throw new ConfigError(`Config field ${key} must be a list of strings`)
  }
  return value.map(String).filter((item) => item.trim() !== "")
}

function readLogLevel(value: unknown, fallback: LogLevel): LogLevel {
  if (value === undefined || value === null) {
    return fallback
  }
  if (!isLogLevel(value)) {
    throw new ConfigError(`Config field logLevel must be one of debug, info, warn, error (got ${String(value)})`)
  }
  return value
}
