#!/usr/bin/env node
import { readFile } from "node:fs/promises"
import { pathToFileURL } from "node:url"

import { Command } from "commander"

import {
  applyConfigPatch,
  CONFIG_DESCRIPTION,
  DEFAULT_CONFIG_PATH,
  initConfig,
  loadConfig,
  maskConfig,
  normalizePath,
  saveConfig,
} from "./config.js"
import { DefinitionStore, FileDefinitionSource, parseDefinitionsPayload } from "./definitions.js"
import { DefinitionsError } from "./errors.js"
import { GroupingTable } from "./grouping.js"
import { IngestServer } from "./ingest-server.js"
import { parseJsonDocuments } from "./json-utils.js"
import { errorMessage, logInfo, logWarn } from "./logger.js"
import { parseSample } from "./models.js"
import { DispatchQueue } from "./queue.js"
import { Relay } from "./relay.js"

interface GlobalOptions {
  config: string
  host?: string
  port?: number
}

export interface RenderResult {
  entries: string[]
  dropped: number
  errors: string[]
}

function printJson(payload: unknown): void {
  process.stdout.write(`${JSON.stringify(payload, null, 2)}\n`)
}

/** Groups every sample in order and renders the entries the relay would send. */
export function renderSamples(definitions: unknown, samples: unknown[]): RenderResult {
  const parsed = parseDefinitionsPayload(definitions)
  if (!parsed) {
    throw new DefinitionsError("Definitions file reports success: false")
  }
  const store = new DefinitionStore()
  store.install(parsed)
  const queue = new DispatchQueue()
  const table = new GroupingTable(store, queue)

  let dropped = 0
  const errors: string[] = []
  for (const raw of samples) {
    try {
      if (table.ingest(parseSample(raw)).status === "dropped") {
        dropped += 1
      }
    } catch (error) {
      errors.push(errorMessage(error))
    }
  }
  table.flushAll()
  return { entries: queue.drain(queue.length), dropped, errors }
}

export function resolveConfigPatch(raw: Record<string, unknown>): Record<string, unknown> {
  const backend: Record<string, unknown> = {}
  const definitions: Record<string, unknown> = {}
  const grouping: Record<string, unknown> = {}
  const ingest: Record<string, unknown> = {}
  const filters: Record<string, unknown> = {}

  const copy = (target: Record<string, unknown>, key: string, value: unknown) => {
    if (value !== undefined) {
      target[key] = value
    }
  }

  copy(backend, "url", raw.url)
  copy(backend, "database", raw.database)
  copy(backend, "username", raw.username)
  copy(backend, "password", raw.password)
  copy(backend, "batchSize", raw.batchSize)
  copy(backend, "timeoutMs", raw.timeoutMs)
  copy(definitions, "url", raw.definitionsUrl)
  copy(definitions, "file", raw.definitionsFile)
  copy(definitions, "retryDelayMs", raw.retryDelayMs)
  copy(ingest, "host", raw.host)
  copy(ingest, "port", raw.port)
  copy(grouping, "idleFlushMs", raw.idleFlushMs)
  // a bare `--include` clears the list
  copy(filters, "include", raw.include === true ? [] : raw.include)
  copy(filters, "exclude", raw.exclude === true ? [] : raw.exclude)

  const patch: Record<string, unknown> = { backend, definitions, ingest, grouping, filters }
  if (raw.logLevel !== undefined) {
    patch.logLevel = raw.logLevel
  }
  return patch
}

export function normalizeOptions(raw: Record<string, unknown>): GlobalOptions {
  const port = Number(raw.port)
  return {
    config: String(raw.config ?? DEFAULT_CONFIG_PATH),
    host: typeof raw.host === "string" && raw.host ? raw.host : undefined,
    port: raw.port !== undefined && Number.isInteger(port) && port >= 0 && port <= 65_535 ? port : undefined,
  }
}

async function readJsonFile(path: string): Promise<unknown> {
  const raw = await readFile(normalizePath(path), "utf-8")
  return JSON.parse(raw) as unknown
}

async function serve(options: GlobalOptions): Promise<void> {
  const config = await loadConfig(options.config, true)
  const relay = new Relay(config)
  const server = new IngestServer(relay)

  relay.start()
  const address = await server.listen(options.port ?? config.ingest.port, options.host ?? config.ingest.host)
  printJson({
    status: "starting",
    host: address.address,
    port: address.port,
    enabled: relay.enabled,
  })

  const shutdown = async (signal: string) => {
    logInfo("Shutting down", { phase: "cli.shutdown", signal })
    await server.close()
    await relay.stop()
  }

  await new Promise<void>((resolvePromise, rejectPromise) => {
    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.once(signal, () => {
        shutdown(signal).then(resolvePromise, rejectPromise)
      })
    }
  })
}

export async function main(argv = process.argv): Promise<void> {
  const program = new Command()
  program
    .name("metric-line-relay")
    .description("Groups metric samples into line-protocol entries and ships them in batches")
    .option("--config <path>", "Config file path", DEFAULT_CONFIG_PATH)

  program
    .command("serve")
    .description("Run the relay and its sample ingest server")
    .option("--host <host>", "Ingest server host (overrides config)")
    .option("--port <number>", "Ingest server port (overrides config)")
    .action(async (commandOptions: Record<string, unknown>) => {
      await serve(normalizeOptions({ ...program.opts(), ...commandOptions }))
    })

  program
    .command("config-init")
    .option("--force", "Overwrite existing config", false)
    .action(async (commandOptions: { force: boolean }) => {
      const options = normalizeOptions(program.opts())
      const path = await initConfig({ configPath: options.config, force: commandOptions.force })
      printJson({ configPath: path })
    })

  program.command("config-show").action(async () => {
    const options = normalizeOptions(program.opts())
    const config = await loadConfig(options.config, true)
    printJson({ configPath: options.config, config: maskConfig(config) })
  })

  program.command("config-describe").action(() => {
    printJson(CONFIG_DESCRIPTION)
  })

  program
    .command("config-set")
    .option("--url <url>", "Backend URL, e.g. http://10.0.0.5:8086")
    .option("--database <name>", "Backend database")
    .option("--username <name>", "Basic auth username")
    .option("--password <secret>", "Basic auth password")
    .option("--batch-size <count>", "Maximum entries per request")
    .option("--timeout-ms <ms>", "Write request timeout")
    .option("--definitions-url <url>", "Definitions service URL")
    .option("--definitions-file <path>", "Definitions JSON file")
    .option("--retry-delay-ms <ms>", "Delay between definition load attempts")
    .option("--host <host>", "Ingest server host")
    .option("--port <number>", "Ingest server port")
    .option("--idle-flush-ms <ms>", "Flush groups idle for this long (0 disables)")
    .option("--include [globs...]", "Only keep samples matching source/family/metric globs")
    .option("--exclude [globs...]", "Drop samples matching source/family/metric globs")
    .option("--log-level <level>", "debug|info|warn|error")
    .action(async (commandOptions: Record<string, unknown>) => {
      const options = normalizeOptions(program.opts())
      const current = await loadConfig(options.config, true)
      const next = applyConfigPatch(current, resolveConfigPatch(commandOptions))
      const path = await saveConfig(next, options.config)
      printJson({ success: true, configPath: path, config: maskConfig(next) })
    })

  program
    .command("definitions")
    .description("Load the configured definitions file once and print it")
    .action(async () => {
      const options = normalizeOptions(program.opts())
      const config = await loadConfig(options.config, true)
      if (!config.definitions.file) {
        throw new DefinitionsError("definitions.file is not configured")
      }
      const parsed = parseDefinitionsPayload(await new FileDefinitionSource(normalizePath(config.definitions.file)).fetchDefinitions())
      printJson({ success: parsed !== null, definitions: parsed ?? {} })
    })

  program
    .command("render")
    .description("Print the entries a payload file would produce, without sending them")
    .requiredOption("--payload-file <path>", "JSON array or NDJSON of samples")
    .requiredOption("--definitions-file <path>", "Definitions JSON file")
    .action(async (commandOptions: { payloadFile: string; definitionsFile: string }) => {
      const definitions = await readJsonFile(commandOptions.definitionsFile)
      const documents = parseJsonDocuments(await readFile(normalizePath(commandOptions.payloadFile), "utf-8"))
      if (!documents) {
        throw new Error("payload file must contain JSON or NDJSON")
      }
      const result = renderSamples(definitions, documents)
      for (const error of result.errors) {
        logWarn("Sample rejected", { phase: "cli.render", error })
      }
      process.stdout.write(result.entries.map((entry) => `${entry}\n`).join(""))
    })

  await program.parseAsync(argv)
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? "").href) {
  main().catch((error: unknown) => {
    process.stderr.write(`${errorMessage(error)}\n`)
    process.exit(1)
  })
}
