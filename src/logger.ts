export type LogLevel = "debug" | "info" | "warn" | "error"

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

let minimumLevel: LogLevel = "info"

export function isLogLevel(value: unknown): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error"
}

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function errorDetails(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { error: String(error) }
  }
  const details: Record<string, unknown> = {
    error: error.message,
    errorName: error.name,
  }
  if ("code" in error && typeof error.code === "string") {
    details.errorCode = error.code
  }
  if (LEVEL_ORDER[minimumLevel] <= LEVEL_ORDER.debug) {
    details.stack = error.stack
  }
  return details
}

function write(level: LogLevel, message: string, context: Record<string, unknown> = {}): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) {
    return
  }
  const entry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...context,
  }
  const line = JSON.stringify(entry, (_key, value: unknown) =>
    typeof value === "bigint" ? value.toString() : value,
  )
  if (level === "error") {
    console.error(line)
    return
  }
  if (level === "warn") {
    console.warn(line)
    return
  }
  console.info(line)
}

export function logDebug(message: string, context?: Record<string, unknown>): void {
  write("debug", message, context)
}

export function logInfo(message: string, context?: Record<string, unknown>): void {
  write("info", message, context)
}

export function logWarn(message: string, context?: Record<string, unknown>): void {
  write("warn", message, context)
}

export function logError(message: string, error: unknown, context: Record<string, unknown> = {}): void {
  write("error", message, {
    ...context,
    ...errorDetails(error),
  })
}
