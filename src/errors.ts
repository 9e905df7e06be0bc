export class RelayError extends Error {
  readonly code: string

  constructor(message: string, code = "RELAY_ERROR") {
    super(message)
    this.code = code
    this.name = "RelayError"
  }
}

export class ConfigError extends RelayError {
  constructor(message: string) {
    super(message, "CONFIG_INVALID")
    this.name = "ConfigError"
  }
}

export class DefinitionsError extends RelayError {
  constructor(message: string) {
    super(message, "DEFINITIONS_INVALID")
    this.name = "DefinitionsError"
  }
}

export class SampleValidationError extends RelayError {
  constructor(message: string) {
    super(message, "SAMPLE_INVALID")
    this.name = "SampleValidationError"
  }
}

export class MissingTagError extends RelayError {
  readonly tag: string

  constructor(tag: string, metric: string) {
    super(`Sample for ${metric} is missing required tag: ${tag}`, "TAG_MISSING")
    this.tag = tag
    this.name = "MissingTagError"
  }
}

export class EncodingError extends RelayError {
  constructor(message: string) {
    super(message, "ENCODING_FAILED")
    this.name = "EncodingError"
  }
}

export class DeliveryError extends RelayError {
  readonly status: number | null

  constructor(message: string, status: number | null = null) {
    super(message, "DELIVERY_FAILED")
    this.status = status
    this.name = "DeliveryError"
  }
}

export function errorCodeOf(error: unknown): string {
  return error instanceof RelayError ? error.code : "UNKNOWN_ERROR"
}
