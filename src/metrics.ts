type Labels = Record<string, string>

export interface SeriesSummary {
  count: number
  min: number
  avg: number
  max: number
}

function serializeLabels(labels?: Labels): string {
  if (!labels || Object.keys(labels).length === 0) {
    return ""
  }
  return Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${key}=${value}`)
    .join(",")
}

function metricKey(name: string, labels?: Labels): string {
  const suffix = serializeLabels(labels)
  return suffix ? `${name}{${suffix}}` : name
}

/** Rolling window of observations, reset after each summary. */
export class SeriesWindow {
  private count = 0
  private sum = 0
  private min = Number.POSITIVE_INFINITY
  private max = Number.NEGATIVE_INFINITY

  record(value: number): void {
    this.count += 1
    this.sum += value
    if (value < this.min) {
      this.min = value
    }
    if (value > this.max) {
      this.max = value
    }
  }

  summary(): SeriesSummary | null {
    if (this.count === 0) {
      return null
    }
    return {
      count: this.count,
      min: this.min,
      avg: this.sum / this.count,
      max: this.max,
    }
  }

  reset(): void {
    this.count = 0
    this.sum = 0
    this.min = Number.POSITIVE_INFINITY
    this.max = Number.NEGATIVE_INFINITY
  }
}

export class MetricsRegistry {
  private readonly counters = new Map<string, number>()

  increment(name: string, labels?: Labels, delta = 1): void {
    const key = metricKey(name, labels)
    this.counters.set(key, (this.counters.get(key) ?? 0) + delta)
  }

  get(name: string, labels?: Labels): number {
    return this.counters.get(metricKey(name, labels)) ?? 0
  }

  snapshot(): { counters: Record<string, number> } {
    return {
      counters: Object.fromEntries(this.counters.entries()),
    }
  }
}

export function formatSummary(summary: SeriesSummary): string {
  return `${summary.min.toFixed(2)} min, ${summary.avg.toFixed(2)} avg, ${summary.max.toFixed(2)} max`
}
