import { describe, expect, test } from "vitest"

import { formatSummary, MetricsRegistry, SeriesWindow } from "../src/metrics.js"

describe("MetricsRegistry", () => {
  test("aggregates counters by metric+labels", () => {
    const metrics = new MetricsRegistry()
    metrics.increment("samples_dropped_total", { reason: "filtered" })
    metrics.increment("samples_dropped_total", { reason: "filtered" }, 2)
    metrics.increment("samples_dropped_total", { reason: "unknown-metric" })
    metrics.increment("samples_received_total")

    expect(metrics.snapshot().counters).toEqual({
      "samples_dropped_total{reason=filtered}": 3,
      "samples_dropped_total{reason=unknown-metric}": 1,
      samples_received_total: 1,
    })
    expect(metrics.get("samples_dropped_total", { reason: "filtered" })).toBe(3)
    expect(metrics.get("samples_dropped_total")).toBe(0)
  })

  test("orders labels by name", () => {
    const metrics = new MetricsRegistry()
    metrics.increment("batches_sent_total", { outcome: "sent", a: "1" })

    expect(Object.keys(metrics.snapshot().counters)).toEqual(["batches_sent_total{a=1,outcome=sent}"])
  })
})

describe("SeriesWindow", () => {
  test("summarizes and resets observations", () => {
    const window = new SeriesWindow()
    expect(window.summary()).toBeNull()

    window.record(4)
    window.record(1)
    window.record(7)
    expect(window.summary()).toEqual({ count: 3, min: 1, avg: 4, max: 7 })

    window.reset()
    expect(window.summary()).toBeNull()
    window.record(-2)
    expect(window.summary()).toEqual({ count: 1, min: -2, avg: -2, max: -2 })
  })

  test("formats a summary with two decimals", () => {
    expect(formatSummary({ count: 3, min: 1, avg: 10 / 3, max: 7 })).toBe("1.00 min, 3.33 avg, 7.00 max")
  })
})
