import { afterEach, describe, expect, test, vi } from "vitest"

import { defaultConfig, resolveWriteTarget, type WriteTarget } from "../src/config.js"
import { DeliveryError } from "../src/errors.js"
import type { WriteClient, WriteResult } from "../src/http.js"
import { tryParseJsonObject } from "../src/json-utils.js"
import { MetricsRegistry } from "../src/metrics.js"
import { DispatchQueue } from "../src/queue.js"
import { BatchSender, STATS_INTERVAL_MS } from "../src/sender.js"

function target(batchSize = 3): WriteTarget {
  const config = defaultConfig()
  config.backend.url = "http://influx.test:8086"
  config.backend.batchSize = batchSize
  return resolveWriteTarget(config)
}

function fakeClient(result: WriteResult = { status: 204, body: "" }) {
  const write = vi.fn<WriteClient["write"]>().mockResolvedValue(result)
  return { client: { write } satisfies WriteClient, write }
}

function queueOf(...entries: string[]): DispatchQueue {
  const queue = new DispatchQueue()
  for (const entry of entries) {
    queue.pushFront(entry)
  }
  return queue
}

const LATER = 1_700_000_000_000

describe("BatchSender", () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  test("posts at most batchSize entries in one request", async () => {
    const { client, write } = fakeClient()
    const queue = queueOf("a", "b", "c", "d")
    const writeTarget = target(3)
    const sender = new BatchSender(queue, client, () => writeTarget)

    await expect(sender.runOnce()).resolves.toEqual({ status: "sent", entries: 3 })

    expect(write).toHaveBeenCalledTimes(1)
    expect(write).toHaveBeenCalledWith(writeTarget, "a\nb\nc")
    expect(queue.length).toBe(1)
  })

  test("does nothing when the queue is empty", async () => {
    const { client, write } = fakeClient()
    const sender = new BatchSender(new DispatchQueue(), client, () => target())

    await expect(sender.runOnce()).resolves.toEqual({ status: "idle" })
    expect(write).not.toHaveBeenCalled()
  })

  test("discards a rejected batch instead of requeueing it", async () => {
    const { client } = fakeClient({ status: 500, body: "engine failure" })
    const metrics = new MetricsRegistry()
    const queue = queueOf("a", "b")
    const sender = new BatchSender(queue, client, () => target(), { metrics })

    await expect(sender.runOnce()).resolves.toEqual({ status: "rejected", entries: 2, httpStatus: 500 })
    expect(queue.length).toBe(0)
    expect(metrics.get("entries_discarded_total")).toBe(2)
    expect(metrics.get("batches_sent_total", { outcome: "rejected" })).toBe(1)
  })

  test("treats 200 as a failed write", async () => {
    const { client } = fakeClient({ status: 200, body: "" })
    const sender = new BatchSender(queueOf("a"), client, () => target())

    await expect(sender.runOnce()).resolves.toMatchObject({ status: "rejected", httpStatus: 200 })
  })

  test("survives transport errors and keeps going", async () => {
    const write = vi
      .fn<WriteClient["write"]>()
      .mockRejectedValueOnce(new DeliveryError("connection refused"))
      .mockResolvedValue({ status: 204, body: "" })
    const queue = queueOf("a", "b")
    const sender = new BatchSender(queue, { write }, () => target(1))

    await expect(sender.runOnce()).resolves.toEqual({ status: "failed", entries: 1, error: "connection refused" })
    await expect(sender.runOnce()).resolves.toEqual({ status: "sent", entries: 1 })
    expect(write.mock.calls.map((call) => call[1])).toEqual(["a", "b"])
  })

  test("reads the target on every cycle", async () => {
    const { client, write } = fakeClient()
    let current = target(1)
    const sender = new BatchSender(queueOf("a", "b", "c"), client, () => current)

    await sender.runOnce()
    current = target(5)
    await sender.runOnce()

    expect(write.mock.calls.map((call) => call[1])).toEqual(["a", "b\nc"])
  })

  test("logs batch and queue statistics after the first batch, then every interval", async () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined)
    const { client } = fakeClient()
    let now = LATER
    const sender = new BatchSender(queueOf("a", "b", "c"), client, () => target(1), { now: () => now })

    await sender.runOnce()
    const messages = info.mock.calls.map((call) => tryParseJsonObject(String(call[0]))?.message)
    expect(messages).toEqual([
      "Queue size stats: 2.00 min, 2.00 avg, 2.00 max",
      "Batch size stats: 1.00 min, 1.00 avg, 1.00 max",
    ])
    expect(sender.batchSizes.summary()).toBeNull()

    await sender.runOnce()
    expect(info).toHaveBeenCalledTimes(2)
    expect(sender.queueSizes.summary()).toEqual({ count: 1, min: 1, avg: 1, max: 1 })

    now = LATER + STATS_INTERVAL_MS + 1
    await sender.runOnce()
    expect(info).toHaveBeenCalledTimes(4)
    expect(JSON.parse(String(info.mock.calls[2][0]))).toMatchObject({
      message: "Queue size stats: 0.00 min, 0.50 avg, 1.00 max",
      min: 0,
      max: 1,
    })
  })

  test("flush sends everything in batches", async () => {
    const { client, write } = fakeClient()
    const sender = new BatchSender(queueOf("a", "b", "c", "d", "e"), client, () => target(2))

    await expect(sender.flush()).resolves.toBe(5)
    expect(write).toHaveBeenCalledTimes(3)
  })

  test("runs in the background until stopped", async () => {
    const { client, write } = fakeClient()
    const queue = queueOf("a")
    const sender = new BatchSender(queue, client, () => target(), { intervalMs: 5 })

    sender.start()
    expect(sender.running).toBe(true)
    await vi.waitFor(() => expect(write).toHaveBeenCalledTimes(1))

    queue.pushFront("b")
    await vi.waitFor(() => expect(write).toHaveBeenCalledTimes(2))

    await sender.stop()
    expect(sender.running).toBe(false)
    expect(write.mock.calls[1][1]).toBe("b")
  })

  test("keeps looping after a cycle throws", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined)
    const { client, write } = fakeClient()
    const targetOf = vi
      .fn<() => WriteTarget>()
      .mockImplementationOnce(() => {
        throw new Error("config unavailable")
      })
      .mockImplementation(() => target())
    const sender = new BatchSender(queueOf("a"), client, targetOf, { intervalMs: 5 })

    sender.start()
    await vi.waitFor(() => expect(write).toHaveBeenCalledTimes(1))
    await sender.stop()

    expect(write).toHaveBeenCalledWith(expect.objectContaining({ batchSize: 3 }), "a")
    expect(tryParseJsonObject(String(error.mock.calls[0][0]))).toMatchObject({
      level: "error",
      message: "Error in send cycle",
      phase: "sender.run",
      error: "config unavailable",
    })
  })
})
