import type { DefinitionStore } from "./definitions.js"
import { encodeFieldValue, encodeTagValue, renderEntry } from "./encoding.js"
import { MissingTagError } from "./errors.js"
import { SampleFilter } from "./filters.js"
import { toNanoseconds, type Definition, type Group, type MetricSample, type TagSet } from "./models.js"
import type { DispatchQueue } from "./queue.js"

export type DropReason = "disabled" | "definitions-pending" | "filtered" | "unknown-metric"

export type IngestOutcome =
  | { status: "merged" | "created" | "rotated" }
  | { status: "dropped"; reason: DropReason }

export interface GroupingOptions {
  isEnabled?: () => boolean
  filter?: () => SampleFilter
  now?: () => number
}

interface Bucket {
  family: string
  groups: Group[]
}

const NO_FILTER = new SampleFilter()

export function buildTagSet(sample: MetricSample, definition: Definition): TagSet {
  const tags: TagSet = new Map([["type", sample.source.toLowerCase()]])
  for (const key of definition.tags) {
    if (!Object.hasOwn(sample.attributes, key)) {
      throw new MissingTagError(key, `${sample.source}/${sample.family}/${sample.name}`)
    }
    tags.set(key, encodeTagValue(sample.attributes[key]))
  }
  return tags
}

function sameTags(left: TagSet, right: TagSet): boolean {
  if (left.size !== right.size) {
    return false
  }
  for (const [key, value] of left) {
    if (right.get(key) !== value) {
      return false
    }
  }
  return true
}

/**
 * Open groups per (source, family), in insertion order.
 *
 * `ingest` is synchronous and the only writer, so a bucket is never observed
 * half-updated by the sender. Callers that ingest from worker threads must
 * serialise calls per bucket.
 */
export class GroupingTable {
  private readonly buckets = new Map<string, Bucket>()
  private readonly isEnabled: () => boolean
  private readonly filter: () => SampleFilter
  private readonly now: () => number

  constructor(
    private readonly definitions: DefinitionStore,
    private readonly queue: DispatchQueue,
    options: GroupingOptions = {},
  ) {
    this.isEnabled = options.isEnabled ?? (() => true)
    this.filter = options.filter ?? (() => NO_FILTER)
    this.now = options.now ?? Date.now
  }

  ingest(sample: MetricSample): IngestOutcome {
    if (!this.isEnabled()) {
      return { status: "dropped", reason: "disabled" }
    }
    if (!this.definitions.isLoaded()) {
      return { status: "dropped", reason: "definitions-pending" }
    }
    if (!this.filter().allows(sample.source, sample.family, sample.name)) {
      return { status: "dropped", reason: "filtered" }
    }
    const definition = this.definitions.lookup(sample.source, sample.family, sample.name)
    if (!definition) {
      return { status: "dropped", reason: "unknown-metric" }
    }

    const tags = buildTagSet(sample, definition)
    const timestampNs = toNanoseconds(sample.timestamp)
    const encoded = encodeFieldValue(sample.value)
    const nowMs = this.now()
    const bucket = this.bucketFor(sample.source.toLowerCase(), sample.family)

    const index = bucket.groups.findIndex((group) => sameTags(group.tags, tags))
    let rotated = false
    if (index >= 0) {
      const pending = bucket.groups[index]
      if (pending.timestampNs === timestampNs) {
        pending.fields.set(sample.name, encoded)
        pending.lastTouchedMs = nowMs
        return { status: "merged" }
      }
      this.close(bucket, index)
      rotated = true
    }

    bucket.groups.push({
      timestampNs,
      tags,
      fields: new Map([[sample.name, encoded]]),
      lastTouchedMs: nowMs,
    })
    return { status: rotated ? "rotated" : "created" }
  }

  /** Closes every group not touched within `maxIdleMs`; returns how many were flushed. */
  flushIdle(maxIdleMs: number, nowMs = this.now()): number {
    if (maxIdleMs <= 0) {
      return 0
    }
    return this.flushWhere((group) => nowMs - group.lastTouchedMs >= maxIdleMs)
  }

  flushAll(): number {
    return this.flushWhere(() => true)
  }

  openGroupCount(): number {
    let total = 0
    for (const bucket of this.buckets.values()) {
      total += bucket.groups.length
    }
    return total
  }

  private flushWhere(predicate: (group: Group) => boolean): number {
    let flushed = 0
    for (const [key, bucket] of this.buckets) {
      for (let index = 0; index < bucket.groups.length; ) {
        if (predicate(bucket.groups[index])) {
          this.close(bucket, index)
          flushed += 1
        } else {
          index += 1
        }
      }
      if (bucket.groups.length === 0) {
        this.buckets.delete(key)
      }
    }
    return flushed
  }

  private close(bucket: Bucket, index: number): void {
    const [group] = bucket.groups.splice(index, 1)
    this.queue.pushFront(renderEntry(bucket.family, group.tags, group.fields, group.timestampNs))
  }

  private bucketFor(source: string, family: string): Bucket {
    const key = JSON.stringify([source, family])
    let bucket = this.buckets.get(key)
    if (!bucket) {
      bucket = { family, groups: [] }
      this.buckets.set(key, bucket)
    }
    return bucket
  }
}
