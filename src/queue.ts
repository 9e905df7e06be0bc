/**
 * Unbounded FIFO between the grouping table and the batch sender.
 *
 * Producers call `pushFront`, the sender calls `popBack`; entries leave in the
 * order they were pushed. Both run on the event loop, so the two operations
 * never interleave.
 */
export class DispatchQueue {
  private items: string[] = []
  private head = 0

  get length(): number {
    return this.items.length - this.head
  }

  pushFront(entry: string): void {
    this.items.push(entry)
  }

  popBack(): string | undefined {
    if (this.head >= this.items.length) {
      return undefined
    }
    const entry = this.items[this.head]
    this.head += 1
    this.compact()
    return entry
  }

  drain(max: number): string[] {
    const limit = Math.max(0, Math.trunc(max))
    const batch: string[] = []
    while (batch.length < limit) {
      const entry = this.popBack()
      if (entry === undefined) {
        break
      }
      batch.push(entry)
    }
    return batch
  }

  private compact(): void {
    if (this.head === this.items.length) {
      this.items = []
      this.head = 0
      return
    }
    if (this.head >= 1024 && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head)
      this.head = 0
    }
  }
}
