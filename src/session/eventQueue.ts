/**
 * Bounded FIFO handed from the transport callbacks to the drain tick.
 * Producers only `push`; the single consumer takes everything with `drain`.
 */
export class EventQueue<T> {
  private items: T[] = []

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Queue capacity must be a positive integer, received ${capacity}`)
    }
  }

  get size(): number {
    return this.items.length
  }

  /** Appends all items, or none of them when they would not fit. */
  push(items: ReadonlyArray<T>): boolean {
    if (this.items.length + items.length > this.capacity) return false
    for (const item of items) {
      this.items.push(item)
    }
    return true
  }

  drain(): T[] {
    const drained = this.items
    this.items = []
    return drained
  }
}
