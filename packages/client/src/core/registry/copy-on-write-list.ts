/**
 * A list whose mutations replace the backing array.
 *
 * @remarks
 * `snapshot()` hands out the current array. Later mutations never touch it,
 * so a caller may iterate a snapshot while others add or remove entries.
 */
export class CopyOnWriteList<T> {
  private items: readonly T[] = []

  get size(): number {
    return this.items.length
  }

  snapshot(): readonly T[] {
    return this.items
  }

  add(item: T): void {
    this.items = [...this.items, item]
  }

  /** Removes the most recently added occurrence of `item`. */
  remove(item: T): boolean {
    const index = this.items.lastIndexOf(item)
    if (index === -1) return false

    this.items = [...this.items.slice(0, index), ...this.items.slice(index + 1)]
    return true
  }

  clear(): void {
    this.items = []
  }
}
