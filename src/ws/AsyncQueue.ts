/**
 * Unbounded FIFO handed from one producer to one consumer as an async iterable.
 *
 * Breaking out of a `for await` loop does not close the queue, so a consumer
 * can iterate again and pick up where it left off. Iteration ends once the
 * queue is closed and drained.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private items: T[] = []
  private waiters: Array<(result: IteratorResult<T, undefined>) => void> = []
  private closed = false

  /** Returns false when the queue is already closed and the item was dropped. */
  push(item: T): boolean {
    if (this.closed) return false
    const waiter = this.waiters.shift()
    if (waiter) waiter({ value: item, done: false })
    else this.items.push(item)
    return true
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    for (const waiter of this.waiters.splice(0)) waiter({ value: undefined, done: true })
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.items.length > 0) {
      const [value] = this.items.splice(0, 1)
      return Promise.resolve({ value, done: false })
    }
    if (this.closed) return Promise.resolve({ value: undefined, done: true })
    return new Promise((resolve) => this.waiters.push(resolve))
  }

  get size(): number { return this.items.length }
  get isClosed(): boolean { return this.closed }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next:   () => this.next(),
      return: () => Promise.resolve({ value: undefined, done: true }),
    }
  }
}
