/** O(1) push/shift ring buffer. When full, push overwrites the oldest item. */
export class CircularBuffer<T> {
  private readonly capacity: number
  private buf: (T | undefined)[]
  private head = 0
  private count = 0
  private dropped_ = 0

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) throw new RangeError(`capacity must be a positive integer, got ${capacity}`)
    this.capacity = capacity
    this.buf = new Array(capacity)
  }

  push(item: T): void {
    if (this.count === this.capacity) this.dropped_++
    this.buf[this.head] = item
    this.head = (this.head + 1) % this.capacity
    if (this.count < this.capacity) this.count++
  }

  /** Remove and return the oldest item. */
  shift(): T | undefined {
    if (this.count === 0) return undefined
    const tail = (this.head - this.count + this.capacity) % this.capacity
    const item = this.buf[tail]
    this.buf[tail] = undefined
    this.count--
    return item
  }

  clear(): void {
    this.buf = new Array(this.capacity)
    this.head = 0
    this.count = 0
  }

  get size(): number { return this.count }
  /** Items overwritten before anyone shifted them */
  get dropped(): number { return this.dropped_ }
}
