/** FIFO lock around a shared resource. Callers run in arrival order. */
export class Mutex {
  private tail: Promise<void> = Promise.resolve()

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => undefined
    const held = new Promise<void>((resolve) => { release = resolve })
    const prev = this.tail
    this.tail = prev.then(() => held)
    await prev
    try {
      return await fn()
    } finally {
      release()
    }
  }
}
