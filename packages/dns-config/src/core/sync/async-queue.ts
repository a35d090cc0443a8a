type Slot<T> = { value: T }

/**
 * Unbounded FIFO that bridges callback producers (watch events) to a
 * single async consumer.
 */
export class AsyncQueue<T> {
  private readonly items: Slot<T>[] = []
  private waiter: ((value: T) => void) | undefined

  get size(): number {
    return this.items.length
  }

  push(value: T): void {
    const waiter = this.waiter

    if (waiter) {
      this.waiter = undefined
      waiter(value)
      return
    }

    this.items.push({ value })
  }

  /** Resolves with the oldest item, waiting for one if the queue is empty. */
  shift(): Promise<T> {
    const head = this.items.shift()
    if (head) return Promise.resolve(head.value)

    if (this.waiter) {
      return Promise.reject(new Error("AsyncQueue supports a single consumer"))
    }

    return new Promise((resolve) => {
      this.waiter = resolve
    })
  }
}
