/**
 * Unbounded FIFO consumed with `for await`. Items pushed after `close` are
 * dropped; consumers finish once the backlog is empty.
 */
export class AsyncQueue<T> {
  private items: T[] = []
  private waiting: Array<(result: IteratorResult<T>) => void> = []
  private closed = false

  get size(): number {
    return this.items.length
  }

  get isClosed(): boolean {
    return this.closed
  }

  push(item: T): void {
    if (this.closed) return
    const waiter = this.waiting.shift()
    if (waiter) {
      waiter({ value: item, done: false })
    } else {
      this.items.push(item)
    }
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    for (const waiter of this.waiting.splice(0)) {
      waiter({ value: undefined, done: true })
    }
  }

  next(): Promise<IteratorResult<T>> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1)
      return Promise.resolve({ value: item, done: false })
    }
    if (this.closed) return Promise.resolve({ value: undefined, done: true })
    return new Promise((resolve) => this.waiting.push(resolve))
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    while (true) {
      const result = await this.next()
      if (result.done) return
      yield result.value
    }
  }
}
