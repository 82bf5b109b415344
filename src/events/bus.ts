/**
 * Ordered publish/subscribe channel with a bounded buffer per subscriber.
 *
 * `publish` resolves once the event is queued for every subscriber. While a
 * subscriber's buffer is full the publisher waits; events are never dropped.
 */
export class EventBus<T> {
  private readonly subscribers = new Set<Subscription<T>>()
  private tail: Promise<void> = Promise.resolve()
  private closed = false

  public constructor(private readonly capacity = 256) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Event buffer capacity must be a positive integer, got ${capacity}`)
    }
  }

  public get isClosed(): boolean {
    return this.closed
  }

  public get subscriberCount(): number {
    return this.subscribers.size
  }

  public publish(event: T): Promise<void> {
    if (this.closed) return Promise.reject(new Error("Event bus is closed"))
    // chained so that concurrent publishers are delivered in call order
    const delivery = this.tail.then(() => this.deliver(event))
    this.tail = delivery
    return delivery
  }

  /** Registers immediately; only events published after this call are seen. */
  public subscribe(): Subscription<T> {
    const subscription = new Subscription<T>(this.capacity, () => {
      this.subscribers.delete(subscription)
    })
    if (this.closed) subscription.end()
    else this.subscribers.add(subscription)
    return subscription
  }

  /** Stops accepting events; subscribers finish after draining their buffers. */
  public async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    await this.tail
    for (const subscription of this.subscribers) subscription.end()
    this.subscribers.clear()
  }

  private async deliver(event: T): Promise<void> {
    for (const subscription of [...this.subscribers]) {
      await subscription.push(event)
    }
  }
}

export class Subscription<T> implements AsyncIterableIterator<T> {
  private readonly buffer: T[] = []
  private readonly readers: Array<(result: IteratorResult<T>) => void> = []
  private readonly writers: Array<() => void> = []
  private ended = false
  private detached = false

  public constructor(
    private readonly capacity: number,
    private readonly onDetach: () => void,
  ) {}

  public get buffered(): number {
    return this.buffer.length
  }

  public async push(event: T): Promise<void> {
    while (!this.detached && this.buffer.length >= this.capacity) {
      await new Promise<void>((resolve) => this.writers.push(resolve))
    }
    if (this.detached) return
    const reader = this.readers.shift()
    if (reader) reader({ done: false, value: event })
    else this.buffer.push(event)
  }

  public end(): void {
    this.ended = true
    this.flushReaders()
  }

  public next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1)
      this.writers.shift()?.()
      return Promise.resolve({ done: false, value })
    }
    if (this.ended || this.detached) return Promise.resolve({ done: true, value: undefined })
    return new Promise((resolve) => this.readers.push(resolve))
  }

  public async return(): Promise<IteratorResult<T>> {
    if (!this.detached) {
      this.detached = true
      this.buffer.length = 0
      this.onDetach()
      for (const writer of this.writers.splice(0)) writer()
      this.flushReaders()
    }
    return { done: true, value: undefined }
  }

  public [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this
  }

  private flushReaders(): void {
    for (const reader of this.readers.splice(0)) reader({ done: true, value: undefined })
  }
}
