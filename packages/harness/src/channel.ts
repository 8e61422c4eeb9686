/**
 * Unbounded, ordered, lossless queue between cooperative tasks.
 *
 * Any number of producers may `put()`; consumers `get()` items in exactly
 * the order they were put. A `get()` on an empty channel suspends until an
 * item arrives or the channel is closed.
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly _items: Array<{ value: T }> = [];
  private readonly _waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private _closed = false;

  /** Number of buffered items not yet taken. */
  get size(): number {
    return this._items.length;
  }

  get closed(): boolean {
    return this._closed;
  }

  put(item: T): void {
    if (this._closed) {
      throw new Error("Cannot put into a closed channel");
    }
    const waiter = this._waiters.shift();
    if (waiter) {
      waiter({ done: false, value: item });
    } else {
      this._items.push({ value: item });
    }
  }

  /**
   * Take the oldest item. Resolves `{ done: true }` once the channel is
   * closed and every buffered item has been taken.
   */
  get(): Promise<IteratorResult<T, undefined>> {
    const head = this._items.shift();
    if (head) {
      return Promise.resolve<IteratorResult<T, undefined>>({ done: false, value: head.value });
    }
    if (this._closed) {
      return Promise.resolve<IteratorResult<T, undefined>>({ done: true, value: undefined });
    }
    return new Promise((resolve) => {
      this._waiters.push(resolve);
    });
  }

  /** End the stream. Buffered items are still delivered. */
  close(): void {
    if (this._closed) return;
    this._closed = true;
    for (const waiter of this._waiters.splice(0)) {
      waiter({ done: true, value: undefined });
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const result = await this.get();
      if (result.done) return;
      yield result.value;
    }
  }
}
