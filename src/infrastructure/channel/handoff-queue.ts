/**
 * Unbounded single-producer / single-consumer async queue.
 *
 * The only hand-off between the stream side (socket callbacks, adapter
 * generator) and the dispatch side of the pipeline.
 *
 * - `send()` never waits: it either queues the item or, when the receiving
 *   end is gone, returns false so the producer can stop.
 * - The receiver consumes with `for await`, which ends once the sender has
 *   closed and everything queued has been delivered, or as soon as the
 *   receiver itself closes.
 *
 * Items must not be `undefined`.
 */
export class HandoffQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private waiting: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private senderOpen = true;
  private receiverOpen = true;

  /** Queue an item. Returns false if either end has been closed. */
  send(item: T): boolean {
    if (!this.receiverOpen || !this.senderOpen) return false;

    const waiter = this.waiting;
    if (waiter) {
      this.waiting = null;
      waiter({ value: item, done: false });
    } else {
      this.items.push(item);
    }
    return true;
  }

  /** Producer is done. Already-queued items are still delivered. */
  closeSender(): void {
    if (!this.senderOpen) return;
    this.senderOpen = false;
    if (this.items.length === 0) this.release();
  }

  /**
   * Receiver is gone. Subsequent `send()` calls return false.
   * Returns whatever was queued but not yet received.
   */
  closeReceiver(): T[] {
    this.receiverOpen = false;
    const rest = this.items;
    this.items = [];
    this.release();
    return rest;
  }

  recv(): Promise<IteratorResult<T, undefined>> {
    if (this.waiting) {
      return Promise.reject(new Error('HandoffQueue supports a single receiver'));
    }
    if (this.receiverOpen) {
      const item = this.items.shift();
      if (item !== undefined) {
        return Promise.resolve({ value: item, done: false });
      }
    }
    if (!this.receiverOpen || !this.senderOpen) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.recv() };
  }

  /** Items queued and not yet received. */
  get size(): number {
    return this.items.length;
  }

  get isReceiverClosed(): boolean {
    return !this.receiverOpen;
  }

  private release(): void {
    const waiter = this.waiting;
    if (waiter) {
      this.waiting = null;
      waiter({ value: undefined, done: true });
    }
  }
}
