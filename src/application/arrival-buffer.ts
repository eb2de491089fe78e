import type { PostEvent } from '../domain/index.js';

/**
 * Accumulates decoded posts between dispatch ticks.
 *
 * Posts leave only through `drain()`, which hands over everything queued
 * in arrival order and leaves the buffer empty. Nothing is ever dropped.
 */
export class ArrivalBuffer {
  private queue: PostEvent[] = [];

  push(event: PostEvent): void {
    this.queue.push(event);
  }

  pushAll(events: readonly PostEvent[]): void {
    for (const event of events) {
      this.queue.push(event);
    }
  }

  /** Swap out the whole queue. The returned array is owned by the caller. */
  drain(): PostEvent[] {
    const batch = this.queue;
    this.queue = [];
    return batch;
  }

  get size(): number {
    return this.queue.length;
  }
}
