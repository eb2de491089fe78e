import type { PostEvent } from '../domain/index.js';
import type { RoutableConsumer } from './consumer-registry.js';

/** Posts a single consumer accepted from one batch, in arrival order. */
export interface ConsumerDelivery {
  readonly consumer_id: string;
  readonly events: readonly PostEvent[];
}

export interface RouteReport {
  readonly batch_size: number;
  /** One entry per consumer that accepted at least one post, in snapshot order. */
  readonly deliveries: readonly ConsumerDelivery[];
}

/**
 * Fan-out router. Offers every post of a batch to every consumer.
 *
 * Pure orchestration over the given snapshot:
 * 1. Posts are taken in arrival order.
 * 2. Each live consumer's filter is evaluated against the post text.
 * 3. Matches are retained (front insert, oldest evicted past capacity).
 *
 * No I/O. The only side effect is on the consumers' retention buffers.
 */
export function routeBatch(
  batch: readonly PostEvent[],
  consumers: readonly RoutableConsumer[],
): RouteReport {
  const accepted = new Map<string, PostEvent[]>();

  for (const event of batch) {
    for (const consumer of consumers) {
      if (!consumer.alive || !consumer.accepts(event)) continue;

      consumer.retain(event);

      const list = accepted.get(consumer.id);
      if (list) {
        list.push(event);
      } else {
        accepted.set(consumer.id, [event]);
      }
    }
  }

  const deliveries: ConsumerDelivery[] = [];
  for (const consumer of consumers) {
    const events = accepted.get(consumer.id);
    if (events) deliveries.push({ consumer_id: consumer.id, events });
  }

  return { batch_size: batch.length, deliveries };
}
