import { randomUUID } from 'node:crypto';
import type { PostEvent } from '../domain/index.js';
import { RetentionBuffer, DEFAULT_RETENTION_CAPACITY } from './retention-buffer.js';

export const PRIMARY_CONSUMER_ID = 'primary';

export type ConsumerRole = 'primary' | 'secondary';

/**
 * Keyword filter used by every consumer.
 *
 * Case-insensitive substring match against the post text. An empty
 * keyword means "everything" for the primary consumer but "nothing" for a
 * secondary one: a freshly split view stays blank until the user types a
 * keyword. The keyword is used exactly as typed, without trimming.
 */
export function matchesKeyword(role: ConsumerRole, keyword: string, text: string): boolean {
  if (keyword === '') return role === 'primary';
  return text.toLowerCase().includes(keyword.toLowerCase());
}

/** Read-only view of a consumer, safe to hand to the presentation layer. */
export interface ConsumerView {
  readonly id: string;
  readonly role: ConsumerRole;
  readonly filter: string;
  readonly alive: boolean;
  readonly retained: number;
  /** Retained posts, newest first. */
  events(): PostEvent[];
}

/** What the fan-out router needs: a filter check and a way to retain. */
export interface RoutableConsumer extends ConsumerView {
  accepts(event: PostEvent): boolean;
  retain(event: PostEvent): void;
}

/**
 * Not exported. Filter changes and retirement go through the registry.
 */
class Consumer implements RoutableConsumer {
  readonly id: string;
  readonly role: ConsumerRole;
  private keyword: string;
  private live = true;
  private readonly retention: RetentionBuffer<PostEvent>;

  constructor(id: string, role: ConsumerRole, keyword: string, capacity: number) {
    this.id = id;
    this.role = role;
    this.keyword = keyword;
    this.retention = new RetentionBuffer<PostEvent>(capacity);
  }

  get filter(): string {
    return this.keyword;
  }

  get alive(): boolean {
    return this.live;
  }

  get retained(): number {
    return this.retention.size;
  }

  events(): PostEvent[] {
    return this.retention.toArray();
  }

  accepts(event: PostEvent): boolean {
    return this.live && matchesKeyword(this.role, this.keyword, event.text);
  }

  retain(event: PostEvent): void {
    this.retention.unshift(event);
  }

  /** New keyword; history retained under the old one is discarded. */
  replaceFilter(keyword: string): void {
    this.keyword = keyword;
    this.retention.clear();
  }

  retire(): void {
    this.live = false;
    this.retention.clear();
  }
}

export type RemoveResult = 'removed' | 'not_found' | 'primary_protected';

export interface ConsumerRegistryOptions {
  retentionCapacity?: number;
  primaryFilter?: string;
  /** Handle generator for secondary consumers. Defaults to randomUUID. */
  idFn?: () => string;
}

/**
 * The dynamic set of consumers: one permanent primary plus any number of
 * user-created secondaries ("splits").
 *
 * Backed by an insertion-ordered Map, so the primary always comes first
 * and splits follow in creation order.
 */
export class ConsumerRegistry {
  private readonly consumers: Map<string, Consumer> = new Map();
  private readonly capacity: number;
  private readonly idFn: () => string;

  constructor(opts: ConsumerRegistryOptions = {}) {
    this.capacity = opts.retentionCapacity ?? DEFAULT_RETENTION_CAPACITY;
    this.idFn = opts.idFn ?? randomUUID;

    const primary = new Consumer(PRIMARY_CONSUMER_ID, 'primary', opts.primaryFilter ?? '', this.capacity);
    this.consumers.set(primary.id, primary);
  }

  get primary(): ConsumerView {
    const primary = this.consumers.get(PRIMARY_CONSUMER_ID);
    if (!primary) {
      throw new Error('Primary consumer missing from registry');
    }
    return primary;
  }

  /** Create a secondary consumer with an empty retention buffer. */
  add(filter: string = ''): ConsumerView {
    let id = this.idFn();
    while (this.consumers.has(id)) {
      id = this.idFn();
    }
    const consumer = new Consumer(id, 'secondary', filter, this.capacity);
    this.consumers.set(id, consumer);
    return consumer;
  }

  /** Remove a secondary consumer and discard its history. The primary stays. */
  remove(id: string): RemoveResult {
    const consumer = this.consumers.get(id);
    if (!consumer) return 'not_found';
    if (consumer.role === 'primary') return 'primary_protected';

    consumer.retire();
    this.consumers.delete(id);
    return 'removed';
  }

  /**
   * Replace a consumer's filter. Clears its retention buffer: posts kept
   * under the old filter are not re-evaluated, only new arrivals are.
   *
   * Returns null for an unknown id.
   */
  updateFilter(id: string, filter: string): ConsumerView | null {
    const consumer = this.consumers.get(id);
    if (!consumer) return null;
    consumer.replaceFilter(filter);
    return consumer;
  }

  get(id: string): ConsumerView | undefined {
    return this.consumers.get(id);
  }

  list(): ConsumerView[] {
    return [...this.consumers.values()];
  }

  /**
   * Consumers registered right now, as a detached array. Consumers added
   * after the snapshot is taken do not appear in it.
   */
  snapshot(): RoutableConsumer[] {
    return [...this.consumers.values()];
  }

  get size(): number {
    return this.consumers.size;
  }
}
