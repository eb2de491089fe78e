import WebSocket from 'ws';
import type { BaseLogger } from 'pino';
import { HandoffQueue } from '../channel/index.js';
import type { AdapterNotice, StreamAdapter } from '../ingestion/index.js';
import { POST_COLLECTION } from './jetstream-schema.js';

export interface JetstreamSettings {
  endpoint: string;
  wanted_collections: readonly string[];
  /** Consecutive failed connections tolerated before giving up. */
  max_retries: number;
  base_delay_ms: number;
  max_delay_ms: number;
  /** A connection that stayed up this long resets the retry counter. */
  reset_retries_min_ms: number;
}

export const DEFAULT_JETSTREAM_SETTINGS: JetstreamSettings = {
  endpoint: 'wss://jetstream1.us-east.bsky.network/subscribe',
  wanted_collections: [POST_COLLECTION],
  max_retries: 10,
  base_delay_ms: 1_000,
  max_delay_ms: 30_000,
  reset_retries_min_ms: 30_000,
};

/** The slice of a `ws` client socket the adapter relies on. */
export interface JetstreamSocket {
  on(event: 'open', listener: () => void): unknown;
  on(event: 'message', listener: (data: WebSocket.RawData) => void): unknown;
  on(event: 'close', listener: (code: number) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  close(): void;
}

export type SocketFactory = (url: string) => JetstreamSocket;

export interface JetstreamAdapterOptions {
  log: BaseLogger;
  createSocket?: SocketFactory;
  nowFn?: () => number;
}

type SessionItem =
  | { type: 'open' }
  | { type: 'message'; data: string }
  | { type: 'closed'; reason: string };

export function buildSubscribeUrl(endpoint: string, collections: readonly string[]): string {
  const url = new URL(endpoint);
  for (const collection of collections) {
    url.searchParams.append('wantedCollections', collection);
  }
  return url.toString();
}

/** Exponential backoff: base, 2×base, 4×base … capped at max. `attempt` starts at 1. */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
  return Math.min(baseMs * 2 ** Math.max(attempt - 1, 0), maxMs);
}

export function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
    signal.addEventListener('abort', done, { once: true });
  });
}

/**
 * Bluesky Jetstream client.
 *
 * Opens one WebSocket at a time and yields every text frame as a raw
 * string; decoding happens downstream in the ingestion bridge. When the
 * socket drops it backs off and reconnects, reporting each attempt as a
 * `reconnecting` notice, and after `max_retries` consecutive failures
 * yields `terminated` and ends.
 *
 * Socket callbacks never touch pipeline state: they only feed a per-session
 * hand-off queue that the generator reads from.
 */
export class JetstreamAdapter implements StreamAdapter<string> {
  private readonly settings: JetstreamSettings;
  private readonly log: BaseLogger;
  private readonly createSocket: SocketFactory;
  private readonly nowFn: () => number;

  constructor(settings: JetstreamSettings, opts: JetstreamAdapterOptions) {
    this.settings = settings;
    this.log = opts.log;
    this.createSocket = opts.createSocket ?? ((url) => new WebSocket(url));
    this.nowFn = opts.nowFn ?? Date.now;
  }

  async *stream(signal: AbortSignal): AsyncGenerator<AdapterNotice<string>, void, undefined> {
    const url = buildSubscribeUrl(this.settings.endpoint, this.settings.wanted_collections);
    let failures = 0;

    while (!signal.aborted) {
      const { items, socket } = this.openSession(url);
      const onAbort = (): void => socket.close();
      signal.addEventListener('abort', onAbort, { once: true });

      let openedAt: number | null = null;
      let reason = 'connection closed';

      try {
        for await (const item of items) {
          if (item.type === 'open') {
            openedAt = this.nowFn();
            yield { type: 'connected', endpoint: url };
          } else if (item.type === 'message') {
            yield { type: 'message', data: item.data };
          } else {
            reason = item.reason;
            break;
          }
        }
      } finally {
        signal.removeEventListener('abort', onAbort);
        items.closeReceiver();
        socket.close();
      }

      if (signal.aborted) return;

      if (openedAt !== null && this.nowFn() - openedAt >= this.settings.reset_retries_min_ms) {
        failures = 0;
      }
      failures++;

      if (failures > this.settings.max_retries) {
        yield {
          type: 'terminated',
          reason: `Gave up after ${this.settings.max_retries} retries: ${reason}`,
        };
        return;
      }

      const delay = backoffDelay(failures, this.settings.base_delay_ms, this.settings.max_delay_ms);
      yield { type: 'reconnecting', attempt: failures, delay_ms: delay, reason };
      await sleep(delay, signal);
    }
  }

  private openSession(url: string): { items: HandoffQueue<SessionItem>; socket: JetstreamSocket } {
    const items = new HandoffQueue<SessionItem>();
    const socket = this.createSocket(url);

    const finish = (reason: string): void => {
      items.send({ type: 'closed', reason });
      items.closeSender();
    };

    socket.on('open', () => {
      items.send({ type: 'open' });
    });
    socket.on('message', (data) => {
      items.send({ type: 'message', data: rawDataToString(data) });
    });
    socket.on('error', (err) => {
      this.log.debug({ err: String(err) }, 'Jetstream socket error');
      finish(err.message);
    });
    socket.on('close', (code) => {
      finish(`close code ${code}`);
    });

    this.log.debug({ url }, 'Opening Jetstream connection');
    return { items, socket };
  }
}
