import type { Server as HttpServer } from 'node:http';
import { WebSocketServer as WsServer, WebSocket } from 'ws';
import type { BaseLogger } from 'pino';
import { z } from 'zod';
import { summarizePost } from '../../application/index.js';
import type { PostSummary, RouteReport } from '../../application/index.js';
import type { PostEvent } from '../../domain/index.js';
import { rawDataToString } from '../../infrastructure/jetstream/index.js';

const HEARTBEAT_INTERVAL_MS = 30_000;

/** Pushed once per consumer that accepted posts in a dispatch. */
export interface ConsumerUpdateMessage {
  type: 'consumer_update';
  consumer_id: string;
  /** Newly routed posts, newest first. */
  events: PostEvent[];
  summaries: PostSummary[];
}

const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('scroll') }),
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;

/** Parse a text frame from a browser client. Returns null for anything unrecognised. */
export function parseClientMessage(raw: string): ClientMessage | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = clientMessageSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export function buildConsumerUpdates(report: RouteReport): ConsumerUpdateMessage[] {
  return report.deliveries.map((delivery): ConsumerUpdateMessage => {
    const events = [...delivery.events].reverse();
    return {
      type: 'consumer_update',
      consumer_id: delivery.consumer_id,
      events,
      summaries: events.map(summarizePost),
    };
  });
}

let nextClientId = 1;

interface WsClient {
  id: number;
  socket: WebSocket;
  alive: boolean;
}

/**
 * Push channel for the presentation layer, on /ws.
 *
 * - broadcasts one `consumer_update` per consumer after each dispatch
 * - accepts `{ "type": "scroll" }` from clients and forwards it to the gate
 * - heartbeat PING every 30 s; a client that missed the previous PONG is dropped
 */
export class WebSocketServer {
  private readonly clients: Map<WebSocket, WsClient> = new Map();
  private readonly log: BaseLogger;
  private readonly onScroll: () => void;
  private wss: WsServer | null = null;
  private pingInterval: ReturnType<typeof setInterval> | null = null;

  constructor(log: BaseLogger, onScroll: () => void) {
    this.log = log;
    this.onScroll = onScroll;
  }

  /* ------------------------------------------------------------------ */
  /*  Attach to HTTP server                                             */
  /* ------------------------------------------------------------------ */

  attach(server: HttpServer): void {
    const wss = new WsServer({ server, path: '/ws' });
    this.wss = wss;

    wss.on('connection', (socket: WebSocket) => {
      const client: WsClient = { id: nextClientId++, socket, alive: true };
      this.clients.set(socket, client);
      this.log.info(
        { clientId: client.id, clientCount: this.clients.size },
        'WebSocket client connected',
      );

      socket.on('pong', () => {
        client.alive = true;
      });

      socket.on('message', (data, isBinary) => {
        client.alive = true;
        if (isBinary) return;
        const message = parseClientMessage(rawDataToString(data));
        if (message === null) {
          this.log.debug({ clientId: client.id }, 'Ignoring unrecognised client message');
          return;
        }
        if (message.type === 'scroll') {
          this.onScroll();
        }
      });

      socket.on('close', (code: number) => {
        this.gracefulClose(client, `close code ${code}`);
      });

      socket.on('error', (err: Error) => {
        this.log.debug({ clientId: client.id, err: String(err) }, 'Socket error event');
        this.gracefulClose(client, 'error');
      });
    });

    wss.on('error', (err: Error) => {
      this.log.error({ err }, 'WebSocket server error');
    });

    this.pingInterval = setInterval(() => {
      for (const client of this.clients.values()) {
        if (!client.alive) {
          this.log.debug({ clientId: client.id }, 'Heartbeat timeout — removing client');
          this.gracefulClose(client, 'heartbeat_timeout');
          continue;
        }
        client.alive = false;
        try {
          client.socket.ping();
        } catch (err: unknown) {
          this.log.debug({ clientId: client.id, err: String(err) }, 'Ping failed');
          this.gracefulClose(client, 'ping_error');
        }
      }
    }, HEARTBEAT_INTERVAL_MS);

    this.log.info('WebSocket server attached on /ws');
  }

  /* ------------------------------------------------------------------ */
  /*  Broadcast                                                         */
  /* ------------------------------------------------------------------ */

  broadcast(report: RouteReport): void {
    if (this.clients.size === 0) return;

    const frames = buildConsumerUpdates(report).map((update) => JSON.stringify(update));
    let sent = 0;

    for (const client of this.clients.values()) {
      for (const frame of frames) {
        if (this.safeSend(client, frame)) sent++;
      }
    }

    this.log.debug(
      { clientCount: this.clients.size, updates: frames.length, sent },
      'Broadcast consumer updates',
    );
  }

  get clientCount(): number {
    return this.clients.size;
  }

  close(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
    for (const client of [...this.clients.values()]) {
      this.gracefulClose(client, 'server_shutdown');
    }
    this.wss?.close();
    this.wss = null;
  }

  /* ------------------------------------------------------------------ */
  /*  Private — lifecycle                                               */
  /* ------------------------------------------------------------------ */

  /** Idempotent: a client already removed is left alone. */
  private gracefulClose(client: WsClient, reason: string): void {
    if (!this.clients.delete(client.socket)) return;
    client.socket.terminate();
    this.log.info(
      { clientId: client.id, reason, clientCount: this.clients.size },
      'WebSocket client disconnected',
    );
  }

  private safeSend(client: WsClient, data: string): boolean {
    if (client.socket.readyState !== WebSocket.OPEN) return false;
    try {
      client.socket.send(data);
      return true;
    } catch (err: unknown) {
      this.log.debug({ clientId: client.id, err: String(err) }, 'Send failed');
      this.gracefulClose(client, 'write_error');
      return false;
    }
  }
}
