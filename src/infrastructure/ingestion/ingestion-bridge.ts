import type { BaseLogger } from 'pino';
import type { PostEvent } from '../../domain/index.js';
import type { HandoffQueue } from '../channel/index.js';
import type {
  StreamAdapter,
  Decoder,
  DecodeResult,
  BridgeExitReason,
  BridgeStats,
} from './types.js';

/**
 * Pulls the stream adapter, decodes each record and forwards the result
 * into the hand-off queue.
 *
 * Per record: decode → send. Forwarding never waits on the dispatch side;
 * the queue is unbounded.
 *
 * - Decode failures are logged and dropped, the stream continues.
 * - A refused send means the receiver is gone: stop pulling and return
 *   `receiver_closed`. That is a normal shutdown, not an error.
 * - The adapter giving up (or throwing) means no more data: `source_ended`.
 */
export class IngestionBridge<Raw> {
  private readonly adapter: StreamAdapter<Raw>;
  private readonly decode: Decoder<Raw>;
  private readonly queue: HandoffQueue<PostEvent>;
  private readonly log: BaseLogger;

  private forwarded = 0;
  private skipped = 0;
  private failed = 0;
  private reconnects = 0;

  constructor(
    adapter: StreamAdapter<Raw>,
    decode: Decoder<Raw>,
    queue: HandoffQueue<PostEvent>,
    log: BaseLogger,
  ) {
    this.adapter = adapter;
    this.decode = decode;
    this.queue = queue;
    this.log = log;
  }

  async run(signal: AbortSignal): Promise<BridgeExitReason> {
    this.log.info('Ingestion bridge started');

    try {
      for await (const notice of this.adapter.stream(signal)) {
        switch (notice.type) {
          case 'message': {
            const result = this.safeDecode(notice.data);

            if (result.status === 'skipped') {
              this.skipped++;
              break;
            }

            if (result.status === 'failed') {
              this.failed++;
              this.log.warn({ reason: result.reason }, 'Dropping undecodable record');
              break;
            }

            if (!this.queue.send(result.event)) {
              this.log.info(
                { forwarded: this.forwarded },
                'Receiver closed — ingestion bridge stopping',
              );
              return 'receiver_closed';
            }

            this.forwarded++;
            this.log.debug(
              { author_did: result.event.author_did, rkey: result.event.rkey },
              'Post forwarded',
            );
            break;
          }

          case 'connected':
            this.log.info({ endpoint: notice.endpoint }, 'Stream connected');
            break;

          case 'reconnecting':
            this.reconnects++;
            this.log.warn(
              { attempt: notice.attempt, delay_ms: notice.delay_ms, reason: notice.reason },
              'Stream disconnected — reconnecting',
            );
            break;

          case 'terminated':
            this.log.error({ reason: notice.reason }, 'Stream terminated by adapter');
            return 'source_ended';
        }
      }
    } catch (err: unknown) {
      if (signal.aborted) return 'aborted';
      this.log.error({ err }, 'Stream adapter failed — treating as end of stream');
      return 'source_ended';
    }

    return signal.aborted ? 'aborted' : 'source_ended';
  }

  get stats(): BridgeStats {
    return {
      forwarded: this.forwarded,
      skipped: this.skipped,
      failed: this.failed,
      reconnects: this.reconnects,
    };
  }

  private safeDecode(raw: Raw): DecodeResult {
    try {
      return this.decode(raw);
    } catch (err: unknown) {
      return {
        status: 'failed',
        reason: err instanceof Error ? err.message : String(err),
      };
    }
  }
}
