import type { PostEvent } from '../../domain/index.js';

/**
 * What a stream adapter yields. Only `message` carries data; the rest
 * are connection notices for logging.
 */
export type AdapterNotice<Raw> =
  | { readonly type: 'message'; readonly data: Raw }
  | { readonly type: 'connected'; readonly endpoint: string }
  | {
      readonly type: 'reconnecting';
      readonly attempt: number;
      readonly delay_ms: number;
      readonly reason: string;
    }
  | { readonly type: 'terminated'; readonly reason: string };

/**
 * A remote feed exposed as a one-way, possibly infinite sequence.
 * Reconnect and backoff live behind this interface. The sequence must end
 * promptly once `signal` aborts.
 */
export interface StreamAdapter<Raw> {
  stream(signal: AbortSignal): AsyncIterable<AdapterNotice<Raw>>;
}

/**
 * Result of decoding a single wire record.
 *
 * `skipped` is a well-formed record the pipeline has no interest in
 * (another collection, a delete, an identity event). `failed` is a
 * malformed record; it is dropped with a diagnostic.
 */
export type DecodeResult =
  | { readonly status: 'decoded'; readonly event: PostEvent }
  | { readonly status: 'skipped' }
  | { readonly status: 'failed'; readonly reason: string };

export type Decoder<Raw> = (raw: Raw) => DecodeResult;

export type BridgeExitReason = 'receiver_closed' | 'source_ended' | 'aborted';

export interface BridgeStats {
  readonly forwarded: number;
  readonly skipped: number;
  readonly failed: number;
  readonly reconnects: number;
}
