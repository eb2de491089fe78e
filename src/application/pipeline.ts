import type { BaseLogger } from 'pino';
import type { PostEvent } from '../domain/index.js';
import { HandoffQueue } from '../infrastructure/channel/index.js';
import { IngestionBridge } from '../infrastructure/ingestion/index.js';
import type {
  StreamAdapter,
  Decoder,
  BridgeExitReason,
  BridgeStats,
} from '../infrastructure/ingestion/index.js';
import { ArrivalBuffer } from './arrival-buffer.js';
import { FlowControlGate, DEFAULT_SCROLL_COOLDOWN_MS } from './flow-control-gate.js';
import { ConsumerRegistry } from './consumer-registry.js';
import { DispatchScheduler, DEFAULT_DISPATCH_INTERVAL_MS } from './dispatch-scheduler.js';
import type { DispatchListener, DispatchOutcome } from './dispatch-scheduler.js';
import { DEFAULT_RETENTION_CAPACITY } from './retention-buffer.js';
import type { RouteReport } from './fanout-router.js';

export type PipelineState = 'created' | 'running' | 'draining' | 'stopped';

export interface PipelineSettings {
  dispatch_interval_ms: number;
  scroll_cooldown_ms: number;
  retention_capacity: number;
}

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  dispatch_interval_ms: DEFAULT_DISPATCH_INTERVAL_MS,
  scroll_cooldown_ms: DEFAULT_SCROLL_COOLDOWN_MS,
  retention_capacity: DEFAULT_RETENTION_CAPACITY,
};

export interface PipelineOptions<Raw> {
  adapter: StreamAdapter<Raw>;
  decode: Decoder<Raw>;
  log: BaseLogger;
  settings?: Partial<PipelineSettings>;
  nowFn?: () => number;
}

export interface PipelineHealth {
  state: PipelineState;
  pending: number;
  gate: { suspended: boolean; suspended_until: string };
  consumers: number;
  ingestion: BridgeStats & { exit: BridgeExitReason | null };
}

/**
 * The whole ingestion → buffering → gated dispatch → fan-out chain.
 *
 * Lifecycle:
 *   created ──start()──▶ running ──stop()──▶ draining ──▶ stopped
 *
 * Stopping closes the receiving end of the hand-off queue (the bridge sees
 * its next send refused and exits), moves anything still queued into the
 * arrival buffer, stops the timer and flushes one last time, ungated.
 *
 * There is no paused state: the gate only decides, per tick, whether the
 * buffer is drained. Ingestion keeps running while it is suspended.
 *
 * If the source ends on its own the pipeline stays `running`: consumers
 * keep their history and the stream simply has no new data.
 */
export class Pipeline<Raw = string> {
  readonly gate: FlowControlGate;
  readonly registry: ConsumerRegistry;

  private readonly log: BaseLogger;
  private readonly arrivals = new ArrivalBuffer();
  private readonly queue = new HandoffQueue<PostEvent>();
  private readonly bridge: IngestionBridge<Raw>;
  private readonly scheduler: DispatchScheduler;
  private readonly listeners: Set<DispatchListener> = new Set();
  private readonly abort = new AbortController();

  private current: PipelineState = 'created';
  private bridgeRun: Promise<BridgeExitReason> | null = null;
  private intakeRun: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private bridgeExit: BridgeExitReason | null = null;

  constructor(opts: PipelineOptions<Raw>) {
    const settings: PipelineSettings = { ...DEFAULT_PIPELINE_SETTINGS, ...opts.settings };

    this.log = opts.log;
    this.gate = new FlowControlGate(settings.scroll_cooldown_ms, opts.nowFn ?? Date.now);
    this.registry = new ConsumerRegistry({ retentionCapacity: settings.retention_capacity });
    this.bridge = new IngestionBridge(opts.adapter, opts.decode, this.queue, opts.log);
    this.scheduler = new DispatchScheduler({
      buffer: this.arrivals,
      gate: this.gate,
      registry: this.registry,
      log: opts.log,
      intervalMs: settings.dispatch_interval_ms,
      onDispatch: (report) => this.notify(report),
    });
  }

  get state(): PipelineState {
    return this.current;
  }

  start(): void {
    if (this.current !== 'created') {
      throw new Error(`Pipeline cannot start from state "${this.current}"`);
    }
    this.current = 'running';

    this.intakeRun = this.runIntake();
    this.bridgeRun = this.bridge.run(this.abort.signal).then((exit) => {
      this.bridgeExit = exit;
      this.queue.closeSender();
      this.log.info({ exit, ...this.bridge.stats }, 'Ingestion bridge exited');
      return exit;
    });
    this.scheduler.start();

    this.log.info('Pipeline running');
  }

  /** Idempotent. Resolves once the pipeline is `stopped`. */
  stop(): Promise<void> {
    if (this.stopping) return this.stopping;

    if (this.current === 'created') {
      this.current = 'stopped';
      this.stopping = Promise.resolve();
    } else {
      this.stopping = this.drainAndStop();
    }
    return this.stopping;
  }

  /** Subscribe to every successful dispatch. Returns an unsubscribe function. */
  onDispatch(listener: DispatchListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Drive one scheduler firing by hand (the timer does this every interval). */
  tick(): DispatchOutcome {
    return this.scheduler.tick();
  }

  health(): PipelineHealth {
    return {
      state: this.current,
      pending: this.arrivals.size + this.queue.size,
      gate: {
        suspended: this.gate.isSuspended(),
        suspended_until: new Date(this.gate.suspendedUntil).toISOString(),
      },
      consumers: this.registry.size,
      ingestion: { ...this.bridge.stats, exit: this.bridgeExit },
    };
  }

  private async runIntake(): Promise<void> {
    for await (const event of this.queue) {
      this.arrivals.push(event);
    }
  }

  private async drainAndStop(): Promise<void> {
    this.current = 'draining';
    this.log.info({ pending: this.arrivals.size + this.queue.size }, 'Pipeline draining');

    this.arrivals.pushAll(this.queue.closeReceiver());
    // An idle adapter may never attempt another send; abort unblocks it.
    this.abort.abort();

    await this.bridgeRun;
    await this.intakeRun;

    this.scheduler.stop();
    const outcome = this.scheduler.flush();

    this.current = 'stopped';
    this.log.info(
      { flushed: outcome.status === 'dispatched' ? outcome.report.batch_size : 0 },
      'Pipeline stopped',
    );
  }

  private notify(report: RouteReport): void {
    for (const listener of this.listeners) {
      try {
        listener(report);
      } catch (err: unknown) {
        this.log.error({ err }, 'Dispatch subscriber failed');
      }
    }
  }
}
