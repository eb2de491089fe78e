import type { BaseLogger } from 'pino';
import type { ArrivalBuffer } from './arrival-buffer.js';
import type { FlowControlGate } from './flow-control-gate.js';
import type { ConsumerRegistry } from './consumer-registry.js';
import { routeBatch } from './fanout-router.js';
import type { RouteReport } from './fanout-router.js';

/** 5 dispatches per second. */
export const DEFAULT_DISPATCH_INTERVAL_MS = 200;

export type DispatchOutcome =
  | { readonly status: 'suspended'; readonly pending: number; readonly suspended_until: number }
  | { readonly status: 'idle' }
  | { readonly status: 'dispatched'; readonly report: RouteReport };

export type DispatchListener = (report: RouteReport) => void;

export interface DispatchSchedulerOptions {
  buffer: ArrivalBuffer;
  gate: FlowControlGate;
  registry: ConsumerRegistry;
  log: BaseLogger;
  intervalMs?: number;
  onDispatch?: DispatchListener;
}

/**
 * Fixed-period dispatcher.
 *
 * Each tick either leaves the arrival buffer alone (gate suspended, or
 * nothing queued) or drains it completely and routes the batch in one go,
 * so bursts reach consumers as a single update per period no matter how
 * fast the source is.
 */
export class DispatchScheduler {
  private readonly buffer: ArrivalBuffer;
  private readonly gate: FlowControlGate;
  private readonly registry: ConsumerRegistry;
  private readonly log: BaseLogger;
  private readonly intervalMs: number;
  private readonly onDispatch: DispatchListener | undefined;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(opts: DispatchSchedulerOptions) {
    const intervalMs = opts.intervalMs ?? DEFAULT_DISPATCH_INTERVAL_MS;
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new Error(`Dispatch interval must be a positive number, got ${intervalMs}`);
    }
    this.buffer = opts.buffer;
    this.gate = opts.gate;
    this.registry = opts.registry;
    this.log = opts.log;
    this.intervalMs = intervalMs;
    this.onDispatch = opts.onDispatch;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick();
    }, this.intervalMs);
    this.log.debug({ interval_ms: this.intervalMs }, 'Dispatch scheduler started');
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.log.debug('Dispatch scheduler stopped');
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** One scheduler firing. Public so callers and tests can drive time themselves. */
  tick(): DispatchOutcome {
    if (this.gate.isSuspended()) {
      return {
        status: 'suspended',
        pending: this.buffer.size,
        suspended_until: this.gate.suspendedUntil,
      };
    }
    return this.dispatch();
  }

  /** Drain and route regardless of the gate. Used once on shutdown. */
  flush(): DispatchOutcome {
    return this.dispatch();
  }

  private dispatch(): DispatchOutcome {
    if (this.buffer.size === 0) return { status: 'idle' };

    const batch = this.buffer.drain();
    const report = routeBatch(batch, this.registry.snapshot());

    this.log.debug(
      { batch_size: report.batch_size, consumers_updated: report.deliveries.length },
      'Batch dispatched',
    );

    if (this.onDispatch) {
      try {
        this.onDispatch(report);
      } catch (err: unknown) {
        this.log.error({ err }, 'Dispatch listener failed');
      }
    }

    return { status: 'dispatched', report };
  }
}
