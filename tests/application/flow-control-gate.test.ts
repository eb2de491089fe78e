import { describe, it, expect, beforeEach } from 'vitest';
import { FlowControlGate, DEFAULT_SCROLL_COOLDOWN_MS } from '../../src/application/flow-control-gate.js';

describe('FlowControlGate', () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 10_000;
  });

  it('is not suspended before any signal', () => {
    const gate = new FlowControlGate(DEFAULT_SCROLL_COOLDOWN_MS, clock);
    expect(gate.isSuspended()).toBe(false);
    expect(gate.suspendedUntil).toBe(10_000);
  });

  it('suspends for the cooldown after a signal', () => {
    const gate = new FlowControlGate(2000, clock);
    gate.signal();

    expect(gate.suspendedUntil).toBe(12_000);
    now = 11_999;
    expect(gate.isSuspended()).toBe(true);
    now = 12_000;
    expect(gate.isSuspended()).toBe(false);
  });

  it('a later signal extends the pause', () => {
    const gate = new FlowControlGate(2000, clock);
    gate.signal();
    now = 11_500;
    gate.signal();

    expect(gate.suspendedUntil).toBe(13_500);
    now = 12_500;
    expect(gate.isSuspended()).toBe(true);
  });

  it('never moves the deadline earlier', () => {
    const gate = new FlowControlGate(2000, clock);
    gate.signal();
    now = 9_000; // clock stepped backwards
    gate.signal();
    expect(gate.suspendedUntil).toBe(12_000);
  });

  it('a zero cooldown never suspends', () => {
    const gate = new FlowControlGate(0, clock);
    gate.signal();
    expect(gate.isSuspended()).toBe(false);
    expect(gate.cooldown).toBe(0);
  });

  it('defaults to a 2 second cooldown', () => {
    const gate = new FlowControlGate(undefined, clock);
    expect(gate.cooldown).toBe(2000);
  });

  it('rejects a negative cooldown', () => {
    expect(() => new FlowControlGate(-1, clock)).toThrow(/non-negative/);
  });
});
