import { vi } from 'vitest';
import type { PostEvent } from '../src/domain/index.js';

let counter = 0;

/**
 * Factory for creating test posts with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makePost(overrides: Partial<PostEvent> = {}): PostEvent {
  counter++;
  return {
    captured_at: overrides.captured_at ?? new Date(FIXED_NOW).toISOString(),
    author_did: overrides.author_did ?? 'did:plc:testauthor0001',
    rkey: overrides.rkey ?? `rkey${String(counter).padStart(6, '0')}`,
    text: overrides.text ?? `post number ${counter}`,
    embed: overrides.embed ?? null,
    facets: overrides.facets ?? null,
  };
}

export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as import('pino').Logger;
}

/** Let every pending promise continuation run. */
export function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/** Fixed "now" for deterministic clock-driven tests. */
export const FIXED_NOW = new Date('2026-02-18T12:00:00Z').getTime();
