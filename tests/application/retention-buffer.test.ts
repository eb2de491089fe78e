import { describe, it, expect } from 'vitest';
import { RetentionBuffer, DEFAULT_RETENTION_CAPACITY } from '../../src/application/retention-buffer.js';

describe('RetentionBuffer', () => {
  it('defaults to a capacity of 100', () => {
    const buffer = new RetentionBuffer<number>();
    expect(buffer.capacity).toBe(DEFAULT_RETENTION_CAPACITY);
    expect(buffer.capacity).toBe(100);
    expect(buffer.size).toBe(0);
    expect(buffer.toArray()).toEqual([]);
  });

  it('returns entries newest first', () => {
    const buffer = new RetentionBuffer<string>(5);
    buffer.unshift('a');
    buffer.unshift('b');
    buffer.unshift('c');
    expect(buffer.toArray()).toEqual(['c', 'b', 'a']);
    expect(buffer.size).toBe(3);
  });

  it('evicts the oldest entry once full', () => {
    const buffer = new RetentionBuffer<number>(3);
    for (let i = 1; i <= 5; i++) buffer.unshift(i);
    expect(buffer.toArray()).toEqual([5, 4, 3]);
    expect(buffer.size).toBe(3);
  });

  it('keeps the newest 100 of 105 inserts', () => {
    const buffer = new RetentionBuffer<number>();
    for (let i = 1; i <= 105; i++) buffer.unshift(i);

    const items = buffer.toArray();
    expect(items).toHaveLength(100);
    expect(items[0]).toBe(105);
    expect(items[99]).toBe(6);
  });

  it('clear empties the buffer and it can be refilled', () => {
    const buffer = new RetentionBuffer<number>(2);
    buffer.unshift(1);
    buffer.unshift(2);
    buffer.clear();
    expect(buffer.size).toBe(0);
    expect(buffer.toArray()).toEqual([]);

    buffer.unshift(3);
    expect(buffer.toArray()).toEqual([3]);
  });

  it('returns a fresh array each time', () => {
    const buffer = new RetentionBuffer<number>(2);
    buffer.unshift(1);
    const first = buffer.toArray();
    first.push(99);
    expect(buffer.toArray()).toEqual([1]);
  });

  it.each([0, -1, 1.5, Number.NaN])('rejects capacity %s', (capacity) => {
    expect(() => new RetentionBuffer<number>(capacity)).toThrow(/positive integer/);
  });
});
