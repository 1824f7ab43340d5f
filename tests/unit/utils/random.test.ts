import { describe, it, expect } from 'vitest';
import { SequenceRandomSource, XorShift32Source, fnv1a32 } from '@/utils/random.js';

describe('XorShift32Source', () => {
  it('produces the same sequence for the same seed', () => {
    const a = new XorShift32Source(42);
    const b = new XorShift32Source(42);
    const first = Array.from({ length: 5 }, () => a.next());
    const second = Array.from({ length: 5 }, () => b.next());
    expect(first).toEqual(second);
  });

  it('follows the xorshift32 recurrence', () => {
    // 1 -> 1 ^ (1 << 13) = 8193; 8193 ^ (8193 >>> 17) = 8193; 8193 ^ (8193 << 5) = 270369
    expect(new XorShift32Source(1).nextUint32()).toBe(270369);
  });

  it('keeps every value in [0, 1)', () => {
    const rng = new XorShift32Source('seed');
    for (let i = 0; i < 1000; i++) {
      const value = rng.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('replaces a zero seed so the generator does not stall', () => {
    const rng = new XorShift32Source(0);
    expect(rng.nextUint32()).not.toBe(0);
  });

  it('derives string seeds with FNV-1a', () => {
    expect(fnv1a32('')).toBe(2166136261);
    const fromString = new XorShift32Source('abc');
    const fromHash = new XorShift32Source(fnv1a32('abc'));
    expect(fromString.next()).toBe(fromHash.next());
  });
});

describe('SequenceRandomSource', () => {
  it('replays values and cycles', () => {
    const rng = new SequenceRandomSource([0.1, 0.9]);
    expect([rng.next(), rng.next(), rng.next()]).toEqual([0.1, 0.9, 0.1]);
  });

  it('rejects an empty sequence', () => {
    expect(() => new SequenceRandomSource([])).toThrow(RangeError);
  });
});
