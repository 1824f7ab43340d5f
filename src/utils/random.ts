/**
 * Random sources for endpoint selection.
 *
 * Selection draws through the `RandomSource` interface so tests can pin
 * the exact sequence of picks.
 */

export interface RandomSource {
  /** Returns a float in [0, 1). */
  next(): number;
}

/**
 * `Math.random` backed source used for real runs
 */
export const mathRandomSource: RandomSource = {
  next: () => Math.random(),
};

/**
 * 32-bit FNV-1a hash, used to derive a seed from a string
 */
export function fnv1a32(s: string): number {
  let x = 2166136261 >>> 0;
  for (let i = 0; i < s.length; i++) {
    x ^= s.charCodeAt(i);
    x = Math.imul(x, 16777619) >>> 0;
  }
  return x >>> 0;
}

/**
 * Deterministic xorshift32 source
 *
 * @example
 * ```typescript
 * const rng = new XorShift32Source(42);
 * rng.next(); // same value on every run
 * ```
 */
export class XorShift32Source implements RandomSource {
  private x: number;

  constructor(seed: number | string) {
    const numeric = typeof seed === 'string' ? fnv1a32(seed) : seed >>> 0;
    // xorshift never leaves the all-zero state
    this.x = numeric === 0 ? 0x9e3779b9 : numeric;
  }

  nextUint32(): number {
    let x = this.x >>> 0;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.x = x >>> 0;
    return this.x;
  }

  next(): number {
    return this.nextUint32() / 0x100000000;
  }
}

/**
 * Source that replays a fixed list of values, cycling when exhausted
 */
export class SequenceRandomSource implements RandomSource {
  private index = 0;

  constructor(private readonly values: readonly number[]) {
    if (values.length === 0) {
      throw new RangeError('SequenceRandomSource needs at least one value');
    }
  }

  next(): number {
    const value = this.values[this.index % this.values.length];
    this.index++;
    return value ?? 0;
  }
}
