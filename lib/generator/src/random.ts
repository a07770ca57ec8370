/**
 * Deterministic pseudo-random number generator.
 *
 * Uses xorshift128+. The same seed always produces the same sequence, so
 * self-test failures are reproducible.
 */

const MASK_64 = 0xffffffffffffffffn;

/**
 * Mixes a seed into a 64-bit state word (splitmix64 finalizer).
 */
function mix(seed: number): bigint {
  let state = BigInt(seed);
  state = ((state ^ (state >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK_64;
  state = ((state ^ (state >> 27n)) * 0x94d049bb133111ebn) & MASK_64;
  return state ^ (state >> 31n);
}

export class SeededRandom {
  private s0: bigint;
  private s1: bigint;
  private readonly seed: number;

  constructor(seed: number) {
    this.seed = seed;
    this.s0 = mix(seed);
    this.s1 = mix(seed + 1);
  }

  getSeed(): number {
    return this.seed;
  }

  /**
   * Next raw 64-bit output.
   */
  nextBits(): bigint {
    let s1 = this.s0;
    const s0 = this.s1;
    this.s0 = s0;
    s1 = (s1 ^ (s1 << 23n)) & MASK_64;
    s1 ^= s1 >> 17n;
    s1 ^= s0;
    s1 ^= s0 >> 26n;
    this.s1 = s1;
    return (this.s0 + this.s1) & MASK_64;
  }

  /**
   * Uniform value of `bits` random bits.
   */
  bigint(bits: number): bigint {
    let value = 0n;
    for (let filled = 0; filled < bits; filled += 64) {
      value = (value << 64n) | this.nextBits();
    }
    return value & ((1n << BigInt(bits)) - 1n);
  }

  /**
   * Random value in [min, max] (inclusive).
   */
  bigintBetween(min: bigint, max: bigint): bigint {
    const span = max - min + 1n;
    const bits = span.toString(2).length + 8;
    return min + (this.bigint(bits) % span);
  }
}
