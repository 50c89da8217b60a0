/**
 * @shardflow/benchmark - Random Number Utilities
 *
 * Seedable pseudo-random number generator so benchmark datasets are
 * reproducible. xorshift128+ seeded through splitmix64.
 */

const MASK_64 = 0xffffffffffffffffn;

function splitmix(seed: bigint): bigint {
  let s = seed & MASK_64;
  s = ((s ^ (s >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK_64;
  s = ((s ^ (s >> 27n)) * 0x94d049bb133111ebn) & MASK_64;
  return s ^ (s >> 31n);
}

/**
 * Seedable PRNG using xorshift128+
 */
export class SeededRandom {
  private state0: bigint;
  private state1: bigint;

  constructor(readonly seed: number) {
    this.state0 = splitmix(BigInt(Math.trunc(seed)));
    this.state1 = splitmix(BigInt(Math.trunc(seed) + 1));
  }

  private next(): bigint {
    let s1 = this.state0;
    const s0 = this.state1;
    const result = (s0 + s1) & MASK_64;
    this.state0 = s0;
    s1 = (s1 ^ (s1 << 23n)) & MASK_64;
    this.state1 = s1 ^ s0 ^ (s1 >> 17n) ^ (s0 >> 26n);
    return result;
  }

  /**
   * Float in [0, 1)
   */
  random(): number {
    return Number(this.next() & 0x1fffffffffffffn) / 0x20000000000000;
  }

  /**
   * Integer in [min, max]
   */
  int(min: number, max: number): number {
    return Math.floor(this.random() * (max - min + 1)) + min;
  }

  /**
   * Float in [min, max)
   */
  float(min: number, max: number): number {
    return this.random() * (max - min) + min;
  }

  bool(probability = 0.5): boolean {
    return this.random() < probability;
  }

  pick<T>(items: readonly T[]): T {
    return items[this.int(0, items.length - 1)];
  }

  /**
   * Normally distributed value (Box-Muller)
   */
  gaussian(mean = 0, stdDev = 1): number {
    const u1 = 1 - this.random();
    const u2 = this.random();
    return mean + stdDev * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  }
}

export function createRandom(seed: number): SeededRandom {
  return new SeededRandom(seed);
}
