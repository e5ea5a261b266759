/**
 * Seeded PRNG (xorshift128+) for reproducible initialization and shuffling.
 */
import type { Rng } from "./interfaces.js";

const WARMUP_ROUNDS = 20;

export class SeededRng implements Rng {
  private lo = 0;
  private hi = 0;
  private seedValue = 0;
  private spare: number | null = null;

  constructor(seed = 42) {
    this.reseed(seed);
  }

  seed(s: number): void {
    this.reseed(s);
  }

  /** The seed this generator was last (re)started from. */
  state(): number {
    return this.seedValue;
  }

  setState(s: number): void {
    this.reseed(s);
  }

  /** Uniform in [0, 1). */
  next(): number {
    let x = this.lo;
    const y = this.hi;
    this.lo = y;
    x ^= x << 23;
    x ^= x >>> 17;
    x ^= y ^ (y >>> 26);
    this.hi = x;
    return ((this.lo + this.hi) >>> 0) / 0x100000000;
  }

  /** Standard normal via the polar Box-Muller method; samples come in pairs. */
  nextGauss(): number {
    if (this.spare !== null) {
      const cached = this.spare;
      this.spare = null;
      return cached;
    }
    for (;;) {
      const u = this.next() * 2 - 1;
      const v = this.next() * 2 - 1;
      const r2 = u * u + v * v;
      if (r2 === 0 || r2 >= 1) continue;
      const k = Math.sqrt((-2 * Math.log(r2)) / r2);
      this.spare = v * k;
      return u * k;
    }
  }

  private reseed(s: number): void {
    this.seedValue = s;
    this.lo = s;
    this.hi = s ^ 0xdeadbeef;
    this.spare = null;
    for (let i = 0; i < WARMUP_ROUNDS; i++) this.next();
  }
}

/** Uniform sample in [min, max). */
export function uniform(rng: Rng, min: number, max: number): number {
  return min + (max - min) * rng.next();
}

/** Gaussian sample with the given mean and standard deviation. */
export function normal(rng: Rng, mean: number, std: number): number {
  return mean + std * rng.nextGauss();
}

/** Fisher-Yates shuffle of `0..n-1`. */
export function permutation(rng: Rng, n: number): number[] {
  const order = Array.from({ length: n }, (_, i) => i);
  for (let i = n - 1; i > 0; i--) {
    const j = Math.floor(rng.next() * (i + 1));
    const tmp = order[i];
    order[i] = order[j];
    order[j] = tmp;
  }
  return order;
}
