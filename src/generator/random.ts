import { ConfigError } from "../config/errors.js";

const MODULUS = 0x80000000; // 2^31

/**
 * Seeded pseudo-random source (31-bit LCG). One instance is threaded through
 * a whole generation run; output depends only on the seed and call order.
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    if (!Number.isSafeInteger(seed)) {
      throw new ConfigError([
        {
          rule: "seed",
          message: `Random source needs an integer seed, got ${seed}`,
          path: "seed",
        },
      ]);
    }
    this.state = Math.abs(seed) % MODULUS;
  }

  /** [0, 1) */
  next(): number {
    this.state = (this.state * 1664525 + 1013904223) & 0x7fffffff;
    return this.state / MODULUS;
  }

  /** [min, max) */
  uniform(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  /** Integer in [min, max], both inclusive. */
  int(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /**
   * Box–Muller, one uniform pair per draw. The first uniform is mapped
   * into (0, 1] so |z| stays below sqrt(62 ln 2) ≈ 6.56.
   */
  normal(mean: number, sd: number): number {
    const u1 = 1 - this.next();
    const u2 = this.next();
    const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    return mean + z * sd;
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new Error("pick(items) requires a non-empty array");
    }
    return items[Math.floor(this.next() * items.length)];
  }
}
