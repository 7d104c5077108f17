/**
 * Seeded random source (mulberry32). One instance is created per run and
 * handed to every sampler, so draw order alone decides the output.
 */

export class SeededRNG {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Float in [0, 1). */
  random(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Integer in [min, max], both ends included. */
  int(min: number, max: number): number {
    return Math.floor(this.random() * (max - min + 1)) + min;
  }

  float(min: number, max: number): number {
    return this.random() * (max - min) + min;
  }

  chance(p: number): boolean {
    return this.random() < p;
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError("Cannot pick from an empty list");
    }
    return items[this.int(0, items.length - 1)];
  }

  /**
   * Normal draw via Box-Muller. Consumes exactly two uniforms.
   */
  normal(mean: number, stdDev: number): number {
    const u1 = 1 - this.random();
    const u2 = this.random();
    const z0 = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    return z0 * stdDev + mean;
  }

  weightedPick<T>(items: readonly T[], weights: readonly number[]): T {
    if (items.length === 0) {
      throw new RangeError("Cannot pick from an empty list");
    }
    const total = weights.reduce((sum, w) => sum + w, 0);
    if (!(total > 0)) {
      throw new RangeError("Total weight must be positive");
    }
    let r = this.random() * total;
    for (let i = 0; i < items.length; i++) {
      r -= weights[i] ?? 0;
      if (r <= 0) return items[i];
    }
    return items[items.length - 1];
  }

  /**
   * k distinct indices from [0, n), in draw order (partial Fisher-Yates).
   */
  sampleIndices(n: number, k: number): number[] {
    const pool = Array.from({ length: n }, (_, i) => i);
    const count = Math.min(Math.max(k, 0), n);
    const picked: number[] = [];
    for (let i = 0; i < count; i++) {
      const j = this.int(i, n - 1);
      [pool[i], pool[j]] = [pool[j], pool[i]];
      picked.push(pool[i]);
    }
    return picked;
  }
}
