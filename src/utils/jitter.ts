/**
 * Seeded noise source for cosmetic telemetry jitter.
 * Same seed, same sequence: runs stay reproducible.
 */
export class SeededJitter {
  private seed: number;
  private amplitude: number;

  constructor(seed: number, amplitude: number) {
    this.seed = seed >>> 0;
    this.amplitude = Math.abs(amplitude);
  }

  /** Uniform in [0, 1) (mulberry32) */
  next(): number {
    this.seed = (this.seed + 0x6d2b79f5) >>> 0;
    let t = this.seed;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Uniform in [-amplitude, amplitude) */
  offset(): number {
    return (this.next() * 2 - 1) * this.amplitude;
  }
}
