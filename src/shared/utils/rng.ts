/**
 * Small deterministic PRNG (mulberry32). Random players and soak runs take
 * their randomness from here so that a seed reproduces a whole game.
 */
export class SeededRNG {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Next float in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Integer in [0, maxExclusive). */
  nextInt(maxExclusive: number): number {
    return Math.floor(this.next() * maxExclusive);
  }
}

/** Source of floats in [0, 1), e.g. `Math.random` or a bound `SeededRNG.next`. */
export type RandomSource = () => number;

export function createSeededSource(seed: number): RandomSource {
  const rng = new SeededRNG(seed);
  return () => rng.next();
}
