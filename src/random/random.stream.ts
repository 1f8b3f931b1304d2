import seedrandom from 'seedrandom';
import { config } from '../config';

type Prng = seedrandom.StatefulPRNG<seedrandom.State.Arc4>;
type PrngState = seedrandom.State.Arc4;

export type Seed = number | string;

/** Opaque, JSON-serialisable position of a {@link RandomStream}. */
export interface RandomStreamState {
  seed: Seed;
  state: PrngState;
}

/**
 * Deterministic random source backed by `seedrandom` (ARC4).
 *
 * Two streams created with the same seed produce the same sequence; `snapshot()`
 * and `restore()` rewind a stream to an earlier position for replay in tests.
 */
export class RandomStream {
  private prng: Prng;
  private currentSeed: Seed;

  constructor(seed: Seed = config.defaultSeed) {
    this.currentSeed = seed;
    this.prng = seedrandom(String(seed), { state: true });
  }

  get seed(): Seed {
    return this.currentSeed;
  }

  /** Restart the sequence from `seed`. */
  reseed(seed: Seed): void {
    this.currentSeed = seed;
    this.prng = seedrandom(String(seed), { state: true });
  }

  /** Uniform float in [0, 1). */
  next(): number {
    return this.prng();
  }

  /** Uniform integer in [0, n). */
  nextInt(n: number): number {
    if (!Number.isInteger(n) || n <= 0) {
      throw new RangeError(`nextInt bound must be a positive integer, got ${n}`);
    }
    return Math.floor(this.prng() * n);
  }

  /** Uniform float in [lowest, highest). */
  nextRange(lowest: number, highest: number): number {
    return lowest + this.prng() * (highest - lowest);
  }

  chance(probability: number): boolean {
    return this.prng() < probability;
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) throw new RangeError('Cannot pick from an empty list');
    return items[this.nextInt(items.length)];
  }

  /** Fisher-Yates shuffled copy; the input is left untouched. */
  shuffle<T>(items: readonly T[]): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i--) {
      const j = this.nextInt(i + 1);
      [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
  }

  /** Normal deviate via Box-Muller. */
  gaussian(mean = 0, sd = 1): number {
    const u1 = 1 - this.prng(); // (0, 1]
    const u2 = this.prng();
    return mean + sd * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  }

  snapshot(): RandomStreamState {
    return { seed: this.currentSeed, state: this.prng.state() };
  }

  restore(snapshot: RandomStreamState): void {
    this.currentSeed = snapshot.seed;
    this.prng = seedrandom('', { state: snapshot.state });
  }
}

export interface SeedOptions {
  breeding?: Seed;
  landscape?: Seed;
  /** Derive any seed not given explicitly from the clock. */
  timeBased?: boolean;
}

/**
 * The two independent streams of a run: `breeding` drives operators and
 * `landscape` drives evaluators. Reseeding one never perturbs the other.
 */
export class RandomStreams {
  readonly breeding: RandomStream;
  readonly landscape: RandomStream;

  constructor(options: SeedOptions = {}) {
    const clock = Date.now();
    const fallback = (offset: number): Seed =>
      options.timeBased ? (clock + offset) >>> 0 : config.defaultSeed;
    this.breeding = new RandomStream(options.breeding ?? fallback(0));
    this.landscape = new RandomStream(options.landscape ?? fallback(0x9e3779b1));
  }

  snapshot(): { breeding: RandomStreamState; landscape: RandomStreamState } {
    return { breeding: this.breeding.snapshot(), landscape: this.landscape.snapshot() };
  }

  restore(snapshot: { breeding: RandomStreamState; landscape: RandomStreamState }): void {
    this.breeding.restore(snapshot.breeding);
    this.landscape.restore(snapshot.landscape);
  }
}
