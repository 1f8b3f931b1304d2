import type { RandomStream } from '../random/random.stream';
import { compareFitness, fittest } from '../species/species.fitness';
import type { Individual } from '../species/species.individual';
import {
  booleanArg,
  numberArg,
  OperatorArguments,
  OperatorDescriptor,
  optionalNumberArg,
  ParameterSpec,
} from './methods.types';

/**
 * Selection operators: choose individuals from their source without changing them.
 *
 * Selection pressure ranges from none (`uniform_random`, `uniform_shuffle`) through
 * moderate (`tournament`, `fitness_proportional`, `rank_proportional`) to total (`best`). Selectors
 * that sample "with replacement" never end on their own; the statement's
 * destination counts decide how many individuals are taken.
 *
 * @see {@link https://en.wikipedia.org/wiki/Selection_(genetic_algorithm)|Selection (genetic algorithm) - Wikipedia}
 */

const REPLACEMENT: ParameterSpec = {
  type: 'boolean',
  default: true,
  description: 'Sample with replacement; when false each individual is returned at most once.',
};

const ONLY: ParameterSpec = {
  type: 'boolean',
  default: false,
  description: 'Repeat the single extreme individual forever instead of ordering them all.',
};

const withoutReplacement = (args: OperatorArguments): boolean => !booleanArg(args, 'replacement');
const notOnly = (args: OperatorArguments): boolean => !booleanArg(args, 'only');

/** Pull one index at a time from a shrinking pool until it is empty. */
function* drain(
  pool: Individual[],
  chooseIndex: (pool: Individual[]) => number
): Generator<Individual> {
  while (pool.length) {
    const [chosen] = pool.splice(chooseIndex(pool), 1);
    yield chosen;
  }
}

function* forever<T>(value: T): Generator<T> {
  for (;;) yield value;
}

/** Ordered copy (`order` > 0 means `a` first), or the extreme member repeated. */
function ordered(
  source: Iterable<Individual>,
  only: boolean,
  order: (a: Individual, b: Individual) => number
): Iterable<Individual> {
  const pool = [...source].sort((a, b) => -order(a, b));
  if (!only) return pool;
  return pool.length ? forever(pool[0]) : [];
}

const byBirthday = (a: Individual, b: Individual): number =>
  (a.birthday ?? 0) - (b.birthday ?? 0);

/**
 * Index of a tournament winner among `k` random picks; with probability
 * 1 - greediness a random loser wins instead.
 */
function tournamentIndex(
  pool: readonly Individual[],
  k: number,
  greediness: number,
  random: RandomStream
): number {
  const entrants = Array.from({ length: k }, () => random.nextInt(pool.length));
  let winner = 0;
  for (let i = 1; i < entrants.length; i++) {
    if (compareFitness(pool[entrants[i]], pool[entrants[winner]]) > 0) winner = i;
  }
  if (greediness >= 1 || random.chance(greediness)) return entrants[winner];
  entrants.splice(winner, 1);
  return random.pick(entrants);
}

function tournament(
  source: Iterable<Individual>,
  args: OperatorArguments,
  k: number,
  random: RandomStream
): Iterable<Individual> {
  const greediness = numberArg(args, 'greediness', 1);
  const pool = [...source];
  if (booleanArg(args, 'replacement')) {
    return (function* () {
      while (pool.length) yield pool[tournamentIndex(pool, k, greediness, random)];
    })();
  }
  // once fewer than k remain, everyone left wins in fitness order
  return drain(pool, (remaining) =>
    remaining.length >= k
      ? tournamentIndex(remaining, k, greediness, random)
      : remaining.indexOf(fittest(remaining) ?? remaining[0])
  );
}

/**
 * Fitness made positive-is-better and shifted so the worst finite score weighs
 * nothing. Non-finite scores weigh nothing either.
 */
function fitnessWeights(pool: readonly Individual[]): number[] {
  const scores = pool.map((individual) =>
    individual.maximise ? individual.fitness : -individual.fitness
  );
  let floor = Infinity;
  for (const score of scores) {
    if (Number.isFinite(score) && score < floor) floor = score;
  }
  return scores.map((score) => (Number.isFinite(score) ? score - floor : 0));
}

/**
 * Linear ranking: the fittest member weighs `expectation`, the least fit
 * `2 - expectation`. `invert` gives the least fit the largest weight. The pool
 * is reordered fittest first (least fit first when inverted).
 */
function rankWeights(pool: Individual[], expectation: number, invert: boolean): number[] {
  pool.sort((a, b) => (invert ? compareFitness(a, b) : compareFitness(b, a)));
  const last = pool.length - 1;
  return pool.map((_individual, rank) =>
    last > 0 ? expectation - (2 * (expectation - 1) * rank) / last : expectation
  );
}

/** First index whose running total exceeds `threshold`. */
function searchCumulative(cumulative: readonly number[], threshold: number): number {
  let low = 0;
  let high = cumulative.length - 1;
  while (low < high) {
    const middle = (low + high) >> 1;
    if (cumulative[middle] > threshold) high = middle;
    else low = middle + 1;
  }
  return low;
}

/** Index reached after walking `threshold` along the weights. */
function walkWeights(weights: readonly number[], threshold: number): number {
  let fallback = weights.length - 1;
  for (let i = 0; i < weights.length; i++) {
    if (weights[i] <= 0) continue;
    threshold -= weights[i];
    if (threshold < 0) return i;
    fallback = i;
  }
  return fallback;
}

interface WheelOptions {
  replacement: boolean;
  /** Stochastic universal sampling: `mu` evenly spaced pointers per turn of the wheel. */
  sus: boolean;
  mu: number;
}

/**
 * Roulette wheel over fixed weights. Spins fall back to a uniform choice
 * whenever the remaining weights sum to zero.
 */
function* wheel(
  pool: Individual[],
  weights: number[],
  options: WheelOptions,
  random: RandomStream
): Generator<Individual> {
  let pointer = options.sus ? random.next() / options.mu - 1 / options.mu : 0;
  const spin = (): number => {
    if (!options.sus) return random.next();
    pointer += 1 / options.mu;
    if (pointer >= 1) pointer -= 1;
    return pointer;
  };

  if (options.replacement) {
    const cumulative: number[] = [];
    let total = 0;
    for (const weight of weights) cumulative.push((total += weight));
    while (pool.length) {
      yield pool[total > 0 ? searchCumulative(cumulative, spin() * total) : random.nextInt(pool.length)];
    }
    return;
  }
  while (pool.length) {
    const total = weights.reduce((sum, weight) => sum + weight, 0);
    const index = total > 0 ? walkWeights(weights, spin() * total) : random.nextInt(pool.length);
    weights.splice(index, 1);
    const [chosen] = pool.splice(index, 1);
    yield chosen;
  }
}

function wheelOptions(args: OperatorArguments, sus: boolean, fallbackMu: number): WheelOptions {
  return {
    replacement: booleanArg(args, 'replacement', true),
    sus,
    mu: optionalNumberArg(args, 'mu') ?? fallbackMu,
  };
}

const MU: ParameterSpec = {
  type: 'integer',
  description: 'Pointers per turn of the wheel under SUS. Default: the source size.',
};

function checkMu(args: OperatorArguments): void {
  const mu = optionalNumberArg(args, 'mu');
  if (mu !== undefined && mu < 1) throw new RangeError(`mu must be at least 1, got ${mu}`);
}

function checkExpectation(args: OperatorArguments): void {
  const expectation = numberArg(args, 'expectation', 1.1);
  if (expectation < 1 || expectation > 2) {
    throw new RangeError(`expectation must be within [1, 2], got ${expectation}`);
  }
}

function fitnessProportional(
  source: Iterable<Individual>,
  args: OperatorArguments,
  sus: boolean,
  random: RandomStream
): Iterable<Individual> {
  const pool = [...source];
  return wheel(pool, fitnessWeights(pool), wheelOptions(args, sus, pool.length), random);
}

function rankProportional(
  source: Iterable<Individual>,
  args: OperatorArguments,
  sus: boolean,
  random: RandomStream
): Iterable<Individual> {
  const pool = [...source];
  const weights = rankWeights(pool, numberArg(args, 'expectation', 1.1), booleanArg(args, 'invert'));
  return wheel(pool, weights, wheelOptions(args, sus, pool.length), random);
}

const RANK_PARAMETERS: { readonly [name: string]: ParameterSpec } = {
  expectation: {
    type: 'number',
    default: 1.1,
    description: 'Expected selections of the fittest member per turn, within [1, 2].',
  },
  invert: { type: 'boolean', default: false, description: 'Favour the least fit instead.' },
};

const boundedWheel = (args: OperatorArguments): boolean =>
  withoutReplacement(args) && !booleanArg(args, 'sus');

function phenotypeKey(individual: Individual): string {
  const phenotype = individual.phenotype;
  return typeof phenotype === 'string' ? phenotype : JSON.stringify(phenotype);
}

export const selection = {
  /** Every individual, in source order. */
  SELECT_ALL: {
    name: 'select_all',
    kind: 'selector',
    output: 'preserving',
    bounded: 'preserving',
    parameters: {},
    apply(source) {
      return source;
    },
  },

  /** The source in order, restarting from the top when the end is reached. */
  REPEAT: {
    name: 'repeat',
    kind: 'selector',
    output: 'stream',
    bounded: false,
    materializes: true,
    parameters: {},
    apply(source) {
      const pool = [...source];
      return (function* () {
        while (pool.length) yield* pool;
      })();
    },
  },

  /** Fittest first. */
  BEST: {
    name: 'best',
    kind: 'selector',
    output: 'stream',
    bounded: notOnly,
    materializes: true,
    parameters: { only: ONLY },
    apply(source, args) {
      return ordered(source, booleanArg(args, 'only'), compareFitness);
    },
  },

  /** Least fit first. */
  WORST: {
    name: 'worst',
    kind: 'selector',
    output: 'stream',
    bounded: notOnly,
    materializes: true,
    parameters: { only: ONLY },
    apply(source, args) {
      return ordered(source, booleanArg(args, 'only'), (a, b) => compareFitness(b, a));
    },
  },

  /** Latest birthday first. */
  YOUNGEST: {
    name: 'youngest',
    kind: 'selector',
    output: 'stream',
    bounded: notOnly,
    materializes: true,
    parameters: { only: ONLY },
    apply(source, args) {
      return ordered(source, booleanArg(args, 'only'), byBirthday);
    },
  },

  /** Earliest birthday first. */
  OLDEST: {
    name: 'oldest',
    kind: 'selector',
    output: 'stream',
    bounded: notOnly,
    materializes: true,
    parameters: { only: ONLY },
    apply(source, args) {
      return ordered(source, booleanArg(args, 'only'), (a, b) => byBirthday(b, a));
    },
  },

  /**
   * Tournament selection: `k` individuals are drawn at random and the fittest is
   * returned with probability `greediness`.
   */
  TOURNAMENT: {
    name: 'tournament',
    kind: 'selector',
    output: 'stream',
    bounded: withoutReplacement,
    materializes: true,
    parameters: {
      k: { type: 'integer', default: 2, description: 'Competitors per tournament (>= 2).' },
      replacement: REPLACEMENT,
      greediness: { type: 'number', default: 1 },
    },
    check(args) {
      const k = numberArg(args, 'k');
      if (k < 2) throw new RangeError(`k must be at least 2, got ${k}`);
    },
    apply(source, args, context) {
      return tournament(source, args, numberArg(args, 'k', 2), context.random);
    },
  },

  /** Tournament with two competitors. */
  BINARY_TOURNAMENT: {
    name: 'binary_tournament',
    kind: 'selector',
    output: 'stream',
    bounded: withoutReplacement,
    materializes: true,
    parameters: {
      replacement: REPLACEMENT,
      greediness: { type: 'number', default: 1 },
    },
    apply(source, args, context) {
      return tournament(source, args, 2, context.random);
    },
  },

  /** Uniform random choice, ignoring fitness. */
  UNIFORM_RANDOM: {
    name: 'uniform_random',
    kind: 'selector',
    output: 'stream',
    bounded: withoutReplacement,
    materializes: true,
    parameters: { replacement: REPLACEMENT },
    apply(source, args, context) {
      const pool = [...source];
      const { random } = context;
      if (!booleanArg(args, 'replacement')) {
        return drain(pool, (remaining) => random.nextInt(remaining.length));
      }
      return (function* () {
        while (pool.length) yield random.pick(pool);
      })();
    },
  },

  /** Every individual exactly once, in random order. */
  UNIFORM_SHUFFLE: {
    name: 'uniform_shuffle',
    kind: 'selector',
    output: 'stream',
    bounded: true,
    materializes: true,
    parameters: {},
    apply(source, _args, context) {
      return context.random.shuffle([...source]);
    },
  },

  /**
   * Roulette-wheel selection: probability proportional to fitness, shifted so the
   * least fit individual has weight zero. Direction follows each evaluator.
   * With `sus`, stochastic universal sampling spaces `mu` pointers evenly.
   */
  FITNESS_PROPORTIONAL: {
    name: 'fitness_proportional',
    kind: 'selector',
    output: 'stream',
    bounded: boundedWheel,
    materializes: true,
    parameters: {
      replacement: REPLACEMENT,
      sus: { type: 'boolean', default: false },
      mu: MU,
    },
    check: checkMu,
    apply(source, args, context) {
      return fitnessProportional(source, args, booleanArg(args, 'sus'), context.random);
    },
  },

  /** Fitness-proportional selection by stochastic universal sampling. */
  FITNESS_SUS: {
    name: 'fitness_sus',
    kind: 'selector',
    output: 'stream',
    bounded: false,
    materializes: true,
    parameters: { mu: MU },
    check: checkMu,
    apply(source, args, context) {
      return fitnessProportional(source, { ...args, replacement: true }, true, context.random);
    },
  },

  /**
   * Linear rank selection: weights fall evenly from `expectation` for the
   * fittest to `2 - expectation` for the least fit.
   */
  RANK_PROPORTIONAL: {
    name: 'rank_proportional',
    kind: 'selector',
    output: 'stream',
    bounded: boundedWheel,
    materializes: true,
    parameters: {
      replacement: REPLACEMENT,
      ...RANK_PARAMETERS,
      sus: { type: 'boolean', default: false },
      mu: MU,
    },
    check(args) {
      checkExpectation(args);
      checkMu(args);
    },
    apply(source, args, context) {
      return rankProportional(source, args, booleanArg(args, 'sus'), context.random);
    },
  },

  /** Rank selection by stochastic universal sampling. */
  RANK_SUS: {
    name: 'rank_sus',
    kind: 'selector',
    output: 'stream',
    bounded: false,
    materializes: true,
    parameters: { ...RANK_PARAMETERS, mu: MU },
    check(args) {
      checkExpectation(args);
      checkMu(args);
    },
    apply(source, args, context) {
      return rankProportional(source, { ...args, replacement: true }, true, context.random);
    },
  },

  /** First individual of each distinct phenotype. */
  UNIQUE: {
    name: 'unique',
    kind: 'selector',
    output: 'stream',
    bounded: 'preserving',
    parameters: {},
    *apply(source) {
      const seen = new Set<string>();
      for (const individual of source) {
        const key = phenotypeKey(individual);
        if (seen.has(key)) continue;
        seen.add(key);
        yield individual;
      }
    },
  },

  /** Individuals whose genome and evaluator both accept them. */
  LEGAL: {
    name: 'legal',
    kind: 'selector',
    output: 'stream',
    bounded: 'preserving',
    parameters: {},
    *apply(source) {
      for (const individual of source) if (individual.legal) yield individual;
    },
  },

  /** Individuals rejected by their genome bounds or their evaluator. */
  ILLEGAL: {
    name: 'illegal',
    kind: 'selector',
    output: 'stream',
    bounded: 'preserving',
    parameters: {},
    *apply(source) {
      for (const individual of source) if (!individual.legal) yield individual;
    },
  },
} satisfies { [key: string]: OperatorDescriptor };
