import type { RandomStream } from '../random/random.stream';
import { clampGene, GeneGenome, Genome, withGenes } from '../species/species.genome';
import type { Individual } from '../species/species.individual';
import {
  numberArg,
  OperatorArguments,
  OperatorDescriptor,
  optionalNumberArg,
  ParameterSpec,
} from './methods.types';

/**
 * Mutation operators.
 *
 * Each individual is mutated with probability `per_indiv_rate`; within a mutated
 * individual each gene changes with probability `per_gene_rate`, or exactly
 * `genes` randomly chosen positions change when that is given. Unselected
 * individuals pass through untouched, mutated ones are new unevaluated offspring.
 *
 * @see {@link https://en.wikipedia.org/wiki/Mutation_(genetic_algorithm)}
 */

const RATE_PARAMETERS: { readonly [name: string]: ParameterSpec } = {
  per_indiv_rate: { type: 'number', default: 1 },
  per_gene_rate: { type: 'number', default: 0.1 },
  genes: { type: 'integer', description: 'Exact number of genes to change.' },
};

type GeneKind = GeneGenome['kind'];

function requireKind(operator: string, genome: Genome, kinds: readonly GeneKind[]): GeneGenome {
  if (genome.kind === 'joined' || !kinds.includes(genome.kind)) {
    throw new TypeError(
      `${operator} cannot mutate ${genome.kind} genomes (supports ${kinds.join(', ')})`
    );
  }
  return genome;
}

/** Positions to change in a genome of `length` genes. */
function positions(length: number, args: OperatorArguments, random: RandomStream): number[] {
  const exact = optionalNumberArg(args, 'genes');
  const indices = Array.from({ length }, (_, i) => i);
  if (exact !== undefined && exact > 0) return random.shuffle(indices).slice(0, exact);
  const rate = numberArg(args, 'per_gene_rate', 0.1);
  if (rate >= 1) return indices;
  return indices.filter(() => random.chance(rate));
}

function* mutateEach(
  operator: string,
  kinds: readonly GeneKind[],
  source: Iterable<Individual>,
  args: OperatorArguments,
  random: RandomStream,
  change: (genome: GeneGenome, gene: number) => number
): Generator<Individual> {
  const indivRate = numberArg(args, 'per_indiv_rate', 1);
  for (const individual of source) {
    const genome = requireKind(operator, individual.genome, kinds);
    if (indivRate < 1 && !random.chance(indivRate)) {
      yield individual;
      continue;
    }
    const genes = [...genome.genes];
    for (const i of positions(genes.length, args, random)) genes[i] = change(genome, genes[i]);
    const child = individual.spawn(withGenes(genome, genes));
    child.tally('mutated');
    yield child;
  }
}

function randomGene(genome: GeneGenome, random: RandomStream): number {
  switch (genome.kind) {
    case 'binary':
      return random.chance(0.5) ? 1 : 0;
    case 'real':
      return random.nextRange(genome.lowest, genome.highest);
    default:
      return genome.lowest + random.nextInt(genome.highest - genome.lowest + 1);
  }
}

export const mutation = {
  /** Replace genes with fresh uniform values within the genome's bounds. */
  MUTATE_RANDOM: {
    name: 'mutate_random',
    kind: 'variation',
    output: 'preserving',
    bounded: 'preserving',
    parameters: { ...RATE_PARAMETERS },
    apply(source, args, context) {
      const { random } = context;
      return mutateEach(
        'mutate_random',
        ['binary', 'integer', 'real', 'ge'],
        source,
        args,
        random,
        (genome) => randomGene(genome, random)
      );
    },
  },

  /** Invert bits of binary genomes. */
  MUTATE_BITFLIP: {
    name: 'mutate_bitflip',
    kind: 'variation',
    output: 'preserving',
    bounded: 'preserving',
    parameters: { ...RATE_PARAMETERS },
    apply(source, args, context) {
      return mutateEach('mutate_bitflip', ['binary'], source, args, context.random, (_genome, gene) =>
        gene ? 0 : 1
      );
    },
  },

  /**
   * Add normally distributed noise with standard deviation `step_size` (`sigma` is
   * a synonym), clamped to the genome's bounds; integer genes are rounded.
   */
  MUTATE_GAUSSIAN: {
    name: 'mutate_gaussian',
    kind: 'variation',
    output: 'preserving',
    bounded: 'preserving',
    parameters: {
      ...RATE_PARAMETERS,
      step_size: { type: 'number', default: 0.1 },
      sigma: { type: 'number' },
    },
    apply(source, args, context) {
      const { random } = context;
      const sd = optionalNumberArg(args, 'sigma') ?? numberArg(args, 'step_size', 0.1);
      return mutateEach(
        'mutate_gaussian',
        ['real', 'integer', 'ge'],
        source,
        args,
        random,
        (genome, gene) => clampGene(genome, gene + random.gaussian(0, sd))
      );
    },
  },

  /**
   * Move genes by exactly `step_size`, upwards with probability `positive_rate`
   * and downwards otherwise, clamped to the genome's bounds. Integer genomes
   * truncate the step; it defaults to 1 for them and 0.1 for real genomes.
   */
  MUTATE_DELTA: {
    name: 'mutate_delta',
    kind: 'variation',
    output: 'preserving',
    bounded: 'preserving',
    parameters: {
      ...RATE_PARAMETERS,
      step_size: { type: 'number' },
      positive_rate: { type: 'number', default: 0.5 },
    },
    check(args) {
      const rate = numberArg(args, 'positive_rate', 0.5);
      if (rate < 0 || rate > 1) throw new RangeError(`positive_rate must be within [0, 1], got ${rate}`);
    },
    apply(source, args, context) {
      const { random } = context;
      const stepSize = optionalNumberArg(args, 'step_size');
      const positiveRate = numberArg(args, 'positive_rate', 0.5);
      return mutateEach('mutate_delta', ['real', 'integer', 'ge'], source, args, random, (genome, gene) => {
        const step = genome.kind === 'real' ? (stepSize ?? 0.1) : Math.trunc(stepSize ?? 1);
        return clampGene(genome, random.chance(positiveRate) ? gene + step : gene - step);
      });
    },
  },
} satisfies { [key: string]: OperatorDescriptor };
