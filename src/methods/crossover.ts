import type { RandomStream } from '../random/random.stream';
import { withGenes } from '../species/species.genome';
import type { Individual } from '../species/species.individual';
import {
  numberArg,
  OperatorArguments,
  OperatorDescriptor,
  optionalNumberArg,
} from './methods.types';

/**
 * Recombination operators.
 *
 * Individuals are taken from the source two at a time and either recombined into
 * two offspring or passed through unchanged. A trailing unpaired individual is
 * dropped, so an odd-sized input yields one individual fewer.
 *
 * @see {@link https://en.wikipedia.org/wiki/Crossover_(genetic_algorithm)}
 */

/** `per_pair_rate` wins over its synonym `per_indiv_rate`. */
function pairRate(args: OperatorArguments): number {
  return optionalNumberArg(args, 'per_pair_rate') ?? numberArg(args, 'per_indiv_rate', 1);
}

function* pairs(
  operator: string,
  source: Iterable<Individual>,
  rate: number,
  random: RandomStream,
  recombine: (a: Individual, b: Individual) => [Individual, Individual]
): Generator<Individual> {
  let first: Individual | undefined;
  for (const individual of source) {
    if (individual.genome.kind === 'joined') {
      throw new TypeError(`${operator} cannot recombine joined individuals; use crossover_tuple`);
    }
    if (!first) {
      first = individual;
      continue;
    }
    const second = individual;
    if (rate >= 1 || (rate > 0 && random.chance(rate))) {
      yield* recombine(first, second);
    } else {
      yield first;
      yield second;
    }
    first = undefined;
  }
}

/** Unevaluated child of `parent` carrying `genes`. Joined parents never reach here. */
export function offspring(parent: Individual, genes: readonly number[]): Individual {
  const { genome } = parent;
  if (genome.kind === 'joined') throw new TypeError('Joined individuals have no genes to recombine');
  const child = parent.spawn(withGenes(genome, genes));
  child.tally('recombined');
  return child;
}

const RATE_PARAMETERS = {
  per_pair_rate: { type: 'number', description: 'Probability that a pair is recombined.' },
  per_indiv_rate: { type: 'number', default: 1, description: 'Synonym for per_pair_rate.' },
} as const;

export const crossover = {
  /**
   * Single-point crossover at a cut common to both parents; the genes right of
   * the cut are exchanged. Parents shorter than two genes pass through.
   */
  CROSSOVER_ONE: {
    name: 'crossover_one',
    kind: 'variation',
    output: 'preserving',
    bounded: 'preserving',
    parameters: { ...RATE_PARAMETERS },
    apply(source, args, context) {
      const { random } = context;
      return pairs('crossover_one', source, pairRate(args), random, (a, b) => {
        const genesA = a.genome.genes;
        const genesB = b.genome.genes;
        const shortest = Math.min(genesA.length, genesB.length);
        if (shortest <= 1) return [a, b];
        const cut = 1 + random.nextInt(shortest - 1);
        return [
          offspring(a, [...genesA.slice(0, cut), ...genesB.slice(cut)]),
          offspring(b, [...genesB.slice(0, cut), ...genesA.slice(cut)]),
        ];
      });
    },
  },

  /** Uniform crossover: each aligned gene pair is swapped with `per_gene_rate`. */
  CROSSOVER_UNIFORM: {
    name: 'crossover_uniform',
    kind: 'variation',
    output: 'preserving',
    bounded: 'preserving',
    parameters: {
      ...RATE_PARAMETERS,
      per_gene_rate: { type: 'number', default: 0.5 },
    },
    apply(source, args, context) {
      const { random } = context;
      const geneRate = numberArg(args, 'per_gene_rate', 0.5);
      return pairs('crossover_uniform', source, pairRate(args), random, (a, b) => {
        const genesA = [...a.genome.genes];
        const genesB = [...b.genome.genes];
        const shortest = Math.min(genesA.length, genesB.length);
        for (let i = 0; i < shortest; i++) {
          if (random.chance(geneRate)) [genesA[i], genesB[i]] = [genesB[i], genesA[i]];
        }
        return [offspring(a, genesA), offspring(b, genesB)];
      });
    },
  },

  /**
   * Single-point crossover with a separate cut in each parent, so offspring
   * lengths may differ from their parents'. With `longest_result` the cuts are
   * chosen so that neither child is longer; when no such cuts exist the pair
   * passes through and an `aborted` notification is sent.
   */
  CROSSOVER_ONE_DIFFERENT: {
    name: 'crossover_one_different',
    kind: 'variation',
    output: 'preserving',
    bounded: 'preserving',
    parameters: {
      ...RATE_PARAMETERS,
      longest_result: { type: 'integer', description: 'Upper bound on offspring length.' },
    },
    apply(source, args, context) {
      const { random } = context;
      const longest = optionalNumberArg(args, 'longest_result');
      return pairs('crossover_one_different', source, pairRate(args), random, (a, b) => {
        const genesA = a.genome.genes;
        const genesB = b.genome.genes;
        if (genesA.length <= 1 && genesB.length <= 1) return [a, b];
        const cutA = genesA.length > 1 ? 1 + random.nextInt(genesA.length - 1) : 1;
        let cutB: number;
        if (longest === undefined) {
          cutB = genesB.length > 1 ? 1 + random.nextInt(genesB.length - 1) : 1;
        } else {
          // child A has cutA + (lenB - cutB) genes, child B cutB + (lenA - cutA)
          const low = Math.max(cutA + genesB.length - longest, 0) + 1;
          const high = Math.min(cutA - genesA.length + longest, genesB.length);
          if (low >= high) {
            context.notify('crossover_one_different', 'aborted', {
              lengths: [genesA.length, genesB.length],
              longest,
            });
            return [a, b];
          }
          cutB = low + random.nextInt(high - low);
        }
        return [
          offspring(a, [...genesA.slice(0, cutA), ...genesB.slice(cutB)]),
          offspring(b, [...genesB.slice(0, cutB), ...genesA.slice(cutA)]),
        ];
      });
    },
  },
} satisfies { [key: string]: OperatorDescriptor };
