import { fittest } from '../species/species.fitness';
import { joinedGenome } from '../species/species.genome';
import { Individual } from '../species/species.individual';
import { offspring } from './crossover';
import {
  booleanArg,
  JoinerDescriptor,
  JoinGroup,
  numberArg,
  OperatorContext,
  OperatorDescriptor,
} from './methods.types';

/**
 * `JOIN` support: joiners that build tuples of individuals from several
 * populations, and the operators that take those tuples apart again.
 *
 * A joined individual shares its members with the populations they came from;
 * nothing is copied until the interpreter stores a member somewhere else.
 *
 * @example
 * ```text
 * JOIN parents, parents INTO pairs USING random_tuples(distinct)
 * FROM pairs SELECT offspring USING crossover_tuple
 * ```
 */

function joined(members: Individual[], names: readonly string[], context: OperatorContext): Individual {
  return new Individual(joinedGenome(members, names), context.evaluation);
}

/** Every way of taking one member per group, first group outermost. */
function* combinations(groups: readonly JoinGroup[], prefix: Individual[] = []): Generator<Individual[]> {
  if (prefix.length === groups.length) {
    yield prefix;
    return;
  }
  for (const member of groups[prefix.length].members) {
    yield* combinations(groups, [...prefix, member]);
  }
}

const namesOf = (groups: readonly JoinGroup[]): string[] => groups.map((group) => group.name);

function* randomTuples(
  groups: readonly JoinGroup[],
  distinct: boolean,
  context: OperatorContext
): Generator<Individual> {
  const [first, ...others] = groups;
  if (!first) return;
  for (const other of others) {
    if (!other.members.length) throw new RangeError(`Cannot join the empty population '${other.name}'`);
  }
  const { random } = context;
  const names = namesOf(groups);
  for (const individual of first.members) {
    const tuple = [individual];
    for (const { members } of others) {
      let chosen = random.pick(members);
      if (distinct) {
        let attempts = members.length;
        while (tuple.includes(chosen) && attempts > 0) {
          chosen = random.pick(members);
          attempts--;
        }
        if (tuple.includes(chosen)) chosen = members.find((member) => !tuple.includes(member)) ?? chosen;
      }
      tuple.push(chosen);
    }
    yield joined(tuple, names, context);
  }
}

/** Members of a joined individual; anything else is a usage error. */
function membersOf(operator: string, individual: Individual): readonly Individual[] {
  const { genome } = individual;
  if (genome.kind !== 'joined') {
    throw new TypeError(`${operator} needs joined individuals, got a ${genome.kind} genome`);
  }
  return genome.members;
}

export const joiners = {
  /** Every combination of one member per population (the default joiner). */
  FULL_COMBINE: {
    name: 'full_combine',
    kind: 'joiner',
    output: 'exact',
    bounded: true,
    parameters: {},
    *join(groups, _args, context) {
      const names = namesOf(groups);
      for (const members of combinations(groups)) yield joined(members, names, context);
    },
  },

  /** Members matched by position; stops with the shortest population. */
  TUPLES: {
    name: 'tuples',
    kind: 'joiner',
    output: 'exact',
    bounded: true,
    parameters: {},
    *join(groups, _args, context) {
      if (!groups.length) return;
      const names = namesOf(groups);
      const length = Math.min(...groups.map((group) => group.members.length));
      for (let i = 0; i < length; i++) {
        yield joined(
          groups.map((group) => group.members[i]),
          names,
          context
        );
      }
    },
  },

  /**
   * Each member of the first population with random members of the others.
   * `distinct` retries to avoid repeating an individual within a tuple.
   */
  RANDOM_TUPLES: {
    name: 'random_tuples',
    kind: 'joiner',
    output: 'exact',
    bounded: true,
    parameters: { distinct: { type: 'boolean', default: false } },
    join(groups, args, context) {
      return randomTuples(groups, booleanArg(args, 'distinct'), context);
    },
  },

  /** `random_tuples(distinct)`. */
  DISTINCT_RANDOM_TUPLES: {
    name: 'distinct_random_tuples',
    kind: 'joiner',
    output: 'exact',
    bounded: true,
    parameters: {},
    join(groups, _args, context) {
      return randomTuples(groups, true, context);
    },
  },

  /**
   * The fittest member of population `best_from` (zero-based) with every
   * combination of the others. The fittest member comes first in each tuple.
   */
  BEST_WITH_REST: {
    name: 'best_with_rest',
    kind: 'joiner',
    output: 'exact',
    bounded: true,
    parameters: { best_from: { type: 'integer', default: 0 } },
    check(args) {
      const index = numberArg(args, 'best_from');
      if (index < 0) throw new RangeError(`best_from must not be negative, got ${index}`);
    },
    *join(groups, args, context) {
      const index = numberArg(args, 'best_from');
      if (index >= groups.length) {
        throw new RangeError(`best_from is ${index} but only ${groups.length} populations are joined`);
      }
      const best = fittest(groups[index].members);
      if (!best) return;
      const rest = groups.filter((_group, position) => position !== index);
      const names = [groups[index].name, ...namesOf(rest)];
      for (const members of combinations(rest)) yield joined([best, ...members], names, context);
    },
  },
} satisfies { [key: string]: JoinerDescriptor };

export const tuples = {
  /** Fittest member of each joined individual. */
  BEST_OF_TUPLE: {
    name: 'best_of_tuple',
    kind: 'selector',
    output: 'preserving',
    bounded: 'preserving',
    parameters: {},
    *apply(source) {
      for (const individual of source) {
        const best = fittest(membersOf('best_of_tuple', individual));
        if (best) yield best;
      }
    },
  },

  /** Member at one-based `index` of each joined individual. */
  FROM_TUPLE: {
    name: 'from_tuple',
    kind: 'selector',
    output: 'preserving',
    bounded: 'preserving',
    parameters: { index: { type: 'integer', default: 1 } },
    check(args) {
      const index = numberArg(args, 'index', 1);
      if (index < 1) throw new RangeError(`index is one-based, got ${index}`);
    },
    *apply(source, args) {
      const index = numberArg(args, 'index', 1);
      for (const individual of source) {
        const members = membersOf('from_tuple', individual);
        if (index > members.length) {
          throw new RangeError(`Joined individual has ${members.length} members, index is ${index}`);
        }
        yield members[index - 1];
      }
    },
  },

  /**
   * Per-gene recombination of the members of each joined individual. The child
   * has the first member's length; each gene comes from the first member with
   * probability `greediness`, otherwise from a random member long enough to
   * have it. Tuples that are not recombined yield their first member.
   */
  CROSSOVER_TUPLE: {
    name: 'crossover_tuple',
    kind: 'variation',
    output: 'preserving',
    bounded: 'preserving',
    parameters: {
      per_indiv_rate: { type: 'number', default: 1 },
      greediness: { type: 'number', default: 0 },
    },
    *apply(source, args, context) {
      const { random } = context;
      const rate = numberArg(args, 'per_indiv_rate', 1);
      const greediness = numberArg(args, 'greediness');
      for (const individual of source) {
        const [first, ...others] = membersOf('crossover_tuple', individual);
        if (!first) continue;
        if (rate <= 0 || greediness >= 1 || (rate < 1 && !random.chance(rate))) {
          yield first;
          continue;
        }
        const genes = first.genome.genes.map((gene, i) => {
          if (greediness > 0 && random.chance(greediness)) return gene;
          const donors = [first, ...others].filter((member) => member.genome.genes.length > i);
          return random.pick(donors).genome.genes[i];
        });
        yield offspring(first, genes);
      }
    },
  },
} satisfies { [key: string]: OperatorDescriptor };
