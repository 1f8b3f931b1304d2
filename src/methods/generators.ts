import { config } from '../config';
import type { ExpansionOptions } from '../grammar/grammar.expander';
import type { RandomStream } from '../random/random.stream';
import type { Genome } from '../species/species.genome';
import { Individual } from '../species/species.individual';
import {
  numberArg,
  OperatorArguments,
  OperatorContext,
  OperatorDescriptor,
  optionalNumberArg,
  ParameterSpec,
} from './methods.types';

/**
 * Population initialisers. Each generator produces an endless stream of new,
 * unevaluated individuals; the statement that uses it decides how many are kept.
 *
 * Genome length is `length` when given, otherwise drawn uniformly from
 * [shortest, longest] for every individual.
 */

const LENGTH_PARAMETERS: { readonly [name: string]: ParameterSpec } = {
  length: { type: 'integer', description: 'Exact genome length; overrides shortest/longest.' },
  shortest: { type: 'integer', default: 10 },
  longest: { type: 'integer', default: 10 },
};

function checkLength(args: OperatorArguments): void {
  const length = optionalNumberArg(args, 'length');
  if (length !== undefined && length < 0) {
    throw new RangeError(`length must not be negative, got ${length}`);
  }
  const shortest = numberArg(args, 'shortest');
  const longest = numberArg(args, 'longest');
  if (length === undefined && (shortest < 0 || longest < shortest)) {
    throw new RangeError(`Invalid length range [${shortest}, ${longest}]`);
  }
}

function checkBounds(args: OperatorArguments): void {
  const lowest = numberArg(args, 'lowest');
  const highest = numberArg(args, 'highest');
  if (highest < lowest) {
    throw new RangeError(`highest (${highest}) must not be below lowest (${lowest})`);
  }
}

function sampleLength(args: OperatorArguments, random: RandomStream): number {
  const length = optionalNumberArg(args, 'length');
  if (length !== undefined) return length;
  const shortest = numberArg(args, 'shortest');
  return shortest + random.nextInt(numberArg(args, 'longest') - shortest + 1);
}

function* endless(
  context: OperatorContext,
  create: (random: RandomStream) => Genome
): Generator<Individual> {
  for (;;) yield new Individual(create(context.random), context.evaluation);
}

function randomInteger(random: RandomStream, lowest: number, highest: number): number {
  return lowest + random.nextInt(highest - lowest + 1);
}

export const generators = {
  /** Uniform random bit strings. */
  RANDOM_BINARY: {
    name: 'random_binary',
    kind: 'generator',
    output: 'stream',
    bounded: false,
    parameters: { ...LENGTH_PARAMETERS },
    check: checkLength,
    apply(_source, args, context) {
      return endless(context, (random) => ({
        kind: 'binary',
        genes: Array.from({ length: sampleLength(args, random) }, () =>
          random.chance(0.5) ? 1 : 0
        ),
      }));
    },
  },

  /** Integer genes drawn uniformly from [lowest, highest]. */
  RANDOM_INT: {
    name: 'random_int',
    kind: 'generator',
    output: 'stream',
    bounded: false,
    parameters: {
      ...LENGTH_PARAMETERS,
      lowest: { type: 'integer', default: 0 },
      highest: { type: 'integer', default: 255 },
    },
    check(args) {
      checkLength(args);
      checkBounds(args);
    },
    apply(_source, args, context) {
      const lowest = numberArg(args, 'lowest');
      const highest = numberArg(args, 'highest');
      return endless(context, (random) => ({
        kind: 'integer',
        lowest,
        highest,
        genes: Array.from({ length: sampleLength(args, random) }, () =>
          randomInteger(random, lowest, highest)
        ),
      }));
    },
  },

  /** Real genes drawn uniformly from [lowest, highest). */
  RANDOM_REAL: {
    name: 'random_real',
    kind: 'generator',
    output: 'stream',
    bounded: false,
    parameters: {
      ...LENGTH_PARAMETERS,
      lowest: { type: 'number', default: 0 },
      highest: { type: 'number', default: 1 },
    },
    check(args) {
      checkLength(args);
      checkBounds(args);
    },
    apply(_source, args, context) {
      const lowest = numberArg(args, 'lowest');
      const highest = numberArg(args, 'highest');
      return endless(context, (random) => ({
        kind: 'real',
        lowest,
        highest,
        genes: Array.from({ length: sampleLength(args, random) }, () =>
          random.nextRange(lowest, highest)
        ),
      }));
    },
  },

  /**
   * Grammatical Evolution genomes: integer codons whose phenotype is the text the
   * grammar expands them to. `wrap_count` caps genome reuse during expansion.
   * The library's expansion defaults are fixed into each genome when the
   * generator starts, so later changes to `config` do not alter its phenotypes.
   */
  RANDOM_GE: {
    name: 'random_ge',
    kind: 'generator',
    output: 'stream',
    bounded: false,
    parameters: {
      grammar: { type: 'mapping', required: true },
      ...LENGTH_PARAMETERS,
      shortest: { type: 'integer', default: 20 },
      longest: { type: 'integer', default: 20 },
      lowest: { type: 'integer', default: 0 },
      highest: { type: 'integer', default: 255 },
      wrap_count: { type: 'integer' },
    },
    check(args, context) {
      checkLength(args);
      checkBounds(args);
      context.grammar(args.grammar);
    },
    apply(_source, args, context) {
      const grammar = context.grammar(args.grammar);
      const lowest = numberArg(args, 'lowest');
      const highest = numberArg(args, 'highest');
      const wrapCount = optionalNumberArg(args, 'wrap_count');
      const expansion: ExpansionOptions = {
        maxDepth: config.maxDerivationDepth,
        indentWidth: config.indentWidth,
        wrapPolicy: config.wrapPolicy,
        maxWraps: wrapCount ?? config.maxWraps,
      };
      return endless(context, (random) => ({
        kind: 'ge',
        grammar,
        expansion,
        lowest,
        highest,
        genes: Array.from({ length: sampleLength(args, random) }, () =>
          randomInteger(random, lowest, highest)
        ),
      }));
    },
  },
} satisfies { [key: string]: OperatorDescriptor };
