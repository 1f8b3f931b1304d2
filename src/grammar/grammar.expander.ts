import { config, WrapPolicy } from '../config';
import {
  GenomeExhaustedError,
  GrammarDepthError,
  GrammarRecursionLimitError,
} from '../errors';
import { BuiltinRule, GrammarTable, isBuiltinRule, START_RULE } from './grammar.table';

/**
 * Options accepted by {@link expand} and {@link derive}. Anything omitted falls back
 * to the library defaults in `config` as they are at call time.
 */
export interface ExpansionOptions {
  /** Deepest derivation level a rule may be expanded at. */
  maxDepth?: number;
  /** What to do when the genome runs out of codons. */
  wrapPolicy?: WrapPolicy;
  /** Restarts allowed under the `'wrap'` policy. */
  maxWraps?: number;
  /** Codon used for every read past the end under the `'pad'` policy. */
  padCodon?: number;
  /** Spaces emitted by `INDENT` per indent level. */
  indentWidth?: number;
  /** Rendering of the codon consumed by `TERMINAL`. */
  terminal?: (codon: number) => string;
}

export interface Derivation {
  text: string;
  codonsUsed: number;
  wraps: number;
}

type WorkItem =
  | { kind: 'literal'; text: string }
  | { kind: 'rule'; name: string; depth: number };

const defaultTerminal = (codon: number): string => `T[${codon}]`;

function assertCodon(codon: number, what: string): void {
  if (!Number.isInteger(codon) || codon < 0) {
    throw new RangeError(`${what} must be a non-negative integer, got ${codon}`);
  }
}

/** Sequential codon source that applies the wrap policy. */
class CodonReader {
  private index = 0;
  used = 0;
  wraps = 0;

  constructor(
    private readonly genes: readonly number[],
    private readonly policy: WrapPolicy,
    private readonly maxWraps: number,
    private readonly padCodon: number
  ) {}

  next(): number {
    if (this.index >= this.genes.length) {
      if (this.policy === 'pad') {
        this.used++;
        return this.padCodon;
      }
      if (this.genes.length === 0) {
        throw new GenomeExhaustedError('Genome has no codons to read', this.used);
      }
      if (this.policy === 'fail' || this.wraps >= this.maxWraps) {
        throw new GenomeExhaustedError(
          `Genome exhausted after ${this.used} codons and ${this.wraps} wraps`,
          this.used
        );
      }
      this.wraps++;
      this.index = 0;
    }
    this.used++;
    return this.genes[this.index++];
  }
}

/**
 * Map an integer genome onto text by walking the grammar depth-first,
 * left-to-right, from the start rule.
 *
 * Rules with several productions consume one codon and pick production
 * `codon % productions.length`; rules with a single production consume nothing.
 * `TERMINAL` consumes one codon and emits it through `options.terminal`.
 */
export function derive(
  grammar: GrammarTable,
  genome: readonly number[],
  options: ExpansionOptions = {}
): Derivation {
  const maxDepth = options.maxDepth ?? config.maxDerivationDepth;
  const indentWidth = options.indentWidth ?? config.indentWidth;
  const terminal = options.terminal ?? defaultTerminal;
  const padCodon = options.padCodon ?? 0;
  genome.forEach((codon, index) => assertCodon(codon, `Codon ${index}`));
  assertCodon(padCodon, 'padCodon');

  const codons = new CodonReader(
    genome,
    options.wrapPolicy ?? config.wrapPolicy,
    options.maxWraps ?? config.maxWraps,
    padCodon
  );
  const output: string[] = [];
  let indent = 0;

  const builtin = (name: BuiltinRule): void => {
    switch (name) {
      case 'TERMINAL':
        output.push(terminal(codons.next()));
        break;
      case 'INDENT':
        output.push(' '.repeat(indent * indentWidth));
        break;
      case 'INC_INDENT':
        indent++;
        break;
      case 'DEC_INDENT':
        if (indent === 0) throw new GrammarDepthError();
        indent--;
        break;
      case 'NEWLINE':
        output.push('\n');
        break;
    }
  };

  const stack: WorkItem[] = [{ kind: 'rule', name: START_RULE, depth: 0 }];
  let item = stack.pop();
  while (item) {
    if (item.kind === 'literal') {
      output.push(item.text);
    } else if (isBuiltinRule(item.name)) {
      builtin(item.name);
    } else {
      const productions = grammar.productions(item.name) ?? [];
      const chosen =
        productions.length > 1
          ? productions[codons.next() % productions.length]
          : productions[0] ?? [];
      const depth = item.depth + 1;
      // pushed in reverse so the leftmost child is expanded first
      for (let i = chosen.length - 1; i >= 0; i--) {
        const token = chosen[i];
        if (token.kind === 'literal') {
          stack.push({ kind: 'literal', text: token.text });
        } else {
          if (depth > maxDepth) throw new GrammarRecursionLimitError(token.name, maxDepth);
          stack.push({ kind: 'rule', name: token.name, depth });
        }
      }
    }
    item = stack.pop();
  }

  return { text: output.join(''), codonsUsed: codons.used, wraps: codons.wraps };
}

/**
 * Expand `genome` to program text.
 *
 * @example
 * ```ts
 * const table = new GrammarTable({ '*': ['"A" X'], X: ['"1"', '"2"', '"3"'] });
 * expand(table, [4]); // 'A2'
 * ```
 */
export function expand(
  grammar: GrammarTable,
  genome: readonly number[],
  options?: ExpansionOptions
): string {
  return derive(grammar, genome, options).text;
}
