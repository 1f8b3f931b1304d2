import { ExpansionOptions, expand } from '../grammar/grammar.expander';
import type { GrammarTable } from '../grammar/grammar.table';
import type { Individual } from './species.individual';

/**
 * Genome representations understood by the built-in operators.
 *
 * Genes are never mutated in place: variation operators build a new genome and a
 * new individual, so a genome can be shared freely between clones.
 *
 * - `binary`  – genes are 0 / 1
 * - `integer` – genes in the inclusive range [lowest, highest]
 * - `real`    – genes in the half-open range [lowest, highest)
 * - `ge`      – integer codons in [lowest, highest] mapped through a grammar
 * - `joined`  – a tuple of existing individuals built by `JOIN`; it has no genes
 */
export interface BinaryGenome {
  readonly kind: 'binary';
  readonly genes: readonly number[];
}

export interface IntegerGenome {
  readonly kind: 'integer';
  readonly genes: readonly number[];
  readonly lowest: number;
  readonly highest: number;
}

export interface RealGenome {
  readonly kind: 'real';
  readonly genes: readonly number[];
  readonly lowest: number;
  readonly highest: number;
}

export interface GrammarGenome {
  readonly kind: 'ge';
  readonly genes: readonly number[];
  readonly lowest: number;
  readonly highest: number;
  readonly grammar: GrammarTable;
  readonly expansion?: ExpansionOptions;
}

export interface JoinedGenome {
  readonly kind: 'joined';
  /** Always empty. */
  readonly genes: readonly number[];
  readonly members: readonly Individual[];
  /** Population each member was drawn from, by position. */
  readonly sources: readonly string[];
}

/** Genomes that carry genes of their own. */
export type GeneGenome = BinaryGenome | IntegerGenome | RealGenome | GrammarGenome;

export type Genome = GeneGenome | JoinedGenome;

export type GenomeKind = Genome['kind'];

export function joinedGenome(members: readonly Individual[], sources: readonly string[]): JoinedGenome {
  return { kind: 'joined', genes: [], members, sources };
}

/** Same genome shape and bounds with different genes. */
export function withGenes<G extends GeneGenome>(genome: G, genes: readonly number[]): G {
  return { ...genome, genes };
}

/** Clamp a gene into the genome's legal range. */
export function clampGene(genome: GeneGenome, value: number): number {
  if (genome.kind === 'binary') return value ? 1 : 0;
  if (genome.kind === 'real') {
    return Math.min(Math.max(value, genome.lowest), genome.highest);
  }
  return Math.min(Math.max(Math.round(value), genome.lowest), genome.highest);
}

/**
 * What an evaluator usually looks at: expanded program text for GE genomes, the
 * genes for everything else. Expansion faults propagate to the caller.
 */
export function phenotypeOf(genome: Genome): string | readonly number[] {
  if (genome.kind === 'ge') return expand(genome.grammar, genome.genes, genome.expansion);
  if (genome.kind === 'joined') return formatGenome(genome);
  return genome.genes;
}

/** Whether every gene lies within the genome's range. Joined genomes ask their members. */
export function genesInRange(genome: Genome): boolean {
  switch (genome.kind) {
    case 'joined':
      return genome.members.every((member) => genesInRange(member.genome));
    case 'binary':
      return genome.genes.every((gene) => gene === 0 || gene === 1);
    case 'real':
      return genome.genes.every((gene) => gene >= genome.lowest && gene < genome.highest);
    default:
      return genome.genes.every(
        (gene) => Number.isInteger(gene) && gene >= genome.lowest && gene <= genome.highest
      );
  }
}

export function formatGenome(genome: Genome): string {
  if (genome.kind === 'binary') return genome.genes.join('');
  if (genome.kind === 'joined') {
    return `{${genome.members.map((member) => formatGenome(member.genome)).join(', ')}}`;
  }
  return `[${genome.genes.join(', ')}]`;
}
