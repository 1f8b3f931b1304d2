import { EvolutionError } from '../errors';
import type { RandomStream } from '../random/random.stream';
import { formatGenome, genesInRange, Genome, phenotypeOf } from './species.genome';

/**
 * Fitness landscape contract. `evaluate` receives the landscape random stream so
 * noisy landscapes stay reproducible under a fixed seed.
 */
export interface Evaluator {
  evaluate(individual: Individual, random: RandomStream): number;
  /** Larger fitness is better unless this is `false`. Default: true */
  maximise?: boolean;
  /** Extra legality rule on top of the genome's own range check. */
  legal?(individual: Individual): boolean;
}

/** Evaluator plus the random stream it runs with. */
export interface EvaluationBinding {
  readonly evaluator: Evaluator;
  readonly random: RandomStream;
}

/**
 * One member of a population: an immutable genome plus lazily computed fitness.
 *
 * Fitness is evaluated on first read and cached until {@link invalidate} or
 * {@link bind} is called; a failing evaluation caches nothing.
 */
export class Individual {
  readonly genome: Genome;
  /** Run-local creation order, assigned when the individual is first stored. */
  birthday: number | undefined;
  /** Free-form counters maintained by operators (e.g. `mutated`). */
  readonly statistic: { [key: string]: number };

  private binding: EvaluationBinding | undefined;
  private cached: number | undefined;

  constructor(genome: Genome, binding?: EvaluationBinding) {
    this.genome = genome;
    this.binding = binding;
    this.statistic = {};
  }

  get evaluated(): boolean {
    return this.cached !== undefined;
  }

  get maximise(): boolean {
    return this.binding?.evaluator.maximise ?? true;
  }

  get evaluator(): Evaluator | undefined {
    return this.binding?.evaluator;
  }

  get fitness(): number {
    if (this.cached === undefined) {
      if (!this.binding) {
        throw new EvolutionError(
          'EvaluatorMissing',
          `Individual ${formatGenome(this.genome)} has no evaluator`
        );
      }
      this.cached = this.binding.evaluator.evaluate(this, this.binding.random);
    }
    return this.cached;
  }

  /** Genes within range and accepted by the evaluator, when it has an opinion. */
  get legal(): boolean {
    if (!genesInRange(this.genome)) return false;
    return this.binding?.evaluator.legal?.(this) ?? true;
  }

  get phenotype(): string | readonly number[] {
    return phenotypeOf(this.genome);
  }

  /** Attach a new evaluator; any cached fitness is discarded. */
  bind(binding: EvaluationBinding): void {
    this.binding = binding;
    this.cached = undefined;
  }

  invalidate(): void {
    this.cached = undefined;
  }

  tally(key: string, amount = 1): void {
    this.statistic[key] = (this.statistic[key] ?? 0) + amount;
  }

  /** Copy sharing the genome and evaluator; keeps cached fitness and birthday. */
  clone(): Individual {
    const copy = new Individual(this.genome, this.binding);
    copy.cached = this.cached;
    copy.birthday = this.birthday;
    Object.assign(copy.statistic, this.statistic);
    return copy;
  }

  /** Offspring with a new genome and the same evaluator, not yet evaluated. */
  spawn(genome: Genome): Individual {
    return new Individual(genome, this.binding);
  }

  toString(): string {
    const fitness = this.cached === undefined ? '?' : String(this.cached);
    return `${formatGenome(this.genome)} (fitness ${fitness})`;
  }
}
