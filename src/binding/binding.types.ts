import type { SourceLocation } from '../errors';
import type { Expression, PopulationReference, Program } from '../language/language.ast';
import type {
  JoinerDescriptor,
  OperatorDescriptor,
  RegisteredOperator,
} from '../methods/methods.types';
import type { Evaluator } from '../species/species.individual';

/**
 * Output of the binder: the program's statements with every operator resolved
 * to its descriptor and every chain classified. Expressions stay unevaluated so
 * a new configuration snapshot is honoured at the next step.
 */

export interface BoundCall<D extends RegisteredOperator = OperatorDescriptor> {
  name: string;
  descriptor: D;
  /** Explicit statement arguments, by parameter name. */
  arguments: ReadonlyMap<string, Expression>;
  location: SourceLocation;
}

export type BoundSource =
  | { kind: 'population'; name: string; location: SourceLocation }
  | { kind: 'generator'; call: BoundCall; location: SourceLocation };

export interface BoundDestination {
  name: string;
  count?: Expression;
  location: SourceLocation;
}

export interface BoundFrom {
  kind: 'from';
  sources: BoundSource[];
  operators: BoundCall[];
  destinations: BoundDestination[];
  /** `exact` when every individual the chain produces must be stored. */
  output: 'stream' | 'exact';
  bounded: boolean;
  location: SourceLocation;
}

export interface BoundJoin {
  kind: 'join';
  sources: PopulationReference[];
  /** Explicit first `USING` call, or the default joiner at the statement's location. */
  joiner: BoundCall<JoinerDescriptor>;
  operators: BoundCall[];
  destinations: BoundDestination[];
  output: 'stream' | 'exact';
  bounded: boolean;
  location: SourceLocation;
}

export interface BoundAlias {
  kind: 'alias';
  target: PopulationReference;
  source: PopulationReference;
  location: SourceLocation;
}

export interface BoundYield {
  kind: 'yield';
  populations: PopulationReference[];
  location: SourceLocation;
}

export interface BoundEval {
  kind: 'eval';
  populations: PopulationReference[];
  evaluator: Evaluator;
  /** Name used in the statement, or `undefined` for the default evaluator. */
  evaluatorName: string | undefined;
  location: SourceLocation;
}

export interface BoundRepeat {
  kind: 'repeat';
  count: Expression;
  body: BoundStatement[];
  location: SourceLocation;
}

export type BoundStatement =
  | BoundFrom
  | BoundJoin
  | BoundAlias
  | BoundYield
  | BoundEval
  | BoundRepeat;

export interface BoundBlock {
  name: string;
  body: BoundStatement[];
  location: SourceLocation;
}

export interface BoundProgram {
  readonly program: Program;
  /** Top-level statements, executed once by `begin()`. */
  readonly initialization: readonly BoundStatement[];
  /** Blocks keyed by lower-case name. */
  readonly blocks: ReadonlyMap<string, BoundBlock>;
  /** Every population name in order of first declaration. */
  readonly populations: readonly string[];
}
