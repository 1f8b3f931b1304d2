import type { SourceLocation } from '../errors';

/**
 * Abstract syntax tree for system definitions.
 *
 * Nodes are plain data so that a parsed program can be inspected, serialized and
 * bound more than once (for example against different registries in tests).
 */

export type BinaryOperator =
  | '+'
  | '-'
  | '*'
  | '/'
  | '%'
  | '^'
  | '<'
  | '<='
  | '>'
  | '>='
  | '=='
  | '!='
  | 'and'
  | 'or';

export type UnaryOperator = '-' | '+' | 'not';

export type Expression =
  | { kind: 'number'; value: number; location: SourceLocation }
  | { kind: 'string'; value: string; location: SourceLocation }
  | { kind: 'boolean'; value: boolean; location: SourceLocation }
  | { kind: 'null'; location: SourceLocation }
  /** Dotted configuration reference such as `system.size`. */
  | { kind: 'reference'; path: string[]; location: SourceLocation }
  | {
      kind: 'unary';
      operator: UnaryOperator;
      operand: Expression;
      location: SourceLocation;
    }
  | {
      kind: 'binary';
      operator: BinaryOperator;
      left: Expression;
      right: Expression;
      location: SourceLocation;
    };

/** `key=value` inside an operator call. A bare `key` carries a `true` literal. */
export interface Argument {
  name: string;
  value: Expression;
  location: SourceLocation;
}

/** `name` or `name(key=value, ...)`. */
export interface Call {
  name: string;
  arguments: Argument[];
  location: SourceLocation;
}

export type Source =
  | { kind: 'population'; name: string; location: SourceLocation }
  | { kind: 'call'; call: Call; location: SourceLocation };

export interface Destination {
  name: string;
  /** Omitted only on the last destination, which then takes every remaining individual. */
  count?: Expression;
  location: SourceLocation;
}

export interface PopulationReference {
  name: string;
  location: SourceLocation;
}

export interface FromStatement {
  kind: 'from';
  sources: Source[];
  destinations: Destination[];
  operators: Call[];
  location: SourceLocation;
}

/** `JOIN a, b INTO dest USING joiner, ...`: tuples of members of several populations. */
export interface JoinStatement {
  kind: 'join';
  sources: PopulationReference[];
  destinations: Destination[];
  /** The first call may name a joiner; `full_combine` is used otherwise. */
  operators: Call[];
  location: SourceLocation;
}

/** `target = source`: a second population holding the same members. */
export interface AliasStatement {
  kind: 'alias';
  target: PopulationReference;
  source: PopulationReference;
  location: SourceLocation;
}

export interface YieldStatement {
  kind: 'yield';
  populations: PopulationReference[];
  location: SourceLocation;
}

export interface EvalStatement {
  kind: 'eval';
  populations: PopulationReference[];
  evaluator?: Call;
  location: SourceLocation;
}

export interface RepeatStatement {
  kind: 'repeat';
  count: Expression;
  body: Statement[];
  location: SourceLocation;
}

export type Statement =
  | FromStatement
  | JoinStatement
  | AliasStatement
  | YieldStatement
  | EvalStatement
  | RepeatStatement;

export interface Block {
  kind: 'block';
  name: string;
  body: Statement[];
  location: SourceLocation;
}

/** Reserved name of the block executed once per generation. */
export const GENERATION_BLOCK = 'generation';

export interface Program {
  /** Top-level statements and blocks, in source order. */
  body: Array<Statement | Block>;
}
