/**
 * Error kinds raised by the language, grammar, binding and interpreter layers.
 *
 * Every error carries a stable `code` (useful for hosts that map failures to
 * worst-case fitness or exit statuses) and, when the failure is tied to pipeline
 * source text, the 1-based `location` of the offending token.
 */

/** 1-based position inside a pipeline definition. */
export interface SourceLocation {
  line: number;
  column: number;
}

export function formatLocation(location: SourceLocation): string {
  return `${location.line}:${location.column}`;
}

export class EvolutionError extends Error {
  readonly code: string;
  readonly location?: SourceLocation;

  constructor(
    code: string,
    message: string,
    location?: SourceLocation,
    options?: { cause?: unknown }
  ) {
    super(
      location ? `${message} (at ${formatLocation(location)})` : message,
      options
    );
    this.name = 'EvolutionError';
    this.code = code;
    this.location = location;
  }
}

/** Malformed pipeline text. No partial AST is ever returned alongside it. */
export class PipelineSyntaxError extends EvolutionError {
  readonly token: string;

  constructor(message: string, token: string, location: SourceLocation) {
    super('SyntaxError', `${message}, found ${JSON.stringify(token)}`, location);
    this.name = 'PipelineSyntaxError';
    this.token = token;
  }
}

/** Invalid restricted expression: type mismatch, division by zero, unknown operator. */
export class ExpressionError extends EvolutionError {
  constructor(message: string, location?: SourceLocation) {
    super('ExpressionError', message, location);
    this.name = 'ExpressionError';
  }
}

/** Every problem found while validating a grammar definition. */
export class GrammarDefinitionError extends EvolutionError {
  readonly violations: readonly string[];

  constructor(violations: readonly string[]) {
    super(
      'GrammarDefinitionError',
      `Invalid grammar (${violations.length} problem${
        violations.length === 1 ? '' : 's'
      }):\n  ${violations.join('\n  ')}`
    );
    this.name = 'GrammarDefinitionError';
    this.violations = violations;
  }
}

export class GrammarRecursionLimitError extends EvolutionError {
  readonly rule: string;
  readonly maxDepth: number;

  constructor(rule: string, maxDepth: number) {
    super(
      'GrammarRecursionLimitError',
      `Derivation of rule '${rule}' exceeds the maximum depth of ${maxDepth}`
    );
    this.name = 'GrammarRecursionLimitError';
    this.rule = rule;
    this.maxDepth = maxDepth;
  }
}

export class GrammarDepthError extends EvolutionError {
  constructor() {
    super('GrammarDepthError', 'DEC_INDENT would take the indent depth below zero');
    this.name = 'GrammarDepthError';
  }
}

export class GenomeExhaustedError extends EvolutionError {
  readonly codonsUsed: number;

  constructor(message: string, codonsUsed: number) {
    super('GenomeExhaustedError', message);
    this.name = 'GenomeExhaustedError';
    this.codonsUsed = codonsUsed;
  }
}

/** Structural problem found while binding a program. */
export class BindingError extends EvolutionError {
  constructor(message: string, location?: SourceLocation, code = 'BindingError') {
    super(code, message, location);
    this.name = 'BindingError';
  }
}

export class UnresolvedOperatorError extends BindingError {
  readonly identifier: string;

  constructor(identifier: string, location?: SourceLocation) {
    super(`Unknown operator '${identifier}'`, location, 'UnresolvedOperatorError');
    this.name = 'UnresolvedOperatorError';
    this.identifier = identifier;
  }
}

export type VariableCategory = 'configuration' | 'population';

export class UnresolvedVariableError extends BindingError {
  readonly identifier: string;
  readonly category: VariableCategory;

  constructor(
    identifier: string,
    category: VariableCategory,
    location?: SourceLocation
  ) {
    super(
      category === 'population'
        ? `Population '${identifier}' is used before it is selected`
        : `Unknown configuration variable '${identifier}'`,
      location,
      'UnresolvedVariableError'
    );
    this.name = 'UnresolvedVariableError';
    this.identifier = identifier;
    this.category = category;
  }
}

export class ParameterError extends BindingError {
  constructor(message: string, location?: SourceLocation) {
    super(message, location, 'ParameterError');
    this.name = 'ParameterError';
  }
}

export class PopulationSizeError extends EvolutionError {
  readonly population: string;
  readonly expected: number | undefined;
  readonly actual: number | undefined;

  constructor(
    message: string,
    population: string,
    location?: SourceLocation,
    counts: { expected?: number; actual?: number } = {}
  ) {
    super('PopulationSizeError', message, location);
    this.name = 'PopulationSizeError';
    this.population = population;
    this.expected = counts.expected;
    this.actual = counts.actual;
  }
}

/** Wraps any failure raised by an operator or by an evaluator it triggered. */
export class OperatorExecutionError extends EvolutionError {
  readonly operator: string;

  constructor(operator: string, location: SourceLocation | undefined, cause: unknown) {
    super(
      'OperatorExecutionError',
      `Operator '${operator}' failed: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      location,
      { cause }
    );
    this.name = 'OperatorExecutionError';
    this.operator = operator;
  }
}

export class InterpreterStateError extends EvolutionError {
  constructor(message: string) {
    super('InterpreterStateError', message);
    this.name = 'InterpreterStateError';
  }
}
