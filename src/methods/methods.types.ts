import type { ConfigValue, ConfigurationContext } from '../configuration/configuration.context';
import type { GrammarTable } from '../grammar/grammar.table';
import type { RandomStream } from '../random/random.stream';
import type { EvaluationBinding, Individual } from '../species/species.individual';

/**
 * Contracts shared by the operator registry, the binder and the interpreter.
 *
 * An operator is a plain descriptor object. Its `apply` receives the upstream
 * individuals as an iterable and returns another iterable; nothing is pulled
 * until the interpreter fills a destination, so an operator only does the work
 * its consumers ask for.
 */

export type OperatorKind = 'generator' | 'selector' | 'variation' | 'joiner';

/**
 * How many of an operator's results the caller must store:
 * - `stream`     the caller may take any prefix; surplus is discarded
 * - `exact`      every result must be stored; surplus is an error
 * - `preserving` whatever the upstream chain promised
 */
export type OutputContract = 'stream' | 'exact' | 'preserving';

/** Whether results end: always, never, or when the upstream chain does. */
export type Boundedness = boolean | 'preserving';

export type ParameterType = 'number' | 'integer' | 'boolean' | 'string' | 'mapping' | 'value';

export interface ParameterSpec {
  type: ParameterType;
  default?: ConfigValue;
  required?: boolean;
  description?: string;
}

export type OperatorArguments = { readonly [name: string]: ConfigValue };

/** Everything an operator may touch while it runs. */
export interface OperatorContext {
  /** Breeding stream; landscape randomness belongs to evaluators. */
  readonly random: RandomStream;
  readonly generation: number;
  readonly configuration: ConfigurationContext;
  /** Evaluator attached to individuals created by generators. */
  readonly evaluation: EvaluationBinding | undefined;
  /** Validated grammar for a configuration value, cached for the run. */
  grammar(value: ConfigValue): GrammarTable;
  /** Forward a named value to the run's monitor. */
  notify(sender: string, name: string, value: unknown): void;
}

export interface DescriptorBase {
  name: string;
  output: OutputContract | ((args: OperatorArguments) => OutputContract);
  bounded: Boundedness | ((args: OperatorArguments) => Boundedness);
  /** Reads its whole source before producing anything, so the source must be finite. */
  materializes?: boolean;
  parameters: { readonly [name: string]: ParameterSpec };
  description?: string;
  /** Extra argument validation run once at bind time. */
  check?(args: OperatorArguments, context: Pick<OperatorContext, 'grammar'>): void;
}

export interface OperatorDescriptor extends DescriptorBase {
  kind: Exclude<OperatorKind, 'joiner'>;
  apply(
    source: Iterable<Individual>,
    args: OperatorArguments,
    context: OperatorContext
  ): Iterable<Individual>;
}

/** One population read by `JOIN`, in statement order. */
export interface JoinGroup {
  readonly name: string;
  readonly members: readonly Individual[];
}

/**
 * First operator of a `JOIN` statement: combines members of several populations
 * into joined individuals (see `JoinedGenome`).
 */
export interface JoinerDescriptor extends DescriptorBase {
  kind: 'joiner';
  join(groups: readonly JoinGroup[], args: OperatorArguments, context: OperatorContext): Iterable<Individual>;
}

export type RegisteredOperator = OperatorDescriptor | JoinerDescriptor;

export function outputOf(descriptor: RegisteredOperator, args: OperatorArguments): OutputContract {
  return typeof descriptor.output === 'function' ? descriptor.output(args) : descriptor.output;
}

export function boundednessOf(
  descriptor: RegisteredOperator,
  args: OperatorArguments
): Boundedness {
  return typeof descriptor.bounded === 'function' ? descriptor.bounded(args) : descriptor.bounded;
}

// Typed argument readers. Arguments are validated against the parameter schema
// before `apply` runs, so these only narrow.

export function numberArg(args: OperatorArguments, name: string, fallback = 0): number {
  const value = args[name];
  return typeof value === 'number' ? value : fallback;
}

export function booleanArg(args: OperatorArguments, name: string, fallback = false): boolean {
  const value = args[name];
  return typeof value === 'boolean' ? value : fallback;
}

export function optionalNumberArg(args: OperatorArguments, name: string): number | undefined {
  const value = args[name];
  return typeof value === 'number' ? value : undefined;
}

/** Whether a resolved argument value fits its declared parameter type. */
export function matchesType(value: ConfigValue, type: ParameterType): boolean {
  switch (type) {
    case 'number':
      return typeof value === 'number';
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'string':
      return typeof value === 'string';
    case 'mapping':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
    case 'value':
      return true;
  }
}
