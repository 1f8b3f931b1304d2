import { ConfigurationContext } from '../configuration/configuration.context';
import {
  BindingError,
  EvolutionError,
  ParameterError,
  PopulationSizeError,
  SourceLocation,
  UnresolvedOperatorError,
  UnresolvedVariableError,
} from '../errors';
import { GrammarCache } from '../grammar/grammar.table';
import {
  Block,
  Call,
  Destination,
  Expression,
  FromStatement,
  GENERATION_BLOCK,
  JoinStatement,
  Program,
  Statement,
} from '../language/language.ast';
import { referencesOf } from '../language/language.expression';
import {
  boundednessOf,
  OperatorArguments,
  outputOf,
  RegisteredOperator,
} from '../methods/methods.types';
import type { OperatorRegistry } from '../methods/registry';
import type { Evaluator } from '../species/species.individual';
import { warn } from '../utils/warnings';
import { evaluateCount, evaluateRepeat, resolveArguments } from './binding.arguments';
import type {
  BoundBlock,
  BoundCall,
  BoundFrom,
  BoundJoin,
  BoundProgram,
  BoundSource,
  BoundStatement,
} from './binding.types';

export interface BindOptions {
  registry: OperatorRegistry;
  /** Context used to check references, counts and arguments. Default: empty. */
  configuration?: ConfigurationContext;
  /** Evaluators addressable by name from `EVAL ... USING name`. */
  evaluators?: { readonly [name: string]: Evaluator };
  /** Evaluator used by `EVAL` statements without `USING`. */
  defaultEvaluator?: Evaluator;
  /** Populations the host supplies before `begin()`. */
  initialPopulations?: Iterable<string>;
}

/** Joiner used by `JOIN` statements whose first operator is not a joiner. */
export const DEFAULT_JOINER = 'full_combine';

interface Chain {
  operators: BoundCall[];
  output: 'stream' | 'exact';
  bounded: boolean;
}

/**
 * Resolves a parsed program against an operator registry and a configuration
 * context. Every check that does not need individuals happens here, so a
 * program that binds can only fail at run time because of its data.
 */
class Binder {
  private readonly configuration: ConfigurationContext;
  private readonly grammars = new GrammarCache();
  private readonly declared = new Map<string, SourceLocation | undefined>();
  private readonly read = new Set<string>();

  constructor(private readonly options: BindOptions) {
    this.configuration = options.configuration ?? new ConfigurationContext();
    for (const name of options.initialPopulations ?? []) this.declared.set(name, undefined);
  }

  bindProgram(program: Program): BoundProgram {
    const initialization: BoundStatement[] = [];
    const blocks = new Map<string, BoundBlock>();
    for (const node of program.body) {
      if (node.kind === 'block') {
        const key = node.name.toLowerCase();
        if (blocks.has(key)) {
          throw new BindingError(`Block '${node.name}' is defined more than once`, node.location);
        }
        blocks.set(key, this.bindBlock(node));
      } else {
        initialization.push(this.bindStatement(node));
      }
    }

    for (const [name, location] of this.declared) {
      if (location && !this.read.has(name)) {
        warn(`Population '${name}' is selected but never used (at ${location.line}:${location.column})`);
      }
    }

    return { program, initialization, blocks, populations: [...this.declared.keys()] };
  }

  private bindBlock(block: Block): BoundBlock {
    const body = block.body.map((statement) => this.bindStatement(statement));
    if (block.name.toLowerCase() === GENERATION_BLOCK && !containsYield(body)) {
      throw new BindingError(
        `Block '${block.name}' must contain a YIELD statement`,
        block.location
      );
    }
    return { name: block.name, body, location: block.location };
  }

  private bindStatement(statement: Statement): BoundStatement {
    switch (statement.kind) {
      case 'from':
        return this.bindFrom(statement);
      case 'join':
        return this.bindJoin(statement);
      case 'alias': {
        const { target, source } = statement;
        this.use(source.name, source.location);
        if (!this.declared.has(target.name)) this.declared.set(target.name, target.location);
        return { kind: 'alias', target, source, location: statement.location };
      }
      case 'yield':
        statement.populations.forEach((ref) => this.use(ref.name, ref.location));
        return { kind: 'yield', populations: statement.populations, location: statement.location };
      case 'eval': {
        statement.populations.forEach((ref) => this.use(ref.name, ref.location));
        const evaluator = this.resolveEvaluator(statement.evaluator, statement.location);
        return {
          kind: 'eval',
          populations: statement.populations,
          evaluator,
          evaluatorName: statement.evaluator?.name,
          location: statement.location,
        };
      }
      case 'repeat':
        this.checkReferences(statement.count);
        evaluateRepeat(statement.count, this.configuration);
        return {
          kind: 'repeat',
          count: statement.count,
          body: statement.body.map((inner) => this.bindStatement(inner)),
          location: statement.location,
        };
    }
  }

  private bindFrom(statement: FromStatement): BoundFrom {
    // merged sources: any stream makes a stream; anything after an endless source is unreachable
    let output: 'stream' | 'exact' = 'exact';
    let bounded = true;
    const sources: BoundSource[] = [];
    for (const source of statement.sources) {
      if (!bounded) {
        throw new BindingError(
          `Source ${sources.length + 1} follows a generator that never ends and would never be read`,
          source.location
        );
      }
      if (source.kind === 'population' && this.declared.has(source.name)) {
        this.read.add(source.name);
        sources.push(source);
        continue;
      }
      if (source.kind === 'population' && !this.options.registry.has(source.name)) {
        throw new UnresolvedVariableError(source.name, 'population', source.location);
      }
      const call: Call =
        source.kind === 'call'
          ? source.call
          : { name: source.name, arguments: [], location: source.location };
      const { bound, args } = this.bindCall(call);
      const { descriptor } = bound;
      if (descriptor.kind !== 'generator') {
        throw new BindingError(`'${call.name}' is not a generator and cannot be a source`, call.location);
      }
      if (outputOf(descriptor, args) === 'stream') output = 'stream';
      if (boundednessOf(descriptor, args) === false) bounded = false;
      sources.push({ kind: 'generator', call: { ...bound, descriptor }, location: source.location });
    }

    const chain = this.bindChain(statement.operators, output, bounded);
    this.bindDestinations(statement.destinations, chain.bounded);
    return {
      kind: 'from',
      sources,
      ...chain,
      destinations: statement.destinations,
      location: statement.location,
    };
  }

  private bindJoin(statement: JoinStatement): BoundJoin {
    statement.sources.forEach((ref) => this.use(ref.name, ref.location));
    const [first] = statement.operators;
    const explicit =
      first !== undefined && this.options.registry.get(first.name)?.kind === 'joiner';
    const call: Call = explicit
      ? first
      : { name: DEFAULT_JOINER, arguments: [], location: statement.location };
    const { bound, args } = this.bindCall(call);
    const { descriptor } = bound;
    if (descriptor.kind !== 'joiner') {
      throw new BindingError(`'${call.name}' is not a joiner`, call.location);
    }
    const chain = this.bindChain(
      explicit ? statement.operators.slice(1) : statement.operators,
      outputOf(descriptor, args) === 'stream' ? 'stream' : 'exact',
      boundednessOf(descriptor, args) !== false
    );
    this.bindDestinations(statement.destinations, chain.bounded);
    return {
      kind: 'join',
      sources: statement.sources,
      joiner: { ...bound, descriptor },
      ...chain,
      destinations: statement.destinations,
      location: statement.location,
    };
  }

  /** Classify a `USING` chain that starts from `output` / `bounded`. */
  private bindChain(calls: readonly Call[], output: 'stream' | 'exact', bounded: boolean): Chain {
    const operators: BoundCall[] = [];
    for (const call of calls) {
      const { bound, args } = this.bindCall(call);
      const { descriptor } = bound;
      if (descriptor.kind === 'generator') {
        throw new BindingError(`Generator '${call.name}' cannot be used after USING`, call.location);
      }
      if (descriptor.kind === 'joiner') {
        throw new BindingError(
          `Joiner '${call.name}' can only be the first operator of a JOIN statement`,
          call.location
        );
      }
      if (descriptor.materializes && !bounded) {
        throw new BindingError(
          `Operator '${call.name}' reads its whole source, but the source never ends`,
          call.location
        );
      }
      const contract = outputOf(descriptor, args);
      if (contract !== 'preserving') output = contract;
      const boundedness = boundednessOf(descriptor, args);
      if (boundedness !== 'preserving') bounded = boundedness;
      operators.push({ ...bound, descriptor });
    }
    return { operators, output, bounded };
  }

  private bindDestinations(destinations: readonly Destination[], bounded: boolean): void {
    for (const destination of destinations) {
      if (!destination.count) continue;
      this.checkReferences(destination.count);
      evaluateCount(destination.count, this.configuration, destination.name, destination.location);
    }
    const last = destinations[destinations.length - 1];
    if (!bounded && !last.count) {
      throw new PopulationSizeError(
        `Population '${last.name}' has no count but its source never ends`,
        last.name,
        last.location
      );
    }
    for (const destination of destinations) {
      if (!this.declared.has(destination.name)) this.declared.set(destination.name, destination.location);
    }
  }

  /** Resolve a call and validate its arguments against the bind-time context. */
  private bindCall(call: Call): { bound: BoundCall<RegisteredOperator>; args: OperatorArguments } {
    const descriptor = this.options.registry.require(call.name, call.location);
    const explicit = new Map<string, Expression>();
    for (const argument of call.arguments) {
      if (!Object.prototype.hasOwnProperty.call(descriptor.parameters, argument.name)) {
        throw new ParameterError(
          `Unknown parameter '${argument.name}' for operator '${call.name}'`,
          argument.location
        );
      }
      this.checkReferences(argument.value);
      explicit.set(argument.name, argument.value);
    }
    const bound: BoundCall<RegisteredOperator> = {
      name: call.name,
      descriptor,
      arguments: explicit,
      location: call.location,
    };
    const args = resolveArguments(bound, this.configuration);
    if (descriptor.check) {
      try {
        descriptor.check(args, { grammar: (value) => this.grammars.get(value) });
      } catch (error) {
        if (error instanceof EvolutionError) throw error;
        const message = error instanceof Error ? error.message : String(error);
        throw new ParameterError(`Invalid arguments for operator '${call.name}': ${message}`, call.location);
      }
    }
    return { bound, args };
  }

  private resolveEvaluator(call: Call | undefined, location: SourceLocation): Evaluator {
    if (!call) {
      if (!this.options.defaultEvaluator) {
        throw new BindingError('EVAL needs USING <evaluator> when no default evaluator is set', location);
      }
      return this.options.defaultEvaluator;
    }
    if (call.arguments.length) {
      throw new BindingError(`Evaluator '${call.name}' does not take arguments`, call.location);
    }
    const evaluators = this.options.evaluators ?? {};
    if (!Object.prototype.hasOwnProperty.call(evaluators, call.name)) {
      throw new UnresolvedOperatorError(call.name, call.location);
    }
    return evaluators[call.name];
  }

  private use(name: string, location: SourceLocation): void {
    if (!this.declared.has(name)) throw new UnresolvedVariableError(name, 'population', location);
    this.read.add(name);
  }

  private checkReferences(expression: Expression): void {
    for (const { path, location } of referencesOf(expression)) {
      this.configuration.require(path, location);
    }
  }
}

function containsYield(statements: readonly BoundStatement[]): boolean {
  return statements.some(
    (statement) =>
      statement.kind === 'yield' || (statement.kind === 'repeat' && containsYield(statement.body))
  );
}

/**
 * Bind a parsed program.
 *
 * @example
 * ```ts
 * const bound = bind(parse('FROM random_int(length=4) SELECT 5 population'), {
 *   registry: createDefaultRegistry(),
 * });
 * ```
 */
export function bind(program: Program, options: BindOptions): BoundProgram {
  return new Binder(options).bindProgram(program);
}
