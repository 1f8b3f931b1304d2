import { evaluateCount, evaluateRepeat, resolveArguments } from '../binding/binding.arguments';
import type {
  BoundEval,
  BoundFrom,
  BoundJoin,
  BoundProgram,
  BoundStatement,
  BoundYield,
} from '../binding/binding.types';
import { ConfigurationContext } from '../configuration/configuration.context';
import {
  InterpreterStateError,
  PopulationSizeError,
  SourceLocation,
  UnresolvedVariableError,
} from '../errors';
import { GrammarCache } from '../grammar/grammar.table';
import { GENERATION_BLOCK } from '../language/language.ast';
import type { OperatorContext } from '../methods/methods.types';
import { RandomStreams } from '../random/random.stream';
import type { EvaluationBinding, Evaluator, Individual } from '../species/species.individual';
import type { Monitor, TerminationReason } from './pipeline.monitor';
import { drainIterator, guarded, merge, take } from './pipeline.streams';

export type InterpreterState = 'INITIALIZING' | 'RUNNING_GENERATION' | 'TERMINATED';

export interface InterpreterOptions {
  configuration?: ConfigurationContext;
  streams?: RandomStreams;
  monitor?: Monitor;
  /** Evaluator attached to generated individuals. */
  evaluator?: Evaluator;
  /** Generations to run before terminating; `null` (default) runs until cancelled. */
  maxGenerations?: number | null;
  /** Populations available before `begin()`. */
  initialPopulations?: { readonly [name: string]: Iterable<Individual> };
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface RunResult {
  generation: number;
  reason: TerminationReason;
}

/**
 * Executes a bound program.
 *
 * ```text
 * INITIALIZING --begin()--> RUNNING_GENERATION --step()--> RUNNING_GENERATION
 *                                   |                              |
 *                                   +-----------> TERMINATED <-----+
 * ```
 *
 * Each call to `begin()` or `step()` is all-or-nothing: when a statement fails,
 * the populations are put back the way they were before the call, the run
 * terminates and the error is rethrown.
 */
export class PipelineInterpreter {
  private stateValue: InterpreterState = 'INITIALIZING';
  private reason: TerminationReason | undefined;
  private begun = false;
  private cancelled = false;
  private generationValue = 0;
  private birthdays = 0;
  private configuration: ConfigurationContext;
  private pendingConfiguration: ConfigurationContext | undefined;
  private populations = new Map<string, Individual[]>();
  private readonly owned = new WeakSet<Individual>();
  private readonly grammars = new GrammarCache();
  private readonly streams: RandomStreams;
  private readonly monitor: Monitor;
  private readonly evaluation: EvaluationBinding | undefined;
  private readonly maxGenerations: number | null;

  constructor(private readonly program: BoundProgram, options: InterpreterOptions = {}) {
    this.configuration = options.configuration ?? new ConfigurationContext();
    this.streams = options.streams ?? new RandomStreams();
    this.monitor = options.monitor ?? {};
    this.maxGenerations = options.maxGenerations ?? null;
    this.evaluation = options.evaluator
      ? { evaluator: options.evaluator, random: this.streams.landscape }
      : undefined;
    for (const [name, individuals] of Object.entries(options.initialPopulations ?? {})) {
      this.populations.set(name, this.store(individuals));
    }
  }

  get state(): InterpreterState {
    return this.stateValue;
  }

  get generation(): number {
    return this.generationValue;
  }

  get terminationReason(): TerminationReason | undefined {
    return this.reason;
  }

  get populationNames(): string[] {
    return [...this.populations.keys()];
  }

  /** Copy of a population's current members. */
  population(name: string): readonly Individual[] | undefined {
    const members = this.populations.get(name);
    return members && [...members];
  }

  /** Replace the configuration snapshot from the next step boundary on. */
  setConfiguration(configuration: ConfigurationContext): void {
    this.pendingConfiguration = configuration;
  }

  /** Stop at the next step boundary. */
  cancel(): void {
    this.cancelled = true;
  }

  /** Run the top-level statements once. */
  begin(): void {
    if (this.begun) throw new InterpreterStateError('begin() has already been called');
    this.begun = true;
    this.applyPendingConfiguration();
    this.transaction(() => this.execute(this.program.initialization));
    if (!this.program.blocks.has(GENERATION_BLOCK)) {
      this.terminate('no-generation-block');
    } else if (this.maxGenerations !== null && this.generationValue >= this.maxGenerations) {
      this.terminate('generation-limit');
    } else {
      this.stateValue = 'RUNNING_GENERATION';
    }
  }

  /**
   * Execute one block. The `generation` block advances the counter when at least
   * one `YIELD` completed; other blocks leave it alone.
   */
  step(block: string = GENERATION_BLOCK): void {
    if (this.stateValue === 'TERMINATED') {
      throw new InterpreterStateError(`Cannot step a terminated run (${this.reason})`);
    }
    if (!this.begun) throw new InterpreterStateError('Call begin() before step()');
    const key = block.toLowerCase();
    const bound = this.program.blocks.get(key);
    if (!bound) throw new InterpreterStateError(`No block named '${block}'`);
    this.applyPendingConfiguration();

    const yields = this.transaction(() => this.execute(bound.body));
    if (key !== GENERATION_BLOCK || yields === 0) return;
    this.generationValue++;
    this.monitor.onGeneration?.(this.generationValue);
    if (this.maxGenerations !== null && this.generationValue >= this.maxGenerations) {
      this.terminate('generation-limit');
    }
  }

  /**
   * `begin()` (if needed) then generations until the run terminates or is
   * cancelled. Control returns to the event loop between generations.
   */
  async run(options: RunOptions = {}): Promise<RunResult> {
    const stopRequested = (): boolean => this.cancelled || options.signal?.aborted === true;
    if (!this.begun && !stopRequested()) this.begin();
    while (this.stateValue !== 'TERMINATED') {
      if (stopRequested()) {
        this.terminate('cancelled');
        break;
      }
      this.step();
      if (this.state !== 'TERMINATED') {
        await new Promise<void>((resolve) => setImmediate(resolve));
      }
    }
    return { generation: this.generationValue, reason: this.reason ?? 'cancelled' };
  }

  private terminate(reason: TerminationReason, error?: unknown): void {
    this.stateValue = 'TERMINATED';
    this.reason = reason;
    this.monitor.onTerminate?.(reason, error);
  }

  private applyPendingConfiguration(): void {
    if (!this.pendingConfiguration) return;
    this.configuration = this.pendingConfiguration;
    this.pendingConfiguration = undefined;
  }

  private transaction<T>(work: () => T): T {
    const before = new Map(this.populations);
    try {
      return work();
    } catch (error) {
      this.populations = before;
      this.terminate('error', error);
      throw error;
    }
  }

  /** Execute statements in order and return how many `YIELD`s completed. */
  private execute(statements: readonly BoundStatement[]): number {
    let yields = 0;
    for (const statement of statements) {
      switch (statement.kind) {
        case 'from':
          this.executeFrom(statement);
          break;
        case 'join':
          this.executeJoin(statement);
          break;
        case 'alias': {
          const { target, source } = statement;
          this.populations.set(target.name, this.store(this.require(source.name, source.location)));
          break;
        }
        case 'yield':
          this.executeYield(statement);
          yields++;
          break;
        case 'eval':
          this.executeEval(statement);
          break;
        case 'repeat': {
          const times = evaluateRepeat(statement.count, this.configuration);
          for (let i = 0; i < times; i++) yields += this.execute(statement.body);
          break;
        }
      }
    }
    return yields;
  }

  private operatorContext(): OperatorContext {
    return {
      random: this.streams.breeding,
      generation: this.generationValue,
      configuration: this.configuration,
      evaluation: this.evaluation,
      grammar: (value) => this.grammars.get(value),
      notify: (sender, name, value) => this.monitor.onNotify?.(sender, name, value),
    };
  }

  private executeFrom(statement: BoundFrom): void {
    const context = this.operatorContext();
    // arguments and counts are resolved up front so their errors are not blamed on an operator
    const sources = statement.sources.map((source): Iterable<Individual> => {
      if (source.kind === 'population') return [...this.require(source.name, source.location)];
      const { call } = source;
      const args = resolveArguments(call, this.configuration);
      return guarded(call.name, call.location, () => call.descriptor.apply([], args, context));
    });
    this.fill(statement, merge(sources), context);
  }

  private executeJoin(statement: BoundJoin): void {
    const context = this.operatorContext();
    const groups = statement.sources.map(({ name, location }) => ({
      name,
      members: [...this.require(name, location)],
    }));
    const { joiner } = statement;
    const args = resolveArguments(joiner, this.configuration);
    this.fill(
      statement,
      guarded(joiner.name, joiner.location, () => joiner.descriptor.join(groups, args, context)),
      context
    );
  }

  /** Run the statement's `USING` chain over `source` and store the results. */
  private fill(statement: BoundFrom | BoundJoin, source: Iterable<Individual>, context: OperatorContext): void {
    const chain = statement.operators.reduce<Iterable<Individual>>((upstream, call) => {
      const args = resolveArguments(call, this.configuration);
      return guarded(call.name, call.location, () => call.descriptor.apply(upstream, args, context));
    }, source);
    const counts = statement.destinations.map((destination) =>
      destination.count === undefined
        ? undefined
        : evaluateCount(destination.count, this.configuration, destination.name, destination.location)
    );

    const iterator = chain[Symbol.iterator]();
    const selected = new Map<string, Individual[]>();
    try {
      statement.destinations.forEach((destination, index) => {
        const count = counts[index];
        if (count === undefined) {
          selected.set(destination.name, drainIterator(iterator));
          return;
        }
        const taken = take(iterator, count);
        if (taken.length < count) {
          throw new PopulationSizeError(
            `Population '${destination.name}' needs ${count} individuals but only ${taken.length} were available`,
            destination.name,
            destination.location,
            { expected: count, actual: taken.length }
          );
        }
        selected.set(destination.name, taken);
      });
      const last = statement.destinations[statement.destinations.length - 1];
      if (counts[counts.length - 1] !== undefined && statement.output === 'exact') {
        if (!iterator.next().done) {
          throw new PopulationSizeError(
            `More individuals were produced than the destinations can hold (last: '${last.name}')`,
            last.name,
            last.location
          );
        }
      }
    } finally {
      iterator.return?.();
    }

    for (const [name, individuals] of selected) this.populations.set(name, this.store(individuals));
  }

  private executeYield(statement: BoundYield): void {
    for (const { name, location } of statement.populations) {
      const members = this.require(name, location);
      this.monitor.onYield?.(name, Object.freeze([...members]), this.generationValue);
    }
  }

  private executeEval(statement: BoundEval): void {
    const binding: EvaluationBinding = {
      evaluator: statement.evaluator,
      random: this.streams.landscape,
    };
    for (const { name, location } of statement.populations) {
      for (const individual of this.require(name, location)) individual.bind(binding);
    }
  }

  private require(name: string, location: SourceLocation): Individual[] {
    const members = this.populations.get(name);
    if (!members) throw new UnresolvedVariableError(name, 'population', location);
    return members;
  }

  /** Take ownership: already-owned individuals are cloned, newcomers get a birthday. */
  private store(individuals: Iterable<Individual>): Individual[] {
    const stored: Individual[] = [];
    for (const candidate of individuals) {
      const individual = this.owned.has(candidate) ? candidate.clone() : candidate;
      if (individual.birthday === undefined) individual.birthday = ++this.birthdays;
      this.owned.add(individual);
      stored.push(individual);
    }
    return stored;
  }
}
