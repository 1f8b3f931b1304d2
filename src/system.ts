import { bind } from './binding/binding.resolver';
import type { BoundProgram } from './binding/binding.types';
import {
  ConfigMapping,
  ConfigurationContext,
} from './configuration/configuration.context';
import { EvolutionError } from './errors';
import type { Program } from './language/language.ast';
import { parse } from './language/language.parser';
import { parseSettings } from './language/language.settings';
import { createDefaultRegistry, OperatorRegistry } from './methods/registry';
import {
  InterpreterState,
  PipelineInterpreter,
  RunOptions,
  RunResult,
} from './pipeline/pipeline.interpreter';
import type { Monitor } from './pipeline/pipeline.monitor';
import { RandomStreams, Seed, SeedOptions } from './random/random.stream';
import type { Evaluator, Individual } from './species/species.individual';

export interface SystemOptions {
  /** Pipeline source text. Falls back to the `system.definition` configuration key. */
  definition?: string;
  configuration?: ConfigurationContext | ConfigMapping;
  /** Settings text (`key = expr; ...`) applied as the `override` layer. */
  overrides?: string;
  registry?: OperatorRegistry;
  /** Default evaluator for generated individuals and bare `EVAL` statements. */
  evaluator?: Evaluator;
  evaluators?: { readonly [name: string]: Evaluator };
  monitor?: Monitor;
  /** Overrides `limits.generations`. `null` runs until cancelled. */
  maxGenerations?: number | null;
  /** Overrides the `random_seed.*` keys. */
  seeds?: SeedOptions;
  initialPopulations?: { readonly [name: string]: Iterable<Individual> };
}

function seedAt(configuration: ConfigurationContext, key: string): Seed | undefined {
  const value = configuration.get(key);
  return typeof value === 'number' || typeof value === 'string' ? value : undefined;
}

/**
 * One experiment: parses, binds and runs a system definition with its own
 * registry, configuration, random streams and populations.
 *
 * @example
 * ```ts
 * const system = new System({
 *   definition: `
 *     FROM random_binary(length=16) SELECT (size) population
 *     BEGIN generation
 *       FROM population SELECT (size) population USING tournament(k=3), mutate_bitflip
 *       YIELD population
 *     END generation
 *   `,
 *   configuration: { size: 20, limits: { generations: 50 } },
 *   evaluator: { evaluate: (individual) => individual.genome.genes.filter(Boolean).length },
 * });
 * await system.run();
 * ```
 */
export class System {
  readonly configuration: ConfigurationContext;
  readonly program: Program;
  readonly bound: BoundProgram;
  readonly streams: RandomStreams;
  readonly registry: OperatorRegistry;
  private readonly interpreter: PipelineInterpreter;

  constructor(options: SystemOptions) {
    const base =
      options.configuration instanceof ConfigurationContext
        ? options.configuration
        : ConfigurationContext.from(options.configuration ?? {});
    this.configuration = options.overrides
      ? base.withLayer('override', parseSettings(options.overrides, base))
      : base;

    const definition = options.definition ?? this.configuration.get('system.definition');
    if (typeof definition !== 'string') {
      throw new EvolutionError(
        'ConfigurationError',
        'No system definition was given and system.definition is not set'
      );
    }

    this.registry = options.registry ?? createDefaultRegistry();
    this.program = parse(definition);
    this.bound = bind(this.program, {
      registry: this.registry,
      configuration: this.configuration,
      evaluators: options.evaluators,
      defaultEvaluator: options.evaluator,
      initialPopulations: Object.keys(options.initialPopulations ?? {}),
    });

    const timeBased = this.configuration.get('random_seed.time_based');
    this.streams = new RandomStreams({
      breeding: options.seeds?.breeding ?? seedAt(this.configuration, 'random_seed.breeding'),
      landscape: options.seeds?.landscape ?? seedAt(this.configuration, 'random_seed.landscape'),
      timeBased: options.seeds?.timeBased ?? timeBased === true,
    });

    const limit = this.configuration.get('limits.generations');
    this.interpreter = new PipelineInterpreter(this.bound, {
      configuration: this.configuration,
      streams: this.streams,
      monitor: options.monitor,
      evaluator: options.evaluator,
      maxGenerations:
        options.maxGenerations !== undefined
          ? options.maxGenerations
          : typeof limit === 'number'
          ? limit
          : null,
      initialPopulations: options.initialPopulations,
    });
  }

  get state(): InterpreterState {
    return this.interpreter.state;
  }

  get generation(): number {
    return this.interpreter.generation;
  }

  population(name: string): readonly Individual[] | undefined {
    return this.interpreter.population(name);
  }

  begin(): void {
    this.interpreter.begin();
  }

  step(block?: string): void {
    this.interpreter.step(block);
  }

  run(options?: RunOptions): Promise<RunResult> {
    return this.interpreter.run(options);
  }

  cancel(): void {
    this.interpreter.cancel();
  }

  /** New configuration snapshot, effective from the next step. */
  setConfiguration(configuration: ConfigurationContext): void {
    this.interpreter.setConfiguration(configuration);
  }
}
