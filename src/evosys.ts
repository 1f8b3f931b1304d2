export { config } from './config';
export type { EvosysConfig, WrapPolicy } from './config';
export * from './errors';

export { tokenize, describeToken } from './language/language.lexer';
export type { Token, TokenTag } from './language/language.lexer';
export { parse, parseExpression, Parser } from './language/language.parser';
export * from './language/language.ast';
export { evaluate, formatExpression, referencesOf } from './language/language.expression';
export { parseSettings } from './language/language.settings';

export {
  ConfigurationContext,
  LAYER_ORDER,
  isMapping,
} from './configuration/configuration.context';
export type {
  ConfigMapping,
  ConfigValue,
  LayerName,
  ScalarValue,
} from './configuration/configuration.context';

export {
  BUILTIN_RULES,
  GrammarCache,
  GrammarTable,
  START_RULE,
} from './grammar/grammar.table';
export type { GrammarDefinition, GrammarToken, Production } from './grammar/grammar.table';
export { derive, expand } from './grammar/grammar.expander';
export type { Derivation, ExpansionOptions } from './grammar/grammar.expander';

export { RandomStream, RandomStreams } from './random/random.stream';
export type { RandomStreamState, Seed, SeedOptions } from './random/random.stream';

export { Individual } from './species/species.individual';
export type { EvaluationBinding, Evaluator } from './species/species.individual';
export {
  clampGene,
  formatGenome,
  genesInRange,
  joinedGenome,
  phenotypeOf,
  withGenes,
} from './species/species.genome';
export type { GeneGenome, Genome, GenomeKind, JoinedGenome } from './species/species.genome';
export { compareFitness, fittest, isFitter, rankByFitness } from './species/species.fitness';

export * from './methods/methods.types';
export { generators } from './methods/generators';
export { selection } from './methods/selection';
export { crossover } from './methods/crossover';
export { mutation } from './methods/mutation';
export { joiners, tuples } from './methods/joining';
export { createDefaultRegistry, OperatorRegistry } from './methods/registry';

export { bind } from './binding/binding.resolver';
export type { BindOptions } from './binding/binding.resolver';
export type {
  BoundBlock,
  BoundCall,
  BoundDestination,
  BoundEval,
  BoundAlias,
  BoundFrom,
  BoundJoin,
  BoundProgram,
  BoundRepeat,
  BoundSource,
  BoundStatement,
  BoundYield,
} from './binding/binding.types';

export { PipelineInterpreter } from './pipeline/pipeline.interpreter';
export type {
  InterpreterOptions,
  InterpreterState,
  RunOptions,
  RunResult,
} from './pipeline/pipeline.interpreter';
export { MultiMonitor, RecordingMonitor } from './pipeline/pipeline.monitor';
export type { Monitor, TerminationReason, YieldRecord } from './pipeline/pipeline.monitor';

export { System } from './system';
export type { SystemOptions } from './system';
