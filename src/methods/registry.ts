import { EvolutionError, SourceLocation, UnresolvedOperatorError } from '../errors';
import { crossover } from './crossover';
import { generators } from './generators';
import { joiners, tuples } from './joining';
import { matchesType, OperatorKind, RegisteredOperator } from './methods.types';
import { mutation } from './mutation';
import { selection } from './selection';

const OPERATOR_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Name → descriptor lookup used by the binder. Each system owns its own
 * registry, so registering a custom operator never leaks into other runs.
 *
 * @example
 * ```ts
 * const registry = createDefaultRegistry().register({
 *   name: 'elite',
 *   kind: 'selector',
 *   output: 'stream',
 *   bounded: true,
 *   materializes: true,
 *   parameters: {},
 *   apply: (source) => rankByFitness([...source]).slice(0, 2),
 * });
 * ```
 */
export class OperatorRegistry {
  private readonly operators = new Map<string, RegisteredOperator>();

  /**
   * Add a descriptor. Throws when the name is taken (unless `replace` is set), is
   * not a valid identifier, or a parameter default does not fit its type.
   */
  register(descriptor: RegisteredOperator, options: { replace?: boolean } = {}): this {
    const { name } = descriptor;
    if (!OPERATOR_NAME.test(name)) {
      throw new EvolutionError('RegistryError', `Operator name '${name}' is not an identifier`);
    }
    if (this.operators.has(name) && !options.replace) {
      throw new EvolutionError('RegistryError', `Operator '${name}' is already registered`);
    }
    for (const [parameter, spec] of Object.entries(descriptor.parameters)) {
      if (spec.default !== undefined && !matchesType(spec.default, spec.type)) {
        throw new EvolutionError(
          'RegistryError',
          `Default of ${name}.${parameter} is not a valid ${spec.type}`
        );
      }
    }
    this.operators.set(name, descriptor);
    return this;
  }

  get(name: string): RegisteredOperator | undefined {
    return this.operators.get(name);
  }

  has(name: string): boolean {
    return this.operators.has(name);
  }

  /** Like {@link get} but throws `UnresolvedOperatorError`. */
  require(name: string, location?: SourceLocation): RegisteredOperator {
    const descriptor = this.operators.get(name);
    if (!descriptor) throw new UnresolvedOperatorError(name, location);
    return descriptor;
  }

  /** Registered names, optionally restricted to one kind, in registration order. */
  names(kind?: OperatorKind): string[] {
    return [...this.operators.values()]
      .filter((descriptor) => !kind || descriptor.kind === kind)
      .map((descriptor) => descriptor.name);
  }
}

/** Registry preloaded with every built-in operator. */
export function createDefaultRegistry(): OperatorRegistry {
  const registry = new OperatorRegistry();
  for (const group of [generators, selection, crossover, mutation, joiners, tuples]) {
    for (const descriptor of Object.values<RegisteredOperator>(group)) registry.register(descriptor);
  }
  return registry;
}
