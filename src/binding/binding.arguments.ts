import type { ConfigValue, ConfigurationContext } from '../configuration/configuration.context';
import { ExpressionError, ParameterError, PopulationSizeError, SourceLocation } from '../errors';
import type { Expression } from '../language/language.ast';
import { evaluate, ReferenceResolver } from '../language/language.expression';
import { matchesType, OperatorArguments, RegisteredOperator } from '../methods/methods.types';
import type { BoundCall } from './binding.types';

/** Resolver that reads dotted references from a configuration context. */
export function contextResolver(configuration: ConfigurationContext): ReferenceResolver {
  return (path, location) => configuration.require(path, location);
}

function describeValue(value: ConfigValue): string {
  if (Array.isArray(value)) return 'a list';
  if (typeof value === 'object' && value !== null) return 'a mapping';
  return JSON.stringify(value);
}

/**
 * Final argument values for one call. For each declared parameter the first of
 * these wins: the statement's argument, the context key
 * `operators.<operator>.<parameter>`, the descriptor default. An explicit `null`
 * leaves the parameter unset.
 */
export function resolveArguments(
  call: BoundCall<RegisteredOperator>,
  configuration: ConfigurationContext
): OperatorArguments {
  const resolve = contextResolver(configuration);
  const resolved: { [name: string]: ConfigValue } = {};
  for (const [name, spec] of Object.entries(call.descriptor.parameters)) {
    const explicit = call.arguments.get(name);
    const value = explicit
      ? evaluate(explicit, resolve)
      : configuration.get(['operators', call.name, name]) ?? spec.default;
    if (value === undefined || value === null) {
      if (spec.required) {
        throw new ParameterError(
          `Missing required parameter '${name}' of operator '${call.name}'`,
          call.location
        );
      }
      continue;
    }
    if (!matchesType(value, spec.type)) {
      throw new ParameterError(
        `Parameter '${name}' of operator '${call.name}' expects ${spec.type}, got ${describeValue(
          value
        )}`,
        explicit?.location ?? call.location
      );
    }
    resolved[name] = value;
  }
  return resolved;
}

/** Whole part of a finite, non-negative number; `null` for anything else. */
function truncatedCount(value: ConfigValue): number | null {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) return null;
  return Math.trunc(value);
}

/**
 * Evaluate a destination size. Fractional sizes such as `size/10` are
 * truncated towards zero.
 */
export function evaluateCount(
  expression: Expression,
  configuration: ConfigurationContext,
  population: string,
  location: SourceLocation
): number {
  const value = evaluate(expression, contextResolver(configuration));
  const count = truncatedCount(value);
  if (count === null) {
    throw new PopulationSizeError(
      `Count for '${population}' must be a finite non-negative number, got ${describeValue(value)}`,
      population,
      location
    );
  }
  return count;
}

/** Evaluate a `REPEAT` count, truncated like destination sizes. */
export function evaluateRepeat(
  expression: Expression,
  configuration: ConfigurationContext
): number {
  const value = evaluate(expression, contextResolver(configuration));
  const count = truncatedCount(value);
  if (count === null) {
    throw new ExpressionError(
      `REPEAT count must be a finite non-negative number, got ${describeValue(value)}`,
      expression.location
    );
  }
  return count;
}
