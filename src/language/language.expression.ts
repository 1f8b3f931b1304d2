import type { ConfigValue } from '../configuration/configuration.context';
import { ExpressionError, SourceLocation } from '../errors';
import type { Expression } from './language.ast';

/**
 * Restricted expression evaluation.
 *
 * Only literals, dotted references and a fixed set of arithmetic / comparison /
 * boolean operators exist. There is no call syntax and no access to host objects,
 * so evaluating user-supplied text can never execute code.
 */

/** Resolves a dotted reference; must throw when the name is unknown. */
export type ReferenceResolver = (path: readonly string[], location: SourceLocation) => ConfigValue;

function describe(value: ConfigValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  return typeof value === 'object' ? 'mapping' : typeof value;
}

function expectNumber(value: ConfigValue, operator: string, location: SourceLocation): number {
  if (typeof value !== 'number') {
    throw new ExpressionError(
      `Operator '${operator}' expects numbers, got ${describe(value)}`,
      location
    );
  }
  return value;
}

function expectBoolean(value: ConfigValue, operator: string, location: SourceLocation): boolean {
  if (typeof value !== 'boolean') {
    throw new ExpressionError(
      `Operator '${operator}' expects booleans, got ${describe(value)}`,
      location
    );
  }
  return value;
}

export function evaluate(expression: Expression, resolve: ReferenceResolver): ConfigValue {
  switch (expression.kind) {
    case 'number':
    case 'string':
    case 'boolean':
      return expression.value;
    case 'null':
      return null;
    case 'reference':
      return resolve(expression.path, expression.location);
    case 'unary': {
      const operand = evaluate(expression.operand, resolve);
      if (expression.operator === 'not') {
        return !expectBoolean(operand, 'not', expression.location);
      }
      const value = expectNumber(operand, expression.operator, expression.location);
      return expression.operator === '-' ? -value : value;
    }
    case 'binary': {
      const { operator, location } = expression;
      // short-circuit boolean operators before touching the right operand
      if (operator === 'and' || operator === 'or') {
        const left = expectBoolean(evaluate(expression.left, resolve), operator, location);
        if (operator === 'and' ? !left : left) return left;
        return expectBoolean(evaluate(expression.right, resolve), operator, location);
      }
      const left = evaluate(expression.left, resolve);
      const right = evaluate(expression.right, resolve);
      switch (operator) {
        case '==':
          return left === right;
        case '!=':
          return left !== right;
        case '+':
          if (typeof left === 'string' && typeof right === 'string') return left + right;
          return expectNumber(left, operator, location) + expectNumber(right, operator, location);
        case '<':
        case '<=':
        case '>':
        case '>=': {
          if (typeof left === 'string' && typeof right === 'string') {
            return compare(operator, left.localeCompare(right));
          }
          const a = expectNumber(left, operator, location);
          const b = expectNumber(right, operator, location);
          return compare(operator, a - b);
        }
        default: {
          const a = expectNumber(left, operator, location);
          const b = expectNumber(right, operator, location);
          if ((operator === '/' || operator === '%') && b === 0) {
            throw new ExpressionError('Division by zero', location);
          }
          if (operator === '-') return a - b;
          if (operator === '*') return a * b;
          if (operator === '/') return a / b;
          if (operator === '%') return a % b;
          return Math.pow(a, b);
        }
      }
    }
  }
}

function compare(operator: '<' | '<=' | '>' | '>=', difference: number): boolean {
  if (operator === '<') return difference < 0;
  if (operator === '<=') return difference <= 0;
  if (operator === '>') return difference > 0;
  return difference >= 0;
}

/** Every dotted reference inside an expression, in source order. */
export function referencesOf(
  expression: Expression
): Array<{ path: string[]; location: SourceLocation }> {
  switch (expression.kind) {
    case 'reference':
      return [{ path: expression.path, location: expression.location }];
    case 'unary':
      return referencesOf(expression.operand);
    case 'binary':
      return [...referencesOf(expression.left), ...referencesOf(expression.right)];
    default:
      return [];
  }
}

/** Render an expression back to source form (used in messages and listings). */
export function formatExpression(expression: Expression): string {
  switch (expression.kind) {
    case 'number':
      return String(expression.value);
    case 'string':
      return JSON.stringify(expression.value);
    case 'boolean':
      return expression.value ? 'true' : 'false';
    case 'null':
      return 'null';
    case 'reference':
      return expression.path.join('.');
    case 'unary':
      return expression.operator === 'not'
        ? `not ${formatExpression(expression.operand)}`
        : `${expression.operator}${formatExpression(expression.operand)}`;
    case 'binary':
      return `(${formatExpression(expression.left)} ${expression.operator} ${formatExpression(
        expression.right
      )})`;
  }
}
