import {
  ConfigMapping,
  ConfigValue,
  ConfigurationContext,
} from '../configuration/configuration.context';
import { UnresolvedVariableError } from '../errors';
import { evaluate } from './language.expression';
import { tokenize } from './language.lexer';
import { Parser } from './language.parser';

/**
 * Parse a settings override string such as
 *
 * ```text
 * system.size = 50; csv = true
 * pathbase = "results/" + experiment
 * ```
 *
 * into a flat mapping suitable for the `override` layer of a
 * {@link ConfigurationContext}. Right-hand sides are restricted expressions: they
 * may reference keys assigned earlier in the same text or any key of `context`.
 */
export function parseSettings(
  text: string,
  context: ConfigurationContext = new ConfigurationContext()
): ConfigMapping {
  const parser: Parser = new Parser(tokenize(text));
  const assigned = new Map<string, ConfigValue>();

  const resolve = (path: readonly string[], location: { line: number; column: number }) => {
    const key = path.join('.');
    const local = assigned.get(key);
    if (local !== undefined) return local;
    const value = context.get(path);
    if (value === undefined) throw new UnresolvedVariableError(key, 'configuration', location);
    return value;
  };

  parser.skipTerminators();
  while (!parser.check('EOF')) {
    const target = parser.current;
    const key = parser.parsePrimary();
    if (key.kind !== 'reference') parser.fail('Expected a setting name', target);
    parser.expect('ASSIGN', "'='");
    const value = evaluate(parser.parseExpression(), resolve);
    assigned.set(key.path.join('.'), value);
    parser.endStatement();
    parser.skipTerminators();
  }

  return Object.fromEntries(assigned);
}
