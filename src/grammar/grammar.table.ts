import type { ConfigValue } from '../configuration/configuration.context';
import { GrammarDefinitionError } from '../errors';

/**
 * Validated, immutable production grammar for Grammatical Evolution.
 *
 * A definition maps rule names to production strings. Each production is a
 * space-delimited sequence of double-quoted literals and bare rule references:
 *
 * ```ts
 * const table = new GrammarTable({
 *   '*': ['"def Eval(T): return " Expr'],
 *   Expr: ['TERMINAL', '"(" Expr BinaryOp Expr ")"'],
 *   BinaryOp: ['" and "', '" or "'],
 * });
 * ```
 *
 * The rule `*` is the start rule. The built-in rules listed in
 * {@link BUILTIN_RULES} are supplied by the expander and must not be authored.
 */
export type GrammarDefinition = { readonly [rule: string]: readonly string[] };

export type GrammarToken =
  | { readonly kind: 'literal'; readonly text: string }
  | { readonly kind: 'rule'; readonly name: string };

export type Production = readonly GrammarToken[];

export const START_RULE = '*';

export const BUILTIN_RULES = [
  'TERMINAL',
  'INDENT',
  'INC_INDENT',
  'DEC_INDENT',
  'NEWLINE',
] as const;

export type BuiltinRule = (typeof BUILTIN_RULES)[number];

export function isBuiltinRule(name: string): name is BuiltinRule {
  return (BUILTIN_RULES as readonly string[]).includes(name);
}

/**
 * Split one production string into tokens. Returns an error message instead of
 * tokens when a literal is left unterminated.
 */
export function parseProduction(
  text: string
): { tokens: GrammarToken[] } | { error: string } {
  const tokens: GrammarToken[] = [];
  let literal = false;
  let buffer = '';
  for (const char of text) {
    if (literal) {
      if (char === '"') {
        tokens.push({ kind: 'literal', text: buffer });
        buffer = '';
        literal = false;
      } else buffer += char;
    } else if (char === '"') {
      if (buffer) tokens.push({ kind: 'rule', name: buffer });
      buffer = '';
      literal = true;
    } else if (/\s/.test(char)) {
      if (buffer) tokens.push({ kind: 'rule', name: buffer });
      buffer = '';
    } else buffer += char;
  }
  if (literal) return { error: `unterminated literal "${buffer}` };
  if (buffer) tokens.push({ kind: 'rule', name: buffer });
  return { tokens };
}

function formatProduction(production: Production): string {
  return production
    .map((token) => (token.kind === 'literal' ? `"${token.text}"` : token.name))
    .join(' ');
}

export class GrammarTable {
  static readonly START = START_RULE;

  private readonly rules: ReadonlyMap<string, readonly Production[]>;

  /**
   * Validate and compile a definition. Validation is exhaustive: every problem is
   * collected and reported in a single `GrammarDefinitionError`.
   */
  constructor(definition: GrammarDefinition) {
    const violations: string[] = [];
    const rules = new Map<string, readonly Production[]>();

    if (!Object.prototype.hasOwnProperty.call(definition, START_RULE)) {
      violations.push(`missing start rule '${START_RULE}'`);
    }

    for (const [name, productions] of Object.entries(definition)) {
      if (name.length === 0 || /[\s"']/.test(name)) {
        violations.push(`rule name ${JSON.stringify(name)} contains whitespace or quotes`);
      }
      if (isBuiltinRule(name)) {
        violations.push(`rule '${name}' is built in and cannot be redefined`);
      }
      if (productions.length === 0) {
        violations.push(`rule '${name}' has no productions`);
      }
      const compiled: Production[] = [];
      productions.forEach((text, index) => {
        const parsed = parseProduction(text);
        if ('error' in parsed) {
          violations.push(`rule '${name}' production ${index + 1}: ${parsed.error}`);
        } else compiled.push(parsed.tokens);
      });
      rules.set(name, compiled);
    }

    // Dangling references are checked after every rule is known.
    for (const [name, productions] of rules) {
      productions.forEach((production, index) => {
        const reported = new Set<string>();
        for (const token of production) {
          if (token.kind !== 'rule' || reported.has(token.name)) continue;
          if (!rules.has(token.name) && !isBuiltinRule(token.name)) {
            reported.add(token.name);
            violations.push(
              `rule '${name}' production ${index + 1} references undefined rule '${token.name}'`
            );
          }
        }
      });
    }

    if (violations.length) throw new GrammarDefinitionError(violations);
    this.rules = rules;
  }

  /**
   * Build a table from an untyped configuration value, reporting shape problems
   * (non-mapping, non-list rules, non-string productions) the same way as rule problems.
   */
  static fromValue(value: ConfigValue): GrammarTable {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new GrammarDefinitionError(['grammar must be a mapping of rule names to productions']);
    }
    const violations: string[] = [];
    const definition: { [rule: string]: string[] } = {};
    for (const [name, productions] of Object.entries(value)) {
      if (!Array.isArray(productions)) {
        violations.push(`rule '${name}' must be a list of production strings`);
        continue;
      }
      const strings: string[] = [];
      productions.forEach((production: ConfigValue, index: number) => {
        if (typeof production === 'string') strings.push(production);
        else violations.push(`rule '${name}' production ${index + 1} is not a string`);
      });
      definition[name] = strings;
    }
    if (violations.length) throw new GrammarDefinitionError(violations);
    return new GrammarTable(definition);
  }

  /** Productions of an authored rule, or `undefined` for built-ins and unknown names. */
  productions(name: string): readonly Production[] | undefined {
    return this.rules.get(name);
  }

  has(name: string): boolean {
    return this.rules.has(name);
  }

  get ruleNames(): string[] {
    return [...this.rules.keys()];
  }

  /** BNF-style listing, one rule per paragraph. */
  toString(): string {
    return [...this.rules]
      .map(
        ([name, productions]) =>
          `${name}\n    : ${productions.map(formatProduction).join('\n    | ')}`
      )
      .join('\n\n');
  }
}

/**
 * Validated tables keyed by the (frozen) configuration mapping they came from, so a
 * grammar read from the same context is compiled only once per run.
 */
export class GrammarCache {
  private readonly tables = new WeakMap<object, GrammarTable>();

  get(value: ConfigValue): GrammarTable {
    if (typeof value !== 'object' || value === null) {
      return GrammarTable.fromValue(value);
    }
    let table = this.tables.get(value);
    if (!table) {
      table = GrammarTable.fromValue(value);
      this.tables.set(value, table);
    }
    return table;
  }
}
