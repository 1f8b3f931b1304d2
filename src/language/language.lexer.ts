import { PipelineSyntaxError, SourceLocation } from '../errors';

/**
 * Token identification for system definitions.
 *
 * The lexer is a single left-to-right scan. Newlines and `;` both become `EOS`
 * (end-of-statement) tokens; a trailing `\` joins a line with the next one, and
 * `#` / `//` start comments. Keywords are matched case-insensitively.
 */
export type TokenTag =
  | 'FROM'
  | 'JOIN'
  | 'INTO'
  | 'SELECT'
  | 'USING'
  | 'YIELD'
  | 'EVAL'
  | 'BEGIN'
  | 'END'
  | 'REPEAT'
  | 'TRUE'
  | 'FALSE'
  | 'NULL'
  | 'AND'
  | 'OR'
  | 'NOT'
  | 'NAME'
  | 'NUMBER'
  | 'STRING'
  | 'LPAREN'
  | 'RPAREN'
  | 'COMMA'
  | 'DOT'
  | 'ASSIGN'
  | 'ADD'
  | 'SUB'
  | 'MUL'
  | 'DIV'
  | 'MOD'
  | 'POW'
  | 'LT'
  | 'LE'
  | 'GT'
  | 'GE'
  | 'EQ'
  | 'NE'
  | 'EOS'
  | 'EOF';

export interface Token extends SourceLocation {
  tag: TokenTag;
  /** Raw text for names / numbers / punctuation; decoded text for strings. */
  value: string;
}

export const KEYWORDS: ReadonlyMap<string, TokenTag> = new Map<string, TokenTag>([
  ['from', 'FROM'],
  ['join', 'JOIN'],
  ['into', 'INTO'],
  ['select', 'SELECT'],
  ['using', 'USING'],
  ['yield', 'YIELD'],
  ['eval', 'EVAL'],
  ['evaluate', 'EVAL'],
  ['begin', 'BEGIN'],
  ['end', 'END'],
  ['repeat', 'REPEAT'],
  ['true', 'TRUE'],
  ['false', 'FALSE'],
  ['null', 'NULL'],
  ['none', 'NULL'],
  ['and', 'AND'],
  ['or', 'OR'],
  ['not', 'NOT'],
]);

// Longest operators first so `<=` wins over `<`.
const PUNCTUATION: ReadonlyArray<[string, TokenTag]> = [
  ['<=', 'LE'],
  ['>=', 'GE'],
  ['==', 'EQ'],
  ['!=', 'NE'],
  ['(', 'LPAREN'],
  [')', 'RPAREN'],
  [',', 'COMMA'],
  ['.', 'DOT'],
  ['=', 'ASSIGN'],
  ['+', 'ADD'],
  ['-', 'SUB'],
  ['*', 'MUL'],
  ['/', 'DIV'],
  ['%', 'MOD'],
  ['^', 'POW'],
  ['<', 'LT'],
  ['>', 'GT'],
];

const ESCAPES: ReadonlyMap<string, string> = new Map([
  ['n', '\n'],
  ['t', '\t'],
  ['\\', '\\'],
  ['"', '"'],
  ["'", "'"],
]);

const NUMBER_PATTERN = /(?:\d+\.\d*|\.\d+|\d+)(?:[eE][-+]?\d+)?/y;
const NAME_PATTERN = /[A-Za-z_][A-Za-z0-9_]*/y;

/** Describe a token the way syntax errors quote it. */
export function describeToken(token: Token): string {
  if (token.tag === 'EOF') return '<end of input>';
  if (token.tag === 'EOS') return token.value === ';' ? ';' : '<end of line>';
  return token.value;
}

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;
  let line = 1;
  let lineStart = 0;

  const column = (at: number) => at - lineStart + 1;
  const push = (tag: TokenTag, value: string, at: number) =>
    tokens.push({ tag, value, line, column: column(at) });
  const isSpace = (c: string) => c === ' ' || c === '\t' || c === '\r';

  while (index < source.length) {
    const c = source[index];

    if (isSpace(c)) {
      index++;
      continue;
    }

    // comments run to end of line
    if (c === '#' || (c === '/' && source[index + 1] === '/')) {
      while (index < source.length && source[index] !== '\n') index++;
      continue;
    }

    if (c === '\n') {
      push('EOS', '\n', index);
      index++;
      line++;
      lineStart = index;
      continue;
    }

    if (c === ';') {
      push('EOS', ';', index);
      index++;
      continue;
    }

    // line continuation: only whitespace or a comment may follow the backslash
    if (c === '\\') {
      let after = index + 1;
      while (after < source.length && isSpace(source[after])) after++;
      if (source[after] === '#' || (source[after] === '/' && source[after + 1] === '/')) {
        while (after < source.length && source[after] !== '\n') after++;
      }
      if (after >= source.length || source[after] === '\n') {
        index = after + 1;
        line++;
        lineStart = index;
        continue;
      }
      throw new PipelineSyntaxError('Unexpected character', c, {
        line,
        column: column(index),
      });
    }

    if (c === '"' || c === "'") {
      const start = index;
      let text = '';
      index++;
      while (true) {
        if (index >= source.length || source[index] === '\n') {
          throw new PipelineSyntaxError(
            'Unterminated string literal',
            source.slice(start, index),
            { line, column: column(start) }
          );
        }
        const d = source[index];
        if (d === c) {
          index++;
          break;
        }
        if (d === '\\') {
          const escaped = ESCAPES.get(source[index + 1]);
          if (escaped === undefined) {
            throw new PipelineSyntaxError(
              'Unknown escape sequence',
              source.slice(index, index + 2),
              { line, column: column(index) }
            );
          }
          text += escaped;
          index += 2;
          continue;
        }
        text += d;
        index++;
      }
      tokens.push({ tag: 'STRING', value: text, line, column: column(start) });
      continue;
    }

    NUMBER_PATTERN.lastIndex = index;
    const numberMatch = /[0-9.]/.test(c) ? NUMBER_PATTERN.exec(source) : null;
    if (numberMatch) {
      push('NUMBER', numberMatch[0], index);
      index += numberMatch[0].length;
      continue;
    }

    NAME_PATTERN.lastIndex = index;
    const nameMatch = NAME_PATTERN.exec(source);
    if (nameMatch) {
      const word = nameMatch[0];
      push(KEYWORDS.get(word.toLowerCase()) ?? 'NAME', word, index);
      index += word.length;
      continue;
    }

    const punctuation = PUNCTUATION.find(([text]) => source.startsWith(text, index));
    if (punctuation) {
      push(punctuation[1], punctuation[0], index);
      index += punctuation[0].length;
      continue;
    }

    throw new PipelineSyntaxError('Unexpected character', c, {
      line,
      column: column(index),
    });
  }

  push('EOF', '', index);
  return tokens;
}
