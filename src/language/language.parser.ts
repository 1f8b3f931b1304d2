import { PipelineSyntaxError, SourceLocation } from '../errors';
import type {
  AliasStatement,
  Argument,
  BinaryOperator,
  Block,
  Call,
  Destination,
  EvalStatement,
  Expression,
  FromStatement,
  JoinStatement,
  PopulationReference,
  Program,
  RepeatStatement,
  Source,
  Statement,
  YieldStatement,
} from './language.ast';
import { describeToken, Token, TokenTag, tokenize } from './language.lexer';

const COMPARISONS: ReadonlyMap<TokenTag, BinaryOperator> = new Map<TokenTag, BinaryOperator>([
  ['LT', '<'],
  ['LE', '<='],
  ['GT', '>'],
  ['GE', '>='],
  ['EQ', '=='],
  ['NE', '!='],
]);

const locationOf = (token: Token): SourceLocation => ({
  line: token.line,
  column: token.column,
});

/**
 * Recursive-descent parser over the token stream produced by {@link tokenize}.
 *
 * The language is keyword-driven, so every decision is made on the current token
 * plus at most one token of lookahead; nothing is ever re-read.
 */
export class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {
    if (tokens.length === 0 || tokens[tokens.length - 1].tag !== 'EOF') {
      throw new Error('Token stream must end with EOF');
    }
  }

  get current(): Token {
    return this.tokens[this.index];
  }

  /** One-token lookahead; stays on EOF once reached. */
  get next(): Token {
    return this.tokens[Math.min(this.index + 1, this.tokens.length - 1)];
  }

  check(tag: TokenTag): boolean {
    return this.current.tag === tag;
  }

  advance(): Token {
    const token = this.current;
    if (token.tag !== 'EOF') this.index++;
    return token;
  }

  accept(tag: TokenTag): Token | undefined {
    return this.check(tag) ? this.advance() : undefined;
  }

  expect(tag: TokenTag, what: string): Token {
    if (!this.check(tag)) this.fail(`Expected ${what}`);
    return this.advance();
  }

  fail(message: string, token: Token = this.current): never {
    throw new PipelineSyntaxError(message, describeToken(token), locationOf(token));
  }

  skipTerminators(): void {
    while (this.accept('EOS'));
  }

  /** A statement ends at a newline, a semicolon or the end of input. */
  endStatement(): void {
    if (this.check('EOF')) return;
    this.expect('EOS', 'end of statement');
  }

  parseProgram(): Program {
    const body: Program['body'] = [];
    this.skipTerminators();
    while (!this.check('EOF')) {
      body.push(this.check('BEGIN') ? this.parseBlock() : this.parseStatement());
      this.skipTerminators();
    }
    return { body };
  }

  parseBlock(): Block {
    const begin = this.expect('BEGIN', 'BEGIN');
    const name = this.expect('NAME', 'a block name').value;
    this.endStatement();
    const body: Statement[] = [];
    this.skipTerminators();
    while (!this.check('END')) {
      if (this.check('BEGIN')) this.fail('Blocks cannot be nested');
      if (this.check('EOF')) this.fail(`Expected END ${name}`);
      body.push(this.parseStatement());
      this.skipTerminators();
    }
    this.advance();
    const closing = this.current;
    if (closing.tag !== 'NAME' || closing.value.toLowerCase() !== name.toLowerCase()) {
      this.fail(`Expected END ${name}`);
    }
    this.advance();
    this.endStatement();
    return { kind: 'block', name, body, location: locationOf(begin) };
  }

  parseStatement(): Statement {
    switch (this.current.tag) {
      case 'FROM':
        return this.parseFrom();
      case 'JOIN':
        return this.parseJoin();
      case 'YIELD':
        return this.parseYield();
      case 'EVAL':
        return this.parseEval();
      case 'REPEAT':
        return this.parseRepeat();
      case 'END':
        return this.fail('END without a matching BEGIN or REPEAT');
      case 'NAME':
        if (this.next.tag === 'ASSIGN') return this.parseAlias();
        return this.fail('Expected a statement');
      default:
        return this.fail('Expected a statement');
    }
  }

  parseFrom(): FromStatement {
    const start = this.expect('FROM', 'FROM');
    const sources: Source[] = [this.parseSource()];
    while (this.accept('COMMA')) sources.push(this.parseSource());

    this.expect('SELECT', 'SELECT');
    const destinations = this.parseDestinations();
    const operators = this.parseOperators();
    this.endStatement();
    return {
      kind: 'from',
      sources,
      destinations,
      operators,
      location: locationOf(start),
    };
  }

  parseJoin(): JoinStatement {
    const start = this.expect('JOIN', 'JOIN');
    const sources = this.parsePopulationList();
    this.expect('INTO', 'INTO');
    const destinations = this.parseDestinations();
    const operators = this.parseOperators();
    this.endStatement();
    return { kind: 'join', sources, destinations, operators, location: locationOf(start) };
  }

  parseAlias(): AliasStatement {
    const targetToken = this.expect('NAME', 'a population name');
    this.expect('ASSIGN', "'='");
    const sourceToken = this.expect('NAME', 'a population name');
    this.endStatement();
    return {
      kind: 'alias',
      target: { name: targetToken.value, location: locationOf(targetToken) },
      source: { name: sourceToken.value, location: locationOf(sourceToken) },
      location: locationOf(targetToken),
    };
  }

  private parseDestinations(): Destination[] {
    const destinations: Destination[] = [this.parseDestination()];
    while (this.check('COMMA')) {
      const previous = destinations[destinations.length - 1];
      if (previous.count === undefined) {
        this.fail('Only the last destination may omit its count');
      }
      this.advance();
      destinations.push(this.parseDestination());
    }
    return destinations;
  }

  private parseOperators(): Call[] {
    const operators: Call[] = [];
    if (this.accept('USING')) {
      operators.push(this.parseCall());
      while (this.accept('COMMA')) operators.push(this.parseCall());
    }
    return operators;
  }

  parseSource(): Source {
    const nameToken = this.current;
    if (this.next.tag === 'LPAREN') {
      return { kind: 'call', call: this.parseCall(), location: locationOf(nameToken) };
    }
    const name = this.expect('NAME', 'a population or generator name').value;
    return { kind: 'population', name, location: locationOf(nameToken) };
  }

  parseDestination(): Destination {
    const start = this.current;
    let count: Expression | undefined;
    if (this.check('NUMBER') || this.check('LPAREN')) {
      count = this.parsePrimary();
    } else if (
      this.check('NAME') &&
      (this.next.tag === 'NAME' || this.next.tag === 'DOT')
    ) {
      count = this.parseReference();
    }
    const name = this.expect('NAME', 'a destination population name').value;
    return { name, count, location: locationOf(start) };
  }

  parseCall(): Call {
    const nameToken = this.expect('NAME', 'an operator name');
    const args: Argument[] = [];
    if (this.accept('LPAREN') && !this.accept('RPAREN')) {
      do {
        const argToken = this.expect('NAME', 'a parameter name');
        if (args.some((arg) => arg.name === argToken.value)) {
          this.fail(`Duplicate argument '${argToken.value}'`, argToken);
        }
        const value: Expression = this.accept('ASSIGN')
          ? this.parseExpression()
          : { kind: 'boolean', value: true, location: locationOf(argToken) };
        args.push({ name: argToken.value, value, location: locationOf(argToken) });
      } while (this.accept('COMMA'));
      this.expect('RPAREN', "')'");
    }
    return { name: nameToken.value, arguments: args, location: locationOf(nameToken) };
  }

  parseYield(): YieldStatement {
    const start = this.expect('YIELD', 'YIELD');
    const populations = this.parsePopulationList();
    this.endStatement();
    return { kind: 'yield', populations, location: locationOf(start) };
  }

  parseEval(): EvalStatement {
    const start = this.expect('EVAL', 'EVAL');
    const populations = this.parsePopulationList();
    const evaluator = this.accept('USING') ? this.parseCall() : undefined;
    this.endStatement();
    return { kind: 'eval', populations, evaluator, location: locationOf(start) };
  }

  parseRepeat(): RepeatStatement {
    const start = this.expect('REPEAT', 'REPEAT');
    const count = this.parseExpression();
    this.endStatement();
    const body: Statement[] = [];
    this.skipTerminators();
    while (!this.check('END')) {
      if (this.check('EOF')) this.fail('Expected END REPEAT');
      if (this.check('BEGIN')) this.fail('Blocks cannot be nested');
      body.push(this.parseStatement());
      this.skipTerminators();
    }
    this.advance();
    if (!this.accept('REPEAT') && !this.check('EOS') && !this.check('EOF')) {
      this.fail('Expected END REPEAT');
    }
    this.endStatement();
    return { kind: 'repeat', count, body, location: locationOf(start) };
  }

  private parsePopulationList(): PopulationReference[] {
    const list: PopulationReference[] = [];
    do {
      const token = this.expect('NAME', 'a population name');
      list.push({ name: token.value, location: locationOf(token) });
    } while (this.accept('COMMA'));
    return list;
  }

  // ---- restricted expressions -------------------------------------------

  parseExpression(): Expression {
    return this.parseOr();
  }

  private parseOr(): Expression {
    let left = this.parseAnd();
    while (this.accept('OR')) {
      left = { kind: 'binary', operator: 'or', left, right: this.parseAnd(), location: left.location };
    }
    return left;
  }

  private parseAnd(): Expression {
    let left = this.parseNot();
    while (this.accept('AND')) {
      left = { kind: 'binary', operator: 'and', left, right: this.parseNot(), location: left.location };
    }
    return left;
  }

  private parseNot(): Expression {
    const token = this.accept('NOT');
    if (token) {
      return { kind: 'unary', operator: 'not', operand: this.parseNot(), location: locationOf(token) };
    }
    return this.parseComparison();
  }

  private parseComparison(): Expression {
    let left = this.parseAdditive();
    let operator = COMPARISONS.get(this.current.tag);
    while (operator) {
      this.advance();
      left = { kind: 'binary', operator, left, right: this.parseAdditive(), location: left.location };
      operator = COMPARISONS.get(this.current.tag);
    }
    return left;
  }

  private parseAdditive(): Expression {
    let left = this.parseMultiplicative();
    while (this.check('ADD') || this.check('SUB')) {
      const operator = this.advance().tag === 'ADD' ? '+' : '-';
      left = { kind: 'binary', operator, left, right: this.parseMultiplicative(), location: left.location };
    }
    return left;
  }

  private parseMultiplicative(): Expression {
    let left = this.parseUnary();
    while (this.check('MUL') || this.check('DIV') || this.check('MOD')) {
      const tag = this.advance().tag;
      const operator = tag === 'MUL' ? '*' : tag === 'DIV' ? '/' : '%';
      left = { kind: 'binary', operator, left, right: this.parseUnary(), location: left.location };
    }
    return left;
  }

  private parseUnary(): Expression {
    if (this.check('SUB') || this.check('ADD')) {
      const token = this.advance();
      return {
        kind: 'unary',
        operator: token.tag === 'SUB' ? '-' : '+',
        operand: this.parseUnary(),
        location: locationOf(token),
      };
    }
    return this.parsePower();
  }

  private parsePower(): Expression {
    const base = this.parsePrimary();
    if (this.accept('POW')) {
      // right-associative, and the exponent may carry its own sign
      return { kind: 'binary', operator: '^', left: base, right: this.parseUnary(), location: base.location };
    }
    return base;
  }

  parsePrimary(): Expression {
    const token = this.current;
    const location = locationOf(token);
    switch (token.tag) {
      case 'NUMBER':
        this.advance();
        return { kind: 'number', value: Number(token.value), location };
      case 'STRING':
        this.advance();
        return { kind: 'string', value: token.value, location };
      case 'TRUE':
      case 'FALSE':
        this.advance();
        return { kind: 'boolean', value: token.tag === 'TRUE', location };
      case 'NULL':
        this.advance();
        return { kind: 'null', location };
      case 'NAME':
        return this.parseReference();
      case 'LPAREN': {
        this.advance();
        const inner = this.parseExpression();
        this.expect('RPAREN', "')'");
        return inner;
      }
      default:
        return this.fail('Expected an expression');
    }
  }

  private parseReference(): Expression {
    const first = this.expect('NAME', 'a name');
    const path = [first.value];
    while (this.accept('DOT')) path.push(this.expect('NAME', 'a name after "."').value);
    return { kind: 'reference', path, location: locationOf(first) };
  }
}

/**
 * Parse a complete system definition.
 *
 * @example
 * ```ts
 * const program = parse(`
 *   FROM random_int(length=4) SELECT 5 population
 *   YIELD population
 * `);
 * ```
 */
export function parse(source: string): Program {
  return new Parser(tokenize(source)).parseProgram();
}

/** Parse text that must contain exactly one restricted expression. */
export function parseExpression(source: string): Expression {
  const parser = new Parser(tokenize(source));
  parser.skipTerminators();
  const expression = parser.parseExpression();
  parser.skipTerminators();
  if (!parser.check('EOF')) parser.fail('Unexpected text after expression');
  return expression;
}
