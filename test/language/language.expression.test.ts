import type { ConfigValue } from '../../src/configuration/configuration.context';
import { ExpressionError } from '../../src/errors';
import { evaluate, formatExpression, referencesOf } from '../../src/language/language.expression';
import { parseExpression } from '../../src/language/language.parser';

function run(text: string, variables: { [name: string]: ConfigValue } = {}): ConfigValue {
  return evaluate(parseExpression(text), (path) => {
    const key = path.join('.');
    if (!(key in variables)) throw new Error(`unexpected lookup of ${key}`);
    return variables[key];
  });
}

describe('Restricted expressions', () => {
  describe('arithmetic', () => {
    it.each([
      ['1 + 2 * 3', 7],
      ['(1 + 2) * 3', 9],
      ['7 % 3', 1],
      ['2 ^ 3 ^ 2', 512],
      ['-2 ^ 2', -4],
      ['2 ^ -1', 0.5],
      ['10 / 4', 2.5],
    ])('evaluates %s to %d', (text, expected) => {
      // Arrange
      // Act
      const value = run(text);
      // Assert
      expect(value).toBe(expected);
    });

    it('resolves dotted references', () => {
      // Arrange
      const variables = { 'system.size': 10 };
      // Act
      const value = run('system.size * 2', variables);
      // Assert
      expect(value).toBe(20);
    });

    it('concatenates strings with +', () => {
      // Arrange
      // Act
      const value = run('"results/" + name', { name: 'run1' });
      // Assert
      expect(value).toBe('results/run1');
    });

    it('rejects division by zero', () => {
      // Arrange
      // Act
      const act = () => run('1 / 0');
      // Assert
      expect(act).toThrow(new ExpressionError('Division by zero', { line: 1, column: 1 }));
    });

    it('rejects mixed operand types', () => {
      // Arrange
      // Act
      const act = () => run('1 + true');
      // Assert
      expect(act).toThrow("Operator '+' expects numbers, got boolean");
    });
  });

  describe('comparison and logic', () => {
    it.each([
      ['3 >= 3', true],
      ['1 == 1.0', true],
      ['"b" < "a"', false],
      ['not true or false', false],
      ['1 < 2 and 2 < 3', true],
      ['null == null', true],
    ])('evaluates %s to %s', (text, expected) => {
      // Arrange
      // Act
      const value = run(text);
      // Assert
      expect(value).toBe(expected);
    });

    it('short-circuits and without resolving the right side', () => {
      // Arrange
      // Act
      const value = run('false and missing');
      // Assert
      expect(value).toBe(false);
    });

    it('requires booleans for not', () => {
      // Arrange
      // Act
      const act = () => run('not 1');
      // Assert
      expect(act).toThrow("Operator 'not' expects booleans, got number");
    });
  });

  describe('referencesOf', () => {
    it('lists every reference in source order', () => {
      // Arrange
      const expression = parseExpression('a.b + c * a.b');
      // Act
      const paths = referencesOf(expression).map((reference) => reference.path);
      // Assert
      expect(paths).toEqual([['a', 'b'], ['c'], ['a', 'b']]);
    });
  });

  describe('formatExpression', () => {
    it('renders operators with explicit grouping', () => {
      // Arrange
      const expression = parseExpression('-(a + 1) * 2');
      // Act
      const text = formatExpression(expression);
      // Assert
      expect(text).toBe('(-(a + 1) * 2)');
    });

    it('renders not and string literals', () => {
      // Arrange
      const expression = parseExpression('not x == "y"');
      // Act
      const text = formatExpression(expression);
      // Assert
      expect(text).toBe('not (x == "y")');
    });
  });
});
