import type { BoundFrom, BoundStatement } from '../../src/binding/binding.types';
import { config } from '../../src/config';
import {
  BindingError,
  ExpressionError,
  ParameterError,
  PopulationSizeError,
  UnresolvedOperatorError,
  UnresolvedVariableError,
} from '../../src/errors';
import { compile, minimiseSum, oneMax } from '../utils/test-helpers';

function fromAt(statements: readonly BoundStatement[], index: number): BoundFrom {
  const statement = statements[index];
  if (statement.kind !== 'from') throw new Error(`statement ${index} is ${statement.kind}`);
  return statement;
}

describe('Binder', () => {
  describe('resolution', () => {
    it('binds a generator statement', () => {
      // Arrange
      const source = 'FROM random_int(length=4) SELECT 5 population\nYIELD population';
      // Act
      const bound = compile(source);
      // Assert
      expect(bound.populations).toEqual(['population']);
      expect(fromAt(bound.initialization, 0)).toMatchObject({
        output: 'stream',
        bounded: false,
        sources: [{ kind: 'generator', call: { name: 'random_int' } }],
      });
    });

    it('accepts a bare generator name as a source', () => {
      // Arrange
      // Act
      const bound = compile('FROM random_binary SELECT 5 p\nYIELD p');
      // Assert
      expect(fromAt(bound.initialization, 0).sources[0].kind).toBe('generator');
    });

    it('rejects an unknown operator', () => {
      // Arrange
      // Act
      const act = () => compile('FROM a_gen() SELECT 5 p');
      // Assert
      expect(act).toThrow(new UnresolvedOperatorError('a_gen', { line: 1, column: 6 }));
    });

    it('rejects a population used before it is selected', () => {
      // Arrange
      // Act
      const act = () => compile('FROM missing SELECT 5 p');
      // Assert
      expect(act).toThrow("Population 'missing' is used before it is selected (at 1:6)");
    });

    it('accepts host-supplied populations', () => {
      // Arrange
      // Act
      const bound = compile('YIELD seed', { initialPopulations: ['seed'] });
      // Assert
      expect(bound.populations).toEqual(['seed']);
    });

    it('rejects a selector as a source', () => {
      // Arrange
      // Act
      const act = () => compile('FROM best() SELECT 5 p');
      // Assert
      expect(act).toThrow("'best' is not a generator and cannot be a source");
    });

    it('rejects a generator after USING', () => {
      // Arrange
      const source = 'FROM random_binary SELECT 2 p\nFROM p SELECT 2 q USING random_int\nYIELD q';
      // Act
      const act = () => compile(source);
      // Assert
      expect(act).toThrow("Generator 'random_int' cannot be used after USING");
    });
  });

  describe('chain contract', () => {
    it('rejects sources after a generator that never ends', () => {
      // Arrange
      // Act
      const act = () => compile('FROM random_binary, random_int SELECT 5 p');
      // Assert
      expect(act).toThrow(BindingError);
      expect(act).toThrow('Source 2 follows a generator that never ends and would never be read');
    });

    it('rejects a materializing operator over an endless source', () => {
      // Arrange
      // Act
      const act = () => compile('FROM random_binary SELECT 5 p USING best');
      // Assert
      expect(act).toThrow("Operator 'best' reads its whole source, but the source never ends");
    });

    it('requires a count on the last destination of an endless chain', () => {
      // Arrange
      // Act
      const act = () => compile('FROM random_binary SELECT p');
      // Assert
      expect(act).toThrow(PopulationSizeError);
    });

    it('classifies a population-only chain as exact and bounded', () => {
      // Arrange
      const source = 'FROM random_int SELECT 5 p\nFROM p SELECT 5 q\nYIELD q';
      // Act
      const bound = compile(source);
      // Assert
      expect(fromAt(bound.initialization, 1)).toMatchObject({ output: 'exact', bounded: true });
    });

    it('lets select_all keep the upstream contract', () => {
      // Arrange
      const source = 'FROM random_int SELECT 5 p\nFROM p SELECT 5 q USING select_all\nYIELD q';
      // Act
      const bound = compile(source);
      // Assert
      expect(fromAt(bound.initialization, 1)).toMatchObject({ output: 'exact', bounded: true });
    });

    it('makes a tournament with replacement an endless stream', () => {
      // Arrange
      const source = 'FROM random_int SELECT 5 p\nFROM p SELECT 5 q USING tournament\nYIELD q';
      // Act
      const bound = compile(source);
      // Assert
      expect(fromAt(bound.initialization, 1)).toMatchObject({ output: 'stream', bounded: false });
    });

    it('makes a tournament without replacement a bounded stream', () => {
      // Arrange
      const source =
        'FROM random_int SELECT 5 p\nFROM p SELECT q USING tournament(replacement=false)\nYIELD q';
      // Act
      const bound = compile(source);
      // Assert
      expect(fromAt(bound.initialization, 1)).toMatchObject({ output: 'stream', bounded: true });
    });

    it('rejects an uncounted destination after a tournament with replacement', () => {
      // Arrange
      const source = 'FROM random_int SELECT 5 p\nFROM p SELECT q USING tournament\nYIELD q';
      // Act
      const act = () => compile(source);
      // Assert
      expect(act).toThrow("Population 'q' has no count but its source never ends");
    });
  });

  describe('JOIN and aliases', () => {
    const populations = { initialPopulations: ['a', 'b'] };

    it('falls back to full_combine without a joiner', () => {
      // Arrange
      // Act
      const bound = compile('JOIN a, b INTO pairs\nYIELD pairs', populations);
      // Assert
      expect(bound.initialization[0]).toMatchObject({
        kind: 'join',
        joiner: { name: 'full_combine', location: { line: 1, column: 1 } },
        operators: [],
        output: 'exact',
        bounded: true,
      });
    });

    it('takes a leading joiner and chains the operators after it', () => {
      // Arrange
      const source = 'JOIN a, b INTO 3 best USING random_tuples(distinct), best_of_tuple\nYIELD best';
      // Act
      const bound = compile(source, populations);
      // Assert
      expect(bound.initialization[0]).toMatchObject({
        kind: 'join',
        joiner: { name: 'random_tuples' },
        operators: [{ name: 'best_of_tuple' }],
      });
      expect(bound.populations).toEqual(['a', 'b', 'best']);
    });

    it('rejects a joiner in a FROM chain', () => {
      // Arrange
      // Act
      const act = () => compile('FROM a SELECT c USING tuples', populations);
      // Assert
      expect(act).toThrow("Joiner 'tuples' can only be the first operator of a JOIN statement");
    });

    it('rejects a joiner after another operator', () => {
      // Arrange
      // Act
      const act = () => compile('JOIN a, b INTO c USING best_of_tuple, tuples', populations);
      // Assert
      expect(act).toThrow("Joiner 'tuples' can only be the first operator of a JOIN statement");
    });

    it('declares the target of an alias', () => {
      // Arrange
      // Act
      const bound = compile('c = a\nYIELD c', populations);
      // Assert
      expect(bound.initialization[0]).toMatchObject({ kind: 'alias', target: { name: 'c' }, source: { name: 'a' } });
      expect(bound.populations).toEqual(['a', 'b', 'c']);
    });

    it('rejects an alias of an undeclared population', () => {
      // Arrange
      // Act
      const act = () => compile('c = missing');
      // Assert
      expect(act).toThrow("Population 'missing' is used before it is selected (at 1:5)");
    });
  });

  describe('arguments', () => {
    it('rejects unknown parameters', () => {
      // Arrange
      // Act
      const act = () => compile('FROM random_binary(size=3) SELECT 5 p');
      // Assert
      expect(act).toThrow(new ParameterError("Unknown parameter 'size' for operator 'random_binary'", { line: 1, column: 20 }));
    });

    it('rejects a missing required parameter', () => {
      // Arrange
      // Act
      const act = () => compile('FROM random_ge SELECT 5 p');
      // Assert
      expect(act).toThrow("Missing required parameter 'grammar' of operator 'random_ge'");
    });

    it('rejects an argument of the wrong type', () => {
      // Arrange
      // Act
      const act = () => compile('FROM random_int(length="x") SELECT 5 p');
      // Assert
      expect(act).toThrow(`Parameter 'length' of operator 'random_int' expects integer, got "x"`);
    });

    it('type-checks values taken from the operators context section', () => {
      // Arrange
      const configuration = { operators: { random_int: { length: 2.5 } } };
      // Act
      const act = () => compile('FROM random_int SELECT 5 p', { configuration });
      // Assert
      expect(act).toThrow("Parameter 'length' of operator 'random_int' expects integer, got 2.5");
    });

    it('reports check failures as parameter errors', () => {
      // Arrange
      // Act
      const act = () => compile('FROM random_int(lowest=5, highest=3) SELECT 5 p');
      // Assert
      expect(act).toThrow(ParameterError);
      expect(act).toThrow(
        "Invalid arguments for operator 'random_int': highest (3) must not be below lowest (5)"
      );
    });

    it('rejects references to unknown configuration keys', () => {
      // Arrange
      // Act
      const act = () => compile('FROM random_int(length=genome.size) SELECT 5 p');
      // Assert
      expect(act).toThrow(new UnresolvedVariableError('genome.size', 'configuration', { line: 1, column: 24 }));
    });
  });

  describe('counts', () => {
    it('rejects unknown count references', () => {
      // Arrange
      // Act
      const act = () => compile('FROM random_int SELECT size p');
      // Assert
      expect(act).toThrow(UnresolvedVariableError);
    });

    it('rejects negative counts', () => {
      // Arrange
      // Act
      const act = () => compile('FROM random_int SELECT size p', { configuration: { size: -1 } });
      // Assert
      expect(act).toThrow("Count for 'p' must be a finite non-negative number, got -1");
    });

    it('rejects a negative REPEAT count', () => {
      // Arrange
      const source = 'FROM random_int SELECT 2 p\nREPEAT -1\nYIELD p\nEND';
      // Act
      const act = () => compile(source);
      // Assert
      expect(act).toThrow(ExpressionError);
    });
  });

  describe('EVAL', () => {
    const source = 'FROM random_int SELECT 5 p\nEVAL p';

    it('needs a default evaluator without USING', () => {
      // Arrange
      // Act
      const act = () => compile(source);
      // Assert
      expect(act).toThrow('EVAL needs USING <evaluator> when no default evaluator is set');
    });

    it('uses the default evaluator', () => {
      // Arrange
      // Act
      const bound = compile(source, { defaultEvaluator: oneMax });
      // Assert
      expect(bound.initialization[1]).toMatchObject({ kind: 'eval', evaluatorName: undefined });
    });

    it('resolves a named evaluator', () => {
      // Arrange
      // Act
      const bound = compile(`${source} USING sum`, { evaluators: { sum: minimiseSum } });
      // Assert
      expect(bound.initialization[1]).toMatchObject({ evaluator: minimiseSum, evaluatorName: 'sum' });
    });

    it('rejects an unknown evaluator', () => {
      // Arrange
      // Act
      const act = () => compile(`${source} USING sum`);
      // Assert
      expect(act).toThrow(UnresolvedOperatorError);
    });

    it('rejects evaluator arguments', () => {
      // Arrange
      // Act
      const act = () => compile(`${source} USING sum(noise=1)`, { evaluators: { sum: minimiseSum } });
      // Assert
      expect(act).toThrow("Evaluator 'sum' does not take arguments");
    });
  });

  describe('blocks', () => {
    it('keys blocks by lower-case name', () => {
      // Arrange
      const source = 'FROM random_int SELECT 2 p\nBEGIN Generation\nYIELD p\nEND Generation';
      // Act
      const bound = compile(source);
      // Assert
      expect([...bound.blocks.keys()]).toEqual(['generation']);
    });

    it('rejects a block defined twice', () => {
      // Arrange
      const source =
        'FROM random_int SELECT 2 p\nBEGIN extra\nYIELD p\nEND extra\nBEGIN EXTRA\nYIELD p\nEND EXTRA';
      // Act
      const act = () => compile(source);
      // Assert
      expect(act).toThrow("Block 'EXTRA' is defined more than once");
    });

    it('requires a YIELD in the generation block', () => {
      // Arrange
      const source = 'FROM random_int SELECT 2 p\nBEGIN generation\nFROM p SELECT 2 p\nEND generation';
      // Act
      const act = () => compile(source);
      // Assert
      expect(act).toThrow("Block 'generation' must contain a YIELD statement");
    });

    it('accepts a YIELD nested in REPEAT', () => {
      // Arrange
      const source = 'FROM random_int SELECT 2 p\nBEGIN generation\nREPEAT 2\nYIELD p\nEND\nEND generation';
      // Act
      const bound = compile(source);
      // Assert
      expect(bound.blocks.get('generation')?.body[0].kind).toBe('repeat');
    });
  });

  describe('warnings', () => {
    it('warns about populations that are never read', () => {
      // Arrange
      config.warnings = true;
      const spy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      // Act
      compile('FROM random_int SELECT 5 p');
      // Assert
      expect(spy).toHaveBeenCalledWith("Population 'p' is selected but never used (at 1:24)");
      spy.mockRestore();
    });

    it('stays quiet when warnings are off', () => {
      // Arrange
      const spy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      // Act
      compile('FROM random_int SELECT 5 p');
      // Assert
      expect(spy).not.toHaveBeenCalled();
      spy.mockRestore();
    });
  });
});
