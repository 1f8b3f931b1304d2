import { boundednessOf, outputOf } from '../../src/methods/methods.types';
import { selection } from '../../src/methods/selection';
import { take } from '../../src/pipeline/pipeline.streams';
import type { Evaluator, Individual } from '../../src/species/species.individual';
import {
  binaryGenome,
  individuals,
  integerGenome,
  minimiseSum,
  operatorContext,
  applyOperator,
} from '../utils/test-helpers';

const fitnesses = (list: Iterable<Individual>) => [...list].map((individual) => individual.fitness);
const first = (list: Iterable<Individual>, count: number) => take(list[Symbol.iterator](), count);

describe('Selection Methods', () => {
  // OneMax fitness 1, 3, 2
  const population = () =>
    individuals([binaryGenome('100'), binaryGenome('111'), binaryGenome('110')]);

  describe('SELECT_ALL', () => {
    it('returns the source unchanged', () => {
      // Arrange
      const source = population();
      // Act
      const selected = [...applyOperator(selection.SELECT_ALL, source, {}, operatorContext())];
      // Assert
      expect(selected).toEqual(source);
    });

    it('preserves the upstream contract', () => {
      // Arrange
      // Act
      const contract = [outputOf(selection.SELECT_ALL, {}), boundednessOf(selection.SELECT_ALL, {})];
      // Assert
      expect(contract).toEqual(['preserving', 'preserving']);
    });
  });

  describe('REPEAT', () => {
    it('cycles through the source', () => {
      // Arrange
      const source = population();
      // Act
      const selected = first(applyOperator(selection.REPEAT, source, {}, operatorContext()), 5);
      // Assert
      expect(selected).toEqual([source[0], source[1], source[2], source[0], source[1]]);
    });

    it('ends immediately on an empty source', () => {
      // Arrange
      // Act
      const selected = [...applyOperator(selection.REPEAT, [], {}, operatorContext())];
      // Assert
      expect(selected).toEqual([]);
    });
  });

  describe('BEST and WORST', () => {
    it('orders fittest first', () => {
      // Arrange
      // Act
      const selected = applyOperator(selection.BEST, population(), { only: false }, operatorContext());
      // Assert
      expect(fitnesses(selected)).toEqual([3, 2, 1]);
    });

    it('orders least fit first', () => {
      // Arrange
      // Act
      const selected = applyOperator(selection.WORST, population(), { only: false }, operatorContext());
      // Assert
      expect(fitnesses(selected)).toEqual([1, 2, 3]);
    });

    it('follows a minimising evaluator', () => {
      // Arrange
      const source = individuals(
        [integerGenome([4]), integerGenome([1]), integerGenome([2])],
        minimiseSum
      );
      // Act
      const selected = applyOperator(selection.BEST, source, { only: false }, operatorContext());
      // Assert
      expect(fitnesses(selected)).toEqual([1, 2, 4]);
    });

    it('repeats the single best forever with only', () => {
      // Arrange
      const source = population();
      // Act
      const selected = first(applyOperator(selection.BEST, source, { only: true }, operatorContext()), 3);
      // Assert
      expect(selected).toEqual([source[1], source[1], source[1]]);
    });

    it('is unbounded only with only', () => {
      // Arrange
      // Act
      const bounded = [
        boundednessOf(selection.BEST, { only: false }),
        boundednessOf(selection.BEST, { only: true }),
      ];
      // Assert
      expect(bounded).toEqual([true, false]);
    });
  });

  describe('YOUNGEST and OLDEST', () => {
    const aged = () => {
      const source = population();
      source.forEach((individual, index) => (individual.birthday = [5, 2, 9][index]));
      return source;
    };

    it('orders latest birthday first', () => {
      // Arrange
      // Act
      const selected = [...applyOperator(selection.YOUNGEST, aged(), { only: false }, operatorContext())];
      // Assert
      expect(selected.map((individual) => individual.birthday)).toEqual([9, 5, 2]);
    });

    it('orders earliest birthday first', () => {
      // Arrange
      // Act
      const selected = [...applyOperator(selection.OLDEST, aged(), { only: false }, operatorContext())];
      // Assert
      expect(selected.map((individual) => individual.birthday)).toEqual([2, 5, 9]);
    });
  });

  describe('TOURNAMENT', () => {
    it('returns every individual once without replacement', () => {
      // Arrange
      const source = population();
      const args = { k: 2, replacement: false, greediness: 1 };
      // Act
      const selected = [...applyOperator(selection.TOURNAMENT, source, args, operatorContext())];
      // Assert
      expect(new Set(selected)).toEqual(new Set(source));
      expect(selected).toHaveLength(3);
    });

    it('keeps producing with replacement', () => {
      // Arrange
      const source = population();
      const args = { k: 2, replacement: true, greediness: 1 };
      // Act
      const selected = first(applyOperator(selection.TOURNAMENT, source, args, operatorContext()), 20);
      // Assert
      expect(selected.every((individual) => source.includes(individual))).toBe(true);
    });

    it('favours the fittest with a large k', () => {
      // Arrange
      const source = population();
      const args = { k: 60, replacement: true, greediness: 1 };
      // Act
      const selected = first(applyOperator(selection.TOURNAMENT, source, args, operatorContext()), 5);
      // Assert
      expect(fitnesses(selected)).toEqual([3, 3, 3, 3, 3]);
    });

    it('rejects k below 2', () => {
      // Arrange
      // Act
      const act = () => selection.TOURNAMENT.check({ k: 1 });
      // Assert
      expect(act).toThrow(new RangeError('k must be at least 2, got 1'));
    });

    it('is bounded only without replacement', () => {
      // Arrange
      // Act
      const bounded = [
        boundednessOf(selection.TOURNAMENT, { replacement: true }),
        boundednessOf(selection.TOURNAMENT, { replacement: false }),
      ];
      // Assert
      expect(bounded).toEqual([false, true]);
    });
  });

  describe('UNIFORM_RANDOM and UNIFORM_SHUFFLE', () => {
    it('draws a permutation without replacement', () => {
      // Arrange
      const source = population();
      // Act
      const selected = [
        ...applyOperator(selection.UNIFORM_RANDOM, source, { replacement: false }, operatorContext()),
      ];
      // Assert
      expect(new Set(selected)).toEqual(new Set(source));
      expect(selected).toHaveLength(3);
    });

    it('shuffles every individual exactly once', () => {
      // Arrange
      const source = population();
      // Act
      const selected = [...applyOperator(selection.UNIFORM_SHUFFLE, source, {}, operatorContext())];
      // Assert
      expect(new Set(selected)).toEqual(new Set(source));
      expect(selected).toHaveLength(3);
    });

    it('repeats the same choices for the same breeding seed', () => {
      // Arrange
      const source = population();
      // Act
      const a = first(applyOperator(selection.UNIFORM_RANDOM, source, { replacement: true }, operatorContext()), 8);
      const b = first(applyOperator(selection.UNIFORM_RANDOM, source, { replacement: true }, operatorContext()), 8);
      // Assert
      expect(b).toEqual(a);
    });
  });

  describe('FITNESS_PROPORTIONAL', () => {
    it('never picks the least fit with replacement', () => {
      // Arrange
      const source = individuals([binaryGenome('00'), binaryGenome('10'), binaryGenome('11')]);
      // Act
      const selected = first(
        applyOperator(selection.FITNESS_PROPORTIONAL, source, { replacement: true }, operatorContext()),
        40
      );
      // Assert
      expect(selected.includes(source[0])).toBe(false);
    });

    it('leaves the least fit for last without replacement', () => {
      // Arrange
      const source = individuals([binaryGenome('00'), binaryGenome('10'), binaryGenome('11')]);
      // Act
      const selected = [
        ...applyOperator(selection.FITNESS_PROPORTIONAL, source, { replacement: false }, operatorContext()),
      ];
      // Assert
      expect(selected[2]).toBe(source[0]);
    });

    it('weights by smaller fitness when minimising', () => {
      // Arrange
      const source = individuals(
        [integerGenome([5]), integerGenome([1]), integerGenome([3])],
        minimiseSum
      );
      // Act
      const selected = first(
        applyOperator(selection.FITNESS_PROPORTIONAL, source, { replacement: true }, operatorContext()),
        40
      );
      // Assert
      expect(selected.includes(source[0])).toBe(false);
    });

    it('keeps weighing a very large population', () => {
      // Arrange
      const source = individuals(Array.from({ length: 200000 }, (_unused, i) => integerGenome([i % 7])));
      // Act
      const selected = first(
        applyOperator(selection.FITNESS_PROPORTIONAL, source, { replacement: true }, operatorContext()),
        3
      );
      // Assert
      expect(selected.map((individual) => individual.genome.genes[0] === 0)).toEqual([false, false, false]);
    });

    it('spaces mu pointers evenly under sus', () => {
      // Arrange
      const source = population();
      // Act
      const selected = first(applyOperator(selection.FITNESS_SUS, source, { mu: 3 }, operatorContext()), 3);
      // Assert
      expect(selected).toEqual([source[1], source[1], source[2]]);
    });

    it('rejects mu below 1', () => {
      // Arrange
      // Act
      const act = () => selection.FITNESS_SUS.check({ mu: 0 });
      // Assert
      expect(act).toThrow(new RangeError('mu must be at least 1, got 0'));
    });

    it('is unbounded under sus even without replacement', () => {
      // Arrange
      const args = { replacement: false, sus: true };
      // Act
      const bounded = boundednessOf(selection.FITNESS_PROPORTIONAL, args);
      // Assert
      expect(bounded).toBe(false);
    });
  });

  describe('RANK_PROPORTIONAL and RANK_SUS', () => {
    it('never picks the least fit at the largest expectation', () => {
      // Arrange
      const source = population();
      // Act
      const selected = first(
        applyOperator(selection.RANK_PROPORTIONAL, source, { expectation: 2 }, operatorContext()),
        40
      );
      // Assert
      expect(selected.includes(source[0])).toBe(false);
    });

    it('never picks the fittest when inverted', () => {
      // Arrange
      const source = population();
      // Act
      const selected = first(
        applyOperator(selection.RANK_PROPORTIONAL, source, { expectation: 2, invert: true }, operatorContext()),
        40
      );
      // Assert
      expect(selected.includes(source[1])).toBe(false);
    });

    it('leaves the least fit for last without replacement', () => {
      // Arrange
      const source = population();
      // Act
      const selected = [
        ...applyOperator(
          selection.RANK_PROPORTIONAL,
          source,
          { expectation: 2, replacement: false },
          operatorContext()
        ),
      ];
      // Assert
      expect(selected[2]).toBe(source[0]);
    });

    it('visits every rank once per turn with equal weights', () => {
      // Arrange
      const source = population();
      // Act
      const selected = first(
        applyOperator(selection.RANK_SUS, source, { expectation: 1, mu: 3 }, operatorContext()),
        6
      );
      // Assert
      expect(selected).toEqual([source[1], source[2], source[0], source[1], source[2], source[0]]);
    });

    it('rejects an expectation outside [1, 2]', () => {
      // Arrange
      // Act
      const act = () => selection.RANK_PROPORTIONAL.check({ expectation: 2.5 });
      // Assert
      expect(act).toThrow(new RangeError('expectation must be within [1, 2], got 2.5'));
    });
  });

  describe('UNIQUE', () => {
    it('keeps the first individual of each phenotype', () => {
      // Arrange
      const source = individuals([binaryGenome('10'), binaryGenome('10'), binaryGenome('01')]);
      // Act
      const selected = [...applyOperator(selection.UNIQUE, source, {}, operatorContext())];
      // Assert
      expect(selected).toEqual([source[0], source[2]]);
    });
  });

  describe('LEGAL and ILLEGAL', () => {
    const noThrees: Evaluator = {
      evaluate: (individual) => individual.genome.genes[0],
      legal: (individual) => individual.genome.genes[0] !== 3,
    };
    const mixed = () =>
      individuals([integerGenome([1]), integerGenome([12]), integerGenome([3])], noThrees);

    it('keeps individuals within range that the evaluator accepts', () => {
      // Arrange
      const source = mixed();
      // Act
      const selected = [...applyOperator(selection.LEGAL, source, {}, operatorContext())];
      // Assert
      expect(selected).toEqual([source[0]]);
    });

    it('keeps out-of-range and rejected individuals', () => {
      // Arrange
      const source = mixed();
      // Act
      const selected = [...applyOperator(selection.ILLEGAL, source, {}, operatorContext())];
      // Assert
      expect(selected).toEqual([source[1], source[2]]);
    });
  });
});
