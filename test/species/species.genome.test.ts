import { GrammarTable } from '../../src/grammar/grammar.table';
import {
  clampGene,
  formatGenome,
  genesInRange,
  GeneGenome,
  Genome,
  joinedGenome,
  phenotypeOf,
  withGenes,
} from '../../src/species/species.genome';
import { individuals } from '../utils/test-helpers';

describe('Genomes', () => {
  const integer: GeneGenome = { kind: 'integer', genes: [1, 2, 3], lowest: 0, highest: 5 };
  const real: GeneGenome = { kind: 'real', genes: [0.5], lowest: -1, highest: 1 };
  const binary: GeneGenome = { kind: 'binary', genes: [1, 0, 1] };

  describe('withGenes', () => {
    it('keeps kind and bounds', () => {
      // Arrange
      // Act
      const copy = withGenes(integer, [4, 4]);
      // Assert
      expect(copy).toEqual({ kind: 'integer', genes: [4, 4], lowest: 0, highest: 5 });
    });

    it('leaves the original genome untouched', () => {
      // Arrange
      // Act
      withGenes(integer, [0]);
      // Assert
      expect(integer.genes).toEqual([1, 2, 3]);
    });
  });

  describe('clampGene', () => {
    it.each([
      [integer, 7.6, 5],
      [integer, -2, 0],
      [integer, 2.4, 2],
      [real, 1.5, 1],
      [real, -0.25, -0.25],
      [binary, 0.3, 1],
      [binary, 0, 0],
    ])('clamps into the %o range (%d -> %d)', (genome, value, expected) => {
      // Arrange
      // Act
      const clamped = clampGene(genome, value);
      // Assert
      expect(clamped).toBe(expected);
    });
  });

  describe('phenotypeOf', () => {
    it('expands grammar genomes to text', () => {
      // Arrange
      const genome: Genome = {
        kind: 'ge',
        genes: [4],
        lowest: 0,
        highest: 255,
        grammar: new GrammarTable({ '*': ['"A" X'], X: ['"1"', '"2"', '"3"'] }),
      };
      // Act
      const phenotype = phenotypeOf(genome);
      // Assert
      expect(phenotype).toBe('A2');
    });

    it('returns the genes of other genomes', () => {
      // Arrange
      // Act
      const phenotype = phenotypeOf(integer);
      // Assert
      expect(phenotype).toEqual([1, 2, 3]);
    });
  });

  describe('formatGenome', () => {
    it('prints binary genomes as a bit string', () => {
      // Arrange
      // Act
      const text = formatGenome(binary);
      // Assert
      expect(text).toBe('101');
    });

    it('prints other genomes as a list', () => {
      // Arrange
      // Act
      const text = formatGenome(integer);
      // Assert
      expect(text).toBe('[1, 2, 3]');
    });

    it('prints joined genomes as their members in braces', () => {
      // Arrange
      const genome = joinedGenome(individuals([binary, integer]), ['a', 'b']);
      // Act
      const text = formatGenome(genome);
      // Assert
      expect([text, phenotypeOf(genome)]).toEqual(['{101, [1, 2, 3]}', '{101, [1, 2, 3]}']);
    });
  });

  describe('genesInRange', () => {
    it.each<[string, Genome, boolean]>([
      ['an integer genome within bounds', integer, true],
      ['an integer gene above highest', { kind: 'integer', genes: [6], lowest: 0, highest: 5 }, false],
      ['a fractional integer gene', { kind: 'integer', genes: [1.5], lowest: 0, highest: 5 }, false],
      ['a real gene at highest', { kind: 'real', genes: [1], lowest: -1, highest: 1 }, false],
      ['a binary gene of 2', { kind: 'binary', genes: [1, 2] }, false],
    ])('checks %s', (_name, genome, expected) => {
      // Arrange
      // Act
      const legal = genesInRange(genome);
      // Assert
      expect(legal).toBe(expected);
    });

    it('requires every member of a joined genome to be in range', () => {
      // Arrange
      const members = individuals([integer, { kind: 'integer', genes: [9], lowest: 0, highest: 5 }]);
      // Act
      const legal = genesInRange(joinedGenome(members, ['a', 'b']));
      // Assert
      expect(legal).toBe(false);
    });
  });
});
