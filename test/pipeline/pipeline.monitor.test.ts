import { MultiMonitor, RecordingMonitor } from '../../src/pipeline/pipeline.monitor';
import { genesOf, individuals, integerGenome } from '../utils/test-helpers';

describe('Monitors', () => {
  describe('MultiMonitor', () => {
    it('forwards every callback to each monitor in order', () => {
      // Arrange
      const calls: string[] = [];
      const multi = new MultiMonitor(
        { onGeneration: (generation) => calls.push(`first ${generation}`) },
        { onTerminate: (reason) => calls.push(`second ${reason}`) }
      ).add({ onGeneration: (generation) => calls.push(`third ${generation}`) });
      // Act
      multi.onGeneration(4);
      multi.onTerminate('cancelled');
      multi.onNotify('best', 'size', 1);
      // Assert
      expect(calls).toEqual(['first 4', 'third 4', 'second cancelled']);
    });
  });

  describe('RecordingMonitor', () => {
    it('keeps clones of yielded individuals', () => {
      // Arrange
      const monitor = new RecordingMonitor();
      const population = individuals([integerGenome([1, 2])]);
      // Act
      monitor.onYield('p', population, 0);
      // Assert
      const [record] = monitor.yields;
      expect(record.individuals[0]).not.toBe(population[0]);
      expect(genesOf(record.individuals)).toEqual([[1, 2]]);
    });

    it('finds the most recent yield of a population', () => {
      // Arrange
      const monitor = new RecordingMonitor();
      monitor.onYield('p', individuals([integerGenome([1])]), 0);
      monitor.onYield('q', individuals([integerGenome([2])]), 0);
      monitor.onYield('p', individuals([integerGenome([3])]), 1);
      // Act
      const last = monitor.last('p');
      // Assert
      expect([last?.generation, genesOf(last?.individuals ?? [])]).toEqual([1, [[3]]]);
      expect(monitor.last('r')).toBeUndefined();
    });

    it('records notifications generations and termination', () => {
      // Arrange
      const monitor = new RecordingMonitor();
      const error = new Error('stopped');
      // Act
      monitor.onNotify('tournament', 'k', 3);
      monitor.onGeneration(1);
      monitor.onTerminate('error', error);
      // Assert
      expect(monitor.notifications).toEqual([{ sender: 'tournament', name: 'k', value: 3 }]);
      expect(monitor.generations).toEqual([1]);
      expect(monitor.termination).toEqual({ reason: 'error', error });
    });
  });
});
