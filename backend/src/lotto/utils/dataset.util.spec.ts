import { FrequencyRecord } from '../interfaces/stats.interface';
import { findDatasetProblems, isCompleteDataset, sortByCount, sortByNumber, summarizeDataset } from './dataset.util';
import { FALLBACK_STATS } from './fallback-stats';

const uniform = (count: number): FrequencyRecord[] =>
  Array.from({ length: 45 }, (_, i) => ({ number: i + 1, count }));

describe('dataset utils', () => {
  describe('findDatasetProblems', () => {
    it('accepts the full 1..45 table', () => {
      expect(findDatasetProblems(uniform(3))).toEqual([]);
      expect(isCompleteDataset(uniform(0))).toBe(true);
    });

    it('reports a missing number and the short length', () => {
      const records = uniform(3).filter((r) => r.number !== 17);

      expect(findDatasetProblems(records)).toEqual(['expected 45 records, got 44', 'missing number: 17']);
    });

    it('reports duplicates, out-of-range numbers and bad counts', () => {
      const records = uniform(3).map((r) => (r.number === 45 ? { number: 44, count: 3 } : r));
      records[0] = { number: 1, count: -2 };
      records[1] = { number: 46, count: 3 };

      expect(findDatasetProblems(records)).toEqual([
        'invalid count for 1: -2',
        'number out of range: 46',
        'duplicate number: 44',
        'missing number: 2',
        'missing number: 45',
      ]);
    });

    it('rejects non-integer counts', () => {
      const records = uniform(3).map((r) => (r.number === 5 ? { number: 5, count: 1.5 } : r));

      expect(findDatasetProblems(records)).toEqual(['invalid count for 5: 1.5']);
    });
  });

  describe('sorting', () => {
    it('sorts by number without touching the input', () => {
      const shuffled = [...FALLBACK_STATS].reverse();
      const sorted = sortByNumber(shuffled);

      expect(sorted.map((r) => r.number)).toEqual(Array.from({ length: 45 }, (_, i) => i + 1));
      expect(shuffled[0].number).toBe(45);
    });

    it('sorts by count descending, ties by lower number', () => {
      const sorted = sortByCount(FALLBACK_STATS);

      expect(sorted.slice(0, 3)).toEqual([
        { number: 34, count: 190 },
        { number: 43, count: 182 },
        { number: 33, count: 178 },
      ]);
      expect(sorted.filter((r) => r.count === 176).map((r) => r.number)).toEqual([12, 40]);
    });
  });

  describe('summarizeDataset', () => {
    it('summarizes the fallback table', () => {
      expect(summarizeDataset(FALLBACK_STATS)).toEqual({
        totalNumbers: 45,
        totalCount: 7350,
        mostFrequent: { number: 34, count: 190 },
        leastFrequent: { number: 9, count: 145 },
      });
    });

    it('breaks ties toward the lower number on both ends', () => {
      const summary = summarizeDataset(uniform(10));

      expect(summary.mostFrequent).toEqual({ number: 1, count: 10 });
      expect(summary.leastFrequent).toEqual({ number: 1, count: 10 });
    });

    it('throws on an empty dataset', () => {
      expect(() => summarizeDataset([])).toThrow('Cannot summarize an empty dataset');
    });
  });
});
