import { findDatasetProblems } from './dataset.util';
import { FALLBACK_STATS, loadFallbackStats } from './fallback-stats';

const countOf = (number: number) => FALLBACK_STATS.find((r) => r.number === number)?.count;

describe('fallback stats', () => {
  it('holds exactly the 45 numbers with non-negative integer counts', () => {
    expect(FALLBACK_STATS).toHaveLength(45);
    expect(findDatasetProblems(FALLBACK_STATS)).toEqual([]);
    expect(FALLBACK_STATS.map((r) => r.number)).toEqual(Array.from({ length: 45 }, (_, i) => i + 1));
  });

  it('matches its documented literal values', () => {
    expect(countOf(34)).toBe(190);
    expect(countOf(9)).toBe(145);
    expect(countOf(1)).toBe(172);
    expect(countOf(45)).toBe(168);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(FALLBACK_STATS)).toBe(true);
    expect(Object.isFrozen(FALLBACK_STATS[0])).toBe(true);
  });

  describe('loadFallbackStats', () => {
    const table = Array.from({ length: 45 }, (_, i) => ({ number: 45 - i, count: 7 }));

    it('sorts a valid table by number', () => {
      const records = loadFallbackStats(table);

      expect(records[0]).toEqual({ number: 1, count: 7 });
      expect(records[44]).toEqual({ number: 45, count: 7 });
    });

    it('rejects a non-array', () => {
      expect(() => loadFallbackStats({ numbers: [] })).toThrow('Fallback stats table must be an array');
    });

    it('rejects a malformed entry', () => {
      expect(() => loadFallbackStats([...table.slice(1), { number: '1', count: 7 }])).toThrow(
        'Malformed fallback stats entry: {"number":"1","count":7}',
      );
    });

    it('rejects a short table', () => {
      expect(() => loadFallbackStats(table.slice(1))).toThrow(
        'Invalid fallback stats table: expected 45 records, got 44; missing number: 45',
      );
    });

    it('rejects a negative count', () => {
      const broken = table.map((r) => (r.number === 3 ? { number: 3, count: -1 } : r));

      expect(() => loadFallbackStats(broken)).toThrow('Invalid fallback stats table: invalid count for 3: -1');
    });
  });
});
