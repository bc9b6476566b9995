import fallbackTable from '../data/fallback-stats.json';
import { FrequencyRecord } from '../interfaces/stats.interface';
import { findDatasetProblems, sortByNumber } from './dataset.util';

function isFrequencyRecord(entry: unknown): entry is FrequencyRecord {
  return (
    typeof entry === 'object' &&
    entry !== null &&
    'number' in entry &&
    'count' in entry &&
    typeof entry.number === 'number' &&
    typeof entry.count === 'number'
  );
}

/**
 * Validate a raw fallback table and freeze it.
 * Throws on anything other than the full 1..45 table, so a broken file fails at startup.
 */
export function loadFallbackStats(table: unknown): readonly FrequencyRecord[] {
  if (!Array.isArray(table)) {
    throw new Error('Fallback stats table must be an array');
  }

  const records: FrequencyRecord[] = [];
  for (const entry of table) {
    if (!isFrequencyRecord(entry)) {
      throw new Error(`Malformed fallback stats entry: ${JSON.stringify(entry)}`);
    }
    records.push(Object.freeze({ number: entry.number, count: entry.count }));
  }

  const problems = findDatasetProblems(records);
  if (problems.length > 0) {
    throw new Error(`Invalid fallback stats table: ${problems.join('; ')}`);
  }

  return Object.freeze(sortByNumber(records));
}

// Approximate historical win counts, used verbatim when the live source fails
export const FALLBACK_STATS: readonly FrequencyRecord[] = loadFallbackStats(fallbackTable);
