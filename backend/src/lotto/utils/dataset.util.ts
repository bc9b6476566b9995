import { DATASET_SIZE, LOTTO_CONFIG } from '../constants/lotto.config';
import { DatasetSummary, FrequencyRecord } from '../interfaces/stats.interface';

/**
 * List every way a dataset breaks the 45-record invariant.
 * Empty list means the dataset is complete.
 */
export function findDatasetProblems(records: readonly FrequencyRecord[]): string[] {
  const problems: string[] = [];
  const { min, max } = LOTTO_CONFIG.numbers;

  if (records.length !== DATASET_SIZE) {
    problems.push(`expected ${DATASET_SIZE} records, got ${records.length}`);
  }

  const seen = new Set<number>();
  for (const record of records) {
    if (!Number.isInteger(record.number) || record.number < min || record.number > max) {
      problems.push(`number out of range: ${record.number}`);
    } else if (seen.has(record.number)) {
      problems.push(`duplicate number: ${record.number}`);
    }
    seen.add(record.number);

    if (!Number.isInteger(record.count) || record.count < 0) {
      problems.push(`invalid count for ${record.number}: ${record.count}`);
    }
  }

  for (let n = min; n <= max; n++) {
    if (!seen.has(n)) problems.push(`missing number: ${n}`);
  }

  return problems;
}

export function isCompleteDataset(records: readonly FrequencyRecord[]): boolean {
  return findDatasetProblems(records).length === 0;
}

export function sortByNumber(records: readonly FrequencyRecord[]): FrequencyRecord[] {
  return [...records].sort((a, b) => a.number - b.number);
}

/**
 * Most frequent first; ties go to the lower number
 */
export function sortByCount(records: readonly FrequencyRecord[]): FrequencyRecord[] {
  return [...records].sort((a, b) => b.count - a.count || a.number - b.number);
}

export function summarizeDataset(records: readonly FrequencyRecord[]): DatasetSummary {
  const byCount = sortByCount(records);
  if (byCount.length === 0) {
    throw new Error('Cannot summarize an empty dataset');
  }

  // least frequent = last in count order, but ties still favor the lower number
  const lowest = byCount[byCount.length - 1].count;
  const leastFrequent = byCount.find((r) => r.count === lowest) ?? byCount[byCount.length - 1];

  return {
    totalNumbers: records.length,
    totalCount: records.reduce((sum, r) => sum + r.count, 0),
    mostFrequent: byCount[0],
    leastFrequent,
  };
}
