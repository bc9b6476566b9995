import { FetchError, FetchFailureKind, Result } from './fetch-result.interface';

/**
 * Origin of the dataset currently served.
 * Only the presentation layer reads it; sampling never does.
 */
export enum SourceStatus {
  LIVE = 'LIVE',
  FALLBACK = 'FALLBACK',
}

/**
 * How many times a number has been drawn historically
 */
export interface FrequencyRecord {
  readonly number: number;
  readonly count: number;
}

/**
 * Cached unit produced by the stats provider.
 * `records` is always the full 1..45 table, sorted by number.
 */
export interface StatsSnapshot {
  readonly records: readonly FrequencyRecord[];
  readonly status: SourceStatus;
  readonly fetchedAt: number; // epoch ms
  readonly failure?: FetchFailureKind; // FALLBACK only
}

export interface DatasetSummary {
  totalNumbers: number;
  totalCount: number;
  mostFrequent: FrequencyRecord;
  leastFrequent: FrequencyRecord;
}

/**
 * Anything that can produce a parsed frequency table.
 * Live implementation: StatsFetcherService.
 */
export interface StatsSource {
  fetchStats(): Promise<Result<FrequencyRecord[], FetchError>>;
}

/**
 * Current epoch-ms time
 */
export type Clock = () => number;
