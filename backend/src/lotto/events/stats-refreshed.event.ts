import { FetchError } from '../interfaces/fetch-result.interface';
import { SourceStatus } from '../interfaces/stats.interface';

export const STATS_REFRESHED_EVENT = 'stats.refreshed';

/**
 * Event emitted after every stats fetch, live or fallback
 */
export class StatsRefreshedEvent {
  constructor(
    public readonly status: SourceStatus,
    public readonly fetchedAt: number,
    public readonly durationMs: number,
    public readonly failure?: FetchError,
  ) {}
}
