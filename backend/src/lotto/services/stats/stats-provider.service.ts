import { Inject, Injectable, Logger, OnModuleInit, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Cron, CronExpression } from '@nestjs/schedule';
import { readBoolean, readNumber } from '../../../common/config/config.util';
import { getErrorMessage } from '../../../common/utils/error.util';
import { LOTTO_CONFIG } from '../../constants/lotto.config';
import { STATS_REFRESHED_EVENT, StatsRefreshedEvent } from '../../events/stats-refreshed.event';
import { FetchError, Result, describeFetchError, err } from '../../interfaces/fetch-result.interface';
import { Clock, FrequencyRecord, SourceStatus, StatsSnapshot, StatsSource } from '../../interfaces/stats.interface';
import { FALLBACK_STATS } from '../../utils/fallback-stats';
import { StatsCache } from './stats-cache';

export const STATS_SOURCE = Symbol('STATS_SOURCE');
export const STATS_CLOCK = Symbol('STATS_CLOCK');

/**
 * Stats Provider Service
 *
 * Serves the number -> win count table: live when the source answers with a
 * complete table, the embedded fallback otherwise. Never rejects.
 * Results (fallback included) are cached for STATS_CACHE_TTL_MS.
 */
@Injectable()
export class StatsProviderService implements OnModuleInit {
  private readonly logger = new Logger(StatsProviderService.name);
  private readonly cache: StatsCache<StatsSnapshot>;
  private readonly scheduledRefresh: boolean;

  constructor(
    @Inject(STATS_SOURCE) private readonly source: StatsSource,
    private readonly configService: ConfigService,
    private readonly eventEmitter: EventEmitter2,
    @Optional() @Inject(STATS_CLOCK) private readonly clock: Clock = () => Date.now(),
  ) {
    const { stats } = LOTTO_CONFIG;
    const ttlMs = readNumber(this.configService, 'STATS_CACHE_TTL_MS', stats.cacheTtlMs);
    this.scheduledRefresh = readBoolean(this.configService, 'STATS_SCHEDULED_REFRESH', stats.scheduledRefresh);
    this.cache = new StatsCache(() => this.fetch(), ttlMs, this.clock);
  }

  async onModuleInit() {
    // Warm the cache so the first request does not wait on the source
    const snapshot = await this.getCurrentDataset();
    this.logger.log(`Stats ready (${snapshot.status}, ${snapshot.records.length} numbers)`);
  }

  /**
   * Fresh-or-cached dataset
   */
  getCurrentDataset(): Promise<StatsSnapshot> {
    return this.cache.getOrRefresh();
  }

  /**
   * Force a new fetch; joins one already in flight
   */
  refresh(): Promise<StatsSnapshot> {
    return this.cache.refresh();
  }

  @Cron(CronExpression.EVERY_HOUR)
  async handleScheduledRefresh() {
    if (!this.scheduledRefresh) return;

    const snapshot = await this.refresh();
    this.logger.debug(`Scheduled stats refresh finished (${snapshot.status})`);
  }

  /**
   * One uncached fetch: live table or fallback, tagged with its source
   */
  async fetch(): Promise<StatsSnapshot> {
    const startedAt = this.clock();

    let result: Result<FrequencyRecord[], FetchError>;
    try {
      result = await this.source.fetchStats();
    } catch (error) {
      result = err({ kind: 'unexpected', message: getErrorMessage(error) });
    }

    const fetchedAt = this.clock();
    let snapshot: StatsSnapshot;

    if (result.ok) {
      snapshot = Object.freeze({
        records: Object.freeze(result.value.map((record) => Object.freeze({ ...record }))),
        status: SourceStatus.LIVE,
        fetchedAt,
      });
      this.logger.log(`Live stats loaded (${snapshot.records.length} numbers)`);
    } else {
      snapshot = Object.freeze({
        records: FALLBACK_STATS,
        status: SourceStatus.FALLBACK,
        fetchedAt,
        failure: result.error.kind,
      });
      this.logger.warn(`Live stats unavailable, serving fallback table: ${describeFetchError(result.error)}`);
    }

    this.eventEmitter.emit(
      STATS_REFRESHED_EVENT,
      new StatsRefreshedEvent(snapshot.status, fetchedAt, fetchedAt - startedAt, result.ok ? undefined : result.error),
    );

    return snapshot;
  }
}
