import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TextDecoder } from 'util';
import { Dispatcher, fetch } from 'undici';
import { readNumber, readString } from '../../../common/config/config.util';
import { getErrorMessage } from '../../../common/utils/error.util';
import { LOTTO_CONFIG } from '../../constants/lotto.config';
import { FetchError, Result, err, ok } from '../../interfaces/fetch-result.interface';
import { FrequencyRecord, StatsSource } from '../../interfaces/stats.interface';
import { parseStatsTable } from './stats-table.parser';

export const STATS_HTTP_DISPATCHER = Symbol('STATS_HTTP_DISPATCHER');

/**
 * Stats Fetcher Service
 * Retrieves the per-number statistics page and parses it.
 * One attempt per call: no retries, the provider falls back instead.
 */
@Injectable()
export class StatsFetcherService implements StatsSource, OnModuleDestroy {
  private readonly logger = new Logger(StatsFetcherService.name);
  private readonly url: string;
  private readonly referer: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly decoder: TextDecoder;

  constructor(
    private readonly configService: ConfigService,
    @Inject(STATS_HTTP_DISPATCHER) private readonly dispatcher: Dispatcher,
  ) {
    const { stats } = LOTTO_CONFIG;
    this.url = readString(this.configService, 'STATS_URL', stats.url);
    this.referer = readString(this.configService, 'STATS_REFERER', stats.referer);
    this.userAgent = readString(this.configService, 'STATS_USER_AGENT', stats.userAgent);
    this.timeoutMs = readNumber(this.configService, 'STATS_TIMEOUT_MS', stats.timeoutMs);

    // Throws RangeError on an unknown label, so a bad STATS_ENCODING fails at startup
    this.decoder = new TextDecoder(readString(this.configService, 'STATS_ENCODING', stats.encoding));
  }

  /**
   * GET the statistics page and decode it with the source's encoding
   */
  async fetchPage(): Promise<Result<string, FetchError>> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(this.url, {
        method: 'GET',
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': LOTTO_CONFIG.stats.acceptLanguage,
          Referer: this.referer,
        },
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });

      if (!response.ok) {
        await response.body?.cancel();
        return err({ kind: 'http-status', status: response.status });
      }

      const bytes = await response.arrayBuffer();
      return ok(this.decoder.decode(bytes));
    } catch (error) {
      const message = controller.signal.aborted
        ? `timed out after ${this.timeoutMs}ms`
        : getErrorMessage(error);
      return err({ kind: 'transport', message });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async fetchStats(): Promise<Result<FrequencyRecord[], FetchError>> {
    this.logger.debug(`Fetching number statistics from ${this.url}`);

    const page = await this.fetchPage();
    if (!page.ok) return page;

    return parseStatsTable(page.value);
  }

  async onModuleDestroy() {
    await this.dispatcher.close();
  }
}
