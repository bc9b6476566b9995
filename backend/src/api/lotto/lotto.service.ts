import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readNumber } from '../../common/config/config.util';
import { LOTTO_CONFIG } from '../../lotto/constants/lotto.config';
import { DrawBatch } from '../../lotto/interfaces/draw.interface';
import { FetchFailureKind } from '../../lotto/interfaces/fetch-result.interface';
import { DatasetSummary, FrequencyRecord, SourceStatus, StatsSnapshot } from '../../lotto/interfaces/stats.interface';
import { WeightedDrawService } from '../../lotto/services/draw/weighted-draw.service';
import { StatsProviderService } from '../../lotto/services/stats/stats-provider.service';
import { sortByCount, summarizeDataset } from '../../lotto/utils/dataset.util';
import { DrawQueryDto } from './dto/draw-query.dto';
import { StatsSortKey } from './dto/stats-query.dto';

export interface StatsView {
  status: SourceStatus;
  fetchedAt: string;
  failure?: FetchFailureKind;
  records: FrequencyRecord[];
  summary: DatasetSummary;
}

export interface DrawView {
  status: SourceStatus;
  fetchedAt: string;
  smoothing: number;
  results: DrawBatch;
}

/**
 * The two read operations the presentation layer consumes:
 * current dataset (with source status) and a fresh draw batch.
 */
@Injectable()
export class LottoService {
  private readonly logger = new Logger(LottoService.name);
  private readonly smoothing: number;

  constructor(
    private readonly statsProvider: StatsProviderService,
    private readonly drawService: WeightedDrawService,
    private readonly configService: ConfigService,
  ) {
    this.smoothing = readNumber(this.configService, 'DRAW_SMOOTHING', LOTTO_CONFIG.draw.smoothing);
  }

  async getCurrentDataset(sort: StatsSortKey = 'number'): Promise<StatsView> {
    const snapshot = await this.statsProvider.getCurrentDataset();
    return this.toStatsView(snapshot, sort);
  }

  async refreshDataset(sort: StatsSortKey = 'number'): Promise<StatsView> {
    const snapshot = await this.statsProvider.refresh();
    return this.toStatsView(snapshot, sort);
  }

  /**
   * Draw against the current dataset. A DrawPreconditionError here means the
   * provider broke its contract; it is left to propagate.
   */
  async drawBatch(query: DrawQueryDto = {}): Promise<DrawView> {
    const snapshot = await this.statsProvider.getCurrentDataset();
    const smoothing = query.smoothing ?? this.smoothing;

    const results = this.drawService.generate(snapshot.records, {
      numSets: query.numSets,
      pickSize: query.pickSize,
      smoothing,
    });

    this.logger.debug(`Drew ${results.length} sets from ${snapshot.status} stats (smoothing ${smoothing})`);

    return {
      status: snapshot.status,
      fetchedAt: new Date(snapshot.fetchedAt).toISOString(),
      smoothing,
      results,
    };
  }

  private toStatsView(snapshot: StatsSnapshot, sort: StatsSortKey): StatsView {
    const records = sort === 'count' ? sortByCount(snapshot.records) : [...snapshot.records];

    return {
      status: snapshot.status,
      fetchedAt: new Date(snapshot.fetchedAt).toISOString(),
      ...(snapshot.failure ? { failure: snapshot.failure } : {}),
      records,
      summary: summarizeDataset(snapshot.records),
    };
  }
}
