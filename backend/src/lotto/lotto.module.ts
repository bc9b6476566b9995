import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Agent } from 'undici';
import { readBoolean } from '../common/config/config.util';
import { LOTTO_CONFIG } from './constants/lotto.config';

import { STATS_HTTP_DISPATCHER, StatsFetcherService } from './services/stats/stats-fetcher.service';
import { STATS_SOURCE, StatsProviderService } from './services/stats/stats-provider.service';
import { RANDOM_SOURCE, WeightedDrawService } from './services/draw/weighted-draw.service';
import { StatsEventsListener } from './listeners/stats-events.listener';
import { defaultRandom } from './utils/random.util';

@Module({
  providers: [
    // Stats
    {
      provide: STATS_HTTP_DISPATCHER,
      inject: [ConfigService],
      // STATS_TLS_REJECT_UNAUTHORIZED=false skips certificate validation for reachability
      useFactory: (config: ConfigService) =>
        new Agent({
          connect: {
            rejectUnauthorized: readBoolean(
              config,
              'STATS_TLS_REJECT_UNAUTHORIZED',
              LOTTO_CONFIG.stats.tlsRejectUnauthorized,
            ),
          },
        }),
    },
    StatsFetcherService,
    { provide: STATS_SOURCE, useExisting: StatsFetcherService },
    StatsProviderService,
    StatsEventsListener,

    // Draw
    { provide: RANDOM_SOURCE, useValue: defaultRandom },
    WeightedDrawService,
  ],
  exports: [
    StatsProviderService,
    WeightedDrawService,
  ],
})
export class LottoModule {}
