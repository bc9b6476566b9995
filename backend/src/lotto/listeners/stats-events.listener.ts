import { Injectable } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { CustomLoggerService } from '../../common/logging/custom-logger.service';
import { SystemEventType } from '../../entities/system-log.entity';
import { STATS_REFRESHED_EVENT, StatsRefreshedEvent } from '../events/stats-refreshed.event';
import { describeFetchError } from '../interfaces/fetch-result.interface';

/**
 * Records every stats refresh as a system event.
 * Fallbacks are warnings and land in the system_logs table.
 */
@Injectable()
export class StatsEventsListener {
  constructor(private readonly logger: CustomLoggerService) {}

  @OnEvent(STATS_REFRESHED_EVENT, { async: true, promisify: true })
  async handleStatsRefreshed(event: StatsRefreshedEvent): Promise<void> {
    if (!event.failure) {
      await this.logger.logSystem({
        level: 'info',
        eventType: SystemEventType.STATS_REFRESHED,
        message: 'Live number statistics refreshed',
        component: 'StatsProvider',
        metadata: { status: event.status, fetchedAt: event.fetchedAt, durationMs: event.durationMs },
      });
      return;
    }

    await this.logger.logSystem({
      level: 'warn',
      eventType: SystemEventType.STATS_FALLBACK,
      message: `Serving fallback statistics: ${describeFetchError(event.failure)}`,
      component: 'StatsProvider',
      metadata: {
        status: event.status,
        failure: event.failure.kind,
        fetchedAt: event.fetchedAt,
        durationMs: event.durationMs,
      },
    });
  }
}
