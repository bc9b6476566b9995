import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { DatabaseModule } from './common/database/database.module';
import { LoggingModule } from './common/logging/logging.module';
import { LottoModule } from './lotto/lotto.module';
import { ApiModule } from './api/api.module';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),

    // Hourly stats refresh
    ScheduleModule.forRoot(),

    // stats.refreshed -> system log
    EventEmitterModule.forRoot(),

    // Database (system log tier)
    DatabaseModule,

    // Logging
    LoggingModule,

    // Feature modules
    LottoModule,
    ApiModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
