import { Module, Global } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CustomLoggerService } from './custom-logger.service';
import { SystemLog } from '../../entities/system-log.entity';

/**
 * Global so every module can record system events without importing it.
 * Needs DatabaseModule for the system_logs repository.
 */
@Global()
@Module({
  imports: [TypeOrmModule.forFeature([SystemLog])],
  providers: [CustomLoggerService],
  exports: [CustomLoggerService],
})
export class LoggingModule {}
