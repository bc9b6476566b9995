import { Injectable, LoggerService as NestLoggerService } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { winstonLogger } from './logger.config';
import { getErrorMessage } from '../utils/error.util';
import { SystemLog, LogLevel, SystemEventType } from '../../entities/system-log.entity';

type Level = 'error' | 'warn' | 'info' | 'debug';

export interface SystemLogData {
  level: Level;
  message: string;
  eventType: SystemEventType;
  context?: string;
  component?: string;
  metadata?: Record<string, unknown>;
}

const LEVEL_TO_DB: Record<Level, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
};

// Events worth a database row even when they are not errors
const IMPORTANT_SYSTEM_EVENTS: readonly SystemEventType[] = [
  SystemEventType.SYSTEM_START,
  SystemEventType.STATS_FALLBACK,
];

/**
 * Custom Logger Service implementing 3-tier logging:
 * 1. Console - Real-time development monitoring
 * 2. File - Daily rotating JSON log files
 * 3. Database - Important system events only (queryable)
 */
@Injectable()
export class CustomLoggerService implements NestLoggerService {
  constructor(
    @InjectRepository(SystemLog)
    private readonly systemLogRepo: Repository<SystemLog>,
  ) {}

  /**
   * Tier 1 & 2: Log to console and file
   */
  private logToWinston(level: Level, message: string, context?: string, metadata?: Record<string, unknown>) {
    winstonLogger.log({
      level,
      message,
      context,
      ...metadata,
    });
  }

  /**
   * Tier 3: Log system events to database
   */
  async logSystem(data: SystemLogData): Promise<void> {
    const { level, eventType, message, component, metadata, context } = data;

    // Tier 1 & 2: Console and File
    this.logToWinston(level, message, context || 'System', {
      eventType,
      component,
      ...metadata,
    });

    if (!IMPORTANT_SYSTEM_EVENTS.includes(eventType) && level !== 'error') {
      return;
    }

    try {
      await this.systemLogRepo.save({
        log_level: LEVEL_TO_DB[level],
        event_type: eventType,
        message,
        component: component ?? null,
        metadata: metadata ?? null,
      });
    } catch (error) {
      // Stay on winston; logging through this service again could recurse
      winstonLogger.error('Failed to save system log to database', { error: getErrorMessage(error) });
    }
  }

  /**
   * NestJS LoggerService interface implementations
   * These log to console and file only (Tier 1 & 2)
   */
  log(message: string, context?: string) {
    this.logToWinston('info', message, context);
  }

  error(message: string, trace?: string, context?: string) {
    this.logToWinston('error', message, context, { trace });
  }

  warn(message: string, context?: string) {
    this.logToWinston('warn', message, context);
  }

  debug(message: string, context?: string) {
    this.logToWinston('debug', message, context);
  }

  verbose(message: string, context?: string) {
    this.logToWinston('debug', message, context);
  }
}
