import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

export enum SystemEventType {
  SYSTEM_START = 'SYSTEM_START',
  STATS_REFRESHED = 'STATS_REFRESHED',
  STATS_FALLBACK = 'STATS_FALLBACK',
}

@Entity('system_logs')
@Index(['log_level', 'created_at'])
@Index(['event_type', 'created_at'])
export class SystemLog {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({
    type: 'enum',
    enum: LogLevel,
  })
  @Index()
  log_level!: LogLevel;

  @Column({
    type: 'enum',
    enum: SystemEventType,
  })
  @Index()
  event_type!: SystemEventType;

  @Column('text')
  message!: string;

  @Column({ type: 'varchar', nullable: true })
  component!: string | null; // Which component generated this log

  @Column('jsonb', { nullable: true })
  metadata!: Record<string, unknown> | null;

  @CreateDateColumn()
  @Index()
  created_at!: Date;
}
