import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateSystemLogs1760832000000 implements MigrationInterface {

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp";`);

        await queryRunner.query(`
            CREATE TYPE system_logs_log_level_enum AS ENUM ('DEBUG', 'INFO', 'WARN', 'ERROR');
        `);
        await queryRunner.query(`
            CREATE TYPE system_logs_event_type_enum AS ENUM ('SYSTEM_START', 'STATS_REFRESHED', 'STATS_FALLBACK');
        `);

        // Create system_logs table
        await queryRunner.query(`
            CREATE TABLE IF NOT EXISTS system_logs (
                id UUID PRIMARY KEY DEFAULT uuid_generate_v4(),
                log_level system_logs_log_level_enum NOT NULL,
                event_type system_logs_event_type_enum NOT NULL,
                message TEXT NOT NULL,
                component VARCHAR NULL,
                metadata JSONB NULL,
                created_at TIMESTAMP NOT NULL DEFAULT now()
            );
        `);

        await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_system_logs_level_created ON system_logs(log_level, created_at);`);
        await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_system_logs_event_created ON system_logs(event_type, created_at);`);
        await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_system_logs_created_at ON system_logs(created_at);`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP INDEX IF EXISTS idx_system_logs_created_at;`);
        await queryRunner.query(`DROP INDEX IF EXISTS idx_system_logs_event_created;`);
        await queryRunner.query(`DROP INDEX IF EXISTS idx_system_logs_level_created;`);

        await queryRunner.query(`DROP TABLE IF EXISTS system_logs;`);
        await queryRunner.query(`DROP TYPE IF EXISTS system_logs_event_type_enum;`);
        await queryRunner.query(`DROP TYPE IF EXISTS system_logs_log_level_enum;`);
    }

}
