import { DataSource, DataSourceOptions } from 'typeorm';
import { config } from 'dotenv';
import { SystemLog } from '../../entities/system-log.entity';

config();

type EnvReader = (key: string) => string | undefined;

/**
 * Postgres options for the system_logs tier. The app reads through
 * ConfigService; the TypeORM CLI reads process.env directly.
 */
export function buildDataSourceOptions(read: EnvReader): DataSourceOptions {
  const development = read('NODE_ENV') === 'development';

  return {
    type: 'postgres',
    host: read('DATABASE_HOST') || 'localhost',
    port: parseInt(read('DATABASE_PORT') || '5432', 10),
    username: read('DATABASE_USER') || 'lotto_user',
    password: read('DATABASE_PASSWORD') || 'lotto_password',
    database: read('DATABASE_NAME') || 'lotto_picker',
    entities: [SystemLog],
    migrations: ['dist/migrations/*.js'],
    synchronize: development,
    logging: development ? ['error', 'warn'] : false,
    extra: {
      // Only the logger writes here
      max: 3,
      min: 1,
      idleTimeoutMillis: 30000,
    },
  };
}

// Entry point for `typeorm migration:run -d`
const dataSource = new DataSource(buildDataSourceOptions((key) => process.env[key]));

export default dataSource;
