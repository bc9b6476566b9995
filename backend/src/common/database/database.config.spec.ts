import { buildDataSourceOptions } from './database.config';

describe('buildDataSourceOptions', () => {
  it('falls back to the local defaults', () => {
    expect(buildDataSourceOptions(() => undefined)).toMatchObject({
      type: 'postgres',
      host: 'localhost',
      port: 5432,
      username: 'lotto_user',
      database: 'lotto_picker',
      synchronize: false,
      logging: false,
    });
  });

  it('reads connection settings from the environment', () => {
    const env: Record<string, string> = {
      DATABASE_HOST: 'db.internal',
      DATABASE_PORT: '6543',
      DATABASE_NAME: 'picker_test',
      NODE_ENV: 'development',
    };

    expect(buildDataSourceOptions((key) => env[key])).toMatchObject({
      host: 'db.internal',
      port: 6543,
      database: 'picker_test',
      synchronize: true,
      logging: ['error', 'warn'],
    });
  });
});
