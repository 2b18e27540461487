import { DatabaseConfig } from './database.config';

describe('DatabaseConfig', () => {
  it('falls back to local defaults', () => {
    const pool = DatabaseConfig.fromEnv({}).toPoolConfig();

    expect(pool).toMatchObject({
      host: 'localhost',
      port: 5432,
      database: 'campsite_bookings',
      ssl: undefined,
      max: 10,
      query_timeout: 10_000,
      application_name: 'campsite-bookings',
    });
  });

  it('reads the POSTGRES_ variables', () => {
    const config = DatabaseConfig.fromEnv({
      POSTGRES_HOST: 'db.internal',
      POSTGRES_PORT: '6543',
      POSTGRES_PASSWORD: 'test-secret',
      POSTGRES_SSL: 'true',
      POSTGRES_QUERY_TIMEOUT: '2500',
    });

    expect(config.queryTimeoutMillis).toBe(2500);
    expect(config.toPoolConfig()).toMatchObject({ host: 'db.internal', port: 6543, password: 'test-secret', ssl: true });
  });

  it('rejects a non-numeric port', () => {
    expect(() => DatabaseConfig.fromEnv({ POSTGRES_PORT: 'five' })).toThrow('Invalid integer value for POSTGRES_PORT: five');
  });
});
