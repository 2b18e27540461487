import { PoolConfig } from 'pg';

export interface DatabaseConfigProps {
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly password: string;
  readonly database: string;
  readonly ssl: boolean;
  readonly max: number;
  readonly idleTimeoutMillis: number;
  readonly connectionTimeoutMillis: number;
  readonly queryTimeoutMillis: number;
  readonly applicationName: string;
}

export class DatabaseConfig {
  constructor(private readonly props: DatabaseConfigProps) {}

  static fromEnv(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
    return new DatabaseConfig({
      host: env.POSTGRES_HOST ?? 'localhost',
      port: DatabaseConfig.parseInteger(env.POSTGRES_PORT, 5432, 'POSTGRES_PORT'),
      user: env.POSTGRES_USER ?? 'postgres',
      password: env.POSTGRES_PASSWORD ?? '',
      database: env.POSTGRES_DB ?? 'campsite_bookings',
      ssl: env.POSTGRES_SSL === 'true',
      max: DatabaseConfig.parseInteger(env.POSTGRES_POOL_MAX, 10, 'POSTGRES_POOL_MAX'),
      idleTimeoutMillis: DatabaseConfig.parseInteger(env.POSTGRES_IDLE_TIMEOUT, 30_000, 'POSTGRES_IDLE_TIMEOUT'),
      connectionTimeoutMillis: DatabaseConfig.parseInteger(
        env.POSTGRES_CONNECTION_TIMEOUT,
        5_000,
        'POSTGRES_CONNECTION_TIMEOUT',
      ),
      queryTimeoutMillis: DatabaseConfig.parseInteger(env.POSTGRES_QUERY_TIMEOUT, 10_000, 'POSTGRES_QUERY_TIMEOUT'),
      applicationName: env.POSTGRES_APPLICATION_NAME ?? 'campsite-bookings',
    });
  }

  private static parseInteger(
    value: string | undefined,
    fallback: number,
    key: string,
  ): number {
    if (value === undefined) {
      return fallback;
    }

    const parsed = Number.parseInt(value, 10);

    if (Number.isNaN(parsed)) {
      throw new Error(`Invalid integer value for ${key}: ${value}`);
    }

    return parsed;
  }

  toPoolConfig(): PoolConfig {
    return {
      host: this.props.host,
      port: this.props.port,
      user: this.props.user,
      password: this.props.password,
      database: this.props.database,
      ssl: this.props.ssl || undefined,
      max: this.props.max,
      idleTimeoutMillis: this.props.idleTimeoutMillis,
      connectionTimeoutMillis: this.props.connectionTimeoutMillis,
      query_timeout: this.props.queryTimeoutMillis,
      application_name: this.props.applicationName,
    };
  }

  get database(): string {
    return this.props.database;
  }

  get queryTimeoutMillis(): number {
    return this.props.queryTimeoutMillis;
  }
}
