import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';

import { DatabaseConfig } from './database.config';

export class DatabaseClient {
  private static instance: DatabaseClient | undefined;
  private readonly pool: Pool;

  private constructor(config: DatabaseConfig) {
    this.pool = new Pool(config.toPoolConfig());
  }

  static async initialize(config: DatabaseConfig = DatabaseConfig.fromEnv()): Promise<DatabaseClient> {
    if (!DatabaseClient.instance) {
      const client = new DatabaseClient(config);
      await client.verifyConnection();
      DatabaseClient.instance = client;
    }

    return DatabaseClient.instance;
  }

  static getInstance(): DatabaseClient {
    if (!DatabaseClient.instance) {
      throw new Error('DatabaseClient has not been initialized. Call initialize() first.');
    }

    return DatabaseClient.instance;
  }

  async query<T extends QueryResultRow = QueryResultRow>(
    queryText: string,
    values?: unknown[],
  ): Promise<QueryResult<T>> {
    return this.pool.query<T>(queryText, values);
  }

  async transaction<T>(callback: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');
      const result = await callback(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
    DatabaseClient.instance = undefined;
  }

  private async verifyConnection(): Promise<void> {
    const client = await this.pool.connect();

    try {
      await client.query('SELECT 1');
    } finally {
      client.release();
    }
  }
}
