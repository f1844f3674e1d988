import { Pool, PoolClient } from 'pg';
import type { DatabaseConfig } from './config';

const INGEST_LOCK_KEY = 0x42545243; // "BTRC" advisory lock key

export const createPool = (config: DatabaseConfig): Pool => new Pool({
  host: config.host,
  port: config.port,
  database: config.name,
  user: config.user,
  password: config.password,
  // Resolve unqualified table names in our schema
  options: `-c search_path=${config.schema},public`,
});

export class DatabaseService {
  private pool: Pool;

  constructor(config: DatabaseConfig) {
    this.pool = createPool(config);

    // Handle pool errors
    this.pool.on('error', (err) => {
      console.error('💥 Unexpected database error:', err);
    });
  }

  /**
   * Test database connection
   */
  async testConnection(): Promise<boolean> {
    try {
      await this.withClient((client) => client.query('SELECT NOW()'));
      return true;
    } catch (error) {
      console.error('❌ Database connection failed:', error);
      return false;
    }
  }

  /**
   * Run `work` on a dedicated connection and hand it back to the pool afterwards.
   */
  async withClient<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await work(client);
    } finally {
      client.release();
    }
  }

  /**
   * Run `work` in a transaction holding the ingestion advisory lock, so at most
   * one writer segments probes at a time. The lock is released on COMMIT/ROLLBACK.
   */
  async withTransaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    return this.withClient(async (client) => {
      await client.query('BEGIN');
      try {
        await client.query('SELECT pg_advisory_xact_lock($1)', [INGEST_LOCK_KEY]);
        const result = await work(client);
        await client.query('COMMIT');
        return result;
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      }
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

export default DatabaseService;
