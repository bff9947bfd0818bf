import fs from 'fs/promises';
import pg from 'pg';
import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors.js';

dotenv.config();

const { Pool } = pg;

/**
 * PostgreSQL Database Configuration
 *
 * System of record for judgments, chunks, embeddings and pipeline
 * checkpoints. Stage writes go through withTransaction so a judgment's output
 * and its status change land together.
 */
export class DatabaseConfig {
  private static pool: pg.Pool | null = null;

  /**
   * Get required environment variables
   */
  static getConfig() {
    const host = process.env.PGHOST;
    const user = process.env.PGUSER;
    const database = process.env.PGDATABASE || process.env.POSTGRES_DB;

    if (!host || !user || !database) {
      throw new ConfigurationError(
        'Missing required database configuration. ' +
          'Please ensure PGHOST, PGUSER and PGDATABASE are set in .env'
      );
    }

    return {
      host,
      port: parseInt(process.env.PGPORT || '5432', 10),
      user,
      password: process.env.PGPASSWORD,
      database,
    };
  }

  /**
   * Get or create the PostgreSQL connection pool
   */
  static getPool(): pg.Pool {
    if (!this.pool) {
      const config = this.getConfig();
      this.pool = new Pool({
        ...config,
        // Stages run one item at a time; a handful of connections is plenty
        max: 10,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 30000,
      });

      console.log(`📊 Database pool initialized: ${config.user}@${config.host}:${config.port}/${config.database}`);
    }

    return this.pool;
  }

  /**
   * Execute a query and return its rows
   */
  static async query<T extends pg.QueryResultRow>(
    text: string,
    params: unknown[] = []
  ): Promise<T[]> {
    const result = await this.getPool().query<T>(text, params);
    return result.rows;
  }

  /**
   * Run `fn` inside BEGIN/COMMIT on one pooled client; ROLLBACK on error
   */
  static async withTransaction<T>(fn: (client: pg.PoolClient) => Promise<T>): Promise<T> {
    const client = await this.getPool().connect();
    try {
      await client.query('BEGIN');
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  /**
   * Apply a SQL file (used by `init-db` with sql/schema.sql)
   */
  static async applySqlFile(filePath: string): Promise<void> {
    const sql = await fs.readFile(filePath, 'utf-8');
    await this.getPool().query(sql);
  }

  /**
   * Test database connection
   */
  static async testConnection(): Promise<boolean> {
    try {
      const rows = await this.query<{ now: Date }>('SELECT NOW() as now');
      console.log('✅ Database connection successful:', rows[0]?.now);
      return true;
    } catch (error) {
      console.error('❌ Database connection failed:', error);
      return false;
    }
  }

  /**
   * Validate database configuration without opening a pool
   */
  static validate(): boolean {
    try {
      this.getConfig();
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Close the connection pool
   * Should be called when shutting down the application
   */
  static async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      console.log('🔌 Database pool closed');
    }
  }
}
