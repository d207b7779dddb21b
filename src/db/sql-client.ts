/**
 * The small SQL surface the repositories need, over pg and sqlite
 */

import { Pool } from 'pg';
import { Database } from 'sqlite';
import { DatabaseClient } from '../config';

export type SqlRow = Record<string, unknown>;

export interface SqlClient {
  readonly dialect: DatabaseClient;

  /** Run a statement and return its rows (empty for writes) */
  query(text: string, params?: unknown[]): Promise<SqlRow[]>;

  /** Run the operation inside BEGIN / COMMIT, rolling back on failure */
  transaction<T>(operation: (client: SqlClient) => Promise<T>): Promise<T>;

  close(): Promise<void>;
}

/**
 * Placeholder for the n-th (1-based) parameter
 */
export function placeholder(dialect: DatabaseClient, index: number): string {
  return dialect === 'postgres' ? `$${index}` : '?';
}

export class PostgresSqlClient implements SqlClient {
  readonly dialect = 'postgres';

  constructor(private readonly pool: Pool) {}

  async query(text: string, params: unknown[] = []): Promise<SqlRow[]> {
    const result = await this.pool.query(text, params);
    return result.rows;
  }

  async transaction<T>(operation: (client: SqlClient) => Promise<T>): Promise<T> {
    const connection = await this.pool.connect();
    const scoped: SqlClient = {
      dialect: this.dialect,
      query: async (text, params = []) => (await connection.query(text, params)).rows,
      transaction: (nested) => nested(scoped),
      close: async () => undefined
    };

    try {
      await connection.query('BEGIN');
      const result = await operation(scoped);
      await connection.query('COMMIT');
      return result;
    } catch (error) {
      await connection.query('ROLLBACK');
      throw error;
    } finally {
      connection.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

export class SqliteSqlClient implements SqlClient {
  readonly dialect = 'sqlite';

  // One connection: transactions run one after another
  private transactionQueue: Promise<void> = Promise.resolve();

  constructor(private readonly db: Database) {}

  async query(text: string, params: unknown[] = []): Promise<SqlRow[]> {
    return this.db.all<SqlRow[]>(text, params);
  }

  transaction<T>(operation: (client: SqlClient) => Promise<T>): Promise<T> {
    const run = this.transactionQueue.then(() => this.runTransaction(operation));
    this.transactionQueue = run.then(() => undefined, () => undefined);
    return run;
  }

  async close(): Promise<void> {
    await this.transactionQueue;
    await this.db.close();
  }

  private async runTransaction<T>(operation: (client: SqlClient) => Promise<T>): Promise<T> {
    const scoped: SqlClient = {
      dialect: this.dialect,
      query: (text, params) => this.query(text, params),
      transaction: (nested) => nested(scoped),
      close: async () => undefined
    };

    await this.db.exec('BEGIN TRANSACTION');
    try {
      const result = await operation(scoped);
      await this.db.exec('COMMIT');
      return result;
    } catch (error) {
      await this.db.exec('ROLLBACK');
      throw error;
    }
  }
}
