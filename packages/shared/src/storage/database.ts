/**
 * Postgres access shared by the persistence worker and the query API.
 *
 * Services depend on the narrow Database interface; the pg-backed
 * implementation is created once per process.
 */

import { Pool, type PoolClient } from 'pg';
import { config } from '../config';
import { logger } from '../logger';

export interface QueryRows {
  rows: unknown[];
  rowCount: number | null;
}

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryRows>;
}

export interface Database extends Queryable {
  /** Run fn inside BEGIN/COMMIT; rolls back and rethrows on error */
  transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

function clientQueryable(client: PoolClient): Queryable {
  return {
    query: (text, values) => client.query(text, values),
  };
}

export function createPgDatabase(connectionString: string = config.databaseUrl): Database {
  const pool = new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
  });

  return {
    query: (text, values) => pool.query(text, values),

    async transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
      const client = await pool.connect();
      try {
        await client.query('BEGIN');
        const result = await fn(clientQueryable(client));
        await client.query('COMMIT');
        return result;
      } catch (error) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackError) {
          logger.error('Rollback failed', rollbackError);
        }
        throw error;
      } finally {
        client.release();
      }
    },

    close: () => pool.end(),
  };
}

// ============================================================================
// Row helpers
// ============================================================================

export type DbRow = Record<string, unknown>;

export function isRow(value: unknown): value is DbRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** NUMERIC columns arrive as strings from pg */
export function numericColumn(row: DbRow, column: string): number {
  const value = row[column];
  const n = typeof value === 'number' ? value : Number(value);
  if (!Number.isFinite(n)) {
    throw new Error(`Column ${column} is not numeric: ${String(value)}`);
  }
  return n;
}

export function textColumn(row: DbRow, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new Error(`Column ${column} is not text`);
  }
  return value;
}
