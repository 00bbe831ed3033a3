/**
 * Database schema setup
 *
 * Applies schema/init.sql in one transaction. Every statement in the file is
 * idempotent (IF NOT EXISTS), so running it against an existing database is
 * a no-op.
 */

import fs from 'fs';
import path from 'path';
import { createPgDatabase, logger, type Database } from '@ledgerline/shared';

export const SCHEMA_PATH = path.join(__dirname, 'schema', 'init.sql');

/**
 * Split a schema file into statements: `--` comments dropped, split on ';'
 * at end of line.
 */
export function schemaStatements(sql: string): string[] {
  return sql
    .split('\n')
    .filter((line) => !line.trim().startsWith('--'))
    .join('\n')
    .split(/;\s*$/m)
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
}

export async function applySchema(db: Database, sql: string): Promise<number> {
  const statements = schemaStatements(sql);
  await db.transaction(async (tx) => {
    for (const statement of statements) {
      await tx.query(statement);
    }
  });
  logger.info('Database schema applied', { statements: statements.length });
  return statements.length;
}

async function main(): Promise<void> {
  const db = createPgDatabase();
  try {
    await applySchema(db, fs.readFileSync(SCHEMA_PATH, 'utf-8'));
  } finally {
    await db.close();
  }
}

if (require.main === module) {
  main()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error('Schema init failed', error);
      process.exit(1);
    });
}
