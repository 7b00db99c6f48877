/**
 * Database Migration Runner
 * 
 * Runs SQL migration files in order to set up the star schema.
 * Every statement is idempotent (IF NOT EXISTS), so the runner is safe to
 * invoke at the start of every ingestion run.
 */

import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath, pathToFileURL } from 'url';
import { db } from './client.js';
import { logger } from '../core/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const MIGRATIONS = [
  '001_star_schema.sql',
  '002_indexes.sql'
] as const;

/**
 * Splits a migration file into single statements
 */
export function splitStatements(sql: string): string[] {
  return sql
    .split(/;\s*(?:\r?\n|$)/)
    .map(s => s.trim())
    .filter(s => s.length > 0);
}

/**
 * Runs all migration files in order
 */
export async function runMigrations() {
  // From dist/src/db the .sql files are not emitted, so read them from the source tree
  const isDist = __dirname.includes('/dist/');
  const migrationsDir = isDist
    ? join(process.cwd(), 'src/db/migrations')
    : join(__dirname, 'migrations');

  for (const migrationFile of MIGRATIONS) {
    const migrationPath = join(migrationsDir, migrationFile);
    try {
      const sql = readFileSync(migrationPath, 'utf-8');
      for (const statement of splitStatements(sql)) {
        await db.query(statement);
      }
      logger.info({ migration: migrationFile }, 'Migration applied successfully');
    } catch (err) {
      logger.error({ err, migration: migrationFile }, 'Failed to run migration');
      throw err;
    }
  }

  logger.info('All database migrations completed successfully');
}

// Run migrations if this file is executed directly (not imported)
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  runMigrations()
    .then(() => {
      logger.info('Migrations completed');
      process.exit(0);
    })
    .catch((err) => {
      logger.error({ err }, 'Migration failed');
      process.exit(1);
    });
}
