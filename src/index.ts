#!/usr/bin/env node
/**
 * Season Ingestion - Main Entry Point
 * 
 * Usage: ingest [season]
 * 
 * Scrapes the given season ("2022-23" when omitted) into the star schema.
 * Re-running resumes where the previous run stopped.
 */

import { logger } from './core/logger.js';
import { closeDatabase } from './db/client.js';
import { runMigrations } from './db/migrate.js';
import { ingestSeason, logReport, seasonFromArgs } from './services/ingestService.js';

async function main(): Promise<void> {
  // Fail before any network or database activity
  const season = seasonFromArgs(process.argv[2]);

  await runMigrations();
  const report = await ingestSeason(season);
  logReport(report);
}

main()
  .then(() => closeDatabase())
  .catch(async (err) => {
    logger.error({ err }, 'Fatal error occurred');
    await closeDatabase().catch((closeErr: unknown) => {
      logger.warn({ err: closeErr }, 'Error closing database connections');
    });
    process.exit(1);
  });
