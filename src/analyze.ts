#!/usr/bin/env node
/**
 * Margin Model - Entry Point
 * 
 * Usage: analyze <gameId> [lagSeconds] [maxDifferential]
 * 
 * Builds the transition-count matrix for a stored game and logs its most
 * frequent transitions.
 */

import { cfg } from './core/config.js';
import { logger } from './core/logger.js';
import { closeDatabase } from './db/client.js';
import { buildMarginModel, topTransitions } from './services/modelService.js';
import { isValidGameId, ValidationError } from './util/validation.js';

function numberArg(value: string | undefined, fallback: number, field: string): number {
  if (value === undefined) return fallback;
  const n = Number(value);
  if (!Number.isFinite(n)) {
    throw new ValidationError(`Invalid ${field}: ${value}`, field);
  }
  return n;
}

async function main(): Promise<void> {
  const [gameId, lagArg, maxArg] = process.argv.slice(2);
  if (!gameId || !isValidGameId(gameId)) {
    throw new ValidationError(`Usage: analyze <gameId> [lagSeconds] [maxDifferential] (got "${gameId ?? ''}")`, 'gameId');
  }
  const lagSeconds = numberArg(lagArg, cfg.model.lagSeconds, 'lagSeconds');
  const maxDifferential = numberArg(maxArg, cfg.model.maxDifferential, 'maxDifferential');

  const model = await buildMarginModel(gameId, { lagSeconds, maxDifferential });
  if (!model) return;

  logger.info({
    gameId,
    durationSeconds: model.series.durationSeconds,
    samples: model.series.length,
    lagSteps: model.matrix.lag,
    transitions: model.matrix.total,
    clamped: model.matrix.clamped,
    top: topTransitions(model.matrix)
  }, 'Margin transition counts');
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
