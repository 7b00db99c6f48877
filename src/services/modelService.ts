/**
 * Model Service
 * 
 * Builds the score-margin Markov model for one stored game:
 * stored events → dense 0.1 s series → lagged transition counts.
 */

import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { getPlayEvents, toScoredEvents } from './queryService.js';
import { reconstructSeries, type ReconstructedSeries } from '../model/timeSeries.js';
import {
  estimateTransitionMatrix,
  lagSecondsToSteps,
  type OutOfRangePolicy,
  type TransitionMatrix
} from '../model/transitionMatrix.js';

export interface MarginModelOptions {
  lagSeconds?: number;
  maxDifferential?: number;
  outOfRange?: OutOfRangePolicy;
}

export interface MarginModel {
  gameId: string;
  series: ReconstructedSeries;
  matrix: TransitionMatrix;
}

export interface TransitionCount {
  from: number; // margin
  to: number; // margin
  count: number;
}

/**
 * Builds the model for a game
 * 
 * @returns null when the game has no stored play-by-play
 */
export async function buildMarginModel(gameId: string, options: MarginModelOptions = {}): Promise<MarginModel | null> {
  const rows = await getPlayEvents(gameId);
  if (rows.length === 0) {
    logger.warn({ gameId }, 'No play-by-play stored for game');
    return null;
  }

  const lag = lagSecondsToSteps(options.lagSeconds ?? cfg.model.lagSeconds);
  const maxDifferential = options.maxDifferential ?? cfg.model.maxDifferential;

  const series = reconstructSeries(toScoredEvents(rows));
  const matrix = estimateTransitionMatrix(series, lag, maxDifferential, { outOfRange: options.outOfRange });

  logger.debug({ gameId, events: rows.length, samples: series.length, lag, transitions: matrix.total }, 'Margin model built');
  return { gameId, series, matrix };
}

/**
 * Most frequent transitions, largest count first
 */
export function topTransitions(matrix: TransitionMatrix, limit = 10): TransitionCount[] {
  const cells: TransitionCount[] = [];
  matrix.counts.forEach((row, i) => {
    row.forEach((count, j) => {
      if (count > 0) {
        cells.push({ from: i - matrix.maxDifferential, to: j - matrix.maxDifferential, count });
      }
    });
  });
  return cells.sort((a, b) => b.count - a.count || a.from - b.from || a.to - b.to).slice(0, limit);
}
