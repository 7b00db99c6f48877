/**
 * Season Repository
 * 
 * Seasons are immutable once written; re-inserting one is a no-op.
 */

import { db } from '../client.js';
import { logger } from '../../core/logger.js';
import { DatabaseError, toError } from '../../errors/index.js';
import type { UpsertOutcome } from '../types.js';

/**
 * Numeric season id derived from its label
 * 
 * @example
 * seasonIdFromLabel('2022-23') // 22022
 */
export function seasonIdFromLabel(label: string): number {
  return Number(`2${label.slice(0, 4)}`);
}

/**
 * Inserts a season unless it already exists
 */
export async function upsertSeason(
  label: string,
  seasonType: string
): Promise<{ seasonId: number; outcome: UpsertOutcome }> {
  const seasonId = seasonIdFromLabel(label);
  const query = `
    INSERT INTO dim_seasons (season_id, season_label, season_type)
    VALUES ($1, $2, $3)
    ON CONFLICT (season_id) DO NOTHING
    RETURNING season_id
  `;

  try {
    const result = await db.query<{ season_id: number }>(query, [seasonId, label, seasonType]);
    const outcome: UpsertOutcome = result.rows.length > 0 ? 'inserted' : 'duplicate';
    logger.debug({ seasonId, label, outcome }, 'Season upserted');
    return { seasonId, outcome };
  } catch (err) {
    const error = toError(err);
    logger.error({ err, seasonId, label }, 'Failed to upsert season');
    throw new DatabaseError(`Failed to upsert season ${label}: ${error.message}`, 'upsertSeason', error);
  }
}
