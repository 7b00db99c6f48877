/**
 * Play-by-Play Repository
 * 
 * Append-only fact rows keyed by (game_id, eventnum). A row that already
 * exists comes back as a 'duplicate' outcome; a row that fails for any other
 * reason is logged with its key and the rest of the batch still goes in.
 */

import { db } from '../client.js';
import { logger } from '../../core/logger.js';
import { DatabaseError, toError } from '../../errors/index.js';
import type { UpsertOutcome } from '../types.js';
import type { PlayEvent } from '../../types/source.js';

export interface BatchInsertResult {
  inserted: number;
  duplicate: number;
  failed: Array<{ eventNum: number; error: string }>;
}

/**
 * Inserts one event unless its key already exists
 */
export async function insertPlayEvent(event: PlayEvent): Promise<UpsertOutcome> {
  const query = `
    INSERT INTO fact_play_by_play (
      game_id, eventnum, period, pctimestring, score, scoremargin,
      away_pts_change, home_pts_change, homedescription, visitordescription,
      event_type, event_subtype
    ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
    ON CONFLICT (game_id, eventnum) DO NOTHING
    RETURNING eventnum
  `;

  try {
    const result = await db.query<{ eventnum: number }>(query, [
      event.gameId,
      event.eventNum,
      event.period,
      event.clock,
      event.score,
      event.margin,
      event.awayPtsChange,
      event.homePtsChange,
      event.homeDescription,
      event.visitorDescription,
      event.eventType,
      event.eventSubtype
    ]);
    return result.rows.length > 0 ? 'inserted' : 'duplicate';
  } catch (err) {
    const error = toError(err);
    throw new DatabaseError(
      `Failed to insert event ${event.gameId}#${event.eventNum}: ${error.message}`,
      'insertPlayEvent',
      error
    );
  }
}

/**
 * Inserts a game's events one by one; a failing row does not stop the batch
 */
export async function insertPlayEvents(events: PlayEvent[]): Promise<BatchInsertResult> {
  const result: BatchInsertResult = { inserted: 0, duplicate: 0, failed: [] };

  for (const event of events) {
    try {
      const outcome = await insertPlayEvent(event);
      result[outcome]++;
    } catch (err) {
      const error = toError(err);
      logger.warn({ err, gameId: event.gameId, eventNum: event.eventNum }, 'Skipping play-by-play row');
      result.failed.push({ eventNum: event.eventNum, error: error.message });
    }
  }

  logger.debug({ gameId: events[0]?.gameId, ...result, failed: result.failed.length }, 'Play-by-play batch stored');
  return result;
}

/**
 * Game ids of a season that already have play-by-play rows
 * 
 * Used on re-runs so that only the remaining games are fetched.
 */
export async function getGameIdsWithPlayByPlay(seasonId: number): Promise<Set<string>> {
  const query = `
    SELECT DISTINCT f.game_id
    FROM fact_play_by_play f
    JOIN dim_games g ON g.game_id = f.game_id
    WHERE g.season_id = $1
  `;
  const result = await db.query<{ game_id: string }>(query, [seasonId]);
  return new Set(result.rows.map(r => r.game_id));
}
