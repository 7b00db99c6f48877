/**
 * Game Repository
 * 
 * One row per discovered game, keyed by the source's game id.
 * Rows are never updated after creation.
 */

import { db } from '../client.js';
import { logger } from '../../core/logger.js';
import { DatabaseError, toError } from '../../errors/index.js';
import { isValidDateISO, ValidationError } from '../../util/validation.js';
import type { GameRow, UpsertOutcome } from '../types.js';

export interface GameInput {
  gameId: string;
  seasonId: number;
  gameDate: string; // YYYY-MM-DD
  homeTeamId: number;
  awayTeamId: number;
  homeTeamName: string;
  awayTeamName: string;
}

/**
 * Inserts a game unless it already exists
 */
export async function insertGame(game: GameInput): Promise<UpsertOutcome> {
  if (!isValidDateISO(game.gameDate)) {
    throw new ValidationError(`Invalid date ${game.gameDate} for game ${game.gameId}`, 'gameDate');
  }

  const query = `
    INSERT INTO dim_games (
      game_id, season_id, game_date,
      home_team_id, away_team_id, home_team_name, away_team_name
    ) VALUES ($1, $2, $3, $4, $5, $6, $7)
    ON CONFLICT (game_id) DO NOTHING
    RETURNING game_id
  `;

  try {
    const result = await db.query<Pick<GameRow, 'game_id'>>(query, [
      game.gameId,
      game.seasonId,
      game.gameDate,
      game.homeTeamId,
      game.awayTeamId,
      game.homeTeamName,
      game.awayTeamName
    ]);
    return result.rows.length > 0 ? 'inserted' : 'duplicate';
  } catch (err) {
    const error = toError(err);
    logger.error({ err, gameId: game.gameId }, 'Failed to insert game');
    throw new DatabaseError(`Failed to insert game ${game.gameId}: ${error.message}`, 'insertGame', error);
  }
}
