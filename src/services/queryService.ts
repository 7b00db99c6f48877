/**
 * Query Service
 * 
 * Read-only query surface for presentation layers (dashboards, plotting).
 * Uses the read-only pool, so it can run next to an active ingestion run and
 * will simply see whatever has been committed so far.
 */

import { readDb } from '../db/client.js';
import { reconstructSeries } from '../model/timeSeries.js';
import type { PlayByPlayRow, SeasonRow, TeamRow } from '../db/types.js';
import type { ScoredEvent } from '../model/timeSeries.js';

export interface GameListing {
  gameId: string;
  gameDate: string;
  season: string;
  homeTeam: string;
  awayTeam: string;
  matchup: string;
}

export interface GameFilter {
  season?: string;
  team?: string;
}

export interface GameHeader {
  gameId: string;
  gameDate: string;
  season: string;
  homeTeam: string;
  awayTeam: string;
}

export interface PlayListing {
  eventNum: number;
  period: number;
  time: string;
  score: string | null;
  margin: number;
  homeDescription: string | null;
  awayDescription: string | null;
  eventType: string | null;
}

export interface GameDetails {
  game: GameHeader;
  playByPlay: PlayListing[];
}

/**
 * Plot-ready score-vs-time series; sample i is at i * stepSeconds
 */
export interface GameSeries {
  game: GameHeader;
  stepSeconds: number;
  durationSeconds: number;
  homeScores: number[];
  awayScores: number[];
  margins: number[];
}

interface GameHeaderRow {
  game_id: string;
  game_date: string;
  season_label: string;
  home_team: string;
  away_team: string;
}

const GAME_HEADER_SELECT = `
  SELECT g.game_id, g.game_date, s.season_label,
         t1.team_name AS home_team, t2.team_name AS away_team
  FROM dim_games g
  JOIN dim_seasons s ON g.season_id = s.season_id
  JOIN dim_teams t1 ON g.home_team_id = t1.team_id
  JOIN dim_teams t2 ON g.away_team_id = t2.team_id
`;

function toHeader(row: GameHeaderRow): GameHeader {
  return {
    gameId: row.game_id,
    gameDate: row.game_date,
    season: row.season_label,
    homeTeam: row.home_team,
    awayTeam: row.away_team
  };
}

/**
 * Distinct season labels, newest first
 */
export async function listSeasons(): Promise<string[]> {
  const result = await readDb.query<Pick<SeasonRow, 'season_label'>>(
    'SELECT DISTINCT season_label FROM dim_seasons ORDER BY season_label DESC'
  );
  return result.rows.map(r => r.season_label);
}

/**
 * Team names, alphabetical
 */
export async function listTeams(): Promise<string[]> {
  const result = await readDb.query<Pick<TeamRow, 'team_name'>>('SELECT team_name FROM dim_teams ORDER BY team_name');
  return result.rows.map(r => r.team_name);
}

/**
 * Games filtered by season label and/or team name, newest first
 */
export async function listGames(filter: GameFilter = {}): Promise<GameListing[]> {
  let query = `${GAME_HEADER_SELECT} WHERE 1=1`;
  const params: string[] = [];

  if (filter.season) {
    params.push(filter.season);
    query += ` AND s.season_label = $${params.length}`;
  }
  if (filter.team) {
    params.push(filter.team);
    query += ` AND (t1.team_name = $${params.length} OR t2.team_name = $${params.length})`;
  }
  query += ' ORDER BY g.game_date DESC, g.game_id';

  const result = await readDb.query<GameHeaderRow>(query, params);
  return result.rows.map(row => ({
    ...toHeader(row),
    matchup: `${row.home_team} vs ${row.away_team}`
  }));
}

async function getGameHeader(gameId: string): Promise<GameHeader | null> {
  const result = await readDb.query<GameHeaderRow>(`${GAME_HEADER_SELECT} WHERE g.game_id = $1`, [gameId]);
  const row = result.rows[0];
  return row ? toHeader(row) : null;
}

/**
 * A game's stored events in event order
 */
export async function getPlayEvents(gameId: string): Promise<PlayByPlayRow[]> {
  const result = await readDb.query<PlayByPlayRow>(
    'SELECT * FROM fact_play_by_play WHERE game_id = $1 ORDER BY eventnum',
    [gameId]
  );
  return result.rows;
}

/**
 * Maps stored rows onto the reconstruction input
 */
export function toScoredEvents(rows: PlayByPlayRow[]): ScoredEvent[] {
  return rows.map(r => ({
    period: r.period,
    clock: r.pctimestring,
    score: r.score,
    margin: r.scoremargin
  }));
}

/**
 * Game header plus ordered play-by-play
 * 
 * @returns null when the game is unknown
 */
export async function getGameDetails(gameId: string): Promise<GameDetails | null> {
  const game = await getGameHeader(gameId);
  if (!game) return null;

  const rows = await getPlayEvents(gameId);
  return {
    game,
    playByPlay: rows.map(r => ({
      eventNum: r.eventnum,
      period: r.period,
      time: r.pctimestring,
      score: r.score,
      margin: r.scoremargin,
      homeDescription: r.homedescription,
      awayDescription: r.visitordescription,
      eventType: r.event_type
    }))
  };
}

/**
 * Reconstructed score-vs-time series for plotting
 * 
 * @returns null when the game is unknown or has no play-by-play yet
 */
export async function getGameSeries(gameId: string): Promise<GameSeries | null> {
  const game = await getGameHeader(gameId);
  if (!game) return null;

  const rows = await getPlayEvents(gameId);
  if (rows.length === 0) return null;

  const series = reconstructSeries(toScoredEvents(rows));
  return {
    game,
    stepSeconds: series.stepSeconds,
    durationSeconds: series.durationSeconds,
    homeScores: Array.from(series.homeScores),
    awayScores: Array.from(series.awayScores),
    margins: Array.from(series.margins)
  };
}
