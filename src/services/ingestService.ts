/**
 * Ingest Service
 * 
 * Scrapes one season into the star schema: season and team reference rows,
 * every scheduled game, then play-by-play for each game that does not have it
 * yet. Runs strictly in sequence. Network, parse and per-row database failures
 * are logged and counted in the returned report instead of ending the run, so
 * an interrupted run can simply be started again.
 */

import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { toError } from '../errors/index.js';
import { SourceClient } from '../http/sourceClient.js';
import { cleanPlayByPlay } from '../normalize/recordNormalizer.js';
import { upsertSeason } from '../db/repositories/seasons.js';
import { ensureTeam, seedTeams } from '../db/repositories/teams.js';
import { insertGame } from '../db/repositories/games.js';
import { getGameIdsWithPlayByPlay, insertPlayEvents } from '../db/repositories/playByPlay.js';
import { loadReferenceTeams } from '../data/teams.js';
import { assertSeasonLabel } from '../util/validation.js';
import type { RawPlayEvent, ScheduledGame } from '../types/source.js';

export type PlayByPlaySource = Pick<SourceClient, 'fetchGameList' | 'fetchPlayByPlay'>;

export interface IngestFailure {
  gameId: string;
  reason: string;
}

/**
 * End-of-run summary
 */
export interface IngestReport {
  season: string;
  seasonId: number;
  games: {
    discovered: number;
    inserted: number;
    alreadyStored: number;
    failed: IngestFailure[];
  };
  playByPlay: {
    succeeded: number;
    alreadyStored: number;
    noData: string[];
    failed: IngestFailure[];
  };
  rows: {
    inserted: number;
    duplicate: number;
    failed: number;
  };
}

function uniqueGames(games: ScheduledGame[]): ScheduledGame[] {
  const byId = new Map<string, ScheduledGame>();
  for (const game of games) {
    if (!byId.has(game.gameId)) byId.set(game.gameId, game);
  }
  return [...byId.values()];
}

/**
 * Stores the game rows and returns the ids that are safe to attach facts to
 */
async function storeGames(games: ScheduledGame[], seasonId: number, report: IngestReport): Promise<Set<string>> {
  const stored = new Set<string>();
  for (const game of games) {
    try {
      const homeTeamId = await ensureTeam(game.homeTeam);
      const awayTeamId = await ensureTeam(game.awayTeam);
      const outcome = await insertGame({
        gameId: game.gameId,
        seasonId,
        gameDate: game.gameDate,
        homeTeamId,
        awayTeamId,
        homeTeamName: game.homeTeam,
        awayTeamName: game.awayTeam
      });
      if (outcome === 'inserted') report.games.inserted++;
      else report.games.alreadyStored++;
      stored.add(game.gameId);
    } catch (err) {
      const error = toError(err);
      logger.warn({ err, gameId: game.gameId }, 'Skipping game');
      report.games.failed.push({ gameId: game.gameId, reason: error.message });
    }
  }
  return stored;
}

/**
 * Fetches, cleans and stores one game's play-by-play
 */
async function ingestGame(gameId: string, source: PlayByPlaySource, report: IngestReport): Promise<void> {
  let raw: RawPlayEvent[] | null;
  try {
    raw = await source.fetchPlayByPlay(gameId);
  } catch (err) {
    const error = toError(err);
    logger.error({ err, gameId }, 'Play-by-play fetch failed');
    report.playByPlay.failed.push({ gameId, reason: error.message });
    return;
  }

  if (raw === null) {
    report.playByPlay.noData.push(gameId);
    return;
  }

  const batch = await insertPlayEvents(cleanPlayByPlay(raw));
  report.rows.inserted += batch.inserted;
  report.rows.duplicate += batch.duplicate;
  report.rows.failed += batch.failed.length;

  if (batch.inserted + batch.duplicate > 0) {
    report.playByPlay.succeeded++;
  } else {
    report.playByPlay.failed.push({ gameId, reason: `all ${batch.failed.length} rows rejected` });
  }
}

/**
 * Logs the report the way operators read it at the end of a run
 */
export function logReport(report: IngestReport): void {
  logger.info({
    season: report.season,
    games: report.games.discovered,
    gamesInserted: report.games.inserted,
    playByPlaySucceeded: report.playByPlay.succeeded,
    playByPlayAlreadyStored: report.playByPlay.alreadyStored,
    rowsInserted: report.rows.inserted,
    rowsDuplicate: report.rows.duplicate,
    rowsFailed: report.rows.failed
  }, 'Ingestion complete');

  if (report.playByPlay.noData.length > 0) {
    logger.warn({ gameIds: report.playByPlay.noData }, `${report.playByPlay.noData.length} games had no play-by-play`);
  }
  const failed = [...report.games.failed, ...report.playByPlay.failed];
  if (failed.length > 0) {
    logger.warn({ failed }, `${failed.length} games failed`);
  }
}

/**
 * Season to ingest from the command-line argument
 * 
 * Falls back to the configured default only when no argument was given; an
 * explicit empty string is validated like any other label.
 * 
 * @throws ValidationError for a malformed season label
 */
export function seasonFromArgs(arg: string | undefined): string {
  if (arg === undefined) {
    logger.info({ season: cfg.ingest.defaultSeason }, 'No season given, using default');
    return assertSeasonLabel(cfg.ingest.defaultSeason);
  }
  return assertSeasonLabel(arg);
}

/**
 * Scrapes and stores a whole season
 * 
 * @param season - Season label, e.g. "2022-23"
 * @param source - Page source (defaults to the rate-limited SourceClient)
 * @throws ValidationError for a malformed season label, before any request is made
 */
export async function ingestSeason(
  season: string,
  source: PlayByPlaySource = new SourceClient(),
  seasonType: string = cfg.ingest.seasonType
): Promise<IngestReport> {
  const label = assertSeasonLabel(season);
  const { seasonId } = await upsertSeason(label, seasonType);
  await seedTeams(loadReferenceTeams());

  const report: IngestReport = {
    season: label,
    seasonId,
    games: { discovered: 0, inserted: 0, alreadyStored: 0, failed: [] },
    playByPlay: { succeeded: 0, alreadyStored: 0, noData: [], failed: [] },
    rows: { inserted: 0, duplicate: 0, failed: 0 }
  };

  const games = uniqueGames(await source.fetchGameList(label));
  report.games.discovered = games.length;
  if (games.length === 0) {
    logger.warn({ season: label }, 'No games found');
    return report;
  }

  const stored = await storeGames(games, seasonId, report);
  const done = await getGameIdsWithPlayByPlay(seasonId);
  const pending = games.filter(g => stored.has(g.gameId) && !done.has(g.gameId));
  report.playByPlay.alreadyStored = games.filter(g => done.has(g.gameId)).length;

  logger.info({ season: label, pending: pending.length, alreadyStored: report.playByPlay.alreadyStored }, 'Fetching play-by-play');

  for (const [index, game] of pending.entries()) {
    logger.info({ gameId: game.gameId, progress: `${index + 1}/${pending.length}` }, 'Ingesting game');
    await ingestGame(game.gameId, source, report);
  }

  return report;
}
