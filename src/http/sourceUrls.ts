/**
 * Source URL Module
 * 
 * Constructs URLs for the statistics source pages.
 * Seasons are addressed by the calendar year they end in ("2022-23" → 2023).
 */

import { cfg } from '../core/config.js';
import { isValidUrl, isValidGameId, assertSeasonLabel, ValidationError } from '../util/validation.js';

/**
 * Returns the configured base URL
 * 
 * @throws ValidationError if the base URL is invalid
 */
function baseUrl(): string {
  const url = cfg.source.baseUrl.replace(/\/+$/, '');
  if (!isValidUrl(url)) {
    throw new ValidationError(`Invalid source base URL: ${url}`, 'baseUrl');
  }
  return url;
}

/**
 * Calendar year a season ends in
 * 
 * @example
 * seasonEndYear('2022-23') // 2023
 */
export function seasonEndYear(season: string): number {
  return Number(assertSeasonLabel(season).slice(0, 4)) + 1;
}

/**
 * Constructs URL for one month of a season's schedule
 * 
 * @example
 * scheduleMonthUrl('2022-23', 'october')
 * // Returns: https://www.basketball-reference.com/leagues/NBA_2023_games-october.html
 */
export function scheduleMonthUrl(season: string, month: string): string {
  const slug = month.trim().toLowerCase();
  if (!/^[a-z]+$/.test(slug)) {
    throw new ValidationError(`Invalid month: ${month}`, 'month');
  }
  return `${baseUrl()}/leagues/NBA_${seasonEndYear(season)}_games-${slug}.html`;
}

/**
 * Constructs URL for a game's play-by-play page
 * 
 * @example
 * playByPlayUrl('202210180BOS')
 * // Returns: https://www.basketball-reference.com/boxscores/pbp/202210180BOS.html
 */
export function playByPlayUrl(gameId: string): string {
  if (!isValidGameId(gameId)) {
    throw new ValidationError(`Invalid game ID format: ${gameId}`, 'gameId');
  }
  return `${baseUrl()}/boxscores/pbp/${gameId}.html`;
}
