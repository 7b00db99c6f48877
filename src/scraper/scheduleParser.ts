/**
 * Schedule Page Parser
 * 
 * Walks a monthly schedule table. Date header cells (class "left") set the
 * current date, which carries forward to following rows until the next header.
 */

import { extractTableRows, foldRows, type RowStep } from './tableRows.js';
import type { ScheduledGame } from '../types/source.js';

const MONTHS: Record<string, number> = {
  Jan: 1, Feb: 2, Mar: 3, Apr: 4, May: 5, Jun: 6,
  Jul: 7, Aug: 8, Sep: 9, Oct: 10, Nov: 11, Dec: 12
};

const BOXSCORE_HREF = /\/boxscores\/(\d{9}[^/.]*)/;

export interface ScheduleScanState {
  currentDate: string | null;
}

/**
 * Parses a schedule header date
 * 
 * @example
 * parseScheduleDate('Tue, Oct 18, 2022') // '2022-10-18'
 */
export function parseScheduleDate(text: string): string | null {
  const m = /^(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun), ([A-Z][a-z]{2}) (\d{1,2}), (\d{4})$/.exec(text.trim());
  if (!m) return null;
  const month = MONTHS[m[1]];
  if (!month) return null;
  const day = Number(m[2]);
  if (day < 1 || day > 31) return null;
  return `${m[3]}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Row step for the schedule table
 * 
 * Cells: [start time, visitor, visitor pts, home, home pts, box score link, ...]
 */
export function scanScheduleRow(season: string): RowStep<ScheduleScanState, ScheduledGame> {
  return (state, row) => {
    let next = state;
    if (row.header && row.header.classes.includes('left')) {
      const date = parseScheduleDate(row.header.text);
      if (!date) return [state, null];
      next = { currentDate: date };
    }

    if (row.cells.length < 6 || !next.currentDate) return [next, null];

    let gameId: string | null = null;
    for (const cell of row.cells) {
      const match = cell.hrefs.map(h => BOXSCORE_HREF.exec(h)).find(m => m !== null);
      if (match) {
        gameId = match[1];
        break;
      }
    }
    if (!gameId) return [next, null];

    return [next, {
      gameId,
      gameDate: next.currentDate,
      season,
      awayTeam: row.cells[1].text,
      homeTeam: row.cells[3].text
    }];
  };
}

/**
 * Parses every game on a schedule page
 * 
 * @returns null when the page has no schedule table
 */
export function parseSchedulePage(html: string, season: string): ScheduledGame[] | null {
  const rows = extractTableRows(html, 'table#schedule');
  if (!rows) return null;
  return foldRows(rows, { currentDate: null }, scanScheduleRow(season)).records;
}
