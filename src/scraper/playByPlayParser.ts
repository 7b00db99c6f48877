/**
 * Play-by-Play Page Parser
 * 
 * Walks a game's play-by-play table. Header-only rows ("1st Q", "2nd OT", ...)
 * advance the current period; event rows are kept when they carry a clock
 * and at least one team description.
 */

import { extractTableRows, foldRows, type RowStep } from './tableRows.js';
import { classifyEvent } from './eventTypes.js';
import { GAME_CLOCK, SENTINELS } from '../core/constants.js';
import type { RawPlayEvent } from '../types/source.js';

const CLOCK = /^\d{1,2}:\d{2}(?:\.\d+)?$/;
const SCORE = /^(\d+)-(\d+)$/;

export interface PlayByPlayScanState {
  period: number;
  eventCount: number;
}

/**
 * Reads a period from a header row
 * 
 * @example
 * parsePeriodMarker('3rd Q')  // 3
 * parsePeriodMarker('2nd OT') // 6
 * parsePeriodMarker('Team')   // null
 */
export function parsePeriodMarker(text: string): number | null {
  const t = text.toLowerCase();

  const numberedOt = /(\d)(?:st|nd|rd|th)?\s*ot\b/.exec(t);
  if (numberedOt) return GAME_CLOCK.REGULATION_PERIODS + Number(numberedOt[1]);
  if (/\bot\b/.test(t) || t.includes('overtime')) return GAME_CLOCK.REGULATION_PERIODS + 1;

  const quarter = /([1-4])(?:st|nd|rd|th)\b/.exec(t);
  if (quarter) return Number(quarter[1]);
  return null;
}

/**
 * Textual margin for a score, the way the source's feed reports it
 */
export function marginFromScore(score: string | null): string | null {
  const m = score ? SCORE.exec(score) : null;
  if (!m) return null;
  const diff = Number(m[2]) - Number(m[1]);
  return diff === 0 ? SENTINELS.TIED : String(diff);
}

function orNull(text: string | undefined): string | null {
  return text ? text : null;
}

/**
 * Row step for the play-by-play table
 * 
 * Cells: [time, away description, away +pts, score, home +pts, home description]
 */
export function scanPlayByPlayRow(gameId: string): RowStep<PlayByPlayScanState, RawPlayEvent> {
  return (state, row) => {
    if (row.header && row.cells.length === 0) {
      const period = parsePeriodMarker(row.header.text);
      return [period === null ? state : { ...state, period }, null];
    }

    if (row.cells.length < 6) return [state, null];

    const clock = row.cells[0].text;
    if (!CLOCK.test(clock)) return [state, null];

    const visitorDescription = orNull(row.cells[1].text);
    const homeDescription = orNull(row.cells[5].text);
    if (!visitorDescription && !homeDescription) return [state, null];

    const scoreText = row.cells[3].text;
    const score = SCORE.test(scoreText) ? scoreText : null;
    const { type, subtype } = classifyEvent(homeDescription ?? visitorDescription);
    const eventNum = state.eventCount + 1;

    return [{ ...state, eventCount: eventNum }, {
      gameId,
      eventNum,
      period: state.period,
      clock,
      score,
      margin: marginFromScore(score),
      awayPtsChange: orNull(row.cells[2].text),
      homePtsChange: orNull(row.cells[4].text),
      homeDescription,
      visitorDescription,
      eventType: type,
      eventSubtype: subtype
    }];
  };
}

/**
 * Parses every event on a play-by-play page
 * 
 * @returns null when the table is missing or no event survives filtering
 */
export function parsePlayByPlayPage(html: string, gameId: string): RawPlayEvent[] | null {
  const rows = extractTableRows(html, 'table#pbp');
  if (!rows) return null;
  const { records } = foldRows(rows, { period: 1, eventCount: 0 }, scanPlayByPlayRow(gameId));
  return records.length > 0 ? records : null;
}
