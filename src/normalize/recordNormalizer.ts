/**
 * Record Normalizer
 * 
 * Cleans scraped play-by-play rows into canonical rows. Steps run in order and
 * each one is idempotent:
 * 
 * 1. "None" margin → null
 * 2. "TIE" margin → 0
 * 3. First row forced to margin 0 and score "0-0" (every game starts level)
 * 4. Null margins filled forward from the previous row
 * 5. Quotes in descriptions escaped with a backslash
 * 
 * No row is ever dropped here; filtering happens in the page parser.
 */

import { SENTINELS } from '../core/constants.js';
import type { PlayEvent, RawPlayEvent } from '../types/source.js';

type Margin = string | number | null;

/**
 * Step 1: textual "no margin" sentinel becomes null
 */
export function dropMissingMarginSentinel(margin: Margin): Margin {
  return margin === SENTINELS.NO_MARGIN ? null : margin;
}

/**
 * Step 2: textual tie becomes 0
 */
export function replaceTieSentinel(margin: Margin): Margin {
  return margin === SENTINELS.TIED ? 0 : margin;
}

/**
 * Numeric value of a margin, or null if it has none
 */
export function parseMargin(margin: Margin): number | null {
  if (margin === null) return null;
  if (typeof margin === 'number') return Number.isFinite(margin) ? Math.trunc(margin) : null;
  const trimmed = margin.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return null;
  return Number(trimmed);
}

/**
 * Step 5: escapes ' and " with a backslash unless already escaped
 * 
 * @example
 * escapeQuotes(`O'Neal's dunk`) // `O\'Neal\'s dunk`
 */
export function escapeQuotes(text: string | null): string | null {
  if (text === null) return null;
  return text.replace(/(?<!\\)(['"])/g, '\\$1');
}

/**
 * Normalizes a game's scraped rows
 * 
 * @param rows - Rows in event order
 * @returns Rows of the same length and order with numeric margins
 */
export function cleanPlayByPlay(rows: RawPlayEvent[]): PlayEvent[] {
  const margins = rows.map(r => replaceTieSentinel(dropMissingMarginSentinel(r.margin)));

  let previous = 0;
  return rows.map((row, i) => {
    const first = i === 0;
    const parsed = first ? 0 : parseMargin(margins[i]);
    const margin = parsed ?? previous;
    previous = margin;

    return {
      ...row,
      score: first ? SENTINELS.OPENING_SCORE : row.score,
      margin,
      homeDescription: escapeQuotes(row.homeDescription),
      visitorDescription: escapeQuotes(row.visitorDescription)
    };
  });
}
