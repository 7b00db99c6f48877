/**
 * Time Series Reconstruction
 * 
 * Expands a game's sparse, irregular events into a dense score/margin series
 * sampled every 0.1 s from tip-off to the final buzzer. Regulation quarters
 * are 12 minutes, overtime periods 5 minutes, appended after 48 minutes.
 * 
 * Positions are handled as integer ticks (tenths of a second) so that the grid
 * has exactly duration × 10 points with no floating-point drift.
 */

import { GAME_CLOCK, SERIES } from '../core/constants.js';

/**
 * Minimal event shape needed for reconstruction
 */
export interface ScoredEvent {
  period: number;
  clock: string; // Time remaining in the period
  score: string | null; // "away-home"
  margin: number | null; // home minus away
}

/**
 * Dense, fully filled series (columnar)
 */
export interface ReconstructedSeries {
  stepSeconds: number;
  durationSeconds: number;
  length: number;
  homeScores: Int32Array;
  awayScores: Int32Array;
  margins: Int32Array;
}

export interface ReconstructedSample {
  elapsedSeconds: number;
  homeScore: number;
  awayScore: number;
  margin: number;
}

/**
 * Parses "MM:SS" or "MM:SS.s" into seconds remaining
 */
export function parseClock(clock: string): number | null {
  const m = /^(\d{1,2}):(\d{2}(?:\.\d+)?)$/.exec(clock.trim());
  if (!m) return null;
  const seconds = Number(m[2]);
  if (seconds >= 60) return null;
  return Number(m[1]) * 60 + seconds;
}

export function periodLengthSeconds(period: number): number {
  return period <= GAME_CLOCK.REGULATION_PERIODS
    ? GAME_CLOCK.REGULATION_PERIOD_SECONDS
    : GAME_CLOCK.OVERTIME_PERIOD_SECONDS;
}

export function periodStartSeconds(period: number): number {
  if (period <= GAME_CLOCK.REGULATION_PERIODS) {
    return (period - 1) * GAME_CLOCK.REGULATION_PERIOD_SECONDS;
  }
  return GAME_CLOCK.REGULATION_SECONDS + (period - GAME_CLOCK.REGULATION_PERIODS - 1) * GAME_CLOCK.OVERTIME_PERIOD_SECONDS;
}

/**
 * Game length in seconds given the last period played
 */
export function gameDurationSeconds(lastPeriod: number): number {
  const overtimes = Math.max(0, lastPeriod - GAME_CLOCK.REGULATION_PERIODS);
  return GAME_CLOCK.REGULATION_SECONDS + overtimes * GAME_CLOCK.OVERTIME_PERIOD_SECONDS;
}

/**
 * Elapsed game time of an event, in ticks
 * 
 * @example
 * elapsedTicks(1, '12:00')  // 0
 * elapsedTicks(2, '12:00')  // 7200
 * elapsedTicks(5, '4:59.9') // 28801
 */
export function elapsedTicks(period: number, clock: string): number | null {
  if (!Number.isInteger(period) || period < 1) return null;
  const remaining = parseClock(clock);
  if (remaining === null) return null;
  const end = periodStartSeconds(period) + periodLengthSeconds(period);
  return end * SERIES.TICKS_PER_SECOND - Math.round(remaining * SERIES.TICKS_PER_SECOND);
}

/**
 * Splits an "away-home" score
 */
export function splitScore(score: string | null): { away: number; home: number } | null {
  const m = score ? /^(\d+)-(\d+)$/.exec(score.trim()) : null;
  if (!m) return null;
  return { away: Number(m[1]), home: Number(m[2]) };
}

/**
 * Reconstructs the dense series
 * 
 * Events are placed on the grid by rounded elapsed tick (the later event wins
 * when two share a tick); events at the final buzzer land on the last point.
 * Tick 0 is always 0-0 with margin 0. Every other gap takes the previous value.
 * 
 * @param events - Events in event order; unparseable clocks are ignored
 */
export function reconstructSeries(events: ScoredEvent[]): ReconstructedSeries {
  const lastPeriod = events.reduce<number>(
    (max, e) => (Number.isInteger(e.period) && e.period > max ? e.period : max),
    GAME_CLOCK.REGULATION_PERIODS
  );
  const durationSeconds = gameDurationSeconds(lastPeriod);
  const length = durationSeconds * SERIES.TICKS_PER_SECOND;

  const homeScores = new Int32Array(length);
  const awayScores = new Int32Array(length);
  const margins = new Int32Array(length);
  const hasScore = new Uint8Array(length);
  const hasMargin = new Uint8Array(length);

  for (const event of events) {
    const ticks = elapsedTicks(event.period, event.clock);
    if (ticks === null) continue;
    const i = Math.min(length - 1, Math.max(0, ticks));

    const score = splitScore(event.score);
    if (score) {
      homeScores[i] = score.home;
      awayScores[i] = score.away;
      hasScore[i] = 1;
    }
    const margin = event.margin ?? (score ? score.home - score.away : null);
    if (margin !== null) {
      margins[i] = margin;
      hasMargin[i] = 1;
    }
  }

  homeScores[0] = 0;
  awayScores[0] = 0;
  margins[0] = 0;

  for (let i = 1; i < length; i++) {
    if (!hasScore[i]) {
      homeScores[i] = homeScores[i - 1];
      awayScores[i] = awayScores[i - 1];
    }
    if (!hasMargin[i]) margins[i] = margins[i - 1];
  }

  return { stepSeconds: SERIES.STEP_SECONDS, durationSeconds, length, homeScores, awayScores, margins };
}

/**
 * Elapsed seconds of a grid index
 */
export function timeAt(index: number): number {
  return index / SERIES.TICKS_PER_SECOND;
}

export function sampleAt(series: ReconstructedSeries, index: number): ReconstructedSample {
  if (!Number.isInteger(index) || index < 0 || index >= series.length) {
    throw new RangeError(`Sample index ${index} outside series of length ${series.length}`);
  }
  return {
    elapsedSeconds: timeAt(index),
    homeScore: series.homeScores[index],
    awayScore: series.awayScores[index],
    margin: series.margins[index]
  };
}
