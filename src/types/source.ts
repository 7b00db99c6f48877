/**
 * Source Record Types
 * 
 * Shapes of the records extracted from the statistics source before they are
 * normalized and persisted. These mirror the HTML tables, not the database.
 */

/**
 * One game discovered on a monthly schedule page
 */
export interface ScheduledGame {
  gameId: string; // e.g. "202210180BOS"
  gameDate: string; // YYYY-MM-DD
  season: string; // e.g. "2022-23"
  homeTeam: string;
  awayTeam: string;
}

/**
 * Coarse event category derived from the play description
 */
export type EventType =
  | 'made_shot'
  | 'missed_shot'
  | 'free_throw'
  | 'rebound'
  | 'turnover'
  | 'foul'
  | 'violation'
  | 'substitution'
  | 'timeout'
  | 'jump_ball'
  | 'other';

/**
 * One play-by-play row as scraped
 * 
 * `margin` is textual, the way the source reports it: a signed number,
 * "TIE" for a level score, or "None"/null when the row carries no score.
 */
export interface RawPlayEvent {
  gameId: string;
  eventNum: number;
  period: number;
  clock: string; // Time remaining in the period, "MM:SS.s"
  score: string | null; // "away-home"
  margin: string | number | null;
  awayPtsChange: string | null;
  homePtsChange: string | null;
  homeDescription: string | null;
  visitorDescription: string | null;
  eventType: EventType | null;
  eventSubtype: string | null;
}

/**
 * A play-by-play row after normalization: margin is always a number
 */
export interface PlayEvent extends Omit<RawPlayEvent, 'margin'> {
  margin: number;
}
