/**
 * Database Entity Types
 * 
 * TypeScript interfaces matching the star schema.
 */

/**
 * Result of an insert-or-ignore write
 */
export type UpsertOutcome = 'inserted' | 'duplicate';

export interface SeasonRow {
  season_id: number;
  season_label: string; // e.g. "2022-23"
  season_type: string; // "Regular Season" | "Playoffs"
}

export interface TeamRow {
  team_id: number;
  team_name: string;
  team_abbr: string | null;
  team_nickname: string | null;
  team_city: string | null;
  team_state: string | null;
}

export interface GameRow {
  game_id: string;
  season_id: number;
  game_date: string; // YYYY-MM-DD
  home_team_id: number;
  away_team_id: number;
  home_team_name: string;
  away_team_name: string;
}

export interface PlayByPlayRow {
  game_id: string;
  eventnum: number;
  period: number;
  pctimestring: string;
  score: string | null; // "away-home"
  scoremargin: number; // home minus away
  away_pts_change: string | null;
  home_pts_change: string | null;
  homedescription: string | null;
  visitordescription: string | null;
  event_type: string | null;
  event_subtype: string | null;
}
