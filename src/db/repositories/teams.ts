/**
 * Team Repository
 * 
 * Teams are reference data keyed by full name. The league's franchises are
 * seeded with their official ids; any other name found on a schedule gets a
 * generated id the first time it is seen.
 */

import { db } from '../client.js';
import { logger } from '../../core/logger.js';
import { DatabaseError, toError } from '../../errors/index.js';
import type { UpsertOutcome } from '../types.js';

export interface TeamInput {
  id: number;
  fullName: string;
  abbreviation?: string | null;
  nickname?: string | null;
  city?: string | null;
  state?: string | null;
}

/**
 * Inserts a team with a known id unless the id or the name already exists
 */
export async function upsertTeam(team: TeamInput): Promise<UpsertOutcome> {
  const query = `
    INSERT INTO dim_teams (team_id, team_name, team_abbr, team_nickname, team_city, team_state)
    VALUES ($1, $2, $3, $4, $5, $6)
    ON CONFLICT DO NOTHING
    RETURNING team_id
  `;

  try {
    const result = await db.query<{ team_id: number }>(query, [
      team.id,
      team.fullName,
      team.abbreviation ?? null,
      team.nickname ?? null,
      team.city ?? null,
      team.state ?? null
    ]);
    return result.rows.length > 0 ? 'inserted' : 'duplicate';
  } catch (err) {
    const error = toError(err);
    logger.error({ err, teamId: team.id, teamName: team.fullName }, 'Failed to upsert team');
    throw new DatabaseError(`Failed to upsert team ${team.fullName}: ${error.message}`, 'upsertTeam', error);
  }
}

/**
 * Inserts every team, skipping those already present
 */
export async function seedTeams(teams: TeamInput[]): Promise<{ inserted: number; duplicate: number }> {
  let inserted = 0;
  for (const team of teams) {
    if ((await upsertTeam(team)) === 'inserted') inserted++;
  }
  const counts = { inserted, duplicate: teams.length - inserted };
  logger.info(counts, 'Team reference data seeded');
  return counts;
}

async function findTeamId(name: string): Promise<number | null> {
  const result = await db.query<{ team_id: number }>(
    'SELECT team_id FROM dim_teams WHERE team_name = $1',
    [name]
  );
  return result.rows[0]?.team_id ?? null;
}

/**
 * Returns the id of the team with this name, creating it if needed
 */
export async function ensureTeam(name: string): Promise<number> {
  try {
    const existing = await findTeamId(name);
    if (existing !== null) return existing;

    const result = await db.query<{ team_id: number }>(
      `INSERT INTO dim_teams (team_name) VALUES ($1)
       ON CONFLICT (team_name) DO NOTHING
       RETURNING team_id`,
      [name]
    );
    const created = result.rows[0]?.team_id ?? (await findTeamId(name));
    if (created === null) {
      throw new Error(`team ${name} missing after insert`);
    }
    logger.info({ teamId: created, teamName: name }, 'Team not in reference data, created');
    return created;
  } catch (err) {
    const error = toError(err);
    logger.error({ err, teamName: name }, 'Failed to resolve team');
    throw new DatabaseError(`Failed to resolve team ${name}: ${error.message}`, 'ensureTeam', error);
  }
}
