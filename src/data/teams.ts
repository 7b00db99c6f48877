/**
 * Team Reference Data
 * 
 * Loads the league's franchises from teams.json beside this module.
 */

import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { TeamInput } from '../db/repositories/teams.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function isTeamInput(value: unknown): value is TeamInput {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'id' in value && typeof value.id === 'number' &&
    'fullName' in value && typeof value.fullName === 'string'
  );
}

/**
 * Reads and validates the reference team list
 */
export function loadReferenceTeams(): TeamInput[] {
  // tsc does not copy JSON into dist, so read from the source tree there
  const dir = __dirname.includes('/dist/') ? join(process.cwd(), 'src/data') : __dirname;
  const parsed: unknown = JSON.parse(readFileSync(join(dir, 'teams.json'), 'utf-8'));
  if (!Array.isArray(parsed)) {
    throw new Error('teams.json must contain an array');
  }
  return parsed.filter(isTeamInput);
}
