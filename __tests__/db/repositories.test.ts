import { describe, it, expect, vi, beforeAll, beforeEach } from 'vitest';

vi.mock('../../src/db/client.js', async () => {
  const { createMemoryPool } = await import('../helpers/memoryDb.js');
  const pool = createMemoryPool();
  return { db: pool, readDb: pool, closeDatabase: async () => undefined };
});

import { db } from '../../src/db/client.js';
import { runMigrations, splitStatements } from '../../src/db/migrate.js';
import { seasonIdFromLabel, upsertSeason } from '../../src/db/repositories/seasons.js';
import { upsertTeam, seedTeams, ensureTeam } from '../../src/db/repositories/teams.js';
import { insertGame } from '../../src/db/repositories/games.js';
import {
  insertPlayEvent,
  insertPlayEvents,
  getGameIdsWithPlayByPlay
} from '../../src/db/repositories/playByPlay.js';
import { loadReferenceTeams } from '../../src/data/teams.js';
import { ValidationError } from '../../src/errors/index.js';
import type { PlayEvent } from '../../src/types/source.js';

async function count(table: string): Promise<number> {
  const result = await db.query<{ n: string | number }>(`SELECT COUNT(*) AS n FROM ${table}`);
  return Number(result.rows[0].n);
}

function playEvent(eventNum: number, margin: number): PlayEvent {
  return {
    gameId: '202210180BOS',
    eventNum,
    period: 1,
    clock: '11:00.0',
    score: `0-${margin}`,
    margin,
    awayPtsChange: null,
    homePtsChange: null,
    homeDescription: 'J. Tatum makes 2-pt layup',
    visitorDescription: null,
    eventType: 'made_shot',
    eventSubtype: '2pt'
  };
}

async function storeGame(gameId: string, seasonId: number): Promise<void> {
  const home = await ensureTeam('Boston Celtics');
  const away = await ensureTeam('Philadelphia 76ers');
  await insertGame({
    gameId,
    seasonId,
    gameDate: '2022-10-18',
    homeTeamId: home,
    awayTeamId: away,
    homeTeamName: 'Boston Celtics',
    awayTeamName: 'Philadelphia 76ers'
  });
}

describe('repositories', () => {
  beforeAll(async () => {
    await runMigrations();
  });

  beforeEach(async () => {
    await db.query('DELETE FROM fact_play_by_play');
    await db.query('DELETE FROM dim_games');
    await db.query('DELETE FROM dim_teams');
    await db.query('DELETE FROM dim_seasons');
  });

  describe('migrations', () => {
    it('should split files into statements', () => {
      expect(splitStatements('CREATE TABLE a (x INT);\n\nCREATE INDEX i ON a (x);\n')).toEqual([
        'CREATE TABLE a (x INT)',
        'CREATE INDEX i ON a (x)'
      ]);
    });

    it('should be safe to run again', async () => {
      await expect(runMigrations()).resolves.toBeUndefined();
    });
  });

  describe('seasons', () => {
    it('should derive the id from the label', () => {
      expect(seasonIdFromLabel('2022-23')).toBe(22022);
      expect(seasonIdFromLabel('1999-00')).toBe(21999);
    });

    it('should insert once and report duplicates', async () => {
      await expect(upsertSeason('2022-23', 'Regular Season')).resolves.toEqual({ seasonId: 22022, outcome: 'inserted' });
      await expect(upsertSeason('2022-23', 'Regular Season')).resolves.toEqual({ seasonId: 22022, outcome: 'duplicate' });
      expect(await count('dim_seasons')).toBe(1);
    });
  });

  describe('teams', () => {
    it('should insert a team once', async () => {
      const team = { id: 1610612738, fullName: 'Boston Celtics', abbreviation: 'BOS' };
      expect(await upsertTeam(team)).toBe('inserted');
      expect(await upsertTeam(team)).toBe('duplicate');
      expect(await count('dim_teams')).toBe(1);
    });

    it('should seed the reference teams idempotently', async () => {
      const teams = loadReferenceTeams();
      expect(teams).toHaveLength(30);

      expect(await seedTeams(teams)).toEqual({ inserted: 30, duplicate: 0 });
      expect(await seedTeams(teams)).toEqual({ inserted: 0, duplicate: 30 });
      expect(await count('dim_teams')).toBe(30);
    });

    it('should resolve seeded teams to their reference id', async () => {
      await seedTeams(loadReferenceTeams());
      expect(await ensureTeam('Boston Celtics')).toBe(1610612738);
    });

    it('should create an unknown team once', async () => {
      const first = await ensureTeam('Team LeBron');
      const second = await ensureTeam('Team LeBron');
      expect(second).toBe(first);
      expect(await count('dim_teams')).toBe(1);
    });
  });

  describe('games', () => {
    it('should insert a game once', async () => {
      const { seasonId } = await upsertSeason('2022-23', 'Regular Season');
      const homeTeamId = await ensureTeam('Boston Celtics');
      const awayTeamId = await ensureTeam('Philadelphia 76ers');
      const game = {
        gameId: '202210180BOS',
        seasonId,
        gameDate: '2022-10-18',
        homeTeamId,
        awayTeamId,
        homeTeamName: 'Boston Celtics',
        awayTeamName: 'Philadelphia 76ers'
      };

      expect(await insertGame(game)).toBe('inserted');
      expect(await insertGame(game)).toBe('duplicate');
      expect(await count('dim_games')).toBe(1);

      await expect(insertGame({ ...game, gameId: '202302300BOS', gameDate: '2023-02-30' })).rejects.toBeInstanceOf(
        ValidationError
      );
    });
  });

  describe('play-by-play', () => {
    it('should report duplicates instead of failing', async () => {
      const { seasonId } = await upsertSeason('2022-23', 'Regular Season');
      await storeGame('202210180BOS', seasonId);

      expect(await insertPlayEvent(playEvent(1, 0))).toBe('inserted');
      expect(await insertPlayEvent(playEvent(1, 0))).toBe('duplicate');
    });

    it('should count a re-inserted batch as duplicates', async () => {
      const { seasonId } = await upsertSeason('2022-23', 'Regular Season');
      await storeGame('202210180BOS', seasonId);
      const events = [playEvent(1, 0), playEvent(2, 2), playEvent(3, 5)];

      expect(await insertPlayEvents(events)).toEqual({ inserted: 3, duplicate: 0, failed: [] });
      expect(await insertPlayEvents(events)).toEqual({ inserted: 0, duplicate: 3, failed: [] });
      expect(await count('fact_play_by_play')).toBe(3);
    });

    it('should list games that already have play-by-play', async () => {
      const { seasonId } = await upsertSeason('2022-23', 'Regular Season');
      await storeGame('202210180BOS', seasonId);
      await storeGame('202210190BOS', seasonId);
      await insertPlayEvents([playEvent(1, 0)]);

      expect(await getGameIdsWithPlayByPlay(seasonId)).toEqual(new Set(['202210180BOS']));
      expect(await getGameIdsWithPlayByPlay(22021)).toEqual(new Set());
    });
  });
});
