/**
 * LeaderboardAggregator Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { SqliteRankingStore } from '../../../src/packages/adapters/storage/SqliteRankingStore.js';
import { ValidationError } from '../../../src/packages/core/domain/index.js';
import { LeaderboardAggregator } from '../../../src/services/ranking/LeaderboardAggregator.js';
import { defaultCatalog, scriptedRandom, setupDb, silentLogger } from '../helpers.js';

let db: Database.Database;
let store: SqliteRankingStore;

function aggregator(random = scriptedRandom([0])): LeaderboardAggregator {
  return new LeaderboardAggregator({
    store,
    ranks: defaultCatalog.ranks,
    names: defaultCatalog.names,
    maxLimit: 100,
    random,
  });
}

beforeEach(async () => {
  db = setupDb();
  store = new SqliteRankingStore(db, silentLogger);
  await store.seedRankDefinitions(defaultCatalog.ranks.all());

  for (const [userId, points, rankId] of [[1, 40, 1], [2, 400, 4], [3, 160, 3]] as const) {
    await store.initializeUser(userId, 1, '2024-03-10 12:00:00');
    await store.appendTransactions(userId, [
      { pointsDelta: points, activityType: 'community_contribution', reference: null, description: 'seed', createdAt: '2024-03-10 12:00:00' },
    ]);
    for (let next = 2; next <= rankId; next++) {
      await store.commitRankTransition({
        userId,
        oldRankId: next - 1,
        newRankId: next,
        pointsAtChange: points,
        reason: 'seed',
        createdAt: '2024-03-10 12:00:00',
      });
    }
  }
});

afterEach(() => {
  db.close();
});

describe('LeaderboardAggregator', () => {
  it('returns anonymised entries with positions and rank details', async () => {
    const entries = await aggregator(scriptedRandom([0, 0.5, 0.999])).getLeaderboard('all_time', 10);

    expect(entries).toEqual([
      { position: 1, displayName: 'Mysterious Confessor', points: 400, rankName: 'Active Member', rankEmoji: '⚡' },
      { position: 2, displayName: 'Humble Confessor', points: 160, rankName: 'Regular', rankEmoji: '📝' },
      { position: 3, displayName: 'Cheerful Mentor', points: 40, rankName: 'New Confessor', rankEmoji: '🆕' },
    ]);
  });

  it('draws every display name from the pool', async () => {
    const entries = await aggregator(Math.random).getLeaderboard('weekly', 10);
    for (const entry of entries) {
      expect(defaultCatalog.names.has(entry.displayName)).toBe(true);
    }
  });

  it('returns at most limit entries', async () => {
    const entries = await aggregator().getLeaderboard('monthly', 2);
    expect(entries.map((e) => e.points)).toEqual([400, 160]);
  });

  it.each([0, -1, 101, 2.5, Number.NaN])('rejects limit %s', async (limit) => {
    await expect(aggregator().getLeaderboard('weekly', limit)).rejects.toBeInstanceOf(ValidationError);
  });

  it('accepts the maximum limit', async () => {
    expect(await aggregator().getLeaderboard('weekly', 100)).toHaveLength(3);
  });
});
