/**
 * RankEngine Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type Database from 'better-sqlite3';
import { SqliteRankingStore } from '../../../src/packages/adapters/storage/SqliteRankingStore.js';
import { LedgerError } from '../../../src/packages/core/domain/index.js';
import { createNoOpRankingMetrics } from '../../../src/packages/adapters/metrics/ranking-metrics.js';
import { RankEngine } from '../../../src/services/ranking/RankEngine.js';
import { TestClock, defaultCatalog, setupDb, silentLogger } from '../helpers.js';

let db: Database.Database;
let store: SqliteRankingStore;
const clock = new TestClock('2024-03-10T12:00:00Z');

function engine(rankUpBonus = 50): RankEngine {
  return new RankEngine({
    store,
    ranks: defaultCatalog.ranks,
    rankUpBonus,
    clock: clock.now,
    logger: silentLogger,
  });
}

async function giveUser(userId: number, points: number): Promise<void> {
  await store.initializeUser(userId, 1, '2024-03-10 12:00:00');
  await store.appendTransactions(userId, [
    {
      pointsDelta: points,
      activityType: 'community_contribution',
      reference: null,
      description: 'seed',
      createdAt: '2024-03-10 12:00:00',
    },
  ]);
}

beforeEach(async () => {
  db = setupDb();
  store = new SqliteRankingStore(db, silentLogger);
  await store.seedRankDefinitions(defaultCatalog.ranks.all());
});

afterEach(() => {
  db.close();
});

describe('RankEngine', () => {
  it('does nothing below the next threshold', async () => {
    await giveUser(1, 49);

    const result = await engine().evaluate(1);

    expect(result).toEqual({ transitions: [], finalRank: null });
    expect((await store.getUserState(1))?.currentRankId).toBe(1);
  });

  it('does nothing for unknown users', async () => {
    expect(await engine().evaluate(42)).toEqual({ transitions: [], finalRank: null });
  });

  it('promotes one tier and awards the rank-up bonus', async () => {
    await giveUser(1, 60);

    const result = await engine().evaluate(1);

    expect(result.transitions.map((t) => [t.oldRankId, t.newRankId])).toEqual([[1, 2]]);
    expect(result.finalRank?.name).toBe('First Timer');

    const state = await store.getUserState(1);
    expect(state?.currentRankId).toBe(2);
    expect(state?.totalPoints).toBe(110);
    expect(await store.countTransactions(1, ['rank_up_bonus'])).toBe(1);
  });

  it('writes one transition per tier crossed', async () => {
    await giveUser(1, 320);

    const result = await engine(0).evaluate(1);

    expect(result.transitions.map((t) => [t.oldRankId, t.newRankId])).toEqual([
      [1, 2],
      [2, 3],
      [3, 4],
    ]);
    expect(result.transitions.every((t) => t.pointsAtChange === 320)).toBe(true);
    expect(result.finalRank?.rankId).toBe(4);
    expect(await store.listRankTransitions(1)).toHaveLength(3);
  });

  it('re-checks once when the bonus crosses another threshold', async () => {
    // 145 -> rank 2, +50 bonus -> 195 -> rank 3, +50 -> 245
    await giveUser(1, 145);

    const result = await engine().evaluate(1);

    expect(result.transitions.map((t) => t.newRankId)).toEqual([2, 3]);
    const state = await store.getUserState(1);
    expect(state?.currentRankId).toBe(3);
    expect(state?.totalPoints).toBe(245);
  });

  it('never demotes', async () => {
    await giveUser(1, 200);
    await engine(0).evaluate(1);
    await store.appendTransactions(1, [
      {
        pointsDelta: -180,
        activityType: 'inappropriate_content',
        reference: null,
        description: 'penalty',
        createdAt: '2024-03-10 13:00:00',
      },
    ]);

    const result = await engine(0).evaluate(1);

    expect(result.transitions).toEqual([]);
    expect((await store.getUserState(1))?.currentRankId).toBe(3);
  });

  it('treats the top rank as terminal', async () => {
    await giveUser(1, 50_000);
    await engine(0).evaluate(1);
    const spy = vi.spyOn(store, 'commitRankTransition');

    expect(await engine(0).evaluate(1)).toEqual({ transitions: [], finalRank: null });
    expect(spy).not.toHaveBeenCalled();
  });

  it('stops when a concurrent evaluation already moved the user', async () => {
    await giveUser(1, 60);
    vi.spyOn(store, 'commitRankTransition').mockResolvedValueOnce(null);

    const result = await engine().evaluate(1);

    expect(result).toEqual({ transitions: [], finalRank: null });
    expect(await store.countTransactions(1, ['rank_up_bonus'])).toBe(0);
  });

  it('keeps the transition when the bonus cannot be written', async () => {
    await giveUser(1, 60);
    vi.spyOn(store, 'appendTransactions').mockRejectedValueOnce(new LedgerError('disk full'));

    const result = await engine().evaluate(1);

    expect(result.transitions).toHaveLength(1);
    const state = await store.getUserState(1);
    expect(state?.currentRankId).toBe(2);
    expect(state?.totalPoints).toBe(60);
  });

  it('counts transitions in metrics', async () => {
    const metrics = createNoOpRankingMetrics();
    const inc = vi.spyOn(metrics.rankTransitions, 'inc');
    await giveUser(1, 160);

    await new RankEngine({
      store,
      ranks: defaultCatalog.ranks,
      rankUpBonus: 0,
      clock: clock.now,
      logger: silentLogger,
      metrics,
    }).evaluate(1);

    expect(inc).toHaveBeenCalledTimes(2);
  });
});
