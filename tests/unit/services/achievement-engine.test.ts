/**
 * AchievementEngine Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type Database from 'better-sqlite3';
import { SqliteRankingStore } from '../../../src/packages/adapters/storage/SqliteRankingStore.js';
import {
  AchievementCatalog,
  ConsistencyError,
  type AchievementRule,
  type LedgerEntryType,
} from '../../../src/packages/core/domain/index.js';
import { createNoOpRankingMetrics } from '../../../src/packages/adapters/metrics/ranking-metrics.js';
import { AchievementEngine } from '../../../src/services/ranking/AchievementEngine.js';
import { TestClock, defaultCatalog, setupDb, silentLogger } from '../helpers.js';

let db: Database.Database;
let store: SqliteRankingStore;
const clock = new TestClock('2024-03-10T12:00:00Z');

function rule(overrides: Partial<AchievementRule> & Pick<AchievementRule, 'id' | 'predicate'>): AchievementRule {
  return {
    name: overrides.id,
    emoji: '🏅',
    description: 'test rule',
    pointsAwarded: 10,
    isSpecial: false,
    ...overrides,
  };
}

const FIRST_COMMENT = rule({
  id: 'first_comment',
  name: 'First Comment',
  pointsAwarded: 20,
  predicate: { kind: 'first_occurrence', activity: 'comment_posted' },
});

function engineFor(rules: readonly AchievementRule[] | AchievementCatalog, metrics = createNoOpRankingMetrics()) {
  return new AchievementEngine({
    store,
    catalog: rules instanceof AchievementCatalog ? rules : new AchievementCatalog(rules),
    clock: clock.now,
    logger: silentLogger,
    metrics,
  });
}

async function record(userId: number, activityType: LedgerEntryType, createdAt: string, times = 1): Promise<void> {
  await store.appendTransactions(
    userId,
    Array.from({ length: times }, () => ({
      pointsDelta: 1,
      activityType,
      reference: null,
      description: 'seed',
      createdAt,
    }))
  );
}

beforeEach(async () => {
  db = setupDb();
  store = new SqliteRankingStore(db, silentLogger);
  await store.seedRankDefinitions(defaultCatalog.ranks.all());
  await store.initializeUser(1, 1, '2024-03-10 12:00:00');
});

afterEach(() => {
  db.close();
});

describe('AchievementEngine', () => {
  it('grants a first-occurrence rule with its reward', async () => {
    await record(1, 'comment_posted', '2024-03-10 12:00:00');

    const granted = await engineFor([FIRST_COMMENT]).evaluate(1, 'comment_posted');

    expect(granted.map((g) => g.rule.id)).toEqual(['first_comment']);
    expect(granted[0]?.grant.pointsAwarded).toBe(20);

    const state = await store.getUserState(1);
    expect(state?.totalPoints).toBe(21);
    expect(state?.achievementCount).toBe(1);
    const [reward] = await store.listTransactions(1, 1);
    expect(reward?.activityType).toBe('achievement_reward');
    expect(reward?.description).toBe('Achievement: First Comment');
  });

  it('grants each achievement at most once', async () => {
    const engine = engineFor([FIRST_COMMENT]);

    await engine.evaluate(1, 'comment_posted');
    expect(await engine.evaluate(1, 'comment_posted')).toEqual([]);
    expect(await store.countTransactions(1, ['achievement_reward'])).toBe(1);
  });

  it('picks up a first occurrence from the ledger on a later event', async () => {
    await record(1, 'comment_posted', '2024-03-10 12:00:00');

    const granted = await engineFor([FIRST_COMMENT]).evaluate(1, 'reaction_given');

    expect(granted.map((g) => g.rule.id)).toEqual(['first_comment']);
  });

  it('treats a concurrent duplicate grant as a no-op', async () => {
    const metrics = createNoOpRankingMetrics();
    const duplicates = vi.spyOn(metrics.duplicateGrantsPrevented, 'inc');
    vi.spyOn(store, 'insertAchievementGrant').mockRejectedValueOnce(
      new ConsistencyError('Achievement first_comment already granted to user 1', 1, 'first_comment')
    );

    const granted = await engineFor([FIRST_COMMENT], metrics).evaluate(1, 'comment_posted');

    expect(granted).toEqual([]);
    expect(duplicates).toHaveBeenCalledTimes(1);
    expect((await store.getUserState(1))?.achievementCount).toBe(0);
  });

  it('keeps evaluating the remaining rules when one fails', async () => {
    const flaky = rule({
      id: 'flaky',
      predicate: { kind: 'count_threshold', activities: ['reaction_given'], threshold: 1 },
    });
    const countSpy = vi.spyOn(store, 'countTransactions');
    countSpy.mockRejectedValueOnce(new Error('boom'));

    const granted = await engineFor([flaky, FIRST_COMMENT]).evaluate(1, 'comment_posted');

    expect(granted.map((g) => g.rule.id)).toEqual(['first_comment']);
  });

  it('counts threshold rules across several activity types', async () => {
    const chatty = rule({
      id: 'chatty',
      predicate: { kind: 'count_threshold', activities: ['comment_posted', 'quality_comment'], threshold: 3 },
    });
    await record(1, 'comment_posted', '2024-03-10 12:00:00', 2);
    expect(await engineFor([chatty]).evaluate(1, 'comment_posted')).toEqual([]);

    await record(1, 'quality_comment', '2024-03-10 12:01:00');
    const granted = await engineFor([chatty]).evaluate(1, 'quality_comment');
    expect(granted.map((g) => g.rule.id)).toEqual(['chatty']);
  });

  it('only counts entries inside the hour window', async () => {
    const earlyBird = defaultCatalog.achievements.get('early_bird');
    if (!earlyBird) throw new Error('early_bird missing from catalog');

    await record(1, 'confession_approved', '2024-03-10 07:59:59', 9);
    await record(1, 'confession_approved', '2024-03-10 08:00:00', 5);
    expect(await engineFor([earlyBird]).evaluate(1, 'confession_approved')).toEqual([]);

    await record(1, 'confession_approved', '2024-03-11 03:00:00');
    const granted = await engineFor([earlyBird]).evaluate(1, 'confession_approved');
    expect(granted.map((g) => g.rule.id)).toEqual(['early_bird']);
  });

  it('grants every streak tier the user has reached', async () => {
    const streaks = ['week_streak', 'month_streak', 'quarter_streak'].flatMap((id) => {
      const found = defaultCatalog.achievements.get(id);
      return found ? [found] : [];
    });
    await store.appendTransactions(
      1,
      [{ pointsDelta: 2, activityType: 'daily_login', reference: null, description: 'seed', createdAt: '2024-03-10 12:00:00' }],
      { consecutiveActiveDays: 30 }
    );

    const granted = await engineFor(streaks).evaluate(1, 'daily_login');

    expect(granted.map((g) => g.rule.id)).toEqual(['week_streak', 'month_streak']);
  });

  it('uses the like count carried by the event', async () => {
    const viral = defaultCatalog.achievements.get('popular_confession');
    if (!viral) throw new Error('popular_confession missing from catalog');

    expect(await engineFor([viral]).evaluate(1, 'confession_liked', { likeCount: 99 })).toEqual([]);
    expect(await engineFor([viral]).evaluate(1, 'confession_liked')).toEqual([]);
    const granted = await engineFor([viral]).evaluate(1, 'confession_liked', { likeCount: 100 });
    expect(granted.map((g) => g.rule.id)).toEqual(['popular_confession']);
  });

  it('grants the monthly top-ten rule by leaderboard position', async () => {
    const topTen = rule({
      id: 'top_ten',
      predicate: { kind: 'metric_threshold', metric: 'monthly_leaderboard_position', threshold: 10 },
    });
    expect(await engineFor([topTen]).evaluate(1, 'reaction_given')).toEqual([]);

    await record(1, 'reaction_given', '2024-03-10 12:00:00');
    const granted = await engineFor([topTen]).evaluate(1, 'reaction_given');
    expect(granted.map((g) => g.rule.id)).toEqual(['top_ten']);
  });

  it('skips the store entirely with an empty catalog', async () => {
    const spy = vi.spyOn(store, 'getGrantedAchievementIds');
    expect(await engineFor(AchievementCatalog.empty()).evaluate(1, 'comment_posted')).toEqual([]);
    expect(spy).not.toHaveBeenCalled();
  });
});
