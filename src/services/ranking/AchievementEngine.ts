/**
 * AchievementEngine
 *
 * Evaluates the catalog after an activity and grants every rule whose
 * predicate now holds and that the user does not already hold. Each rule is
 * evaluated in isolation: one failing rule is logged and the rest still run.
 *
 * @module services/ranking/AchievementEngine
 */

import type { Logger } from 'pino';
import { createLogger } from '../../utils/logger.js';
import { sqliteTimestamp, systemClock, type Clock } from '../../utils/timestamps.js';
import {
  ConsistencyError,
  errorMessage,
  evaluatePredicate,
  type AchievementCatalog,
  type AchievementRule,
  type ActivityContext,
  type ActivityType,
  type PredicateFacts,
} from '../../packages/core/domain/index.js';
import type { AchievementGrant, IRankingStore } from '../../packages/core/ports/index.js';
import {
  createNoOpRankingMetrics,
  type RankingMetrics,
} from '../../packages/adapters/metrics/ranking-metrics.js';

export interface AchievementEngineOptions {
  store: IRankingStore;
  catalog: AchievementCatalog;
  clock?: Clock;
  logger?: Logger;
  metrics?: RankingMetrics;
}

export interface GrantedAchievement {
  rule: AchievementRule;
  grant: AchievementGrant;
}

export class AchievementEngine {
  private readonly store: IRankingStore;
  private readonly catalog: AchievementCatalog;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly metrics: RankingMetrics;

  constructor(options: AchievementEngineOptions) {
    this.store = options.store;
    this.catalog = options.catalog;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? createLogger('achievement-engine');
    this.metrics = options.metrics ?? createNoOpRankingMetrics();
  }

  async evaluate(
    userId: number,
    activity: ActivityType,
    context: ActivityContext = {}
  ): Promise<GrantedAchievement[]> {
    if (this.catalog.size === 0) return [];

    const held = await this.store.getGrantedAchievementIds(userId);
    const pending = this.catalog.all().filter((rule) => !held.has(rule.id));
    if (pending.length === 0) return [];

    const facts = this.factsFor(userId, activity, context);
    const granted: GrantedAchievement[] = [];

    for (const rule of pending) {
      try {
        if (!(await evaluatePredicate(rule.predicate, facts))) continue;

        const grant = await this.grant(userId, rule);
        if (grant) granted.push({ rule, grant });
      } catch (err) {
        this.log.warn(
          { event: 'ranking.achievement_rule_failed', userId, achievementId: rule.id, err: errorMessage(err) },
          'Achievement rule evaluation failed'
        );
      }
    }

    return granted;
  }

  /**
   * Insert the grant and its reward. Returns null when a concurrent call
   * already granted it.
   */
  private async grant(userId: number, rule: AchievementRule): Promise<AchievementGrant | null> {
    const grantedAt = sqliteTimestamp(this.clock());
    try {
      const { grant } = await this.store.insertAchievementGrant(
        { userId, achievementId: rule.id, pointsAwarded: rule.pointsAwarded, grantedAt },
        {
          pointsDelta: rule.pointsAwarded,
          activityType: 'achievement_reward',
          reference: null,
          description: `Achievement: ${rule.name}`,
          createdAt: grantedAt,
        }
      );

      this.metrics.achievementsGranted.inc({ achievement: rule.id });
      this.log.info(
        { event: 'ranking.achievement_granted', userId, achievementId: rule.id, points: rule.pointsAwarded },
        'Achievement granted'
      );
      return grant;
    } catch (err) {
      if (err instanceof ConsistencyError) {
        this.metrics.duplicateGrantsPrevented.inc();
        this.log.debug(
          { event: 'ranking.achievement_duplicate', userId, achievementId: rule.id },
          'Achievement already granted'
        );
        return null;
      }
      throw err;
    }
  }

  /** Lazily fetched facts, cached for one evaluation */
  private factsFor(userId: number, activity: ActivityType, context: ActivityContext): PredicateFacts {
    let streak: Promise<number> | null = null;
    const counts = new Map<string, Promise<number>>();

    return {
      activity,
      context,
      countEntries: (activities, hourWindow) => {
        const key = `${[...activities].sort().join(',')}@${hourWindow ? `${hourWindow.fromHour}-${hourWindow.toHour}` : '*'}`;
        let count = counts.get(key);
        if (!count) {
          count = this.store.countTransactions(userId, activities, hourWindow);
          counts.set(key, count);
        }
        return count;
      },
      consecutiveActiveDays: () => {
        streak ??= this.store
          .getUserState(userId)
          .then((state) => state?.consecutiveActiveDays ?? 0);
        return streak;
      },
      leaderboardPosition: (window) => this.store.getLeaderboardPosition(userId, window),
    };
  }
}
