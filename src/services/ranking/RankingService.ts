/**
 * RankingService - Facade over the ranking engines
 *
 * The only entry point collaborators use. Awards go through validation, the
 * ledger, then bounded passes of rank and achievement evaluation. Once the
 * ledger entry is committed the award succeeds: evaluation failures are
 * logged and never undo it. Listeners are notified fire-and-forget.
 *
 * Read operations never write and never throw: failures are logged and
 * reported as null / [].
 *
 * @module services/ranking/RankingService
 */

import type { Logger } from 'pino';
import { createLogger } from '../../utils/logger.js';
import {
  LedgerError,
  ValidationError,
  assertUserId,
  errorMessage,
  parseActivityContext,
  parseActivityType,
  parseLeaderboardWindow,
  parseReference,
  type AchievementCatalog,
  type ActivityContext,
  type ActivityType,
  type LeaderboardEntry,
  type RankDefinition,
  type RankRegistry,
} from '../../packages/core/domain/index.js';
import type {
  AchievementGrantedEvent,
  IRankingStore,
  RankingListener,
  RankUpEvent,
} from '../../packages/core/ports/index.js';
import {
  createNoOpRankingMetrics,
  type RankingMetrics,
} from '../../packages/adapters/metrics/ranking-metrics.js';
import type { AchievementEngine, GrantedAchievement } from './AchievementEngine.js';
import type { LeaderboardAggregator } from './LeaderboardAggregator.js';
import type { PointLedger } from './PointLedger.js';
import type { RankEngine } from './RankEngine.js';

// =============================================================================
// Types
// =============================================================================

export interface AwardOptions {
  /** `{ targetId, targetKind }` of the confession or comment involved */
  reference?: unknown;
  /** Pricing/qualification facts: likeCount, commentLength, consecutiveDays */
  context?: unknown;
  description?: string;
}

export interface AwardResult {
  ok: boolean;
  /** Delta of the entry for the reported activity; 0 when not ok */
  pointsDelta: number;
}

export interface RankSummary {
  userId: number;
  totalPoints: number;
  rank: RankDefinition;
  nextRank: RankDefinition | null;
  pointsToNext: number;
  /** 0-100 through the current tier; 100 at the top rank */
  progressPercent: number;
  weeklyPoints: number;
  monthlyPoints: number;
  consecutiveActiveDays: number;
  highestRank: RankDefinition;
  achievementCount: number;
  lastActivityAt: string | null;
}

export interface UserAchievement {
  achievementId: string;
  name: string;
  emoji: string;
  description: string;
  pointsAwarded: number;
  isSpecial: boolean;
  grantedAt: string;
}

export interface RankingServiceOptions {
  store: IRankingStore;
  ranks: RankRegistry;
  catalog: AchievementCatalog;
  ledger: PointLedger;
  rankEngine: RankEngine;
  achievementEngine: AchievementEngine;
  leaderboard: LeaderboardAggregator;
  /** Upper bound on rank/achievement evaluation passes per award */
  maxEvaluationPasses: number;
  logger?: Logger;
  metrics?: RankingMetrics;
}

const DEFAULT_LEADERBOARD_LIMIT = 10;
const DEFAULT_ACHIEVEMENTS_LIMIT = 20;

// =============================================================================
// RankingService
// =============================================================================

export class RankingService {
  private readonly store: IRankingStore;
  private readonly ranks: RankRegistry;
  private readonly catalog: AchievementCatalog;
  private readonly ledger: PointLedger;
  private readonly rankEngine: RankEngine;
  private readonly achievementEngine: AchievementEngine;
  private readonly leaderboard: LeaderboardAggregator;
  private readonly maxEvaluationPasses: number;
  private readonly log: Logger;
  private readonly metrics: RankingMetrics;

  private readonly listeners = new Set<RankingListener>();
  private readonly pendingNotifications = new Set<Promise<void>>();

  constructor(options: RankingServiceOptions) {
    this.store = options.store;
    this.ranks = options.ranks;
    this.catalog = options.catalog;
    this.ledger = options.ledger;
    this.rankEngine = options.rankEngine;
    this.achievementEngine = options.achievementEngine;
    this.leaderboard = options.leaderboard;
    this.maxEvaluationPasses = options.maxEvaluationPasses;
    this.log = options.logger ?? createLogger('ranking-service');
    this.metrics = options.metrics ?? createNoOpRankingMetrics();
  }

  // ---------------------------------------------------------------------------
  // Listeners
  // ---------------------------------------------------------------------------

  /**
   * Register a listener for rank-up and achievement notifications.
   *
   * @returns a function that removes the listener
   */
  subscribe(listener: RankingListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Wait for every notification dispatched so far to settle.
   */
  async flushNotifications(): Promise<void> {
    while (this.pendingNotifications.size > 0) {
      await Promise.all([...this.pendingNotifications]);
    }
  }

  // ---------------------------------------------------------------------------
  // Awards
  // ---------------------------------------------------------------------------

  async awardPoints(
    userId: number,
    activityType: string,
    options: AwardOptions = {}
  ): Promise<AwardResult> {
    let activity: ActivityType;
    let context: ActivityContext;
    let pointsDelta: number;

    try {
      assertUserId(userId);
      activity = parseActivityType(activityType);
      context = options.context === undefined ? {} : parseActivityContext(options.context);
      const reference = options.reference === undefined ? undefined : parseReference(options.reference);

      const recorded = await this.ledger.recordActivity(userId, activity, {
        context,
        ...(reference ? { reference } : {}),
        ...(options.description !== undefined ? { description: options.description } : {}),
      });
      pointsDelta = recorded.primary.pointsDelta;
    } catch (err) {
      this.recordFailure(userId, activityType, err);
      return { ok: false, pointsDelta: 0 };
    }

    this.metrics.pointsAwarded.inc({ activity });
    this.log.info(
      { event: 'ranking.points_awarded', userId, activityType: activity, pointsDelta },
      'Points awarded'
    );

    await this.runEvaluation(userId, activity, context);

    return { ok: true, pointsDelta };
  }

  /**
   * Rank then achievements, repeated while a pass changes something and at
   * most maxEvaluationPasses times. Each engine is isolated.
   */
  private async runEvaluation(
    userId: number,
    activity: ActivityType,
    context: ActivityContext
  ): Promise<void> {
    let finalRank: RankDefinition | null = null;
    const granted: GrantedAchievement[] = [];

    for (let pass = 0; pass < this.maxEvaluationPasses; pass++) {
      let changed = false;

      try {
        const evaluation = await this.rankEngine.evaluate(userId);
        if (evaluation.finalRank) {
          finalRank = evaluation.finalRank;
          changed = true;
        }
      } catch (err) {
        this.log.error(
          { event: 'ranking.rank_evaluation_failed', userId, pass, err: errorMessage(err) },
          'Rank evaluation failed'
        );
      }

      try {
        const grants = await this.achievementEngine.evaluate(userId, activity, context);
        if (grants.length > 0) {
          granted.push(...grants);
          changed = true;
        }
      } catch (err) {
        this.log.error(
          { event: 'ranking.achievement_evaluation_failed', userId, pass, err: errorMessage(err) },
          'Achievement evaluation failed'
        );
      }

      if (!changed) break;
    }

    if (finalRank) {
      const event: RankUpEvent = { userId, rankName: finalRank.name, rankEmoji: finalRank.emoji };
      this.notify('onRankUp', (listener) => listener.onRankUp?.(event));
    }
    for (const { rule } of granted) {
      const event: AchievementGrantedEvent = {
        userId,
        name: rule.name,
        description: rule.description,
        points: rule.pointsAwarded,
      };
      this.notify('onAchievementGranted', (listener) => listener.onAchievementGranted?.(event));
    }
  }

  private recordFailure(userId: number, activityType: string, err: unknown): void {
    if (err instanceof ValidationError) {
      this.metrics.awardFailures.inc({ reason: 'validation' });
      this.log.warn(
        { event: 'ranking.award_rejected', userId, activityType, field: err.field, err: err.message },
        'Award rejected'
      );
    } else if (err instanceof LedgerError) {
      this.metrics.awardFailures.inc({ reason: 'ledger' });
      this.log.error(
        { event: 'ranking.award_failed', userId, activityType, err: err.message },
        'Award failed: ledger error'
      );
    } else {
      this.metrics.awardFailures.inc({ reason: 'unexpected' });
      this.log.error(
        { event: 'ranking.award_failed', userId, activityType, err: errorMessage(err) },
        'Award failed'
      );
    }
  }

  private notify(
    hook: keyof RankingListener,
    invoke: (listener: RankingListener) => void | Promise<void>
  ): void {
    for (const listener of this.listeners) {
      const delivery: Promise<void> = Promise.resolve()
        .then(() => invoke(listener))
        .catch((err: unknown) => {
          this.log.warn(
            { event: 'ranking.listener_failed', hook, err: errorMessage(err) },
            'Ranking listener failed'
          );
        })
        .finally(() => {
          this.pendingNotifications.delete(delivery);
        });
      this.pendingNotifications.add(delivery);
    }
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  /**
   * Rank summary for a user, or null when the user has no ranking state.
   */
  async getUserRank(userId: number): Promise<RankSummary | null> {
    try {
      assertUserId(userId);
      const state = await this.store.getUserState(userId);
      if (!state) return null;

      const rank = this.ranks.get(state.currentRankId) ?? this.ranks.rankFor(state.totalPoints);
      const nextRank = this.ranks.next(rank.rankId);
      const highestRank = this.ranks.get(state.highestRankAchieved) ?? rank;

      let pointsToNext = 0;
      let progressPercent = 100;
      if (nextRank) {
        const span = nextRank.pointsRequired - rank.pointsRequired;
        pointsToNext = Math.max(0, nextRank.pointsRequired - state.totalPoints);
        progressPercent = Math.min(
          100,
          Math.max(0, Math.floor(((state.totalPoints - rank.pointsRequired) / span) * 100))
        );
      }

      return {
        userId,
        totalPoints: state.totalPoints,
        rank,
        nextRank,
        pointsToNext,
        progressPercent,
        weeklyPoints: state.weeklyPoints,
        monthlyPoints: state.monthlyPoints,
        consecutiveActiveDays: state.consecutiveActiveDays,
        highestRank,
        achievementCount: state.achievementCount,
        lastActivityAt: state.lastActivityAt,
      };
    } catch (err) {
      this.log.error(
        { event: 'ranking.read_failed', operation: 'getUserRank', userId, err: errorMessage(err) },
        'Failed to read user rank'
      );
      return null;
    }
  }

  async getLeaderboard(
    window: string,
    limit: number = DEFAULT_LEADERBOARD_LIMIT
  ): Promise<LeaderboardEntry[]> {
    try {
      return await this.leaderboard.getLeaderboard(parseLeaderboardWindow(window), limit);
    } catch (err) {
      this.log.error(
        { event: 'ranking.read_failed', operation: 'getLeaderboard', window, limit, err: errorMessage(err) },
        'Failed to read leaderboard'
      );
      return [];
    }
  }

  /**
   * Granted achievements, newest first, with their catalog details.
   */
  async getUserAchievements(
    userId: number,
    limit: number = DEFAULT_ACHIEVEMENTS_LIMIT
  ): Promise<UserAchievement[]> {
    try {
      assertUserId(userId);
      if (!Number.isInteger(limit) || limit < 1) {
        throw new ValidationError(`Achievement limit must be a positive integer, got ${limit}`, 'limit');
      }

      const grants = await this.store.listAchievementGrants(userId, limit);
      return grants.map((grant) => {
        const rule = this.catalog.get(grant.achievementId);
        return {
          achievementId: grant.achievementId,
          name: rule?.name ?? grant.achievementId,
          emoji: rule?.emoji ?? '🏅',
          description: rule?.description ?? '',
          pointsAwarded: grant.pointsAwarded,
          isSpecial: rule?.isSpecial ?? false,
          grantedAt: grant.grantedAt,
        };
      });
    } catch (err) {
      this.log.error(
        { event: 'ranking.read_failed', operation: 'getUserAchievements', userId, err: errorMessage(err) },
        'Failed to read achievements'
      );
      return [];
    }
  }
}
