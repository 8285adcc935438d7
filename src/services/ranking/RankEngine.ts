/**
 * RankEngine
 *
 * Promotes a user to the highest rank their total qualifies for. Every tier
 * crossed gets its own transition record, committed with a compare-and-set
 * on the current rank, and its own rank-up bonus. Ranks never go down.
 *
 * @module services/ranking/RankEngine
 */

import type { Logger } from 'pino';
import { createLogger } from '../../utils/logger.js';
import { sqliteTimestamp, systemClock, type Clock } from '../../utils/timestamps.js';
import {
  errorMessage,
  type RankDefinition,
  type RankRegistry,
} from '../../packages/core/domain/index.js';
import type { IRankingStore, RankTransition } from '../../packages/core/ports/index.js';
import {
  createNoOpRankingMetrics,
  type RankingMetrics,
} from '../../packages/adapters/metrics/ranking-metrics.js';

/** The evaluation runs the initial check plus this many re-checks */
const MAX_RECHECKS = 1;

export interface RankEngineOptions {
  store: IRankingStore;
  ranks: RankRegistry;
  /** Points awarded per tier crossed; 0 disables the bonus */
  rankUpBonus: number;
  clock?: Clock;
  logger?: Logger;
  metrics?: RankingMetrics;
}

export interface RankEvaluation {
  /** Transitions committed by this call, oldest first */
  transitions: RankTransition[];
  /** Rank reached by the last transition, or null when nothing changed */
  finalRank: RankDefinition | null;
}

export class RankEngine {
  private readonly store: IRankingStore;
  private readonly ranks: RankRegistry;
  private readonly rankUpBonus: number;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly metrics: RankingMetrics;

  constructor(options: RankEngineOptions) {
    this.store = options.store;
    this.ranks = options.ranks;
    this.rankUpBonus = options.rankUpBonus;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? createLogger('rank-engine');
    this.metrics = options.metrics ?? createNoOpRankingMetrics();
  }

  async evaluate(userId: number): Promise<RankEvaluation> {
    const transitions: RankTransition[] = [];
    let finalRank: RankDefinition | null = null;

    for (let check = 0; check <= MAX_RECHECKS; check++) {
      const state = await this.store.getUserState(userId);
      if (!state || this.ranks.isTop(state.currentRankId)) break;

      const target = this.ranks.rankFor(state.totalPoints);
      if (target.rankId <= state.currentRankId) break;

      const committed: RankTransition[] = [];
      let fromRankId = state.currentRankId;
      let lostRace = false;

      for (const rank of this.ranks.between(state.currentRankId, target.rankId)) {
        const transition = await this.store.commitRankTransition({
          userId,
          oldRankId: fromRankId,
          newRankId: rank.rankId,
          pointsAtChange: state.totalPoints,
          reason: `Reached ${rank.pointsRequired} points`,
          createdAt: sqliteTimestamp(this.clock()),
        });

        if (!transition) {
          // Another evaluation moved the user first
          lostRace = true;
          break;
        }

        committed.push(transition);
        finalRank = rank;
        fromRankId = rank.rankId;
        this.metrics.rankTransitions.inc();
        this.log.info(
          {
            event: 'ranking.rank_up',
            userId,
            oldRankId: transition.oldRankId,
            newRankId: transition.newRankId,
            totalPoints: state.totalPoints,
          },
          'User ranked up'
        );
      }

      transitions.push(...committed);
      await this.awardBonuses(userId, committed);

      if (lostRace) break;
    }

    return { transitions, finalRank };
  }

  /**
   * One rank_up_bonus entry per transition. A failure is logged; the
   * transitions stay committed.
   */
  private async awardBonuses(userId: number, transitions: readonly RankTransition[]): Promise<void> {
    if (this.rankUpBonus <= 0 || transitions.length === 0) return;

    const createdAt = sqliteTimestamp(this.clock());
    try {
      await this.store.appendTransactions(
        userId,
        transitions.map((transition) => ({
          pointsDelta: this.rankUpBonus,
          activityType: 'rank_up_bonus' as const,
          reference: null,
          description: `Rank up bonus: ${this.ranks.get(transition.newRankId)?.name ?? transition.newRankId}`,
          createdAt,
        }))
      );
    } catch (err) {
      this.log.error(
        { event: 'ranking.rank_bonus_failed', userId, err: errorMessage(err) },
        'Failed to award rank-up bonus'
      );
    }
  }
}
