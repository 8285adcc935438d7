/**
 * LeaderboardAggregator
 *
 * Anonymised leaderboards. Rows come from the store without user ids; each
 * entry gets a fresh display name from the name pool, so the same user shows
 * up under a different name on every call.
 *
 * @module services/ranking/LeaderboardAggregator
 */

import {
  ValidationError,
  type AnonymousNamePool,
  type LeaderboardEntry,
  type LeaderboardWindow,
  type RandomSource,
  type RankRegistry,
} from '../../packages/core/domain/index.js';
import type { IRankingStore } from '../../packages/core/ports/index.js';

export interface LeaderboardAggregatorOptions {
  store: IRankingStore;
  ranks: RankRegistry;
  names: AnonymousNamePool;
  /** Largest limit a caller may request */
  maxLimit: number;
  random?: RandomSource;
}

export class LeaderboardAggregator {
  private readonly store: IRankingStore;
  private readonly ranks: RankRegistry;
  private readonly names: AnonymousNamePool;
  private readonly maxLimit: number;
  private readonly random: RandomSource;

  constructor(options: LeaderboardAggregatorOptions) {
    this.store = options.store;
    this.ranks = options.ranks;
    this.names = options.names;
    this.maxLimit = options.maxLimit;
    this.random = options.random ?? Math.random;
  }

  /**
   * @throws ValidationError when limit is not an integer in [1, maxLimit]
   */
  async getLeaderboard(window: LeaderboardWindow, limit: number): Promise<LeaderboardEntry[]> {
    if (!Number.isInteger(limit) || limit < 1 || limit > this.maxLimit) {
      throw new ValidationError(`Leaderboard limit must be between 1 and ${this.maxLimit}, got ${limit}`, 'limit');
    }

    const rows = await this.store.getLeaderboardRows(window, limit);

    return rows.map((row, index) => {
      const rank = this.ranks.get(row.rankId) ?? this.ranks.rankFor(row.points);
      return {
        position: index + 1,
        displayName: this.names.pick(this.random),
        points: row.points,
        rankName: rank.name,
        rankEmoji: rank.emoji,
      };
    });
  }
}
