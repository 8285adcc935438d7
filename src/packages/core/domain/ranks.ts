/**
 * Rank Tiers
 *
 * Ordered rank table and the lookups the RankEngine needs. The table is
 * loaded once at start-up and never changes while the process runs.
 *
 * @module packages/core/domain/ranks
 */

import { CatalogError } from './errors.js';

// =============================================================================
// Perks
// =============================================================================

export const RANK_FEATURES = [
  'priority_review',
  'comment_highlight',
  'exclusive_categories',
  'custom_emoji',
  'story_highlight',
  'moderation_assist',
  'all_perks',
] as const;

export type RankFeature = (typeof RANK_FEATURES)[number];

export const RANK_BADGES = ['legend', 'guardian', 'sage'] as const;

export type RankBadge = (typeof RANK_BADGES)[number];

export type RankPerk =
  | { kind: 'daily_confession_limit'; limit: number }
  | { kind: 'unlimited_daily_confessions' }
  | { kind: 'featured_chance'; probability: number }
  | { kind: 'feature'; feature: RankFeature }
  | { kind: 'badge'; badge: RankBadge };

/** Versioned so the stored JSON can evolve without reinterpreting old rows */
export interface RankPerks {
  version: 1;
  perks: RankPerk[];
}

export const NO_PERKS: RankPerks = { version: 1, perks: [] };

// =============================================================================
// Rank Definition
// =============================================================================

export interface RankDefinition {
  rankId: number;
  name: string;
  emoji: string;
  pointsRequired: number;
  description: string;
  color: string;
  perks: RankPerks;
  isSpecial: boolean;
}

/**
 * Daily confession allowance granted by a rank; null when unlimited.
 */
export function dailyConfessionLimit(rank: RankDefinition, fallback = 1): number | null {
  let limit = fallback;
  for (const perk of rank.perks.perks) {
    if (perk.kind === 'unlimited_daily_confessions') return null;
    if (perk.kind === 'daily_confession_limit') limit = perk.limit;
  }
  return limit;
}

export function hasFeature(rank: RankDefinition, feature: RankFeature): boolean {
  return rank.perks.perks.some(
    (perk) =>
      perk.kind === 'feature' && (perk.feature === feature || perk.feature === 'all_perks')
  );
}

// =============================================================================
// Registry
// =============================================================================

export class RankRegistry {
  private readonly ranks: readonly RankDefinition[];
  private readonly byId: ReadonlyMap<number, RankDefinition>;

  private constructor(ranks: RankDefinition[]) {
    this.ranks = ranks;
    this.byId = new Map(ranks.map((rank) => [rank.rankId, rank]));
  }

  /**
   * Validate and order a rank table.
   *
   * @throws CatalogError when thresholds do not strictly increase with rank id,
   *   ids repeat, or the first rank is not free
   */
  static fromDefinitions(definitions: readonly RankDefinition[]): RankRegistry {
    if (definitions.length === 0) {
      throw new CatalogError('Rank table is empty');
    }

    const sorted = [...definitions].sort((a, b) => a.rankId - b.rankId);
    const problems: string[] = [];

    const first = sorted[0];
    if (first && first.pointsRequired !== 0) {
      problems.push(`rank ${first.rankId} must require 0 points, requires ${first.pointsRequired}`);
    }

    for (let i = 1; i < sorted.length; i++) {
      const prev = sorted[i - 1];
      const curr = sorted[i];
      if (!prev || !curr) continue;
      if (curr.rankId === prev.rankId) {
        problems.push(`duplicate rank id ${curr.rankId}`);
      } else if (curr.pointsRequired <= prev.pointsRequired) {
        problems.push(
          `rank ${curr.rankId} requires ${curr.pointsRequired}, not above rank ${prev.rankId} (${prev.pointsRequired})`
        );
      }
    }

    if (problems.length > 0) {
      throw new CatalogError('Invalid rank table', problems);
    }

    return new RankRegistry(sorted);
  }

  all(): readonly RankDefinition[] {
    return this.ranks;
  }

  lowest(): RankDefinition {
    const rank = this.ranks[0];
    if (!rank) throw new CatalogError('Rank table is empty');
    return rank;
  }

  top(): RankDefinition {
    const rank = this.ranks[this.ranks.length - 1];
    if (!rank) throw new CatalogError('Rank table is empty');
    return rank;
  }

  get(rankId: number): RankDefinition | undefined {
    return this.byId.get(rankId);
  }

  /**
   * Highest rank whose threshold is at or below the total. Totals below every
   * threshold (penalised users) stay on the lowest rank.
   */
  rankFor(totalPoints: number): RankDefinition {
    let match = this.lowest();
    for (const rank of this.ranks) {
      if (rank.pointsRequired <= totalPoints) {
        match = rank;
      } else {
        break;
      }
    }
    return match;
  }

  /** The rank directly above, or null at the top */
  next(rankId: number): RankDefinition | null {
    const index = this.ranks.findIndex((rank) => rank.rankId === rankId);
    if (index < 0) return null;
    return this.ranks[index + 1] ?? null;
  }

  /** Ranks strictly above `fromRankId` up to and including `toRankId` */
  between(fromRankId: number, toRankId: number): RankDefinition[] {
    return this.ranks.filter((rank) => rank.rankId > fromRankId && rank.rankId <= toRankId);
  }

  isTop(rankId: number): boolean {
    return this.top().rankId === rankId;
  }
}
