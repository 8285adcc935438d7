/**
 * Achievement Rules
 *
 * One-time rewards granted the first time a qualifying condition holds.
 * Predicates are a closed set of variants evaluated by a single dispatch
 * function; the facts they need are supplied by the caller so the rules stay
 * independent of storage.
 *
 * @module packages/core/domain/achievements
 */

import type { ActivityContext, ActivityType, LedgerEntryType } from './activity.js';
import type { LeaderboardWindow } from './leaderboard.js';
import { CatalogError } from './errors.js';

// =============================================================================
// Predicates
// =============================================================================

/** UTC hours [fromHour, toHour); wraps past midnight when fromHour > toHour */
export interface HourWindow {
  fromHour: number;
  toHour: number;
}

export const DERIVED_METRICS = [
  'post_like_count',
  'consecutive_active_days',
  'monthly_leaderboard_position',
] as const;

/**
 * - post_like_count: likes on the confession the current event refers to (>=)
 * - consecutive_active_days: the user's current daily streak (>=)
 * - monthly_leaderboard_position: 1-based monthly position (<=)
 */
export type DerivedMetric = (typeof DERIVED_METRICS)[number];

export type AchievementPredicate =
  | { kind: 'first_occurrence'; activity: ActivityType }
  | {
      kind: 'count_threshold';
      activities: ActivityType[];
      threshold: number;
      hourWindow?: HourWindow;
    }
  | { kind: 'metric_threshold'; metric: DerivedMetric; threshold: number };

export interface AchievementRule {
  id: string;
  name: string;
  emoji: string;
  description: string;
  pointsAwarded: number;
  predicate: AchievementPredicate;
  isSpecial: boolean;
}

/**
 * Facts about a user at evaluation time. Implementations may be lazy; only
 * the facts a rule actually asks for are fetched.
 */
export interface PredicateFacts {
  /** The activity being evaluated */
  activity: ActivityType;
  context: ActivityContext;
  countEntries(activities: readonly LedgerEntryType[], hourWindow?: HourWindow): Promise<number>;
  consecutiveActiveDays(): Promise<number>;
  leaderboardPosition(window: LeaderboardWindow): Promise<number | null>;
}

async function metricValue(metric: DerivedMetric, facts: PredicateFacts): Promise<number | null> {
  switch (metric) {
    case 'post_like_count':
      return facts.context.likeCount ?? null;
    case 'consecutive_active_days':
      return facts.consecutiveActiveDays();
    case 'monthly_leaderboard_position':
      return facts.leaderboardPosition('monthly');
  }
}

/**
 * Whether a predicate holds for the given facts.
 */
export async function evaluatePredicate(
  predicate: AchievementPredicate,
  facts: PredicateFacts
): Promise<boolean> {
  switch (predicate.kind) {
    case 'first_occurrence': {
      if (predicate.activity === facts.activity) return true;
      // Ledger fallback picks up grants missed on the original event
      const count = await facts.countEntries([predicate.activity]);
      return count >= 1;
    }
    case 'count_threshold': {
      const count = await facts.countEntries(predicate.activities, predicate.hourWindow);
      return count >= predicate.threshold;
    }
    case 'metric_threshold': {
      const value = await metricValue(predicate.metric, facts);
      if (value === null) return false;
      return predicate.metric === 'monthly_leaderboard_position'
        ? value <= predicate.threshold
        : value >= predicate.threshold;
    }
  }
}

// =============================================================================
// Catalog
// =============================================================================

export class AchievementCatalog {
  private readonly rules: readonly AchievementRule[];
  private readonly byId: ReadonlyMap<string, AchievementRule>;

  constructor(rules: readonly AchievementRule[]) {
    const seen = new Set<string>();
    const duplicates: string[] = [];
    for (const rule of rules) {
      if (seen.has(rule.id)) duplicates.push(`duplicate achievement id ${rule.id}`);
      seen.add(rule.id);
    }
    if (duplicates.length > 0) {
      throw new CatalogError('Invalid achievement catalog', duplicates);
    }

    this.rules = [...rules];
    this.byId = new Map(rules.map((rule) => [rule.id, rule]));
  }

  static empty(): AchievementCatalog {
    return new AchievementCatalog([]);
  }

  /** Rules in declaration order */
  all(): readonly AchievementRule[] {
    return this.rules;
  }

  get(id: string): AchievementRule | undefined {
    return this.byId.get(id);
  }

  get size(): number {
    return this.rules.length;
  }
}
