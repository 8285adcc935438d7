/**
 * Point Values
 *
 * Pure pricing of an activity: base value from the table, then the
 * activity-specific multiplier or bonus derived from the event context.
 *
 * @module packages/core/domain/points
 */

import type { ActivityContext, ActivityType } from './activity.js';

export const POINT_VALUES = {
  confession_submitted: 10,
  confession_approved: 25,
  confession_featured: 50,
  confession_liked: 2,
  confession_100_likes: 100,
  confession_popular: 75, // top confession of the day

  comment_posted: 5,
  comment_liked: 1,
  comment_helpful: 15, // marked helpful by an admin
  comment_thread_starter: 10,
  quality_comment: 20,

  daily_login: 2,
  consecutive_days_bonus: 5,
  week_streak: 25,
  month_streak: 100,

  reaction_given: 1,
  helping_others: 10,
  positive_interaction: 5,

  first_confession: 50,
  first_comment: 20,
  milestone_reached: 100,
  community_contribution: 30,

  content_rejected: -5,
  spam_detected: -15,
  inappropriate_content: -25,
} as const satisfies Record<ActivityType, number>;

/** Like counts at which a received like is worth double, then triple */
export const LIKE_TIERS = { popular: 20, viral: 50 } as const;

/** Comments longer than this earn the detailed-comment bonus */
export const QUALITY_COMMENT_LENGTH = 200;
export const QUALITY_COMMENT_BONUS = 10;

/** Streak lengths at which the per-day bonus doubles, then triples */
export const STREAK_TIERS = { week: 7, month: 30 } as const;

export function basePoints(activity: ActivityType): number {
  return POINT_VALUES[activity];
}

/**
 * Points for one occurrence of an activity.
 */
export function calculatePoints(activity: ActivityType, context: ActivityContext = {}): number {
  const base = basePoints(activity);

  switch (activity) {
    case 'consecutive_days_bonus': {
      const days = context.consecutiveDays ?? 0;
      if (days >= STREAK_TIERS.month) return base * 3;
      if (days >= STREAK_TIERS.week) return base * 2;
      return base;
    }
    case 'quality_comment': {
      const length = context.commentLength ?? 0;
      return length > QUALITY_COMMENT_LENGTH ? base + QUALITY_COMMENT_BONUS : base;
    }
    case 'confession_liked': {
      const likes = context.likeCount ?? 0;
      if (likes >= LIKE_TIERS.viral) return base * 3;
      if (likes >= LIKE_TIERS.popular) return base * 2;
      return base;
    }
    default:
      return base;
  }
}

export function isPenalty(activity: ActivityType): boolean {
  return basePoints(activity) < 0;
}

// =============================================================================
// Daily streak
// =============================================================================

export interface StreakUpdate {
  days: number;
  /** False for a repeat login on the same UTC day */
  advanced: boolean;
}

/**
 * Streak after a login on `today`, anchored on the UTC day of the previous
 * login: the same day keeps it, the day before extends it, anything older
 * resets it to 1.
 */
export function advanceStreak(
  current: number,
  lastLoginDay: string | null,
  today: string,
  yesterday: string
): StreakUpdate {
  if (lastLoginDay === null) return { days: 1, advanced: true };
  if (lastLoginDay === today) return { days: Math.max(current, 1), advanced: false };
  if (lastLoginDay === yesterday) return { days: current + 1, advanced: true };
  return { days: 1, advanced: true };
}
