/**
 * Activity Types
 *
 * Named categories of user action reported by the bot's collaborators
 * (confession approval, comments, reactions, moderation). Only these may be
 * passed to awardPoints; the ledger additionally records the internal entry
 * types produced by the engines themselves.
 *
 * @module packages/core/domain/activity
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';

// =============================================================================
// Activity Types
// =============================================================================

export const ACTIVITY_TYPES = [
  // Confessions
  'confession_submitted',
  'confession_approved',
  'confession_featured',
  'confession_liked',
  'confession_100_likes',
  'confession_popular',
  // Comments
  'comment_posted',
  'comment_liked',
  'comment_helpful',
  'comment_thread_starter',
  'quality_comment',
  // Engagement
  'daily_login',
  'consecutive_days_bonus',
  'week_streak',
  'month_streak',
  // Social
  'reaction_given',
  'helping_others',
  'positive_interaction',
  // Special
  'first_confession',
  'first_comment',
  'milestone_reached',
  'community_contribution',
  // Penalties
  'content_rejected',
  'spam_detected',
  'inappropriate_content',
] as const;

export type ActivityType = (typeof ACTIVITY_TYPES)[number];

/** Entry types written by the engines, never accepted from callers */
export const INTERNAL_ENTRY_TYPES = ['achievement_reward', 'rank_up_bonus'] as const;

export type InternalEntryType = (typeof INTERNAL_ENTRY_TYPES)[number];

export type LedgerEntryType = ActivityType | InternalEntryType;

export function isActivityType(value: string): value is ActivityType {
  return (ACTIVITY_TYPES as readonly string[]).includes(value);
}

export function parseActivityType(value: string): ActivityType {
  if (!isActivityType(value)) {
    throw new ValidationError(`Unknown activity type: ${value}`, 'activityType');
  }
  return value;
}

// =============================================================================
// References & Context
// =============================================================================

export const REFERENCE_KINDS = ['confession', 'comment'] as const;

export type ReferenceKind = (typeof REFERENCE_KINDS)[number];

/** The content an activity relates to */
export interface ActivityReference {
  targetId: number;
  targetKind: ReferenceKind;
}

/** Facts about the event that change how it is priced or qualified */
export interface ActivityContext {
  /** Total likes on the target confession at the time of the event */
  likeCount?: number;
  /** Character length of the comment */
  commentLength?: number;
  /** Streak length, for consecutive_days_bonus */
  consecutiveDays?: number;
}

const ReferenceSchema = z.object({
  targetId: z.number().int().positive(),
  targetKind: z.enum(REFERENCE_KINDS),
}).strict();

const ContextSchema = z.object({
  likeCount: z.number().int().min(0).optional(),
  commentLength: z.number().int().min(0).optional(),
  consecutiveDays: z.number().int().min(0).optional(),
}).strict();

export function parseReference(value: unknown): ActivityReference {
  const parsed = ReferenceSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ValidationError(`Malformed reference${where}: ${issue?.message ?? 'invalid'}`, 'reference');
  }
  return parsed.data;
}

export function parseActivityContext(value: unknown): ActivityContext {
  const parsed = ContextSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ValidationError(`Malformed activity context${where}: ${issue?.message ?? 'invalid'}`, 'context');
  }
  return parsed.data;
}

export function assertUserId(userId: number): void {
  if (!Number.isSafeInteger(userId) || userId <= 0) {
    throw new ValidationError(`Invalid user id: ${userId}`, 'userId');
  }
}
