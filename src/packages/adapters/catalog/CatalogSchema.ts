/**
 * Catalog Schema
 *
 * Zod schemas for the YAML seed files in config/. Each schema parses the file
 * layout (snake_case keys) and transforms it into the domain types.
 *
 * @module packages/adapters/catalog/CatalogSchema
 */

import { z } from 'zod';
import {
  ACTIVITY_TYPES,
  DERIVED_METRICS,
  RANK_BADGES,
  RANK_FEATURES,
  type AchievementPredicate,
  type AchievementRule,
  type RankDefinition,
} from '../../core/domain/index.js';

// ============================================================================
// Ranks
// ============================================================================

export const RankPerkSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('daily_confession_limit'), limit: z.number().int().positive() }),
  z.object({ kind: z.literal('unlimited_daily_confessions') }),
  z.object({ kind: z.literal('featured_chance'), probability: z.number().min(0).max(1) }),
  z.object({ kind: z.literal('feature'), feature: z.enum(RANK_FEATURES) }),
  z.object({ kind: z.literal('badge'), badge: z.enum(RANK_BADGES) }),
]);

const HexColorSchema = z.string().regex(/^#[0-9a-fA-F]{6}$/, 'Must be a #RRGGBB color');

export const RankEntrySchema = z
  .object({
    id: z.number().int().positive(),
    name: z.string().min(1).max(64),
    emoji: z.string().min(1),
    points_required: z.number().int().min(0),
    color: HexColorSchema.default('#ffffff'),
    description: z.string().default(''),
    special: z.boolean().default(false),
    perks: z.array(RankPerkSchema).default([]),
  })
  .transform(
    (entry): RankDefinition => ({
      rankId: entry.id,
      name: entry.name,
      emoji: entry.emoji,
      pointsRequired: entry.points_required,
      description: entry.description,
      color: entry.color,
      perks: { version: 1, perks: entry.perks },
      isSpecial: entry.special,
    })
  );

export const RanksFileSchema = z.object({
  ranks: z.array(RankEntrySchema).min(1),
});

// ============================================================================
// Achievements
// ============================================================================

const HourWindowSchema = z
  .object({
    from: z.number().int().min(0).max(23),
    to: z.number().int().min(1).max(24),
  })
  .refine((window) => window.from !== window.to, {
    message: 'from and to must differ',
  });

export const PredicateSchema = z
  .discriminatedUnion('kind', [
    z.object({
      kind: z.literal('first_occurrence'),
      activity: z.enum(ACTIVITY_TYPES),
    }),
    z.object({
      kind: z.literal('count_threshold'),
      activities: z.array(z.enum(ACTIVITY_TYPES)).min(1),
      threshold: z.number().int().positive(),
      hour_window: HourWindowSchema.optional(),
    }),
    z.object({
      kind: z.literal('metric_threshold'),
      metric: z.enum(DERIVED_METRICS),
      threshold: z.number().int().positive(),
    }),
  ])
  .transform((predicate): AchievementPredicate => {
    if (predicate.kind !== 'count_threshold') return predicate;
    const { hour_window, ...rest } = predicate;
    return hour_window
      ? { ...rest, hourWindow: { fromHour: hour_window.from, toHour: hour_window.to } }
      : rest;
  });

export const AchievementEntrySchema = z
  .object({
    id: z.string().regex(/^[a-z][a-z0-9_]*$/, 'Must be snake_case'),
    name: z.string().min(1).max(64),
    emoji: z.string().min(1),
    description: z.string().min(1),
    points: z.number().int().min(0),
    special: z.boolean().default(false),
    predicate: PredicateSchema,
  })
  .transform(
    (entry): AchievementRule => ({
      id: entry.id,
      name: entry.name,
      emoji: entry.emoji,
      description: entry.description,
      pointsAwarded: entry.points,
      predicate: entry.predicate,
      isSpecial: entry.special,
    })
  );

export const AchievementsFileSchema = z.object({
  achievements: z.array(AchievementEntrySchema).default([]),
});

// ============================================================================
// Anonymous names
// ============================================================================

export const NamesFileSchema = z.object({
  adjectives: z.array(z.string().min(1)).min(1),
  nouns: z.array(z.string().min(1)).min(1),
});

export type NamesFile = z.infer<typeof NamesFileSchema>;
