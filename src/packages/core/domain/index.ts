/**
 * Core Domain
 *
 * Pure ranking types and rules: activities, point pricing, rank tiers,
 * achievement predicates, leaderboard windows and the error taxonomy.
 */

export * from './errors.js';
export * from './activity.js';
export * from './points.js';
export * from './ranks.js';
export * from './achievements.js';
export * from './leaderboard.js';
