/**
 * Leaderboard Types & Anonymous Names
 *
 * Leaderboard entries carry a throwaway display name drawn from an
 * adjective × noun pool. Nothing links a name to a user across calls.
 *
 * @module packages/core/domain/leaderboard
 */

import { CatalogError, ValidationError } from './errors.js';

export const LEADERBOARD_WINDOWS = ['weekly', 'monthly', 'all_time'] as const;

export type LeaderboardWindow = (typeof LEADERBOARD_WINDOWS)[number];

export function parseLeaderboardWindow(value: string): LeaderboardWindow {
  const match = LEADERBOARD_WINDOWS.find((window) => window === value);
  if (!match) {
    throw new ValidationError(
      `Unknown leaderboard window: ${value} (expected ${LEADERBOARD_WINDOWS.join(', ')})`,
      'window'
    );
  }
  return match;
}

export interface LeaderboardEntry {
  /** 1-based position */
  position: number;
  displayName: string;
  points: number;
  rankName: string;
  rankEmoji: string;
}

/** Returns a float in [0, 1) */
export type RandomSource = () => number;

export class AnonymousNamePool {
  private readonly names: readonly string[];

  constructor(adjectives: readonly string[], nouns: readonly string[]) {
    if (adjectives.length === 0 || nouns.length === 0) {
      throw new CatalogError('Anonymous name pool needs at least one adjective and one noun');
    }
    const names: string[] = [];
    for (const adjective of adjectives) {
      for (const noun of nouns) {
        names.push(`${adjective} ${noun}`);
      }
    }
    this.names = names;
  }

  get size(): number {
    return this.names.length;
  }

  has(name: string): boolean {
    return this.names.includes(name);
  }

  /** Sample with replacement */
  pick(random: RandomSource): string {
    const index = Math.min(Math.floor(random() * this.names.length), this.names.length - 1);
    return this.names[index] ?? this.names[0] ?? '';
  }
}
