/**
 * Ranking Store Interface
 *
 * Contract for the persistence behind the ranking engines. Every method is
 * one atomic unit: it either applies completely or not at all. Aggregates are
 * changed with in-database increments, never read-then-write, so concurrent
 * awards for the same user cannot lose updates.
 *
 * Implementations:
 * - SqliteRankingStore: better-sqlite3
 *
 * @module packages/core/ports/ranking-store
 */

import type {
  ActivityReference,
  HourWindow,
  LeaderboardWindow,
  LedgerEntryType,
  RankDefinition,
} from '../domain/index.js';

// =============================================================================
// Records
// =============================================================================

/**
 * Immutable ledger entry
 */
export interface PointTransaction {
  id: number;
  userId: number;
  pointsDelta: number;
  activityType: LedgerEntryType;
  reference: ActivityReference | null;
  description: string;
  createdAt: string;
}

export type NewPointTransaction = Omit<PointTransaction, 'id' | 'userId'>;

/**
 * Per-user aggregate, one row per user
 */
export interface UserRankingState {
  userId: number;
  totalPoints: number;
  currentRankId: number;
  weeklyPoints: number;
  monthlyPoints: number;
  consecutiveActiveDays: number;
  lastActivityAt: string | null;
  highestRankAchieved: number;
  achievementCount: number;
  createdAt: string;
  updatedAt: string;
}

export interface RankTransition {
  id: number;
  userId: number;
  oldRankId: number;
  newRankId: number;
  pointsAtChange: number;
  reason: string;
  createdAt: string;
}

export type NewRankTransition = Omit<RankTransition, 'id'>;

export interface AchievementGrant {
  id: number;
  userId: number;
  achievementId: string;
  pointsAwarded: number;
  grantedAt: string;
}

export type NewAchievementGrant = Omit<AchievementGrant, 'id'>;

/**
 * Identity-free leaderboard row. Implementations must not select user ids.
 */
export interface LeaderboardRow {
  points: number;
  rankId: number;
}

/**
 * Aggregate totals compared against the ledger by reconciliation
 */
export interface UserTotalsSnapshot {
  userId: number;
  totalPoints: number;
  ledgerTotal: number;
  currentRankId: number;
  achievementCount: number;
  grantCount: number;
}

export interface AppendOptions {
  /** New streak length, written in the same unit as the entries */
  consecutiveActiveDays?: number;
}

/** Bonus entry earned by a login that advanced the streak to `streak`, if any */
export type StreakBonusFor = (streak: number) => NewPointTransaction | null;

export interface DailyLoginResult {
  /** The login entry, then the bonus entry when one was earned */
  transactions: PointTransaction[];
  consecutiveActiveDays: number;
}

// =============================================================================
// Store Interface
// =============================================================================

export interface IRankingStore {
  // ---------------------------------------------------------------------------
  // Rank definitions (seed data)
  // ---------------------------------------------------------------------------

  /** Insert or replace the rank table */
  seedRankDefinitions(ranks: readonly RankDefinition[]): Promise<void>;

  // ---------------------------------------------------------------------------
  // User state
  // ---------------------------------------------------------------------------

  /**
   * Create the user's state row at the given rank if absent.
   * @returns true when a row was created
   */
  initializeUser(userId: number, initialRankId: number, at: string): Promise<boolean>;

  getUserState(userId: number): Promise<UserRankingState | null>;

  // ---------------------------------------------------------------------------
  // Ledger
  // ---------------------------------------------------------------------------

  /**
   * Append entries for one user and apply their deltas to total, weekly and
   * monthly points in a single transaction.
   */
  appendTransactions(
    userId: number,
    entries: readonly NewPointTransaction[],
    options?: AppendOptions
  ): Promise<PointTransaction[]>;

  /**
   * Append a daily_login entry and update the streak in one transaction. The
   * previous login is read inside that transaction, so concurrent logins for
   * the same user see each other and only one of them advances the streak.
   */
  appendDailyLogin(
    userId: number,
    login: NewPointTransaction,
    bonusFor: StreakBonusFor
  ): Promise<DailyLoginResult>;

  /** Most recent entry of the given type, or null */
  getLastTransaction(userId: number, activityType: LedgerEntryType): Promise<PointTransaction | null>;

  countTransactions(
    userId: number,
    activityTypes: readonly LedgerEntryType[],
    hourWindow?: HourWindow
  ): Promise<number>;

  /** Newest first */
  listTransactions(userId: number, limit: number): Promise<PointTransaction[]>;

  // ---------------------------------------------------------------------------
  // Rank transitions
  // ---------------------------------------------------------------------------

  /**
   * Move the user from oldRankId to newRankId and write the audit record.
   * Compare-and-set: returns null when the user's current rank is no longer
   * oldRankId.
   */
  commitRankTransition(transition: NewRankTransition): Promise<RankTransition | null>;

  /** Oldest first */
  listRankTransitions(userId: number): Promise<RankTransition[]>;

  // ---------------------------------------------------------------------------
  // Achievements
  // ---------------------------------------------------------------------------

  getGrantedAchievementIds(userId: number): Promise<Set<string>>;

  /**
   * Insert the grant and its reward entry, apply the reward to the
   * aggregates and bump the achievement count.
   *
   * @throws ConsistencyError when the user already holds the achievement
   */
  insertAchievementGrant(
    grant: NewAchievementGrant,
    reward: NewPointTransaction
  ): Promise<{ grant: AchievementGrant; transaction: PointTransaction }>;

  /** Newest first */
  listAchievementGrants(userId: number, limit: number): Promise<AchievementGrant[]>;

  // ---------------------------------------------------------------------------
  // Leaderboards
  // ---------------------------------------------------------------------------

  /** Users with a positive window total, highest first, ties by user id */
  getLeaderboardRows(window: LeaderboardWindow, limit: number): Promise<LeaderboardRow[]>;

  /** 1-based position using the same ordering, or null without points */
  getLeaderboardPosition(userId: number, window: LeaderboardWindow): Promise<number | null>;

  // ---------------------------------------------------------------------------
  // Reconciliation
  // ---------------------------------------------------------------------------

  listUserTotals(): Promise<UserTotalsSnapshot[]>;
}
