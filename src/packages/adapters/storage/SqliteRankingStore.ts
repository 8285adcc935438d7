/**
 * SqliteRankingStore
 *
 * better-sqlite3 implementation of IRankingStore. Every public method runs
 * inside a single `db.transaction(...)`, so a ledger entry and the aggregate
 * increments it implies commit together or not at all.
 *
 * Aggregates are only ever changed with `SET x = x + ?`. Rank changes use a
 * compare-and-set on current_rank_id; duplicate grants are caught by the
 * unique index on (user_id, achievement_id).
 *
 * @module adapters/storage/SqliteRankingStore
 */

import Database from 'better-sqlite3';
import type { Logger } from 'pino';
import { createLogger } from '../../../utils/logger.js';
import { previousUtcDay, utcDay } from '../../../utils/timestamps.js';
import {
  ConsistencyError,
  LedgerError,
  advanceStreak,
  errorMessage,
  isActivityType,
  type ActivityReference,
  type HourWindow,
  type LeaderboardWindow,
  type LedgerEntryType,
  type RankDefinition,
} from '../../core/domain/index.js';
import type {
  AchievementGrant,
  AppendOptions,
  DailyLoginResult,
  IRankingStore,
  LeaderboardRow,
  NewAchievementGrant,
  NewPointTransaction,
  NewRankTransition,
  PointTransaction,
  StreakBonusFor,
  RankTransition,
  UserRankingState,
  UserTotalsSnapshot,
} from '../../core/ports/index.js';

// =============================================================================
// Row Types
// =============================================================================

interface TransactionRow {
  id: number;
  user_id: number;
  points_delta: number;
  activity_type: string;
  reference_id: number | null;
  reference_kind: string | null;
  description: string;
  created_at: string;
}

interface UserStateRow {
  user_id: number;
  total_points: number;
  current_rank_id: number;
  weekly_points: number;
  monthly_points: number;
  consecutive_active_days: number;
  last_activity_at: string | null;
  highest_rank_achieved: number;
  achievement_count: number;
  created_at: string;
  updated_at: string;
}

interface TransitionRow {
  id: number;
  user_id: number;
  old_rank_id: number;
  new_rank_id: number;
  points_at_change: number;
  reason: string;
  created_at: string;
}

interface GrantRow {
  id: number;
  user_id: number;
  achievement_id: string;
  points_awarded: number;
  granted_at: string;
}

interface TotalsRow {
  user_id: number;
  total_points: number;
  ledger_total: number;
  current_rank_id: number;
  achievement_count: number;
  grant_count: number;
}

/** Column each leaderboard window ranks by */
const WINDOW_COLUMNS: Record<LeaderboardWindow, string> = {
  weekly: 'weekly_points',
  monthly: 'monthly_points',
  all_time: 'total_points',
};

const HOUR_SQL = `CAST(strftime('%H', created_at) AS INTEGER)`;

// =============================================================================
// SqliteRankingStore
// =============================================================================

export class SqliteRankingStore implements IRankingStore {
  private readonly db: Database.Database;
  private readonly log: Logger;

  constructor(db: Database.Database, log?: Logger) {
    this.db = db;
    this.log = log ?? createLogger('ranking-store');
  }

  // ---------------------------------------------------------------------------
  // Rank definitions
  // ---------------------------------------------------------------------------

  async seedRankDefinitions(ranks: readonly RankDefinition[]): Promise<void> {
    const upsert = this.db.prepare<[number, string, string, number, string, string, string, number]>(`
      INSERT INTO rank_definitions
        (rank_id, rank_name, rank_emoji, points_required, rank_description, rank_color, perks_json, is_special)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(rank_id) DO UPDATE SET
        rank_name = excluded.rank_name,
        rank_emoji = excluded.rank_emoji,
        points_required = excluded.points_required,
        rank_description = excluded.rank_description,
        rank_color = excluded.rank_color,
        perks_json = excluded.perks_json,
        is_special = excluded.is_special
    `);

    this.run('seed rank definitions', () => {
      this.db.transaction(() => {
        for (const rank of ranks) {
          upsert.run(
            rank.rankId,
            rank.name,
            rank.emoji,
            rank.pointsRequired,
            rank.description,
            rank.color,
            JSON.stringify(rank.perks),
            rank.isSpecial ? 1 : 0
          );
        }
      })();
    });

    this.log.info({ event: 'ranking.ranks_seeded', count: ranks.length }, 'Rank definitions seeded');
  }

  // ---------------------------------------------------------------------------
  // User state
  // ---------------------------------------------------------------------------

  async initializeUser(userId: number, initialRankId: number, at: string): Promise<boolean> {
    return this.run('initialize user', () => this.insertUserIfAbsent(userId, initialRankId, at));
  }

  async getUserState(userId: number): Promise<UserRankingState | null> {
    const row = this.run('read user state', () =>
      this.db
        .prepare<[number], UserStateRow>('SELECT * FROM user_ranking_state WHERE user_id = ?')
        .get(userId)
    );
    return row ? mapUserState(row) : null;
  }

  // ---------------------------------------------------------------------------
  // Ledger
  // ---------------------------------------------------------------------------

  async appendTransactions(
    userId: number,
    entries: readonly NewPointTransaction[],
    options: AppendOptions = {}
  ): Promise<PointTransaction[]> {
    return this.run('append transactions', () =>
      this.db.transaction(() => {
        const inserted = entries.map((entry) => this.insertTransaction(userId, entry));
        const last = inserted[inserted.length - 1];

        if (options.consecutiveActiveDays !== undefined) {
          this.db.prepare<[number, number]>(`
            UPDATE user_ranking_state SET consecutive_active_days = ? WHERE user_id = ?
          `).run(options.consecutiveActiveDays, userId);
        }

        if (last) {
          this.db.prepare<[string, number]>(`
            UPDATE user_ranking_state SET last_activity_at = ? WHERE user_id = ?
          `).run(last.createdAt, userId);
        }

        return inserted;
      })()
    );
  }

  async appendDailyLogin(
    userId: number,
    login: NewPointTransaction,
    bonusFor: StreakBonusFor
  ): Promise<DailyLoginResult> {
    return this.run('append daily login', () =>
      this.db.transaction((): DailyLoginResult => {
        const previous = this.db.prepare<[number], { created_at: string }>(`
          SELECT created_at FROM point_transactions
          WHERE user_id = ? AND activity_type = 'daily_login'
          ORDER BY id DESC
          LIMIT 1
        `).get(userId);
        const state = this.db.prepare<[number], { consecutive_active_days: number }>(`
          SELECT consecutive_active_days FROM user_ranking_state WHERE user_id = ?
        `).get(userId);
        if (!state) {
          throw new LedgerError(`No ranking state for user ${userId}`);
        }

        const streak = advanceStreak(
          state.consecutive_active_days,
          previous ? utcDay(previous.created_at) : null,
          utcDay(login.createdAt),
          previousUtcDay(login.createdAt)
        );

        const transactions = [this.insertTransaction(userId, login)];
        const bonus = streak.advanced ? bonusFor(streak.days) : null;
        if (bonus) transactions.push(this.insertTransaction(userId, bonus));

        this.db.prepare<[number, string, number]>(`
          UPDATE user_ranking_state
          SET consecutive_active_days = ?, last_activity_at = ?
          WHERE user_id = ?
        `).run(streak.days, login.createdAt, userId);

        return { transactions, consecutiveActiveDays: streak.days };
      })()
    );
  }

  async getLastTransaction(
    userId: number,
    activityType: LedgerEntryType
  ): Promise<PointTransaction | null> {
    const row = this.run('read last transaction', () =>
      this.db.prepare<[number, string], TransactionRow>(`
        SELECT * FROM point_transactions
        WHERE user_id = ? AND activity_type = ?
        ORDER BY id DESC
        LIMIT 1
      `).get(userId, activityType)
    );
    return row ? mapTransaction(row) : null;
  }

  async countTransactions(
    userId: number,
    activityTypes: readonly LedgerEntryType[],
    hourWindow?: HourWindow
  ): Promise<number> {
    if (activityTypes.length === 0) return 0;

    const placeholders = activityTypes.map(() => '?').join(', ');
    let sql = `
      SELECT COUNT(*) AS count FROM point_transactions
      WHERE user_id = ? AND activity_type IN (${placeholders})
    `;
    const params: Array<string | number> = [userId, ...activityTypes];

    if (hourWindow) {
      const joiner = hourWindow.fromHour < hourWindow.toHour ? 'AND' : 'OR';
      sql += ` AND (${HOUR_SQL} >= ? ${joiner} ${HOUR_SQL} < ?)`;
      params.push(hourWindow.fromHour, hourWindow.toHour);
    }

    const row = this.run('count transactions', () =>
      this.db.prepare<Array<string | number>, { count: number }>(sql).get(...params)
    );
    return row?.count ?? 0;
  }

  async listTransactions(userId: number, limit: number): Promise<PointTransaction[]> {
    const rows = this.run('list transactions', () =>
      this.db.prepare<[number, number], TransactionRow>(`
        SELECT * FROM point_transactions WHERE user_id = ? ORDER BY id DESC LIMIT ?
      `).all(userId, limit)
    );
    return rows.map(mapTransaction);
  }

  // ---------------------------------------------------------------------------
  // Rank transitions
  // ---------------------------------------------------------------------------

  async commitRankTransition(transition: NewRankTransition): Promise<RankTransition | null> {
    return this.run('commit rank transition', () =>
      this.db.transaction((): RankTransition | null => {
        const updated = this.db.prepare<[number, number, string, number, number]>(`
          UPDATE user_ranking_state
          SET current_rank_id = ?,
              highest_rank_achieved = MAX(highest_rank_achieved, ?),
              updated_at = ?
          WHERE user_id = ? AND current_rank_id = ?
        `).run(
          transition.newRankId,
          transition.newRankId,
          transition.createdAt,
          transition.userId,
          transition.oldRankId
        );

        if (updated.changes === 0) return null;

        const result = this.db.prepare<[number, number, number, number, string, string]>(`
          INSERT INTO rank_transitions
            (user_id, old_rank_id, new_rank_id, points_at_change, reason, created_at)
          VALUES (?, ?, ?, ?, ?, ?)
        `).run(
          transition.userId,
          transition.oldRankId,
          transition.newRankId,
          transition.pointsAtChange,
          transition.reason,
          transition.createdAt
        );

        return { id: Number(result.lastInsertRowid), ...transition };
      })()
    );
  }

  async listRankTransitions(userId: number): Promise<RankTransition[]> {
    const rows = this.run('list rank transitions', () =>
      this.db.prepare<[number], TransitionRow>(`
        SELECT * FROM rank_transitions WHERE user_id = ? ORDER BY id ASC
      `).all(userId)
    );
    return rows.map((row) => ({
      id: row.id,
      userId: row.user_id,
      oldRankId: row.old_rank_id,
      newRankId: row.new_rank_id,
      pointsAtChange: row.points_at_change,
      reason: row.reason,
      createdAt: row.created_at,
    }));
  }

  // ---------------------------------------------------------------------------
  // Achievements
  // ---------------------------------------------------------------------------

  async getGrantedAchievementIds(userId: number): Promise<Set<string>> {
    const rows = this.run('read granted achievements', () =>
      this.db.prepare<[number], { achievement_id: string }>(`
        SELECT achievement_id FROM achievement_grants WHERE user_id = ?
      `).all(userId)
    );
    return new Set(rows.map((row) => row.achievement_id));
  }

  async insertAchievementGrant(
    grant: NewAchievementGrant,
    reward: NewPointTransaction
  ): Promise<{ grant: AchievementGrant; transaction: PointTransaction }> {
    try {
      return this.db.transaction(() => {
        const transaction = this.insertTransaction(grant.userId, reward);

        const result = this.db.prepare<[number, string, number, number, string]>(`
          INSERT INTO achievement_grants
            (user_id, achievement_id, points_awarded, transaction_id, granted_at)
          VALUES (?, ?, ?, ?, ?)
        `).run(grant.userId, grant.achievementId, grant.pointsAwarded, transaction.id, grant.grantedAt);

        this.db.prepare<[number]>(`
          UPDATE user_ranking_state SET achievement_count = achievement_count + 1 WHERE user_id = ?
        `).run(grant.userId);

        return {
          grant: { id: Number(result.lastInsertRowid), ...grant },
          transaction,
        };
      })();
    } catch (err) {
      if (err instanceof Database.SqliteError && err.code === 'SQLITE_CONSTRAINT_UNIQUE') {
        throw new ConsistencyError(
          `Achievement ${grant.achievementId} already granted to user ${grant.userId}`,
          grant.userId,
          grant.achievementId
        );
      }
      throw new LedgerError(`Failed to grant achievement: ${errorMessage(err)}`, { cause: err });
    }
  }

  async listAchievementGrants(userId: number, limit: number): Promise<AchievementGrant[]> {
    const rows = this.run('list achievement grants', () =>
      this.db.prepare<[number, number], GrantRow>(`
        SELECT id, user_id, achievement_id, points_awarded, granted_at
        FROM achievement_grants
        WHERE user_id = ?
        ORDER BY granted_at DESC, id DESC
        LIMIT ?
      `).all(userId, limit)
    );
    return rows.map((row) => ({
      id: row.id,
      userId: row.user_id,
      achievementId: row.achievement_id,
      pointsAwarded: row.points_awarded,
      grantedAt: row.granted_at,
    }));
  }

  // ---------------------------------------------------------------------------
  // Leaderboards
  // ---------------------------------------------------------------------------

  async getLeaderboardRows(window: LeaderboardWindow, limit: number): Promise<LeaderboardRow[]> {
    const column = WINDOW_COLUMNS[window];
    // user_id breaks ties and is never selected
    const rows = this.run('read leaderboard', () =>
      this.db.prepare<[number], { points: number; rank_id: number }>(`
        SELECT ${column} AS points, current_rank_id AS rank_id
        FROM user_ranking_state
        WHERE ${column} > 0
        ORDER BY ${column} DESC, user_id ASC
        LIMIT ?
      `).all(limit)
    );
    return rows.map((row) => ({ points: row.points, rankId: row.rank_id }));
  }

  async getLeaderboardPosition(userId: number, window: LeaderboardWindow): Promise<number | null> {
    const column = WINDOW_COLUMNS[window];
    const row = this.run('read leaderboard position', () =>
      this.db.prepare<[number], { position: number }>(`
        SELECT 1 + (
          SELECT COUNT(*) FROM user_ranking_state other
          WHERE other.${column} > 0
            AND (other.${column} > me.${column}
              OR (other.${column} = me.${column} AND other.user_id < me.user_id))
        ) AS position
        FROM user_ranking_state me
        WHERE me.user_id = ? AND me.${column} > 0
      `).get(userId)
    );
    return row ? row.position : null;
  }

  // ---------------------------------------------------------------------------
  // Reconciliation
  // ---------------------------------------------------------------------------

  async listUserTotals(): Promise<UserTotalsSnapshot[]> {
    const rows = this.run('list user totals', () =>
      this.db.prepare<[], TotalsRow>(`
        SELECT
          s.user_id,
          s.total_points,
          COALESCE((SELECT SUM(points_delta) FROM point_transactions t WHERE t.user_id = s.user_id), 0) AS ledger_total,
          s.current_rank_id,
          s.achievement_count,
          (SELECT COUNT(*) FROM achievement_grants g WHERE g.user_id = s.user_id) AS grant_count
        FROM user_ranking_state s
        ORDER BY s.user_id ASC
      `).all()
    );
    return rows.map((row) => ({
      userId: row.user_id,
      totalPoints: row.total_points,
      ledgerTotal: row.ledger_total,
      currentRankId: row.current_rank_id,
      achievementCount: row.achievement_count,
      grantCount: row.grant_count,
    }));
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private insertUserIfAbsent(userId: number, rankId: number, at: string): boolean {
    const result = this.db.prepare<[number, number, number, string, string]>(`
      INSERT OR IGNORE INTO user_ranking_state
        (user_id, current_rank_id, highest_rank_achieved, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(userId, rankId, rankId, at, at);
    return result.changes > 0;
  }

  /** Caller must already be inside a transaction */
  private insertTransaction(userId: number, entry: NewPointTransaction): PointTransaction {
    const result = this.db.prepare<[number, number, string, number | null, string | null, string, string]>(`
      INSERT INTO point_transactions
        (user_id, points_delta, activity_type, reference_id, reference_kind, description, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      userId,
      entry.pointsDelta,
      entry.activityType,
      entry.reference?.targetId ?? null,
      entry.reference?.targetKind ?? null,
      entry.description,
      entry.createdAt
    );

    const updated = this.db.prepare<[number, number, number, string, number]>(`
      UPDATE user_ranking_state
      SET total_points = total_points + ?,
          weekly_points = weekly_points + ?,
          monthly_points = monthly_points + ?,
          updated_at = ?
      WHERE user_id = ?
    `).run(entry.pointsDelta, entry.pointsDelta, entry.pointsDelta, entry.createdAt, userId);

    if (updated.changes === 0) {
      throw new LedgerError(`No ranking state for user ${userId}`);
    }

    return { id: Number(result.lastInsertRowid), userId, ...entry };
  }

  /**
   * Run a storage operation, wrapping driver failures in LedgerError.
   */
  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof LedgerError) throw err;
      throw new LedgerError(`Failed to ${operation}: ${errorMessage(err)}`, { cause: err });
    }
  }
}

// =============================================================================
// Row Mapping
// =============================================================================

function mapTransaction(row: TransactionRow): PointTransaction {
  return {
    id: row.id,
    userId: row.user_id,
    pointsDelta: row.points_delta,
    activityType: toLedgerEntryType(row.activity_type),
    reference: mapReference(row.reference_id, row.reference_kind),
    description: row.description,
    createdAt: row.created_at,
  };
}

function mapReference(id: number | null, kind: string | null): ActivityReference | null {
  if (id === null) return null;
  if (kind === 'confession' || kind === 'comment') {
    return { targetId: id, targetKind: kind };
  }
  return null;
}

function toLedgerEntryType(value: string): LedgerEntryType {
  if (isActivityType(value) || value === 'achievement_reward' || value === 'rank_up_bonus') {
    return value;
  }
  throw new LedgerError(`Unknown ledger entry type in storage: ${value}`);
}

function mapUserState(row: UserStateRow): UserRankingState {
  return {
    userId: row.user_id,
    totalPoints: row.total_points,
    currentRankId: row.current_rank_id,
    weeklyPoints: row.weekly_points,
    monthlyPoints: row.monthly_points,
    consecutiveActiveDays: row.consecutive_active_days,
    lastActivityAt: row.last_activity_at,
    highestRankAchieved: row.highest_rank_achieved,
    achievementCount: row.achievement_count,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
