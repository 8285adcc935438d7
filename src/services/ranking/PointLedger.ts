/**
 * PointLedger - Append-only point transactions
 *
 * Prices an activity, records it with the aggregate increments it implies,
 * and keeps the daily-login streak. A daily login whose streak reaches
 * `streakBonusMinDays` also earns a consecutive_days_bonus entry, written
 * in the same atomic unit as the login itself.
 *
 * @module services/ranking/PointLedger
 */

import type { Logger } from 'pino';
import { createLogger } from '../../utils/logger.js';
import { sqliteTimestamp, systemClock, type Clock } from '../../utils/timestamps.js';
import {
  LedgerError,
  calculatePoints,
  type ActivityContext,
  type ActivityReference,
  type ActivityType,
  type LedgerEntryType,
  type RankRegistry,
} from '../../packages/core/domain/index.js';
import type {
  IRankingStore,
  NewPointTransaction,
  PointTransaction,
} from '../../packages/core/ports/index.js';

// =============================================================================
// Types
// =============================================================================

export interface PointLedgerOptions {
  store: IRankingStore;
  ranks: RankRegistry;
  /** Streak length from which a daily login earns the bonus entry */
  streakBonusMinDays: number;
  clock?: Clock;
  logger?: Logger;
}

export interface RecordActivityInput {
  reference?: ActivityReference;
  context?: ActivityContext;
  description?: string;
}

export interface RecordedActivity {
  /** The entry for the reported activity */
  primary: PointTransaction;
  /** Entries appended alongside it (streak bonus) */
  extras: PointTransaction[];
  /** Streak after this activity; only set for daily logins */
  consecutiveActiveDays?: number;
}

// =============================================================================
// PointLedger
// =============================================================================

export class PointLedger {
  private readonly store: IRankingStore;
  private readonly ranks: RankRegistry;
  private readonly streakBonusMinDays: number;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(options: PointLedgerOptions) {
    this.store = options.store;
    this.ranks = options.ranks;
    this.streakBonusMinDays = options.streakBonusMinDays;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? createLogger('point-ledger');
  }

  /**
   * Append a single entry with an explicit delta. Initialises the user's
   * state at the lowest rank on first contact.
   */
  async append(
    userId: number,
    activityType: LedgerEntryType,
    delta: number,
    reference?: ActivityReference,
    description?: string
  ): Promise<PointTransaction> {
    const createdAt = sqliteTimestamp(this.clock());
    await this.ensureUser(userId, createdAt);

    const [transaction] = await this.store.appendTransactions(userId, [
      {
        pointsDelta: delta,
        activityType,
        reference: reference ?? null,
        description: description ?? `Points for ${activityType}`,
        createdAt,
      },
    ]);
    if (!transaction) {
      throw new LedgerError(`Ledger returned no entry for ${activityType}`);
    }
    return transaction;
  }

  /**
   * Price and record a reported activity.
   */
  async recordActivity(
    userId: number,
    activity: ActivityType,
    input: RecordActivityInput = {}
  ): Promise<RecordedActivity> {
    const createdAt = sqliteTimestamp(this.clock());
    await this.ensureUser(userId, createdAt);

    const entry: NewPointTransaction = {
      pointsDelta: calculatePoints(activity, input.context),
      activityType: activity,
      reference: input.reference ?? null,
      description: input.description ?? `Points for ${activity}`,
      createdAt,
    };

    let inserted: PointTransaction[];
    let streak: number | undefined;
    if (activity === 'daily_login') {
      const login = await this.store.appendDailyLogin(userId, entry, (days) =>
        days >= this.streakBonusMinDays
          ? {
              pointsDelta: calculatePoints('consecutive_days_bonus', { consecutiveDays: days }),
              activityType: 'consecutive_days_bonus',
              reference: null,
              description: `${days} consecutive days active`,
              createdAt,
            }
          : null
      );
      inserted = login.transactions;
      streak = login.consecutiveActiveDays;
    } else {
      inserted = await this.store.appendTransactions(userId, [entry]);
    }

    const [primary, ...extras] = inserted;
    if (!primary) {
      throw new LedgerError(`Ledger returned no entry for ${activity}`);
    }

    this.log.debug(
      {
        event: 'ranking.ledger_appended',
        userId,
        activityType: activity,
        pointsDelta: primary.pointsDelta,
        extras: extras.length,
        consecutiveActiveDays: streak,
      },
      'Ledger entries appended'
    );

    const recorded: RecordedActivity = { primary, extras };
    if (streak !== undefined) recorded.consecutiveActiveDays = streak;
    return recorded;
  }

  private async ensureUser(userId: number, at: string): Promise<void> {
    const created = await this.store.initializeUser(userId, this.ranks.lowest().rankId, at);
    if (created) {
      this.log.info({ event: 'ranking.user_initialized', userId }, 'Ranking state created');
    }
  }
}
