/**
 * RankingReconciliation - Aggregate vs. ledger consistency
 *
 * Alert-only. NEVER auto-corrects: divergences are logged and returned for
 * human review.
 *
 * Checks:
 * 1. Ledger totals: total_points = Σ point_transactions.points_delta (per user)
 * 2. Rank consistency: current_rank_id >= rankFor(total_points) (per user).
 *    A rank above the total is legitimate after penalties; ranks never drop.
 * 3. Achievement count: achievement_count = number of grant rows (per user)
 *
 * @module services/ranking/RankingReconciliation
 */

import type { Logger } from 'pino';
import { createLogger } from '../../utils/logger.js';
import { sqliteTimestamp, systemClock, type Clock } from '../../utils/timestamps.js';
import { errorMessage, type RankRegistry } from '../../packages/core/domain/index.js';
import type { IRankingStore, UserTotalsSnapshot } from '../../packages/core/ports/index.js';

// =============================================================================
// Types
// =============================================================================

export type ReconciliationStatus = 'passed' | 'divergence_detected';

export interface ReconciliationCheck {
  name: 'ledger_totals' | 'rank_consistency' | 'achievement_count';
  status: 'passed' | 'failed';
  details: Record<string, number | string>;
}

export interface ReconciliationResult {
  startedAt: string;
  finishedAt: string;
  status: ReconciliationStatus;
  checks: ReconciliationCheck[];
  divergences: string[];
}

export interface RankingReconciliationOptions {
  store: IRankingStore;
  ranks: RankRegistry;
  clock?: Clock;
  logger?: Logger;
}

// =============================================================================
// RankingReconciliation
// =============================================================================

export class RankingReconciliation {
  private readonly store: IRankingStore;
  private readonly ranks: RankRegistry;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(options: RankingReconciliationOptions) {
    this.store = options.store;
    this.ranks = options.ranks;
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? createLogger('ranking-reconciliation');
  }

  async reconcile(): Promise<ReconciliationResult> {
    const startedAt = sqliteTimestamp(this.clock());
    const divergences: string[] = [];
    let checks: ReconciliationCheck[];

    try {
      const users = await this.store.listUserTotals();
      checks = [
        this.checkLedgerTotals(users, divergences),
        this.checkRankConsistency(users, divergences),
        this.checkAchievementCounts(users, divergences),
      ];
    } catch (err) {
      const details = { error: errorMessage(err) };
      divergences.push(`Could not read user totals: ${details.error}`);
      checks = [
        { name: 'ledger_totals', status: 'failed', details },
        { name: 'rank_consistency', status: 'failed', details },
        { name: 'achievement_count', status: 'failed', details },
      ];
    }

    const finishedAt = sqliteTimestamp(this.clock());
    const status: ReconciliationStatus = divergences.length > 0 ? 'divergence_detected' : 'passed';
    const passed = checks.filter((check) => check.status === 'passed').length;

    const fields = {
      event: `ranking.reconciliation_${status}`,
      checksRun: checks.length,
      divergences: divergences.length,
    };
    const message = `Reconciliation ${status}: ${passed}/${checks.length} checks passed`;
    if (status === 'passed') {
      this.log.info(fields, message);
    } else {
      this.log.warn({ ...fields, divergenceSummary: divergences.slice(0, 10) }, message);
    }

    return { startedAt, finishedAt, status, checks, divergences };
  }

  // ---------------------------------------------------------------------------
  // Checks
  // ---------------------------------------------------------------------------

  private checkLedgerTotals(users: readonly UserTotalsSnapshot[], divergences: string[]): ReconciliationCheck {
    let violations = 0;
    for (const user of users) {
      if (user.totalPoints !== user.ledgerTotal) {
        violations++;
        divergences.push(
          `Ledger total mismatch for user ${user.userId}: total_points=${user.totalPoints}, ledger=${user.ledgerTotal}`
        );
      }
    }
    return {
      name: 'ledger_totals',
      status: violations === 0 ? 'passed' : 'failed',
      details: { usersChecked: users.length, violations },
    };
  }

  private checkRankConsistency(users: readonly UserTotalsSnapshot[], divergences: string[]): ReconciliationCheck {
    let violations = 0;
    for (const user of users) {
      const expected = this.ranks.rankFor(user.totalPoints).rankId;
      if (user.currentRankId < expected) {
        violations++;
        divergences.push(
          `Missed promotion for user ${user.userId}: current=${user.currentRankId}, expected=${expected} at ${user.totalPoints} points`
        );
      }
    }
    return {
      name: 'rank_consistency',
      status: violations === 0 ? 'passed' : 'failed',
      details: { usersChecked: users.length, violations },
    };
  }

  private checkAchievementCounts(users: readonly UserTotalsSnapshot[], divergences: string[]): ReconciliationCheck {
    let violations = 0;
    for (const user of users) {
      if (user.achievementCount !== user.grantCount) {
        violations++;
        divergences.push(
          `Achievement count mismatch for user ${user.userId}: achievement_count=${user.achievementCount}, grants=${user.grantCount}`
        );
      }
    }
    return {
      name: 'achievement_count',
      status: violations === 0 ? 'passed' : 'failed',
      details: { usersChecked: users.length, violations },
    };
  }
}
