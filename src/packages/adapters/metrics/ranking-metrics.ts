/**
 * Ranking Metrics
 *
 * Prometheus counters for the ranking engine:
 * - Points awarded, by activity
 * - Award failures, by reason
 * - Rank transitions and achievement grants
 * - Duplicate grants caught by the unique index
 *
 * Services depend on the RankingMetrics interface; tests use the no-op
 * implementation.
 */

import { Counter, type Registry } from 'prom-client';

export const RANKING_METRICS_PREFIX = 'confession_ranking_';

// =============================================================================
// Types
// =============================================================================

export interface CounterMetric {
  inc(labels?: Record<string, string>): void;
  inc(value: number, labels?: Record<string, string>): void;
}

export interface RankingMetrics {
  /** Counter: Points entries appended, by activity */
  pointsAwarded: CounterMetric;
  /** Counter: awardPoints calls that failed, by reason */
  awardFailures: CounterMetric;
  /** Counter: Rank transitions committed */
  rankTransitions: CounterMetric;
  /** Counter: Achievements granted, by achievement */
  achievementsGranted: CounterMetric;
  /** Counter: Grants rejected by the unique index */
  duplicateGrantsPrevented: CounterMetric;
}

export const RANKING_METRIC_DEFINITIONS = {
  pointsAwarded: {
    name: `${RANKING_METRICS_PREFIX}points_awarded_total`,
    help: 'Point ledger entries appended by awardPoints',
    labelNames: ['activity'],
  },
  awardFailures: {
    name: `${RANKING_METRICS_PREFIX}award_failures_total`,
    help: 'awardPoints calls rejected or failed',
    labelNames: ['reason'],
  },
  rankTransitions: {
    name: `${RANKING_METRICS_PREFIX}rank_transitions_total`,
    help: 'Rank transitions committed',
    labelNames: [],
  },
  achievementsGranted: {
    name: `${RANKING_METRICS_PREFIX}achievements_granted_total`,
    help: 'Achievements granted',
    labelNames: ['achievement'],
  },
  duplicateGrantsPrevented: {
    name: `${RANKING_METRICS_PREFIX}duplicate_grants_prevented_total`,
    help: 'Achievement grants rejected as duplicates',
    labelNames: [],
  },
} as const;

// =============================================================================
// No-op Metrics
// =============================================================================

const noOpCounter: CounterMetric = {
  inc: () => {},
};

/**
 * Create no-op metrics for testing or when Prometheus is not wired.
 */
export function createNoOpRankingMetrics(): RankingMetrics {
  return {
    pointsAwarded: noOpCounter,
    awardFailures: noOpCounter,
    rankTransitions: noOpCounter,
    achievementsGranted: noOpCounter,
    duplicateGrantsPrevented: noOpCounter,
  };
}

// =============================================================================
// Prometheus Metrics
// =============================================================================

function counter(
  definition: { name: string; help: string; labelNames: readonly string[] },
  registry: Registry
): CounterMetric {
  const metric = new Counter({
    name: definition.name,
    help: definition.help,
    labelNames: [...definition.labelNames],
    registers: [registry],
  });

  return {
    inc(valueOrLabels?: number | Record<string, string>, labels?: Record<string, string>): void {
      if (typeof valueOrLabels === 'number') {
        if (labels) metric.inc(labels, valueOrLabels);
        else metric.inc(valueOrLabels);
      } else if (valueOrLabels) {
        metric.inc(valueOrLabels);
      } else {
        metric.inc();
      }
    },
  };
}

/**
 * Register the ranking counters on a prom-client registry.
 */
export function createPrometheusRankingMetrics(registry: Registry): RankingMetrics {
  return {
    pointsAwarded: counter(RANKING_METRIC_DEFINITIONS.pointsAwarded, registry),
    awardFailures: counter(RANKING_METRIC_DEFINITIONS.awardFailures, registry),
    rankTransitions: counter(RANKING_METRIC_DEFINITIONS.rankTransitions, registry),
    achievementsGranted: counter(RANKING_METRIC_DEFINITIONS.achievementsGranted, registry),
    duplicateGrantsPrevented: counter(RANKING_METRIC_DEFINITIONS.duplicateGrantsPrevented, registry),
  };
}
