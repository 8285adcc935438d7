/**
 * Ranking metrics
 */

import { describe, it, expect } from 'vitest';
import { Registry } from 'prom-client';
import {
  createNoOpRankingMetrics,
  createPrometheusRankingMetrics,
} from '../../../src/packages/adapters/metrics/ranking-metrics.js';

describe('createPrometheusRankingMetrics', () => {
  it('registers labelled counters on the given registry', async () => {
    const registry = new Registry();
    const metrics = createPrometheusRankingMetrics(registry);

    metrics.pointsAwarded.inc({ activity: 'comment_posted' });
    metrics.pointsAwarded.inc(2, { activity: 'comment_posted' });
    metrics.duplicateGrantsPrevented.inc();

    const points = await registry.getSingleMetric('confession_ranking_points_awarded_total')?.get();
    expect(points?.values).toEqual([{ value: 3, labels: { activity: 'comment_posted' } }]);

    const duplicates = await registry.getSingleMetric('confession_ranking_duplicate_grants_prevented_total')?.get();
    expect(duplicates?.values[0]?.value).toBe(1);
  });
});

describe('createNoOpRankingMetrics', () => {
  it('accepts every call', () => {
    const metrics = createNoOpRankingMetrics();
    expect(() => {
      metrics.awardFailures.inc({ reason: 'validation' });
      metrics.rankTransitions.inc(3);
    }).not.toThrow();
  });
});
