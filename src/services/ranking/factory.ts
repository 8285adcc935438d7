/**
 * Ranking service wiring
 *
 * `createRankingService` assembles the engines over an open database and a
 * loaded catalog; `openRankingRuntime` does the whole start-up from AppConfig
 * (open + migrate the database, load the seed files, seed the rank table).
 *
 * @module services/ranking/factory
 */

import type Database from 'better-sqlite3';
import type { Logger } from 'pino';
import { DEFAULT_ENGINE_CONFIG, type AppConfig, type RankingEngineConfig } from '../../config.js';
import { openDatabase } from '../../db/connection.js';
import { createLogger } from '../../utils/logger.js';
import type { Clock } from '../../utils/timestamps.js';
import type { RandomSource } from '../../packages/core/domain/index.js';
import { loadCatalog, type RankingCatalog } from '../../packages/adapters/catalog/CatalogLoader.js';
import {
  createNoOpRankingMetrics,
  type RankingMetrics,
} from '../../packages/adapters/metrics/ranking-metrics.js';
import { SqliteRankingStore } from '../../packages/adapters/storage/SqliteRankingStore.js';
import { AchievementEngine } from './AchievementEngine.js';
import { LeaderboardAggregator } from './LeaderboardAggregator.js';
import { PointLedger } from './PointLedger.js';
import { RankEngine } from './RankEngine.js';
import { RankingReconciliation } from './RankingReconciliation.js';
import { RankingService } from './RankingService.js';

export interface CreateRankingServiceOptions {
  db: Database.Database;
  catalog: RankingCatalog;
  engine?: Partial<RankingEngineConfig>;
  clock?: Clock;
  random?: RandomSource;
  logger?: Logger;
  metrics?: RankingMetrics;
}

export interface RankingComponents {
  service: RankingService;
  store: SqliteRankingStore;
  reconciliation: RankingReconciliation;
  catalog: RankingCatalog;
}

export interface RankingRuntime extends RankingComponents {
  db: Database.Database;
  close(): Promise<void>;
}

export async function createRankingService(
  options: CreateRankingServiceOptions
): Promise<RankingComponents> {
  const engine: RankingEngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...options.engine };
  const log = options.logger ?? createLogger('ranking');
  const metrics = options.metrics ?? createNoOpRankingMetrics();
  const { ranks, achievements, names } = options.catalog;

  const store = new SqliteRankingStore(options.db, log.child({ component: 'ranking-store' }));
  await store.seedRankDefinitions(ranks.all());

  const shared = {
    store,
    ...(options.clock ? { clock: options.clock } : {}),
  };

  const service = new RankingService({
    store,
    ranks,
    catalog: achievements,
    ledger: new PointLedger({
      ...shared,
      ranks,
      streakBonusMinDays: engine.streakBonusMinDays,
      logger: log.child({ component: 'point-ledger' }),
    }),
    rankEngine: new RankEngine({
      ...shared,
      ranks,
      rankUpBonus: engine.rankUpBonus,
      logger: log.child({ component: 'rank-engine' }),
      metrics,
    }),
    achievementEngine: new AchievementEngine({
      ...shared,
      catalog: achievements,
      logger: log.child({ component: 'achievement-engine' }),
      metrics,
    }),
    leaderboard: new LeaderboardAggregator({
      store,
      ranks,
      names,
      maxLimit: engine.leaderboardMaxLimit,
      ...(options.random ? { random: options.random } : {}),
    }),
    maxEvaluationPasses: engine.maxEvaluationPasses,
    logger: log.child({ component: 'ranking-service' }),
    metrics,
  });

  const reconciliation = new RankingReconciliation({
    ...shared,
    ranks,
    logger: log.child({ component: 'ranking-reconciliation' }),
  });

  return { service, store, reconciliation, catalog: options.catalog };
}

/**
 * Full start-up from configuration.
 */
export async function openRankingRuntime(
  config: AppConfig,
  overrides: Omit<CreateRankingServiceOptions, 'db' | 'catalog' | 'engine'> = {}
): Promise<RankingRuntime> {
  const catalog = loadCatalog(config.catalogDir);
  const db = openDatabase(config.database.path, { busyTimeoutMs: config.database.busyTimeoutMs });

  try {
    const components = await createRankingService({
      ...overrides,
      db,
      catalog,
      engine: config.engine,
    });

    return {
      ...components,
      db,
      async close() {
        await components.service.flushNotifications();
        db.close();
      },
    };
  } catch (err) {
    db.close();
    throw err;
  }
}
