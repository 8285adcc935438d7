/**
 * Confession ranking engine
 *
 * Points, ranks, achievements and anonymous leaderboards for a confession
 * bot. Collaborators talk to RankingService; everything else is exported for
 * wiring and tests.
 */

export * from './packages/core/domain/index.js';
export * from './packages/core/ports/index.js';
export * from './services/ranking/index.js';
export {
  CATALOG_FILES,
  loadAchievementCatalog,
  loadCatalog,
  loadNamePool,
  loadRankRegistry,
  parseCatalogYaml,
  type RankingCatalog,
} from './packages/adapters/catalog/CatalogLoader.js';
export { SqliteRankingStore } from './packages/adapters/storage/SqliteRankingStore.js';
export {
  createNoOpRankingMetrics,
  createPrometheusRankingMetrics,
  type RankingMetrics,
} from './packages/adapters/metrics/ranking-metrics.js';
export { openDatabase, type OpenDatabaseOptions } from './db/connection.js';
export { runMigrations, MIGRATIONS, type Migration } from './db/migrations/index.js';
export {
  DEFAULT_ENGINE_CONFIG,
  getConfig,
  loadConfig,
  type AppConfig,
  type RankingEngineConfig,
} from './config.js';
export { logger, createLogger } from './utils/logger.js';
