/**
 * Service Configuration
 *
 * Environment variables validated with zod. `loadConfig` is pure so tests can
 * pass their own environment; `getConfig` caches the result for the process.
 *
 * @module config
 */

import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/** Seed files ship in <repo>/config, one level above src/ (or dist/). */
export const DEFAULT_CATALOG_DIR = path.resolve(__dirname, '..', 'config');

// =============================================================================
// Schema
// =============================================================================

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('production'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  RANKING_DB_PATH: z.string().min(1).default('./data/ranking.db'),
  RANKING_DB_BUSY_TIMEOUT_MS: z.coerce.number().int().min(0).max(60_000).default(5000),
  RANKING_CATALOG_DIR: z.string().min(1).default(DEFAULT_CATALOG_DIR),
  RANKING_RANK_UP_BONUS: z.coerce.number().int().min(0).default(50),
  RANKING_MAX_EVALUATION_PASSES: z.coerce.number().int().min(1).max(10).default(2),
  RANKING_STREAK_BONUS_MIN_DAYS: z.coerce.number().int().min(1).default(3),
  RANKING_LEADERBOARD_MAX_LIMIT: z.coerce.number().int().min(1).max(1000).default(100),
});

export interface RankingEngineConfig {
  /** Bonus awarded per rank tier crossed */
  rankUpBonus: number;
  /** Upper bound on rank/achievement re-evaluation rounds per award */
  maxEvaluationPasses: number;
  /** Streak length from which daily logins earn a consecutive-days bonus */
  streakBonusMinDays: number;
  /** Largest leaderboard a caller may request */
  leaderboardMaxLimit: number;
}

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  logLevel: string;
  database: {
    path: string;
    busyTimeoutMs: number;
  };
  catalogDir: string;
  engine: RankingEngineConfig;
}

export const DEFAULT_ENGINE_CONFIG: RankingEngineConfig = {
  rankUpBonus: 50,
  maxEvaluationPasses: 2,
  streakBonusMinDays: 3,
  leaderboardMaxLimit: 100,
};

// =============================================================================
// Loading
// =============================================================================

/**
 * Parse configuration from an environment map.
 *
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid configuration:\n${problems}`);
  }

  const vars = parsed.data;
  return {
    nodeEnv: vars.NODE_ENV,
    logLevel: vars.LOG_LEVEL,
    database: {
      path: vars.RANKING_DB_PATH,
      busyTimeoutMs: vars.RANKING_DB_BUSY_TIMEOUT_MS,
    },
    catalogDir: vars.RANKING_CATALOG_DIR,
    engine: {
      rankUpBonus: vars.RANKING_RANK_UP_BONUS,
      maxEvaluationPasses: vars.RANKING_MAX_EVALUATION_PASSES,
      streakBonusMinDays: vars.RANKING_STREAK_BONUS_MIN_DAYS,
      leaderboardMaxLimit: vars.RANKING_LEADERBOARD_MAX_LIMIT,
    },
  };
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig(process.env);
  }
  return cached;
}
