/**
 * Shared test fixtures: in-memory database, fixed clock, scripted random
 * source and a fully wired service.
 */

import type Database from 'better-sqlite3';
import pino from 'pino';
import { DEFAULT_CATALOG_DIR, type RankingEngineConfig } from '../../src/config.js';
import { openDatabase } from '../../src/db/connection.js';
import {
  AchievementCatalog,
  type AchievementRule,
  type RandomSource,
} from '../../src/packages/core/domain/index.js';
import { loadCatalog, type RankingCatalog } from '../../src/packages/adapters/catalog/CatalogLoader.js';
import type { RankingMetrics } from '../../src/packages/adapters/metrics/ranking-metrics.js';
import { createRankingService, type RankingComponents } from '../../src/services/ranking/index.js';

export const silentLogger = pino({ level: 'silent' });

export function setupDb(): Database.Database {
  return openDatabase(':memory:');
}

/** The seed files shipped in config/, loaded once */
export const defaultCatalog: RankingCatalog = loadCatalog(DEFAULT_CATALOG_DIR);

/**
 * Clock that only moves when told to.
 */
export class TestClock {
  private current: Date;

  constructor(start = '2024-03-10T12:00:00Z') {
    this.current = new Date(start);
  }

  readonly now = (): Date => new Date(this.current.getTime());

  set(iso: string): void {
    this.current = new Date(iso);
  }

  advanceDays(days: number): void {
    this.current = new Date(this.current.getTime() + days * 24 * 60 * 60 * 1000);
  }
}

/**
 * Returns the given values in order, then repeats the last one.
 */
export function scriptedRandom(values: readonly number[]): RandomSource {
  let index = 0;
  return () => {
    const value = values[Math.min(index, values.length - 1)] ?? 0;
    index++;
    return value;
  };
}

export interface TestServiceOptions {
  achievements?: readonly AchievementRule[] | 'default';
  engine?: Partial<RankingEngineConfig>;
  clock?: TestClock;
  random?: RandomSource;
  metrics?: RankingMetrics;
}

export interface TestService extends RankingComponents {
  db: Database.Database;
  clock: TestClock;
}

/**
 * RankingService over a fresh in-memory database. Uses an empty achievement
 * catalog unless `achievements` is given.
 */
export async function buildService(options: TestServiceOptions = {}): Promise<TestService> {
  const db = setupDb();
  const clock = options.clock ?? new TestClock();
  const achievements =
    options.achievements === 'default'
      ? defaultCatalog.achievements
      : new AchievementCatalog(options.achievements ?? []);

  const components = await createRankingService({
    db,
    catalog: { ...defaultCatalog, achievements },
    clock: clock.now,
    random: options.random ?? scriptedRandom([0]),
    logger: silentLogger,
    ...(options.engine ? { engine: options.engine } : {}),
    ...(options.metrics ? { metrics: options.metrics } : {}),
  });

  return { ...components, db, clock };
}
