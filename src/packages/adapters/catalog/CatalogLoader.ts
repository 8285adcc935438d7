/**
 * Catalog Loader
 *
 * Reads the rank table, achievement catalog and anonymous-name pool from YAML
 * files in a directory and validates them. Any problem is fatal: the loader
 * throws a CatalogError listing every offending field.
 *
 * @module packages/adapters/catalog/CatalogLoader
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import type { z } from 'zod';
import {
  AchievementCatalog,
  AnonymousNamePool,
  CatalogError,
  RankRegistry,
  errorMessage,
} from '../../core/domain/index.js';
import { AchievementsFileSchema, NamesFileSchema, RanksFileSchema } from './CatalogSchema.js';

export const CATALOG_FILES = {
  ranks: 'ranks.yaml',
  achievements: 'achievements.yaml',
  names: 'anonymous-names.yaml',
} as const;

export interface RankingCatalog {
  ranks: RankRegistry;
  achievements: AchievementCatalog;
  names: AnonymousNamePool;
}

/**
 * Parse one YAML document against a schema.
 *
 * @param source - file name used in error messages
 */
export function parseCatalogYaml<T>(
  content: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  source: string
): T {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (err) {
    throw new CatalogError(`Invalid YAML in ${source}`, [errorMessage(err)]);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new CatalogError(
      `Invalid ${source}`,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

function readCatalogFile(dir: string, file: string): string {
  const filePath = path.join(dir, file);
  if (!fs.existsSync(filePath)) {
    throw new CatalogError(`Catalog file not found: ${filePath}`);
  }
  return fs.readFileSync(filePath, 'utf-8');
}

export function loadRankRegistry(dir: string): RankRegistry {
  const file = parseCatalogYaml(
    readCatalogFile(dir, CATALOG_FILES.ranks),
    RanksFileSchema,
    CATALOG_FILES.ranks
  );
  return RankRegistry.fromDefinitions(file.ranks);
}

export function loadAchievementCatalog(dir: string): AchievementCatalog {
  const file = parseCatalogYaml(
    readCatalogFile(dir, CATALOG_FILES.achievements),
    AchievementsFileSchema,
    CATALOG_FILES.achievements
  );
  return new AchievementCatalog(file.achievements);
}

export function loadNamePool(dir: string): AnonymousNamePool {
  const file = parseCatalogYaml(
    readCatalogFile(dir, CATALOG_FILES.names),
    NamesFileSchema,
    CATALOG_FILES.names
  );
  return new AnonymousNamePool(file.adjectives, file.nouns);
}

/**
 * Load all three seed files from a catalog directory.
 */
export function loadCatalog(dir: string): RankingCatalog {
  return {
    ranks: loadRankRegistry(dir),
    achievements: loadAchievementCatalog(dir),
    names: loadNamePool(dir),
  };
}
