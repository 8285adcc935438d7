/**
 * Catalog seed files
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  CATALOG_FILES,
  loadCatalog,
  loadRankRegistry,
  parseCatalogYaml,
} from '../../../src/packages/adapters/catalog/CatalogLoader.js';
import { AchievementsFileSchema, RanksFileSchema } from '../../../src/packages/adapters/catalog/CatalogSchema.js';
import { DEFAULT_CATALOG_DIR } from '../../../src/config.js';
import { CatalogError } from '../../../src/packages/core/domain/index.js';

function catalogError(fn: () => unknown): CatalogError {
  try {
    fn();
  } catch (err) {
    if (err instanceof CatalogError) return err;
    throw err;
  }
  throw new Error('expected CatalogError');
}

describe('parseCatalogYaml', () => {
  it('decodes ranks into domain definitions', () => {
    const file = parseCatalogYaml(
      `
ranks:
  - id: 1
    name: Newcomer
    emoji: "🆕"
    points_required: 0
  - id: 2
    name: Regular
    emoji: "📝"
    points_required: 100
    color: "#87CEEB"
    special: true
    perks:
      - { kind: daily_confession_limit, limit: 3 }
`,
      RanksFileSchema,
      'ranks.yaml'
    );

    expect(file.ranks[0]).toEqual({
      rankId: 1,
      name: 'Newcomer',
      emoji: '🆕',
      pointsRequired: 0,
      description: '',
      color: '#ffffff',
      perks: { version: 1, perks: [] },
      isSpecial: false,
    });
    expect(file.ranks[1]?.perks).toEqual({
      version: 1,
      perks: [{ kind: 'daily_confession_limit', limit: 3 }],
    });
    expect(file.ranks[1]?.isSpecial).toBe(true);
  });

  it('reports each invalid field', () => {
    const err = catalogError(() =>
      parseCatalogYaml(
        `
achievements:
  - id: Bad-Id
    name: Broken
    emoji: "x"
    description: d
    points: 10
    predicate: { kind: first_occurrence, activity: not_an_activity }
`,
        AchievementsFileSchema,
        'achievements.yaml'
      )
    );

    expect(err.message).toBe('Invalid achievements.yaml');
    expect(err.details).toHaveLength(2);
    expect(err.details[0]).toBe('achievements.0.id: Must be snake_case');
    expect(err.details[1]).toMatch(/^achievements\.0\.predicate\.activity: /);
  });

  it('wraps YAML syntax errors', () => {
    const err = catalogError(() => parseCatalogYaml('ranks: [', RanksFileSchema, 'ranks.yaml'));
    expect(err.message).toBe('Invalid YAML in ranks.yaml');
    expect(err.details).toHaveLength(1);
  });

  it('rejects equal hour bounds', () => {
    const err = catalogError(() =>
      parseCatalogYaml(
        `
achievements:
  - id: never
    name: Never
    emoji: "x"
    description: d
    points: 1
    predicate:
      kind: count_threshold
      activities: [confession_approved]
      threshold: 1
      hour_window: { from: 5, to: 5 }
`,
        AchievementsFileSchema,
        'achievements.yaml'
      )
    );
    expect(err.details).toEqual(['achievements.0.predicate.hour_window: from and to must differ']);
  });
});

describe('loadCatalog', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ranking-catalog-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads the shipped seed files', () => {
    const catalog = loadCatalog(DEFAULT_CATALOG_DIR);
    expect(catalog.ranks.all()).toHaveLength(12);
    expect(catalog.achievements.size).toBe(17);
    expect(catalog.names.size).toBe(324);
  });

  it('fails on a missing file', () => {
    const err = catalogError(() => loadCatalog(dir));
    expect(err.message).toBe(`Catalog file not found: ${path.join(dir, CATALOG_FILES.ranks)}`);
  });

  it('validates the rank table after parsing', () => {
    fs.writeFileSync(
      path.join(dir, CATALOG_FILES.ranks),
      `
ranks:
  - { id: 1, name: A, emoji: a, points_required: 0 }
  - { id: 2, name: B, emoji: b, points_required: 0 }
`
    );

    const err = catalogError(() => loadRankRegistry(dir));
    expect(err.format()).toBe('Error: Invalid rank table\n  - rank 2 requires 0, not above rank 1 (0)');
  });
});
