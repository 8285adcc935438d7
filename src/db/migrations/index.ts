/**
 * Migration Runner
 *
 * Applies the exported schema SQL in order, once each, recording applied ids
 * in schema_migrations. Each migration runs in its own transaction.
 */

import type Database from 'better-sqlite3';
import { createLogger } from '../../utils/logger.js';
import { RANKING_CORE_SCHEMA_SQL } from './001_ranking_core.js';

const log = createLogger('migrations');

export interface Migration {
  id: number;
  name: string;
  sql: string;
}

export const MIGRATIONS: readonly Migration[] = [
  { id: 1, name: 'ranking_core', sql: RANKING_CORE_SCHEMA_SQL },
];

const MIGRATIONS_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS schema_migrations (
  id INTEGER PRIMARY KEY,
  name TEXT NOT NULL,
  applied_at TEXT DEFAULT (datetime('now')) NOT NULL
);
`;

/**
 * Apply pending migrations.
 *
 * @returns ids of the migrations applied by this call
 */
export function runMigrations(
  db: Database.Database,
  migrations: readonly Migration[] = MIGRATIONS
): number[] {
  db.exec(MIGRATIONS_TABLE_SQL);

  const appliedRows = db.prepare<[], { id: number }>('SELECT id FROM schema_migrations').all();
  const applied = new Set(appliedRows.map((row) => row.id));
  const ran: number[] = [];

  for (const migration of [...migrations].sort((a, b) => a.id - b.id)) {
    if (applied.has(migration.id)) continue;

    db.transaction(() => {
      db.exec(migration.sql);
      db.prepare('INSERT INTO schema_migrations (id, name) VALUES (?, ?)').run(
        migration.id,
        migration.name
      );
    })();

    log.info({ event: 'db.migration_applied', id: migration.id, name: migration.name }, 'Migration applied');
    ran.push(migration.id);
  }

  return ran;
}
