/**
 * Migrate Command - rankctl migrate
 *
 * Applies pending schema migrations to the configured database.
 *
 * @module cli/commands/migrate
 */

import chalk from 'chalk';
import { openDatabase } from '../../db/connection.js';
import { MIGRATIONS, runMigrations } from '../../db/migrations/index.js';
import { printJson } from '../utils.js';

export interface MigrateCommandOptions {
  json?: boolean;
}

export function migrateCommand(dbPath: string, options: MigrateCommandOptions): number[] {
  const db = openDatabase(dbPath, { skipMigrations: true });
  let applied: number[];
  try {
    applied = runMigrations(db);
  } finally {
    db.close();
  }

  if (options.json) {
    printJson({ success: true, database: dbPath, applied });
    return applied;
  }

  if (applied.length === 0) {
    console.log(chalk.dim(`Database ${dbPath} is up to date`));
  } else {
    for (const id of applied) {
      const migration = MIGRATIONS.find((m) => m.id === id);
      console.log(`${chalk.green('✓')} ${String(id).padStart(3, '0')}_${migration?.name ?? 'unknown'}`);
    }
  }
  return applied;
}
