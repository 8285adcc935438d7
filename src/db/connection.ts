/**
 * SQLite Connection
 *
 * Opens the ranking database with WAL journaling, foreign keys and a bounded
 * busy timeout, then applies pending migrations.
 */

import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import { runMigrations } from './migrations/index.js';

export interface OpenDatabaseOptions {
  /** How long a writer waits for a lock before failing (ms) */
  busyTimeoutMs?: number;
  /** Skip the migration step (default: false) */
  skipMigrations?: boolean;
}

export function openDatabase(
  filename: string,
  options: OpenDatabaseOptions = {}
): Database.Database {
  if (filename !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }

  const db = new Database(filename);
  if (filename !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`);

  if (!options.skipMigrations) {
    runMigrations(db);
  }

  return db;
}
