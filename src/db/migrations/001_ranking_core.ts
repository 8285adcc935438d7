/**
 * Migration 001: Ranking Core Schema
 *
 * - rank_definitions: seeded rank table
 * - user_ranking_state: one aggregate row per user
 * - point_transactions: append-only ledger (source of truth for totals)
 * - achievement_grants: one row per (user, achievement)
 * - rank_transitions: audit trail of rank changes
 */

export const RANKING_CORE_SCHEMA_SQL = `
-- =============================================================================
-- Rank Definitions
-- =============================================================================
-- Seed data, upserted on start-up from config/ranks.yaml.
-- perks_json holds the versioned perk list ({"version":1,"perks":[...]}).

CREATE TABLE IF NOT EXISTS rank_definitions (
  rank_id INTEGER PRIMARY KEY,
  rank_name TEXT NOT NULL,
  rank_emoji TEXT NOT NULL,
  points_required INTEGER NOT NULL,
  rank_description TEXT NOT NULL DEFAULT '',
  rank_color TEXT NOT NULL DEFAULT '#ffffff',
  perks_json TEXT NOT NULL DEFAULT '{"version":1,"perks":[]}',
  is_special INTEGER NOT NULL DEFAULT 0 CHECK (is_special IN (0, 1)),
  created_at TEXT DEFAULT (datetime('now')) NOT NULL
);

-- =============================================================================
-- User Ranking State
-- =============================================================================
-- weekly_points / monthly_points are accumulators reset by an external job.

CREATE TABLE IF NOT EXISTS user_ranking_state (
  user_id INTEGER PRIMARY KEY,
  total_points INTEGER NOT NULL DEFAULT 0,
  current_rank_id INTEGER NOT NULL,
  weekly_points INTEGER NOT NULL DEFAULT 0,
  monthly_points INTEGER NOT NULL DEFAULT 0,
  consecutive_active_days INTEGER NOT NULL DEFAULT 0,
  last_activity_at TEXT,
  highest_rank_achieved INTEGER NOT NULL,
  achievement_count INTEGER NOT NULL DEFAULT 0,
  created_at TEXT DEFAULT (datetime('now')) NOT NULL,
  updated_at TEXT DEFAULT (datetime('now')) NOT NULL,

  FOREIGN KEY (current_rank_id) REFERENCES rank_definitions(rank_id),
  FOREIGN KEY (highest_rank_achieved) REFERENCES rank_definitions(rank_id)
);

CREATE INDEX IF NOT EXISTS idx_user_ranking_state_weekly
  ON user_ranking_state(weekly_points DESC, user_id) WHERE weekly_points > 0;

CREATE INDEX IF NOT EXISTS idx_user_ranking_state_monthly
  ON user_ranking_state(monthly_points DESC, user_id) WHERE monthly_points > 0;

CREATE INDEX IF NOT EXISTS idx_user_ranking_state_total
  ON user_ranking_state(total_points DESC, user_id) WHERE total_points > 0;

-- =============================================================================
-- Point Transactions (append-only)
-- =============================================================================

CREATE TABLE IF NOT EXISTS point_transactions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id INTEGER NOT NULL,
  points_delta INTEGER NOT NULL,
  activity_type TEXT NOT NULL,
  reference_id INTEGER,
  reference_kind TEXT CHECK (reference_kind IN ('confession', 'comment')),
  description TEXT NOT NULL,
  created_at TEXT NOT NULL,

  CHECK ((reference_id IS NULL) = (reference_kind IS NULL)),
  FOREIGN KEY (user_id) REFERENCES user_ranking_state(user_id)
);

CREATE INDEX IF NOT EXISTS idx_point_transactions_user_activity
  ON point_transactions(user_id, activity_type, created_at);

CREATE TRIGGER IF NOT EXISTS trg_point_transactions_no_update
  BEFORE UPDATE ON point_transactions
BEGIN
  SELECT RAISE(ABORT, 'point_transactions is append-only');
END;

CREATE TRIGGER IF NOT EXISTS trg_point_transactions_no_delete
  BEFORE DELETE ON point_transactions
BEGIN
  SELECT RAISE(ABORT, 'point_transactions is append-only');
END;

-- =============================================================================
-- Achievement Grants
-- =============================================================================
-- The unique index is the backstop against concurrent double grants.

CREATE TABLE IF NOT EXISTS achievement_grants (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id INTEGER NOT NULL,
  achievement_id TEXT NOT NULL,
  points_awarded INTEGER NOT NULL,
  transaction_id INTEGER NOT NULL,
  granted_at TEXT NOT NULL,

  FOREIGN KEY (user_id) REFERENCES user_ranking_state(user_id),
  FOREIGN KEY (transaction_id) REFERENCES point_transactions(id)
);

CREATE UNIQUE INDEX IF NOT EXISTS idx_achievement_grants_user_achievement
  ON achievement_grants(user_id, achievement_id);

-- =============================================================================
-- Rank Transitions
-- =============================================================================

CREATE TABLE IF NOT EXISTS rank_transitions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id INTEGER NOT NULL,
  old_rank_id INTEGER NOT NULL,
  new_rank_id INTEGER NOT NULL,
  points_at_change INTEGER NOT NULL,
  reason TEXT NOT NULL,
  created_at TEXT NOT NULL,

  CHECK (new_rank_id > old_rank_id),
  FOREIGN KEY (user_id) REFERENCES user_ranking_state(user_id),
  FOREIGN KEY (old_rank_id) REFERENCES rank_definitions(rank_id),
  FOREIGN KEY (new_rank_id) REFERENCES rank_definitions(rank_id)
);

CREATE INDEX IF NOT EXISTS idx_rank_transitions_user
  ON rank_transitions(user_id, id);
`;
