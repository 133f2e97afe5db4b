/**
 * Migration 001: runs and their iteration records.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const initialSchemaMigration: Migration = {
  version: 1,
  name: '001-initial-schema',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        id              TEXT PRIMARY KEY,
        goal            TEXT    NOT NULL,
        status          TEXT    NOT NULL DEFAULT 'running',
        setpoint        REAL    NOT NULL,
        max_iterations  INTEGER NOT NULL,
        iterations      INTEGER NOT NULL DEFAULT 0,
        best_pv         REAL,
        final_pv        REAL,
        total_cost_usd  REAL    NOT NULL DEFAULT 0.0,
        halt_reason     TEXT,
        config_snapshot TEXT,
        created_at      TEXT    NOT NULL DEFAULT (datetime('now')),
        updated_at      TEXT    NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE IF NOT EXISTS iterations (
        id             INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id         TEXT    NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
        iteration      INTEGER NOT NULL,
        pv             REAL    NOT NULL,
        best_pv        REAL    NOT NULL,
        control_value  REAL    NOT NULL,
        action         TEXT    NOT NULL,
        reason         TEXT    NOT NULL,
        quality_score  REAL,
        verdict        TEXT,
        cost_usd       REAL    NOT NULL DEFAULT 0.0,
        recorded_at    TEXT    NOT NULL,
        UNIQUE (run_id, iteration)
      );

      CREATE INDEX IF NOT EXISTS idx_iterations_run ON iterations(run_id);
      CREATE INDEX IF NOT EXISTS idx_runs_created ON runs(created_at);
    `)
  },
}
