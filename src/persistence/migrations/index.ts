/**
 * Migration runner for the SQLite persistence layer.
 *
 * Responsibilities:
 *  - Ensure the `schema_migrations` table exists
 *  - Track which migrations have already been applied
 *  - Apply pending migrations in version order, each in its own transaction
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { createLogger } from '../../utils/logger.js'
import { initialSchemaMigration } from './001-initial-schema.js'

const logger = createLogger('persistence:migrations')

export interface Migration {
  /** Unique version number (integer) */
  version: number
  name: string
  up(db: BetterSqlite3Database): void
}

// Registered migrations, in version order
export const MIGRATIONS: readonly Migration[] = [initialSchemaMigration]

/**
 * Ensure `schema_migrations` exists and run any pending migrations.
 * Safe to call multiple times.
 */
export function runMigrations(db: BetterSqlite3Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version    INTEGER PRIMARY KEY,
      name       TEXT    NOT NULL,
      applied_at TEXT    NOT NULL DEFAULT (datetime('now'))
    )
  `)

  const appliedVersions = new Set<number>(
    db
      .prepare<[], { version: number }>('SELECT version FROM schema_migrations')
      .all()
      .map((row) => row.version)
  )

  const pending = MIGRATIONS.filter((m) => !appliedVersions.has(m.version)).sort(
    (a, b) => a.version - b.version
  )

  if (pending.length === 0) {
    logger.debug('No pending migrations')
    return
  }

  const insertMigration = db.prepare<[number, string]>(
    'INSERT INTO schema_migrations (version, name) VALUES (?, ?)'
  )

  for (const migration of pending) {
    const applyMigration = db.transaction(() => {
      migration.up(db)
      insertMigration.run(migration.version, migration.name)
    })
    applyMigration()
    logger.info({ version: migration.version, name: migration.name }, 'Migration applied')
  }
}
