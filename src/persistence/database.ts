/**
 * DatabaseWrapper: thin wrapper around better-sqlite3.
 *
 * Responsibilities:
 *  - Open a SQLite database with the required PRAGMAs (WAL mode, etc.)
 *  - Expose the raw BetterSqlite3.Database instance for use by query modules
 *  - Implement the DatabaseService lifecycle interface (initialize / shutdown)
 */

import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { BaseService } from '../core/di.js'
import { runMigrations } from './migrations/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

export const IN_MEMORY_DATABASE = ':memory:'

// ---------------------------------------------------------------------------
// DatabaseWrapper
// ---------------------------------------------------------------------------

export class DatabaseWrapper {
  private _db: BetterSqlite3Database | null = null
  private readonly _path: string

  constructor(databasePath: string) {
    this._path = databasePath
  }

  /**
   * Open the database and apply PRAGMAs. Creates the parent directory of a
   * file database. Calling open() when already open is a no-op.
   */
  open(): void {
    if (this._db !== null) {
      return
    }

    if (this._path !== IN_MEMORY_DATABASE) {
      mkdirSync(dirname(this._path), { recursive: true })
    }

    logger.debug({ path: this._path }, 'Opening SQLite database')
    this._db = new BetterSqlite3(this._path)

    // In-memory databases report "memory" here
    const journalMode: unknown = this._db.pragma('journal_mode = WAL', { simple: true })
    if (journalMode !== 'wal' && this._path !== IN_MEMORY_DATABASE) {
      logger.warn({ journalMode }, 'WAL journal mode could not be enabled')
    }
    this._db.pragma('busy_timeout = 5000')
    this._db.pragma('synchronous = NORMAL')
    this._db.pragma('foreign_keys = ON')
  }

  /** Close the database. Calling close() when already closed is a no-op. */
  close(): void {
    if (this._db === null) {
      return
    }

    this._db.close()
    this._db = null
    logger.debug({ path: this._path }, 'SQLite database closed')
  }

  /**
   * @throws {Error} if the database has not been opened yet
   */
  get db(): BetterSqlite3Database {
    if (this._db === null) {
      throw new Error('DatabaseWrapper: database is not open. Call open() first.')
    }
    return this._db
  }

  get isOpen(): boolean {
    return this._db !== null
  }
}

// ---------------------------------------------------------------------------
// DatabaseService
// ---------------------------------------------------------------------------

export interface DatabaseService extends BaseService {
  readonly isOpen: boolean
  /** Raw BetterSqlite3 database instance, for the query functions */
  readonly db: BetterSqlite3Database
}

export class DatabaseServiceImpl implements DatabaseService {
  private readonly _wrapper: DatabaseWrapper

  constructor(databasePath: string) {
    this._wrapper = new DatabaseWrapper(databasePath)
  }

  get isOpen(): boolean {
    return this._wrapper.isOpen
  }

  get db(): BetterSqlite3Database {
    return this._wrapper.db
  }

  initialize(): Promise<void> {
    this._wrapper.open()
    runMigrations(this._wrapper.db)
    logger.info('DatabaseService initialized')
    return Promise.resolve()
  }

  shutdown(): Promise<void> {
    this._wrapper.close()
    return Promise.resolve()
  }
}

export function createDatabaseService(databasePath: string): DatabaseService {
  return new DatabaseServiceImpl(databasePath)
}
