/**
 * Run query functions for the SQLite persistence layer.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { RunStatus } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Run row type
// ---------------------------------------------------------------------------

export interface RunRow {
  id: string
  goal: string
  status: RunStatus
  setpoint: number
  max_iterations: number
  iterations: number
  best_pv: number | null
  final_pv: number | null
  total_cost_usd: number
  halt_reason: string | null
  config_snapshot: string | null
  created_at: string
  updated_at: string
}

export type CreateRunInput = Pick<RunRow, 'id' | 'goal' | 'setpoint' | 'max_iterations'> & {
  config_snapshot?: string | null
}

export type UpdateRunInput = Partial<
  Pick<RunRow, 'status' | 'iterations' | 'best_pv' | 'final_pv' | 'total_cost_usd' | 'halt_reason'>
>

const UPDATABLE_KEYS: ReadonlyArray<keyof UpdateRunInput> = [
  'status',
  'iterations',
  'best_pv',
  'final_pv',
  'total_cost_usd',
  'halt_reason',
]

// ---------------------------------------------------------------------------
// Query functions
// ---------------------------------------------------------------------------

/**
 * Insert a new run in `running` status.
 */
export function createRun(db: BetterSqlite3Database, run: CreateRunInput): void {
  db.prepare(`
    INSERT INTO runs (id, goal, setpoint, max_iterations, config_snapshot)
    VALUES (@id, @goal, @setpoint, @max_iterations, @config_snapshot)
  `).run({ config_snapshot: null, ...run })
}

/**
 * Retrieve a run by id. Returns undefined if not found.
 */
export function getRun(db: BetterSqlite3Database, runId: string): RunRow | undefined {
  return db.prepare<[string], RunRow>('SELECT * FROM runs WHERE id = ?').get(runId)
}

/**
 * Update run fields. Only provided fields are updated.
 */
export function updateRun(db: BetterSqlite3Database, runId: string, updates: UpdateRunInput): void {
  const fields: string[] = ["updated_at = datetime('now')"]
  const params: Record<string, unknown> = { runId }

  for (const key of UPDATABLE_KEYS) {
    if (key in updates) {
      fields.push(`${key} = @${key}`)
      params[key] = updates[key]
    }
  }

  db.prepare(`UPDATE runs SET ${fields.join(', ')} WHERE id = @runId`).run(params)
}

/**
 * List runs, most recent first.
 */
export function listRuns(db: BetterSqlite3Database, limit = 20): RunRow[] {
  return db
    .prepare<[number], RunRow>('SELECT * FROM runs ORDER BY created_at DESC, rowid DESC LIMIT ?')
    .all(limit)
}
