/**
 * Iteration record query functions for the SQLite persistence layer.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { DecisionAction, IterationRecord, Verdict } from '../../core/types.js'

export interface IterationRow {
  id: number
  run_id: string
  iteration: number
  pv: number
  best_pv: number
  control_value: number
  action: DecisionAction
  reason: string
  quality_score: number | null
  verdict: Verdict | null
  cost_usd: number
  recorded_at: string
}

/**
 * Append one iteration record to a run.
 */
export function insertIteration(db: BetterSqlite3Database, runId: string, record: IterationRecord): void {
  db.prepare(`
    INSERT INTO iterations (
      run_id, iteration, pv, best_pv, control_value, action, reason,
      quality_score, verdict, cost_usd, recorded_at
    ) VALUES (
      @run_id, @iteration, @pv, @best_pv, @control_value, @action, @reason,
      @quality_score, @verdict, @cost_usd, @recorded_at
    )
  `).run({
    run_id: runId,
    iteration: record.iteration,
    pv: record.pv,
    best_pv: record.bestPv,
    control_value: record.controlValue,
    action: record.decision.action,
    reason: record.decision.reason,
    quality_score: record.qualityScore,
    verdict: record.verdict,
    cost_usd: record.costUsd,
    recorded_at: record.timestamp,
  })
}

/**
 * All iteration rows of a run, in iteration order.
 */
export function listIterations(db: BetterSqlite3Database, runId: string): IterationRow[] {
  return db
    .prepare<[string], IterationRow>('SELECT * FROM iterations WHERE run_id = ? ORDER BY iteration ASC')
    .all(runId)
}

/** Convert a stored row back into the orchestrator's record shape */
export function toIterationRecord(row: IterationRow): IterationRecord {
  return {
    iteration: row.iteration,
    pv: row.pv,
    bestPv: row.best_pv,
    controlValue: row.control_value,
    decision: { action: row.action, reason: row.reason },
    qualityScore: row.quality_score,
    verdict: row.verdict,
    costUsd: row.cost_usd,
    timestamp: row.recorded_at,
  }
}
