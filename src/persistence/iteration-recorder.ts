/**
 * SqliteIterationRecorder: persists runs and iteration records.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { IterationRecord, IterationRecorder, RunId, RunOutcome, RunStart } from '../core/types.js'
import { createRun, updateRun } from './queries/runs.js'
import { insertIteration } from './queries/iterations.js'

export class SqliteIterationRecorder implements IterationRecorder {
  constructor(private readonly _db: BetterSqlite3Database) {}

  startRun(run: RunStart): void {
    createRun(this._db, {
      id: run.runId,
      goal: run.goal,
      setpoint: run.setpoint,
      max_iterations: run.maxIterations,
      config_snapshot: run.configSnapshot ?? null,
    })
  }

  record(runId: RunId, record: IterationRecord): void {
    const insertAndCount = this._db.transaction(() => {
      insertIteration(this._db, runId, record)
      updateRun(this._db, runId, { iterations: record.iteration, best_pv: record.bestPv, final_pv: record.pv })
    })
    insertAndCount()
  }

  finishRun(runId: RunId, outcome: RunOutcome): void {
    updateRun(this._db, runId, {
      status: outcome.status,
      iterations: outcome.iterations,
      best_pv: outcome.bestPv,
      final_pv: outcome.finalPv,
      total_cost_usd: outcome.totalCostUsd,
      halt_reason: outcome.haltReason,
    })
  }
}

export function createSqliteIterationRecorder(db: BetterSqlite3Database): IterationRecorder {
  return new SqliteIterationRecorder(db)
}
