/**
 * Types for the Iteration Orchestrator module.
 */

import type { IterationRecord, PlannedTask, RunId, RunOutcome } from '../../core/types.js'

// ---------------------------------------------------------------------------
// Strategy
// ---------------------------------------------------------------------------

/** Agent parameters the control signal adjusts between iterations */
export interface StrategyParams {
  developerTemperature: number
  /** QA runs on every n-th iteration */
  qaFrequency: number
}

// ---------------------------------------------------------------------------
// Run options and summary
// ---------------------------------------------------------------------------

export interface RunOptions {
  /** Overrides safety.max_iterations for this run */
  maxIterations?: number
  /** Defaults to a generated `run-<uuid>` id */
  runId?: RunId
  /** Stored with the run by recorders that keep one */
  configSnapshot?: string
}

export interface RunSummary {
  runId: RunId
  status: RunOutcome['status']
  /** Iterations started, including failed ones */
  iterations: number
  bestPv: number
  /** 0 when no iteration improved on the initial measurement */
  bestIteration: number
  /** PV of the codebase left in the workspace */
  finalPv: number
  totalCostUsd: number
  /** Initial measurement followed by one value per measured iteration */
  pvHistory: number[]
  completedTasks: PlannedTask[]
  records: IterationRecord[]
  haltReason: string | null
  codebasePath: string
}
