/**
 * Core types for pidloop
 * Shared type definitions used across all modules
 */

/** Unique identifier for an orchestration run */
export type RunId = string

/** Unique identifier for a checkpoint */
export type CheckpointId = string

/** Agent roles participating in the loop */
export type AgentRole = 'keeper' | 'developer' | 'qa'

/** Pass/fail verdict produced by the QA agent */
export type Verdict = 'pass' | 'fail'

/** Action selected by the decision policy for one iteration */
export type DecisionAction = 'merge' | 'reject' | 'rollback' | 'human_review' | 'skip'

/** Decision produced per iteration; consumed immediately, never persisted by the policy */
export interface Decision {
  action: DecisionAction
  reason: string
}

/** Aggregated test execution counts reported by QA */
export interface TestResults {
  total: number
  passed: number
  failed: number
  skipped: number
}

/** Status of an orchestration run */
export type RunStatus = 'running' | 'completed' | 'halted' | 'failed'

/** Severity level for errors and log messages */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

/** Task priority level as emitted by the Keeper */
export type TaskPriority = 'low' | 'medium' | 'high' | 'critical'

/** Development task planned by the Keeper */
export interface PlannedTask {
  id: string
  title: string
  description: string
  priority: TaskPriority
  estimated_complexity: 'low' | 'medium' | 'high'
  dependencies: string[]
  acceptance_criteria: string[]
}

/**
 * One row per loop iteration. Append-only; written by the orchestrator and
 * read by nothing inside the control core.
 */
export interface IterationRecord {
  iteration: number
  pv: number
  bestPv: number
  controlValue: number
  decision: Decision
  /** QA score the decision used; null when QA did not run for lack of tasks */
  qualityScore: number | null
  verdict: Verdict | null
  /** Agent spend during this iteration */
  costUsd: number
  timestamp: string
}

/** Parameters of a run as it starts */
export interface RunStart {
  runId: RunId
  goal: string
  setpoint: number
  maxIterations: number
  /** Serialized (masked) configuration the run was started with */
  configSnapshot?: string
}

/** Final state of a run */
export interface RunOutcome {
  status: Exclude<RunStatus, 'running'>
  iterations: number
  bestPv: number
  finalPv: number
  totalCostUsd: number
  haltReason: string | null
}

/**
 * Sink for run and iteration records. The orchestrator logs and carries on
 * when a recorder call throws.
 */
export interface IterationRecorder {
  startRun(run: RunStart): void
  record(runId: RunId, record: IterationRecord): void
  finishRun(runId: RunId, outcome: RunOutcome): void
}
