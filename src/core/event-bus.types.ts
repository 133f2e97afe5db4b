/**
 * OrchestratorEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "iteration:complete", "guard:halt")
 * Payloads are defined inline with JSDoc for each event.
 */

import type { CheckpointId, Decision, RunId } from './types.js'

// ---------------------------------------------------------------------------
// OrchestratorEvents
// ---------------------------------------------------------------------------

/**
 * Complete typed map of all events emitted on the orchestrator event bus.
 * Use `keyof OrchestratorEvents` to constrain event keys.
 */
export interface OrchestratorEvents {
  // -------------------------------------------------------------------------
  // Run lifecycle events
  // -------------------------------------------------------------------------

  /** A control loop run has started */
  'run:started': { runId: RunId; goal: string; maxIterations: number; setpoint: number }

  /** A control loop run has finished, normally or after a guard halt */
  'run:complete': {
    runId: RunId
    iterations: number
    bestPv: number
    finalPv: number
    totalCostUsd: number
    haltReason: string | null
  }

  // -------------------------------------------------------------------------
  // Iteration lifecycle events
  // -------------------------------------------------------------------------

  /** An iteration is about to call the agents */
  'iteration:started': { runId: RunId; iteration: number }

  /** The decision policy selected an action */
  'iteration:decision': {
    runId: RunId
    iteration: number
    decision: Decision
    controlValue: number
    baselinePv: number
  }

  /** An iteration finished and the post-decision PV was measured */
  'iteration:complete': { runId: RunId; iteration: number; pv: number; bestPv: number }

  /** An iteration raised an error and was abandoned; iteration 0 is the initial measurement */
  'iteration:failed': { runId: RunId; iteration: number; error: string }

  // -------------------------------------------------------------------------
  // Controller and guard events
  // -------------------------------------------------------------------------

  /** The PID error signal is oscillating (informational) */
  'controller:oscillation': { runId: RunId; iteration: number }

  /** A safety guard stopped the loop */
  'guard:halt': { runId: RunId; iteration: number; reason: string }

  /** The decision policy asked for a human to look at the artifact */
  'review:requested': { runId: RunId; iteration: number; reason: string }

  // -------------------------------------------------------------------------
  // Checkpoint events
  // -------------------------------------------------------------------------

  /** A checkpoint was written */
  'checkpoint:created': { checkpointId: CheckpointId; iteration: number; pv: number; isBest: boolean }

  /** The codebase was restored from a checkpoint */
  'checkpoint:rollback': { checkpointId: CheckpointId; success: boolean }
}
