/**
 * IterationOrchestrator interface: drives the Keeper/Developer/QA loop
 * under PID control until the iteration limit or a safety guard stops it.
 */

import type { RunOptions, RunSummary } from './types.js'

export interface IterationOrchestrator {
  /**
   * Run the loop toward `goal`. The workspace is left at the best
   * checkpoint when the run ends, whether it completed or was halted.
   *
   * @throws {Error} when called while a run is already in progress
   */
  run(goal: string, options?: RunOptions): Promise<RunSummary>
}
