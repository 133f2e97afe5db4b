/**
 * Human-readable output for `pidloop run` and `pidloop history`.
 */

import type { Decision } from '../../core/types.js'
import type { RunSummary } from '../../modules/iteration-orchestrator/types.js'
import type { IterationRow } from '../../persistence/queries/iterations.js'
import type { RunRow } from '../../persistence/queries/runs.js'
import { formatNumber, formatTable, formatUsd } from '../utils/formatting.js'

// ---------------------------------------------------------------------------
// Live progress
// ---------------------------------------------------------------------------

export function formatDecisionLine(iteration: number, decision: Decision, controlValue: number): string {
  return `[${String(iteration)}] ${decision.action} (u=${formatNumber(controlValue)}): ${decision.reason}`
}

export function formatProgressLine(iteration: number, pv: number, bestPv: number): string {
  return `[${String(iteration)}] PV ${formatNumber(pv)} (best ${formatNumber(bestPv)})`
}

// ---------------------------------------------------------------------------
// Run summary
// ---------------------------------------------------------------------------

/**
 * Multi-line report printed when `pidloop run` finishes.
 *
 * @example
 * Run run-1 completed after 2 iterations
 *   Best PV:    0.600 (iteration 2)
 *   Final PV:   0.600
 *   Total cost: $0.0600
 *   Tasks done: 2
 *   Workspace:  /tmp/workspace
 */
export function formatRunSummary(summary: RunSummary): string {
  const lines = [
    `Run ${summary.runId} ${summary.status} after ${String(summary.iterations)} iterations`,
    `  Best PV:    ${formatNumber(summary.bestPv)} (iteration ${String(summary.bestIteration)})`,
    `  Final PV:   ${formatNumber(summary.finalPv)}`,
    `  Total cost: ${formatUsd(summary.totalCostUsd)}`,
    `  Tasks done: ${String(summary.completedTasks.length)}`,
  ]
  if (summary.haltReason !== null) {
    lines.push(`  Stopped:    ${summary.haltReason}`)
  }
  lines.push(`  Workspace:  ${summary.codebasePath}`)
  return lines.join('\n')
}

// ---------------------------------------------------------------------------
// History tables
// ---------------------------------------------------------------------------

export function formatRunTable(runs: RunRow[]): string {
  if (runs.length === 0) return 'No runs recorded yet.'
  const rows = runs.map((run) => ({
    id: run.id,
    status: run.status,
    iterations: String(run.iterations),
    bestPv: formatNumber(run.best_pv),
    finalPv: formatNumber(run.final_pv),
    cost: formatUsd(run.total_cost_usd),
    created: run.created_at,
  }))
  return formatTable(
    ['Run', 'Status', 'Iter', 'Best PV', 'Final PV', 'Cost', 'Started'],
    rows,
    ['id', 'status', 'iterations', 'bestPv', 'finalPv', 'cost', 'created']
  )
}

export function formatRunHeader(run: RunRow): string {
  const lines = [
    `Run ${run.id} (${run.status})`,
    `  Goal:       ${run.goal}`,
    `  Setpoint:   ${formatNumber(run.setpoint)}`,
    `  Iterations: ${String(run.iterations)} of ${String(run.max_iterations)}`,
    `  Best PV:    ${formatNumber(run.best_pv)}`,
    `  Final PV:   ${formatNumber(run.final_pv)}`,
    `  Total cost: ${formatUsd(run.total_cost_usd)}`,
  ]
  if (run.halt_reason !== null) lines.push(`  Stopped:    ${run.halt_reason}`)
  return lines.join('\n')
}

export function formatIterationTable(iterations: IterationRow[]): string {
  if (iterations.length === 0) return 'No iterations recorded.'
  const rows = iterations.map((row) => ({
    iteration: String(row.iteration),
    pv: formatNumber(row.pv),
    bestPv: formatNumber(row.best_pv),
    control: formatNumber(row.control_value),
    quality: formatNumber(row.quality_score, 1),
    action: row.action,
    reason: row.reason,
  }))
  return formatTable(
    ['#', 'PV', 'Best', 'Control', 'QA', 'Action', 'Reason'],
    rows,
    ['iteration', 'pv', 'bestPv', 'control', 'quality', 'action', 'reason']
  )
}
