/**
 * Safety Guards Module: Types
 */

export type GuardVerdict = 'continue' | 'stop'

export interface SafetyGuardOptions {
  /** Cumulative spend ceiling in USD; 0 disables the budget guard */
  maxBudgetUsd: number
  /** PV spread under which a window counts as stagnant */
  stagnationThreshold: number
  /** Number of most recent PV samples examined */
  stagnationWindow: number
  /** Consecutive stagnant evaluations that stop the loop */
  stagnationLimit: number
}

export interface GuardInput {
  totalCostUsd: number
  pvHistory: readonly number[]
  oscillating: boolean
}

export interface GuardResult {
  verdict: GuardVerdict
  /** Set when verdict is 'stop' */
  reason?: string
  /** Consecutive stagnant evaluations after this one */
  stagnationCount: number
  /** Non-fatal findings, e.g. oscillation */
  warnings: string[]
}
