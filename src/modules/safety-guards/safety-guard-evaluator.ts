/**
 * SafetyGuardEvaluator interface: decides after every iteration whether
 * the loop may continue.
 */

import type { GuardInput, GuardResult } from './types.js'

export interface SafetyGuardEvaluator {
  /**
   * Budget is checked first and stops immediately. Stagnation increments a
   * counter that stops the loop once it reaches the limit and resets on any
   * non-stagnant window. Oscillation only adds a warning.
   */
  evaluate(input: GuardInput): GuardResult

  /** Consecutive stagnant evaluations so far */
  readonly stagnationCount: number

  /** Zero the stagnation counter */
  reset(): void
}
