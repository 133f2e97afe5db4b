/**
 * DecisionPolicy interface: maps one iteration's measurements to an action.
 */

import type { Decision } from '../../core/types.js'
import type { DecisionInput } from './types.js'

export interface DecisionPolicy {
  /**
   * Pure: the same input always yields the same decision and reason.
   * Rules are evaluated in a fixed order; the first match wins.
   */
  decide(input: DecisionInput): Decision

  /** Quality bar in force at `iteration` */
  minQuality(iteration: number): number
}
