/**
 * Decision Policy Module: Types
 */

import type { Verdict } from '../../core/types.js'

/** Flat or progressive minimum QA quality score (0–10 scale) */
export interface QualityThresholdOptions {
  progressionEnabled: boolean
  /** Used when progression is disabled */
  flat: number
  initial: number
  mid: number
  final: number
  /** Last iteration of the initial tier (inclusive) */
  earlyUntil: number
  /** Last iteration of the mid tier (inclusive) */
  midUntil: number
}

export interface DecisionPolicyOptions {
  /** PV below this always escalates to a human */
  humanReviewThreshold: number
  /** PV below this rolls back when quality alone does not merge */
  rollbackThreshold: number
  autoMerge: boolean
  /** Iterations up to and including this one merge despite a negative control */
  earlyIterationCutoff: number
  quality: QualityThresholdOptions
}

/** Everything decide() looks at for one iteration */
export interface DecisionInput {
  pv: number
  qualityScore: number
  verdict: Verdict
  controlValue: number
  iteration: number
}
