/**
 * DecisionPolicyImpl: ordered rule list, first match wins:
 *
 *  1. pv below the human review threshold      → human_review
 *  2. QA fail and quality below the bar         → reject
 *  3. quality at or above the bar               → merge
 *  4. pv below the rollback threshold           → rollback
 *  5. auto-merge enabled and QA pass            → merge
 *  6. non-negative control value                → merge
 *  7. still inside the warm-up iterations       → merge
 *  8. otherwise                                 → skip
 */

import type { Decision } from '../../core/types.js'
import type { PidLoopConfig } from '../config/config-schema.js'
import type { DecisionPolicy } from './decision-policy.js'
import type { DecisionInput, DecisionPolicyOptions } from './types.js'
import { minQualityScore, qualityOptionsFromSettings } from './quality-threshold.js'

type Rule = {
  evaluate(input: DecisionInput, minQuality: number): Decision | null
}

export class DecisionPolicyImpl implements DecisionPolicy {
  private readonly _options: DecisionPolicyOptions
  private readonly _rules: Rule[]

  constructor(options: DecisionPolicyOptions) {
    this._options = options
    this._rules = this._buildRules()
  }

  minQuality(iteration: number): number {
    return minQualityScore(iteration, this._options.quality)
  }

  decide(input: DecisionInput): Decision {
    const minQuality = this.minQuality(input.iteration)
    for (const rule of this._rules) {
      const decision = rule.evaluate(input, minQuality)
      if (decision !== null) return decision
    }
    // Unreachable: the last rule always matches
    return { action: 'skip', reason: 'No rule matched' }
  }

  private _buildRules(): Rule[] {
    const opts = this._options
    return [
      {
        evaluate: ({ pv }) =>
          pv < opts.humanReviewThreshold
            ? {
                action: 'human_review',
                reason: `PV ${pv.toFixed(3)} below review threshold ${opts.humanReviewThreshold.toFixed(3)}`,
              }
            : null,
      },
      {
        evaluate: ({ verdict, qualityScore }, minQuality) =>
          verdict === 'fail' && qualityScore < minQuality
            ? {
                action: 'reject',
                reason: `QA failed with score ${qualityScore.toFixed(2)} < threshold ${minQuality.toFixed(2)}`,
              }
            : null,
      },
      {
        evaluate: ({ qualityScore }, minQuality) =>
          qualityScore >= minQuality
            ? {
                action: 'merge',
                reason: `Quality ${qualityScore.toFixed(2)} >= threshold ${minQuality.toFixed(2)}`,
              }
            : null,
      },
      {
        evaluate: ({ pv }) =>
          pv < opts.rollbackThreshold
            ? {
                action: 'rollback',
                reason: `PV ${pv.toFixed(3)} below rollback threshold ${opts.rollbackThreshold.toFixed(3)}`,
              }
            : null,
      },
      {
        evaluate: ({ verdict }) =>
          opts.autoMerge && verdict === 'pass' ? { action: 'merge', reason: 'QA passed, auto-merging' } : null,
      },
      {
        evaluate: ({ controlValue }) =>
          controlValue >= 0
            ? { action: 'merge', reason: `Control ${controlValue.toFixed(3)} favours progress` }
            : null,
      },
      {
        evaluate: ({ iteration }) =>
          iteration <= opts.earlyIterationCutoff
            ? {
                action: 'merge',
                reason: `Warm-up iteration ${String(iteration)} <= ${String(opts.earlyIterationCutoff)}, merging`,
              }
            : null,
      },
      {
        evaluate: ({ controlValue }) => ({
          action: 'skip',
          reason: `Negative control ${controlValue.toFixed(3)}, skipping merge`,
        }),
      },
    ]
  }
}

// ---------------------------------------------------------------------------
// Factory functions
// ---------------------------------------------------------------------------

export function createDecisionPolicy(options: DecisionPolicyOptions): DecisionPolicy {
  return new DecisionPolicyImpl(options)
}

export function decisionOptionsFromConfig(
  config: Pick<PidLoopConfig, 'safety' | 'orchestration' | 'quality'>
): DecisionPolicyOptions {
  return {
    humanReviewThreshold: config.safety.human_review_threshold,
    rollbackThreshold: config.safety.rollback_threshold,
    autoMerge: config.orchestration.auto_merge,
    earlyIterationCutoff: config.orchestration.early_iteration_cutoff,
    quality: qualityOptionsFromSettings(config.quality),
  }
}
