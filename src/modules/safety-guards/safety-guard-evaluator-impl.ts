/**
 * SafetyGuardEvaluatorImpl: budget, stagnation and oscillation guards.
 */

import type { SafetySettings } from '../config/config-schema.js'
import { createLogger } from '../../utils/logger.js'
import type { SafetyGuardEvaluator } from './safety-guard-evaluator.js'
import type { GuardInput, GuardResult, SafetyGuardOptions } from './types.js'
import { detectStagnation } from './stagnation.js'

const logger = createLogger('safety-guards')

export const OSCILLATION_WARNING = 'Oscillation detected in control loop'

export class SafetyGuardEvaluatorImpl implements SafetyGuardEvaluator {
  private readonly _options: SafetyGuardOptions
  private _stagnationCount = 0

  constructor(options: SafetyGuardOptions) {
    this._options = options
  }

  get stagnationCount(): number {
    return this._stagnationCount
  }

  evaluate(input: GuardInput): GuardResult {
    const { maxBudgetUsd, stagnationThreshold, stagnationWindow, stagnationLimit } = this._options

    if (maxBudgetUsd > 0 && input.totalCostUsd >= maxBudgetUsd) {
      const reason = `Budget limit reached: $${input.totalCostUsd.toFixed(2)} >= $${maxBudgetUsd.toFixed(2)}`
      logger.warn({ totalCostUsd: input.totalCostUsd, maxBudgetUsd }, 'Budget limit reached')
      return { verdict: 'stop', reason, stagnationCount: this._stagnationCount, warnings: [] }
    }

    if (detectStagnation(input.pvHistory, stagnationThreshold, stagnationWindow)) {
      this._stagnationCount++
      logger.warn({ stagnationCount: this._stagnationCount }, 'Stagnation detected')
    } else {
      this._stagnationCount = 0
    }

    const warnings: string[] = []
    if (input.oscillating) {
      logger.warn('Oscillation detected in control loop')
      warnings.push(OSCILLATION_WARNING)
    }

    if (this._stagnationCount >= stagnationLimit) {
      logger.error({ stagnationCount: this._stagnationCount }, 'Persistent stagnation, stopping')
      return {
        verdict: 'stop',
        reason: `Persistent stagnation: ${String(this._stagnationCount)} consecutive stagnant evaluations`,
        stagnationCount: this._stagnationCount,
        warnings,
      }
    }

    return { verdict: 'continue', stagnationCount: this._stagnationCount, warnings }
  }

  reset(): void {
    this._stagnationCount = 0
  }
}

// ---------------------------------------------------------------------------
// Factory functions
// ---------------------------------------------------------------------------

export function createSafetyGuardEvaluator(options: SafetyGuardOptions): SafetyGuardEvaluator {
  return new SafetyGuardEvaluatorImpl(options)
}

export function guardOptionsFromSettings(settings: SafetySettings): SafetyGuardOptions {
  return {
    maxBudgetUsd: settings.max_budget_usd,
    stagnationThreshold: settings.stagnation_threshold,
    stagnationWindow: settings.stagnation_window,
    stagnationLimit: settings.stagnation_limit,
  }
}
