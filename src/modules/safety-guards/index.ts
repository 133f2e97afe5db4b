/**
 * Safety Guards Module
 */

export type { SafetyGuardEvaluator } from './safety-guard-evaluator.js'
export type { GuardInput, GuardResult, GuardVerdict, SafetyGuardOptions } from './types.js'
export { detectStagnation } from './stagnation.js'
export {
  SafetyGuardEvaluatorImpl,
  OSCILLATION_WARNING,
  createSafetyGuardEvaluator,
  guardOptionsFromSettings,
} from './safety-guard-evaluator-impl.js'
