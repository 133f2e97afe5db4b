/**
 * Decision Policy Module
 *
 * Usage:
 *   const policy = createDecisionPolicy(decisionOptionsFromConfig(config))
 *   const { action, reason } = policy.decide({ pv, qualityScore, verdict, controlValue, iteration })
 */

export type { DecisionPolicy } from './decision-policy.js'
export type { DecisionInput, DecisionPolicyOptions, QualityThresholdOptions } from './types.js'
export { DecisionPolicyImpl, createDecisionPolicy, decisionOptionsFromConfig } from './decision-policy-impl.js'
export { minQualityScore, qualityOptionsFromSettings } from './quality-threshold.js'
