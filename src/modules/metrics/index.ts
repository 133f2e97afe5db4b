/**
 * Metrics Module
 *
 * PV = w_sim·similarity + w_test·testPassRate + w_lint·lintScore + w_req·reqCoverage
 */

export type { ProcessVariableMeter, ProcessVariableMeterOptions } from './process-variable-meter.js'
export { ProcessVariableMeterImpl, createProcessVariableMeter } from './process-variable-meter.js'
export type { LintProvider, Measurement, MeasureParams, MetricComponents, MetricWeightsInput } from './types.js'
export {
  NEUTRAL_SCORE,
  computeProcessVariable,
  requirementsCoverage,
  testPassRate,
  textSimilarity,
} from './components.js'
export type { CommandLintProviderOptions } from './lint-provider.js'
export {
  CommandLintProvider,
  DEFAULT_LINT_SCORE,
  FAILED_LINT_SCORE,
  StaticLintProvider,
  countLintIssues,
  countSourceFiles,
  createLintProvider,
  lintScoreFromIssues,
} from './lint-provider.js'
export {
  DEFAULT_MAX_CODEBASE_CHARS,
  MAX_KEYWORDS,
  SOURCE_EXTENSIONS,
  extractCodebaseText,
  extractKeywords,
  tokenize,
} from './text.js'
