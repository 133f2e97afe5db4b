/**
 * Metrics Module: Types
 */

import type { TestResults } from '../../core/types.js'

/** Individual PV inputs, each on a 0–1 scale */
export interface MetricComponents {
  similarity: number
  testPassRate: number
  lintScore: number
  reqCoverage: number
}

export interface MetricWeightsInput {
  similarity: number
  test_pass_rate: number
  lint_score: number
  req_coverage: number
}

export interface Measurement {
  pv: number
  components: MetricComponents
}

export interface MeasureParams {
  goal: string
  codebasePath: string
  testResults?: TestResults
}

/** Scores code quality of a codebase on a 0–1 scale */
export interface LintProvider {
  score(codebasePath: string): Promise<number>
}
