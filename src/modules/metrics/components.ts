/**
 * Process-variable components and their weighted combination.
 */

import type { TestResults } from '../../core/types.js'
import { clamp } from '../pid-controller/pid-math.js'
import { extractKeywords, tokenize } from './text.js'
import type { MetricComponents, MetricWeightsInput } from './types.js'

/** Score used when a component has nothing to measure */
export const NEUTRAL_SCORE = 0.5

/** passed / total, or NEUTRAL_SCORE when no tests ran */
export function testPassRate(results: TestResults | undefined): number {
  if (results === undefined || results.total <= 0) return NEUTRAL_SCORE
  return clamp(results.passed / results.total, 0, 1)
}

/**
 * Share of goal keywords found anywhere in the codebase text.
 * NEUTRAL_SCORE when the goal has no keywords, 0 for an empty codebase.
 */
export function requirementsCoverage(goal: string, codebaseText: string): number {
  const keywords = extractKeywords(goal)
  if (keywords.length === 0) return NEUTRAL_SCORE
  const haystack = codebaseText.toLowerCase()
  if (haystack.trim() === '') return 0
  const matched = keywords.filter((keyword) => haystack.includes(keyword)).length
  return matched / keywords.length
}

function termCounts(tokens: string[]): Map<string, number> {
  const counts = new Map<string, number>()
  for (const token of tokens) counts.set(token, (counts.get(token) ?? 0) + 1)
  return counts
}

/**
 * Cosine similarity of bag-of-words term counts. Counts are non-negative,
 * so the result is already in [0, 1]. 0 when either side has no tokens.
 */
export function textSimilarity(goal: string, codebaseText: string): number {
  const a = termCounts(tokenize(goal))
  const b = termCounts(tokenize(codebaseText))
  if (a.size === 0 || b.size === 0) return 0

  let dot = 0
  for (const [term, count] of a) dot += count * (b.get(term) ?? 0)
  const norm = (counts: Map<string, number>): number =>
    Math.sqrt([...counts.values()].reduce((sum, c) => sum + c * c, 0))

  return clamp(dot / (norm(a) * norm(b)), 0, 1)
}

/** Weighted sum of the components, clamped to [0, 1] */
export function computeProcessVariable(components: MetricComponents, weights: MetricWeightsInput): number {
  const pv =
    weights.similarity * components.similarity +
    weights.test_pass_rate * components.testPassRate +
    weights.lint_score * components.lintScore +
    weights.req_coverage * components.reqCoverage
  return clamp(pv, 0, 1)
}
