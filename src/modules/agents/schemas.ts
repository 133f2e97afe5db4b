/**
 * Zod schemas for the structured blocks each agent role returns.
 *
 * Optional fields get the defaults a partially compliant agent would need;
 * the fields the loop cannot do without (task titles, QA verdict and score)
 * stay required.
 */

import { z } from 'zod'

const Severity = z.enum(['low', 'medium', 'high', 'critical']).catch('medium')

/** Accepts `PASS`, ` pass ` and friends; anything unrecognised is a failure */
const VerdictField = z
  .preprocess((v) => (typeof v === 'string' ? v.trim().toLowerCase() : v), z.enum(['pass', 'fail']))
  .catch('fail')

// ---------------------------------------------------------------------------
// Keeper
// ---------------------------------------------------------------------------

export const PlannedTaskSchema = z.object({
  id: z.coerce.string(),
  title: z.string().min(1),
  description: z.string().default(''),
  priority: Severity,
  estimated_complexity: z.enum(['low', 'medium', 'high']).catch('medium'),
  dependencies: z.array(z.coerce.string()).default([]),
  acceptance_criteria: z.array(z.string()).default([]),
})

export const KeeperOutputSchema = z.object({
  tasks: z.array(PlannedTaskSchema),
  reasoning: z.string().default(''),
})

export type KeeperOutput = z.infer<typeof KeeperOutputSchema>

// ---------------------------------------------------------------------------
// Developer
// ---------------------------------------------------------------------------

export const RiskSchema = z.object({
  severity: Severity,
  description: z.string(),
  mitigation: z.string().default(''),
})

export type Risk = z.infer<typeof RiskSchema>

export const DeveloperOutputSchema = z.object({
  /** Unified diff; empty when the developer decided nothing needs to change */
  patch: z.string().default(''),
  files_modified: z.array(z.string()).default([]),
  files_created: z.array(z.string()).default([]),
  risks: z.array(RiskSchema).default([]),
  implementation_notes: z.string().default(''),
  testing_suggestions: z.array(z.string()).default([]),
})

export type DeveloperOutput = z.infer<typeof DeveloperOutputSchema>

// ---------------------------------------------------------------------------
// QA
// ---------------------------------------------------------------------------

export const QaTestCaseSchema = z.object({
  name: z.string(),
  type: z.string().default('unit'),
  description: z.string().default(''),
  code: z.string().default(''),
})

export const QaIssueSchema = z.object({
  severity: Severity,
  type: z.string().default('bug'),
  description: z.string().default('No description'),
  location: z.string().default('Unknown'),
  suggestion: z.string().optional(),
})

export type QaIssue = z.infer<typeof QaIssueSchema>

const Count = z.number().int().min(0)

export const QaTestResultsSchema = z.object({
  total: Count.default(0),
  passed: Count.default(0),
  failed: Count.default(0),
  skipped: Count.default(0),
})

export const QaOutputSchema = z.object({
  verdict: VerdictField,
  test_cases: z.array(QaTestCaseSchema).default([]),
  issues: z.array(QaIssueSchema).default([]),
  test_results: QaTestResultsSchema.default({}),
  /** 0–10; out-of-range scores are clamped rather than rejected */
  quality_score: z.number().transform((score) => Math.min(10, Math.max(0, score))),
  feedback: z.string().default(''),
})

export type QaOutput = z.infer<typeof QaOutputSchema>
