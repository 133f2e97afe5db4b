/**
 * Zod validation schemas for the pidloop configuration system.
 *
 * Defines schemas for all config sections:
 *  - pid controller gains, limits and oscillation detection
 *  - quality thresholds (flat or progressive)
 *  - safety guards
 *  - orchestration flags
 *  - metric weights, agents and repository paths
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// PID controller
// ---------------------------------------------------------------------------

const LimitsShape = {
  integral_min: z.number(),
  integral_max: z.number(),
  control_min: z.number(),
  control_max: z.number(),
}

const PidSettingsObject = z
  .object({
    /** Gains have no defaults: a silently wrong gain changes loop behaviour */
    kp: z.number(),
    ki: z.number(),
    kd: z.number(),
    dt: z.number(),
    /** Target process variable in [0, 1] */
    setpoint: z.number().min(0).max(1),
    ...LimitsShape,
    oscillation_window: z.number().int().min(2),
    oscillation_threshold: z.number().min(0),
    /** Deadband applied to the control value before it drives strategy adjustment */
    hysteresis: z.number().min(0),
  })
  .strict()

export const PidSettingsSchema = PidSettingsObject
  .refine((pid) => pid.integral_min <= pid.integral_max, {
    message: 'integral_min must not exceed integral_max',
    path: ['integral_min'],
  })
  .refine((pid) => pid.control_min <= pid.control_max, {
    message: 'control_min must not exceed control_max',
    path: ['control_min'],
  })

export type PidSettings = z.infer<typeof PidSettingsSchema>

// ---------------------------------------------------------------------------
// Quality thresholds (0–10 scale)
// ---------------------------------------------------------------------------

const QualityScore = z.number().min(0).max(10)

const QualitySettingsObject = z
  .object({
    /** Flat threshold used when progression is disabled */
    min_quality_score: QualityScore,
    progression_enabled: z.boolean(),
    min_quality_score_initial: QualityScore,
    min_quality_score_mid: QualityScore,
    min_quality_score_final: QualityScore,
    /** Last iteration of the early tier (inclusive) */
    early_until: z.number().int().min(0),
    /** Last iteration of the mid tier (inclusive) */
    mid_until: z.number().int().min(0),
  })
  .strict()

export const QualitySettingsSchema = QualitySettingsObject
  .refine(
    (q) =>
      q.min_quality_score_initial <= q.min_quality_score_mid &&
      q.min_quality_score_mid <= q.min_quality_score_final,
    {
      message: 'progressive thresholds must satisfy initial <= mid <= final',
      path: ['min_quality_score_mid'],
    }
  )
  .refine((q) => q.early_until < q.mid_until, {
    message: 'early_until must be lower than mid_until',
    path: ['early_until'],
  })

export type QualitySettings = z.infer<typeof QualitySettingsSchema>

// ---------------------------------------------------------------------------
// Safety guards
// ---------------------------------------------------------------------------

export const SafetySettingsSchema = z
  .object({
    human_review_threshold: z.number().min(0).max(1),
    rollback_threshold: z.number().min(0).max(1),
    /**
     * Cumulative agent spend ceiling in USD. 0 turns the budget guard off
     * (unlimited) instead of halting on the first iteration; any positive
     * ceiling halts once spend reaches it.
     */
    max_budget_usd: z.number().min(0),
    stagnation_threshold: z.number().min(0),
    stagnation_window: z.number().int().min(1),
    /** Consecutive stagnant evaluations that halt the loop */
    stagnation_limit: z.number().int().min(1),
    max_iterations: z.number().int().min(1),
  })
  .strict()

export type SafetySettings = z.infer<typeof SafetySettingsSchema>

// ---------------------------------------------------------------------------
// Orchestration
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const OrchestrationSettingsSchema = z
  .object({
    auto_merge: z.boolean(),
    checkpoint_frequency: z.number().int().min(1),
    /** Iterations during which a negative control value still merges */
    early_iteration_cutoff: z.number().int().min(0),
    reset_controller_on_rollback: z.boolean(),
    abort_on_error: z.boolean(),
    /** Run QA on every n-th iteration; adjusted at runtime by the control signal */
    qa_frequency: z.number().int().min(1),
    log_level: LogLevelSchema,
  })
  .strict()

export type OrchestrationSettings = z.infer<typeof OrchestrationSettingsSchema>

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

export const MetricWeightsSchema = z
  .object({
    similarity: z.number().min(0),
    test_pass_rate: z.number().min(0),
    lint_score: z.number().min(0),
    req_coverage: z.number().min(0),
  })
  .strict()

export type MetricWeights = z.infer<typeof MetricWeightsSchema>

export const MetricsSettingsSchema = z
  .object({
    weights: MetricWeightsSchema,
    /** Characters of source text read from the codebase per measurement */
    max_codebase_chars: z.number().int().positive(),
    /**
     * Linter run in the codebase directory; it must print one
     * `path:line[:col]: message` line per issue. '' uses the fixed neutral score.
     */
    lint_command: z.string(),
    lint_args: z.array(z.string()),
    lint_timeout_ms: z.number().int().positive(),
  })
  .strict()

export type MetricsSettings = z.infer<typeof MetricsSettingsSchema>

// ---------------------------------------------------------------------------
// Agents
// ---------------------------------------------------------------------------

export const AgentSettingsSchema = z
  .object({
    /** Executable that receives the prompt on stdin and answers on stdout */
    command: z.string().min(1),
    args: z.array(z.string()),
    model: z.string().optional(),
    temperature: z.number().min(0).max(2),
    max_tokens: z.number().int().positive(),
    timeout_ms: z.number().int().positive(),
    /** Estimated USD cost per 1000 tokens (input + output) */
    cost_per_1k_tokens: z.number().min(0),
    /** Name of the environment variable holding the provider API key */
    api_key_env: z.string().optional(),
  })
  .strict()

export type AgentSettings = z.infer<typeof AgentSettingsSchema>

export const AgentsSettingsSchema = z
  .object({
    keeper: AgentSettingsSchema,
    developer: AgentSettingsSchema,
    qa: AgentSettingsSchema,
    /** Language the agents answer in */
    language: z.string().min(2),
  })
  .strict()

export type AgentsSettings = z.infer<typeof AgentsSettingsSchema>

// ---------------------------------------------------------------------------
// Repository
// ---------------------------------------------------------------------------

export const RepositorySettingsSchema = z
  .object({
    base_path: z.string().min(1),
    checkpoint_path: z.string().min(1),
    database_path: z.string().min(1),
    keep_checkpoints: z.number().int().min(1),
  })
  .strict()

export type RepositorySettings = z.infer<typeof RepositorySettingsSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

export const CURRENT_CONFIG_FORMAT_VERSION = '1'

export const PidLoopConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    pid: PidSettingsSchema,
    quality: QualitySettingsSchema,
    safety: SafetySettingsSchema,
    orchestration: OrchestrationSettingsSchema,
    metrics: MetricsSettingsSchema,
    agents: AgentsSettingsSchema,
    repository: RepositorySettingsSchema,
  })
  .strict()

export type PidLoopConfig = z.infer<typeof PidLoopConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (config files, env and CLI overlays before merging)
// ---------------------------------------------------------------------------

const PartialAgentSchema = AgentSettingsSchema.partial()

export const PartialPidLoopConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    pid: PidSettingsObject.partial().optional(),
    quality: QualitySettingsObject.partial().optional(),
    safety: SafetySettingsSchema.partial().optional(),
    orchestration: OrchestrationSettingsSchema.partial().optional(),
    metrics: z
      .object({
        weights: MetricWeightsSchema.partial().optional(),
        max_codebase_chars: z.number().int().positive().optional(),
        lint_command: z.string().optional(),
        lint_args: z.array(z.string()).optional(),
        lint_timeout_ms: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    agents: z
      .object({
        keeper: PartialAgentSchema.optional(),
        developer: PartialAgentSchema.optional(),
        qa: PartialAgentSchema.optional(),
        language: z.string().min(2).optional(),
      })
      .strict()
      .optional(),
    repository: RepositorySettingsSchema.partial().optional(),
  })
  .strict()

export type PartialPidLoopConfig = z.infer<typeof PartialPidLoopConfigSchema>

/** PID gain keys that must be supplied by a config file, env var or CLI flag */
export const REQUIRED_PID_GAINS = ['kp', 'ki', 'kd'] as const
