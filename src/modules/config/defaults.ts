/**
 * Built-in default values for the pidloop configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 *
 * PID gains (kp, ki, kd) are deliberately absent. They must come from one of
 * the higher layers or load() fails.
 */

import type {
  AgentSettings,
  AgentsSettings,
  MetricsSettings,
  OrchestrationSettings,
  PidSettings,
  PidLoopConfig,
  QualitySettings,
  RepositorySettings,
  SafetySettings,
} from './config-schema.js'

/** PID settings minus the gains */
export type PidDefaults = Omit<PidSettings, 'kp' | 'ki' | 'kd'>

/** Shape of the built-in defaults: a full config without PID gains */
export type ConfigDefaults = Omit<PidLoopConfig, 'pid'> & { pid: PidDefaults }

// ---------------------------------------------------------------------------
// Controller
// ---------------------------------------------------------------------------

export const DEFAULT_PID_SETTINGS: PidDefaults = {
  dt: 1.0,
  setpoint: 0.8,
  integral_min: -10.0,
  integral_max: 10.0,
  control_min: -5.0,
  control_max: 5.0,
  oscillation_window: 5,
  oscillation_threshold: 0.15,
  hysteresis: 0.05,
}

// ---------------------------------------------------------------------------
// Decision policy and guards
// ---------------------------------------------------------------------------

export const DEFAULT_QUALITY_SETTINGS: QualitySettings = {
  min_quality_score: 5.0,
  progression_enabled: true,
  min_quality_score_initial: 2.5,
  min_quality_score_mid: 4.5,
  min_quality_score_final: 6.5,
  early_until: 5,
  mid_until: 15,
}

export const DEFAULT_SAFETY_SETTINGS: SafetySettings = {
  human_review_threshold: 0.1,
  rollback_threshold: 0.2,
  max_budget_usd: 10.0,
  stagnation_threshold: 0.01,
  stagnation_window: 5,
  stagnation_limit: 3,
  max_iterations: 30,
}

export const DEFAULT_ORCHESTRATION_SETTINGS: OrchestrationSettings = {
  auto_merge: false,
  checkpoint_frequency: 5,
  early_iteration_cutoff: 5,
  reset_controller_on_rollback: true,
  abort_on_error: false,
  qa_frequency: 1,
  log_level: 'info',
}

// ---------------------------------------------------------------------------
// Measurement
// ---------------------------------------------------------------------------

export const DEFAULT_METRICS_SETTINGS: MetricsSettings = {
  weights: {
    similarity: 0.4,
    test_pass_rate: 0.3,
    lint_score: 0.2,
    req_coverage: 0.1,
  },
  max_codebase_chars: 10_000,
  lint_command: 'flake8',
  lint_args: ['.'],
  lint_timeout_ms: 30_000,
}

// ---------------------------------------------------------------------------
// Agents
// ---------------------------------------------------------------------------

function agentDefaults(temperature: number, maxTokens: number): AgentSettings {
  return {
    command: 'claude',
    args: ['--print'],
    temperature,
    max_tokens: maxTokens,
    timeout_ms: 300_000,
    cost_per_1k_tokens: 0.003,
    api_key_env: 'ANTHROPIC_API_KEY',
  }
}

export const DEFAULT_AGENTS_SETTINGS: AgentsSettings = {
  keeper: agentDefaults(0.3, 2000),
  developer: agentDefaults(0.5, 4000),
  qa: agentDefaults(0.2, 3000),
  language: 'en',
}

export const DEFAULT_REPOSITORY_SETTINGS: RepositorySettings = {
  base_path: './workspace',
  checkpoint_path: './.pidloop/checkpoints',
  database_path: './.pidloop/pidloop.db',
  keep_checkpoints: 10,
}

// ---------------------------------------------------------------------------
// Full default document
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: ConfigDefaults = {
  config_format_version: '1',
  pid: DEFAULT_PID_SETTINGS,
  quality: DEFAULT_QUALITY_SETTINGS,
  safety: DEFAULT_SAFETY_SETTINGS,
  orchestration: DEFAULT_ORCHESTRATION_SETTINGS,
  metrics: DEFAULT_METRICS_SETTINGS,
  agents: DEFAULT_AGENTS_SETTINGS,
  repository: DEFAULT_REPOSITORY_SETTINGS,
}
