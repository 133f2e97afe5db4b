/**
 * Barrel exports for the config module.
 */

export {
  createConfigSystem,
  ConfigSystemImpl,
  CONFIG_FILE_NAME,
  ENV_VAR_MAP,
  coerceScalar,
  getByPath,
  setByPath,
} from './config-system-impl.js'
export type { ConfigSystemImplOptions } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  PidLoopConfigSchema,
  PartialPidLoopConfigSchema,
  PidSettingsSchema,
  QualitySettingsSchema,
  SafetySettingsSchema,
  OrchestrationSettingsSchema,
  MetricsSettingsSchema,
  AgentSettingsSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  REQUIRED_PID_GAINS,
} from './config-schema.js'
export type {
  PidLoopConfig,
  PartialPidLoopConfig,
  PidSettings,
  QualitySettings,
  SafetySettings,
  OrchestrationSettings,
  MetricsSettings,
  MetricWeights,
  AgentSettings,
  AgentsSettings,
  RepositorySettings,
  LogLevelValue,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
export type { ConfigDefaults, PidDefaults } from './defaults.js'
