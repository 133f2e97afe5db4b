/**
 * ConfigSystem implementation: loads configuration in hierarchy order and
 * exposes get/set/getMasked operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.pidloop/config.yaml)
 *     → project config      (./.pidloop/config.yaml)
 *     → environment vars    (PIDLOOP_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, writeFile, mkdir, access } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import type { ZodIssue } from 'zod'
import { createLogger } from '../../utils/logger.js'
import { isPlainObject } from '../../utils/helpers.js'
import { ConfigError } from '../../core/errors.js'
import { deepMask } from '../../cli/utils/masking.js'
import {
  PidLoopConfigSchema,
  PartialPidLoopConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  REQUIRED_PID_GAINS,
  type PidLoopConfig,
  type PartialPidLoopConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

export const CONFIG_FILE_NAME = 'config.yaml'

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const current = result[key]
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of PIDLOOP_ environment variable names to config paths.
 * Only overrides scalar values; does not support nested structures via env.
 */
export const ENV_VAR_MAP: Record<string, string> = {
  PIDLOOP_KP: 'pid.kp',
  PIDLOOP_KI: 'pid.ki',
  PIDLOOP_KD: 'pid.kd',
  PIDLOOP_SETPOINT: 'pid.setpoint',
  PIDLOOP_LOG_LEVEL: 'orchestration.log_level',
  PIDLOOP_MAX_ITERATIONS: 'safety.max_iterations',
  PIDLOOP_MAX_BUDGET_USD: 'safety.max_budget_usd',
  PIDLOOP_WORKSPACE: 'repository.base_path',
  PIDLOOP_CHECKPOINT_DIR: 'repository.checkpoint_path',
  PIDLOOP_DATABASE: 'repository.database_path',
  PIDLOOP_LINT_COMMAND: 'metrics.lint_command',
}

/** Turn an env string into a boolean or number when it looks like one */
export function coerceScalar(rawValue: string): unknown {
  if (rawValue === 'true') return true
  if (rawValue === 'false') return false
  if (/^-?\d+$/.test(rawValue)) return parseInt(rawValue, 10)
  if (/^-?\d*\.\d+$/.test(rawValue)) return parseFloat(rawValue)
  return rawValue
}

/**
 * Read relevant environment variables and return a partial config overlay.
 */
function readEnvOverrides(env: NodeJS.ProcessEnv): PartialPidLoopConfig {
  let overrides: Record<string, unknown> = {}

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined || rawValue === '') continue
    overrides = setByPath(overrides, configPath, coerceScalar(rawValue))
  }

  const parsed = PartialPidLoopConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor / setter
// ---------------------------------------------------------------------------

/**
 * Get a value from a nested object using dot-notation key.
 */
export function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/**
 * Return a copy of `obj` with `path` set to `value`.
 * Creates intermediate objects as needed.
 */
export function setByPath(
  obj: Record<string, unknown>,
  path: string,
  value: unknown
): Record<string, unknown> {
  const [head, ...rest] = path.split('.')
  if (head === undefined || head === '') return obj
  if (rest.length === 0) return { ...obj, [head]: value }
  const existing = obj[head]
  const child = isPlainObject(existing) ? existing : {}
  return { ...obj, [head]: setByPath(child, rest.join('.'), value) }
}

/** True when `key` names a scalar field the full schema knows about */
function isKnownScalarKey(key: string): boolean {
  const [section, ...rest] = key.split('.')
  if (section === undefined || rest.length === 0) return key === 'config_format_version'
  if (section === 'pid' && rest.length === 1) {
    return REQUIRED_PID_GAINS.some((gain) => gain === rest[0])
  }
  return false
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export interface ConfigSystemImplOptions extends ConfigSystemOptions {
  /** Environment to read PIDLOOP_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

export class ConfigSystemImpl implements ConfigSystem {
  private _config: PidLoopConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialPidLoopConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemImplOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.pidloop')
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.pidloop')
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  get projectConfigPath(): string {
    return join(this._projectConfigDir, CONFIG_FILE_NAME)
  }

  async load(): Promise<void> {
    const layers: PartialPidLoopConfig[] = []

    const globalConfig = await this._loadYamlFile(join(this._globalConfigDir, CONFIG_FILE_NAME))
    if (globalConfig !== null) layers.push(globalConfig)

    const projectConfig = await this._loadYamlFile(this.projectConfigPath)
    if (projectConfig !== null) layers.push(projectConfig)

    layers.push(readEnvOverrides(this._env))
    layers.push(this._cliOverrides)

    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)
    for (const layer of layers) {
      merged = deepMerge(merged, layer)
    }

    const missing = REQUIRED_PID_GAINS.filter((gain) => getByPath(merged, `pid.${gain}`) === undefined)
    if (missing.length > 0) {
      throw new ConfigError(
        `Missing PID gains: ${missing.join(', ')}. Set them in ${this.projectConfigPath}, ` +
          `via PIDLOOP_${missing.map((g) => g.toUpperCase()).join('/PIDLOOP_')} or with CLI flags.`,
        { missing }
      )
    }

    const result = PidLoopConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(
        `Configuration validation failed:\n${formatIssues(result.error.issues)}`,
        { issues: result.error.issues }
      )
    }

    this._config = result.data
    logger.debug({ projectConfig: this.projectConfigPath }, 'Configuration loaded successfully')
  }

  getConfig(): PidLoopConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().', {})
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  async set(key: string, value: unknown): Promise<void> {
    const current = this._config ?? DEFAULT_CONFIG
    const existing = getByPath(current, key)

    if (existing === undefined && !isKnownScalarKey(key)) {
      throw new ConfigError(`Unknown config key: ${key}`, { key })
    }

    if (isPlainObject(existing)) {
      throw new ConfigError(
        `Cannot set object key "${key}": use a more specific dot-notation path`,
        { key }
      )
    }

    const projectConfigRaw: Record<string, unknown> = (await this._loadYamlFile(this.projectConfigPath)) ?? {}
    const updated = setByPath(projectConfigRaw, key, value)

    const partial = PartialPidLoopConfigSchema.safeParse(updated)
    if (!partial.success) {
      throw new ConfigError(
        `Invalid value for "${key}":\n${formatIssues(partial.error.issues)}`,
        { key, value, issues: partial.error.issues }
      )
    }

    await mkdir(this._projectConfigDir, { recursive: true })
    await writeFile(this.projectConfigPath, yaml.dump(partial.data), 'utf-8')
    logger.info({ key }, 'Project config updated')

    if (this._config !== null) await this.load()
  }

  getMasked(): PidLoopConfig {
    return PidLoopConfigSchema.parse(deepMask(this.getConfig()))
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialPidLoopConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    try {
      const raw = await readFile(filePath, 'utf-8')
      const parsed = yaml.load(raw) ?? {}

      const version = isPlainObject(parsed) ? parsed['config_format_version'] : undefined
      if (version !== undefined && version !== CURRENT_CONFIG_FORMAT_VERSION) {
        throw new ConfigError(
          `Unsupported config_format_version "${String(version)}" in ${filePath} (expected "${CURRENT_CONFIG_FORMAT_VERSION}")`,
          { filePath, version }
        )
      }

      const result = PartialPidLoopConfigSchema.safeParse(parsed)
      if (!result.success) {
        throw new ConfigError(
          `Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`,
          { filePath, issues: result.error.issues }
        )
      }

      return result.data
    } catch (err) {
      if (err instanceof ConfigError) throw err
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem({ cliOverrides: { pid: { kp: 1, ki: 0.1, kd: 0.05 } } })
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemImplOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
