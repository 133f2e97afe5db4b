/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { PidLoopConfig, PartialPidLoopConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Path to the project-level .pidloop/ directory (default: <cwd>/.pidloop) */
  projectConfigDir?: string
  /** Path to the global user-level .pidloop/ directory (default: ~/.pidloop) */
  globalConfigDir?: string
  /**
   * Additional values that override everything, env vars included.
   * Typically populated from CLI flags.
   */
  cliOverrides?: PartialPidLoopConfig
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * @throws {ConfigError} if PID gains are missing from every layer or
   *   the merged document fails validation.
   */
  load(): Promise<void>

  /**
   * @throws {ConfigError} if `load()` has not completed.
   */
  getConfig(): PidLoopConfig

  /** Single value by dot-notation key (e.g. "pid.kp"); undefined when absent. */
  get(key: string): unknown

  /**
   * Persist a scalar value to the project config file, reloading when a
   * config was already loaded.
   * Keys that are not yet set (such as the PID gains before `init`) are accepted
   * when the schema knows them.
   * @throws {ConfigError} for unknown keys, object keys or invalid values.
   */
  set(key: string, value: unknown): Promise<void>

  /** Merged config with credential fields masked; safe to print. */
  getMasked(): PidLoopConfig

  readonly isLoaded: boolean
}
