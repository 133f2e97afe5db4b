/**
 * `pidloop config` command group
 *
 * Subcommands:
 *   - `pidloop config show`              display merged config (credentials masked)
 *   - `pidloop config set <key> <value>` update a project config value
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { createConfigSystem, coerceScalar } from '../../modules/config/config-system-impl.js'
import type { ConfigSystemImplOptions } from '../../modules/config/config-system-impl.js'
import { ConfigError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('config-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const CONFIG_EXIT_SUCCESS = 0
export const CONFIG_EXIT_ERROR = 1
export const CONFIG_EXIT_INVALID = 2

export interface ConfigDirOptions {
  projectConfigDir?: string
  globalConfigDir?: string
  /** Environment for PIDLOOP_* overrides (default: process.env) */
  env?: NodeJS.ProcessEnv
}

function systemOptions(opts: ConfigDirOptions): ConfigSystemImplOptions {
  return {
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  }
}

// ---------------------------------------------------------------------------
// `config show` action
// ---------------------------------------------------------------------------

export interface ConfigShowOptions extends ConfigDirOptions {
  format?: 'yaml' | 'json'
}

export async function runConfigShow(opts: ConfigShowOptions = {}): Promise<number> {
  const system = createConfigSystem(systemOptions(opts))

  try {
    await system.load()
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Configuration error: ${err.message}\n`)
      return CONFIG_EXIT_INVALID
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`  Error loading configuration: ${message}\n`)
    return CONFIG_EXIT_ERROR
  }

  const masked = system.getMasked()

  if (opts.format === 'json') {
    process.stdout.write(JSON.stringify(masked, null, 2) + '\n')
  } else {
    process.stdout.write('# pidloop configuration (credentials masked)\n\n')
    process.stdout.write(yaml.dump(masked))
  }

  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config set` action
// ---------------------------------------------------------------------------

/**
 * Write one value to the project config file. Works before the gains are
 * set, so `config set pid.kp 1.0` is how a fresh project gets its gains.
 */
export async function runConfigSet(
  key: string,
  rawValue: string,
  opts: ConfigDirOptions = {}
): Promise<number> {
  if (key.trim() === '') {
    process.stderr.write('  Error: key must not be empty\n')
    return CONFIG_EXIT_INVALID
  }

  const value = coerceScalar(rawValue.trim())
  const system = createConfigSystem(systemOptions(opts))

  try {
    await system.set(key, value)
    process.stdout.write(`  Set ${key} = ${JSON.stringify(value)}\n`)
    return CONFIG_EXIT_SUCCESS
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Error: ${err.message}\n`)
      return CONFIG_EXIT_INVALID
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err, key }, 'Failed to update configuration')
    process.stderr.write(`  Error updating configuration: ${message}\n`)
    return CONFIG_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// Command registration
// ---------------------------------------------------------------------------

export function registerConfigCommand(program: Command): void {
  const config = program.command('config').description('Show or change pidloop configuration')

  config
    .command('show')
    .description('Show the merged configuration with credentials masked')
    .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
    .option('--project-config-dir <dir>', 'Path to the project .pidloop/ directory')
    .option('--global-config-dir <dir>', 'Path to the global .pidloop/ directory')
    .action(async (opts: { format: string; projectConfigDir?: string; globalConfigDir?: string }) => {
      const exitCode = await runConfigShow({
        format: opts.format === 'json' ? 'json' : 'yaml',
        ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
        ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
      })
      process.exitCode = exitCode
    })

  config
    .command('set <key> <value>')
    .description('Set a value in the project config using a dot-notation key (e.g. pid.kp 1.0)')
    .option('--project-config-dir <dir>', 'Path to the project .pidloop/ directory')
    .action(async (key: string, value: string, opts: { projectConfigDir?: string }) => {
      const exitCode = await runConfigSet(key, value, {
        ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
      })
      process.exitCode = exitCode
    })
}
