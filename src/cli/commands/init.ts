/**
 * `pidloop init` command
 *
 * Creates `.pidloop/config.yaml` in the target directory with starting PID
 * gains and the settings most projects change first.
 */

import type { Command } from 'commander'
import { access, mkdir, writeFile } from 'fs/promises'
import { join, resolve } from 'path'
import yaml from 'js-yaml'
import { CURRENT_CONFIG_FORMAT_VERSION } from '../../modules/config/config-schema.js'
import type { PartialPidLoopConfig } from '../../modules/config/config-schema.js'
import { CONFIG_FILE_NAME } from '../../modules/config/config-system-impl.js'
import { DEFAULT_CONFIG } from '../../modules/config/defaults.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('init')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const INIT_EXIT_SUCCESS = 0
export const INIT_EXIT_ERROR = 1
export const INIT_EXIT_ALREADY_EXISTS = 2

export const CONFIG_DIR_NAME = '.pidloop'

const TEMPLATE_HEADER = [
  '# pidloop project configuration',
  '#',
  '# kp, ki and kd have no built-in defaults. The values below are a starting',
  '# point: raise kp for faster reaction, lower ki if the loop overshoots.',
  '# Run `pidloop config show` to see every setting with its effective value.',
  '',
].join('\n')

/** Initial project config: gains plus the settings most often changed */
export function buildInitialConfig(): PartialPidLoopConfig {
  return {
    config_format_version: CURRENT_CONFIG_FORMAT_VERSION,
    pid: {
      kp: 1.0,
      ki: 0.1,
      kd: 0.05,
      setpoint: DEFAULT_CONFIG.pid.setpoint,
    },
    safety: {
      max_iterations: DEFAULT_CONFIG.safety.max_iterations,
      max_budget_usd: DEFAULT_CONFIG.safety.max_budget_usd,
    },
    repository: {
      base_path: DEFAULT_CONFIG.repository.base_path,
    },
  }
}

export function renderInitialConfig(): string {
  return TEMPLATE_HEADER + yaml.dump(buildInitialConfig())
}

// ---------------------------------------------------------------------------
// `init` action
// ---------------------------------------------------------------------------

export interface InitOptions {
  /** Project root (default: cwd) */
  directory?: string
  /** Overwrite an existing config file */
  force?: boolean
}

export async function runInit(opts: InitOptions = {}): Promise<number> {
  const root = resolve(opts.directory ?? process.cwd())
  const configDir = join(root, CONFIG_DIR_NAME)
  const configPath = join(configDir, CONFIG_FILE_NAME)

  if (opts.force !== true) {
    const exists = await access(configPath).then(
      () => true,
      () => false
    )
    if (exists) {
      process.stderr.write(`  ${configPath} already exists. Use --force to overwrite it.\n`)
      return INIT_EXIT_ALREADY_EXISTS
    }
  }

  try {
    await mkdir(configDir, { recursive: true })
    await writeFile(configPath, renderInitialConfig(), 'utf-8')
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err, configPath }, 'Failed to write project config')
    process.stderr.write(`  Error writing ${configPath}: ${message}\n`)
    return INIT_EXIT_ERROR
  }

  process.stdout.write(`  Created ${configPath}\n`)
  process.stdout.write('  Next: review the PID gains, then run `pidloop run --goal "<what to build>"`\n')
  return INIT_EXIT_SUCCESS
}

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create .pidloop/config.yaml with starting PID gains')
    .option('-d, --directory <path>', 'Target directory (defaults to current working directory)')
    .option('-f, --force', 'Overwrite an existing config file', false)
    .action(async (opts: { directory?: string; force: boolean }) => {
      const exitCode = await runInit({
        ...(opts.directory !== undefined && { directory: opts.directory }),
        force: opts.force,
      })
      process.exitCode = exitCode
    })
}
