/**
 * `pidloop run` command
 *
 * Loads configuration, wires the loop's collaborators and runs the
 * controller until a guard stops it or the iteration limit is reached.
 *
 * Exit codes: 0 run completed or halted by a guard, 1 error or run failed,
 * 2 invalid configuration or options.
 */

import { InvalidArgumentError } from 'commander'
import type { Command } from 'commander'
import { resolve } from 'path'
import { ServiceRegistry } from '../../core/di.js'
import { ConfigError } from '../../core/errors.js'
import { TypedEventBusImpl } from '../../core/event-bus.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import { createAgentRoles } from '../../modules/agents/agent-roles.js'
import type { AgentRunner } from '../../modules/agents/agent-runner.js'
import { createProcessAgentRunner } from '../../modules/agents/process-agent-runner.js'
import { FileCheckpointManager } from '../../modules/checkpoint/checkpoint-manager-impl.js'
import { PartialPidLoopConfigSchema } from '../../modules/config/config-schema.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import { createIterationOrchestrator } from '../../modules/iteration-orchestrator/iteration-orchestrator-impl.js'
import { createLintProvider } from '../../modules/metrics/lint-provider.js'
import { createProcessVariableMeter } from '../../modules/metrics/process-variable-meter.js'
import type { LintProvider } from '../../modules/metrics/types.js'
import { createGitPatchApplier } from '../../modules/patch/git-patch-applier.js'
import type { PatchApplier } from '../../modules/patch/patch-applier.js'
import { createDatabaseService } from '../../persistence/database.js'
import { createSqliteIterationRecorder } from '../../persistence/iteration-recorder.js'
import { createLogger, setGlobalLogLevel } from '../../utils/logger.js'
import { formatDecisionLine, formatProgressLine, formatRunSummary } from '../formatters/run-formatter.js'
import { buildJsonOutput } from '../utils/formatting.js'
import type { ConfigDirOptions } from './config.js'

const logger = createLogger('run-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const RUN_EXIT_SUCCESS = 0
export const RUN_EXIT_ERROR = 1
export const RUN_EXIT_INVALID = 2

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface RunCommandOptions extends ConfigDirOptions {
  goal: string
  maxIterations?: number
  workspace?: string
  checkpointDir?: string
  database?: string
  logLevel?: string
  kp?: number
  ki?: number
  kd?: number
  /** Print the summary as JSON instead of progress lines and a report */
  json?: boolean
  version?: string
}

/** Collaborators a caller may replace, e.g. with in-process fakes */
export interface RunCommandDeps {
  agentRunner?: AgentRunner
  patchApplier?: PatchApplier
  lintProvider?: LintProvider
}

/**
 * Translate command-line flags into a config overlay. The result is
 * validated with the same schema as a config file.
 */
export function buildCliOverrides(opts: RunCommandOptions): Record<string, unknown> {
  const pid: Record<string, unknown> = {}
  if (opts.kp !== undefined) pid['kp'] = opts.kp
  if (opts.ki !== undefined) pid['ki'] = opts.ki
  if (opts.kd !== undefined) pid['kd'] = opts.kd

  const repository: Record<string, unknown> = {}
  if (opts.workspace !== undefined) repository['base_path'] = opts.workspace
  if (opts.checkpointDir !== undefined) repository['checkpoint_path'] = opts.checkpointDir
  if (opts.database !== undefined) repository['database_path'] = opts.database

  const overrides: Record<string, unknown> = {}
  if (Object.keys(pid).length > 0) overrides['pid'] = pid
  if (Object.keys(repository).length > 0) overrides['repository'] = repository
  if (opts.maxIterations !== undefined) overrides['safety'] = { max_iterations: opts.maxIterations }
  if (opts.logLevel !== undefined) overrides['orchestration'] = { log_level: opts.logLevel }
  return overrides
}

// ---------------------------------------------------------------------------
// Progress output
// ---------------------------------------------------------------------------

/** Print one line per decision, measurement, failure and halt */
export function attachProgressReporter(
  eventBus: TypedEventBus,
  write: (line: string) => void = (line) => {
    process.stdout.write(line + '\n')
  }
): void {
  eventBus.on('iteration:decision', ({ iteration, decision, controlValue }) => {
    write(formatDecisionLine(iteration, decision, controlValue))
  })
  eventBus.on('iteration:complete', ({ iteration, pv, bestPv }) => {
    write(formatProgressLine(iteration, pv, bestPv))
  })
  eventBus.on('iteration:failed', ({ iteration, error }) => {
    write(`[${String(iteration)}] failed: ${error}`)
  })
  eventBus.on('guard:halt', ({ reason }) => {
    write(`Stopped by safety guard: ${reason}`)
  })
}

// ---------------------------------------------------------------------------
// `run` action
// ---------------------------------------------------------------------------

export async function runLoop(opts: RunCommandOptions, deps: RunCommandDeps = {}): Promise<number> {
  const goal = opts.goal.trim()
  if (goal === '') {
    process.stderr.write('  Error: --goal must not be empty\n')
    return RUN_EXIT_INVALID
  }

  const overrides = PartialPidLoopConfigSchema.safeParse(buildCliOverrides(opts))
  if (!overrides.success) {
    const issues = overrides.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    process.stderr.write(`  Invalid option: ${issues}\n`)
    return RUN_EXIT_INVALID
  }

  const system = createConfigSystem({
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
    cliOverrides: overrides.data,
  })

  try {
    await system.load()
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Configuration error: ${err.message}\n`)
      return RUN_EXIT_INVALID
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`  Error loading configuration: ${message}\n`)
    return RUN_EXIT_ERROR
  }

  const config = system.getConfig()
  // LOG_LEVEL in the environment wins over the config file; --log-level wins over both
  if (opts.logLevel !== undefined || process.env.LOG_LEVEL === undefined) {
    setGlobalLogLevel(config.orchestration.log_level)
  }

  const registry = new ServiceRegistry()
  const database = createDatabaseService(config.repository.database_path)
  registry.register('database', database)

  const checkpoints = new FileCheckpointManager({
    checkpointDir: resolve(config.repository.checkpoint_path),
    keepLastN: config.repository.keep_checkpoints,
  })
  registry.register('checkpoints', checkpoints)

  const eventBus = new TypedEventBusImpl()
  if (opts.json !== true) attachProgressReporter(eventBus)

  try {
    await registry.initializeAll()

    const orchestrator = createIterationOrchestrator({
      config,
      agents: createAgentRoles(deps.agentRunner ?? createProcessAgentRunner(), config.agents),
      meter: createProcessVariableMeter({
        settings: config.metrics,
        lintProvider: deps.lintProvider ?? createLintProvider(config.metrics),
      }),
      checkpoints,
      patchApplier: deps.patchApplier ?? createGitPatchApplier(),
      eventBus,
      recorder: createSqliteIterationRecorder(database.db),
    })

    const summary = await orchestrator.run(goal, {
      configSnapshot: JSON.stringify(system.getMasked()),
    })

    if (opts.json === true) {
      process.stdout.write(JSON.stringify(buildJsonOutput('run', summary, opts.version ?? '0.0.0'), null, 2) + '\n')
    } else {
      process.stdout.write('\n' + formatRunSummary(summary) + '\n')
    }
    return summary.status === 'failed' ? RUN_EXIT_ERROR : RUN_EXIT_SUCCESS
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Run failed')
    process.stderr.write(`  Run failed: ${message}\n`)
    return RUN_EXIT_ERROR
  } finally {
    try {
      await registry.shutdownAll()
    } catch (err) {
      logger.warn({ err }, 'Service shutdown failed')
    }
  }
}

// ---------------------------------------------------------------------------
// Command registration
// ---------------------------------------------------------------------------

function parseNumber(value: string): number {
  const parsed = Number(value)
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError(`Not a number: ${value}`)
  }
  return parsed
}

interface RunFlags {
  goal: string
  maxIterations?: number
  workspace?: string
  checkpointDir?: string
  database?: string
  logLevel?: string
  kp?: number
  ki?: number
  kd?: number
  json: boolean
  projectConfigDir?: string
}

export function registerRunCommand(program: Command, version: string): void {
  program
    .command('run')
    .description('Run the control loop until the goal is reached or a guard stops it')
    .requiredOption('-g, --goal <text>', 'What the codebase should become')
    .option('-n, --max-iterations <n>', 'Iteration limit (safety.max_iterations)', parseNumber)
    .option('-w, --workspace <dir>', 'Codebase directory the agents work in (repository.base_path)')
    .option('--checkpoint-dir <dir>', 'Where checkpoints are stored (repository.checkpoint_path)')
    .option('--database <path>', 'SQLite history database (repository.database_path)')
    .option('--log-level <level>', 'Log level (orchestration.log_level)')
    .option('--kp <gain>', 'Proportional gain', parseNumber)
    .option('--ki <gain>', 'Integral gain', parseNumber)
    .option('--kd <gain>', 'Derivative gain', parseNumber)
    .option('--project-config-dir <dir>', 'Path to the project .pidloop/ directory')
    .option('--json', 'Print the run summary as JSON', false)
    .action(async (opts: RunFlags) => {
      const exitCode = await runLoop({ ...opts, version })
      process.exitCode = exitCode
    })
}
