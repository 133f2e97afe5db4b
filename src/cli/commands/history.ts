/**
 * `pidloop history` command
 *
 * Lists recorded runs, or the iteration records of one run, from the
 * SQLite database the `run` command writes.
 */

import type { Command } from 'commander'
import { access } from 'fs/promises'
import { ConfigError } from '../../core/errors.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import { createDatabaseService } from '../../persistence/database.js'
import { listIterations, toIterationRecord } from '../../persistence/queries/iterations.js'
import { getRun, listRuns } from '../../persistence/queries/runs.js'
import { createLogger } from '../../utils/logger.js'
import { formatIterationTable, formatRunHeader, formatRunTable } from '../formatters/run-formatter.js'
import { buildJsonOutput } from '../utils/formatting.js'
import type { ConfigDirOptions } from './config.js'

const logger = createLogger('history-cmd')

export const HISTORY_EXIT_SUCCESS = 0
export const HISTORY_EXIT_ERROR = 1
export const HISTORY_EXIT_INVALID = 2

export interface HistoryOptions extends ConfigDirOptions {
  /** Show the iterations of this run instead of the run list */
  runId?: string
  /** Database path; defaults to repository.database_path */
  database?: string
  limit?: number
  json?: boolean
  version?: string
}

/**
 * Resolve the database path without requiring PID gains: an explicit
 * `--database` skips config loading entirely.
 */
async function resolveDatabasePath(opts: HistoryOptions): Promise<string> {
  if (opts.database !== undefined) return opts.database
  const system = createConfigSystem({
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  })
  await system.load()
  return system.getConfig().repository.database_path
}

function writeJson(command: string, data: unknown, version: string | undefined): void {
  process.stdout.write(JSON.stringify(buildJsonOutput(command, data, version ?? '0.0.0'), null, 2) + '\n')
}

export async function runHistory(opts: HistoryOptions = {}): Promise<number> {
  let databasePath: string
  try {
    databasePath = await resolveDatabasePath(opts)
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Configuration error: ${err.message}\n`)
      return HISTORY_EXIT_INVALID
    }
    throw err
  }

  const exists = await access(databasePath).then(
    () => true,
    () => false
  )
  if (!exists) {
    process.stdout.write('No runs recorded yet.\n')
    return HISTORY_EXIT_SUCCESS
  }

  const database = createDatabaseService(databasePath)
  try {
    await database.initialize()

    if (opts.runId === undefined) {
      const runs = listRuns(database.db, opts.limit)
      if (opts.json === true) writeJson('history', runs, opts.version)
      else process.stdout.write(formatRunTable(runs) + '\n')
      return HISTORY_EXIT_SUCCESS
    }

    const run = getRun(database.db, opts.runId)
    if (run === undefined) {
      process.stderr.write(`  Run not found: ${opts.runId}\n`)
      return HISTORY_EXIT_ERROR
    }
    const iterations = listIterations(database.db, run.id)
    if (opts.json === true) {
      writeJson('history', { run, iterations: iterations.map(toIterationRecord) }, opts.version)
    } else {
      process.stdout.write(formatRunHeader(run) + '\n\n' + formatIterationTable(iterations) + '\n')
    }
    return HISTORY_EXIT_SUCCESS
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err, databasePath }, 'Failed to read history')
    process.stderr.write(`  Error reading history: ${message}\n`)
    return HISTORY_EXIT_ERROR
  } finally {
    await database.shutdown()
  }
}

export function registerHistoryCommand(program: Command, version: string): void {
  program
    .command('history')
    .description('List recorded runs, or the iterations of one run')
    .option('-r, --run <id>', 'Show the iteration records of this run')
    .option('--database <path>', 'SQLite history database (default: repository.database_path)')
    .option('--limit <n>', 'Number of runs to list', (value: string) => parseInt(value, 10), 20)
    .option('--json', 'Print as JSON', false)
    .action(async (opts: { run?: string; database?: string; limit: number; json: boolean }) => {
      const exitCode = await runHistory({
        ...(opts.run !== undefined && { runId: opts.run }),
        ...(opts.database !== undefined && { database: opts.database }),
        limit: opts.limit,
        json: opts.json,
        version,
      })
      process.exitCode = exitCode
    })
}
