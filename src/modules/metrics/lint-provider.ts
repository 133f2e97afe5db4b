/**
 * Lint score providers.
 *
 * CommandLintProvider runs the configured linter inside the workspace and
 * turns its issue count into a score: 1 - (issues per source file) / 10,
 * floored at 0. A linter that is not installed scores DEFAULT_LINT_SCORE;
 * one that times out or fails to start scores FAILED_LINT_SCORE.
 */

import { spawn } from 'node:child_process'
import { extname } from 'path'
import { createLogger } from '../../utils/logger.js'
import { walkFiles } from '../../utils/file-walker.js'
import type { MetricsSettings } from '../config/config-schema.js'
import { SOURCE_EXTENSIONS } from './text.js'
import type { LintProvider } from './types.js'

const logger = createLogger('metrics:lint')

export const DEFAULT_LINT_SCORE = 0.7
export const FAILED_LINT_SCORE = 0.5

// Issues per file at which the score bottoms out
const ISSUES_PER_FILE_FLOOR = 10

// `path:line: message` or `path:line:col: message`
const ISSUE_LINE = /^\S.*?:\d+(?::\d+)?:\s/

export class StaticLintProvider implements LintProvider {
  constructor(private readonly _score: number = DEFAULT_LINT_SCORE) {}

  score(_codebasePath: string): Promise<number> {
    return Promise.resolve(this._score)
  }
}

// ---------------------------------------------------------------------------
// Scoring helpers
// ---------------------------------------------------------------------------

export function countLintIssues(output: string): number {
  let issues = 0
  for (const line of output.split('\n')) {
    if (ISSUE_LINE.test(line)) issues += 1
  }
  return issues
}

export function lintScoreFromIssues(issues: number, sourceFiles: number): number {
  if (sourceFiles <= 0) return 1
  return Math.max(0, 1 - issues / sourceFiles / ISSUES_PER_FILE_FLOOR)
}

export async function countSourceFiles(root: string): Promise<number> {
  let count = 0
  for await (const file of walkFiles(root)) {
    if (SOURCE_EXTENSIONS.has(extname(file.name))) count += 1
  }
  return count
}

// ---------------------------------------------------------------------------
// CommandLintProvider
// ---------------------------------------------------------------------------

export interface CommandLintProviderOptions {
  command: string
  args: string[]
  timeoutMs: number
  /** Base environment for the linter (default: process.env) */
  env?: NodeJS.ProcessEnv
}

type LintRun =
  | { kind: 'exited'; stdout: string; exitCode: number | null }
  | { kind: 'missing' }
  | { kind: 'timeout' }
  | { kind: 'error'; message: string }

export class CommandLintProvider implements LintProvider {
  private readonly _command: string
  private readonly _args: string[]
  private readonly _timeoutMs: number
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: CommandLintProviderOptions) {
    this._command = options.command
    this._args = options.args
    this._timeoutMs = options.timeoutMs
    this._env = options.env ?? process.env
  }

  async score(codebasePath: string): Promise<number> {
    const sourceFiles = await countSourceFiles(codebasePath)
    if (sourceFiles === 0) return 1

    const result = await this._runLinter(codebasePath)
    switch (result.kind) {
      case 'missing':
        logger.debug({ command: this._command }, 'Linter not installed; using neutral score')
        return DEFAULT_LINT_SCORE
      case 'timeout':
        logger.warn({ command: this._command, timeoutMs: this._timeoutMs }, 'Linter timed out')
        return FAILED_LINT_SCORE
      case 'error':
        logger.warn({ command: this._command, error: result.message }, 'Linter failed')
        return FAILED_LINT_SCORE
      case 'exited': {
        // Linters exit non-zero when they report issues
        const issues = countLintIssues(result.stdout)
        logger.debug({ issues, sourceFiles, exitCode: result.exitCode }, 'Lint finished')
        return lintScoreFromIssues(issues, sourceFiles)
      }
    }
  }

  private _runLinter(cwd: string): Promise<LintRun> {
    return new Promise<LintRun>((resolve) => {
      const stdoutChunks: Buffer[] = []
      let settled = false
      const settle = (run: LintRun): void => {
        if (settled) return
        settled = true
        clearTimeout(timeoutHandle)
        resolve(run)
      }

      const proc = spawn(this._command, this._args, {
        cwd,
        env: this._env,
        stdio: ['ignore', 'pipe', 'pipe'],
      })

      const timeoutHandle = setTimeout(() => {
        settle({ kind: 'timeout' })
        proc.kill('SIGTERM')
      }, this._timeoutMs)

      proc.stdout?.on('data', (chunk: Buffer) => {
        stdoutChunks.push(chunk)
      })
      // Drain stderr so a chatty linter cannot block on a full pipe
      proc.stderr?.resume()

      proc.on('error', (err: NodeJS.ErrnoException) => {
        if (err.code === 'ENOENT') settle({ kind: 'missing' })
        else settle({ kind: 'error', message: err.message })
      })

      proc.on('close', (exitCode: number | null) => {
        settle({ kind: 'exited', stdout: Buffer.concat(stdoutChunks).toString('utf-8'), exitCode })
      })
    })
  }
}

/** An empty `lint_command` keeps the fixed neutral score */
export function createLintProvider(settings: MetricsSettings): LintProvider {
  if (settings.lint_command === '') return new StaticLintProvider()
  return new CommandLintProvider({
    command: settings.lint_command,
    args: settings.lint_args,
    timeoutMs: settings.lint_timeout_ms,
  })
}
