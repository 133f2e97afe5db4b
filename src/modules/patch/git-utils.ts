/**
 * git-utils.ts: Low-level git command helper.
 *
 * Git is executed via child_process.spawn. Input, when given, is written to
 * the process's stdin.
 */

import { spawn } from 'node:child_process'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('git-utils')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SpawnOptions {
  cwd?: string
  env?: NodeJS.ProcessEnv
  /** Text written to stdin before it is closed */
  input?: string
}

export interface GitSpawnResult {
  stdout: string
  stderr: string
  code: number
  /** Set when git could not be started at all */
  spawnError?: string
}

// ---------------------------------------------------------------------------
// spawnGit
// ---------------------------------------------------------------------------

/**
 * Spawn a git subprocess with the given args.
 *
 * @param args - Arguments to pass to git (e.g., ['apply', '-'])
 * @returns Object with stdout, stderr and exit code; never rejects
 */
export function spawnGit(args: string[], options?: SpawnOptions): Promise<GitSpawnResult> {
  return new Promise((resolve) => {
    logger.debug({ args, cwd: options?.cwd }, 'spawnGit')

    const proc = spawn('git', args, {
      cwd: options?.cwd,
      env: options?.env ?? process.env,
      stdio: [options?.input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
    })

    let stdout = ''
    let stderr = ''

    proc.stdout?.on('data', (chunk: Buffer) => {
      stdout += chunk.toString()
    })

    proc.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString()
    })

    if (options?.input !== undefined && proc.stdin !== null) {
      proc.stdin.on('error', (err: NodeJS.ErrnoException) => {
        if (err.code !== 'EPIPE') logger.warn({ error: err.message }, 'git stdin write error')
      })
      proc.stdin.end(options.input)
    }

    proc.on('close', (code: number | null) => {
      resolve({ stdout: stdout.trim(), stderr: stderr.trim(), code: code ?? 1 })
    })

    proc.on('error', (err: Error) => {
      resolve({ stdout: '', stderr: err.message, code: 1, spawnError: err.message })
    })
  })
}
