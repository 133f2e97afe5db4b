/**
 * ProcessAgentRunner: runs an agent as a CLI subprocess.
 *
 * The configured command receives the prompt on stdin and answers on stdout.
 * Sampling parameters travel as environment variables so wrapper scripts can
 * forward them to whatever model they call:
 *   PIDLOOP_AGENT_ROLE, PIDLOOP_TEMPERATURE, PIDLOOP_MAX_TOKENS
 * A configured `model` is appended as `--model <name>`.
 */

import { spawn } from 'node:child_process'
import { AgentError } from '../../core/errors.js'
import { maskSecrets } from '../../cli/utils/masking.js'
import { createLogger } from '../../utils/logger.js'
import type { AgentSettings } from '../config/config-schema.js'
import type { AgentRunner } from './agent-runner.js'
import type { AgentRunRequest, AgentRunResult, TokenEstimate } from './types.js'

const logger = createLogger('agents')

// Characters per token for estimation heuristic
const CHARS_PER_TOKEN = 4

// Cap on stderr kept in error context
const STDERR_EXCERPT_CHARS = 2000

// ---------------------------------------------------------------------------
// Estimation helpers
// ---------------------------------------------------------------------------

export function estimateTokens(prompt: string, output: string): TokenEstimate {
  return {
    input: Math.ceil(prompt.length / CHARS_PER_TOKEN),
    output: Math.ceil(output.length / CHARS_PER_TOKEN),
  }
}

export function estimateCost(tokens: TokenEstimate, costPer1kTokens: number): number {
  return ((tokens.input + tokens.output) / 1000) * costPer1kTokens
}

export function buildAgentArgs(params: AgentSettings): string[] {
  const args = [...params.args]
  if (params.model !== undefined && params.model !== '') args.push('--model', params.model)
  return args
}

// ---------------------------------------------------------------------------
// ProcessAgentRunner
// ---------------------------------------------------------------------------

export interface ProcessAgentRunnerOptions {
  /** Base environment for agent processes (default: process.env) */
  env?: NodeJS.ProcessEnv
}

export class ProcessAgentRunner implements AgentRunner {
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ProcessAgentRunnerOptions = {}) {
    this._env = options.env ?? process.env
  }

  run(request: AgentRunRequest): Promise<AgentRunResult> {
    const { role, prompt, params } = request
    const args = buildAgentArgs(params)

    const env: NodeJS.ProcessEnv = {
      ...this._env,
      PIDLOOP_AGENT_ROLE: role,
      PIDLOOP_TEMPERATURE: String(params.temperature),
      PIDLOOP_MAX_TOKENS: String(params.max_tokens),
    }
    if (params.api_key_env !== undefined && env[params.api_key_env] === undefined) {
      logger.warn({ role, apiKeyEnv: params.api_key_env }, 'API key environment variable is not set')
    }

    logger.debug({ role, command: params.command, args, promptChars: prompt.length }, 'Starting agent')

    return new Promise<AgentRunResult>((resolve, reject) => {
      const startedAt = Date.now()
      const stdoutChunks: Buffer[] = []
      const stderrChunks: Buffer[] = []
      let settled = false

      const proc = spawn(params.command, args, {
        cwd: request.cwd,
        env,
        stdio: ['pipe', 'pipe', 'pipe'],
      })

      const timeoutHandle = setTimeout(() => {
        if (settled) return
        settled = true
        proc.kill('SIGTERM')
        logger.warn({ role, timeoutMs: params.timeout_ms }, 'Agent timed out')
        reject(
          new AgentError(`${role} agent timed out after ${String(params.timeout_ms)}ms`, {
            role,
            timeoutMs: params.timeout_ms,
          })
        )
      }, params.timeout_ms)

      proc.stdout?.on('data', (chunk: Buffer) => {
        stdoutChunks.push(chunk)
      })
      proc.stderr?.on('data', (chunk: Buffer) => {
        stderrChunks.push(chunk)
      })

      // The agent may exit before reading its prompt; EPIPE is expected then
      if (proc.stdin !== null) {
        proc.stdin.on('error', (err: NodeJS.ErrnoException) => {
          if (err.code !== 'EPIPE') {
            logger.warn({ role, error: err.message }, 'stdin write error')
          }
        })
        proc.stdin.end(prompt)
      }

      proc.on('error', (err: Error) => {
        clearTimeout(timeoutHandle)
        if (settled) return
        settled = true
        reject(
          new AgentError(`Failed to start ${role} agent "${params.command}": ${err.message}`, {
            role,
            command: params.command,
          })
        )
      })

      proc.on('close', (exitCode: number | null) => {
        clearTimeout(timeoutHandle)
        if (settled) return
        settled = true

        const durationMs = Date.now() - startedAt
        const output = Buffer.concat(stdoutChunks).toString('utf-8')

        if (exitCode !== 0) {
          const stderr = Buffer.concat(stderrChunks).toString('utf-8')
          reject(
            new AgentError(`${role} agent exited with code ${String(exitCode)}`, {
              role,
              exitCode,
              stderr: maskSecrets(stderr.slice(0, STDERR_EXCERPT_CHARS)),
            })
          )
          return
        }

        const tokenEstimate = estimateTokens(prompt, output)
        const costUsd = estimateCost(tokenEstimate, params.cost_per_1k_tokens)
        logger.debug({ role, durationMs, tokenEstimate, costUsd }, 'Agent finished')
        resolve({ output, tokenEstimate, costUsd, durationMs })
      })
    })
  }
}

export function createProcessAgentRunner(options: ProcessAgentRunnerOptions = {}): AgentRunner {
  return new ProcessAgentRunner(options)
}
