/**
 * AgentRoles: Keeper, Developer and QA calls with validated outputs.
 *
 * Each call builds the role prompt, runs it through the AgentRunner, extracts
 * the trailing structured block and validates it. A block that is missing or
 * does not validate raises AgentOutputError; the cost of the call is carried
 * in the error context (`costUsd`) so budget accounting stays honest.
 */

import type { ZodType, ZodTypeDef } from 'zod'
import type { AgentRole, PlannedTask } from '../../core/types.js'
import { AgentOutputError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { AgentSettings, AgentsSettings } from '../config/config-schema.js'
import type { AgentRunner } from './agent-runner.js'
import { listCodebaseFiles, summarizeCodebase } from './codebase-context.js'
import { extractStructuredBlock, parseStructuredBlock } from './output-parser.js'
import { buildDeveloperPrompt, buildKeeperPrompt, buildQaPrompt } from './prompts.js'
import {
  DeveloperOutputSchema,
  KeeperOutputSchema,
  QaOutputSchema,
  type DeveloperOutput,
  type KeeperOutput,
  type QaOutput,
} from './schemas.js'
import type { AgentCallResult } from './types.js'

const logger = createLogger('agents')

const OUTPUT_EXCERPT_CHARS = 500

const ANCHOR_KEYS: Record<AgentRole, string> = {
  keeper: 'tasks',
  developer: 'patch',
  qa: 'verdict',
}

// ---------------------------------------------------------------------------
// Call contexts
// ---------------------------------------------------------------------------

export interface KeeperCall {
  goal: string
  iteration: number
  completedTasks: readonly PlannedTask[]
  codebasePath: string
}

export interface DeveloperCall {
  task: PlannedTask
  codebasePath: string
  /** Per-call override of the configured developer temperature */
  temperature?: number
}

export interface QaCall {
  iteration: number
  patch: string
  developerOutput: DeveloperOutput
  codebasePath: string
}

// ---------------------------------------------------------------------------
// AgentTeam
// ---------------------------------------------------------------------------

/** The three role calls the iteration loop depends on */
export interface AgentTeam {
  callKeeper(call: KeeperCall): Promise<AgentCallResult<KeeperOutput>>
  callDeveloper(call: DeveloperCall): Promise<AgentCallResult<DeveloperOutput>>
  callQa(call: QaCall): Promise<AgentCallResult<QaOutput>>
}

// ---------------------------------------------------------------------------
// AgentRoles
// ---------------------------------------------------------------------------

export class AgentRoles implements AgentTeam {
  constructor(
    private readonly _runner: AgentRunner,
    private readonly _settings: AgentsSettings
  ) {}

  async callKeeper(call: KeeperCall): Promise<AgentCallResult<KeeperOutput>> {
    const prompt = buildKeeperPrompt({
      goal: call.goal,
      iteration: call.iteration,
      completedTasks: call.completedTasks,
      codebaseSummary: await summarizeCodebase(call.codebasePath),
      language: this._settings.language,
    })
    return this._call('keeper', prompt, this._settings.keeper, KeeperOutputSchema, call.codebasePath)
  }

  async callDeveloper(call: DeveloperCall): Promise<AgentCallResult<DeveloperOutput>> {
    const prompt = buildDeveloperPrompt({
      task: call.task,
      codebaseFiles: await listCodebaseFiles(call.codebasePath),
      language: this._settings.language,
    })
    const params: AgentSettings =
      call.temperature === undefined
        ? this._settings.developer
        : { ...this._settings.developer, temperature: call.temperature }
    return this._call('developer', prompt, params, DeveloperOutputSchema, call.codebasePath)
  }

  async callQa(call: QaCall): Promise<AgentCallResult<QaOutput>> {
    const prompt = buildQaPrompt({
      iteration: call.iteration,
      patch: call.patch,
      developerOutput: call.developerOutput,
      codebaseSummary: await summarizeCodebase(call.codebasePath),
      language: this._settings.language,
    })
    return this._call('qa', prompt, this._settings.qa, QaOutputSchema, call.codebasePath)
  }

  private async _call<T>(
    role: AgentRole,
    prompt: string,
    params: AgentSettings,
    schema: ZodType<T, ZodTypeDef, unknown>,
    cwd: string
  ): Promise<AgentCallResult<T>> {
    const result = await this._runner.run({ role, prompt, params, cwd })
    const excerpt = result.output.slice(-OUTPUT_EXCERPT_CHARS)

    const block = extractStructuredBlock(result.output, ANCHOR_KEYS[role])
    if (block === null) {
      throw new AgentOutputError(role, `no structured block containing "${ANCHOR_KEYS[role]}"`, {
        costUsd: result.costUsd,
        excerpt,
      })
    }

    const parsed = parseStructuredBlock(block, schema)
    if (parsed.error !== null) {
      throw new AgentOutputError(role, parsed.error, { costUsd: result.costUsd, excerpt })
    }

    logger.debug({ role, costUsd: result.costUsd, durationMs: result.durationMs }, 'Agent output validated')
    return { output: parsed.parsed, costUsd: result.costUsd }
  }
}

export function createAgentRoles(runner: AgentRunner, settings: AgentsSettings): AgentTeam {
  return new AgentRoles(runner, settings)
}
