/**
 * Tests for AgentRoles with a scripted runner.
 */

import { describe, it, expect } from 'vitest'
import { join } from 'path'
import { tmpdir } from 'os'
import { AgentOutputError } from '../../../core/errors.js'
import type { PlannedTask } from '../../../core/types.js'
import { DEFAULT_CONFIG } from '../../config/defaults.js'
import { AgentRoles } from '../agent-roles.js'
import type { AgentRunner } from '../agent-runner.js'
import type { AgentRunRequest, AgentRunResult } from '../types.js'

class ScriptedRunner implements AgentRunner {
  readonly requests: AgentRunRequest[] = []

  constructor(private readonly _outputs: string[]) {}

  run(request: AgentRunRequest): Promise<AgentRunResult> {
    this.requests.push(request)
    const output = this._outputs.shift() ?? ''
    return Promise.resolve({ output, tokenEstimate: { input: 1, output: 1 }, costUsd: 0.01, durationMs: 5 })
  }
}

const SETTINGS = DEFAULT_CONFIG.agents
const MISSING_DIR = join(tmpdir(), 'pidloop-agent-roles-missing-workspace')

const TASK: PlannedTask = {
  id: 'T1',
  title: 'Add parser',
  description: '',
  priority: 'medium',
  estimated_complexity: 'low',
  dependencies: [],
  acceptance_criteria: [],
}

describe('AgentRoles.callKeeper', () => {
  it('returns validated tasks and the call cost', async () => {
    const runner = new ScriptedRunner(['Thinking...\n```yaml\ntasks:\n  - id: T1\n    title: Add parser\nreasoning: start\n```\n'])
    const roles = new AgentRoles(runner, SETTINGS)

    const result = await roles.callKeeper({ goal: 'Parse CSV', iteration: 1, completedTasks: [], codebasePath: MISSING_DIR })

    expect(result.costUsd).toBe(0.01)
    expect(result.output.tasks.map((t) => t.title)).toEqual(['Add parser'])
    expect(result.output.reasoning).toBe('start')
    expect(runner.requests[0]?.role).toBe('keeper')
    expect(runner.requests[0]?.params).toBe(SETTINGS.keeper)
    expect(runner.requests[0]?.cwd).toBe(MISSING_DIR)
    expect(runner.requests[0]?.prompt).toContain('CODEBASE:\nEmpty codebase')
  })

  it('raises AgentOutputError with the cost when the block does not validate', async () => {
    const roles = new AgentRoles(new ScriptedRunner(['tasks: oops']), SETTINGS)

    const err = await roles
      .callKeeper({ goal: 'g', iteration: 1, completedTasks: [], codebasePath: MISSING_DIR })
      .catch((e: unknown) => e)

    expect(err).toBeInstanceOf(AgentOutputError)
    if (err instanceof AgentOutputError) {
      expect(err.message).toBe('Malformed keeper output: Schema validation error: tasks: Expected array, received string')
      expect(err.context['costUsd']).toBe(0.01)
      expect(err.context['role']).toBe('keeper')
    }
  })
})

describe('AgentRoles.callDeveloper', () => {
  it('overrides the temperature for one call only', async () => {
    const runner = new ScriptedRunner(['patch: ""\n'])
    const roles = new AgentRoles(runner, SETTINGS)

    const result = await roles.callDeveloper({ task: TASK, codebasePath: MISSING_DIR, temperature: 0.3 })

    expect(result.output.patch).toBe('')
    expect(runner.requests[0]?.params.temperature).toBe(0.3)
    expect(runner.requests[0]?.params.max_tokens).toBe(4000)
    expect(SETTINGS.developer.temperature).toBe(0.5)
    expect(runner.requests[0]?.prompt).toContain('FILES IN THE CODEBASE:\n(no files yet)')
  })
})

describe('AgentRoles.callQa', () => {
  const developerOutput = {
    patch: '',
    files_modified: [],
    files_created: [],
    risks: [],
    implementation_notes: '',
    testing_suggestions: [],
  }

  it('parses the verdict block', async () => {
    const runner = new ScriptedRunner(['```yaml\nverdict: pass\nquality_score: 6.5\nfeedback: fine\n```'])
    const roles = new AgentRoles(runner, SETTINGS)

    const result = await roles.callQa({ iteration: 20, patch: '', developerOutput, codebasePath: MISSING_DIR })

    expect(result.output.verdict).toBe('pass')
    expect(result.output.quality_score).toBe(6.5)
    expect(runner.requests[0]?.prompt).toContain('Late iteration: be strict.')
  })

  it('raises AgentOutputError when no block is present', async () => {
    const roles = new AgentRoles(new ScriptedRunner(['Looks good to me.']), SETTINGS)

    await expect(
      roles.callQa({ iteration: 1, patch: '', developerOutput, codebasePath: MISSING_DIR })
    ).rejects.toThrow('Malformed qa output: no structured block containing "verdict"')
  })
})
