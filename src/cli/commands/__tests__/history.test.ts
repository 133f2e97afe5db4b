/**
 * Tests for `pidloop history`
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdir, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { createDatabaseService } from '../../../persistence/database.js'
import { createSqliteIterationRecorder } from '../../../persistence/iteration-recorder.js'
import { captureOutput } from '../../__tests__/capture-output.js'
import { runHistory, HISTORY_EXIT_ERROR, HISTORY_EXIT_SUCCESS } from '../history.js'

let testDir: string
let databasePath: string

beforeEach(async () => {
  testDir = join(tmpdir(), `pidloop-history-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  databasePath = join(testDir, 'history.db')
  await mkdir(testDir, { recursive: true })
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
  vi.restoreAllMocks()
})

async function seedRun(): Promise<void> {
  const database = createDatabaseService(databasePath)
  await database.initialize()
  const recorder = createSqliteIterationRecorder(database.db)
  recorder.startRun({ runId: 'run-a', goal: 'build a parser', setpoint: 0.8, maxIterations: 5 })
  recorder.record('run-a', {
    iteration: 1,
    pv: 0.4,
    bestPv: 0.4,
    controlValue: 0.4,
    decision: { action: 'merge', reason: 'Quality 8.00 >= threshold 2.50' },
    qualityScore: 8,
    verdict: 'pass',
    costUsd: 0.03,
    timestamp: '2024-01-01T00:00:00.000Z',
  })
  recorder.finishRun('run-a', {
    status: 'completed',
    iterations: 1,
    bestPv: 0.4,
    finalPv: 0.4,
    totalCostUsd: 0.03,
    haltReason: null,
  })
  await database.shutdown()
}

describe('runHistory', () => {
  it('reports an empty history when the database does not exist', async () => {
    const out = captureOutput()
    const code = await runHistory({ database: databasePath })
    out.restore()
    expect(code).toBe(HISTORY_EXIT_SUCCESS)
    expect(out.getStdout()).toBe('No runs recorded yet.\n')
  })

  it('lists recorded runs as a table', async () => {
    await seedRun()
    const out = captureOutput()
    const code = await runHistory({ database: databasePath })
    out.restore()

    expect(code).toBe(HISTORY_EXIT_SUCCESS)
    const lines = out.getStdout().split('\n')
    expect(lines[0]).toMatch(/^Run {3}\| Status {4}\| Iter \| Best PV \| Final PV \| Cost {4}\| Started/)
    expect(lines[2]).toContain('run-a | completed | 1    | 0.400   | 0.400    | $0.0300 | ')
  })

  it('shows the iterations of one run', async () => {
    await seedRun()
    const out = captureOutput()
    const code = await runHistory({ database: databasePath, runId: 'run-a' })
    out.restore()

    expect(code).toBe(HISTORY_EXIT_SUCCESS)
    const stdout = out.getStdout()
    expect(stdout).toContain('Run run-a (completed)\n  Goal:       build a parser\n')
    expect(stdout).toContain('  Iterations: 1 of 5\n')
    expect(stdout).toContain('# | PV    | Best  | Control | QA  | Action | Reason\n')
    expect(stdout).toContain('1 | 0.400 | 0.400 | 0.400   | 8.0 | merge  | Quality 8.00 >= threshold 2.50\n')
  })

  it('prints runs as JSON', async () => {
    await seedRun()
    const out = captureOutput()
    await runHistory({ database: databasePath, json: true, version: '1.0.0' })
    out.restore()

    const parsed: unknown = JSON.parse(out.getStdout())
    expect(parsed).toMatchObject({ command: 'history', data: [{ id: 'run-a', status: 'completed' }] })
  })

  it('exits 1 for an unknown run', async () => {
    await seedRun()
    const out = captureOutput()
    const code = await runHistory({ database: databasePath, runId: 'nope' })
    out.restore()
    expect(code).toBe(HISTORY_EXIT_ERROR)
    expect(out.getStderr()).toBe('  Run not found: nope\n')
  })
})
