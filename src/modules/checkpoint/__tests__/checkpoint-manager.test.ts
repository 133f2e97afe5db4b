/**
 * Unit tests for FileCheckpointManager
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, readFile, readdir, rm, writeFile, access } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { FileCheckpointManager, formatCheckpointId, holdsCheckpoints, shouldCopy } from '../checkpoint-manager-impl.js'
import { CheckpointError } from '../../../core/errors.js'

let testDir: string
let workspace: string
let checkpointDir: string
let manager: FileCheckpointManager

const FIXED_NOW = new Date(2024, 0, 2, 3, 4, 5)

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

beforeEach(async () => {
  testDir = join(tmpdir(), `pidloop-checkpoint-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  workspace = join(testDir, 'workspace')
  checkpointDir = join(testDir, 'checkpoints')
  await mkdir(join(workspace, 'src'), { recursive: true })
  await mkdir(join(workspace, 'node_modules', 'dep'), { recursive: true })
  await mkdir(join(workspace, '.git'), { recursive: true })
  await writeFile(join(workspace, 'src', 'main.ts'), 'export const answer = 42\n')
  await writeFile(join(workspace, 'node_modules', 'dep', 'index.js'), '')
  await writeFile(join(workspace, '.git', 'HEAD'), 'ref: refs/heads/main\n')
  await writeFile(join(workspace, 'cache.pyc'), '')
  manager = new FileCheckpointManager({ checkpointDir, now: () => FIXED_NOW })
  await manager.initialize()
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
})

describe('formatCheckpointId()', () => {
  it('pads the iteration and fixes the PV to three decimals', () => {
    expect(formatCheckpointId(7, 0.5, FIXED_NOW)).toBe('checkpoint_iter007_20240102_030405_pv0.500')
    expect(formatCheckpointId(123, 0.12345, FIXED_NOW)).toBe('checkpoint_iter123_20240102_030405_pv0.123')
  })
})

describe('shouldCopy()', () => {
  it('skips ignored names and suffixes', () => {
    expect(shouldCopy('/w/node_modules')).toBe(false)
    expect(shouldCopy('/w/.git')).toBe(false)
    expect(shouldCopy('/w/.pidloop')).toBe(false)
    expect(shouldCopy('/w/pkg/__pycache__')).toBe(false)
    expect(shouldCopy('/w/mod.pyc')).toBe(false)
    expect(shouldCopy('/w/src/main.ts')).toBe(true)
  })
})

describe('holdsCheckpoints()', () => {
  it('matches the store and its ancestors below the root only', () => {
    expect(holdsCheckpoints('/w/state/checkpoints', '/w', '/w/state/checkpoints')).toBe(true)
    expect(holdsCheckpoints('/w/state', '/w', '/w/state/checkpoints')).toBe(true)
    expect(holdsCheckpoints('/w', '/w', '/w/state/checkpoints')).toBe(false)
    expect(holdsCheckpoints('/w/stat', '/w', '/w/state/checkpoints')).toBe(false)
    expect(holdsCheckpoints('/w/src', '/w', '/w/state/checkpoints')).toBe(false)
  })
})

describe('FileCheckpointManager', () => {
  it('snapshots the codebase without ignored entries and writes metadata', async () => {
    const id = await manager.create({ codebasePath: workspace, pv: 0.42, iteration: 1, isBest: true })
    expect(id).toBe('checkpoint_iter001_20240102_030405_pv0.420')

    const snapshot = join(checkpointDir, id, 'codebase')
    expect(await readFile(join(snapshot, 'src', 'main.ts'), 'utf-8')).toBe('export const answer = 42\n')
    expect((await readdir(snapshot)).sort()).toEqual(['src'])

    const metadata: unknown = JSON.parse(await readFile(join(checkpointDir, id, 'metadata.json'), 'utf-8'))
    expect(metadata).toEqual({
      checkpointId: id,
      iteration: 1,
      pv: 0.42,
      timestamp: '20240102_030405',
      isBest: true,
      codebasePath: workspace,
    })
  })

  it('creates a metadata-only checkpoint when the codebase does not exist', async () => {
    const id = await manager.create({ codebasePath: join(testDir, 'missing'), pv: 0, iteration: 0, isBest: false })
    expect(await exists(join(checkpointDir, id, 'metadata.json'))).toBe(true)
    expect(await exists(join(checkpointDir, id, 'codebase'))).toBe(false)
  })

  it('tracks the best checkpoint and the history', async () => {
    await manager.create({ codebasePath: workspace, pv: 0.3, iteration: 1, isBest: true })
    const second = await manager.create({ codebasePath: workspace, pv: 0.6, iteration: 2, isBest: true })
    await manager.create({ codebasePath: workspace, pv: 0.4, iteration: 3, isBest: false })

    expect(manager.getBest()?.checkpointId).toBe(second)
    expect(manager.getHistory().map((c) => c.iteration)).toEqual([1, 2, 3])
  })

  it('returns null from getBest() before any best checkpoint', async () => {
    await manager.create({ codebasePath: workspace, pv: 0.3, iteration: 1, isBest: false })
    expect(manager.getBest()).toBeNull()
  })

  it('restores the snapshot over later changes', async () => {
    const id = await manager.create({ codebasePath: workspace, pv: 0.5, iteration: 1, isBest: true })
    await writeFile(join(workspace, 'src', 'main.ts'), 'broken')
    await writeFile(join(workspace, 'src', 'extra.ts'), 'new file')

    expect(await manager.rollback(id, workspace)).toBe(true)
    expect(await readFile(join(workspace, 'src', 'main.ts'), 'utf-8')).toBe('export const answer = 42\n')
    expect(await exists(join(workspace, 'src', 'extra.ts'))).toBe(false)
  })

  it('leaves ignored entries in the target alone', async () => {
    const id = await manager.create({ codebasePath: workspace, pv: 0.5, iteration: 1, isBest: true })
    expect(await manager.rollback(id, workspace)).toBe(true)
    expect(await readFile(join(workspace, '.git', 'HEAD'), 'utf-8')).toBe('ref: refs/heads/main\n')
    expect(await exists(join(workspace, 'node_modules', 'dep', 'index.js'))).toBe(true)
    expect(await exists(join(workspace, 'cache.pyc'))).toBe(true)
  })

  it('keeps a checkpoint store inside the workspace out of snapshots and rollbacks', async () => {
    const innerDir = join(workspace, 'state', 'checkpoints')
    const inner = new FileCheckpointManager({ checkpointDir: innerDir, now: () => FIXED_NOW })
    await inner.initialize()

    const id = await inner.create({ codebasePath: workspace, pv: 0.5, iteration: 1, isBest: true })
    expect((await readdir(join(innerDir, id, 'codebase'))).sort()).toEqual(['src'])

    await writeFile(join(workspace, 'src', 'main.ts'), 'broken')
    expect(await inner.rollback(id, workspace)).toBe(true)
    expect(await readFile(join(workspace, 'src', 'main.ts'), 'utf-8')).toBe('export const answer = 42\n')
    expect(await exists(join(innerDir, id, 'metadata.json'))).toBe(true)
  })

  it('never snapshots or clears the .pidloop directory', async () => {
    await mkdir(join(workspace, '.pidloop'), { recursive: true })
    await writeFile(join(workspace, '.pidloop', 'pidloop.db'), 'history')
    const inner = new FileCheckpointManager({
      checkpointDir: join(workspace, '.pidloop', 'checkpoints'),
      now: () => FIXED_NOW,
    })
    await inner.initialize()

    const id = await inner.create({ codebasePath: workspace, pv: 0.5, iteration: 1, isBest: true })
    expect(await inner.rollback(id, workspace)).toBe(true)
    expect(await readFile(join(workspace, '.pidloop', 'pidloop.db'), 'utf-8')).toBe('history')
  })

  it('returns false when rolling back to an unknown checkpoint', async () => {
    expect(await manager.rollback('checkpoint_iter999_20240102_030405_pv0.000', workspace)).toBe(false)
    expect(await exists(join(workspace, 'src', 'main.ts'))).toBe(true)
  })

  it('returns false when the metadata is unreadable', async () => {
    const id = await manager.create({ codebasePath: workspace, pv: 0.5, iteration: 1, isBest: true })
    await writeFile(join(checkpointDir, id, 'metadata.json'), '{not json')
    expect(await manager.rollback(id, workspace)).toBe(false)
  })

  it('wraps write failures in a CheckpointError', async () => {
    const blocked = new FileCheckpointManager({ checkpointDir: join(workspace, 'src', 'main.ts'), now: () => FIXED_NOW })
    await expect(blocked.create({ codebasePath: workspace, pv: 0.5, iteration: 1, isBest: false })).rejects.toBeInstanceOf(
      CheckpointError
    )
  })

  describe('cleanup()', () => {
    it('keeps the best checkpoint and the last N', async () => {
      const ids: string[] = []
      for (let iteration = 1; iteration <= 5; iteration++) {
        ids.push(
          await manager.create({ codebasePath: workspace, pv: iteration / 10, iteration, isBest: iteration === 1 })
        )
      }

      expect(await manager.cleanup(2)).toBe(2)
      expect(manager.getHistory().map((c) => c.iteration)).toEqual([1, 4, 5])
      expect((await readdir(checkpointDir)).sort()).toEqual([ids[0], ids[3], ids[4]].sort())
    })

    it('does nothing when the history fits', async () => {
      await manager.create({ codebasePath: workspace, pv: 0.1, iteration: 1, isBest: false })
      expect(await manager.cleanup(10)).toBe(0)
      expect(manager.getHistory()).toHaveLength(1)
    })
  })
})
