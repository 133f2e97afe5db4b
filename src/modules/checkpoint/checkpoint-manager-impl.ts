/**
 * FileCheckpointManager: stores each checkpoint as
 *
 *   <checkpointDir>/<id>/metadata.json
 *   <checkpointDir>/<id>/codebase/...
 *
 * where <id> is `checkpoint_iter{NNN}_{YYYYMMDD_HHMMSS}_pv{0.000}`.
 */

import { access, cp, mkdir, readFile, readdir, rm, writeFile } from 'fs/promises'
import { basename, join, resolve, sep } from 'path'
import type { CheckpointId } from '../../core/types.js'
import { CheckpointError } from '../../core/errors.js'
import { compactTimestamp } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { CheckpointManager } from './checkpoint-manager.js'
import {
  CODEBASE_DIR,
  CheckpointMetadataSchema,
  IGNORED_NAMES,
  IGNORED_SUFFIXES,
  METADATA_FILE,
  type CheckpointManagerOptions,
  type CheckpointMetadata,
  type CreateCheckpointParams,
} from './types.js'

const logger = createLogger('checkpoint')

export const DEFAULT_KEEP_LAST_N = 10

/** Build a checkpoint id; iteration is zero-padded to three digits */
export function formatCheckpointId(iteration: number, pv: number, date: Date): CheckpointId {
  return `checkpoint_iter${String(iteration).padStart(3, '0')}_${compactTimestamp(date)}_pv${pv.toFixed(3)}`
}

/** Copy filter shared by create(): skips VCS, dependency and bytecode artefacts */
export function shouldCopy(source: string): boolean {
  const name = basename(source)
  if (IGNORED_NAMES.has(name)) return false
  return !IGNORED_SUFFIXES.some((suffix) => name.endsWith(suffix))
}

/** True for a proper descendant of `root` that is, or contains, `checkpointDir` */
export function holdsCheckpoints(source: string, root: string, checkpointDir: string): boolean {
  const entry = resolve(source)
  if (entry === resolve(root)) return false
  return checkpointDir === entry || checkpointDir.startsWith(entry + sep)
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

// ---------------------------------------------------------------------------
// FileCheckpointManager
// ---------------------------------------------------------------------------

export class FileCheckpointManager implements CheckpointManager {
  private readonly _dir: string
  private readonly _keepLastN: number
  private readonly _now: () => Date
  private readonly _history: CheckpointMetadata[] = []
  private _bestId: CheckpointId | null = null

  constructor(options: CheckpointManagerOptions) {
    this._dir = resolve(options.checkpointDir)
    this._keepLastN = options.keepLastN ?? DEFAULT_KEEP_LAST_N
    this._now = options.now ?? (() => new Date())
  }

  get checkpointDir(): string {
    return this._dir
  }

  async initialize(): Promise<void> {
    await mkdir(this._dir, { recursive: true })
    logger.info({ checkpointDir: this._dir }, 'Checkpoint system initialized')
  }

  /** Snapshots stay on disk for inspection after the run */
  shutdown(): Promise<void> {
    logger.debug({ checkpointDir: this._dir, checkpoints: this._history.length }, 'Checkpoint system shut down')
    return Promise.resolve()
  }

  async create(params: CreateCheckpointParams): Promise<CheckpointId> {
    const now = this._now()
    const checkpointId = formatCheckpointId(params.iteration, params.pv, now)
    const checkpointPath = join(this._dir, checkpointId)

    const metadata: CheckpointMetadata = {
      checkpointId,
      iteration: params.iteration,
      pv: params.pv,
      timestamp: compactTimestamp(now),
      isBest: params.isBest,
      codebasePath: params.codebasePath,
    }

    try {
      await mkdir(checkpointPath, { recursive: true })
      if (await pathExists(params.codebasePath)) {
        await cp(params.codebasePath, join(checkpointPath, CODEBASE_DIR), {
          recursive: true,
          filter: this._copyFilter(params.codebasePath),
        })
      }
      await writeFile(join(checkpointPath, METADATA_FILE), JSON.stringify(metadata, null, 2), 'utf-8')
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new CheckpointError(`Failed to create checkpoint ${checkpointId}: ${message}`, {
        checkpointId,
        codebasePath: params.codebasePath,
      })
    }

    if (params.isBest) {
      this._bestId = checkpointId
      logger.info({ checkpointId, pv: params.pv }, 'New best checkpoint')
    }
    this._history.push(metadata)
    logger.info({ checkpointId }, 'Checkpoint created')
    return checkpointId
  }

  async rollback(checkpointId: CheckpointId, targetPath: string): Promise<boolean> {
    const checkpointPath = join(this._dir, checkpointId)
    if (!(await pathExists(checkpointPath))) {
      logger.error({ checkpointId }, 'Checkpoint not found')
      return false
    }

    try {
      const raw: unknown = JSON.parse(await readFile(join(checkpointPath, METADATA_FILE), 'utf-8'))
      const metadata = CheckpointMetadataSchema.parse(raw)
      logger.info({ checkpointId, iteration: metadata.iteration, pv: metadata.pv }, 'Rolling back to checkpoint')

      await this._clearTarget(targetPath)
      const snapshot = join(checkpointPath, CODEBASE_DIR)
      if (await pathExists(snapshot)) {
        await cp(snapshot, targetPath, { recursive: true, force: true })
      } else {
        await mkdir(targetPath, { recursive: true })
      }
    } catch (err) {
      logger.error({ checkpointId, err }, 'Rollback failed')
      return false
    }

    logger.info({ checkpointId, targetPath }, 'Rollback successful')
    return true
  }

  /** shouldCopy, also skipping the checkpoint store when it lives inside the codebase */
  private _copyFilter(root: string): (source: string) => boolean {
    return (source) => shouldCopy(source) && !holdsCheckpoints(source, root, this._dir)
  }

  /**
   * Remove everything create() would have copied. Ignored entries such as
   * .git, node_modules and the checkpoint store stay in place.
   */
  private async _clearTarget(targetPath: string): Promise<void> {
    if (!(await pathExists(targetPath))) return
    const keep = this._copyFilter(targetPath)
    for (const name of await readdir(targetPath)) {
      const entry = join(targetPath, name)
      if (keep(entry)) await rm(entry, { recursive: true, force: true })
    }
  }

  getBest(): CheckpointMetadata | null {
    if (this._bestId === null) return null
    const bestId = this._bestId
    return this._history.find((c) => c.checkpointId === bestId) ?? null
  }

  getHistory(): CheckpointMetadata[] {
    return this._history.map((c) => ({ ...c }))
  }

  async cleanup(keepLastN: number = this._keepLastN): Promise<number> {
    if (this._history.length <= keepLastN) return 0

    const byIteration = [...this._history].sort((a, b) => a.iteration - b.iteration)
    const keep = new Set<CheckpointId>(byIteration.slice(-keepLastN).map((c) => c.checkpointId))
    if (this._bestId !== null) keep.add(this._bestId)

    let removed = 0
    for (const checkpoint of byIteration) {
      if (keep.has(checkpoint.checkpointId)) continue
      try {
        await rm(join(this._dir, checkpoint.checkpointId), { recursive: true, force: true })
      } catch (err) {
        logger.warn({ checkpointId: checkpoint.checkpointId, err }, 'Failed to remove checkpoint')
        continue
      }
      const index = this._history.findIndex((c) => c.checkpointId === checkpoint.checkpointId)
      if (index >= 0) this._history.splice(index, 1)
      removed++
    }

    if (removed > 0) logger.info({ removed }, 'Cleaned up old checkpoints')
    return removed
  }
}

export function createCheckpointManager(options: CheckpointManagerOptions): CheckpointManager {
  return new FileCheckpointManager(options)
}
