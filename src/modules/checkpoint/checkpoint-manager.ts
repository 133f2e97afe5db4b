/**
 * CheckpointManager interface: filesystem snapshots of the workspace,
 * one per merged iteration, with the best one tracked for final rollback.
 */

import type { BaseService } from '../../core/di.js'
import type { CheckpointId } from '../../core/types.js'
import type { CheckpointMetadata, CreateCheckpointParams } from './types.js'

export interface CheckpointManager extends BaseService {
  /** Create the checkpoint directory if needed */
  initialize(): Promise<void>

  /**
   * Copy the codebase into a new checkpoint and write its metadata.
   * @throws {CheckpointError} when the snapshot cannot be written
   */
  create(params: CreateCheckpointParams): Promise<CheckpointId>

  /**
   * Replace `targetPath` with the checkpoint's codebase, keeping entries the
   * snapshot ignores (.git, node_modules, ...).
   * Resolves false when the checkpoint does not exist or cannot be restored.
   */
  rollback(checkpointId: CheckpointId, targetPath: string): Promise<boolean>

  /** Most recent checkpoint created with isBest, or null */
  getBest(): CheckpointMetadata | null

  /** Checkpoints created by this manager, oldest first */
  getHistory(): CheckpointMetadata[]

  /**
   * Delete all checkpoints except the best one and the `keepLastN` most
   * recent by iteration. Returns the number removed.
   */
  cleanup(keepLastN?: number): Promise<number>
}
