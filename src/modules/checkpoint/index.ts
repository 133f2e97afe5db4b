/**
 * Checkpoint Module
 */

export type { CheckpointManager } from './checkpoint-manager.js'
export type { CheckpointMetadata, CheckpointManagerOptions, CreateCheckpointParams } from './types.js'
export { CheckpointMetadataSchema, IGNORED_NAMES, IGNORED_SUFFIXES, METADATA_FILE, CODEBASE_DIR } from './types.js'
export {
  FileCheckpointManager,
  DEFAULT_KEEP_LAST_N,
  createCheckpointManager,
  formatCheckpointId,
  shouldCopy,
} from './checkpoint-manager-impl.js'
