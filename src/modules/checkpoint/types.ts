/**
 * Checkpoint Module: Types
 */

import { z } from 'zod'

export const CheckpointMetadataSchema = z.object({
  checkpointId: z.string(),
  iteration: z.number().int(),
  pv: z.number(),
  /** Local time, YYYYMMDD_HHMMSS */
  timestamp: z.string(),
  isBest: z.boolean(),
  codebasePath: z.string(),
})

export type CheckpointMetadata = z.infer<typeof CheckpointMetadataSchema>

export interface CreateCheckpointParams {
  codebasePath: string
  pv: number
  iteration: number
  isBest: boolean
}

export interface CheckpointManagerOptions {
  /** Directory holding one sub-directory per checkpoint */
  checkpointDir: string
  /** Default for cleanup() */
  keepLastN?: number
  /** Clock used for checkpoint ids */
  now?: () => Date
}

/** Directory and file names skipped when snapshotting a codebase */
export const IGNORED_NAMES: ReadonlySet<string> = new Set([
  '.git',
  'node_modules',
  'venv',
  '.venv',
  '__pycache__',
  // project config, history database and the default checkpoint store
  '.pidloop',
])

/** File suffixes skipped when snapshotting a codebase */
export const IGNORED_SUFFIXES: readonly string[] = ['.pyc']

export const METADATA_FILE = 'metadata.json'
export const CODEBASE_DIR = 'codebase'
