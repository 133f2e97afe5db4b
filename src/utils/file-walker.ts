/**
 * Depth-first walk over a workspace tree, used wherever the loop needs to
 * read or describe the codebase the agents are building.
 */

import type { Dirent } from 'fs'
import { readdir } from 'fs/promises'
import { join, relative } from 'path'

/** Dependency and cache directories never worth reading */
export const SKIPPED_DIRS: ReadonlySet<string> = new Set(['node_modules', 'venv', '__pycache__'])

export interface WalkedFile {
  /** Absolute (or root-relative, if root was relative) path */
  path: string
  /** Path relative to the walk root, with platform separators */
  relPath: string
  name: string
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR')
}

/**
 * Yield regular files under `root` in name order, skipping hidden entries and
 * SKIPPED_DIRS. A missing root yields nothing; other read errors propagate.
 */
export async function* walkFiles(root: string): AsyncGenerator<WalkedFile> {
  let entries: Dirent[]
  try {
    entries = await readdir(root, { withFileTypes: true })
  } catch (err) {
    if (isMissing(err)) return
    throw err
  }
  yield* walkEntries(root, root, entries)
}

async function* walkEntries(root: string, dir: string, entries: Dirent[]): AsyncGenerator<WalkedFile> {
  const sorted = [...entries].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  for (const entry of sorted) {
    if (entry.name.startsWith('.')) continue
    const fullPath = join(dir, entry.name)
    if (entry.isDirectory()) {
      if (SKIPPED_DIRS.has(entry.name)) continue
      yield* walkEntries(root, fullPath, await readdir(fullPath, { withFileTypes: true }))
    } else if (entry.isFile()) {
      yield { path: fullPath, relPath: relative(root, fullPath), name: entry.name }
    }
  }
}
