/**
 * GitPatchApplier: applies unified diffs with `git apply`.
 *
 * The patch is piped to `git apply --whitespace=nowarn -` run inside the
 * workspace. GIT_CEILING_DIRECTORIES stops git from discovering a repository
 * above the workspace, so paths in the diff always resolve against the
 * workspace root.
 */

import { mkdir } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import { PatchError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { spawnGit } from './git-utils.js'
import type { PatchApplier } from './patch-applier.js'
import { estimatePatchImpact } from './patch-impact.js'

const logger = createLogger('patch')

export const GIT_APPLY_ARGS = ['apply', '--whitespace=nowarn', '-'] as const

export class GitPatchApplier implements PatchApplier {
  async apply(patch: string, codebasePath: string): Promise<boolean> {
    if (patch.trim() === '') {
      logger.debug({ codebasePath }, 'Empty patch, nothing to apply')
      return true
    }

    const cwd = resolve(codebasePath)
    await mkdir(cwd, { recursive: true })

    // git apply rejects input without a trailing newline as corrupt
    const input = patch.endsWith('\n') ? patch : `${patch}\n`
    const result = await spawnGit([...GIT_APPLY_ARGS], {
      cwd,
      input,
      env: { ...process.env, GIT_CEILING_DIRECTORIES: dirname(cwd) },
    })

    if (result.spawnError !== undefined) {
      throw new PatchError(`Cannot run git apply: ${result.spawnError}`, { codebasePath: cwd })
    }

    if (result.code !== 0) {
      logger.warn({ codebasePath: cwd, stderr: result.stderr }, 'Patch rejected by git apply')
      return false
    }

    logger.info({ codebasePath: cwd, ...estimatePatchImpact(patch) }, 'Patch applied')
    return true
  }
}

export function createGitPatchApplier(): PatchApplier {
  return new GitPatchApplier()
}
