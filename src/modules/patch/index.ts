/**
 * Barrel exports for the patch module.
 */

export type { PatchApplier } from './patch-applier.js'
export { GitPatchApplier, createGitPatchApplier, GIT_APPLY_ARGS } from './git-patch-applier.js'
export { estimatePatchImpact } from './patch-impact.js'
export type { PatchImpact } from './patch-impact.js'
export { spawnGit } from './git-utils.js'
export type { GitSpawnResult, SpawnOptions } from './git-utils.js'
