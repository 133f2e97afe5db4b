/**
 * PatchApplier: applies an opaque patch to the workspace.
 */

export interface PatchApplier {
  /**
   * Apply `patch` inside `codebasePath`.
   *
   * @returns true when the patch applied (an empty patch always does), false when it was rejected
   * @throws PatchError when the patch tool itself cannot run
   */
  apply(patch: string, codebasePath: string): Promise<boolean>
}
