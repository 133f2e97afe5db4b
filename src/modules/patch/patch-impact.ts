/**
 * Line counts of a unified diff, used for logging and iteration summaries.
 */

export interface PatchImpact {
  additions: number
  deletions: number
  filesChanged: number
}

export function estimatePatchImpact(patch: string): PatchImpact {
  let additions = 0
  let deletions = 0
  let filesChanged = 0

  for (const line of patch.split('\n')) {
    if (line.startsWith('+++ ')) filesChanged++
    else if (line.startsWith('+')) additions++
    else if (line.startsWith('-') && !line.startsWith('--- ')) deletions++
  }

  return { additions, deletions, filesChanged }
}
