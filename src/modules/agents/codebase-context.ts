/**
 * Short textual descriptions of the workspace for agent prompts.
 */

import { readFile, stat } from 'fs/promises'
import { extname } from 'path'
import { walkFiles } from '../../utils/file-walker.js'

export const MAX_LISTED_FILES = 20

function countLines(content: string): number {
  if (content === '') return 0
  const breaks = content.split('\n').length - 1
  return content.endsWith('\n') ? breaks : breaks + 1
}

/**
 * One-line overview: `Total files: 3 | Total lines: 42 | Files by type: .ts: 2, .md: 1`.
 * Types are ordered by count, then extension.
 */
export async function summarizeCodebase(root: string): Promise<string> {
  let files = 0
  let lines = 0
  const byType = new Map<string, number>()

  for await (const file of walkFiles(root)) {
    files++
    const content = await readFile(file.path, 'utf-8')
    lines += countLines(content)
    const ext = extname(file.name) || '(none)'
    byType.set(ext, (byType.get(ext) ?? 0) + 1)
  }

  if (files === 0) return 'Empty codebase'

  const types = [...byType.entries()]
    .sort(([a, countA], [b, countB]) => countB - countA || (a < b ? -1 : 1))
    .map(([ext, count]) => `${ext}: ${String(count)}`)
    .join(', ')
  return `Total files: ${String(files)} | Total lines: ${String(lines)} | Files by type: ${types}`
}

/**
 * Bullet list of up to `maxFiles` files with their sizes.
 */
export async function listCodebaseFiles(root: string, maxFiles = MAX_LISTED_FILES): Promise<string> {
  const listed: string[] = []
  let total = 0

  for await (const file of walkFiles(root)) {
    total++
    if (listed.length < maxFiles) {
      const { size } = await stat(file.path)
      listed.push(`- ${file.relPath.split('\\').join('/')} (${String(size)} bytes)`)
    }
  }

  if (total === 0) return '(no files yet)'
  if (total > maxFiles) listed.push(`... and ${String(total - maxFiles)} more files`)
  return listed.join('\n')
}
