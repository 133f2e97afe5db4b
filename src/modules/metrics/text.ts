/**
 * Codebase text extraction and tokenisation used by the text metrics.
 */

import { readFile } from 'fs/promises'
import { extname } from 'path'
import { MeasurementError } from '../../core/errors.js'
import { walkFiles } from '../../utils/file-walker.js'

export const DEFAULT_MAX_CODEBASE_CHARS = 10_000

export const SOURCE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.py',
  '.js',
  '.jsx',
  '.ts',
  '.tsx',
  '.java',
  '.c',
  '.cpp',
  '.go',
  '.rs',
])

const STOPWORDS: ReadonlySet<string> = new Set([
  'this', 'that', 'with', 'from', 'have', 'will', 'should', 'would',
  'could', 'their', 'there', 'where', 'when', 'what', 'which',
])

export const MAX_KEYWORDS = 20

/**
 * Concatenate source files under `root` (depth-first, names sorted) until
 * `maxChars` characters have been read. Hidden entries and dependency
 * directories are skipped. A missing root yields ''.
 */
export async function extractCodebaseText(
  root: string,
  maxChars: number = DEFAULT_MAX_CODEBASE_CHARS
): Promise<string> {
  const parts: string[] = []
  let remaining = maxChars

  try {
    for await (const file of walkFiles(root)) {
      if (remaining <= 0) break
      if (!SOURCE_EXTENSIONS.has(extname(file.name))) continue
      const content = (await readFile(file.path, 'utf-8')).slice(0, remaining)
      parts.push(content)
      remaining -= content.length
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new MeasurementError(`Cannot read codebase at ${root}: ${message}`, { root })
  }

  return parts.join('\n')
}

/** Lower-cased word tokens of three or more characters */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/\w{3,}/g) ?? []
}

/**
 * Unique words of five or more characters, stopwords removed, in order of
 * first appearance, capped at MAX_KEYWORDS.
 */
export function extractKeywords(text: string): string[] {
  const seen = new Set<string>()
  for (const word of text.toLowerCase().match(/\b\w{5,}\b/g) ?? []) {
    if (STOPWORDS.has(word)) continue
    seen.add(word)
    if (seen.size === MAX_KEYWORDS) break
  }
  return [...seen]
}
