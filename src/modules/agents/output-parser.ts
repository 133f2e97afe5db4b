/**
 * Structured block extraction for agent output.
 *
 * Agents answer in free text and end with a YAML or JSON block. The block is
 * located as follows:
 * 1. The LAST fenced block (```yaml, ```yml, ```json or a bare fence) that
 *    mentions the role's anchor key
 * 2. Otherwise, unfenced YAML from the last line starting with the anchor key
 * 3. Otherwise, the outermost `{ ... }` span if it mentions the anchor key
 *
 * The block is parsed with js-yaml (JSON is accepted as YAML) and validated
 * with the role's zod schema.
 */

import yaml from 'js-yaml'
import type { ZodType, ZodTypeDef } from 'zod'

// ---------------------------------------------------------------------------
// extractStructuredBlock
// ---------------------------------------------------------------------------

/**
 * Extract the structured result block from agent output.
 *
 * @param anchorKey - Top-level key the role's block must contain (e.g. `verdict`)
 * @returns The raw block text, or null if none is found
 */
export function extractStructuredBlock(output: string, anchorKey: string): string | null {
  if (output.trim() === '') return null

  return (
    extractLastFencedBlock(output, anchorKey) ??
    extractUnfencedYaml(output, anchorKey) ??
    extractBraceSpan(output, anchorKey)
  )
}

function mentionsKey(content: string, key: string): boolean {
  return content.includes(`${key}:`) || content.includes(`"${key}"`)
}

function extractLastFencedBlock(output: string, key: string): string | null {
  const fencePattern = /```(?:ya?ml|json)?[^\S\n]*\n([\s\S]*?)```/g

  let lastMatch: string | null = null
  let match: RegExpExecArray | null

  while ((match = fencePattern.exec(output)) !== null) {
    const content = match[1]
    if (content !== undefined && content.trim() !== '' && mentionsKey(content, key)) {
      lastMatch = content.trim()
    }
  }

  return lastMatch
}

function extractUnfencedYaml(output: string, key: string): string | null {
  const lines = output.split('\n')

  let anchorIdx = -1
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i]?.startsWith(`${key}:`) === true) {
      anchorIdx = i
      break
    }
  }
  if (anchorIdx === -1) return null

  const text = lines.slice(anchorIdx).join('\n').trim()
  return text !== '' ? text : null
}

function extractBraceSpan(output: string, key: string): string | null {
  const start = output.indexOf('{')
  const end = output.lastIndexOf('}')
  if (start === -1 || end <= start) return null

  const span = output.slice(start, end + 1)
  return mentionsKey(span, key) ? span : null
}

// ---------------------------------------------------------------------------
// parseStructuredBlock
// ---------------------------------------------------------------------------

export type ParseResult<T> = { parsed: T; error: null } | { parsed: null; error: string }

/**
 * Parse a YAML/JSON block and validate it against a zod schema.
 */
export function parseStructuredBlock<T>(
  text: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): ParseResult<T> {
  let raw: unknown

  try {
    raw = yaml.load(text)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    return { parsed: null, error: `YAML parse error: ${message}` }
  }

  if (raw === null || raw === undefined) {
    return { parsed: null, error: 'Block parsed to null or undefined' }
  }

  const result = schema.safeParse(raw)
  if (result.success) {
    return { parsed: result.data, error: null }
  }

  const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
  return { parsed: null, error: `Schema validation error: ${issues.join('; ')}` }
}
