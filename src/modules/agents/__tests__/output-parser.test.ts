/**
 * Tests for output-parser.ts and the agent output schemas.
 */

import { describe, it, expect } from 'vitest'
import { extractStructuredBlock, parseStructuredBlock } from '../output-parser.js'
import { DeveloperOutputSchema, KeeperOutputSchema, QaOutputSchema } from '../schemas.js'

// ---------------------------------------------------------------------------
// extractStructuredBlock
// ---------------------------------------------------------------------------

describe('extractStructuredBlock', () => {
  it('returns the last fenced block that mentions the anchor key', () => {
    const output = [
      'Plan:',
      '```yaml',
      'tasks: []',
      'reasoning: first',
      '```',
      'Revised:',
      '```yaml',
      'tasks: []',
      'reasoning: second',
      '```',
      '',
    ].join('\n')
    expect(extractStructuredBlock(output, 'tasks')).toBe('tasks: []\nreasoning: second')
  })

  it('ignores fenced blocks without the anchor key', () => {
    const output = '```yaml\nverdict: pass\nquality_score: 8\n```\n\n```yaml\nnotes: none\n```\n'
    expect(extractStructuredBlock(output, 'verdict')).toBe('verdict: pass\nquality_score: 8')
  })

  it('accepts json fences', () => {
    const output = 'Done.\n```json\n{"verdict": "pass", "quality_score": 7}\n```'
    expect(extractStructuredBlock(output, 'verdict')).toBe('{"verdict": "pass", "quality_score": 7}')
  })

  it('falls back to unfenced YAML from the last anchor line', () => {
    const output = 'Review done.\nverdict: fail\nquality_score: 3\n'
    expect(extractStructuredBlock(output, 'verdict')).toBe('verdict: fail\nquality_score: 3')
  })

  it('falls back to the outermost brace span', () => {
    const output = 'Result: {"tasks": [], "reasoning": "done"} end'
    expect(extractStructuredBlock(output, 'tasks')).toBe('{"tasks": [], "reasoning": "done"}')
  })

  it('returns null when nothing structured is present', () => {
    expect(extractStructuredBlock('no structure here', 'tasks')).toBeNull()
    expect(extractStructuredBlock('   ', 'tasks')).toBeNull()
  })
})

// ---------------------------------------------------------------------------
// parseStructuredBlock
// ---------------------------------------------------------------------------

describe('parseStructuredBlock', () => {
  it('reports YAML syntax errors', () => {
    const result = parseStructuredBlock('tasks: [unclosed', KeeperOutputSchema)
    expect(result.parsed).toBeNull()
    expect(result.error).toMatch(/^YAML parse error: /)
  })

  it('reports an empty document', () => {
    expect(parseStructuredBlock('~', KeeperOutputSchema).error).toBe('Block parsed to null or undefined')
  })

  it('reports schema issues with their paths', () => {
    const result = parseStructuredBlock('verdict: pass', QaOutputSchema)
    expect(result.error).toBe('Schema validation error: quality_score: Required')
  })

  it('fills Keeper task defaults and coerces numeric ids', () => {
    const result = parseStructuredBlock('tasks:\n  - id: 1\n    title: Add parser\n', KeeperOutputSchema)
    expect(result.parsed).toEqual({
      tasks: [
        {
          id: '1',
          title: 'Add parser',
          description: '',
          priority: 'medium',
          estimated_complexity: 'medium',
          dependencies: [],
          acceptance_criteria: [],
        },
      ],
      reasoning: '',
    })
  })

  it('fills Developer defaults around a literal patch', () => {
    const result = parseStructuredBlock('patch: |\n  --- a/x\n  +++ b/x\n', DeveloperOutputSchema)
    expect(result.parsed).toEqual({
      patch: '--- a/x\n+++ b/x\n',
      files_modified: [],
      files_created: [],
      risks: [],
      implementation_notes: '',
      testing_suggestions: [],
    })
  })
})

describe('QaOutputSchema', () => {
  it('normalises verdict case and whitespace', () => {
    expect(QaOutputSchema.parse({ verdict: ' PASS ', quality_score: 5 }).verdict).toBe('pass')
  })

  it('treats an unknown verdict as a failure', () => {
    expect(QaOutputSchema.parse({ verdict: 'maybe', quality_score: 5 }).verdict).toBe('fail')
  })

  it('clamps the quality score to 0..10', () => {
    expect(QaOutputSchema.parse({ verdict: 'pass', quality_score: 12 }).quality_score).toBe(10)
    expect(QaOutputSchema.parse({ verdict: 'fail', quality_score: -1 }).quality_score).toBe(0)
  })

  it('defaults test results and issue fields', () => {
    const qa = QaOutputSchema.parse({
      verdict: 'fail',
      quality_score: 3,
      issues: [{ description: 'Crashes on empty input' }],
    })
    expect(qa.test_results).toEqual({ total: 0, passed: 0, failed: 0, skipped: 0 })
    expect(qa.issues).toEqual([
      { severity: 'medium', type: 'bug', description: 'Crashes on empty input', location: 'Unknown' },
    ])
    expect(qa.feedback).toBe('')
  })
})
