/**
 * Prompt builders for the three agent roles.
 *
 * Each prompt ends with the exact block shape the role's schema expects, so
 * the output parser can find it at the end of the answer.
 */

import type { PlannedTask } from '../../core/types.js'
import type { DeveloperOutput, Risk } from './schemas.js'
import type { ToleranceBand } from './types.js'

export const PATCH_SUMMARY_MAX_LINES = 50

// ---------------------------------------------------------------------------
// QA tolerance bands
// ---------------------------------------------------------------------------

/** Last iteration of the lenient band */
export const LENIENT_UNTIL = 5
/** Last iteration of the moderate band */
export const MODERATE_UNTIL = 15

const TOLERANCE_TEXT: Record<string, Record<ToleranceBand, string>> = {
  en: {
    lenient:
      'Early iteration: be lenient. Accept partial or incomplete functionality that moves toward the goal. ' +
      'A quality_score between 2.5 and 4 is acceptable for a reasonable first step.',
    moderate:
      'Middle iteration: expect working core functionality. Flag bugs and missing error handling. ' +
      'Aim for a quality_score between 4.5 and 7.',
    strict:
      'Late iteration: be strict. Expect complete, tested and well-structured code. ' +
      'Only scores between 6.5 and 9 indicate the code is ready.',
  },
  it: {
    lenient:
      'Iterazione iniziale: sii tollerante. Accetta funzionalità parziali o incomplete che avanzano verso l\'obiettivo. ' +
      'Un quality_score tra 2.5 e 4 è accettabile per un primo passo ragionevole.',
    moderate:
      'Iterazione intermedia: richiedi che le funzionalità principali funzionino. Segnala bug e gestione degli errori mancante. ' +
      'Punta a un quality_score tra 4.5 e 7.',
    strict:
      'Iterazione avanzata: sii rigoroso. Richiedi codice completo, testato e ben strutturato. ' +
      'Solo punteggi tra 6.5 e 9 indicano che il codice è pronto.',
  },
}

export function toleranceBand(iteration: number): ToleranceBand {
  if (iteration <= LENIENT_UNTIL) return 'lenient'
  if (iteration <= MODERATE_UNTIL) return 'moderate'
  return 'strict'
}

/** Tolerance instruction for `iteration`; unknown languages fall back to English */
export function toleranceInstruction(iteration: number, language = 'en'): string {
  const texts = TOLERANCE_TEXT[language] ?? TOLERANCE_TEXT['en']
  return texts?.[toleranceBand(iteration)] ?? ''
}

function languageLine(language: string): string {
  return language === 'en' ? '' : `\nWrite every free-text field in the language with code "${language}".\n`
}

// ---------------------------------------------------------------------------
// Formatting helpers
// ---------------------------------------------------------------------------

/** First PATCH_SUMMARY_MAX_LINES lines of a patch, with a note on what was cut */
export function summarizePatch(patch: string, maxLines = PATCH_SUMMARY_MAX_LINES): string {
  if (patch.trim() === '') return '(empty patch)'
  const lines = patch.split('\n')
  if (lines.length <= maxLines) return patch
  return `${lines.slice(0, maxLines).join('\n')}\n... (${String(lines.length - maxLines)} more lines)`
}

export function formatRisks(risks: readonly Risk[]): string {
  if (risks.length === 0) return 'None identified'
  return risks
    .map((r) => {
      const mitigation = r.mitigation !== '' ? ` (mitigation: ${r.mitigation})` : ''
      return `- [${r.severity.toUpperCase()}] ${r.description}${mitigation}`
    })
    .join('\n')
}

export function formatList(items: readonly string[], empty = 'None'): string {
  if (items.length === 0) return empty
  return items.map((item) => `- ${item}`).join('\n')
}

function formatCompletedTasks(tasks: readonly PlannedTask[]): string {
  return formatList(
    tasks.map((t) => `[${t.id}] ${t.title}`),
    'None yet'
  )
}

// ---------------------------------------------------------------------------
// Keeper
// ---------------------------------------------------------------------------

export interface KeeperPromptInput {
  goal: string
  iteration: number
  completedTasks: readonly PlannedTask[]
  codebaseSummary: string
  language: string
}

export function buildKeeperPrompt(input: KeeperPromptInput): string {
  return `You are the Keeper of a software project. You plan the next development tasks.

GOAL:
${input.goal}

ITERATION: ${String(input.iteration)}

COMPLETED TASKS:
${formatCompletedTasks(input.completedTasks)}

CODEBASE:
${input.codebaseSummary}
${languageLine(input.language)}
Plan the next 1 to 3 small, concrete tasks that move the codebase toward the goal.
Do not repeat completed tasks. Return an empty task list when the goal is fully met.

End your answer with a YAML block:

\`\`\`yaml
tasks:
  - id: "T1"
    title: "Short title"
    description: "What to build"
    priority: high            # low | medium | high | critical
    estimated_complexity: low # low | medium | high
    dependencies: []
    acceptance_criteria:
      - "Observable criterion"
reasoning: "Why these tasks come next"
\`\`\`
`
}

// ---------------------------------------------------------------------------
// Developer
// ---------------------------------------------------------------------------

export interface DeveloperPromptInput {
  task: PlannedTask
  codebaseFiles: string
  language: string
}

export function buildDeveloperPrompt(input: DeveloperPromptInput): string {
  const { task } = input
  return `You are the Developer of a software project. Implement exactly one task.

TASK [${task.id}]: ${task.title}
PRIORITY: ${task.priority}
COMPLEXITY: ${task.estimated_complexity}

DESCRIPTION:
${task.description}

ACCEPTANCE CRITERIA:
${formatList(task.acceptance_criteria)}

FILES IN THE CODEBASE:
${input.codebaseFiles}
${languageLine(input.language)}
Produce a unified diff relative to the codebase root that \`git apply\` accepts.
Create new files with \`--- /dev/null\` headers.

End your answer with a YAML block:

\`\`\`yaml
patch: |
  --- a/path/to/file
  +++ b/path/to/file
  @@ ... @@
files_modified: []
files_created: []
risks:
  - severity: low           # low | medium | high | critical
    description: "What could go wrong"
    mitigation: "How it is handled"
implementation_notes: "Key decisions"
testing_suggestions:
  - "What QA should check"
\`\`\`
`
}

// ---------------------------------------------------------------------------
// QA
// ---------------------------------------------------------------------------

export interface QaPromptInput {
  iteration: number
  patch: string
  developerOutput: DeveloperOutput
  codebaseSummary: string
  language: string
}

export function buildQaPrompt(input: QaPromptInput): string {
  const dev = input.developerOutput
  return `You are the QA engineer of a software project. Review a proposed change.

ITERATION: ${String(input.iteration)}
${toleranceInstruction(input.iteration, input.language)}

PATCH:
${summarizePatch(input.patch)}

FILES MODIFIED: ${dev.files_modified.join(', ') || 'none'}
FILES CREATED: ${dev.files_created.join(', ') || 'none'}

DEVELOPER NOTES:
${dev.implementation_notes || 'None'}

RISKS REPORTED BY THE DEVELOPER:
${formatRisks(dev.risks)}

TESTING SUGGESTIONS:
${formatList(dev.testing_suggestions)}

CODEBASE:
${input.codebaseSummary}
${languageLine(input.language)}
Design test cases, list the issues you find and score the change from 0 to 10.

End your answer with a YAML block:

\`\`\`yaml
verdict: pass               # pass | fail
test_cases:
  - name: "test_name"
    type: unit
    description: "What it checks"
    code: ""
issues:
  - severity: medium        # low | medium | high | critical
    type: bug
    description: "What is wrong"
    location: "file:line"
    suggestion: "How to fix it"
test_results:
  total: 0
  passed: 0
  failed: 0
  skipped: 0
quality_score: 5.0
feedback: "Summary for the developer"
\`\`\`
`
}
