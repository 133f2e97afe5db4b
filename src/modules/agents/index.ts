/**
 * Barrel exports for the agents module.
 */

export { AgentRoles, createAgentRoles } from './agent-roles.js'
export type { AgentTeam, KeeperCall, DeveloperCall, QaCall } from './agent-roles.js'
export type { AgentRunner } from './agent-runner.js'
export {
  ProcessAgentRunner,
  createProcessAgentRunner,
  estimateTokens,
  estimateCost,
  buildAgentArgs,
} from './process-agent-runner.js'
export type { ProcessAgentRunnerOptions } from './process-agent-runner.js'
export { extractStructuredBlock, parseStructuredBlock } from './output-parser.js'
export type { ParseResult } from './output-parser.js'
export {
  buildKeeperPrompt,
  buildDeveloperPrompt,
  buildQaPrompt,
  toleranceBand,
  toleranceInstruction,
  summarizePatch,
  formatRisks,
  formatList,
} from './prompts.js'
export { summarizeCodebase, listCodebaseFiles } from './codebase-context.js'
export {
  KeeperOutputSchema,
  DeveloperOutputSchema,
  QaOutputSchema,
  PlannedTaskSchema,
} from './schemas.js'
export type { KeeperOutput, DeveloperOutput, QaOutput, QaIssue, Risk } from './schemas.js'
export type {
  AgentRunRequest,
  AgentRunResult,
  AgentCallResult,
  TokenEstimate,
  ToleranceBand,
} from './types.js'
