/**
 * Types for the agents module.
 */

import type { AgentRole } from '../../core/types.js'
import type { AgentSettings } from '../config/config-schema.js'

// ---------------------------------------------------------------------------
// Runner contract
// ---------------------------------------------------------------------------

/** Rough token counts derived from character lengths */
export interface TokenEstimate {
  input: number
  output: number
}

export interface AgentRunRequest {
  role: AgentRole
  /** Full prompt, delivered on the agent's stdin */
  prompt: string
  /** Command, sampling parameters and pricing for this call */
  params: AgentSettings
  /** Working directory for the agent process */
  cwd?: string
}

export interface AgentRunResult {
  /** Raw stdout of the agent */
  output: string
  tokenEstimate: TokenEstimate
  /** Estimated USD cost of the call */
  costUsd: number
  durationMs: number
}

// ---------------------------------------------------------------------------
// Role call results
// ---------------------------------------------------------------------------

/** Validated, role-specific output together with what it cost */
export interface AgentCallResult<T> {
  output: T
  costUsd: number
}

/** Tolerance band the QA prompt asks for, by iteration */
export type ToleranceBand = 'lenient' | 'moderate' | 'strict'
