/**
 * AgentRunner: executes one prompt against one agent role.
 */

import type { AgentRunRequest, AgentRunResult } from './types.js'

export interface AgentRunner {
  /**
   * Run the agent and collect its raw output.
   *
   * @throws AgentError when the agent cannot start, times out or exits non-zero
   */
  run(request: AgentRunRequest): Promise<AgentRunResult>
}
