/**
 * Error definitions for pidloop
 * Provides structured error hierarchy for all control-loop operations
 */

/** Base error class for all pidloop errors */
export class PidLoopError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'PidLoopError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PidLoopError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends PidLoopError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when an agent process fails or times out */
export class AgentError extends PidLoopError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'AGENT_ERROR', context)
    this.name = 'AgentError'
  }
}

/** Error thrown when an agent's output cannot be extracted or validated */
export class AgentOutputError extends AgentError {
  constructor(role: string, detail: string, context: Record<string, unknown> = {}) {
    super(`Malformed ${role} output: ${detail}`, { role, ...context })
    this.name = 'AgentOutputError'
  }
}

/** Error thrown when a checkpoint cannot be written or read */
export class CheckpointError extends PidLoopError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CHECKPOINT_ERROR', context)
    this.name = 'CheckpointError'
  }
}

/** Error thrown when a patch cannot be applied to the codebase */
export class PatchError extends PidLoopError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'PATCH_ERROR', context)
    this.name = 'PatchError'
  }
}

/** Error thrown when the process variable cannot be measured */
export class MeasurementError extends PidLoopError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'MEASUREMENT_ERROR', context)
    this.name = 'MeasurementError'
  }
}

/** Error thrown when a budget limit is exceeded */
export class BudgetExceededError extends PidLoopError {
  constructor(
    limit: number,
    current: number,
    context: Record<string, unknown> = {}
  ) {
    super(
      `Budget cap exceeded: current=${String(current)}, limit=${String(limit)}`,
      'BUDGET_EXCEEDED',
      { limit, current, ...context }
    )
    this.name = 'BudgetExceededError'
  }
}
