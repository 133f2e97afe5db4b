/**
 * Barrel exports for the iteration-orchestrator module.
 */

export { createIterationOrchestrator, NO_TASKS_DECISION } from './iteration-orchestrator-impl.js'
export type { IterationOrchestratorDeps } from './iteration-orchestrator-impl.js'
export type { IterationOrchestrator } from './iteration-orchestrator.js'
export { adjustStrategies, isQaIteration, TEMPERATURE_STEP } from './strategy-adjuster.js'
export type { RunOptions, RunSummary, StrategyParams } from './types.js'
