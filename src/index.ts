/**
 * pidloop - Main module exports
 * Public API surface for embedding the control loop
 */

// Core types
export * from './core/types.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger, setGlobalLogLevel } from './utils/logger.js'
export * from './utils/helpers.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { OrchestratorEvents } from './core/event-bus.types.js'
export { createEventBus, TypedEventBusImpl } from './core/event-bus.js'

// Dependency Injection
export type { BaseService } from './core/di.js'
export { ServiceRegistry } from './core/di.js'

// Configuration
export { createConfigSystem, PidLoopConfigSchema, DEFAULT_CONFIG } from './modules/config/index.js'
export type { ConfigSystem, PidLoopConfig, PartialPidLoopConfig } from './modules/config/index.js'

// Control
export { createPidController, createPidControllerFromSettings } from './modules/pid-controller/index.js'
export type { PidController, PidGains, ControllerSnapshot } from './modules/pid-controller/index.js'
export { createDecisionPolicy, decisionOptionsFromConfig } from './modules/decision-policy/index.js'
export type { DecisionPolicy, DecisionInput } from './modules/decision-policy/index.js'
export { createSafetyGuardEvaluator, guardOptionsFromSettings } from './modules/safety-guards/index.js'
export type { SafetyGuardEvaluator, GuardResult } from './modules/safety-guards/index.js'

// Measurement, agents, checkpoints, patches
export { CommandLintProvider, createLintProvider, createProcessVariableMeter, StaticLintProvider } from './modules/metrics/index.js'
export type { ProcessVariableMeter, LintProvider, Measurement } from './modules/metrics/index.js'
export { createAgentRoles, createProcessAgentRunner } from './modules/agents/index.js'
export type { AgentTeam, AgentRunner } from './modules/agents/index.js'
export { createCheckpointManager, FileCheckpointManager } from './modules/checkpoint/index.js'
export type { CheckpointManager, CheckpointMetadata } from './modules/checkpoint/index.js'
export { createGitPatchApplier } from './modules/patch/index.js'
export type { PatchApplier } from './modules/patch/index.js'

// Orchestration
export { createIterationOrchestrator, adjustStrategies } from './modules/iteration-orchestrator/index.js'
export type { IterationOrchestrator, IterationOrchestratorDeps, RunSummary } from './modules/iteration-orchestrator/index.js'

// Persistence
export { createDatabaseService, createSqliteIterationRecorder, listRuns, listIterations } from './persistence/index.js'
export type { DatabaseService, RunRow, IterationRow } from './persistence/index.js'
