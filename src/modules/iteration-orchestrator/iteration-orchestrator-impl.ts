/**
 * createIterationOrchestrator: the PID-controlled Keeper/Developer/QA loop.
 *
 * One iteration:
 *   1. Keeper plans tasks; the first one not yet completed is taken
 *   2. Developer produces a patch for it
 *   3. QA reviews the patch (or the previous verdict is reused when QA is
 *      not due this iteration)
 *   4. Baseline PV = last measured PV
 *   5. control = pid.compute(setpoint, baseline), before the patch is applied
 *   6. Control (after the deadband) adjusts developer temperature and QA frequency
 *   7. Decision policy picks merge / reject / rollback / human_review / skip
 *   8. The decision is carried out
 *   9. PV is measured again
 *  10. Periodic and best checkpoints
 *  11. The iteration is recorded and announced
 *  12. Safety guards decide whether to continue
 *
 * A failure in an agent call, the measurement or a checkpoint ends the
 * iteration without evaluating the safety guards; the loop carries on unless
 * orchestration.abort_on_error is set. A failed initial measurement starts
 * the run from PV 0.
 * The workspace is rolled back to the best checkpoint when the run ends.
 */

import { mkdir } from 'node:fs/promises'
import { resolve } from 'node:path'
import type { TypedEventBus } from '../../core/event-bus.js'
import { PidLoopError } from '../../core/errors.js'
import type {
  Decision,
  IterationRecord,
  IterationRecorder,
  PlannedTask,
  RunId,
  RunOutcome,
  TestResults,
  Verdict,
} from '../../core/types.js'
import { generateId } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { AgentTeam } from '../agents/agent-roles.js'
import type { CheckpointManager } from '../checkpoint/checkpoint-manager.js'
import type { CheckpointMetadata } from '../checkpoint/types.js'
import type { PidLoopConfig } from '../config/config-schema.js'
import { createDecisionPolicy, decisionOptionsFromConfig } from '../decision-policy/decision-policy-impl.js'
import type { DecisionPolicy } from '../decision-policy/decision-policy.js'
import type { ProcessVariableMeter } from '../metrics/process-variable-meter.js'
import type { PatchApplier } from '../patch/patch-applier.js'
import { createPidControllerFromSettings } from '../pid-controller/pid-controller-impl.js'
import type { PidController } from '../pid-controller/pid-controller.js'
import { createSafetyGuardEvaluator, guardOptionsFromSettings } from '../safety-guards/safety-guard-evaluator-impl.js'
import type { SafetyGuardEvaluator } from '../safety-guards/safety-guard-evaluator.js'
import type { IterationOrchestrator } from './iteration-orchestrator.js'
import { adjustStrategies, isQaIteration } from './strategy-adjuster.js'
import type { RunOptions, RunSummary, StrategyParams } from './types.js'

const logger = createLogger('iteration-orchestrator')

export const NO_TASKS_DECISION: Decision = { action: 'skip', reason: 'Keeper returned no pending tasks' }

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface IterationOrchestratorDeps {
  /** Validated configuration */
  config: PidLoopConfig
  agents: AgentTeam
  meter: ProcessVariableMeter
  /** Owns the best-checkpoint pointer */
  checkpoints: CheckpointManager
  patchApplier: PatchApplier
  eventBus: TypedEventBus
  recorder?: IterationRecorder
  /** Defaults to a controller built from config.pid */
  controller?: PidController
  /** Defaults to a policy built from config */
  policy?: DecisionPolicy
  /** Defaults to guards built from config.safety */
  guards?: SafetyGuardEvaluator
  /** Clock for record timestamps */
  now?: () => Date
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Outcome of the last QA review, carried into iterations that skip QA */
interface QaSnapshot {
  verdict: Verdict
  qualityScore: number
  testResults?: TestResults
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/** Spend reported by a failed agent call (AgentOutputError carries it) */
function costFromError(err: unknown): number {
  if (!(err instanceof PidLoopError)) return 0
  const cost = err.context['costUsd']
  return typeof cost === 'number' ? cost : 0
}

// ---------------------------------------------------------------------------
// createIterationOrchestrator
// ---------------------------------------------------------------------------

export function createIterationOrchestrator(deps: IterationOrchestratorDeps): IterationOrchestrator {
  const { config, agents, meter, checkpoints, patchApplier, eventBus, recorder } = deps
  const controller = deps.controller ?? createPidControllerFromSettings(config.pid)
  const policy = deps.policy ?? createDecisionPolicy(decisionOptionsFromConfig(config))
  const guards = deps.guards ?? createSafetyGuardEvaluator(guardOptionsFromSettings(config.safety))
  const now = deps.now ?? ((): Date => new Date())
  const codebasePath = resolve(config.repository.base_path)
  const { orchestration } = config

  let _running = false

  // -- helpers --

  function record(action: string, write: (r: IterationRecorder) => void): void {
    if (recorder === undefined) return
    try {
      write(recorder)
    } catch (err) {
      logger.warn({ action, err: errorMessage(err) }, 'Iteration recorder failed')
    }
  }

  async function createCheckpoint(iteration: number, pv: number, isBest: boolean): Promise<void> {
    const checkpointId = await checkpoints.create({ codebasePath, pv, iteration, isBest })
    eventBus.emit('checkpoint:created', { checkpointId, iteration, pv, isBest })
  }

  /** Restore the best checkpoint; returns its metadata when the restore succeeded */
  async function rollbackToBest(): Promise<CheckpointMetadata | null> {
    const best = checkpoints.getBest()
    if (best === null) {
      logger.warn('No best checkpoint to roll back to')
      return null
    }
    const success = await checkpoints.rollback(best.checkpointId, codebasePath)
    eventBus.emit('checkpoint:rollback', { checkpointId: best.checkpointId, success })
    return success ? best : null
  }

  // -- the run --

  async function execute(goal: string, options: RunOptions): Promise<RunSummary> {
    const runId: RunId = options.runId ?? generateId('run')
    const maxIterations = options.maxIterations ?? config.safety.max_iterations
    const { setpoint } = config.pid

    const pvHistory: number[] = []
    const completedTasks: PlannedTask[] = []
    const records: IterationRecord[] = []
    let strategy: StrategyParams = {
      developerTemperature: config.agents.developer.temperature,
      qaFrequency: orchestration.qa_frequency,
    }
    let lastQa: QaSnapshot | null = null
    let totalCostUsd = 0
    let haltReason: string | null = null
    let status: RunOutcome['status'] = 'completed'
    let iterations = 0

    await mkdir(codebasePath, { recursive: true })

    // A failed initial measurement starts the run from PV 0 without a best checkpoint
    let initialPv = 0
    try {
      const initial = await meter.measure({ goal, codebasePath })
      initialPv = initial.pv
      pvHistory.push(initial.pv)
      await createCheckpoint(0, initial.pv, true)
    } catch (err) {
      const message = errorMessage(err)
      logger.error({ runId, err: message }, 'Initial measurement or checkpoint failed')
      eventBus.emit('iteration:failed', { runId, iteration: 0, error: message })
    }
    let bestPv = initialPv
    let bestIteration = 0

    const lastPv = (): number => pvHistory[pvHistory.length - 1] ?? initialPv

    logger.info({ runId, goal, maxIterations, setpoint, initialPv }, 'Run started')
    eventBus.emit('run:started', { runId, goal, maxIterations, setpoint })
    record('startRun', (r) => {
      r.startRun({ runId, goal, setpoint, maxIterations, configSnapshot: options.configSnapshot })
    })

    /** Step 8: carry out the decision; a merge whose patch does not apply becomes a reject */
    async function applyDecision(decision: Decision, patch: string, task: PlannedTask, iteration: number): Promise<Decision> {
      switch (decision.action) {
        case 'merge': {
          const applied = await patchApplier.apply(patch, codebasePath)
          if (!applied) {
            logger.warn({ iteration, taskId: task.id }, 'Merge selected but the patch did not apply')
            return { action: 'reject', reason: `${decision.reason}; patch did not apply` }
          }
          completedTasks.push(task)
          return decision
        }
        case 'rollback': {
          const restored = await rollbackToBest()
          if (restored !== null && orchestration.reset_controller_on_rollback) {
            controller.reset()
            logger.info({ iteration, checkpointId: restored.checkpointId }, 'Controller reset after rollback')
          }
          return decision
        }
        case 'human_review':
          logger.warn({ iteration, reason: decision.reason }, 'Human review requested')
          eventBus.emit('review:requested', { runId, iteration, reason: decision.reason })
          return decision
        case 'reject':
        case 'skip':
          return decision
      }
    }

    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      iterations = iteration
      let iterationCost = 0
      const spend = (costUsd: number): void => {
        iterationCost += costUsd
        totalCostUsd += costUsd
      }

      let oscillating = false

      logger.info({ runId, iteration }, 'Iteration started')
      eventBus.emit('iteration:started', { runId, iteration })

      try {
        const keeper = await agents.callKeeper({ goal, iteration, completedTasks, codebasePath })
        spend(keeper.costUsd)

        const completedIds = new Set(completedTasks.map((t) => t.id))
        const task = keeper.output.tasks.find((t) => !completedIds.has(t.id))

        let iterationRecord: IterationRecord

        if (task === undefined) {
          logger.warn({ iteration }, 'Keeper returned no pending tasks')
          iterationRecord = {
            iteration,
            pv: lastPv(),
            bestPv,
            controlValue: controller.getState().control,
            decision: NO_TASKS_DECISION,
            qualityScore: null,
            verdict: null,
            costUsd: iterationCost,
            timestamp: now().toISOString(),
          }
        } else {
          const developer = await agents.callDeveloper({
            task,
            codebasePath,
            temperature: strategy.developerTemperature,
          })
          spend(developer.costUsd)

          let qa: QaSnapshot
          if (isQaIteration(iteration, strategy.qaFrequency)) {
            const review = await agents.callQa({
              iteration,
              patch: developer.output.patch,
              developerOutput: developer.output,
              codebasePath,
            })
            spend(review.costUsd)
            qa = {
              verdict: review.output.verdict,
              qualityScore: review.output.quality_score,
              testResults: review.output.test_results,
            }
          } else {
            qa = lastQa ?? { verdict: 'pass', qualityScore: policy.minQuality(iteration) }
            logger.info({ iteration, qaFrequency: strategy.qaFrequency }, 'QA not due, reusing previous verdict')
          }
          lastQa = qa

          const baselinePv = lastPv()
          const controlValue = controller.compute(setpoint, baselinePv)
          oscillating = controller.isOscillating()
          if (oscillating) {
            eventBus.emit('controller:oscillation', { runId, iteration })
          }

          strategy = adjustStrategies(controller.applyHysteresis(config.pid.hysteresis), strategy)

          const proposed = policy.decide({
            pv: baselinePv,
            qualityScore: qa.qualityScore,
            verdict: qa.verdict,
            controlValue,
            iteration,
          })
          logger.info({ iteration, ...proposed, controlValue, baselinePv }, 'Decision')
          eventBus.emit('iteration:decision', { runId, iteration, decision: proposed, controlValue, baselinePv })

          const decision = await applyDecision(proposed, developer.output.patch, task, iteration)

          const measurement = await meter.measure({ goal, codebasePath, testResults: qa.testResults })
          pvHistory.push(measurement.pv)

          if (iteration % orchestration.checkpoint_frequency === 0) {
            await createCheckpoint(iteration, measurement.pv, false)
          }
          if (measurement.pv > bestPv) {
            await createCheckpoint(iteration, measurement.pv, true)
            bestPv = measurement.pv
            bestIteration = iteration
          }

          iterationRecord = {
            iteration,
            pv: measurement.pv,
            bestPv,
            controlValue,
            decision,
            qualityScore: qa.qualityScore,
            verdict: qa.verdict,
            costUsd: iterationCost,
            timestamp: now().toISOString(),
          }
        }

        records.push(iterationRecord)
        record('record', (r) => {
          r.record(runId, iterationRecord)
        })
        eventBus.emit('iteration:complete', { runId, iteration, pv: iterationRecord.pv, bestPv })
      } catch (err) {
        spend(costFromError(err))
        const message = errorMessage(err)
        logger.error({ runId, iteration, err: message }, 'Iteration failed')
        eventBus.emit('iteration:failed', { runId, iteration, error: message })
        if (orchestration.abort_on_error) {
          status = 'failed'
          haltReason = `Iteration ${String(iteration)} failed: ${message}`
          break
        }
        // Guards only look at completed iterations
        continue
      }

      const guard = guards.evaluate({ totalCostUsd, pvHistory, oscillating })
      for (const warning of guard.warnings) {
        logger.warn({ iteration, warning }, 'Safety guard warning')
      }
      if (guard.verdict === 'stop') {
        status = 'halted'
        haltReason = guard.reason ?? 'Stopped by safety guard'
        logger.warn({ runId, iteration, reason: haltReason }, 'Run halted by safety guard')
        eventBus.emit('guard:halt', { runId, iteration, reason: haltReason })
        break
      }
    }

    const restored = await rollbackToBest()
    const finalPv = restored !== null ? restored.pv : lastPv()

    try {
      const removed = await checkpoints.cleanup(config.repository.keep_checkpoints)
      logger.debug({ removed }, 'Old checkpoints removed')
    } catch (err) {
      logger.warn({ err: errorMessage(err) }, 'Checkpoint cleanup failed')
    }

    const outcome: RunOutcome = { status, iterations, bestPv, finalPv, totalCostUsd, haltReason }
    record('finishRun', (r) => {
      r.finishRun(runId, outcome)
    })
    eventBus.emit('run:complete', { runId, iterations, bestPv, finalPv, totalCostUsd, haltReason })
    logger.info({ runId, ...outcome, bestIteration }, 'Run finished')

    return {
      runId,
      status,
      iterations,
      bestPv,
      bestIteration,
      finalPv,
      totalCostUsd,
      pvHistory,
      completedTasks,
      records,
      haltReason,
      codebasePath,
    }
  }

  // -- public interface --

  async function run(goal: string, options: RunOptions = {}): Promise<RunSummary> {
    if (_running) {
      throw new Error('IterationOrchestrator: a run is already in progress')
    }
    _running = true
    try {
      return await execute(goal, options)
    } finally {
      _running = false
    }
  }

  return { run }
}
