/**
 * PID Controller Module
 *
 * Usage:
 *   import { createPidControllerFromSettings } from './modules/pid-controller/index.js'
 *
 *   const pid = createPidControllerFromSettings(config.pid)
 *   const u = pid.compute(config.pid.setpoint, pv)
 *   if (pid.isOscillating()) { ... }
 */

export type { PidController } from './pid-controller.js'
export type {
  PidGains,
  Limits,
  PidControllerOptions,
  ControllerSnapshot,
  PidStepInput,
  PidStepResult,
} from './types.js'
export {
  PidControllerImpl,
  DERIVATIVE_FILTER_ALPHA,
  createPidController,
  createPidControllerFromSettings,
  pidOptionsFromSettings,
} from './pid-controller-impl.js'
export {
  clamp,
  computePidStep,
  countZeroCrossings,
  amplitude,
  detectOscillation,
  applyDeadband,
  SlidingWindow,
  DEFAULT_INTEGRAL_LIMITS,
  DEFAULT_CONTROL_LIMITS,
  DEFAULT_DEADBAND,
  DEFAULT_OSCILLATION_THRESHOLD,
  MIN_OSCILLATION_SAMPLES,
} from './pid-math.js'
