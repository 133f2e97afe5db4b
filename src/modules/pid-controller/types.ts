/**
 * PID Controller Module: Types
 *
 * Gains, limits and the read-only snapshot returned by getState().
 */

/** Proportional, integral and derivative gains */
export interface PidGains {
  kp: number
  ki: number
  kd: number
}

/** Inclusive [min, max] range */
export type Limits = readonly [min: number, max: number]

/**
 * Options for constructing a PidController.
 */
export interface PidControllerOptions {
  gains: PidGains
  /** Time step between compute() calls; values <= 0 disable the integral and derivative steps */
  dt: number
  integralLimits: Limits
  controlLimits: Limits
  /** Capacity of the error/control histories */
  oscillationWindow: number
  /** Minimum error peak-to-peak amplitude that counts as oscillation */
  oscillationThreshold: number
}

/**
 * Point-in-time copy of the controller state. Mutating it has no effect
 * on the controller.
 */
export interface ControllerSnapshot {
  gains: PidGains
  error: number
  prevError: number
  integral: number
  derivative: number
  control: number
  errorHistory: number[]
  controlHistory: number[]
}

/** Inputs to a single stateless PID step */
export interface PidStepInput {
  error: number
  integral: number
  prevError: number
  gains: PidGains
  dt: number
  integralLimits?: Limits
  controlLimits?: Limits
}

export interface PidStepResult {
  control: number
  integral: number
  derivative: number
}
