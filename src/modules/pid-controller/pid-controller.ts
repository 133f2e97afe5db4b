/**
 * PidController interface: stateful discrete PID with anti-windup,
 * a low-pass filtered derivative and zero-crossing oscillation detection.
 */

import type { ControllerSnapshot, PidGains } from './types.js'

export interface PidController {
  /**
   * Advance one step and return the clamped control value.
   * error = setpoint − processVariable
   */
  compute(setpoint: number, processVariable: number): number

  /**
   * True once the error history is full, has at least ⌊window/2⌋ sign
   * changes and a peak-to-peak amplitude above the oscillation threshold.
   */
  isOscillating(): boolean

  /** Last control value with |u| < threshold mapped to 0. Does not mutate state. */
  applyHysteresis(threshold?: number): number

  /** Zero all dynamic state and clear both histories; gains are kept. */
  reset(): void

  /** Replace any subset of the gains. */
  tune(gains: Partial<PidGains>): void

  getState(): ControllerSnapshot
}
