/**
 * Stateless PID helpers shared by PidControllerImpl and callers that need a
 * one-off control computation without carrying controller state.
 */

import type { Limits, PidStepInput, PidStepResult } from './types.js'

export const DEFAULT_INTEGRAL_LIMITS: Limits = [-10, 10]
export const DEFAULT_CONTROL_LIMITS: Limits = [-5, 5]
export const DEFAULT_DEADBAND = 0.05
export const DEFAULT_OSCILLATION_THRESHOLD = 0.15

/** Minimum number of error samples detectOscillation() looks at */
export const MIN_OSCILLATION_SAMPLES = 4

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value))
}

/**
 * One PID step with integral clamping and an unfiltered derivative.
 * With dt <= 0 neither the integral nor the derivative moves.
 */
export function computePidStep(input: PidStepInput): PidStepResult {
  const { error, prevError, gains, dt } = input
  const [iMin, iMax] = input.integralLimits ?? DEFAULT_INTEGRAL_LIMITS
  const [cMin, cMax] = input.controlLimits ?? DEFAULT_CONTROL_LIMITS

  const integral = clamp(input.integral + (dt > 0 ? error * dt : 0), iMin, iMax)
  const derivative = dt > 0 ? (error - prevError) / dt : 0
  const control = clamp(gains.kp * error + gains.ki * integral + gains.kd * derivative, cMin, cMax)

  return { control, integral, derivative }
}

/** Number of sign changes between consecutive samples; zeros never count */
export function countZeroCrossings(samples: readonly number[]): number {
  let crossings = 0
  for (let i = 1; i < samples.length; i++) {
    const prev = samples[i - 1] ?? 0
    const curr = samples[i] ?? 0
    if (prev * curr < 0) crossings++
  }
  return crossings
}

/** max − min of the samples, 0 for an empty list */
export function amplitude(samples: readonly number[]): number {
  if (samples.length === 0) return 0
  return Math.max(...samples) - Math.min(...samples)
}

/**
 * True when the error signal flips sign at least ⌊n/2⌋ times and its
 * peak-to-peak amplitude exceeds `threshold`.
 */
export function detectOscillation(
  errors: readonly number[],
  threshold: number = DEFAULT_OSCILLATION_THRESHOLD
): boolean {
  if (errors.length < MIN_OSCILLATION_SAMPLES) return false
  return (
    countZeroCrossings(errors) >= Math.floor(errors.length / 2) &&
    amplitude(errors) > threshold
  )
}

/** Zero out values strictly inside (−deadband, deadband) */
export function applyDeadband(value: number, deadband: number = DEFAULT_DEADBAND): number {
  return Math.abs(value) < deadband ? 0 : value
}

// ---------------------------------------------------------------------------
// SlidingWindow
// ---------------------------------------------------------------------------

/**
 * Fixed-capacity FIFO. Pushing onto a full window evicts the oldest item.
 */
export class SlidingWindow<T> {
  private _items: T[] = []

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`SlidingWindow capacity must be a positive integer, got ${String(capacity)}`)
    }
  }

  push(item: T): void {
    this._items.push(item)
    if (this._items.length > this.capacity) {
      this._items.shift()
    }
  }

  get length(): number {
    return this._items.length
  }

  get isFull(): boolean {
    return this._items.length === this.capacity
  }

  clear(): void {
    this._items = []
  }

  toArray(): T[] {
    return [...this._items]
  }
}
