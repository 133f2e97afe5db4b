/**
 * PidControllerImpl: concrete implementation of the PidController interface.
 *
 * Per step:
 *  - P on the current error
 *  - I on the accumulated error, clamped to the integral limits before use (anti-windup)
 *  - D on an exponentially smoothed error rate (alpha = 0.1)
 *  - output clamped to the control limits
 */

import type { PidSettings } from '../config/config-schema.js'
import { createLogger } from '../../utils/logger.js'
import type { PidController } from './pid-controller.js'
import type { ControllerSnapshot, PidControllerOptions, PidGains } from './types.js'
import { DEFAULT_DEADBAND, SlidingWindow, amplitude, clamp, countZeroCrossings } from './pid-math.js'

const logger = createLogger('pid-controller')

/** Weight of the newest raw derivative in the low-pass filter */
export const DERIVATIVE_FILTER_ALPHA = 0.1

// ---------------------------------------------------------------------------
// PidControllerImpl
// ---------------------------------------------------------------------------

export class PidControllerImpl implements PidController {
  private _gains: PidGains
  private readonly _options: PidControllerOptions

  private _error = 0
  private _prevError = 0
  private _integral = 0
  private _filteredDerivative = 0
  private _control = 0

  private readonly _errorHistory: SlidingWindow<number>
  private readonly _controlHistory: SlidingWindow<number>

  constructor(options: PidControllerOptions) {
    const [iMin, iMax] = options.integralLimits
    const [cMin, cMax] = options.controlLimits
    if (iMin > iMax) throw new RangeError(`integral limits are inverted: [${String(iMin)}, ${String(iMax)}]`)
    if (cMin > cMax) throw new RangeError(`control limits are inverted: [${String(cMin)}, ${String(cMax)}]`)

    this._options = options
    this._gains = { ...options.gains }
    this._errorHistory = new SlidingWindow<number>(options.oscillationWindow)
    this._controlHistory = new SlidingWindow<number>(options.oscillationWindow)

    logger.info({ gains: this._gains, dt: options.dt }, 'PID controller initialized')
  }

  compute(setpoint: number, processVariable: number): number {
    const { dt } = this._options
    const [iMin, iMax] = this._options.integralLimits
    const [cMin, cMax] = this._options.controlLimits

    this._error = setpoint - processVariable
    const pTerm = this._gains.kp * this._error

    if (dt > 0) {
      this._integral = clamp(this._integral + this._error * dt, iMin, iMax)
    }
    const iTerm = this._gains.ki * this._integral

    const rawDerivative = dt > 0 ? (this._error - this._prevError) / dt : 0
    this._filteredDerivative =
      DERIVATIVE_FILTER_ALPHA * rawDerivative + (1 - DERIVATIVE_FILTER_ALPHA) * this._filteredDerivative
    const dTerm = this._gains.kd * this._filteredDerivative

    this._control = clamp(pTerm + iTerm + dTerm, cMin, cMax)

    this._errorHistory.push(this._error)
    this._controlHistory.push(this._control)
    this._prevError = this._error

    logger.debug(
      { error: this._error, p: pTerm, i: iTerm, d: dTerm, control: this._control },
      'PID step'
    )
    return this._control
  }

  isOscillating(): boolean {
    if (!this._errorHistory.isFull) return false

    const errors = this._errorHistory.toArray()
    const crossings = countZeroCrossings(errors)
    if (crossings < Math.floor(this._options.oscillationWindow / 2)) return false

    const range = amplitude(errors)
    if (range <= this._options.oscillationThreshold) return false

    logger.warn({ crossings, range }, 'Oscillation detected')
    return true
  }

  applyHysteresis(threshold: number = DEFAULT_DEADBAND): number {
    return Math.abs(this._control) < threshold ? 0 : this._control
  }

  reset(): void {
    this._error = 0
    this._prevError = 0
    this._integral = 0
    this._filteredDerivative = 0
    this._control = 0
    this._errorHistory.clear()
    this._controlHistory.clear()
    logger.info('PID controller reset')
  }

  tune(gains: Partial<PidGains>): void {
    const next: PidGains = {
      kp: gains.kp ?? this._gains.kp,
      ki: gains.ki ?? this._gains.ki,
      kd: gains.kd ?? this._gains.kd,
    }
    this._gains = next
    logger.info({ gains: next }, 'PID gains tuned')
  }

  getState(): ControllerSnapshot {
    return {
      gains: { ...this._gains },
      error: this._error,
      prevError: this._prevError,
      integral: this._integral,
      derivative: this._filteredDerivative,
      control: this._control,
      errorHistory: this._errorHistory.toArray(),
      controlHistory: this._controlHistory.toArray(),
    }
  }
}

// ---------------------------------------------------------------------------
// Factory functions
// ---------------------------------------------------------------------------

export function createPidController(options: PidControllerOptions): PidController {
  return new PidControllerImpl(options)
}

/** Map the `pid` config section onto controller options */
export function pidOptionsFromSettings(settings: PidSettings): PidControllerOptions {
  return {
    gains: { kp: settings.kp, ki: settings.ki, kd: settings.kd },
    dt: settings.dt,
    integralLimits: [settings.integral_min, settings.integral_max],
    controlLimits: [settings.control_min, settings.control_max],
    oscillationWindow: settings.oscillation_window,
    oscillationThreshold: settings.oscillation_threshold,
  }
}

export function createPidControllerFromSettings(settings: PidSettings): PidController {
  return new PidControllerImpl(pidOptionsFromSettings(settings))
}
