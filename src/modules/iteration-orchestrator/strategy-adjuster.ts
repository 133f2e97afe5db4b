/**
 * Strategy adjustment: how the control signal steers the agents.
 *
 * A strongly positive control value means the codebase is far below the
 * setpoint: the developer is made more conservative and QA runs on every
 * iteration. A strongly negative one relaxes both.
 */

import type { StrategyParams } from './types.js'

export const TEMPERATURE_STEP = 0.2
export const MIN_DEVELOPER_TEMPERATURE = 0.1
export const MAX_DEVELOPER_TEMPERATURE = 1.0

/**
 * Return the parameters for the next iteration. Steps are applied to the
 * current values, so repeated strong signals keep moving the temperature
 * until it reaches a bound.
 */
export function adjustStrategies(control: number, current: StrategyParams): StrategyParams {
  let { developerTemperature, qaFrequency } = current

  if (control > 2) {
    developerTemperature = Math.max(MIN_DEVELOPER_TEMPERATURE, developerTemperature - TEMPERATURE_STEP)
  } else if (control < -2) {
    developerTemperature = Math.min(MAX_DEVELOPER_TEMPERATURE, developerTemperature + TEMPERATURE_STEP)
  }

  if (control > 3) {
    qaFrequency = 1
  } else if (control < -1) {
    qaFrequency = 2
  }

  return { developerTemperature, qaFrequency }
}

/** QA runs on iterations that are a multiple of the frequency */
export function isQaIteration(iteration: number, qaFrequency: number): boolean {
  return qaFrequency <= 1 || iteration % qaFrequency === 0
}
