import { describe, it, expect } from 'vitest'
import { adjustStrategies, isQaIteration } from '../strategy-adjuster.js'

const BASE = { developerTemperature: 0.5, qaFrequency: 1 }

describe('adjustStrategies()', () => {
  it('leaves parameters alone inside the dead zone', () => {
    expect(adjustStrategies(0, BASE)).toEqual(BASE)
    expect(adjustStrategies(1.5, { developerTemperature: 0.5, qaFrequency: 3 })).toEqual({
      developerTemperature: 0.5,
      qaFrequency: 3,
    })
  })

  it('cools the developer when control is strongly positive', () => {
    expect(adjustStrategies(2.5, BASE).developerTemperature).toBeCloseTo(0.3)
  })

  it('forces QA on every iteration above 3', () => {
    const next = adjustStrategies(3.5, { developerTemperature: 0.5, qaFrequency: 4 })
    expect(next.qaFrequency).toBe(1)
    expect(next.developerTemperature).toBeCloseTo(0.3)
  })

  it('warms the developer and relaxes QA when control is strongly negative', () => {
    const next = adjustStrategies(-2.5, BASE)
    expect(next.developerTemperature).toBeCloseTo(0.7)
    expect(next.qaFrequency).toBe(2)
  })

  it('relaxes QA without touching temperature between -2 and -1', () => {
    expect(adjustStrategies(-1.5, BASE)).toEqual({ developerTemperature: 0.5, qaFrequency: 2 })
  })

  it('accumulates steps across calls and stops at the bounds', () => {
    let params = BASE
    for (let i = 0; i < 5; i++) params = adjustStrategies(4, params)
    expect(params.developerTemperature).toBe(0.1)

    for (let i = 0; i < 10; i++) params = adjustStrategies(-4, params)
    expect(params.developerTemperature).toBe(1.0)
  })

  it('does not mutate its input', () => {
    const current = { developerTemperature: 0.5, qaFrequency: 1 }
    adjustStrategies(-3, current)
    expect(current).toEqual({ developerTemperature: 0.5, qaFrequency: 1 })
  })
})

describe('isQaIteration()', () => {
  it('runs QA every iteration at frequency 1 or below', () => {
    expect(isQaIteration(1, 1)).toBe(true)
    expect(isQaIteration(7, 0)).toBe(true)
  })

  it('runs QA on multiples of the frequency', () => {
    expect([1, 2, 3, 4, 5, 6].filter((i) => isQaIteration(i, 3))).toEqual([3, 6])
  })
})
