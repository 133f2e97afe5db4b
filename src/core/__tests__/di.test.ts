/**
 * Unit tests for the ServiceRegistry lifecycle container.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import { ServiceRegistry } from '../di.js'
import type { BaseService } from '../di.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeService(log: string[], name: string, failOn?: 'initialize' | 'shutdown'): BaseService {
  return {
    initialize: vi.fn(async () => {
      if (failOn === 'initialize') throw new Error(`${name} failed to start`)
      log.push(`init:${name}`)
    }),
    shutdown: vi.fn(async () => {
      if (failOn === 'shutdown') throw new Error(`${name} failed to stop`)
      log.push(`stop:${name}`)
    }),
  }
}

// ---------------------------------------------------------------------------
// ServiceRegistry
// ---------------------------------------------------------------------------

describe('ServiceRegistry', () => {
  let registry: ServiceRegistry
  let log: string[]

  beforeEach(() => {
    registry = new ServiceRegistry()
    log = []
  })

  it('registers and resolves services by name', () => {
    const db = makeService(log, 'database')
    registry.register('database', db)

    expect(registry.get('database')).toBe(db)
    expect(registry.has('database')).toBe(true)
    expect(registry.has('checkpoints')).toBe(false)
    expect(registry.serviceNames).toEqual(['database'])
  })

  it('rejects a duplicate name', () => {
    registry.register('database', makeService(log, 'a'))
    expect(() => registry.register('database', makeService(log, 'b'))).toThrow(
      'Service "database" is already registered'
    )
  })

  it('throws for an unknown service', () => {
    expect(() => registry.get('missing')).toThrow('Service "missing" is not registered')
  })

  it('initializes in order and shuts down in reverse', async () => {
    registry.register('database', makeService(log, 'database'))
    registry.register('checkpoints', makeService(log, 'checkpoints'))

    await registry.initializeAll()
    await registry.shutdownAll()

    expect(log).toEqual(['init:database', 'init:checkpoints', 'stop:checkpoints', 'stop:database'])
  })

  it('does not initialize a service twice', async () => {
    const db = makeService(log, 'database')
    registry.register('database', db)

    await registry.initializeAll()
    await registry.initializeAll()

    expect(db.initialize).toHaveBeenCalledTimes(1)
  })

  it('only shuts down services that finished initializing', async () => {
    registry.register('database', makeService(log, 'database'))
    registry.register('broken', makeService(log, 'broken', 'initialize'))
    registry.register('never', makeService(log, 'never'))

    await expect(registry.initializeAll()).rejects.toThrow('broken failed to start')
    await registry.shutdownAll()

    expect(log).toEqual(['init:database', 'stop:database'])
  })

  it('shuts everything down before reporting shutdown failures', async () => {
    registry.register('database', makeService(log, 'database'))
    registry.register('flaky', makeService(log, 'flaky', 'shutdown'))
    await registry.initializeAll()

    await expect(registry.shutdownAll()).rejects.toBeInstanceOf(AggregateError)
    expect(log).toEqual(['init:database', 'stop:database'])
  })
})
