/**
 * createLogger defaults and credential redaction.
 */

import { describe, it, expect, afterEach } from 'vitest'
import { Writable } from 'node:stream'
import pino from 'pino'
import { PINO_REDACT_PATHS, maskSecrets } from '../../cli/utils/masking.js'
import { createLogger, childLogger } from '../logger.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** A logger with the production redaction rules that writes JSON lines into an array */
function recordingLogger(): { log: pino.Logger; entries: () => Record<string, unknown>[] } {
  const lines: string[] = []
  const sink = new Writable({
    write(chunk: Buffer, _encoding: string, done: () => void) {
      lines.push(chunk.toString())
      done()
    },
  })
  const log = pino({ level: 'trace', redact: PINO_REDACT_PATHS }, sink)
  return {
    log,
    entries: () => lines.map((line) => JSON.parse(line) as Record<string, unknown>),
  }
}

const savedEnv = { LOG_LEVEL: process.env.LOG_LEVEL, NODE_ENV: process.env.NODE_ENV }

function restoreEnv(): void {
  for (const [key, value] of Object.entries(savedEnv)) {
    if (value === undefined) delete process.env[key]
    else process.env[key] = value
  }
}

// ---------------------------------------------------------------------------
// Level selection
// ---------------------------------------------------------------------------

describe('createLogger', () => {
  afterEach(restoreEnv)

  it('prefers an explicit level', () => {
    process.env.LOG_LEVEL = 'warn'
    expect(createLogger('explicit', { level: 'trace', pretty: false }).level).toBe('trace')
  })

  it('reads LOG_LEVEL from the environment', () => {
    process.env.LOG_LEVEL = 'error'
    expect(createLogger('from-env', { pretty: false }).level).toBe('error')
  })

  it.each([
    ['production', 'info'],
    ['development', 'debug'],
    ['test', 'silent'],
  ])('defaults to %s -> %s without LOG_LEVEL', (nodeEnv, level) => {
    delete process.env.LOG_LEVEL
    process.env.NODE_ENV = nodeEnv
    expect(createLogger(`default-${nodeEnv}`, { pretty: false }).level).toBe(level)
  })

  it('falls back to warn outside any known environment', () => {
    delete process.env.LOG_LEVEL
    delete process.env.NODE_ENV
    expect(createLogger('plain-cli', { pretty: false }).level).toBe('warn')
  })

  it('childLogger binds extra fields', () => {
    const { log, entries } = recordingLogger()
    childLogger(log, { runId: 'run-1' }).info('iteration done')
    expect(entries()[0]).toMatchObject({ runId: 'run-1', msg: 'iteration done' })
  })
})

// ---------------------------------------------------------------------------
// Redaction
// ---------------------------------------------------------------------------

describe('PINO_REDACT_PATHS', () => {
  it('redacts top-level and nested api keys', () => {
    const { log, entries } = recordingLogger()
    log.info({ apiKey: 'test-secret', agent: { api_key: 'test-secret' } }, 'calling agent')

    const [entry] = entries()
    expect(entry?.['apiKey']).toBe('[Redacted]')
    expect(entry?.['agent']).toEqual({ api_key: '[Redacted]' })
  })

  it('redacts the variable names agents read their keys from', () => {
    const { log, entries } = recordingLogger()
    log.info({ agents: { qa: { api_key_env: 'QA_KEY', command: 'qa-cli' } } }, 'agents configured')

    expect(entries()[0]?.['agents']).toEqual({ qa: { api_key_env: '[Redacted]', command: 'qa-cli' } })
  })

  it('redacts provider keys in a logged environment', () => {
    const { log, entries } = recordingLogger()
    log.info({ env: { ANTHROPIC_API_KEY: 'test-secret', HOME: '/home/dev' } }, 'spawn env')

    expect(entries()[0]?.['env']).toEqual({ ANTHROPIC_API_KEY: '[Redacted]', HOME: '/home/dev' })
  })
})

describe('maskSecrets', () => {
  it('masks key-shaped tokens inside agent stderr', () => {
    expect(maskSecrets('401: key sk-ant-REDACTED rejected')).toBe('401: key *** rejected')
  })

  it('leaves ordinary text alone', () => {
    expect(maskSecrets('patch did not apply')).toBe('patch did not apply')
  })
})
