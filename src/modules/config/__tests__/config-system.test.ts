/**
 * Unit tests for config-system-impl.ts
 *
 * Tests:
 *  - Hierarchy loading (defaults < global < project < env < CLI)
 *  - Missing PID gains
 *  - get() dot-notation access
 *  - set() with project file update
 *  - getMasked() credential masking
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, writeFile, readFile, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import yaml from 'js-yaml'
import { createConfigSystem, coerceScalar, getByPath, setByPath } from '../config-system-impl.js'
import type { ConfigSystemImplOptions } from '../config-system-impl.js'
import { ConfigError } from '../../../core/errors.js'

// ---------------------------------------------------------------------------
// Test setup: temporary directories
// ---------------------------------------------------------------------------

let testDir: string
let projectConfigDir: string
let globalConfigDir: string

beforeEach(async () => {
  testDir = join(tmpdir(), `pidloop-config-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  projectConfigDir = join(testDir, 'project', '.pidloop')
  globalConfigDir = join(testDir, 'global', '.pidloop')
  await mkdir(projectConfigDir, { recursive: true })
  await mkdir(globalConfigDir, { recursive: true })
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
})

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const GAINS_YAML = 'pid:\n  kp: 1.0\n  ki: 0.1\n  kd: 0.05\n'

function createSystem(overrides: ConfigSystemImplOptions = {}): ReturnType<typeof createConfigSystem> {
  return createConfigSystem({
    projectConfigDir,
    globalConfigDir,
    env: {},
    ...overrides,
  })
}

async function writeYaml(dir: string, content: string): Promise<void> {
  await writeFile(join(dir, 'config.yaml'), content, 'utf-8')
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

describe('ConfigSystem - load', () => {
  it('fails with a ConfigError naming every missing gain', async () => {
    const system = createSystem()
    const err = await system.load().catch((e: unknown) => e)
    expect(err).toBeInstanceOf(ConfigError)
    expect(err instanceof ConfigError ? err.context['missing'] : undefined).toEqual(['kp', 'ki', 'kd'])
    expect(system.isLoaded).toBe(false)
  })

  it('names only the gains that are still missing', async () => {
    await writeYaml(projectConfigDir, 'pid:\n  kp: 1.0\n')
    const system = createSystem()
    await expect(system.load()).rejects.toThrow('Missing PID gains: ki, kd.')
  })

  it('loads defaults once gains come from the project file', async () => {
    await writeYaml(projectConfigDir, GAINS_YAML)
    const system = createSystem()
    await system.load()
    const config = system.getConfig()
    expect(config.pid.kp).toBe(1.0)
    expect(config.pid.setpoint).toBe(0.8)
    expect(config.quality.min_quality_score_final).toBe(6.5)
    expect(config.safety.stagnation_limit).toBe(3)
    expect(config.metrics.weights.similarity).toBe(0.4)
  })

  it('applies global config beneath project config', async () => {
    await writeYaml(globalConfigDir, `${GAINS_YAML}safety:\n  max_iterations: 12\n  max_budget_usd: 3\n`)
    await writeYaml(projectConfigDir, 'safety:\n  max_iterations: 20\n')
    const system = createSystem()
    await system.load()
    expect(system.getConfig().safety.max_iterations).toBe(20)
    expect(system.getConfig().safety.max_budget_usd).toBe(3)
  })

  it('applies PIDLOOP_ env vars over files', async () => {
    await writeYaml(projectConfigDir, GAINS_YAML)
    const system = createSystem({
      env: { PIDLOOP_KP: '2.5', PIDLOOP_MAX_ITERATIONS: '7', PIDLOOP_LOG_LEVEL: 'debug' },
    })
    await system.load()
    const config = system.getConfig()
    expect(config.pid.kp).toBe(2.5)
    expect(config.safety.max_iterations).toBe(7)
    expect(config.orchestration.log_level).toBe('debug')
  })

  it('ignores invalid env overrides as a whole', async () => {
    await writeYaml(projectConfigDir, GAINS_YAML)
    const system = createSystem({ env: { PIDLOOP_KP: '3', PIDLOOP_LOG_LEVEL: 'loud' } })
    await system.load()
    expect(system.getConfig().pid.kp).toBe(1.0)
    expect(system.getConfig().orchestration.log_level).toBe('info')
  })

  it('supplies gains entirely from env vars', async () => {
    const system = createSystem({ env: { PIDLOOP_KP: '1', PIDLOOP_KI: '0.2', PIDLOOP_KD: '-0.1' } })
    await system.load()
    expect(system.getConfig().pid).toMatchObject({ kp: 1, ki: 0.2, kd: -0.1 })
  })

  it('applies CLI overrides above everything', async () => {
    await writeYaml(projectConfigDir, GAINS_YAML)
    const system = createSystem({
      env: { PIDLOOP_KP: '2.5' },
      cliOverrides: { pid: { kp: 4 }, safety: { max_iterations: 3 } },
    })
    await system.load()
    expect(system.getConfig().pid.kp).toBe(4)
    expect(system.getConfig().pid.ki).toBe(0.1)
    expect(system.getConfig().safety.max_iterations).toBe(3)
  })

  it('reports validation issues of the merged document', async () => {
    await writeYaml(projectConfigDir, `${GAINS_YAML}  integral_min: 20\n`)
    const system = createSystem()
    await expect(system.load()).rejects.toThrow(/integral_min: integral_min must not exceed integral_max/)
  })

  it('rejects unknown keys in a config file', async () => {
    await writeYaml(projectConfigDir, `${GAINS_YAML}unknown_section: {}\n`)
    await expect(createSystem().load()).rejects.toBeInstanceOf(ConfigError)
  })

  it('rejects an unsupported config_format_version', async () => {
    await writeYaml(projectConfigDir, `config_format_version: "9"\n${GAINS_YAML}`)
    await expect(createSystem().load()).rejects.toThrow('Unsupported config_format_version "9"')
  })

  it('treats an empty config file as no overrides', async () => {
    await writeYaml(globalConfigDir, '')
    await writeYaml(projectConfigDir, GAINS_YAML)
    await expect(createSystem().load()).resolves.toBeUndefined()
  })
})

// ---------------------------------------------------------------------------
// Accessors
// ---------------------------------------------------------------------------

describe('ConfigSystem - getConfig/get', () => {
  it('throws before load()', () => {
    expect(() => createSystem().getConfig()).toThrow(ConfigError)
  })

  it('resolves dot-notation keys', async () => {
    await writeYaml(projectConfigDir, GAINS_YAML)
    const system = createSystem()
    await system.load()
    expect(system.get('pid.ki')).toBe(0.1)
    expect(system.get('agents.qa.temperature')).toBe(0.2)
    expect(system.get('pid.nope')).toBeUndefined()
  })
})

describe('ConfigSystem - set', () => {
  it('writes a gain before any config exists', async () => {
    const system = createSystem()
    await system.set('pid.kp', 1.5)
    const written = yaml.load(await readFile(join(projectConfigDir, 'config.yaml'), 'utf-8'))
    expect(written).toEqual({ pid: { kp: 1.5 } })
    expect(system.isLoaded).toBe(false)
  })

  it('updates the project file and reloads', async () => {
    await writeYaml(projectConfigDir, GAINS_YAML)
    const system = createSystem()
    await system.load()
    await system.set('safety.max_iterations', 9)
    expect(system.getConfig().safety.max_iterations).toBe(9)
    expect(system.getConfig().pid.kd).toBe(0.05)
  })

  it('rejects unknown keys', async () => {
    await expect(createSystem().set('pid.gain', 1)).rejects.toThrow('Unknown config key: pid.gain')
  })

  it('rejects object keys', async () => {
    await expect(createSystem().set('safety', 1)).rejects.toThrow('Cannot set object key "safety"')
  })

  it('rejects values of the wrong type', async () => {
    await expect(createSystem().set('safety.max_iterations', 'ten')).rejects.toThrow(
      'Invalid value for "safety.max_iterations"'
    )
  })
})

describe('ConfigSystem - getMasked', () => {
  it('masks api_key_env for every agent', async () => {
    await writeYaml(projectConfigDir, GAINS_YAML)
    const system = createSystem()
    await system.load()
    const masked = system.getMasked()
    expect(masked.agents.developer.api_key_env).toBe('***')
    expect(masked.agents.keeper.api_key_env).toBe('***')
    expect(masked.agents.developer.command).toBe('claude')
    expect(system.getConfig().agents.developer.api_key_env).toBe('ANTHROPIC_API_KEY')
  })
})

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

describe('coerceScalar', () => {
  it.each([
    ['true', true],
    ['false', false],
    ['42', 42],
    ['-3', -3],
    ['0.25', 0.25],
    ['-.5', -0.5],
    ['./workspace', './workspace'],
  ])('coerces %s', (raw, expected) => {
    expect(coerceScalar(raw)).toBe(expected)
  })
})

describe('getByPath / setByPath', () => {
  it('creates intermediate objects without mutating the input', () => {
    const input = { pid: { kp: 1 } }
    const out = setByPath(input, 'pid.ki', 2)
    expect(out).toEqual({ pid: { kp: 1, ki: 2 } })
    expect(input).toEqual({ pid: { kp: 1 } })
    expect(getByPath(out, 'pid.ki')).toBe(2)
    expect(getByPath(out, 'pid.ki.deeper')).toBeUndefined()
  })
})
