/**
 * Unit tests for `pidloop init`
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdir, readFile, rm, writeFile } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import yaml from 'js-yaml'
import { createConfigSystem } from '../../../modules/config/config-system-impl.js'
import { PartialPidLoopConfigSchema } from '../../../modules/config/config-schema.js'
import { captureOutput } from '../../__tests__/capture-output.js'
import {
  runInit,
  buildInitialConfig,
  renderInitialConfig,
  INIT_EXIT_SUCCESS,
  INIT_EXIT_ALREADY_EXISTS,
} from '../init.js'

let testDir: string

beforeEach(() => {
  testDir = join(tmpdir(), `pidloop-init-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
  vi.restoreAllMocks()
})

describe('buildInitialConfig', () => {
  it('passes the partial config schema', () => {
    expect(PartialPidLoopConfigSchema.safeParse(buildInitialConfig()).success).toBe(true)
  })

  it('renders a commented YAML document', () => {
    const text = renderInitialConfig()
    expect(text.startsWith('# pidloop project configuration\n')).toBe(true)
    expect(yaml.load(text)).toEqual(buildInitialConfig())
  })
})

describe('runInit', () => {
  it('creates a config the config system can load', async () => {
    const out = captureOutput()
    const code = await runInit({ directory: testDir })
    out.restore()

    expect(code).toBe(INIT_EXIT_SUCCESS)
    const configPath = join(testDir, '.pidloop', 'config.yaml')
    expect(out.getStdout()).toContain(`  Created ${configPath}\n`)

    const system = createConfigSystem({
      projectConfigDir: join(testDir, '.pidloop'),
      globalConfigDir: join(testDir, 'no-global'),
      env: {},
    })
    await system.load()
    expect(system.getConfig().pid).toMatchObject({ kp: 1, ki: 0.1, kd: 0.05 })
  })

  it('refuses to overwrite without --force', async () => {
    await mkdir(join(testDir, '.pidloop'), { recursive: true })
    await writeFile(join(testDir, '.pidloop', 'config.yaml'), 'pid:\n  kp: 9\n', 'utf-8')

    const out = captureOutput()
    const code = await runInit({ directory: testDir })
    out.restore()

    expect(code).toBe(INIT_EXIT_ALREADY_EXISTS)
    expect(out.getStderr()).toContain('already exists. Use --force to overwrite it.')
    expect(await readFile(join(testDir, '.pidloop', 'config.yaml'), 'utf-8')).toBe('pid:\n  kp: 9\n')
  })

  it('overwrites with --force', async () => {
    await mkdir(join(testDir, '.pidloop'), { recursive: true })
    await writeFile(join(testDir, '.pidloop', 'config.yaml'), 'pid:\n  kp: 9\n', 'utf-8')

    const out = captureOutput()
    const code = await runInit({ directory: testDir, force: true })
    out.restore()

    expect(code).toBe(INIT_EXIT_SUCCESS)
    expect(await readFile(join(testDir, '.pidloop', 'config.yaml'), 'utf-8')).toBe(renderInitialConfig())
  })
})
