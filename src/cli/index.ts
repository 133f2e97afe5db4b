#!/usr/bin/env node
/**
 * pidloop CLI - Main entry point
 * Provides the `pidloop` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { createLogger } from '../utils/logger.js'
import { registerConfigCommand } from './commands/config.js'
import { registerHistoryCommand } from './commands/history.js'
import { registerInitCommand } from './commands/init.js'
import { registerRunCommand } from './commands/run.js'

const logger = createLogger('cli')

/** Read the version from the package.json next to src/ or dist/ */
export async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  for (const pkgPath of [resolve(here, '../../package.json'), resolve(here, '../package.json')]) {
    try {
      const pkg: unknown = JSON.parse(await readFile(pkgPath, 'utf-8'))
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version
      }
    } catch (err) {
      logger.debug({ pkgPath, err }, 'package.json not readable here')
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('pidloop')
    .description('pidloop - PID-controlled Keeper/Developer/QA agent loop')
    .version(version, '-v, --version', 'Output the current version')

  registerRunCommand(program, version)
  registerInitCommand(program)
  registerConfigCommand(program)
  registerHistoryCommand(program, version)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.stderr.write(`  ${error instanceof Error ? error.message : String(error)}\n`)
    process.exitCode = 1
  }
}

void main()
