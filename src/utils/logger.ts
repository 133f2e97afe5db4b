/**
 * Logger utility for pidloop
 * Uses pino for structured JSON logging with pretty printing in development
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from '../cli/utils/masking.js'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

/** Default log level based on environment */
function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'development') return 'debug'
  // Tests and plain CLI use stay quiet unless asked
  if (process.env.NODE_ENV === 'test') return 'silent'
  return 'warn'
}

/** Whether to use pretty printing (development mode) */
function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  // pino-pretty runs in a worker thread; keep it out of CLI and test processes
  return process.env.NODE_ENV === 'development'
}

/**
 * Create a named logger instance
 * @param name - Logger name (module identifier)
 * @param options - Optional logger configuration overrides
 */
export function createLogger(
  name: string,
  options: LoggerOptions = {}
): pino.Logger {
  const level = options.level ?? getDefaultLogLevel()
  const pretty = options.pretty ?? isPrettyMode()

  const baseOptions: pino.LoggerOptions = {
    name: options.name ?? name,
    level,
    redact: PINO_REDACT_PATHS,
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      pid: process.pid,
    },
  }

  const instance = pretty
    ? pino({
        ...baseOptions,
        // pino-pretty is a devDependency; only use in non-production environments.
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        },
      })
    : pino(baseOptions)

  if (options.level === undefined) {
    followGlobalLevel.add(instance)
  }
  return instance
}

/** Loggers created without an explicit level; setGlobalLogLevel() retargets them */
const followGlobalLevel = new Set<pino.Logger>()

/** Root application logger */
export const logger = createLogger('pidloop')

/** Create a child logger with additional context */
export function childLogger(
  parent: pino.Logger,
  bindings: Record<string, unknown>
): pino.Logger {
  return parent.child(bindings)
}

/**
 * Retarget every logger that was created without an explicit level, and
 * make it the default for loggers created later.
 * Used by the CLI `--log-level` flag and `orchestration.log_level`.
 */
export function setGlobalLogLevel(level: string): void {
  process.env.LOG_LEVEL = level
  for (const instance of followGlobalLevel) {
    instance.level = level
  }
}
