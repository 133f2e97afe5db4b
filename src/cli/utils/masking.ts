/**
 * Credential masking for CLI output and pino redaction.
 *
 * Agent commands receive API keys through the environment; neither the key
 * values nor the variable names they live in should reach logs or
 * `pidloop config show`.
 */

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/** Patterns that look like provider API keys */
export const API_KEY_PATTERNS: RegExp[] = [
  /sk-ant-[A-Za-z0-9_-]{20,}/g,
  /sk-[A-Za-z0-9_-]{20,}/g,
  /AIza[A-Za-z0-9_-]{35,}/g,
]

/**
 * Pino redaction paths for credential fields.
 */
export const PINO_REDACT_PATHS: string[] = [
  'apiKey',
  'api_key',
  '*.apiKey',
  '*.api_key',
  'agents.*.api_key_env',
  'env.OPENAI_API_KEY',
  'env.ANTHROPIC_API_KEY',
  'env.DEEPSEEK_API_KEY',
]

const CREDENTIAL_FIELDS = new Set(['api_key', 'apiKey', 'api_key_env', 'token', 'secret', 'password'])

/**
 * Replace known API key patterns in a string with `***`.
 * Best effort: unknown secret formats pass through.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of API_KEY_PATTERNS) {
    pattern.lastIndex = 0
    result = result.replace(pattern, MASKED_VALUE)
  }
  return result
}

/**
 * Clone a plain-object tree with credential fields replaced by `***`.
 * Primitives are returned as-is.
 */
export function deepMask(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(deepMask)
  if (value !== null && typeof value === 'object') {
    const masked: Record<string, unknown> = {}
    for (const [k, v] of Object.entries(value)) {
      masked[k] = CREDENTIAL_FIELDS.has(k) && v !== undefined ? MASKED_VALUE : deepMask(v)
    }
    return masked
  }
  return value
}
