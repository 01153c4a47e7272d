import { setPath } from './merge.js'

const ENV_PREFIX = 'FLOWGUARD_'

// Reserved environment variables (not parsed into config)
const RESERVED_ENV_VARS = new Set(['FLOWGUARD_HOME'])

/**
 * Parse environment variables into a partial config object.
 *
 * Double underscore separates path segments, single underscores inside a
 * segment become camelCase:
 * - FLOWGUARD_AUDIT__LEVEL -> audit.level
 * - FLOWGUARD_EVALUATION__DEFAULT_SUBJECT -> evaluation.defaultSubject
 */
export function parseEnvConfig(
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  const config: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX)) continue
    if (value === undefined) continue
    if (RESERVED_ENV_VARS.has(key)) continue

    const path = envKeyToPath(key.slice(ENV_PREFIX.length))
    if (path) {
      setPath(config, path, parseValue(value))
    }
  }

  return config
}

/**
 * Convert the part of a variable name after the prefix to a config path.
 */
export function envKeyToPath(key: string): string | null {
  const segments = key.split('__').map(toCamelCase)
  if (segments.some((segment) => segment.length === 0)) return null
  return segments.join('.')
}

function toCamelCase(segment: string): string {
  return segment
    .toLowerCase()
    .split('_')
    .filter((word) => word.length > 0)
    .map((word, i) => (i === 0 ? word : word[0].toUpperCase() + word.slice(1)))
    .join('')
}

/**
 * Parse a string value to its appropriate type.
 */
export function parseValue(value: string): unknown {
  if (value === 'true') return true
  if (value === 'false') return false

  if (/^-?\d+$/.test(value)) return parseInt(value, 10)
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value)

  if (value.startsWith('[') || value.startsWith('{')) {
    try {
      return JSON.parse(value)
    } catch {
      // Not JSON after all; keep the raw string
      return value
    }
  }

  return value
}
