function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced, not merged.
 * Undefined values in source are ignored.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target }

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) continue

    const targetValue = target[key]
    result[key] =
      isPlainObject(sourceValue) && isPlainObject(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue
  }

  return result
}

/**
 * Set a value at a dot-separated path in an object.
 * Creates intermediate objects as needed.
 */
export function setPath(
  obj: Record<string, unknown>,
  path: string,
  value: unknown
): void {
  const parts = path.split('.')
  let current = obj

  for (const part of parts.slice(0, -1)) {
    const next = current[part]
    if (isPlainObject(next)) {
      current = next
    } else {
      const created: Record<string, unknown> = {}
      current[part] = created
      current = created
    }
  }

  current[parts[parts.length - 1]] = value
}

/**
 * Get a value at a dot-separated path in an object.
 */
export function getPath(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj

  for (const part of path.split('.')) {
    if (!isPlainObject(current)) return undefined
    current = current[part]
  }

  return current
}
