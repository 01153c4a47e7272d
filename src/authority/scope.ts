import type { ValidityWindow } from './types.js'

/**
 * De-duplicate scope resources, keeping first-seen order.
 */
export function normalizeScope(scope: readonly string[]): string[] {
  return [...new Set(scope)]
}

export function isWellFormedScope(scope: readonly string[]): boolean {
  return scope.length > 0 && scope.every((resource) => resource.trim() !== '')
}

/**
 * Check if `child` is a non-empty strict subset of `parent`.
 */
export function isStrictSubset(
  child: readonly string[],
  parent: readonly string[]
): boolean {
  const parentSet = new Set(parent)
  const childSet = new Set(child)
  if (childSet.size === 0 || childSet.size >= parentSet.size) return false
  for (const resource of childSet) {
    if (!parentSet.has(resource)) return false
  }
  return true
}

function isTimestamp(value: number | undefined): boolean {
  return value === undefined || (Number.isSafeInteger(value) && value >= 0)
}

/**
 * A window is well formed when its bounds are non-negative integers and it
 * is not empty.
 */
export function isWellFormedWindow(window: ValidityWindow): boolean {
  if (!isTimestamp(window.notBefore) || !isTimestamp(window.expiresAt)) {
    return false
  }
  return window.expiresAt === undefined || window.expiresAt > window.notBefore
}

/**
 * Check if `inner` is strictly narrower than `outer`: it starts no earlier
 * and expires strictly before it. An open-ended `inner` is never narrower.
 */
export function isNarrowerWindow(outer: ValidityWindow, inner: ValidityWindow): boolean {
  if (inner.expiresAt === undefined) return false
  if (inner.notBefore < outer.notBefore) return false
  return outer.expiresAt === undefined || inner.expiresAt < outer.expiresAt
}

/**
 * Where `at` falls relative to a window. Expiry is checked first and is
 * inclusive.
 */
export function windowStatus(
  window: ValidityWindow,
  at: number
): 'valid' | 'expired' | 'not_yet_valid' {
  if (window.expiresAt !== undefined && at >= window.expiresAt) return 'expired'
  if (at < window.notBefore) return 'not_yet_valid'
  return 'valid'
}
