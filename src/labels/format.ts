import type { ConfidentialityLabel, IntegrityLabel } from './types.js'
import { TRUSTED, UNTRUSTED } from './types.js'

const VERIFIED_PATTERN = /^Verified\(([^()]+)\)$/

/**
 * Render an integrity label in its text form: `Untrusted`, `Trusted` or
 * `Verified(<tag>)`.
 */
export function formatIntegrity(label: IntegrityLabel): string {
  switch (label.kind) {
    case 'untrusted':
      return 'Untrusted'
    case 'trusted':
      return 'Trusted'
    case 'verified':
      return `Verified(${label.tag})`
  }
}

/**
 * Parse the text form of an integrity label.
 * Returns null for anything that is not exactly one of the three forms.
 *
 * A parsed verified label is a requirement, not a value label: the value
 * graph only accepts verified labels minted by a registered verifier.
 */
export function parseIntegrity(text: string): IntegrityLabel | null {
  if (text === 'Untrusted') return UNTRUSTED
  if (text === 'Trusted') return TRUSTED

  const match = VERIFIED_PATTERN.exec(text)
  if (!match || match[1].trim() !== match[1]) return null
  return { kind: 'verified', tag: match[1] }
}

/**
 * Tag names of a confidentiality label, sorted. The universal label is
 * rendered as a single `*`.
 */
export function confidentialityTagNames(label: ConfidentialityLabel): string[] {
  if (label.universal) return ['*']
  return [...label.tags].sort()
}
