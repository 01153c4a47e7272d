import type {
  ConfidentialityLabel,
  IntegrityLabel,
  LabelClosure,
  ValueLabel,
} from './types.js'
import { UNTRUSTED } from './types.js'

/**
 * Check if two integrity labels are the same lattice element.
 */
export function integrityEquals(a: IntegrityLabel, b: IntegrityLabel): boolean {
  if (a.kind === 'verified' && b.kind === 'verified') {
    return a.tag === b.tag
  }
  return a.kind === b.kind
}

/**
 * Join two integrity labels toward the weaker value.
 *
 * Any disagreement collapses to untrusted: a verified fact does not
 * launder a co-dependency that is merely trusted.
 */
export function joinIntegrity(a: IntegrityLabel, b: IntegrityLabel): IntegrityLabel {
  return integrityEquals(a, b) ? a : UNTRUSTED
}

/**
 * Check if an actual integrity label meets a required one.
 *
 * - untrusted is met by anything
 * - trusted is met only by trusted
 * - verified(tag) is met only by verified(tag)
 */
export function satisfiesIntegrity(
  actual: IntegrityLabel,
  required: IntegrityLabel
): boolean {
  if (required.kind === 'untrusted') return true
  return integrityEquals(actual, required)
}

export function confidentiality(tags: Iterable<string> = []): ConfidentialityLabel {
  return { tags: new Set(tags), universal: false }
}

export const UNIVERSAL_CONFIDENTIALITY: ConfidentialityLabel = Object.freeze({
  tags: new Set<string>(),
  universal: true,
})

/**
 * Union of two confidentiality labels.
 */
export function joinConfidentiality(
  a: ConfidentialityLabel,
  b: ConfidentialityLabel
): ConfidentialityLabel {
  if (a.universal) return a
  if (b.universal) return b
  if (b.tags.size === 0) return a
  if (a.tags.size === 0) return b
  return { tags: new Set([...a.tags, ...b.tags]), universal: false }
}

/**
 * Tags from `forbidden` that the label carries. A universal label carries
 * all of them.
 */
export function forbiddenTagsPresent(
  label: ConfidentialityLabel,
  forbidden: readonly string[]
): string[] {
  if (label.universal) return [...forbidden]
  return forbidden.filter((tag) => label.tags.has(tag))
}

export function joinLabels(a: ValueLabel, b: ValueLabel): LabelClosure {
  return {
    integrity: joinIntegrity(a.integrity, b.integrity),
    confidentiality: joinConfidentiality(a.confidentiality, b.confidentiality),
  }
}

/**
 * The label substituted for any closure that could not be computed.
 */
export function worstCaseLabel(): LabelClosure {
  return {
    integrity: UNTRUSTED,
    confidentiality: UNIVERSAL_CONFIDENTIALITY,
  }
}
