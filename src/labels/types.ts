/**
 * Integrity label - how much to trust a value's origin.
 *
 * Ordering: untrusted < trusted. A verified label is incomparable with
 * both and only ever satisfies a requirement for the same tag.
 */
export type IntegrityLabel =
  | { readonly kind: 'untrusted' }
  | { readonly kind: 'trusted' }
  | { readonly kind: 'verified'; readonly tag: string }

/**
 * Confidentiality label - the sensitivity tags a value carries.
 *
 * `universal` is the worst-case label: it stands for every tag at once and
 * is only produced by fail-closed substitution.
 */
export interface ConfidentialityLabel {
  readonly tags: ReadonlySet<string>
  readonly universal: boolean
}

/**
 * Label owned by a single value.
 */
export interface ValueLabel {
  integrity: IntegrityLabel
  confidentiality: ConfidentialityLabel
}

/**
 * Join of a value's own label with every ancestor label.
 */
export type LabelClosure = ValueLabel

export const UNTRUSTED: IntegrityLabel = Object.freeze({ kind: 'untrusted' })
export const TRUSTED: IntegrityLabel = Object.freeze({ kind: 'trusted' })
