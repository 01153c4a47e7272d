import type { IntegrityLabel } from './types.js'

/**
 * Host-registered predicate that decides whether a runtime value earns a
 * verified label for one tag.
 */
export type VerifierFn = (candidate: unknown) => boolean

// Verified labels handed out by a registry. The value graph rejects any
// verified label that is not in here.
const mintedVerifiedLabels = new WeakSet<IntegrityLabel>()

/**
 * Check if a label is a verified label minted by a registered verifier.
 */
export function isMintedVerifiedLabel(label: IntegrityLabel): boolean {
  return mintedVerifiedLabels.has(label)
}

/**
 * Registry of verifier functions, one per tag.
 *
 * This is the only place a `Verified(tag)` value label can come from.
 */
export class VerifierRegistry {
  private readonly verifiers: Map<string, VerifierFn> = new Map()

  /**
   * Register the verifier for a tag. A tag can only be registered once.
   */
  register(tag: string, verifier: VerifierFn): void {
    if (tag.trim() === '' || /[()]/.test(tag)) {
      throw new Error(`Invalid verifier tag '${tag}'`)
    }
    if (this.verifiers.has(tag)) {
      throw new Error(`Verifier for '${tag}' is already registered`)
    }
    this.verifiers.set(tag, verifier)
  }

  has(tag: string): boolean {
    return this.verifiers.has(tag)
  }

  /**
   * Run the verifier for `tag` over a candidate value.
   * Returns the verified label, or null if the candidate fails or no
   * verifier is registered for the tag.
   */
  verify(tag: string, candidate: unknown): IntegrityLabel | null {
    const verifier = this.verifiers.get(tag)
    if (!verifier || !verifier(candidate)) {
      return null
    }

    const label: IntegrityLabel = Object.freeze({ kind: 'verified', tag })
    mintedVerifiedLabels.add(label)
    return label
  }
}
