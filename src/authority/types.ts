/**
 * Milliseconds in the clock domain of the injected `Clock`.
 */
export type TokenTimestamp = number

/**
 * Validity window of a token. No `expiresAt` means the token never expires.
 * Expiry is inclusive: the token is expired at `expiresAt` itself.
 */
export interface ValidityWindow {
  notBefore: TokenTimestamp
  expiresAt?: TokenTimestamp
}

/**
 * Revocable, delegatable capability grant.
 *
 * Records are immutable; revoking a token replaces its record.
 */
export interface AuthorityToken {
  readonly id: string
  /** Who minted or delegated the token (audit provenance only) */
  readonly issuer: string
  readonly subject: string
  /** Ordered, de-duplicated scope resources */
  readonly scope: readonly string[]
  readonly validity: Readonly<ValidityWindow>
  readonly parentId?: string
  readonly revoked: boolean
}

/**
 * Token status at a point in time. `not_yet_valid` is a token whose window
 * has not opened. `unknown` is returned for IDs the store never minted and
 * is treated like any other invalid status.
 */
export type TokenStatus = 'valid' | 'revoked' | 'expired' | 'not_yet_valid' | 'unknown'

export interface MintRequest {
  id?: string
  issuer: string
  subject: string
  scope: string[]
  validity?: Partial<ValidityWindow>
}

export interface DelegationRequest {
  id?: string
  scope: string[]
  validity: Partial<ValidityWindow>
  /** Defaults to the parent's subject */
  subject?: string
  /** Defaults to the parent's issuer */
  issuer?: string
}

export type DelegationErrorCode =
  | 'unknown_parent'
  | 'parent_revoked'
  | 'parent_expired'
  | 'scope_not_narrowed'
  | 'lifetime_not_narrowed'

export interface DelegationError {
  code: DelegationErrorCode
  parentId: string
  message: string
}

export type DelegationResult =
  | { success: true; token: AuthorityToken }
  | { success: false; error: DelegationError }

/**
 * A token dropped while revalidating after restore.
 */
export interface StrippedToken {
  tokenId: string
  status: Exclude<TokenStatus, 'valid'>
}

export interface RestoreValidation {
  effective: AuthorityToken[]
  stripped: StrippedToken[]
}

export type AuthorityErrorCode =
  | 'malformed_request'
  | 'duplicate_token'
  | 'unknown_token'
  | 'invalid_snapshot'

export class AuthorityError extends Error {
  constructor(
    message: string,
    public readonly code: AuthorityErrorCode,
    public readonly tokenId?: string
  ) {
    super(message)
    this.name = 'AuthorityError'
  }
}
