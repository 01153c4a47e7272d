import { randomUUID } from 'crypto'
import type { Clock } from './clock.js'
import type {
  AuthorityToken,
  DelegationError,
  DelegationErrorCode,
  DelegationRequest,
  DelegationResult,
  MintRequest,
  RestoreValidation,
  StrippedToken,
  TokenStatus,
  TokenTimestamp,
  ValidityWindow,
} from './types.js'
import { AuthorityError } from './types.js'
import {
  isStrictSubset,
  isWellFormedScope,
  isWellFormedWindow,
  isNarrowerWindow,
  normalizeScope,
  windowStatus,
} from './scope.js'
import { parseSnapshot, serializeTokens } from './snapshot.js'

export interface AuthorityStoreOptions {
  clock: Clock
  /** Token ID source for requests that do not name one */
  generateId?: () => string
}

function freezeToken(token: AuthorityToken): AuthorityToken {
  return Object.freeze({
    ...token,
    scope: Object.freeze([...token.scope]),
    validity: Object.freeze({ ...token.validity }),
  })
}

/**
 * Owns every minted token, its delegation lineage and its revocation flag.
 *
 * Tokens are never deleted. Revocation replaces a token's record in one
 * map write, and validity is computed from the table on every call rather
 * than cached, so a reader sees a token either before or after a revoke.
 */
export class AuthorityStore {
  private readonly tokens: Map<string, AuthorityToken> = new Map()
  private readonly clock: Clock
  private readonly generateId: () => string

  constructor(options: AuthorityStoreOptions) {
    this.clock = options.clock
    this.generateId = options.generateId ?? randomUUID
  }

  /**
   * Restore a store from a serialized token table.
   */
  static fromSnapshot(json: string, options: AuthorityStoreOptions): AuthorityStore {
    const store = new AuthorityStore(options)
    for (const token of parseSnapshot(json)) {
      store.tokens.set(token.id, token)
    }
    return store
  }

  /**
   * Mint a root token. Minting is host-trusted and needs no authority of
   * its own; only malformed requests are refused.
   */
  mint(request: MintRequest): AuthorityToken {
    const id = request.id ?? this.generateId()
    this.assertNewId(id)

    if (request.issuer.trim() === '' || request.subject.trim() === '') {
      throw new AuthorityError('Issuer and subject must not be blank', 'malformed_request', id)
    }

    const scope = normalizeScope(request.scope)
    if (!isWellFormedScope(scope)) {
      throw new AuthorityError(
        'Scope must list at least one non-blank resource',
        'malformed_request',
        id
      )
    }

    const validity = this.resolveWindow(request.validity ?? {})
    if (!isWellFormedWindow(validity)) {
      throw new AuthorityError('Validity window is empty or invalid', 'malformed_request', id)
    }

    const token = freezeToken({
      id,
      issuer: request.issuer,
      subject: request.subject,
      scope,
      validity,
      revoked: false,
    })
    this.tokens.set(id, token)
    return token
  }

  /**
   * Derive a narrower token from a parent.
   *
   * Checks run in a fixed order: the parent's own standing (revoked, then
   * expired) is settled before the requested scope or lifetime is looked at.
   */
  delegate(parentId: string, request: DelegationRequest): DelegationResult {
    const parent = this.tokens.get(parentId)
    if (!parent) {
      return this.delegationFailure('unknown_parent', parentId, `Parent token ${parentId} does not exist`)
    }

    const now = this.clock.now()
    const parentStatus = this.validate(parentId, now)
    if (parentStatus === 'revoked') {
      return this.delegationFailure('parent_revoked', parentId, `Parent token ${parentId} is revoked`)
    }
    if (parentStatus !== 'valid') {
      return this.delegationFailure(
        'parent_expired',
        parentId,
        `Parent token ${parentId} is outside its validity window at ${now}`
      )
    }

    const scope = normalizeScope(request.scope)
    if (!isStrictSubset(scope, parent.scope)) {
      return this.delegationFailure(
        'scope_not_narrowed',
        parentId,
        'Delegated scope must be a strict, non-empty subset of the parent scope'
      )
    }

    const validity = this.resolveWindow(request.validity)
    if (!isWellFormedWindow(validity) || !isNarrowerWindow(parent.validity, validity)) {
      return this.delegationFailure(
        'lifetime_not_narrowed',
        parentId,
        'Delegated validity window must end strictly before the parent window and start within it'
      )
    }

    const id = request.id ?? this.generateId()
    this.assertNewId(id)

    const subject = request.subject ?? parent.subject
    const issuer = request.issuer ?? parent.issuer
    if (issuer.trim() === '' || subject.trim() === '') {
      throw new AuthorityError('Issuer and subject must not be blank', 'malformed_request', id)
    }

    const token = freezeToken({
      id,
      issuer,
      subject,
      scope,
      validity,
      parentId,
      revoked: false,
    })
    this.tokens.set(id, token)
    return { success: true, token }
  }

  /**
   * Revoke a token. Idempotent; returns true only when the flag flipped.
   * Descendants are not touched: they read as revoked through lineage.
   */
  revoke(tokenId: string): boolean {
    const token = this.tokens.get(tokenId)
    if (!token) {
      throw new AuthorityError(`Token ${tokenId} does not exist`, 'unknown_token', tokenId)
    }
    if (token.revoked) return false

    this.tokens.set(tokenId, Object.freeze({ ...token, revoked: true }))
    return true
  }

  /**
   * Status of a token at a point in time.
   *
   * Revocation is checked along the whole delegation chain. Only the
   * token's own window is checked: delegation already confined it to every
   * ancestor's window.
   */
  validate(tokenId: string, at: TokenTimestamp = this.clock.now()): TokenStatus {
    const token = this.tokens.get(tokenId)
    if (!token) return 'unknown'

    let current: AuthorityToken | undefined = token
    while (current) {
      if (current.revoked) return 'revoked'
      if (current.parentId === undefined) break

      current = this.tokens.get(current.parentId)
      if (!current) return 'unknown'
    }

    return windowStatus(token.validity, at)
  }

  /**
   * Re-check held tokens after state was reconstructed from a snapshot.
   * Anything not valid at restore time is stripped, whatever its status
   * was when the snapshot was taken.
   */
  revalidateOnRestore(
    tokenIds: Iterable<string>,
    at: TokenTimestamp = this.clock.now()
  ): RestoreValidation {
    const effective: AuthorityToken[] = []
    const stripped: StrippedToken[] = []

    for (const tokenId of new Set(tokenIds)) {
      const status = this.validate(tokenId, at)
      const token = this.tokens.get(tokenId)
      if (status === 'valid' && token) {
        effective.push(token)
      } else {
        stripped.push({ tokenId, status: status === 'valid' ? 'unknown' : status })
      }
    }

    return { effective, stripped }
  }

  get(tokenId: string): AuthorityToken | undefined {
    return this.tokens.get(tokenId)
  }

  list(): AuthorityToken[] {
    return [...this.tokens.values()]
  }

  /**
   * Token IDs from `tokenId` up to its root.
   */
  lineage(tokenId: string): string[] {
    const chain: string[] = []
    let current = this.tokens.get(tokenId)
    while (current) {
      chain.push(current.id)
      current = current.parentId === undefined ? undefined : this.tokens.get(current.parentId)
    }
    return chain
  }

  toSnapshot(): string {
    return serializeTokens(this.tokens.values())
  }

  private resolveWindow(window: Partial<ValidityWindow>): ValidityWindow {
    const notBefore = window.notBefore ?? this.clock.now()
    return window.expiresAt === undefined
      ? { notBefore }
      : { notBefore, expiresAt: window.expiresAt }
  }

  private assertNewId(id: string): void {
    if (id.trim() === '') {
      throw new AuthorityError('Token ID must not be blank', 'malformed_request')
    }
    if (this.tokens.has(id)) {
      throw new AuthorityError(`Token ${id} already exists`, 'duplicate_token', id)
    }
  }

  private delegationFailure(
    code: DelegationErrorCode,
    parentId: string,
    message: string
  ): DelegationResult {
    const error: DelegationError = { code, parentId, message }
    return { success: false, error }
  }
}
