import { z } from 'zod'
import type { AuthorityToken } from './types.js'
import { AuthorityError } from './types.js'
import {
  isNarrowerWindow,
  isStrictSubset,
  isWellFormedScope,
  isWellFormedWindow,
} from './scope.js'

export const SNAPSHOT_VERSION = 1

const TimestampSchema = z.number().int().nonnegative()

/**
 * Persisted token row. Absent optional fields are stored as null so the
 * serialized form has one shape.
 */
export const TokenRecordSchema = z
  .object({
    id: z.string().min(1),
    issuer: z.string().min(1),
    subject: z.string().min(1),
    scope: z.array(z.string().min(1)).min(1),
    validity: z
      .object({
        notBefore: TimestampSchema,
        expiresAt: TimestampSchema.nullable(),
      })
      .strict(),
    parentId: z.string().min(1).nullable(),
    revoked: z.boolean(),
  })
  .strict()

export const AuthoritySnapshotSchema = z
  .object({
    version: z.literal(SNAPSHOT_VERSION),
    tokens: z.array(TokenRecordSchema),
  })
  .strict()

export type TokenRecord = z.infer<typeof TokenRecordSchema>
export type AuthoritySnapshot = z.infer<typeof AuthoritySnapshotSchema>

function toRecord(token: AuthorityToken): TokenRecord {
  // Key order here is the on-disk order
  return {
    id: token.id,
    issuer: token.issuer,
    subject: token.subject,
    scope: [...token.scope],
    validity: {
      notBefore: token.validity.notBefore,
      expiresAt: token.validity.expiresAt ?? null,
    },
    parentId: token.parentId ?? null,
    revoked: token.revoked,
  }
}

function fromRecord(record: TokenRecord): AuthorityToken {
  const validity =
    record.validity.expiresAt === null
      ? { notBefore: record.validity.notBefore }
      : { notBefore: record.validity.notBefore, expiresAt: record.validity.expiresAt }

  return Object.freeze({
    id: record.id,
    issuer: record.issuer,
    subject: record.subject,
    scope: Object.freeze([...record.scope]),
    validity: Object.freeze(validity),
    ...(record.parentId === null ? {} : { parentId: record.parentId }),
    revoked: record.revoked,
  })
}

/**
 * Serialize a token table. Tokens keep their minting order, so a parent
 * always precedes its children.
 */
export function serializeTokens(tokens: Iterable<AuthorityToken>): string {
  const snapshot: AuthoritySnapshot = {
    version: SNAPSHOT_VERSION,
    tokens: Array.from(tokens, toRecord),
  }
  return JSON.stringify(snapshot)
}

/**
 * Parse and check a serialized token table.
 *
 * Beyond the schema, the delegation invariants are checked again: every
 * parent must precede its child, scopes must strictly narrow and a child
 * window must close strictly before its parent's. A snapshot that breaks any of them is rejected as a
 * whole.
 */
export function parseSnapshot(json: string): AuthorityToken[] {
  let raw: unknown
  try {
    raw = JSON.parse(json)
  } catch (error) {
    throw new AuthorityError(
      `Snapshot is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      'invalid_snapshot'
    )
  }

  const parsed = AuthoritySnapshotSchema.safeParse(raw)
  if (!parsed.success) {
    throw new AuthorityError(
      `Snapshot does not match schema: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
      'invalid_snapshot'
    )
  }

  const seen = new Map<string, AuthorityToken>()
  for (const record of parsed.data.tokens) {
    const token = fromRecord(record)

    if (seen.has(token.id)) {
      throw new AuthorityError(`Duplicate token ${token.id} in snapshot`, 'invalid_snapshot', token.id)
    }
    if (!isWellFormedScope(token.scope) || new Set(token.scope).size !== token.scope.length) {
      throw new AuthorityError(`Token ${token.id} has a malformed scope`, 'invalid_snapshot', token.id)
    }
    if (!isWellFormedWindow(token.validity)) {
      throw new AuthorityError(`Token ${token.id} has an empty validity window`, 'invalid_snapshot', token.id)
    }

    if (token.parentId !== undefined) {
      const parent = seen.get(token.parentId)
      if (!parent) {
        throw new AuthorityError(
          `Token ${token.id} references parent ${token.parentId} that does not precede it`,
          'invalid_snapshot',
          token.id
        )
      }
      if (!isStrictSubset(token.scope, parent.scope) || !isNarrowerWindow(parent.validity, token.validity)) {
        throw new AuthorityError(
          `Token ${token.id} is not narrower than its parent ${parent.id}`,
          'invalid_snapshot',
          token.id
        )
      }
    }

    seen.set(token.id, token)
  }

  return [...seen.values()]
}
