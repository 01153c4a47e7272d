export type {
  TokenTimestamp,
  ValidityWindow,
  AuthorityToken,
  TokenStatus,
  MintRequest,
  DelegationRequest,
  DelegationErrorCode,
  DelegationError,
  DelegationResult,
  StrippedToken,
  RestoreValidation,
  AuthorityErrorCode,
} from './types.js'
export { AuthorityError } from './types.js'

export { type Clock, systemClock, ManualClock } from './clock.js'

export { AuthorityStore, type AuthorityStoreOptions } from './store.js'

export {
  serializeTokens,
  parseSnapshot,
  AuthoritySnapshotSchema,
  TokenRecordSchema,
  SNAPSHOT_VERSION,
  type AuthoritySnapshot,
  type TokenRecord,
} from './snapshot.js'

export { FileSnapshotStore, type SnapshotStore } from './file-store.js'
