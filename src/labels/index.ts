export type {
  IntegrityLabel,
  ConfidentialityLabel,
  ValueLabel,
  LabelClosure,
} from './types.js'

export { UNTRUSTED, TRUSTED } from './types.js'

export {
  integrityEquals,
  joinIntegrity,
  satisfiesIntegrity,
  confidentiality,
  UNIVERSAL_CONFIDENTIALITY,
  joinConfidentiality,
  forbiddenTagsPresent,
  joinLabels,
  worstCaseLabel,
} from './lattice.js'

export {
  formatIntegrity,
  parseIntegrity,
  confidentialityTagNames,
} from './format.js'

export {
  VerifierRegistry,
  isMintedVerifiedLabel,
  type VerifierFn,
} from './verifier.js'
