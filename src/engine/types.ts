import type { IntegrityLabel } from '../labels/types.js'
import type { ValueId } from '../graph/types.js'
import type { SideEffectClass } from '../policy/types.js'

export type DenyReason =
  | 'untrusted_control_context'
  | 'missing_authority'
  | 'integrity_requirement_not_met'
  | 'confidentiality_forbidden'
  | 'budget_exceeded'
  | 'malformed_rule'
  | 'unknown_value'
  | 'default_action'
  | 'tool_default_deny'
  | 'evaluation_fault'

export interface DenyDecision {
  kind: 'deny'
  reason: DenyReason
  message: string
  /** Argument whose label failed a check */
  argument?: string
  /** Required scope resources no valid held token covers */
  missingAuthority?: string[]
}

export type Decision =
  | { kind: 'allow' }
  | { kind: 'require_confirmation' }
  | { kind: 'require_draft' }
  | DenyDecision

export type DecisionKind = Decision['kind']

/**
 * Which model context produced a call: the planner sees only labelled
 * handles, the quarantined model may read untrusted content.
 */
export type LlmCallPath = 'planner' | 'quarantined'

/**
 * Call-request event emitted by the host.
 */
export interface CallRequest {
  callId: string
  tool: string
  /** Argument name to the value bound to it */
  arguments: Record<string, ValueId>
  /** Integrity of the control decisions that led to this call */
  pcIntegrity: IntegrityLabel[]
  heldTokenIds: string[]
  /** When set, only tokens granted to this subject count */
  subject?: string
  /** Whether the host minimized and redacted the payload (write tools) */
  redactionApplied?: boolean
  callPath?: LlmCallPath
}

export interface WitnessNode {
  valueId: ValueId
  /** Operation that produced the value */
  kind: string
  /** The value's own integrity, in text form */
  integrity: string
  /** The value's own confidentiality tag names */
  confidentiality: string[]
  parents: WitnessNode[]
  /** Parents exist but were cut off at the depth budget */
  truncated?: true
  /** Already expanded elsewhere in this witness */
  repeated?: true
}

export interface WitnessArgument {
  argument: string
  valueId: ValueId
  /** Closure label of the argument; absent when the value is unknown */
  closure?: { integrity: string; confidentiality: string[] }
  node?: WitnessNode
}

/**
 * Redacted provenance trace for a non-allow decision. References values
 * by ID only.
 */
export interface Witness {
  arguments: WitnessArgument[]
  maxDepth: number
  /** True when any branch was cut off at the depth budget */
  truncated: boolean
}

/**
 * Per-call record handed to the audit pipeline. Carries confidentiality
 * tag names only.
 */
export interface SinkAuditRecord {
  executionId: string
  callId: string
  tool: string
  decision: DecisionKind
  denyReason?: DenyReason
  sideEffectClass?: SideEffectClass
  /** Present for write-class tools only */
  redactionApplied?: boolean
  /** Copied from the request when the host names one */
  callPath?: LlmCallPath
  argumentTags: Record<string, string[]>
}

export interface EvaluationResult {
  decision: Decision
  witness?: Witness
  audit: SinkAuditRecord
}
