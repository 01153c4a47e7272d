import type { IntegrityLabel } from '../labels/types.js'

export type PolicyAction = 'allow' | 'deny' | 'require_confirmation' | 'require_draft'

export type SideEffectClass = 'external_read' | 'external_write'

export interface PolicyBudgets {
  maxValues: number
  maxParentsPerValue: number
  maxClosureSteps: number
  maxWitnessDepth: number
}

export interface ArgRule {
  argument: string
  requiresIntegrity?: IntegrityLabel
  forbidsConfidentiality: string[]
}

/**
 * A tool rule resolved at load time.
 */
export interface CompiledToolRule {
  kind: 'rule'
  tool: string
  sideEffectClass: SideEffectClass
  requiredAuthority: string[]
  argRules: ArgRule[]
  /** Empty when the rule declares no context rule */
  denyIfPcIntegrityContains: IntegrityLabel[]
  defaultDecision: PolicyAction
}

/**
 * A tool entry that could not be compiled. Every call to the tool is
 * denied.
 */
export interface MalformedToolRule {
  kind: 'malformed'
  tool: string
  reason: string
}

export type ToolRuleEntry = CompiledToolRule | MalformedToolRule

/**
 * Immutable policy consumed by evaluation.
 */
export interface CompiledPolicy {
  readonly name: string
  readonly defaultAction: 'allow' | 'deny'
  readonly strictMode: boolean
  readonly budgets: Readonly<PolicyBudgets>
  readonly rules: ReadonlyMap<string, ToolRuleEntry>
}

export type PolicyLoadErrorCode =
  | 'invalid_json'
  | 'invalid_document'
  | 'unsupported_schema_version'
  | 'unnamed_tool_rule'

/**
 * Error thrown when a policy document cannot be used at all.
 */
export class PolicyLoadError extends Error {
  constructor(
    message: string,
    public readonly code: PolicyLoadErrorCode,
    public readonly path?: string
  ) {
    super(message)
    this.name = 'PolicyLoadError'
  }
}
