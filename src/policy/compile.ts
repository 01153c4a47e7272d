import type { z } from 'zod'
import type { IntegrityLabel } from '../labels/types.js'
import { parseIntegrity } from '../labels/format.js'
import type { ToolRuleDocument } from './schema.js'
import {
  CANONICAL_SCHEMA_VERSION,
  PolicyDocumentSchema,
  ToolRuleSchema,
} from './schema.js'
import type {
  ArgRule,
  CompiledPolicy,
  PolicyAction,
  SideEffectClass,
  ToolRuleEntry,
} from './types.js'
import { PolicyLoadError } from './types.js'
import { RuleTable } from './rule-table.js'

const ACTIONS = {
  Allow: 'allow',
  Deny: 'deny',
  RequireConfirmation: 'require_confirmation',
  RequireDraft: 'require_draft',
} as const satisfies Record<ToolRuleDocument['default_decision'], PolicyAction>

const SIDE_EFFECTS = {
  ExternalRead: 'external_read',
  ExternalWrite: 'external_write',
} as const satisfies Record<ToolRuleDocument['side_effect_class'], SideEffectClass>

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.join('.')
  return path ? `${path}: ${issue.message}` : issue.message
}

/**
 * Validate a policy document and resolve its tool rules into a lookup
 * table. Runs once per policy load; evaluation never re-parses rules.
 */
export function compilePolicy(raw: unknown): CompiledPolicy {
  if (
    isRecord(raw) &&
    typeof raw.schema_version === 'number' &&
    raw.schema_version !== CANONICAL_SCHEMA_VERSION
  ) {
    throw new PolicyLoadError(
      `Unsupported policy schema_version ${raw.schema_version}; only ${CANONICAL_SCHEMA_VERSION} is accepted`,
      'unsupported_schema_version',
      'schema_version'
    )
  }

  const parsed = PolicyDocumentSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new PolicyLoadError(
      `Invalid policy document: ${issue ? formatIssue(issue) : 'unknown issue'}`,
      'invalid_document',
      issue?.path.join('.')
    )
  }

  const document = parsed.data
  const rules = new Map<string, ToolRuleEntry>()
  const duplicates = new Set<string>()

  document.tools.forEach((entry, index) => {
    if (!isRecord(entry) || typeof entry.tool !== 'string' || entry.tool === '') {
      throw new PolicyLoadError(
        `Tool entry ${index} has no tool name`,
        'unnamed_tool_rule',
        `tools.${index}`
      )
    }

    const name = entry.tool
    if (rules.has(name)) {
      duplicates.add(name)
      return
    }
    rules.set(name, compileToolRule(name, entry))
  })

  // Two entries for one tool: neither is trusted
  for (const name of duplicates) {
    rules.set(name, { kind: 'malformed', tool: name, reason: 'Tool is listed more than once' })
  }

  const policy: CompiledPolicy = {
    name: document.policy_name,
    defaultAction: document.default_action === 'Allow' ? 'allow' : 'deny',
    strictMode: document.strict_mode,
    budgets: Object.freeze({
      maxValues: document.budgets.max_values,
      maxParentsPerValue: document.budgets.max_parents_per_value,
      maxClosureSteps: document.budgets.max_closure_steps,
      maxWitnessDepth: document.budgets.max_witness_depth,
    }),
    rules: new RuleTable(rules),
  }
  return Object.freeze(policy)
}

/**
 * Compile one tool entry. Anything wrong with it yields a malformed rule
 * rather than an error, so the rest of the policy stays usable.
 */
export function compileToolRule(name: string, entry: unknown): ToolRuleEntry {
  const parsed = ToolRuleSchema.safeParse(entry)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    return { kind: 'malformed', tool: name, reason: issue ? formatIssue(issue) : 'invalid rule' }
  }

  const rule = parsed.data

  if (rule.required_authority.some((resource) => resource.trim() === '')) {
    return { kind: 'malformed', tool: name, reason: 'required_authority lists a blank resource' }
  }

  const argRules: ArgRule[] = []
  const seenArgs = new Set<string>()
  for (const argRule of rule.arg_rules) {
    if (seenArgs.has(argRule.arg)) {
      return { kind: 'malformed', tool: name, reason: `Argument '${argRule.arg}' has more than one rule` }
    }
    seenArgs.add(argRule.arg)

    let requiresIntegrity: IntegrityLabel | undefined
    if (argRule.requires_integrity !== undefined) {
      const label = parseIntegrity(argRule.requires_integrity)
      if (!label) {
        return {
          kind: 'malformed',
          tool: name,
          reason: `Argument '${argRule.arg}' requires unknown integrity '${argRule.requires_integrity}'`,
        }
      }
      requiresIntegrity = label
    }

    argRules.push({
      argument: argRule.arg,
      requiresIntegrity,
      forbidsConfidentiality: [...new Set(argRule.forbids_confidentiality)],
    })
  }

  const denyIfPcIntegrityContains: IntegrityLabel[] = []
  for (const text of rule.context_rules?.deny_if_pc_integrity_contains ?? []) {
    const label = parseIntegrity(text)
    if (!label) {
      return { kind: 'malformed', tool: name, reason: `Context rule names unknown integrity '${text}'` }
    }
    denyIfPcIntegrityContains.push(label)
  }

  return {
    kind: 'rule',
    tool: name,
    sideEffectClass: SIDE_EFFECTS[rule.side_effect_class],
    requiredAuthority: [...new Set(rule.required_authority)],
    argRules,
    denyIfPcIntegrityContains,
    defaultDecision: ACTIONS[rule.default_decision],
  }
}
