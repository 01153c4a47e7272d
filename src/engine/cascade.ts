import type { IntegrityLabel } from '../labels/types.js'
import { formatIntegrity } from '../labels/format.js'
import {
  forbiddenTagsPresent,
  integrityEquals,
  satisfiesIntegrity,
} from '../labels/lattice.js'
import { ClosureEngine, type ClosureResult } from '../graph/closure.js'
import type { ValueGraph } from '../graph/value-graph.js'
import type { ValueId } from '../graph/types.js'
import type { AuthorityStore } from '../authority/store.js'
import type { Clock } from '../authority/clock.js'
import type { CompiledPolicy, CompiledToolRule, ToolRuleEntry } from '../policy/types.js'
import type {
  CallRequest,
  Decision,
  DenyDecision,
  DenyReason,
  EvaluationResult,
} from './types.js'
import { buildWitness, type WitnessRoot } from './witness.js'
import { buildFaultAuditRecord, buildSinkAuditRecord } from './audit-record.js'

/**
 * Everything one evaluation reads. The authority store is passed by
 * handle; nothing here is process-wide state.
 */
export interface EvaluationContext {
  executionId: string
  policy: CompiledPolicy
  graph: ValueGraph
  authority: AuthorityStore
  clock: Clock
}

interface CascadeOutcome {
  decision: Decision
  /** Arguments the witness is rooted at */
  roots: WitnessRoot[]
}

function deny(
  reason: DenyReason,
  message: string,
  extra: Partial<Pick<DenyDecision, 'argument' | 'missingAuthority'>> = {}
): Decision {
  return { kind: 'deny', reason, message, ...extra }
}

function allArguments(request: CallRequest): WitnessRoot[] {
  return Object.entries(request.arguments).map(([argument, valueId]) => ({ argument, valueId }))
}

/**
 * Evaluate one tool-call request.
 *
 * Synchronous, no I/O. Any exception raised while deciding, or while
 * building the witness and audit record, is turned into a deny with an
 * empty witness, so a call is never left without a decision.
 */
export function evaluate(request: CallRequest, context: EvaluationContext): EvaluationResult {
  const { maxClosureSteps, maxWitnessDepth } = context.policy.budgets
  const rule = context.policy.rules.get(request.tool)

  try {
    const closures = new ClosureEngine(context.graph, maxClosureSteps)
    const { decision, roots } = runCascade(request, context, rule, closures)
    const witness =
      decision.kind === 'allow'
        ? undefined
        : buildWitness(context.graph, closures, roots, maxWitnessDepth)

    return {
      decision,
      witness,
      audit: buildSinkAuditRecord(context.executionId, request, decision, rule, closures),
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    const decision = deny('evaluation_fault', `Evaluation failed: ${message}`)
    return {
      decision,
      witness: { arguments: [], maxDepth: maxWitnessDepth, truncated: false },
      audit: buildFaultAuditRecord(context.executionId, request, decision, rule),
    }
  }
}

function runCascade(
  request: CallRequest,
  context: EvaluationContext,
  entry: ToolRuleEntry | undefined,
  closures: ClosureEngine
): CascadeOutcome {
  const { policy } = context

  if (!entry) {
    if (policy.defaultAction === 'allow') {
      return { decision: { kind: 'allow' }, roots: [] }
    }
    return {
      decision: deny('default_action', `Tool '${request.tool}' is not listed and the default action is deny`),
      roots: allArguments(request),
    }
  }

  if (entry.kind === 'malformed') {
    return {
      decision: deny('malformed_rule', `Rule for '${entry.tool}' is malformed: ${entry.reason}`),
      roots: [],
    }
  }

  const missingArgument = entry.argRules.find((argRule) => !Object.hasOwn(request.arguments, argRule.argument))
  if (missingArgument) {
    return {
      decision: deny(
        'malformed_rule',
        `Rule for '${entry.tool}' targets argument '${missingArgument.argument}' that the call does not carry`
      ),
      roots: [],
    }
  }

  const checks = [checkContext, checkAuthority, checkIntegrity, checkConfidentiality]
  for (const check of checks) {
    const denial = check(request, context, entry, closures)
    if (denial) return denial
  }

  return { decision: defaultDecision(entry), roots: allArguments(request) }
}

type CascadeCheck = (
  request: CallRequest,
  context: EvaluationContext,
  rule: CompiledToolRule,
  closures: ClosureEngine
) => CascadeOutcome | null

const checkContext: CascadeCheck = (request, context, rule) => {
  if (!context.policy.strictMode || rule.denyIfPcIntegrityContains.length === 0) {
    return null
  }

  const hit = request.pcIntegrity.find((pc: IntegrityLabel) =>
    rule.denyIfPcIntegrityContains.some((listed) => integrityEquals(listed, pc))
  )
  if (!hit) return null

  return {
    decision: deny(
      'untrusted_control_context',
      `Control context carries ${formatIntegrity(hit)}, which '${rule.tool}' refuses`
    ),
    roots: [],
  }
}

const checkAuthority: CascadeCheck = (request, context, rule) => {
  if (rule.requiredAuthority.length === 0) return null

  // Read once: every token in this call is judged at the same instant
  const now = context.clock.now()
  const covered = new Set<string>()
  for (const tokenId of request.heldTokenIds) {
    if (context.authority.validate(tokenId, now) !== 'valid') continue

    const token = context.authority.get(tokenId)
    if (!token) continue
    if (request.subject !== undefined && token.subject !== request.subject) continue

    for (const resource of token.scope) covered.add(resource)
  }

  const missing = rule.requiredAuthority.filter((resource) => !covered.has(resource))
  if (missing.length === 0) return null

  return {
    decision: deny(
      'missing_authority',
      `No valid held token covers ${missing.join(', ')}`,
      { missingAuthority: missing }
    ),
    roots: [],
  }
}

function closureFailure(
  argument: string,
  valueId: ValueId,
  result: ClosureResult
): CascadeOutcome | null {
  if (result.success) return null

  const reason: DenyReason =
    result.error.code === 'budget_exceeded' ? 'budget_exceeded' : 'unknown_value'
  return {
    decision: deny(reason, `Argument '${argument}': ${result.error.message}`, { argument }),
    roots: [{ argument, valueId }],
  }
}

const checkIntegrity: CascadeCheck = (request, _context, rule, closures) => {
  for (const argRule of rule.argRules) {
    const required = argRule.requiresIntegrity
    if (!required) continue

    const valueId = request.arguments[argRule.argument]
    const result = closures.closureOf(valueId)
    const failure = closureFailure(argRule.argument, valueId, result)
    if (failure) return failure
    if (!result.success) continue

    if (!satisfiesIntegrity(result.closure.integrity, required)) {
      return {
        decision: deny(
          'integrity_requirement_not_met',
          `Argument '${argRule.argument}' has integrity ${formatIntegrity(result.closure.integrity)}, ${formatIntegrity(required)} is required`,
          { argument: argRule.argument }
        ),
        roots: [{ argument: argRule.argument, valueId }],
      }
    }
  }
  return null
}

const checkConfidentiality: CascadeCheck = (request, _context, rule, closures) => {
  for (const argRule of rule.argRules) {
    if (argRule.forbidsConfidentiality.length === 0) continue

    const valueId = request.arguments[argRule.argument]
    const result = closures.closureOf(valueId)
    const failure = closureFailure(argRule.argument, valueId, result)
    if (failure) return failure
    if (!result.success) continue

    const present = forbiddenTagsPresent(result.closure.confidentiality, argRule.forbidsConfidentiality)
    if (present.length > 0) {
      return {
        decision: deny(
          'confidentiality_forbidden',
          `Argument '${argRule.argument}' carries forbidden tags: ${present.join(', ')}`,
          { argument: argRule.argument }
        ),
        roots: [{ argument: argRule.argument, valueId }],
      }
    }
  }
  return null
}

function defaultDecision(rule: CompiledToolRule): Decision {
  switch (rule.defaultDecision) {
    case 'allow':
      return { kind: 'allow' }
    case 'require_confirmation':
      return { kind: 'require_confirmation' }
    case 'require_draft':
      return { kind: 'require_draft' }
    case 'deny':
      return deny('tool_default_deny', `Rule for '${rule.tool}' denies by default`)
  }
}
