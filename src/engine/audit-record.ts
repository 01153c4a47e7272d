import { confidentialityTagNames } from '../labels/format.js'
import type { ClosureEngine } from '../graph/closure.js'
import type { ToolRuleEntry } from '../policy/types.js'
import type { CallRequest, Decision, SinkAuditRecord } from './types.js'

/**
 * Build the audit record for one evaluated call.
 *
 * Argument closures come from the same engine the decision used, so the
 * record reflects exactly what was checked. A closure that could not be
 * computed is reported as `*`.
 */
export function buildSinkAuditRecord(
  executionId: string,
  request: CallRequest,
  decision: Decision,
  rule: ToolRuleEntry | undefined,
  closures: ClosureEngine
): SinkAuditRecord {
  const argumentTags: Record<string, string[]> = {}
  for (const [argument, valueId] of Object.entries(request.arguments)) {
    const result = closures.closureOf(valueId)
    argumentTags[argument] = result.success
      ? confidentialityTagNames(result.closure.confidentiality)
      : ['*']
  }

  return assembleRecord(executionId, request, decision, rule, argumentTags)
}

/**
 * Record for an evaluation that failed part-way. No closure is trusted, so
 * every argument is reported as `*`.
 */
export function buildFaultAuditRecord(
  executionId: string,
  request: CallRequest,
  decision: Decision,
  rule: ToolRuleEntry | undefined
): SinkAuditRecord {
  const argumentTags: Record<string, string[]> = {}
  for (const argument of Object.keys(request.arguments)) {
    argumentTags[argument] = ['*']
  }
  return assembleRecord(executionId, request, decision, rule, argumentTags)
}

function assembleRecord(
  executionId: string,
  request: CallRequest,
  decision: Decision,
  rule: ToolRuleEntry | undefined,
  argumentTags: Record<string, string[]>
): SinkAuditRecord {
  const record: SinkAuditRecord = {
    executionId,
    callId: request.callId,
    tool: request.tool,
    decision: decision.kind,
    argumentTags,
  }

  if (decision.kind === 'deny') {
    record.denyReason = decision.reason
  }

  if (rule?.kind === 'rule') {
    record.sideEffectClass = rule.sideEffectClass
    if (rule.sideEffectClass === 'external_write') {
      record.redactionApplied = request.redactionApplied ?? false
    }
  }

  if (request.callPath !== undefined) {
    record.callPath = request.callPath
  }

  return record
}
