import type { LlmCallPath, SinkAuditRecord } from './types.js'

/**
 * Outbound model call about to be dispatched.
 */
export interface SinkPreDispatchRequest {
  executionId: string
  callId: string
  callPath: LlmCallPath
  redactionApplied: boolean
}

export type PreDispatchDecision = 'allow' | 'deny'

/**
 * Check run by the transport layer right before bytes leave the process.
 */
export interface TransportGuardCheck {
  executionId: string
  callId: string
  redactionApplied: boolean
}

export type TransportGuardOutcome = 'passed' | 'blocked'

export interface LlmSinkAuditRecord {
  executionId: string
  callId: string
  callPath: LlmCallPath
  decision: PreDispatchDecision
  redactionApplied: boolean
}

/**
 * Refuse to dispatch a payload the host has not minimized and redacted.
 * Applies to both call paths alike.
 */
export function evaluatePreDispatch(request: SinkPreDispatchRequest): PreDispatchDecision {
  return request.redactionApplied ? 'allow' : 'deny'
}

/**
 * Second gate at the transport boundary, independent of the first.
 */
export function evaluateTransportGuard(check: TransportGuardCheck): TransportGuardOutcome {
  return check.redactionApplied ? 'passed' : 'blocked'
}

export function buildLlmSinkAuditRecord(
  request: SinkPreDispatchRequest,
  decision: PreDispatchDecision
): LlmSinkAuditRecord {
  return {
    executionId: request.executionId,
    callId: request.callId,
    callPath: request.callPath,
    decision,
    redactionApplied: request.redactionApplied,
  }
}

/**
 * Transport check for an evaluated call. Only write-class calls carry a
 * redaction flag; others return `null`.
 */
export function transportCheckFor(audit: SinkAuditRecord): TransportGuardCheck | null {
  if (audit.redactionApplied === undefined) return null
  return {
    executionId: audit.executionId,
    callId: audit.callId,
    redactionApplied: audit.redactionApplied,
  }
}
