export type {
  DenyReason,
  DenyDecision,
  Decision,
  DecisionKind,
  LlmCallPath,
  CallRequest,
  WitnessNode,
  WitnessArgument,
  Witness,
  SinkAuditRecord,
  EvaluationResult,
} from './types.js'

export { evaluate, type EvaluationContext } from './cascade.js'
export { buildWitness, type WitnessRoot } from './witness.js'
export { buildSinkAuditRecord, buildFaultAuditRecord } from './audit-record.js'
export {
  evaluatePreDispatch,
  evaluateTransportGuard,
  buildLlmSinkAuditRecord,
  transportCheckFor,
  type SinkPreDispatchRequest,
  type PreDispatchDecision,
  type TransportGuardCheck,
  type TransportGuardOutcome,
  type LlmSinkAuditRecord,
} from './sink.js'
export {
  Execution,
  restoreExecution,
  type ExecutionOptions,
  type RestoreOptions,
  type RestoredExecution,
} from './execution.js'
