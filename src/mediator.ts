import type { AuditSeverity } from './audit/types.js'
import { AuditLogger } from './audit/service.js'
import type { AuditStore } from './audit/store/interface.js'
import { JsonlAuditStore } from './audit/store/jsonl.js'
import { MemoryAuditStore } from './audit/store/memory.js'
import type { AppConfig } from './config/schema.js'
import { AuthorityStore } from './authority/store.js'
import { systemClock, type Clock } from './authority/clock.js'
import { FileSnapshotStore, type SnapshotStore } from './authority/file-store.js'
import {
  AuthorityError,
  type AuthorityToken,
  type DelegationRequest,
  type DelegationResult,
  type MintRequest,
  type RestoreValidation,
} from './authority/types.js'
import { loadPolicyFile } from './policy/loader.js'
import type { CompiledPolicy } from './policy/types.js'
import { Execution, restoreExecution } from './engine/execution.js'
import type { CallRequest, Decision, EvaluationResult } from './engine/types.js'
import {
  buildLlmSinkAuditRecord,
  evaluatePreDispatch,
  evaluateTransportGuard,
  type LlmSinkAuditRecord,
  type SinkPreDispatchRequest,
  type TransportGuardCheck,
  type TransportGuardOutcome,
} from './engine/sink.js'

export interface MediatorOptions {
  audit: AuditLogger
  snapshots: SnapshotStore
  /** Subject filter for calls that carry none */
  defaultSubject?: string
}

/**
 * Severity an evaluated call is logged at.
 */
export function decisionSeverity(decision: Decision): AuditSeverity {
  switch (decision.kind) {
    case 'allow':
      return 'info'
    case 'require_confirmation':
    case 'require_draft':
      return 'warning'
    case 'deny':
      return decision.reason === 'budget_exceeded' || decision.reason === 'evaluation_fault'
        ? 'critical'
        : 'alert'
  }
}

/**
 * Front door for a host: evaluates calls against one execution and records
 * every decision and authority change in the audit log.
 */
export class Mediator {
  readonly execution: Execution
  private readonly audit: AuditLogger
  private readonly snapshots: SnapshotStore
  private readonly defaultSubject?: string

  constructor(execution: Execution, options: MediatorOptions) {
    this.execution = execution
    this.audit = options.audit
    this.snapshots = options.snapshots
    this.defaultSubject = options.defaultSubject
  }

  get executionId(): string {
    return this.execution.executionId
  }

  async mediate(request: CallRequest): Promise<EvaluationResult> {
    const effective: CallRequest =
      request.subject === undefined && this.defaultSubject !== undefined
        ? { ...request, subject: this.defaultSubject }
        : request
    const result = this.execution.evaluate(effective)
    const { decision, audit } = result

    await this.audit.log({
      category: 'decision',
      action: decision.kind,
      severity: decisionSeverity(decision),
      executionId: audit.executionId,
      callId: audit.callId,
      metadata: {
        tool: audit.tool,
        denyReason: audit.denyReason,
        message: decision.kind === 'deny' ? decision.message : undefined,
        sideEffectClass: audit.sideEffectClass,
        redactionApplied: audit.redactionApplied,
        callPath: audit.callPath,
        argumentTags: audit.argumentTags,
      },
    })
    return result
  }

  /**
   * Gate an outbound model call on its redaction flag.
   */
  async preDispatch(
    request: Omit<SinkPreDispatchRequest, 'executionId'>
  ): Promise<LlmSinkAuditRecord> {
    const full: SinkPreDispatchRequest = { ...request, executionId: this.executionId }
    const record = buildLlmSinkAuditRecord(full, evaluatePreDispatch(full))

    await this.audit.log({
      category: 'sink',
      action: `pre_dispatch_${record.decision}`,
      severity: record.decision === 'allow' ? 'info' : 'alert',
      executionId: record.executionId,
      callId: record.callId,
      metadata: { callPath: record.callPath, redactionApplied: record.redactionApplied },
    })
    return record
  }

  async guardTransport(check: Omit<TransportGuardCheck, 'executionId'>): Promise<TransportGuardOutcome> {
    const outcome = evaluateTransportGuard({ ...check, executionId: this.executionId })

    await this.audit.log({
      category: 'sink',
      action: `transport_${outcome}`,
      severity: outcome === 'passed' ? 'info' : 'alert',
      executionId: this.executionId,
      callId: check.callId,
      metadata: { redactionApplied: check.redactionApplied },
    })
    return outcome
  }

  async mint(request: MintRequest): Promise<AuthorityToken> {
    const token = this.execution.authority.mint(request)
    await this.logAuthority('token_minted', 'info', token.id, {
      issuer: token.issuer,
      subject: token.subject,
      scope: token.scope,
    })
    return token
  }

  async delegate(parentId: string, request: DelegationRequest): Promise<DelegationResult> {
    const result = this.execution.authority.delegate(parentId, request)
    if (result.success) {
      await this.logAuthority('token_delegated', 'info', result.token.id, {
        parentId,
        subject: result.token.subject,
        scope: result.token.scope,
      })
    } else {
      await this.logAuthority('delegation_refused', 'warning', parentId, {
        code: result.error.code,
        errorMessage: result.error.message,
      })
    }
    return result
  }

  async revoke(tokenId: string): Promise<boolean> {
    const changed = this.execution.authority.revoke(tokenId)
    await this.logAuthority(changed ? 'token_revoked' : 'token_already_revoked', 'info', tokenId, {})
    return changed
  }

  /**
   * Persist the authority snapshot of this execution.
   */
  async suspend(): Promise<void> {
    await this.snapshots.save(this.executionId, this.execution.snapshot())
    await this.audit.log({
      category: 'restore',
      action: 'snapshot_saved',
      executionId: this.executionId,
      metadata: { tokenCount: this.execution.authority.list().length },
    })
  }

  private async logAuthority(
    action: string,
    severity: AuditSeverity,
    tokenId: string,
    metadata: Record<string, unknown>
  ): Promise<void> {
    await this.audit.log({
      category: 'authority',
      action,
      severity,
      executionId: this.executionId,
      metadata: { tokenId, ...metadata },
    })
  }
}

export interface MediatorRuntime {
  policy: CompiledPolicy
  audit: AuditLogger
  snapshots: SnapshotStore
  clock: Clock
  defaultSubject?: string
}

export interface RuntimeOptions {
  clock?: Clock
  /** Replaces the store the config selects */
  auditStore?: AuditStore
}

/**
 * Load the policy and open the stores a configuration names.
 */
export async function openRuntime(
  config: AppConfig,
  options: RuntimeOptions = {}
): Promise<MediatorRuntime> {
  const store =
    options.auditStore ??
    (config.audit.enabled ? new JsonlAuditStore(config.audit.dir) : new MemoryAuditStore())
  const audit = new AuditLogger(store, { minSeverity: config.audit.level })

  const policy = await loadPolicyFile(config.policy.path)
  await audit.info('policy', 'policy_loaded', {
    policyName: policy.name,
    path: config.policy.path,
    toolCount: policy.rules.size,
    malformedTools: [...policy.rules.values()]
      .filter((entry) => entry.kind === 'malformed')
      .map((entry) => entry.tool),
  })

  return {
    policy,
    audit,
    snapshots: new FileSnapshotStore(config.snapshots.dir),
    clock: options.clock ?? systemClock,
    defaultSubject: config.evaluation.defaultSubject,
  }
}

/**
 * Start a fresh execution with an empty authority store.
 */
export function startExecution(
  runtime: MediatorRuntime,
  executionId: string,
  generateId?: () => string
): Mediator {
  const execution = new Execution({
    executionId,
    policy: runtime.policy,
    authority: new AuthorityStore({ clock: runtime.clock, generateId }),
    clock: runtime.clock,
  })
  return new Mediator(execution, {
    audit: runtime.audit,
    snapshots: runtime.snapshots,
    defaultSubject: runtime.defaultSubject,
  })
}

export interface ResumedExecution {
  mediator: Mediator
  held: RestoreValidation
}

/**
 * Resume a suspended execution from its saved snapshot. Held tokens that
 * were revoked or expired in the meantime are stripped and logged.
 */
export async function resumeExecution(
  runtime: MediatorRuntime,
  executionId: string,
  heldTokenIds: string[]
): Promise<ResumedExecution> {
  const snapshot = await runtime.snapshots.load(executionId)
  if (snapshot === null) {
    throw new AuthorityError(`No snapshot saved for execution ${executionId}`, 'invalid_snapshot')
  }

  const { execution, held } = restoreExecution({
    executionId,
    policy: runtime.policy,
    snapshot,
    heldTokenIds,
    clock: runtime.clock,
  })

  await runtime.audit.log({
    category: 'restore',
    action: 'execution_restored',
    severity: held.stripped.length > 0 ? 'warning' : 'info',
    executionId,
    metadata: {
      effective: held.effective.map((token) => token.id),
      stripped: held.stripped.map((s) => ({ tokenId: s.tokenId, status: s.status })),
    },
  })

  return {
    mediator: new Mediator(execution, {
      audit: runtime.audit,
      snapshots: runtime.snapshots,
      defaultSubject: runtime.defaultSubject,
    }),
    held,
  }
}
