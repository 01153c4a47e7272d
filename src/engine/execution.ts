import type { ValueLabel } from '../labels/types.js'
import { ValueGraph } from '../graph/value-graph.js'
import type { ValueCreatedEvent, ValueId, ValueNode } from '../graph/types.js'
import { AuthorityStore } from '../authority/store.js'
import type { Clock } from '../authority/clock.js'
import type { RestoreValidation } from '../authority/types.js'
import type { CompiledPolicy } from '../policy/types.js'
import type { CallRequest, EvaluationResult } from './types.js'
import { evaluate, type EvaluationContext } from './cascade.js'

export interface ExecutionOptions {
  executionId: string
  policy: CompiledPolicy
  authority: AuthorityStore
  clock: Clock
}

/**
 * State of one agent execution: its value graph, the authority store it
 * evaluates against and the policy it runs under.
 */
export class Execution implements EvaluationContext {
  readonly executionId: string
  readonly policy: CompiledPolicy
  readonly graph: ValueGraph
  readonly authority: AuthorityStore
  readonly clock: Clock

  constructor(options: ExecutionOptions) {
    this.executionId = options.executionId
    this.policy = options.policy
    this.authority = options.authority
    this.clock = options.clock
    this.graph = new ValueGraph({
      maxValues: options.policy.budgets.maxValues,
      maxParentsPerValue: options.policy.budgets.maxParentsPerValue,
    })
  }

  createValue(label: ValueLabel, parentIds: ValueId[] = [], kind?: string): ValueNode {
    return this.graph.create(label, parentIds, kind)
  }

  recordValue(event: ValueCreatedEvent): ValueNode {
    return this.graph.record(event)
  }

  evaluate(request: CallRequest): EvaluationResult {
    return evaluate(request, this)
  }

  /**
   * Serialized authority state. The value graph is not part of it: the
   * host rebuilds it by replay.
   */
  snapshot(): string {
    return this.authority.toSnapshot()
  }
}

export interface RestoreOptions {
  executionId: string
  policy: CompiledPolicy
  snapshot: string
  /** Tokens the execution held when it was suspended */
  heldTokenIds: string[]
  clock: Clock
  generateId?: () => string
}

export interface RestoredExecution {
  execution: Execution
  /** Held tokens still valid at restore time, and the ones stripped */
  held: RestoreValidation
}

/**
 * Rebuild an execution from an authority snapshot and revalidate the
 * tokens it held. Tokens revoked or expired while suspended are stripped.
 */
export function restoreExecution(options: RestoreOptions): RestoredExecution {
  const authority = AuthorityStore.fromSnapshot(options.snapshot, {
    clock: options.clock,
    generateId: options.generateId,
  })
  const execution = new Execution({
    executionId: options.executionId,
    policy: options.policy,
    authority,
    clock: options.clock,
  })

  return {
    execution,
    held: authority.revalidateOnRestore(options.heldTokenIds, options.clock.now()),
  }
}
