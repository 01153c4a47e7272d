import type { ValueLabel } from '../labels/types.js'

export type ValueId = number

/**
 * A runtime value as tracked by the graph. Never holds the value itself.
 */
export interface ValueNode {
  readonly id: ValueId
  readonly label: Readonly<ValueLabel>
  /** Parent IDs in the order the dependency edges were created */
  readonly parents: readonly ValueId[]
  /** Operation that produced the value, e.g. `literal` or `tool:search` */
  readonly kind: string
}

/**
 * Value-creation event emitted by the host.
 */
export interface ValueCreatedEvent {
  valueId: ValueId
  label: ValueLabel
  parentIds: ValueId[]
  kind?: string
}

export interface GraphBudgets {
  maxValues: number
  maxParentsPerValue: number
}

export type ValueGraphErrorCode =
  | 'value_budget_exceeded'
  | 'parent_budget_exceeded'
  | 'unknown_parent'
  | 'duplicate_parent'
  | 'non_monotonic_id'
  | 'forged_verified_label'

/**
 * Error thrown to the host when a value cannot be added to the graph.
 */
export class ValueGraphError extends Error {
  constructor(
    message: string,
    public readonly code: ValueGraphErrorCode,
    public readonly valueId?: ValueId
  ) {
    super(message)
    this.name = 'ValueGraphError'
  }
}
