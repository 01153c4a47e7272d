import type { ValueLabel } from '../labels/types.js'
import { isMintedVerifiedLabel } from '../labels/verifier.js'
import type {
  GraphBudgets,
  ValueCreatedEvent,
  ValueId,
  ValueNode,
} from './types.js'
import { ValueGraphError } from './types.js'

/**
 * Bounded, append-only dependency graph of runtime values.
 *
 * Single writer per execution. Edges never change once written, so closure
 * reads against a growing graph are safe.
 */
export class ValueGraph {
  private readonly nodes: Map<ValueId, ValueNode> = new Map()
  private lastId = 0

  constructor(private readonly budgets: GraphBudgets) {}

  /**
   * Create a value with the next ID.
   */
  create(label: ValueLabel, parentIds: ValueId[] = [], kind = 'literal'): ValueNode {
    return this.insert(this.lastId + 1, label, parentIds, kind)
  }

  /**
   * Record a value whose ID was assigned by the host.
   */
  record(event: ValueCreatedEvent): ValueNode {
    return this.insert(event.valueId, event.label, event.parentIds, event.kind ?? 'literal')
  }

  get(id: ValueId): ValueNode | undefined {
    return this.nodes.get(id)
  }

  has(id: ValueId): boolean {
    return this.nodes.has(id)
  }

  get size(): number {
    return this.nodes.size
  }

  /**
   * Discard every value. IDs start over afterwards.
   */
  reset(): void {
    this.nodes.clear()
    this.lastId = 0
  }

  private insert(
    id: ValueId,
    label: ValueLabel,
    parentIds: ValueId[],
    kind: string
  ): ValueNode {
    if (!Number.isSafeInteger(id) || id <= this.lastId) {
      throw new ValueGraphError(
        `Value ID ${id} must be an integer greater than ${this.lastId}`,
        'non_monotonic_id',
        id
      )
    }

    if (this.nodes.size >= this.budgets.maxValues) {
      throw new ValueGraphError(
        `Value budget of ${this.budgets.maxValues} exhausted`,
        'value_budget_exceeded',
        id
      )
    }

    if (parentIds.length > this.budgets.maxParentsPerValue) {
      throw new ValueGraphError(
        `Value ${id} lists ${parentIds.length} parents, limit is ${this.budgets.maxParentsPerValue}`,
        'parent_budget_exceeded',
        id
      )
    }

    const seen = new Set<ValueId>()
    for (const parentId of parentIds) {
      // Parents must already exist, which rules out cycles
      if (!this.nodes.has(parentId)) {
        throw new ValueGraphError(
          `Value ${id} lists unknown parent ${parentId}`,
          'unknown_parent',
          id
        )
      }
      if (seen.has(parentId)) {
        throw new ValueGraphError(
          `Value ${id} lists parent ${parentId} twice`,
          'duplicate_parent',
          id
        )
      }
      seen.add(parentId)
    }

    if (label.integrity.kind === 'verified' && !isMintedVerifiedLabel(label.integrity)) {
      throw new ValueGraphError(
        `Value ${id} carries a verified label that no registered verifier minted`,
        'forged_verified_label',
        id
      )
    }

    const node: ValueNode = Object.freeze({
      id,
      label: Object.freeze({
        integrity: label.integrity,
        confidentiality: Object.freeze({
          tags: new Set(label.confidentiality.tags),
          universal: label.confidentiality.universal,
        }),
      }),
      parents: Object.freeze([...parentIds]),
      kind,
    })

    this.nodes.set(id, node)
    this.lastId = id
    return node
  }
}
