import type { LabelClosure } from '../labels/types.js'
import { joinLabels } from '../labels/lattice.js'
import type { ValueId } from './types.js'
import type { ValueGraph } from './value-graph.js'

export type ClosureErrorCode = 'budget_exceeded' | 'unknown_value'

export interface ClosureError {
  code: ClosureErrorCode
  valueId: ValueId
  message: string
}

export type ClosureResult =
  | { success: true; closure: LabelClosure; steps: number }
  | { success: false; error: ClosureError }

/**
 * Computes label closures over a value graph.
 *
 * One engine lives for one evaluation call: results are memoised per value
 * for that call only, so a graph that grows between calls is never read
 * through a stale cache.
 */
export class ClosureEngine {
  private readonly memo: Map<ValueId, ClosureResult> = new Map()

  constructor(
    private readonly graph: ValueGraph,
    private readonly maxClosureSteps: number
  ) {}

  /**
   * Join of the value's own label with every ancestor label.
   *
   * Breadth-first over parent edges. Each distinct value counts as one
   * step; the step budget is checked before every visit, and running out
   * is a failure, never a partial result.
   */
  closureOf(valueId: ValueId): ClosureResult {
    const cached = this.memo.get(valueId)
    if (cached) return cached

    const result = this.compute(valueId)
    this.memo.set(valueId, result)
    return result
  }

  private compute(valueId: ValueId): ClosureResult {
    const root = this.graph.get(valueId)
    if (!root) {
      return {
        success: false,
        error: {
          code: 'unknown_value',
          valueId,
          message: `Value ${valueId} does not exist`,
        },
      }
    }

    const queue = [root]
    const visited = new Set<ValueId>([root.id])
    let closure: LabelClosure = root.label
    let steps = 0

    for (let head = 0; head < queue.length; head++) {
      if (steps >= this.maxClosureSteps) {
        return {
          success: false,
          error: {
            code: 'budget_exceeded',
            valueId,
            message: `Closure of value ${valueId} needs more than ${this.maxClosureSteps} steps`,
          },
        }
      }
      steps++

      const node = queue[head]
      closure = joinLabels(closure, node.label)

      for (const parentId of node.parents) {
        if (visited.has(parentId)) continue
        visited.add(parentId)

        const parent = this.graph.get(parentId)
        if (!parent) {
          return {
            success: false,
            error: {
              code: 'unknown_value',
              valueId: parentId,
              message: `Ancestor ${parentId} of value ${valueId} does not exist`,
            },
          }
        }
        queue.push(parent)
      }
    }

    return { success: true, closure, steps }
  }
}
