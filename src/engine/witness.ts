import { confidentialityTagNames, formatIntegrity } from '../labels/format.js'
import { worstCaseLabel } from '../labels/lattice.js'
import type { ClosureEngine } from '../graph/closure.js'
import type { ValueId } from '../graph/types.js'
import type { ValueGraph } from '../graph/value-graph.js'
import type { Witness, WitnessArgument, WitnessNode } from './types.js'

export interface WitnessRoot {
  argument: string
  valueId: ValueId
}

interface PendingVisit {
  valueId: ValueId
  depth: number
  /** Array the built node is appended to */
  into: WitnessNode[]
}

/**
 * Build the provenance trace for the given arguments.
 *
 * Each value is expanded at most once; later sightings are marked
 * `repeated`. Nodes at `maxDepth` that still have parents are marked
 * `truncated` instead of being silently cut. The walk keeps its own stack,
 * so chain length is bounded by `maxDepth` alone.
 */
export function buildWitness(
  graph: ValueGraph,
  closures: ClosureEngine,
  roots: WitnessRoot[],
  maxDepth: number
): Witness {
  const expanded = new Set<ValueId>()
  let truncated = false

  const walk = (rootId: ValueId): WitnessNode | undefined => {
    const top: WitnessNode[] = []
    const stack: PendingVisit[] = [{ valueId: rootId, depth: 0, into: top }]

    while (stack.length > 0) {
      const pending = stack.pop()
      if (!pending) break

      const value = graph.get(pending.valueId)
      if (!value) continue

      const node: WitnessNode = {
        valueId: pending.valueId,
        kind: value.kind,
        integrity: formatIntegrity(value.label.integrity),
        confidentiality: confidentialityTagNames(value.label.confidentiality),
        parents: [],
      }
      pending.into.push(node)

      if (expanded.has(pending.valueId)) {
        node.repeated = true
        continue
      }
      expanded.add(pending.valueId)

      if (value.parents.length === 0) continue

      if (pending.depth >= maxDepth) {
        node.truncated = true
        truncated = true
        continue
      }

      // Reversed so parents are expanded, and listed, in declaration order
      for (let i = value.parents.length - 1; i >= 0; i--) {
        stack.push({ valueId: value.parents[i], depth: pending.depth + 1, into: node.parents })
      }
    }

    return top[0]
  }

  const witnessArguments = roots.map((root): WitnessArgument => {
    const result = closures.closureOf(root.valueId)
    const node = walk(root.valueId)
    if (!node) {
      return { argument: root.argument, valueId: root.valueId }
    }

    const closure = result.success ? result.closure : worstCaseLabel()
    return {
      argument: root.argument,
      valueId: root.valueId,
      closure: {
        integrity: formatIntegrity(closure.integrity),
        confidentiality: confidentialityTagNames(closure.confidentiality),
      },
      node,
    }
  })

  return { arguments: witnessArguments, maxDepth, truncated }
}
