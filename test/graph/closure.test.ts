import { describe, it, expect } from 'vitest'
import { ValueGraph } from '../../src/graph/value-graph.js'
import { ClosureEngine } from '../../src/graph/closure.js'
import { confidentiality } from '../../src/labels/lattice.js'
import { TRUSTED, UNTRUSTED, type ValueLabel } from '../../src/labels/types.js'

const label = (integrity: ValueLabel['integrity'], tags: string[] = []): ValueLabel => ({
  integrity,
  confidentiality: confidentiality(tags),
})

function chain(graph: ValueGraph, length: number): number {
  let id = graph.create(label(TRUSTED)).id
  for (let i = 1; i < length; i++) {
    id = graph.create(label(TRUSTED), [id]).id
  }
  return id
}

describe('ClosureEngine', () => {
  it('joins labels of every ancestor', () => {
    const graph = new ValueGraph({ maxValues: 10, maxParentsPerValue: 4 })
    const email = graph.create(label(UNTRUSTED, ['pii']))
    const notes = graph.create(label(TRUSTED, ['secret']))
    const summary = graph.create(label(TRUSTED), [email.id, notes.id])

    const result = new ClosureEngine(graph, 100).closureOf(summary.id)
    if (!result.success) throw new Error(result.error.message)

    expect(result.closure.integrity).toEqual(UNTRUSTED)
    expect([...result.closure.confidentiality.tags].sort()).toEqual(['pii', 'secret'])
    expect(result.steps).toBe(3)
  })

  it('counts a shared ancestor once', () => {
    const graph = new ValueGraph({ maxValues: 10, maxParentsPerValue: 4 })
    const root = graph.create(label(TRUSTED))
    const left = graph.create(label(TRUSTED), [root.id])
    const right = graph.create(label(TRUSTED), [root.id])
    const top = graph.create(label(TRUSTED), [left.id, right.id])

    const result = new ClosureEngine(graph, 4).closureOf(top.id)
    expect(result.success && result.steps).toBe(4)
  })

  it('succeeds when the closure uses exactly the budget', () => {
    const graph = new ValueGraph({ maxValues: 10, maxParentsPerValue: 4 })
    const tip = chain(graph, 3)

    expect(new ClosureEngine(graph, 3).closureOf(tip).success).toBe(true)
  })

  it('fails when the closure needs more steps than the budget', () => {
    const graph = new ValueGraph({ maxValues: 10, maxParentsPerValue: 4 })
    const tip = chain(graph, 4)

    const result = new ClosureEngine(graph, 3).closureOf(tip)
    expect(result).toEqual({
      success: false,
      error: {
        code: 'budget_exceeded',
        valueId: 4,
        message: 'Closure of value 4 needs more than 3 steps',
      },
    })
  })

  it('reports unknown values', () => {
    const graph = new ValueGraph({ maxValues: 10, maxParentsPerValue: 4 })
    const result = new ClosureEngine(graph, 10).closureOf(42)

    expect(result.success).toBe(false)
    expect(!result.success && result.error.code).toBe('unknown_value')
  })

  it('memoises results within one engine', () => {
    const graph = new ValueGraph({ maxValues: 10, maxParentsPerValue: 4 })
    const tip = chain(graph, 2)
    const engine = new ClosureEngine(graph, 10)

    expect(engine.closureOf(tip)).toBe(engine.closureOf(tip))
  })

  it('does not let a trusted ancestor raise an untrusted value', () => {
    const graph = new ValueGraph({ maxValues: 10, maxParentsPerValue: 4 })
    const root = graph.create(label(UNTRUSTED))
    const child = graph.create(label(TRUSTED), [root.id])
    const grandchild = graph.create(label(TRUSTED), [child.id])

    const engine = new ClosureEngine(graph, 10)
    for (const id of [root.id, child.id, grandchild.id]) {
      const result = engine.closureOf(id)
      expect(result.success && result.closure.integrity).toEqual(UNTRUSTED)
    }
  })
})
