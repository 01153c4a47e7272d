export type {
  ValueId,
  ValueNode,
  ValueCreatedEvent,
  GraphBudgets,
  ValueGraphErrorCode,
} from './types.js'
export { ValueGraphError } from './types.js'

export { ValueGraph } from './value-graph.js'

export {
  ClosureEngine,
  type ClosureError,
  type ClosureErrorCode,
  type ClosureResult,
} from './closure.js'
