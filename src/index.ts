export * from './labels/index.js'
export * from './graph/index.js'
export * from './authority/index.js'
export * from './policy/index.js'
export * from './engine/index.js'
export * from './audit/index.js'
export * from './config/index.js'

export {
  Mediator,
  decisionSeverity,
  openRuntime,
  startExecution,
  resumeExecution,
  type MediatorOptions,
  type MediatorRuntime,
  type RuntimeOptions,
  type ResumedExecution,
} from './mediator.js'
