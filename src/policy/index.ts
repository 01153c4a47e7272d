export {
  PolicyDocumentSchema,
  ToolRuleSchema,
  ArgRuleSchema,
  ContextRulesSchema,
  PolicyBudgetsSchema,
  CANONICAL_SCHEMA_VERSION,
  type PolicyDocument,
  type ToolRuleDocument,
  type ArgRuleDocument,
} from './schema.js'

export type {
  PolicyAction,
  SideEffectClass,
  PolicyBudgets,
  ArgRule,
  CompiledToolRule,
  MalformedToolRule,
  ToolRuleEntry,
  CompiledPolicy,
  PolicyLoadErrorCode,
} from './types.js'
export { PolicyLoadError } from './types.js'

export { compilePolicy, compileToolRule } from './compile.js'
export { RuleTable } from './rule-table.js'
export { parsePolicyJson, loadPolicyFile } from './loader.js'
