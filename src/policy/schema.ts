import { z } from 'zod'

export const CANONICAL_SCHEMA_VERSION = 1

const BudgetLimitSchema = z.number().int().positive()

export const PolicyBudgetsSchema = z
  .object({
    max_values: BudgetLimitSchema,
    max_parents_per_value: BudgetLimitSchema,
    max_closure_steps: BudgetLimitSchema,
    max_witness_depth: BudgetLimitSchema,
  })
  .strict()

export const ArgRuleSchema = z
  .object({
    arg: z.string().min(1),
    requires_integrity: z.string().optional(),
    forbids_confidentiality: z.array(z.string().min(1)).default([]),
  })
  .strict()

export const ContextRulesSchema = z
  .object({
    deny_if_pc_integrity_contains: z.array(z.string()).default([]),
  })
  .strict()

export const ToolRuleSchema = z
  .object({
    tool: z.string().min(1),
    side_effect_class: z.enum(['ExternalRead', 'ExternalWrite']),
    required_authority: z.array(z.string()).default([]),
    arg_rules: z.array(ArgRuleSchema).default([]),
    context_rules: ContextRulesSchema.optional(),
    default_decision: z.enum(['Allow', 'Deny', 'RequireConfirmation', 'RequireDraft']),
  })
  .strict()

/**
 * Top-level policy document. Tool entries are left unparsed here and
 * validated one by one, so a single broken entry only disables its own tool.
 */
export const PolicyDocumentSchema = z
  .object({
    schema_version: z.literal(CANONICAL_SCHEMA_VERSION),
    policy_name: z.string().min(1),
    default_action: z.enum(['Allow', 'Deny']),
    strict_mode: z.boolean(),
    budgets: PolicyBudgetsSchema,
    tools: z.array(z.unknown()),
  })
  .strict()

export type PolicyDocument = z.infer<typeof PolicyDocumentSchema>
export type ToolRuleDocument = z.infer<typeof ToolRuleSchema>
export type ArgRuleDocument = z.infer<typeof ArgRuleSchema>
