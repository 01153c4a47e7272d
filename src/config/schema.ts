import { z } from 'zod'

export const PolicyConfigSchema = z.object({
  path: z.string().min(1),
})

export const SnapshotConfigSchema = z.object({
  dir: z.string().min(1),
})

export const AuditConfigSchema = z.object({
  enabled: z.boolean().default(true),
  dir: z.string().min(1),
  level: z.enum(['debug', 'info', 'warning', 'alert', 'critical']).default('info'),
})

export const EvaluationConfigSchema = z.object({
  // Subject filter applied to calls that name none
  defaultSubject: z.string().min(1).optional(),
})

// Full application configuration
export const AppConfigSchema = z.object({
  version: z.literal(1).default(1),
  policy: PolicyConfigSchema,
  snapshots: SnapshotConfigSchema,
  audit: AuditConfigSchema,
  evaluation: EvaluationConfigSchema.default({}),
})

export type AppConfig = z.infer<typeof AppConfigSchema>
export type PolicyConfig = z.infer<typeof PolicyConfigSchema>
export type SnapshotConfig = z.infer<typeof SnapshotConfigSchema>
export type AuditConfig = z.infer<typeof AuditConfigSchema>
export type EvaluationConfig = z.infer<typeof EvaluationConfigSchema>
