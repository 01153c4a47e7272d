import { z } from 'zod'

/**
 * Audit entry schema.
 *
 * The timestamp is coerced so entries read back from JSON get a Date again.
 */
export const AuditEntrySchema = z.object({
  id: z.string(),
  timestamp: z.coerce.date(),
  category: z.enum(['decision', 'authority', 'policy', 'restore', 'sink']),
  action: z.string(),
  severity: z.enum(['debug', 'info', 'warning', 'alert', 'critical']),
  executionId: z.string().optional(),
  callId: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
})

export type AuditEntry = z.infer<typeof AuditEntrySchema>
