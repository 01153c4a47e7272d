/**
 * Audit event categories.
 */
export type AuditCategory =
  | 'decision' // Evaluated tool calls
  | 'authority' // Mint, delegate, revoke
  | 'policy' // Policy loads
  | 'restore' // Snapshot save and restore
  | 'sink' // Pre-dispatch and transport checks on outbound payloads

/**
 * Audit event severity levels, lowest first.
 */
export type AuditSeverity = 'debug' | 'info' | 'warning' | 'alert' | 'critical'

export const SEVERITY_ORDER: Record<AuditSeverity, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  alert: 3,
  critical: 4,
}

// NOTE: AuditEntry is defined in schema.ts
