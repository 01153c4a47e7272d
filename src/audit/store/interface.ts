import type { AuditEntry } from '../schema.js'
import type { AuditCategory, AuditSeverity } from '../types.js'

/**
 * Filter options for querying audit entries.
 */
export interface AuditFilter {
  since?: Date
  until?: Date
  category?: AuditCategory
  action?: string
  severity?: AuditSeverity
  executionId?: string
  limit?: number
}

/**
 * Interface for audit storage backends.
 */
export interface AuditStore {
  /**
   * Append an entry. Implementations sanitize before writing.
   */
  append(entry: AuditEntry): Promise<void>

  query(filter: AuditFilter): Promise<AuditEntry[]>
}

/**
 * Check if an entry matches a filter (limit is ignored).
 */
export function matchesFilter(entry: AuditEntry, filter: AuditFilter): boolean {
  if (filter.since && entry.timestamp < filter.since) return false
  if (filter.until && entry.timestamp > filter.until) return false
  if (filter.category && entry.category !== filter.category) return false
  if (filter.action && entry.action !== filter.action) return false
  if (filter.severity && entry.severity !== filter.severity) return false
  if (filter.executionId && entry.executionId !== filter.executionId) return false
  return true
}
