import type { AuditEntry } from '../schema.js'
import { sanitizeAuditEntry } from '../redaction.js'
import type { AuditFilter, AuditStore } from './interface.js'
import { matchesFilter } from './interface.js'

/**
 * In-process audit store. Used when audit persistence is disabled and in
 * tests.
 */
export class MemoryAuditStore implements AuditStore {
  private readonly entries: AuditEntry[] = []

  async append(entry: AuditEntry): Promise<void> {
    this.entries.push(sanitizeAuditEntry(entry))
  }

  async query(filter: AuditFilter): Promise<AuditEntry[]> {
    const matching = this.entries.filter((entry) => matchesFilter(entry, filter))
    return filter.limit ? matching.slice(0, filter.limit) : matching
  }
}
