import { randomUUID } from 'crypto'
import type { AuditEntry } from './schema.js'
import type { AuditCategory, AuditSeverity } from './types.js'
import { SEVERITY_ORDER } from './types.js'
import type { AuditStore, AuditFilter } from './store/interface.js'

/**
 * Options for creating an audit entry.
 */
export interface AuditOptions {
  category: AuditCategory
  action: string
  severity?: AuditSeverity
  executionId?: string
  callId?: string
  metadata?: Record<string, unknown>
}

export interface AuditLoggerOptions {
  /** Entries below this severity are dropped. Defaults to 'debug'. */
  minSeverity?: AuditSeverity
  /** Timestamp source, for tests. */
  now?: () => Date
}

/**
 * Audit logger service.
 *
 * Entries are sanitized by the store before they are written.
 */
export class AuditLogger {
  private readonly store: AuditStore
  private readonly minSeverity: AuditSeverity
  private readonly now: () => Date

  constructor(store: AuditStore, options: AuditLoggerOptions = {}) {
    this.store = store
    this.minSeverity = options.minSeverity ?? 'debug'
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Log an audit entry. Returns false when the entry was below the
   * configured severity.
   */
  async log(options: AuditOptions): Promise<boolean> {
    const severity = options.severity ?? 'info'
    if (SEVERITY_ORDER[severity] < SEVERITY_ORDER[this.minSeverity]) {
      return false
    }

    const entry: AuditEntry = {
      id: randomUUID(),
      timestamp: this.now(),
      category: options.category,
      action: options.action,
      severity,
      executionId: options.executionId,
      callId: options.callId,
      metadata: options.metadata,
    }

    await this.store.append(entry)
    return true
  }

  async debug(
    category: AuditCategory,
    action: string,
    metadata?: Record<string, unknown>
  ): Promise<boolean> {
    return this.log({ category, action, severity: 'debug', metadata })
  }

  async info(
    category: AuditCategory,
    action: string,
    metadata?: Record<string, unknown>
  ): Promise<boolean> {
    return this.log({ category, action, severity: 'info', metadata })
  }

  async warning(
    category: AuditCategory,
    action: string,
    metadata?: Record<string, unknown>
  ): Promise<boolean> {
    return this.log({ category, action, severity: 'warning', metadata })
  }

  async alert(
    category: AuditCategory,
    action: string,
    metadata?: Record<string, unknown>
  ): Promise<boolean> {
    return this.log({ category, action, severity: 'alert', metadata })
  }

  async critical(
    category: AuditCategory,
    action: string,
    metadata?: Record<string, unknown>
  ): Promise<boolean> {
    return this.log({ category, action, severity: 'critical', metadata })
  }

  async query(filter: AuditFilter): Promise<AuditEntry[]> {
    return this.store.query(filter)
  }
}
