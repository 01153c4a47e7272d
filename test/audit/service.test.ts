import { describe, it, expect, beforeEach, vi } from 'vitest'
import { AuditLogger } from '../../src/audit/service.js'
import type { AuditStore } from '../../src/audit/store/interface.js'
import type { AuditEntry } from '../../src/audit/schema.js'

describe('AuditLogger', () => {
  let mockStore: AuditStore
  let appendedEntries: AuditEntry[]

  beforeEach(() => {
    appendedEntries = []
    mockStore = {
      append: vi.fn(async (entry: AuditEntry) => {
        appendedEntries.push(entry)
      }),
      query: vi.fn(async () => appendedEntries),
    }
  })

  describe('log', () => {
    it('creates entry with required fields', async () => {
      const logger = new AuditLogger(mockStore)

      await logger.log({ category: 'decision', action: 'allow' })

      expect(appendedEntries.length).toBe(1)
      expect(appendedEntries[0].id).toBeTruthy()
      expect(appendedEntries[0].timestamp).toBeInstanceOf(Date)
      expect(appendedEntries[0].category).toBe('decision')
      expect(appendedEntries[0].action).toBe('allow')
      expect(appendedEntries[0].severity).toBe('info') // default
    })

    it('includes execution and call IDs when provided', async () => {
      const logger = new AuditLogger(mockStore, { now: () => new Date('2026-01-02T03:04:05Z') })

      await logger.log({
        category: 'decision',
        action: 'deny',
        severity: 'alert',
        executionId: 'exec-1',
        callId: 'call-7',
        metadata: { tool: 'send_email' },
      })

      const entry = appendedEntries[0]
      expect(entry.severity).toBe('alert')
      expect(entry.executionId).toBe('exec-1')
      expect(entry.callId).toBe('call-7')
      expect(entry.metadata).toEqual({ tool: 'send_email' })
      expect(entry.timestamp.toISOString()).toBe('2026-01-02T03:04:05.000Z')
    })

    it('generates unique IDs for each entry', async () => {
      const logger = new AuditLogger(mockStore)

      await logger.log({ category: 'authority', action: 'a' })
      await logger.log({ category: 'authority', action: 'b' })

      expect(appendedEntries[0].id).not.toBe(appendedEntries[1].id)
    })
  })

  describe('minimum severity', () => {
    it('drops entries below the configured level', async () => {
      const logger = new AuditLogger(mockStore, { minSeverity: 'warning' })

      expect(await logger.info('decision', 'allow')).toBe(false)
      expect(await logger.warning('decision', 'require_draft')).toBe(true)
      expect(await logger.critical('decision', 'deny')).toBe(true)

      expect(appendedEntries.map((e) => e.action)).toEqual(['require_draft', 'deny'])
    })
  })

  describe('convenience methods', () => {
    it.each(['debug', 'info', 'warning', 'alert', 'critical'] as const)(
      '%s sets the severity',
      async (severity) => {
        const logger = new AuditLogger(mockStore)
        await logger[severity]('policy', 'test', { n: 1 })

        expect(appendedEntries[0].severity).toBe(severity)
        expect(appendedEntries[0].metadata).toEqual({ n: 1 })
      }
    )
  })

  describe('query', () => {
    it('delegates to the store', async () => {
      const logger = new AuditLogger(mockStore)
      await logger.query({ category: 'decision' })

      expect(mockStore.query).toHaveBeenCalledWith({ category: 'decision' })
    })
  })
})
