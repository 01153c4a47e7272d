import type { AuditEntry } from './schema.js'

/**
 * Metadata paths that must never reach an audit store. Decisions only ever
 * carry value IDs and tag names; these catch a host that attaches payloads.
 *
 * Paths are relative to the entry root.
 */
const NEVER_LOG_FIELDS = [
  'metadata.payload',
  'metadata.value.content',
  'metadata.tool.input',
  'metadata.tool.output',
]

const MAX_ERROR_MESSAGE_LENGTH = 500

// C0 control characters other than tab
const CONTROL_CHARS = /[\u0000-\u0008\u000a-\u001f\u007f]/g

/**
 * Sanitize an audit entry before it is written.
 *
 * Every store calls this on every entry; it is the one place where
 * never-log fields are removed.
 */
export function sanitizeAuditEntry(entry: AuditEntry): AuditEntry {
  const sanitized = structuredClone(entry)

  if (sanitized.metadata) {
    for (const field of NEVER_LOG_FIELDS) {
      deletePath(sanitized.metadata, field.split('.').slice(1))
    }

    const message = sanitized.metadata.errorMessage
    if (message !== undefined) {
      sanitized.metadata.errorMessage = sanitizeErrorMessage(String(message))
    }
  }

  return sanitized
}

/**
 * Strip control characters and truncate.
 */
export function sanitizeErrorMessage(msg: string): string {
  return msg.replace(CONTROL_CHARS, ' ').slice(0, MAX_ERROR_MESSAGE_LENGTH)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

function deletePath(obj: Record<string, unknown>, parts: string[]): void {
  let current = obj
  for (const part of parts.slice(0, -1)) {
    const next = current[part]
    if (!isRecord(next)) return
    current = next
  }
  delete current[parts[parts.length - 1]]
}
