import { mkdir, appendFile, readFile, readdir } from 'fs/promises'
import path from 'path'
import type { AuditEntry } from '../schema.js'
import { AuditEntrySchema } from '../schema.js'
import { sanitizeAuditEntry } from '../redaction.js'
import type { AuditStore, AuditFilter } from './interface.js'
import { matchesFilter } from './interface.js'

const FILE_PATTERN = /^audit-(\d{4}-\d{2}-\d{2})\.jsonl$/

/**
 * JSONL audit store with one file per UTC day: `audit-YYYY-MM-DD.jsonl`.
 */
export class JsonlAuditStore implements AuditStore {
  private readonly baseDir: string
  private initialized = false
  private skippedLines = 0

  constructor(baseDir: string) {
    this.baseDir = baseDir
  }

  /**
   * Lines that were not valid entries in the files read so far.
   */
  get corruptLineCount(): number {
    return this.skippedLines
  }

  async append(entry: AuditEntry): Promise<void> {
    await this.ensureDir()

    // Sanitize before writing - this is the choke point
    const sanitized = sanitizeAuditEntry(entry)
    const filePath = path.join(this.baseDir, fileNameFor(sanitized.timestamp))
    await appendFile(filePath, JSON.stringify(sanitized) + '\n', 'utf-8')
  }

  /**
   * Query entries, newest file first.
   */
  async query(filter: AuditFilter): Promise<AuditEntry[]> {
    await this.ensureDir()

    const results: AuditEntry[] = []
    for (const file of await this.relevantFiles(filter)) {
      for (const entry of await this.readEntries(file)) {
        if (!matchesFilter(entry, filter)) continue
        results.push(entry)
        if (filter.limit && results.length >= filter.limit) {
          return results
        }
      }
    }
    return results
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return
    await mkdir(this.baseDir, { recursive: true })
    this.initialized = true
  }

  private async relevantFiles(filter: AuditFilter): Promise<string[]> {
    const files = await readdir(this.baseDir)
    const sinceDay = filter.since ? dayOf(filter.since) : undefined
    const untilDay = filter.until ? dayOf(filter.until) : undefined

    return files
      .filter((f) => {
        const match = FILE_PATTERN.exec(f)
        if (!match) return false
        // ISO days compare correctly as strings
        if (sinceDay && match[1] < sinceDay) return false
        if (untilDay && match[1] > untilDay) return false
        return true
      })
      .sort()
      .reverse()
  }

  private async readEntries(filename: string): Promise<AuditEntry[]> {
    const content = await readFile(path.join(this.baseDir, filename), 'utf-8')
    const entries: AuditEntry[] = []

    for (const line of content.split('\n')) {
      if (!line.trim()) continue
      const parsed = AuditEntrySchema.safeParse(parseJsonLine(line))
      if (parsed.success) {
        entries.push(parsed.data)
      } else {
        this.skippedLines++
      }
    }
    return entries
  }
}

function dayOf(date: Date): string {
  return date.toISOString().slice(0, 10)
}

function fileNameFor(date: Date): string {
  return `audit-${dayOf(date)}.jsonl`
}

function parseJsonLine(line: string): unknown {
  try {
    return JSON.parse(line)
  } catch {
    // A torn line; the schema check rejects it
    return undefined
  }
}
