/**
 * File-based persistence for authority snapshots
 */

import { readFile, writeFile, mkdir, readdir, rename } from 'fs/promises'
import { join } from 'path'
import { AuthorityError } from './types.js'

const EXECUTION_ID_PATTERN = /^[A-Za-z0-9_.-]+$/

/**
 * Snapshot store interface
 */
export interface SnapshotStore {
  save(executionId: string, snapshot: string): Promise<void>
  load(executionId: string): Promise<string | null>
  list(): Promise<string[]>
}

/**
 * Stores one snapshot file per execution: `<executionId>.authority.json`.
 * The snapshot string is written as-is, so a load returns exactly the
 * bytes that were saved.
 */
export class FileSnapshotStore implements SnapshotStore {
  private baseDir: string

  constructor(baseDir: string) {
    this.baseDir = baseDir
  }

  private getPath(executionId: string): string {
    if (!EXECUTION_ID_PATTERN.test(executionId)) {
      throw new AuthorityError(
        `Execution ID '${executionId}' cannot be used as a file name`,
        'invalid_snapshot'
      )
    }
    return join(this.baseDir, `${executionId}.authority.json`)
  }

  async save(executionId: string, snapshot: string): Promise<void> {
    const path = this.getPath(executionId)
    await mkdir(this.baseDir, { recursive: true })

    // Write then rename so a reader never sees half a snapshot
    const tempPath = `${path}.tmp`
    await writeFile(tempPath, snapshot, 'utf-8')
    await rename(tempPath, path)
  }

  async load(executionId: string): Promise<string | null> {
    try {
      return await readFile(this.getPath(executionId), 'utf-8')
    } catch (error) {
      if (isNotFound(error)) return null
      throw error
    }
  }

  async list(): Promise<string[]> {
    try {
      const files = await readdir(this.baseDir)
      return files
        .filter((f) => f.endsWith('.authority.json'))
        .map((f) => f.slice(0, -'.authority.json'.length))
        .sort()
    } catch (error) {
      if (isNotFound(error)) return []
      throw error
    }
  }
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  )
}
