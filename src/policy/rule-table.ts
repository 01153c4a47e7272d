import type { ToolRuleEntry } from './types.js'

/**
 * Read-only view over a compiled rule map. The backing map is private, so
 * a loaded policy cannot gain or lose tools after compilation.
 */
export class RuleTable implements ReadonlyMap<string, ToolRuleEntry> {
  private readonly table: Map<string, ToolRuleEntry>

  constructor(entries: Iterable<readonly [string, ToolRuleEntry]>) {
    this.table = new Map(entries)
    Object.freeze(this)
  }

  get size(): number {
    return this.table.size
  }

  get(tool: string): ToolRuleEntry | undefined {
    return this.table.get(tool)
  }

  has(tool: string): boolean {
    return this.table.has(tool)
  }

  forEach(
    callback: (value: ToolRuleEntry, key: string, map: ReadonlyMap<string, ToolRuleEntry>) => void,
    thisArg?: unknown
  ): void {
    for (const [tool, entry] of this.table) {
      callback.call(thisArg, entry, tool, this)
    }
  }

  entries() {
    return this.table.entries()
  }

  keys() {
    return this.table.keys()
  }

  values() {
    return this.table.values()
  }

  [Symbol.iterator]() {
    return this.table[Symbol.iterator]()
  }
}
