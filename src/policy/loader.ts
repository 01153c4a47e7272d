import { readFile } from 'fs/promises'
import type { CompiledPolicy } from './types.js'
import { PolicyLoadError } from './types.js'
import { compilePolicy } from './compile.js'

/**
 * Parse and compile a JSON policy document.
 */
export function parsePolicyJson(text: string): CompiledPolicy {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new PolicyLoadError(
      `Policy is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      'invalid_json'
    )
  }
  return compilePolicy(raw)
}

/**
 * Load and compile a JSON policy file.
 */
export async function loadPolicyFile(filePath: string): Promise<CompiledPolicy> {
  const content = await readFile(filePath, 'utf-8')
  return parsePolicyJson(content)
}
