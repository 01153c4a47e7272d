import { describe, it, expect, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { compilePolicy, compileToolRule } from '../../src/policy/compile.js'
import { loadPolicyFile, parsePolicyJson } from '../../src/policy/loader.js'
import { PolicyLoadError } from '../../src/policy/types.js'
import { assistantPolicy } from '../fixtures/policy.js'

function catchLoadError(fn: () => unknown): PolicyLoadError {
  try {
    fn()
  } catch (error) {
    if (error instanceof PolicyLoadError) return error
    throw error
  }
  throw new Error('expected a PolicyLoadError')
}

describe('compilePolicy', () => {
  it('resolves the document into a rule table', () => {
    const policy = compilePolicy(assistantPolicy())

    expect(policy.name).toBe('assistant')
    expect(policy.defaultAction).toBe('deny')
    expect(policy.strictMode).toBe(true)
    expect(policy.budgets).toEqual({
      maxValues: 100,
      maxParentsPerValue: 8,
      maxClosureSteps: 50,
      maxWitnessDepth: 4,
    })
    expect([...policy.rules.keys()]).toEqual(['get_weather', 'send_email', 'post_draft', 'delete_repo'])
    expect(policy.rules.get('send_email')).toEqual({
      kind: 'rule',
      tool: 'send_email',
      sideEffectClass: 'external_write',
      requiredAuthority: ['mail.send'],
      argRules: [
        {
          argument: 'recipient',
          requiresIntegrity: { kind: 'verified', tag: 'email_allowlist' },
          forbidsConfidentiality: [],
        },
        { argument: 'body', requiresIntegrity: undefined, forbidsConfidentiality: ['secret'] },
      ],
      denyIfPcIntegrityContains: [{ kind: 'untrusted' }],
      defaultDecision: 'require_confirmation',
    })
    expect(Object.isFrozen(policy)).toBe(true)
  })

  it('exposes the rule table without a way to change it', () => {
    const policy = compilePolicy(assistantPolicy())

    expect('set' in policy.rules).toBe(false)
    expect('delete' in policy.rules).toBe(false)
    expect('clear' in policy.rules).toBe(false)
    expect(Object.isFrozen(policy.rules)).toBe(true)
    expect(policy.rules.get('delete_repo')?.kind).toBe('rule')

    const visited: string[] = []
    policy.rules.forEach((_entry, tool) => visited.push(tool))
    expect(visited).toEqual(['get_weather', 'send_email', 'post_draft', 'delete_repo'])
    expect([...policy.rules].map(([tool]) => tool)).toEqual(visited)
  })

  it('fills in defaults for optional tool fields', () => {
    const rule = compilePolicy(assistantPolicy()).rules.get('get_weather')

    expect(rule).toEqual({
      kind: 'rule',
      tool: 'get_weather',
      sideEffectClass: 'external_read',
      requiredAuthority: [],
      argRules: [],
      denyIfPcIntegrityContains: [],
      defaultDecision: 'allow',
    })
  })

  it('rejects an unsupported schema version', () => {
    const doc = { ...assistantPolicy(), schema_version: 2 }
    const error = catchLoadError(() => compilePolicy(doc))

    expect(error.code).toBe('unsupported_schema_version')
    expect(error.message).toBe('Unsupported policy schema_version 2; only 1 is accepted')
  })

  it('rejects a document without budgets', () => {
    const doc = assistantPolicy()
    delete doc.budgets
    const error = catchLoadError(() => compilePolicy(doc))

    expect(error.code).toBe('invalid_document')
    expect(error.path).toBe('budgets')
    expect(error.message).toBe('Invalid policy document: budgets: Required')
  })

  it('rejects unknown top-level fields', () => {
    const error = catchLoadError(() => compilePolicy({ ...assistantPolicy(), owner: 'someone' }))
    expect(error.code).toBe('invalid_document')
  })

  it('rejects tool entries without a name', () => {
    const doc = assistantPolicy()
    doc.tools.push({ side_effect_class: 'ExternalRead', default_decision: 'Allow' })
    const error = catchLoadError(() => compilePolicy(doc))

    expect(error.code).toBe('unnamed_tool_rule')
    expect(error.path).toBe('tools.4')
  })

  it('keeps other tools usable when one entry is malformed', () => {
    const doc = assistantPolicy()
    doc.tools.push({
      tool: 'search',
      side_effect_class: 'ExternalRead',
      arg_rules: [{ arg: 'query', requires_integrity: 'Semi' }],
      default_decision: 'Allow',
    })
    const policy = compilePolicy(doc)

    expect(policy.rules.get('search')).toEqual({
      kind: 'malformed',
      tool: 'search',
      reason: "Argument 'query' requires unknown integrity 'Semi'",
    })
    expect(policy.rules.get('get_weather')?.kind).toBe('rule')
  })

  it('marks a tool listed twice as malformed', () => {
    const doc = assistantPolicy()
    doc.tools.push({ tool: 'get_weather', side_effect_class: 'ExternalRead', default_decision: 'Deny' })

    expect(compilePolicy(doc).rules.get('get_weather')).toEqual({
      kind: 'malformed',
      tool: 'get_weather',
      reason: 'Tool is listed more than once',
    })
  })
})

describe('compileToolRule', () => {
  it('reports a missing field', () => {
    expect(compileToolRule('x', { tool: 'x', side_effect_class: 'ExternalRead' })).toEqual({
      kind: 'malformed',
      tool: 'x',
      reason: 'default_decision: Required',
    })
  })

  it('refuses a blank authority resource', () => {
    const entry = {
      tool: 'x',
      side_effect_class: 'ExternalRead',
      required_authority: ['files.read', ' '],
      default_decision: 'Allow',
    }
    expect(compileToolRule('x', entry)).toEqual({
      kind: 'malformed',
      tool: 'x',
      reason: 'required_authority lists a blank resource',
    })
  })

  it('refuses two rules for one argument', () => {
    const entry = {
      tool: 'x',
      side_effect_class: 'ExternalRead',
      arg_rules: [{ arg: 'a' }, { arg: 'a', forbids_confidentiality: ['pii'] }],
      default_decision: 'Allow',
    }
    expect(compileToolRule('x', entry)).toEqual({
      kind: 'malformed',
      tool: 'x',
      reason: "Argument 'a' has more than one rule",
    })
  })

  it('refuses an unknown context label', () => {
    const entry = {
      tool: 'x',
      side_effect_class: 'ExternalRead',
      context_rules: { deny_if_pc_integrity_contains: ['Tainted'] },
      default_decision: 'Allow',
    }
    expect(compileToolRule('x', entry)).toEqual({
      kind: 'malformed',
      tool: 'x',
      reason: "Context rule names unknown integrity 'Tainted'",
    })
  })
})

describe('policy loader', () => {
  let testDir: string | undefined

  afterEach(async () => {
    if (testDir) await rm(testDir, { recursive: true, force: true })
    testDir = undefined
  })

  it('rejects text that is not JSON', () => {
    expect(catchLoadError(() => parsePolicyJson('{')).code).toBe('invalid_json')
  })

  it('loads and compiles a policy file', async () => {
    testDir = await mkdtemp(join(tmpdir(), 'flowguard-policy-'))
    const path = join(testDir, 'policy.json')
    await writeFile(path, JSON.stringify(assistantPolicy()), 'utf-8')

    const policy = await loadPolicyFile(path)
    expect(policy.rules.size).toBe(4)
  })
})
