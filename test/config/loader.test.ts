import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { loadConfig } from '../../src/config/loader.js'
import { ConfigError } from '../../src/config/errors.js'
import { AppConfigSchema } from '../../src/config/schema.js'

describe('loadConfig', () => {
  const originalEnv = { ...process.env }
  let home: string

  beforeEach(async () => {
    home = await mkdtemp(join(tmpdir(), 'flowguard-config-'))
    process.env.FLOWGUARD_HOME = home
  })

  afterEach(async () => {
    process.env = { ...originalEnv }
    await rm(home, { recursive: true, force: true })
  })

  it('returns defaults under the home directory', async () => {
    const config = await loadConfig({ env: {} })

    expect(config).toEqual({
      version: 1,
      policy: { path: join(home, 'policy.json') },
      snapshots: { dir: join(home, 'snapshots') },
      audit: { enabled: true, dir: join(home, 'logs', 'audit'), level: 'info' },
      evaluation: {},
    })
  })

  it('applies file, local file, env and overrides in order', async () => {
    await writeFile(
      join(home, 'config.json'),
      JSON.stringify({ audit: { level: 'warning' }, evaluation: { defaultSubject: 'file' } }),
      'utf-8'
    )
    await writeFile(
      join(home, 'config.local.json'),
      JSON.stringify({ evaluation: { defaultSubject: 'local' }, snapshots: { dir: '/var/snap' } }),
      'utf-8'
    )

    const config = await loadConfig({
      env: { FLOWGUARD_AUDIT__LEVEL: 'alert', FLOWGUARD_EVALUATION__DEFAULT_SUBJECT: 'env' },
      overrides: { evaluation: { defaultSubject: 'override' } },
    })

    expect(config.audit.level).toBe('alert')
    expect(config.snapshots.dir).toBe('/var/snap')
    expect(config.evaluation.defaultSubject).toBe('override')
  })

  it('reads an explicit config path and its local file', async () => {
    const path = join(home, 'custom.json')
    await writeFile(path, JSON.stringify({ audit: { enabled: false } }), 'utf-8')
    await writeFile(join(home, 'custom.local.json'), JSON.stringify({ audit: { level: 'debug' } }), 'utf-8')

    const config = await loadConfig({ configPath: path, env: {} })
    expect(config.audit).toEqual({ enabled: false, dir: join(home, 'logs', 'audit'), level: 'debug' })
  })

  it('rejects invalid values with the failing field', async () => {
    await expect(
      loadConfig({ env: { FLOWGUARD_AUDIT__LEVEL: 'loud' } })
    ).rejects.toMatchObject({ name: 'ConfigError', field: 'audit.level' })
  })

  it('rejects a config file that is not JSON', async () => {
    await writeFile(join(home, 'config.json'), '{ nope', 'utf-8')
    await expect(loadConfig({ env: {} })).rejects.toBeInstanceOf(ConfigError)
  })
})

describe('AppConfigSchema', () => {
  it('requires the directory settings', () => {
    expect(AppConfigSchema.safeParse({ version: 1 }).success).toBe(false)
  })

  it('fills in audit and evaluation defaults', () => {
    const parsed = AppConfigSchema.parse({
      policy: { path: '/p.json' },
      snapshots: { dir: '/s' },
      audit: { dir: '/a' },
    })
    expect(parsed).toEqual({
      version: 1,
      policy: { path: '/p.json' },
      snapshots: { dir: '/s' },
      audit: { enabled: true, dir: '/a', level: 'info' },
      evaluation: {},
    })
  })
})
