import { AppConfigSchema, type AppConfig } from './schema.js'
import { getDefaults } from './defaults.js'
import { getConfigPath, getLocalConfigPath } from './paths.js'
import { parseEnvConfig } from './env.js'
import { fileExists, loadConfigFile } from './file.js'
import { deepMerge } from './merge.js'
import { ConfigError } from './errors.js'

export interface LoadConfigOptions {
  /** Explicit config file; its local overrides sit beside it. */
  configPath?: string
  env?: NodeJS.ProcessEnv
  overrides?: Record<string, unknown>
}

/**
 * Load configuration with full precedence chain.
 *
 * Precedence (later overrides earlier):
 * 1. Defaults
 * 2. User config file (config.json)
 * 3. Local overrides (config.local.json)
 * 4. Environment variables
 * 5. Explicit overrides
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  let config: Record<string, unknown> = { ...getDefaults() }

  const configPath = options.configPath ?? getConfigPath()
  if (await fileExists(configPath)) {
    config = deepMerge(config, await loadConfigFile(configPath))
  }

  const localPath = options.configPath
    ? options.configPath.replace(/\.json$/, '.local.json')
    : getLocalConfigPath()
  if (await fileExists(localPath)) {
    config = deepMerge(config, await loadConfigFile(localPath))
  }

  config = deepMerge(config, parseEnvConfig(options.env))

  if (options.overrides) {
    config = deepMerge(config, options.overrides)
  }

  const result = AppConfigSchema.safeParse(config)
  if (!result.success) {
    const issue = result.error.issues[0]
    const field = issue.path.join('.')
    throw new ConfigError(`Invalid configuration at ${field || '(root)'}: ${issue.message}`, field)
  }
  return result.data
}
