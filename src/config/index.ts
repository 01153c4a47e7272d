// Schema and types
export { AppConfigSchema, type AppConfig } from './schema.js'
export type {
  PolicyConfig,
  SnapshotConfig,
  AuditConfig,
  EvaluationConfig,
} from './schema.js'

// Defaults
export { getDefaults } from './defaults.js'

// Paths
export {
  getFlowguardHome,
  getConfigPath,
  getLocalConfigPath,
  getPolicyPath,
  getSnapshotsPath,
  getAuditPath,
} from './paths.js'

// Environment parsing
export { parseEnvConfig, parseValue, envKeyToPath } from './env.js'

// File utilities
export { fileExists, loadConfigFile } from './file.js'

// Merge utilities
export { deepMerge, setPath, getPath } from './merge.js'

// Loader
export { loadConfig, type LoadConfigOptions } from './loader.js'

export { ConfigError } from './errors.js'
