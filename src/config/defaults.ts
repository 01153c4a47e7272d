import type { AppConfig } from './schema.js'
import { getAuditPath, getPolicyPath, getSnapshotsPath } from './paths.js'

/**
 * Get the default configuration.
 * Directory defaults live under the flowguard home at call time.
 */
export function getDefaults(): AppConfig {
  return {
    version: 1,
    policy: {
      path: getPolicyPath(),
    },
    snapshots: {
      dir: getSnapshotsPath(),
    },
    audit: {
      enabled: true,
      dir: getAuditPath(),
      level: 'info',
    },
    evaluation: {},
  }
}
