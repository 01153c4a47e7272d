import path from 'path'
import os from 'os'

/**
 * Get the flowguard home directory.
 * Resolution order:
 * 1. FLOWGUARD_HOME environment variable
 * 2. XDG_CONFIG_HOME/flowguard
 * 3. Platform-specific defaults
 */
export function getFlowguardHome(): string {
  if (process.env.FLOWGUARD_HOME) {
    return process.env.FLOWGUARD_HOME
  }

  if (process.env.XDG_CONFIG_HOME) {
    return path.join(process.env.XDG_CONFIG_HOME, 'flowguard')
  }

  switch (process.platform) {
    case 'win32':
      return path.join(process.env.APPDATA || '', 'flowguard')
    case 'darwin':
      return path.join(os.homedir(), 'Library', 'Application Support', 'flowguard')
    default:
      return path.join(os.homedir(), '.flowguard')
  }
}

export function getConfigPath(): string {
  return path.join(getFlowguardHome(), 'config.json')
}

export function getLocalConfigPath(): string {
  return path.join(getFlowguardHome(), 'config.local.json')
}

export function getPolicyPath(): string {
  return path.join(getFlowguardHome(), 'policy.json')
}

export function getSnapshotsPath(): string {
  return path.join(getFlowguardHome(), 'snapshots')
}

/**
 * Get the path to the audit logs directory.
 */
export function getAuditPath(): string {
  return path.join(getFlowguardHome(), 'logs', 'audit')
}
