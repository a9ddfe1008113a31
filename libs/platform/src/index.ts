/**
 * @homelab/platform
 * File system access and data-directory layout for the homelab dashboard
 */

// Throttled fs
export * as secureFs from './secure-fs.js';
export type { ThrottleConfig } from './secure-fs.js';

// Data paths
export { DEFAULT_DATA_DIR, getDataDir, getAppsPath, getSettingsPath, ensureDataDir } from './paths.js';

// Atomic JSON persistence
export {
  atomicWriteJson,
  readJsonWithRecovery,
  logRecoveryWarning,
  type AtomicWriteOptions,
  type JsonReadResult,
} from './atomic-writer.js';
