/**
 * rulestudio Configuration System
 * Manages storage paths, timeouts and runtime settings
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export const SCHEMA_VERSION = '1.0.0';

export interface StudioConfig {
  /** Per-workspace data directory, relative to the workspace root */
  storagePath: string;
  /** User-level data directory (recent workspaces, rule docs cache) */
  homePath: string;
  swiftlintPath?: string;
  commandTimeoutMs: number;
  gitTimeoutMs: number;
  fetchTimeoutMs: number;
  backupKeepCount: number;
  maxRecentWorkspaces: number;
  uiPort: number;
  configFileName: string;
}

// =============================================================================
// DEFAULT CONFIGURATION
// =============================================================================

const DEFAULT_CONFIG: StudioConfig = {
  storagePath: '.rulestudio',
  homePath: path.join(os.homedir(), '.rulestudio'),
  commandTimeoutMs: 300_000,
  gitTimeoutMs: 30_000,
  fetchTimeoutMs: 30_000,
  backupKeepCount: 10,
  maxRecentWorkspaces: 10,
  uiPort: 3737,
  configFileName: '.swiftlint.yml',
};

// =============================================================================
// ENVIRONMENT VARIABLES
// =============================================================================

/**
 * Environment variables that override default config
 *
 * RULESTUDIO_PATH: string - Per-workspace storage directory
 * RULESTUDIO_HOME: string - User-level storage directory
 * RULESTUDIO_SWIFTLINT: string - Explicit swiftlint binary
 * RULESTUDIO_TIMEOUT: number - swiftlint timeout (ms)
 * RULESTUDIO_GIT_TIMEOUT: number - git timeout (ms)
 * RULESTUDIO_FETCH_TIMEOUT: number - remote config fetch timeout (ms)
 * RULESTUDIO_BACKUPS: number - Backups kept when pruning
 * RULESTUDIO_RECENT: number - Recent workspaces remembered
 * RULESTUDIO_PORT: number - Dashboard port
 * RULESTUDIO_CONFIG: string - Config file name
 */

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 0 ? defaultValue : parsed;
}

function getEnvString(key: string, defaultValue: string): string {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') return defaultValue;
  return value;
}

// =============================================================================
// CONFIGURATION LOADING
// =============================================================================

/**
 * Load configuration from environment and defaults
 */
export function loadConfig(): StudioConfig {
  const swiftlintPath = process.env['RULESTUDIO_SWIFTLINT'];

  return {
    storagePath: getEnvString('RULESTUDIO_PATH', DEFAULT_CONFIG.storagePath),
    homePath: getEnvString('RULESTUDIO_HOME', DEFAULT_CONFIG.homePath),
    swiftlintPath: swiftlintPath && swiftlintPath.trim() !== '' ? swiftlintPath : undefined,
    commandTimeoutMs: getEnvNumber('RULESTUDIO_TIMEOUT', DEFAULT_CONFIG.commandTimeoutMs),
    gitTimeoutMs: getEnvNumber('RULESTUDIO_GIT_TIMEOUT', DEFAULT_CONFIG.gitTimeoutMs),
    fetchTimeoutMs: getEnvNumber('RULESTUDIO_FETCH_TIMEOUT', DEFAULT_CONFIG.fetchTimeoutMs),
    backupKeepCount: getEnvNumber('RULESTUDIO_BACKUPS', DEFAULT_CONFIG.backupKeepCount),
    maxRecentWorkspaces: getEnvNumber('RULESTUDIO_RECENT', DEFAULT_CONFIG.maxRecentWorkspaces),
    uiPort: getEnvNumber('RULESTUDIO_PORT', DEFAULT_CONFIG.uiPort),
    configFileName: getEnvString('RULESTUDIO_CONFIG', DEFAULT_CONFIG.configFileName),
  };
}

// =============================================================================
// PATH RESOLUTION
// =============================================================================

/**
 * Get the absolute per-workspace storage path
 */
export function getStoragePath(config: StudioConfig, workspaceRoot?: string): string {
  if (path.isAbsolute(config.storagePath)) {
    return config.storagePath;
  }
  const root = workspaceRoot || process.cwd();
  return path.join(root, config.storagePath);
}

/**
 * Get path to the violations directory
 */
export function getViolationsPath(config: StudioConfig, workspaceRoot?: string): string {
  return path.join(getStoragePath(config, workspaceRoot), 'violations');
}

/**
 * Get path to the SwiftLint config of a workspace
 */
export function getWorkspaceConfigPath(config: StudioConfig, workspaceRoot?: string): string {
  return path.join(workspaceRoot || process.cwd(), config.configFileName);
}

/**
 * Get path to the recent workspaces file
 */
export function getRecentWorkspacesPath(config: StudioConfig): string {
  return path.join(config.homePath, 'workspaces.json');
}

/**
 * Get path to generated rule docs for a SwiftLint version
 */
export function getDocsCachePath(config: StudioConfig, swiftlintVersion: string): string {
  return path.join(config.homePath, 'rule_docs', swiftlintVersion);
}

// =============================================================================
// DIRECTORY INITIALIZATION
// =============================================================================

/**
 * Ensure all storage directories exist
 */
export function ensureStorageDirectories(config: StudioConfig, workspaceRoot?: string): void {
  const directories = [getStoragePath(config, workspaceRoot), getViolationsPath(config, workspaceRoot)];

  for (const dir of directories) {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }
}

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Sanitize a path to prevent directory traversal
 */
export function sanitizePath(inputPath: string, basePath: string): string | null {
  const base = path.resolve(basePath);
  const resolved = path.resolve(base, inputPath);
  if (resolved !== base && !resolved.startsWith(base + path.sep)) {
    return null; // Path traversal attempt
  }
  return resolved;
}

// =============================================================================
// EXPORT CONFIG SINGLETON
// =============================================================================

let cachedConfig: StudioConfig | null = null;

/**
 * Get the current configuration (cached)
 */
export function getConfig(): StudioConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Reset the cached configuration (for testing)
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Override configuration (for testing)
 */
export function setConfig(config: Partial<StudioConfig>): StudioConfig {
  cachedConfig = { ...loadConfig(), ...config };
  return cachedConfig;
}
