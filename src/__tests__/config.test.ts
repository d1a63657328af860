/**
 * Tests for settings, storage paths and environment overrides
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import {
  ensureStorageDirectories,
  getConfig,
  getDocsCachePath,
  getRecentWorkspacesPath,
  getStoragePath,
  getViolationsPath,
  getWorkspaceConfigPath,
  loadConfig,
  resetConfig,
  sanitizePath,
  setConfig,
} from '../config.js';
import { createStudioConfig, createTempWorkspace, removeTempWorkspace } from './helpers.js';

const ENV_KEYS = [
  'RULESTUDIO_PATH',
  'RULESTUDIO_HOME',
  'RULESTUDIO_SWIFTLINT',
  'RULESTUDIO_TIMEOUT',
  'RULESTUDIO_GIT_TIMEOUT',
  'RULESTUDIO_FETCH_TIMEOUT',
  'RULESTUDIO_BACKUPS',
  'RULESTUDIO_RECENT',
  'RULESTUDIO_PORT',
  'RULESTUDIO_CONFIG',
];

describe('loadConfig', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    resetConfig();
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    resetConfig();
  });

  it('uses defaults without overrides', () => {
    const config = loadConfig();

    expect(config.storagePath).toBe('.rulestudio');
    expect(config.swiftlintPath).toBeUndefined();
    expect(config.commandTimeoutMs).toBe(300_000);
    expect(config.gitTimeoutMs).toBe(30_000);
    expect(config.backupKeepCount).toBe(10);
    expect(config.uiPort).toBe(3737);
    expect(config.configFileName).toBe('.swiftlint.yml');
  });

  it('reads overrides from the environment', () => {
    process.env.RULESTUDIO_PATH = '.lint-data';
    process.env.RULESTUDIO_SWIFTLINT = '/opt/bin/swiftlint';
    process.env.RULESTUDIO_TIMEOUT = '5000';
    process.env.RULESTUDIO_PORT = '4000';
    process.env.RULESTUDIO_CONFIG = 'lint.yml';

    const config = loadConfig();

    expect(config.storagePath).toBe('.lint-data');
    expect(config.swiftlintPath).toBe('/opt/bin/swiftlint');
    expect(config.commandTimeoutMs).toBe(5000);
    expect(config.uiPort).toBe(4000);
    expect(config.configFileName).toBe('lint.yml');
  });

  it('ignores invalid numbers and blank strings', () => {
    process.env.RULESTUDIO_TIMEOUT = 'soon';
    process.env.RULESTUDIO_BACKUPS = '-1';
    process.env.RULESTUDIO_PATH = '   ';
    process.env.RULESTUDIO_SWIFTLINT = ' ';

    const config = loadConfig();

    expect(config.commandTimeoutMs).toBe(300_000);
    expect(config.backupKeepCount).toBe(10);
    expect(config.storagePath).toBe('.rulestudio');
    expect(config.swiftlintPath).toBeUndefined();
  });

  it('caches until reset', () => {
    const first = getConfig();
    process.env.RULESTUDIO_PORT = '4100';

    expect(getConfig()).toBe(first);
    resetConfig();
    expect(getConfig().uiPort).toBe(4100);
  });

  it('setConfig overrides the cached values', () => {
    setConfig({ backupKeepCount: 3 });

    expect(getConfig().backupKeepCount).toBe(3);
    expect(getConfig().uiPort).toBe(3737);
  });
});

describe('storage paths', () => {
  const config = createStudioConfig('/tmp/rs');

  it('resolves workspace paths under the root', () => {
    expect(getStoragePath(config, '/src/App')).toBe(path.join('/src/App', '.rulestudio'));
    expect(getViolationsPath(config, '/src/App')).toBe(path.join('/src/App', '.rulestudio', 'violations'));
    expect(getWorkspaceConfigPath(config, '/src/App')).toBe(path.join('/src/App', '.swiftlint.yml'));
  });

  it('keeps an absolute storage path', () => {
    expect(getStoragePath({ ...config, storagePath: '/var/rulestudio' }, '/src/App')).toBe('/var/rulestudio');
  });

  it('places user data under the home path', () => {
    expect(getRecentWorkspacesPath(config)).toBe(path.join('/tmp/rs', 'home', 'workspaces.json'));
    expect(getDocsCachePath(config, '0.55.0')).toBe(path.join('/tmp/rs', 'home', 'rule_docs', '0.55.0'));
  });
});

describe('ensureStorageDirectories', () => {
  let root: string;

  afterEach(() => {
    removeTempWorkspace(root);
  });

  it('creates storage and violations directories', () => {
    root = createTempWorkspace();

    ensureStorageDirectories(createStudioConfig(root), root);

    expect(fs.statSync(path.join(root, '.rulestudio', 'violations')).isDirectory()).toBe(true);
  });
});

describe('sanitizePath', () => {
  it('resolves paths inside the base', () => {
    expect(sanitizePath('Sources/App', '/src/App')).toBe(path.resolve('/src/App', 'Sources/App'));
    expect(sanitizePath('.', '/src/App')).toBe(path.resolve('/src/App'));
  });

  it('rejects traversal outside the base', () => {
    expect(sanitizePath('../Other', '/src/App')).toBeNull();
    expect(sanitizePath('/etc/passwd', '/src/App')).toBeNull();
  });
});
