/**
 * rulestudio Version History
 * Timestamped backups written beside the config: <name>.<unixSeconds>.backup
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigBackup, ConfigDiff } from './types.js';
import { VersionHistoryError, errorMessage } from './errors.js';
import { isDeepEqual, nextBackupPath, parseConfigContent } from './yaml-config.js';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

async function readBackup(backup: ConfigBackup): Promise<string> {
  try {
    return await fs.promises.readFile(backup.path, 'utf-8');
  } catch {
    throw VersionHistoryError.backupNotFound(backup.id);
  }
}

/**
 * List backups of `configPath`, newest first
 */
export async function listBackups(configPath: string): Promise<ConfigBackup[]> {
  const dir = path.dirname(configPath);
  const pattern = new RegExp(`^${escapeRegExp(path.basename(configPath))}\\.(\\d+)\\.backup$`);

  let entries: string[];
  try {
    entries = await fs.promises.readdir(dir);
  } catch {
    return [];
  }

  const backups: ConfigBackup[] = [];
  for (const name of entries) {
    const match = pattern.exec(name);
    if (!match) continue;

    const backupPath = path.join(dir, name);
    const stats = await fs.promises.stat(backupPath).catch(() => null);
    backups.push({
      id: name,
      path: backupPath,
      timestamp: parseInt(match[1], 10),
      fileSize: stats ? stats.size : 0,
    });
  }

  return backups.sort((a, b) => b.timestamp - a.timestamp);
}

export async function loadBackup(backup: ConfigBackup): Promise<string> {
  return readBackup(backup);
}

/**
 * Copy a backup over the config, first saving the current file as a new backup
 */
export async function restoreBackup(backup: ConfigBackup, configPath: string): Promise<void> {
  const content = await readBackup(backup);

  try {
    if (fs.existsSync(configPath)) {
      await fs.promises.copyFile(configPath, nextBackupPath(configPath));
    }
    await fs.promises.writeFile(configPath, content, 'utf-8');
  } catch (error) {
    throw VersionHistoryError.restoreFailed(errorMessage(error), error);
  }
}

/**
 * Rule diff from `first` to `second`
 */
export async function diffBetween(first: ConfigBackup, second: ConfigBackup): Promise<ConfigDiff> {
  const [before, after] = await Promise.all([readBackup(first), readBackup(second)]);
  const firstRules = parseConfigContent(before).rules;
  const secondRules = parseConfigContent(after).rules;

  return {
    addedRules: Object.keys(secondRules).filter((id) => !(id in firstRules)).sort(),
    removedRules: Object.keys(firstRules).filter((id) => !(id in secondRules)).sort(),
    modifiedRules: Object.keys(firstRules)
      .filter((id) => id in secondRules && !isDeepEqual(firstRules[id], secondRules[id]))
      .sort(),
    before,
    after,
  };
}

/**
 * Delete all but the newest `keepCount` backups. Returns how many were deleted.
 */
export async function pruneOldBackups(configPath: string, keepCount: number): Promise<number> {
  const backups = await listBackups(configPath);
  const toRemove = backups.slice(Math.max(keepCount, 0));
  for (const backup of toRemove) {
    await fs.promises.rm(backup.path, { force: true });
  }
  return toRemove.length;
}

export interface VersionHistoryService {
  listBackups(configPath: string): Promise<ConfigBackup[]>;
  loadBackup(backup: ConfigBackup): Promise<string>;
  restoreBackup(backup: ConfigBackup, configPath: string): Promise<void>;
  diffBetween(first: ConfigBackup, second: ConfigBackup): Promise<ConfigDiff>;
  pruneOldBackups(configPath: string, keepCount: number): Promise<number>;
}

export const versionHistory: VersionHistoryService = {
  listBackups,
  loadBackup,
  restoreBackup,
  diffBetween,
  pruneOldBackups,
};
