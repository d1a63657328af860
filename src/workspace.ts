/**
 * rulestudio Workspace Manager
 * Opening Swift projects, the recent list and the default config template
 */

import * as fs from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';
import { glob } from 'glob';
import { Workspace } from './types.js';
import { WorkspaceError } from './errors.js';
import { StudioConfig, getConfig, getRecentWorkspacesPath } from './config.js';
import { isObject, readDataText } from './data-loader.js';

const PROJECT_MARKER_SUFFIXES = ['.xcodeproj', '.xcworkspace'];
const PROJECT_MARKER_NAMES = ['Package.swift', '.swiftpm'];
const SWIFT_SEARCH_IGNORES = ['**/.build/**', '**/Pods/**', '**/node_modules/**', '**/.git/**'];

export function workspaceId(workspacePath: string): string {
  return crypto.createHash('sha256').update(path.resolve(workspacePath)).digest('hex').slice(0, 16);
}

export function createWorkspace(workspacePath: string, config: StudioConfig = getConfig()): Workspace {
  const resolved = path.resolve(workspacePath);
  return {
    id: workspaceId(resolved),
    path: resolved,
    name: path.basename(resolved),
    configPath: path.join(resolved, config.configFileName),
    lastOpened: Date.now(),
  };
}

function isWorkspace(value: unknown): value is Workspace {
  return (
    isObject(value) &&
    typeof value['id'] === 'string' &&
    typeof value['path'] === 'string' &&
    typeof value['name'] === 'string' &&
    typeof value['lastOpened'] === 'number'
  );
}

/**
 * An Xcode project, a Swift package, or a .swift file within three levels
 */
export async function validateSwiftWorkspace(dir: string): Promise<void> {
  let entries: string[];
  try {
    entries = await fs.promises.readdir(dir);
  } catch {
    throw WorkspaceError.accessDenied(dir);
  }

  const hasMarker = entries.some(
    (name) =>
      PROJECT_MARKER_NAMES.includes(name) || PROJECT_MARKER_SUFFIXES.some((suffix) => name.endsWith(suffix))
  );
  if (hasMarker) return;

  const swiftFiles = await glob('**/*.swift', { cwd: dir, maxDepth: 3, ignore: SWIFT_SEARCH_IGNORES, nodir: true });
  if (swiftFiles.length === 0) {
    throw WorkspaceError.notASwiftProject(path.basename(dir));
  }
}

export class WorkspaceManager {
  private current: Workspace | null = null;
  private recent: Workspace[] = [];
  private readonly config: StudioConfig;

  constructor(config: StudioConfig = getConfig()) {
    this.config = config;
  }

  get currentWorkspace(): Workspace | null {
    return this.current;
  }

  get recentWorkspaces(): Workspace[] {
    return [...this.recent];
  }

  /**
   * True when a workspace is open and its config file does not exist
   */
  get configFileMissing(): boolean {
    if (!this.current) return false;
    const configPath = this.current.configPath || path.join(this.current.path, this.config.configFileName);
    return !fs.existsSync(configPath);
  }

  /**
   * Load the recent list, dropping workspaces whose directory is gone
   */
  async loadRecentWorkspaces(): Promise<Workspace[]> {
    const file = getRecentWorkspacesPath(this.config);
    if (!fs.existsSync(file)) {
      this.recent = [];
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.promises.readFile(file, 'utf-8'));
    } catch {
      parsed = [];
    }
    this.recent = (Array.isArray(parsed) ? parsed.filter(isWorkspace) : []).filter((ws) => fs.existsSync(ws.path));
    return this.recentWorkspaces;
  }

  async openWorkspace(workspacePath: string): Promise<Workspace> {
    const resolved = path.resolve(workspacePath);
    const stats = await fs.promises.stat(resolved).catch(() => null);
    if (!stats || !stats.isDirectory()) {
      throw WorkspaceError.notADirectory(resolved);
    }

    await validateSwiftWorkspace(resolved);
    await this.loadRecentWorkspaces();

    const existing = this.recent.find((ws) => ws.path === resolved);
    const workspace: Workspace = existing
      ? { ...existing, lastOpened: Date.now() }
      : createWorkspace(resolved, this.config);

    this.recent = [workspace, ...this.recent.filter((ws) => ws.path !== resolved)].slice(
      0,
      this.config.maxRecentWorkspaces
    );
    this.current = workspace;
    await this.saveRecentWorkspaces();
    return workspace;
  }

  closeWorkspace(): void {
    this.current = null;
  }

  async markAnalyzed(timestamp = Date.now()): Promise<void> {
    if (!this.current) return;
    const updated: Workspace = { ...this.current, lastAnalyzed: timestamp };
    this.current = updated;
    this.recent = this.recent.map((ws) => (ws.id === updated.id ? updated : ws));
    await this.saveRecentWorkspaces();
  }

  async removeFromRecent(id: string): Promise<void> {
    this.recent = this.recent.filter((ws) => ws.id !== id);
    await this.saveRecentWorkspaces();
  }

  async clearRecent(): Promise<void> {
    this.recent = [];
    await this.saveRecentWorkspaces();
  }

  /**
   * Write the default template unless a config already exists. Returns the config path.
   */
  async createDefaultConfigFile(): Promise<string> {
    if (!this.current) {
      throw WorkspaceError.invalidPath();
    }

    const configPath = path.join(this.current.path, this.config.configFileName);
    if (!fs.existsSync(configPath)) {
      await fs.promises.writeFile(configPath, readDataText('default-swiftlint.yml'), 'utf-8');
    }
    this.current = { ...this.current, configPath };
    return configPath;
  }

  private async saveRecentWorkspaces(): Promise<void> {
    const file = getRecentWorkspacesPath(this.config);
    await fs.promises.mkdir(path.dirname(file), { recursive: true });
    await fs.promises.writeFile(file, JSON.stringify(this.recent, null, 2), 'utf-8');
  }
}
