/**
 * Tests for the workspace manager
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { WorkspaceManager, createWorkspace, validateSwiftWorkspace, workspaceId } from '../workspace.js';
import { readDataText } from '../data-loader.js';
import { StudioConfig } from '../config.js';
import { createStudioConfig, createTempWorkspace, removeTempWorkspace } from './helpers.js';

describe('workspace identity', () => {
  it('derives a stable id from the resolved path', () => {
    expect(workspaceId('/projects/App')).toBe(workspaceId('/projects/App/'));
    expect(workspaceId('/projects/App')).toMatch(/^[0-9a-f]{16}$/);
  });

  it('creates a workspace pointing at its config', () => {
    const workspace = createWorkspace('/projects/App', createStudioConfig('/tmp'));

    expect(workspace).toMatchObject({
      path: '/projects/App',
      name: 'App',
      configPath: '/projects/App/.swiftlint.yml',
      id: workspaceId('/projects/App'),
    });
  });
});

describe('validateSwiftWorkspace', () => {
  let root: string;

  afterEach(() => {
    removeTempWorkspace(root);
  });

  it('accepts a Swift package', async () => {
    root = createTempWorkspace({ 'Package.swift': '' });
    await expect(validateSwiftWorkspace(root)).resolves.toBeUndefined();
  });

  it('accepts an Xcode project', async () => {
    root = createTempWorkspace({ 'App.xcodeproj/project.pbxproj': '' });
    await expect(validateSwiftWorkspace(root)).resolves.toBeUndefined();
  });

  it('accepts nested Swift sources', async () => {
    root = createTempWorkspace({ 'Sources/App/main.swift': '' });
    await expect(validateSwiftWorkspace(root)).resolves.toBeUndefined();
  });

  it('rejects a folder without Swift code', async () => {
    root = createTempWorkspace({ 'README.md': '' });
    await expect(validateSwiftWorkspace(root)).rejects.toMatchObject({ code: 'notASwiftProject' });
  });

  it('reports an unreadable folder as access denied', async () => {
    root = createTempWorkspace();
    await expect(validateSwiftWorkspace(path.join(root, 'missing'))).rejects.toMatchObject({ code: 'accessDenied' });
  });
});

describe('WorkspaceManager', () => {
  let home: string;
  let projects: string;
  let config: StudioConfig;

  beforeEach(() => {
    home = createTempWorkspace();
    projects = createTempWorkspace({
      'App/Package.swift': '',
      'Kit/Package.swift': '',
      'Tool/Package.swift': '',
      'App/README.md': '',
    });
    config = createStudioConfig(home, { maxRecentWorkspaces: 2 });
  });

  afterEach(() => {
    removeTempWorkspace(home);
    removeTempWorkspace(projects);
  });

  it('opens a workspace and remembers it', async () => {
    const manager = new WorkspaceManager(config);

    const workspace = await manager.openWorkspace(path.join(projects, 'App'));

    expect(manager.currentWorkspace).toEqual(workspace);
    expect(manager.configFileMissing).toBe(true);
    const reloaded = new WorkspaceManager(config);
    expect((await reloaded.loadRecentWorkspaces()).map((ws) => ws.name)).toEqual(['App']);
  });

  it('keeps the most recent workspaces first', async () => {
    const manager = new WorkspaceManager(config);

    await manager.openWorkspace(path.join(projects, 'App'));
    await manager.openWorkspace(path.join(projects, 'Kit'));
    await manager.openWorkspace(path.join(projects, 'App'));
    await manager.openWorkspace(path.join(projects, 'Tool'));

    expect(manager.recentWorkspaces.map((ws) => ws.name)).toEqual(['Tool', 'App']);
  });

  it('rejects a file path', async () => {
    const manager = new WorkspaceManager(config);

    await expect(manager.openWorkspace(path.join(projects, 'App/README.md'))).rejects.toMatchObject({
      code: 'notADirectory',
    });
  });

  it('drops recent workspaces that no longer exist', async () => {
    const manager = new WorkspaceManager(config);
    await manager.openWorkspace(path.join(projects, 'App'));
    await manager.openWorkspace(path.join(projects, 'Kit'));
    fs.rmSync(path.join(projects, 'Kit'), { recursive: true });

    expect((await new WorkspaceManager(config).loadRecentWorkspaces()).map((ws) => ws.name)).toEqual(['App']);
  });

  it('records the analysis time', async () => {
    const manager = new WorkspaceManager(config);
    await manager.openWorkspace(path.join(projects, 'App'));

    await manager.markAnalyzed(1234);

    expect(manager.currentWorkspace?.lastAnalyzed).toBe(1234);
    expect(manager.recentWorkspaces[0].lastAnalyzed).toBe(1234);
  });

  it('removes and clears recent entries', async () => {
    const manager = new WorkspaceManager(config);
    const app = await manager.openWorkspace(path.join(projects, 'App'));
    await manager.openWorkspace(path.join(projects, 'Kit'));

    await manager.removeFromRecent(app.id);
    expect(manager.recentWorkspaces.map((ws) => ws.name)).toEqual(['Kit']);

    await manager.clearRecent();
    expect(await new WorkspaceManager(config).loadRecentWorkspaces()).toEqual([]);
  });

  it('writes the default config once', async () => {
    const manager = new WorkspaceManager(config);
    await manager.openWorkspace(path.join(projects, 'App'));

    const file = await manager.createDefaultConfigFile();

    expect(file).toBe(path.join(projects, 'App', '.swiftlint.yml'));
    expect(fs.readFileSync(file, 'utf-8')).toBe(readDataText('default-swiftlint.yml'));
    expect(manager.configFileMissing).toBe(false);

    fs.writeFileSync(file, 'todo: true\n');
    await manager.createDefaultConfigFile();
    expect(fs.readFileSync(file, 'utf-8')).toBe('todo: true\n');
  });

  it('needs an open workspace for the default config', async () => {
    const manager = new WorkspaceManager(config);
    manager.closeWorkspace();

    await expect(manager.createDefaultConfigFile()).rejects.toThrow('No workspace is open.');
  });
});
