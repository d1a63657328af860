/**
 * Tests for git access and branch config comparison
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as path from 'path';
import { GitService, getGitInfo } from '../git.js';
import { GitBranchDiffService } from '../branch-diff.js';
import { CommandFailure } from '../exec.js';
import { createStubRunner, createTempWorkspace, removeTempWorkspace } from './helpers.js';

const NOT_A_REPO = { stderr: 'fatal: not a git repository (or any of the parent directories): .git', exitCode: 128 };

describe('GitService', () => {
  it('detects a work tree', async () => {
    const { runner, calls } = createStubRunner(() => ({ stdout: 'true\n' }));
    const git = new GitService({ runner, timeoutMs: 1000 });

    expect(await git.isGitRepository('/repo')).toBe(true);
    expect(calls[0]).toMatchObject({
      command: 'git',
      args: ['rev-parse', '--is-inside-work-tree'],
      options: { cwd: '/repo', timeoutMs: 1000 },
    });
  });

  it('reports false outside a repository', async () => {
    const { runner } = createStubRunner(() => NOT_A_REPO);

    expect(await new GitService({ runner }).isGitRepository('/tmp')).toBe(false);
  });

  it('lists branches without blank lines', async () => {
    const { runner, calls } = createStubRunner(() => ({ stdout: 'main\n  feature/rules\n\n' }));

    expect(await new GitService({ runner }).listBranches('/repo')).toEqual(['main', 'feature/rules']);
    expect(calls[0].args).toEqual(['branch', '--format=%(refname:short)']);
  });

  it('maps a missing file to fileNotFound', async () => {
    const { runner, calls } = createStubRunner(() => ({
      stderr: "fatal: path '.swiftlint.yml' does not exist in 'main'",
      exitCode: 128,
    }));

    await expect(new GitService({ runner }).showFile('/repo', 'main', '.swiftlint.yml')).rejects.toThrow(
      "File '.swiftlint.yml' not found at 'main'"
    );
    expect(calls[0].args).toEqual(['show', 'main:.swiftlint.yml']);
  });

  it('maps an unknown ref to branchNotFound', async () => {
    const { runner } = createStubRunner(() => ({ stderr: "fatal: invalid object name 'nope'.", exitCode: 128 }));

    await expect(new GitService({ runner }).diffFile('/repo', 'main', 'nope', 'a.yml')).rejects.toMatchObject({
      code: 'branchNotFound',
    });
  });

  it('maps a non-repository to notARepository', async () => {
    const { runner } = createStubRunner(() => NOT_A_REPO);

    await expect(new GitService({ runner }).getCurrentBranch('/tmp/x')).rejects.toThrow('Not a git repository: /tmp/x');
  });

  it('reports timeouts in seconds', async () => {
    const { runner } = createStubRunner(() => new CommandFailure('timeout', 'git timed out'));

    await expect(new GitService({ runner, timeoutMs: 2000 }).listTags('/repo')).rejects.toThrow(
      'Git command timed out after 2 seconds.'
    );
  });
});

describe('getGitInfo', () => {
  it('returns branch and short commit', async () => {
    const { runner } = createStubRunner((_command, args) =>
      args.includes('--abbrev-ref') ? { stdout: 'main\n' } : { stdout: 'abcdef1234567890\n' }
    );

    expect(await getGitInfo('/repo', new GitService({ runner }))).toEqual({
      branch: 'main',
      commit: 'abcdef1',
      commitFull: 'abcdef1234567890',
    });
  });

  it('returns null when git fails', async () => {
    const { runner } = createStubRunner(() => NOT_A_REPO);

    expect(await getGitInfo('/tmp', new GitService({ runner }))).toBeNull();
  });
});

describe('GitBranchDiffService', () => {
  let root: string;

  afterEach(() => {
    if (root) removeTempWorkspace(root);
  });

  it('rejects a folder that is not a repository', async () => {
    const { runner } = createStubRunner(() => NOT_A_REPO);
    const service = new GitBranchDiffService(new GitService({ runner }));

    await expect(service.listAvailableRefs('/tmp')).rejects.toMatchObject({ code: 'notGitRepo' });
  });

  it('lists current branch, branches and tags', async () => {
    const { runner } = createStubRunner((_command, args) => {
      if (args[0] === 'rev-parse' && args[1] === '--is-inside-work-tree') return { stdout: 'true' };
      if (args[0] === 'rev-parse') return { stdout: 'main\n' };
      if (args[0] === 'branch') return { stdout: 'main\nrelease\n' };
      return { stdout: 'v1.0\n' };
    });
    const service = new GitBranchDiffService(new GitService({ runner }));

    expect(await service.listAvailableRefs('/repo')).toEqual({
      currentBranch: 'main',
      branches: ['main', 'release'],
      tags: ['v1.0'],
    });
  });

  it('compares the working config with the branch copy', async () => {
    root = createTempWorkspace({ '.swiftlint.yml': 'todo: true\nforce_cast: false\n' });
    const { runner } = createStubRunner(() => ({ stdout: 'todo: true\nline_length:\n  warning: 100\n' }));
    const service = new GitBranchDiffService(new GitService({ runner }));

    const result = await service.compareConfigWithBranch(root, 'release');

    expect(result.firstLabel).toBe('Current');
    expect(result.secondLabel).toBe('release');
    expect(result.onlyInFirst).toEqual(['force_cast']);
    expect(result.onlyInSecond).toEqual(['line_length']);
    expect(result.inBothSame).toEqual(['todo']);
    expect(result.diff.before).toBe('todo: true\nforce_cast: false\n');
  });

  it('reports a config missing on the branch', async () => {
    root = createTempWorkspace({ '.swiftlint.yml': 'todo: true\n' });
    const { runner } = createStubRunner(() => ({
      stderr: "fatal: path 'lint/.swiftlint.yml' does not exist in 'gone'",
      exitCode: 128,
    }));
    const service = new GitBranchDiffService(new GitService({ runner }));

    await expect(
      service.compareConfigWithBranch(root, 'gone', path.join('lint', '.swiftlint.yml'))
    ).rejects.toThrow("No .swiftlint.yml found on branch 'gone'.");
  });
});
