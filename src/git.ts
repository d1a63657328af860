/**
 * rulestudio Git Utilities
 * Branch, tag and file-at-ref access through the git CLI
 */

import { CommandFailure, CommandResult, CommandRunner, defaultCommandRunner } from './exec.js';
import { GitError, errorMessage } from './errors.js';
import { GitInfo } from './types.js';
import { getConfig } from './config.js';

function splitLines(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export class GitService {
  private readonly runner: CommandRunner;
  private readonly timeoutMs: number;

  constructor(options: { runner?: CommandRunner; timeoutMs?: number } = {}) {
    this.runner = options.runner || defaultCommandRunner;
    this.timeoutMs = options.timeoutMs ?? getConfig().gitTimeoutMs;
  }

  /**
   * Never throws: any failure means "not a repository"
   */
  async isGitRepository(repoPath: string): Promise<boolean> {
    try {
      const output = await this.git(repoPath, ['rev-parse', '--is-inside-work-tree']);
      return output.trim() === 'true';
    } catch {
      return false;
    }
  }

  async getCurrentBranch(repoPath: string): Promise<string> {
    return (await this.git(repoPath, ['rev-parse', '--abbrev-ref', 'HEAD'])).trim();
  }

  async getHeadCommit(repoPath: string): Promise<string> {
    return (await this.git(repoPath, ['rev-parse', 'HEAD'])).trim();
  }

  async listBranches(repoPath: string): Promise<string[]> {
    return splitLines(await this.git(repoPath, ['branch', '--format=%(refname:short)']));
  }

  async listTags(repoPath: string): Promise<string[]> {
    return splitLines(await this.git(repoPath, ['tag', '--list']));
  }

  /**
   * Contents of `file` at `ref` (git show ref:file)
   */
  async showFile(repoPath: string, ref: string, file: string): Promise<string> {
    try {
      return await this.git(repoPath, ['show', `${ref}:${file}`]);
    } catch (error) {
      if (
        error instanceof GitError &&
        error.code === 'executionFailed' &&
        /does not exist|exists on disk, but not in/.test(error.message)
      ) {
        throw GitError.fileNotFound(file, ref);
      }
      throw error;
    }
  }

  async diffFile(repoPath: string, fromRef: string, toRef: string, file: string): Promise<string> {
    return this.git(repoPath, ['diff', fromRef, toRef, '--', file]);
  }

  private async git(cwd: string, args: string[]): Promise<string> {
    let result: CommandResult;
    try {
      result = await this.runner('git', args, { cwd, timeoutMs: this.timeoutMs });
    } catch (error) {
      if (error instanceof CommandFailure && error.reason === 'timeout') {
        throw GitError.timeout(Math.round(this.timeoutMs / 1000));
      }
      throw GitError.executionFailed(errorMessage(error));
    }

    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim();
      if (/not a git repository/i.test(stderr)) {
        throw GitError.notARepository(cwd);
      }
      if (/unknown revision|invalid object name|bad revision/i.test(stderr)) {
        throw GitError.branchNotFound(args[args.length - 1]);
      }
      throw GitError.executionFailed(stderr || `git ${args[0]} exited with code ${result.exitCode}`);
    }
    return result.stdout;
  }
}

/**
 * Get current git branch and commit info.
 * Returns null if not a git repo or git is unavailable.
 */
export async function getGitInfo(repoPath: string, service = new GitService()): Promise<GitInfo | null> {
  try {
    const [branch, commitFull] = await Promise.all([
      service.getCurrentBranch(repoPath),
      service.getHeadCommit(repoPath),
    ]);
    if (!branch || !commitFull) return null;

    return {
      branch,
      commit: commitFull.slice(0, 7),
      commitFull,
    };
  } catch {
    return null;
  }
}
