/**
 * rulestudio Git Branch Diff
 * Compares the working copy config with the one committed on another branch
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigComparisonResult, GitRefs } from './types.js';
import { GitService } from './git.js';
import { ConfigComparisonService, ConfigComparisonServiceLike } from './comparison.js';
import { GitBranchDiffError } from './errors.js';

export interface GitBranchDiffServiceLike {
  listAvailableRefs(repoPath: string): Promise<GitRefs>;
  compareConfigWithBranch(repoPath: string, branch: string, configRelativePath?: string): Promise<ConfigComparisonResult>;
}

export class GitBranchDiffService implements GitBranchDiffServiceLike {
  constructor(
    private readonly git: GitService = new GitService(),
    private readonly comparison: ConfigComparisonServiceLike = new ConfigComparisonService()
  ) {}

  async listAvailableRefs(repoPath: string): Promise<GitRefs> {
    if (!(await this.git.isGitRepository(repoPath))) {
      throw GitBranchDiffError.notGitRepo();
    }

    const [currentBranch, branches, tags] = await Promise.all([
      this.git.getCurrentBranch(repoPath),
      this.git.listBranches(repoPath),
      this.git.listTags(repoPath),
    ]);
    return { currentBranch, branches, tags };
  }

  async compareConfigWithBranch(
    repoPath: string,
    branch: string,
    configRelativePath = '.swiftlint.yml'
  ): Promise<ConfigComparisonResult> {
    let branchContent: string;
    try {
      branchContent = await this.git.showFile(repoPath, branch, configRelativePath);
    } catch {
      throw GitBranchDiffError.configNotFoundOnBranch(branch);
    }

    const tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'rulestudio-branch-'));
    try {
      const branchConfigPath = path.join(tempDir, path.basename(configRelativePath));
      await fs.promises.writeFile(branchConfigPath, branchContent, 'utf-8');

      return await this.comparison.compare(
        path.join(repoPath, configRelativePath),
        'Current',
        branchConfigPath,
        branch
      );
    } finally {
      await fs.promises.rm(tempDir, { recursive: true, force: true });
    }
  }
}
