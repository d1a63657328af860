/**
 * rulestudio Git Branch Diff
 * Compare the working-tree config with the one on another branch or tag
 */

import { ConfigComparisonResult, GitRefs } from '../types.js';
import { GitBranchDiffError } from '../errors.js';
import { GitBranchDiffServiceLike } from '../branch-diff.js';
import { ViewModel } from './base.js';

export interface GitBranchDiffState {
  availableRefs: GitRefs | null;
  selectedRef: string | null;
  comparisonResult: ConfigComparisonResult | null;
  isLoading: boolean;
  isNotGitRepo: boolean;
  error: unknown;
}

export class GitBranchDiffViewModel extends ViewModel<GitBranchDiffState> {
  constructor(
    private readonly service: GitBranchDiffServiceLike,
    private readonly workspacePath: string | null,
    readonly configRelativePath = '.swiftlint.yml'
  ) {
    super({
      availableRefs: null,
      selectedRef: null,
      comparisonResult: null,
      isLoading: false,
      isNotGitRepo: false,
      error: null,
    });
  }

  selectRef(selectedRef: string | null): void {
    this.setState({ selectedRef });
  }

  async loadRefs(): Promise<void> {
    if (!this.workspacePath) {
      this.setState({ isNotGitRepo: true });
      return;
    }

    this.setState({ isLoading: true, error: null, isNotGitRepo: false });
    try {
      this.setState({ availableRefs: await this.service.listAvailableRefs(this.workspacePath) });
    } catch (error) {
      if (error instanceof GitBranchDiffError) {
        this.setState({ isNotGitRepo: true });
      } else {
        this.setState({ error });
      }
    } finally {
      this.setState({ isLoading: false });
    }
  }

  async compareWithSelected(): Promise<void> {
    const { selectedRef } = this.state;
    if (!this.workspacePath || !selectedRef) return;

    this.setState({ isLoading: true, error: null, comparisonResult: null });
    try {
      const comparisonResult = await this.service.compareConfigWithBranch(
        this.workspacePath,
        selectedRef,
        this.configRelativePath
      );
      this.setState({ comparisonResult });
    } catch (error) {
      this.setState({ error });
    } finally {
      this.setState({ isLoading: false });
    }
  }
}
