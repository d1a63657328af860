/**
 * rulestudio Config Comparison
 */

import * as path from 'path';
import { ConfigComparisonResult, Workspace } from '../types.js';
import { ConfigComparisonServiceLike } from '../comparison.js';
import { ViewModel } from './base.js';

export interface ConfigComparisonState {
  leftPath: string | null;
  rightPath: string | null;
  comparisonResult: ConfigComparisonResult | null;
  isComparing: boolean;
  error: unknown;
}

/**
 * A config file is labelled by the directory that holds it
 */
export function configLabel(configPath: string): string {
  return path.basename(path.dirname(path.resolve(configPath)));
}

export class ConfigComparisonViewModel extends ViewModel<ConfigComparisonState> {
  constructor(
    private readonly service: ConfigComparisonServiceLike,
    currentWorkspace?: Workspace | null
  ) {
    super({
      leftPath: currentWorkspace?.configPath ?? null,
      rightPath: null,
      comparisonResult: null,
      isComparing: false,
      error: null,
    });
  }

  selectLeft(leftPath: string): void {
    this.setState({ leftPath, comparisonResult: null });
  }

  selectRight(rightPath: string): void {
    this.setState({ rightPath, comparisonResult: null });
  }

  async compare(): Promise<void> {
    const { leftPath, rightPath } = this.state;
    if (!leftPath || !rightPath) return;

    this.setState({ isComparing: true, error: null });
    try {
      const comparisonResult = await this.service.compare(
        leftPath,
        configLabel(leftPath),
        rightPath,
        configLabel(rightPath)
      );
      this.setState({ comparisonResult });
    } catch (error) {
      this.setState({ error });
    } finally {
      this.setState({ isComparing: false });
    }
  }
}
