/**
 * rulestudio Config Version History
 * Browse, compare, restore and prune .swiftlint.yml backups
 */

import { ConfigBackup, ConfigDiff } from '../types.js';
import { VersionHistoryService } from '../version-history.js';
import { ViewModel } from './base.js';

export interface VersionHistoryState {
  backups: ConfigBackup[];
  selectedBackup: ConfigBackup | null;
  comparisonBackup: ConfigBackup | null;
  currentDiff: ConfigDiff | null;
  isLoading: boolean;
  error: unknown;
  showRestoreConfirmation: boolean;
  backupToRestore: ConfigBackup | null;
}

export class ConfigVersionHistoryViewModel extends ViewModel<VersionHistoryState> {
  constructor(
    private readonly service: VersionHistoryService,
    private readonly configPath: string | null
  ) {
    super({
      backups: [],
      selectedBackup: null,
      comparisonBackup: null,
      currentDiff: null,
      isLoading: false,
      error: null,
      showRestoreConfirmation: false,
      backupToRestore: null,
    });
  }

  async loadBackups(): Promise<void> {
    if (!this.configPath) {
      this.setState({ backups: [] });
      return;
    }

    this.setState({ isLoading: true });
    try {
      this.setState({ backups: await this.service.listBackups(this.configPath) });
    } catch (error) {
      this.setState({ error });
    } finally {
      this.setState({ isLoading: false });
    }
  }

  /**
   * First pick, second pick (diff generated), then a third pick starts over
   */
  async selectForComparison(backup: ConfigBackup): Promise<void> {
    const { selectedBackup, comparisonBackup } = this.state;
    if (!selectedBackup) {
      this.setState({ selectedBackup: backup });
    } else if (!comparisonBackup) {
      this.setState({ comparisonBackup: backup });
      await this.generateDiff(selectedBackup, backup);
    } else {
      this.setState({ selectedBackup: backup, comparisonBackup: null, currentDiff: null });
    }
  }

  clearComparison(): void {
    this.setState({ selectedBackup: null, comparisonBackup: null, currentDiff: null });
  }

  confirmRestore(backup: ConfigBackup): void {
    this.setState({ backupToRestore: backup, showRestoreConfirmation: true });
  }

  cancelRestore(): void {
    this.setState({ backupToRestore: null, showRestoreConfirmation: false });
  }

  async restoreVersion(): Promise<void> {
    const backup = this.state.backupToRestore;
    if (!backup || !this.configPath) return;

    try {
      await this.service.restoreBackup(backup, this.configPath);
      this.setState({ error: null });
      await this.loadBackups();
    } catch (error) {
      this.setState({ error });
    } finally {
      this.setState({ backupToRestore: null, showRestoreConfirmation: false });
    }
  }

  async pruneOld(keepCount = 10): Promise<void> {
    if (!this.configPath) return;
    try {
      await this.service.pruneOldBackups(this.configPath, keepCount);
      await this.loadBackups();
    } catch (error) {
      this.setState({ error });
    }
  }

  private async generateDiff(first: ConfigBackup, second: ConfigBackup): Promise<void> {
    try {
      this.setState({ currentDiff: await this.service.diffBetween(first, second) });
    } catch (error) {
      this.setState({ error });
    }
  }
}
