/**
 * rulestudio Migration Assistant
 * Plan and apply the config changes needed after a SwiftLint upgrade
 */

import { ConfigDiff, MigrationPlan } from '../types.js';
import { MigrationError } from '../errors.js';
import { MigrationAssistant } from '../migration.js';
import { SwiftLintCLI } from '../swiftlint-cli.js';
import { loadYamlConfig } from '../yaml-config.js';
import { ViewModel } from './base.js';
import type { ConfigEngine } from './rule-browser.js';

export type EngineLoader = (configPath: string) => Promise<ConfigEngine>;

export interface MigrationAssistantState {
  currentVersion: string | null;
  previousVersion: string;
  migrationPlan: MigrationPlan | null;
  previewDiff: ConfigDiff | null;
  isDetecting: boolean;
  isMigrating: boolean;
  error: unknown;
  migrationComplete: boolean;
}

export class MigrationAssistantViewModel extends ViewModel<MigrationAssistantState> {
  constructor(
    private readonly assistant: Pick<MigrationAssistant, 'detectMigrations' | 'applyMigration'>,
    private readonly cli: Pick<SwiftLintCLI, 'getVersion'>,
    private readonly configPath: string | null,
    private readonly openEngine: EngineLoader = loadYamlConfig
  ) {
    super({
      currentVersion: null,
      previousVersion: '',
      migrationPlan: null,
      previewDiff: null,
      isDetecting: false,
      isMigrating: false,
      error: null,
      migrationComplete: false,
    });
  }

  setPreviousVersion(previousVersion: string): void {
    this.setState({ previousVersion });
  }

  /**
   * Plan from the entered previous version to the installed one.
   * `targetVersion` skips asking the CLI.
   */
  async detectMigrations(targetVersion?: string): Promise<void> {
    const previousVersion = this.state.previousVersion.trim();
    if (previousVersion === '') {
      this.setState({ error: MigrationError.noPreviousVersion() });
      return;
    }
    if (!this.configPath) {
      this.setState({ error: MigrationError.fileNotFound() });
      return;
    }

    this.setState({
      isDetecting: true,
      error: null,
      migrationPlan: null,
      previewDiff: null,
      migrationComplete: false,
    });
    try {
      const version = targetVersion || (await this.cli.getVersion());
      const engine = await this.openEngine(this.configPath);
      this.setState({
        currentVersion: version,
        migrationPlan: this.assistant.detectMigrations(engine.getConfig(), previousVersion, version),
      });
    } catch (error) {
      this.setState({ error });
    } finally {
      this.setState({ isDetecting: false });
    }
  }

  async previewChanges(): Promise<ConfigDiff | null> {
    const plan = this.state.migrationPlan;
    if (!this.configPath || !plan) return null;

    try {
      const engine = await this.openEngine(this.configPath);
      const previewDiff = engine.generateDiff(this.assistant.applyMigration(plan, engine.getConfig()));
      this.setState({ previewDiff });
      return previewDiff;
    } catch (error) {
      this.setState({ error });
      return null;
    }
  }

  async applyMigration(): Promise<void> {
    const plan = this.state.migrationPlan;
    if (!this.configPath || !plan) return;

    this.setState({ isMigrating: true, error: null });
    try {
      const engine = await this.openEngine(this.configPath);
      await engine.save(this.assistant.applyMigration(plan, engine.getConfig()), true);
      this.setState({ migrationComplete: true });
    } catch (error) {
      this.setState({ error });
    } finally {
      this.setState({ isMigrating: false });
    }
  }
}
