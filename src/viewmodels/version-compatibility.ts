/**
 * rulestudio Version Compatibility
 * Report deprecated, removed and renamed rules for the installed SwiftLint
 */

import { CompatibilityReport, RenamedRuleFinding, StudioYamlConfig } from '../types.js';
import { YamlConfigError } from '../errors.js';
import { VersionCompatibilityChecker } from '../compatibility.js';
import { SwiftLintCLI } from '../swiftlint-cli.js';
import { cloneConfig, loadYamlConfig } from '../yaml-config.js';
import { ViewModel } from './base.js';
import type { EngineLoader } from './migration-assistant.js';

export interface VersionCompatibilityState {
  report: CompatibilityReport | null;
  isChecking: boolean;
  error: unknown;
  currentVersion: string | null;
}

function replaceInList(list: string[] | undefined, from: string, to: string): string[] | undefined {
  if (!list) return list;
  const index = list.indexOf(from);
  if (index < 0) return list;
  const next = [...list];
  next[index] = to;
  return next;
}

/**
 * Move a rule entry to its new id and rewrite it in disabled_rules and opt_in_rules
 */
export function renameRuleInConfig(config: StudioYamlConfig, rename: RenamedRuleFinding): StudioYamlConfig {
  const next = cloneConfig(config);
  const entry = next.rules[rename.oldId];
  if (entry) {
    delete next.rules[rename.oldId];
    next.rules[rename.newId] = entry;
  }
  next.disabledRules = replaceInList(next.disabledRules, rename.oldId, rename.newId);
  next.optInRules = replaceInList(next.optInRules, rename.oldId, rename.newId);
  return next;
}

export function removeRuleFromConfig(config: StudioYamlConfig, ruleId: string): StudioYamlConfig {
  const next = cloneConfig(config);
  delete next.rules[ruleId];
  const without = (list: string[] | undefined): string[] | undefined => {
    if (!list) return list;
    const remaining = list.filter((id) => id !== ruleId);
    return remaining.length > 0 ? remaining : undefined;
  };
  next.disabledRules = without(next.disabledRules);
  next.optInRules = without(next.optInRules);
  return next;
}

export class VersionCompatibilityViewModel extends ViewModel<VersionCompatibilityState> {
  constructor(
    private readonly checker: Pick<VersionCompatibilityChecker, 'checkCompatibility'>,
    private readonly cli: Pick<SwiftLintCLI, 'getVersion'>,
    private readonly configPath: string | null,
    private readonly openEngine: EngineLoader = loadYamlConfig
  ) {
    super({ report: null, isChecking: false, error: null, currentVersion: null });
  }

  /**
   * Check against `version`, or the installed SwiftLint when omitted
   */
  async checkCompatibility(version?: string): Promise<void> {
    if (!this.configPath) {
      this.setState({ error: YamlConfigError.fileNotFound() });
      return;
    }

    this.setState({ isChecking: true, error: null, report: null });
    try {
      const currentVersion = version || (await this.cli.getVersion());
      const engine = await this.openEngine(this.configPath);
      this.setState({
        currentVersion,
        report: this.checker.checkCompatibility(engine.getConfig(), currentVersion),
      });
    } catch (error) {
      this.setState({ error });
    } finally {
      this.setState({ isChecking: false });
    }
  }

  async applyRenaming(rename: RenamedRuleFinding): Promise<void> {
    await this.rewrite((config) => renameRuleInConfig(config, rename));
  }

  /**
   * Every rename and every removal from the current report, in one save
   */
  async applyAllFixes(): Promise<void> {
    const report = this.state.report;
    if (!report) return;

    await this.rewrite((config) => {
      const renamed = report.renamedRules.reduce(renameRuleInConfig, config);
      return report.removedRules.reduce((next, finding) => removeRuleFromConfig(next, finding.ruleId), renamed);
    });
  }

  private async rewrite(edit: (config: StudioYamlConfig) => StudioYamlConfig): Promise<void> {
    if (!this.configPath) return;
    try {
      const engine = await this.openEngine(this.configPath);
      await engine.save(edit(engine.getConfig()), true);
    } catch (error) {
      this.setState({ error });
      return;
    }
    await this.checkCompatibility(this.state.currentVersion ?? undefined);
  }
}
