/**
 * rulestudio Rule Detail
 * Enable/disable one rule and change its severity
 */

import { ConfigDiff, Rule, Severity, isSeverity } from '../types.js';
import { RuleConfigurationError } from '../errors.js';
import { setRuleEnabled } from '../yaml-config.js';
import { ViewModel } from './base.js';
import type { ConfigEngine } from './rule-browser.js';

export interface PendingRuleChange {
  enabled: boolean;
  severity?: Severity;
}

export interface RuleDetailState {
  isEnabled: boolean;
  severity?: Severity;
  isSaving: boolean;
  saveError: unknown;
  pendingChanges: PendingRuleChange | null;
}

export class RuleDetailViewModel extends ViewModel<RuleDetailState> {
  private originalEnabled: boolean;
  private originalSeverity: Severity | undefined;

  constructor(
    readonly rule: Rule,
    private readonly engine: ConfigEngine | null
  ) {
    super({
      isEnabled: rule.isEnabled,
      severity: rule.severity ?? rule.defaultSeverity,
      isSaving: false,
      saveError: null,
      pendingChanges: null,
    });
    this.originalEnabled = this.state.isEnabled;
    this.originalSeverity = this.state.severity;
  }

  /**
   * Read the rule's entry from the config. A rule with no entry is on unless it is
   * opt-in, and starts on its default severity.
   */
  async loadConfiguration(): Promise<void> {
    if (!this.engine) return;
    try {
      await this.engine.load();
      const entry = this.engine.getConfig().rules[this.rule.id];
      const isEnabled = entry ? entry.enabled : !this.rule.isOptIn;
      // An entry without a severity keeps none, so an untouched save writes nothing new
      const entrySeverity = entry && isSeverity(entry.severity) ? entry.severity : undefined;
      const severity = entry ? entrySeverity : this.rule.defaultSeverity;

      this.originalEnabled = isEnabled;
      this.originalSeverity = severity;
      this.setState({ isEnabled, severity, pendingChanges: null, saveError: null });
    } catch (error) {
      this.setState({ saveError: error });
    }
  }

  updateEnabled(isEnabled: boolean): void {
    this.setState({ isEnabled });
    this.trackPending();
  }

  updateSeverity(severity: Severity): void {
    this.setState({ severity });
    this.trackPending();
  }

  async generateDiff(): Promise<ConfigDiff | null> {
    if (!this.engine) return null;
    try {
      await this.engine.load();
      const proposed = setRuleEnabled(
        this.engine.getConfig(),
        this.rule.id,
        this.state.isEnabled,
        this.state.severity
      );
      return this.engine.generateDiff(proposed);
    } catch (error) {
      this.setState({ saveError: error });
      return null;
    }
  }

  async saveConfiguration(): Promise<void> {
    if (!this.engine) {
      throw RuleConfigurationError.noWorkspace();
    }

    this.setState({ isSaving: true, saveError: null });
    try {
      await this.engine.load();
      const config = setRuleEnabled(
        this.engine.getConfig(),
        this.rule.id,
        this.state.isEnabled,
        this.state.severity
      );
      this.engine.validate(config);
      await this.engine.save(config, true);

      this.originalEnabled = this.state.isEnabled;
      this.originalSeverity = this.state.severity;
      this.setState({ pendingChanges: null });
    } catch (error) {
      this.setState({ saveError: error });
      throw error;
    } finally {
      this.setState({ isSaving: false });
    }
  }

  async cancelChanges(): Promise<void> {
    this.setState({ isEnabled: this.originalEnabled, severity: this.originalSeverity, pendingChanges: null });
    await this.loadConfiguration();
  }

  private trackPending(): void {
    const { isEnabled, severity } = this.state;
    const changed = isEnabled !== this.originalEnabled || severity !== this.originalSeverity;
    this.setState({ pendingChanges: changed ? { enabled: isEnabled, severity } : null });
  }
}
