/**
 * rulestudio Rule Browser
 * Search, filter, sort and bulk-edit the rule list
 */

import {
  ConfigDiff,
  Rule,
  RuleCategory,
  Severity,
  StudioYamlConfig,
  categoryDisplayName,
} from '../types.js';
import { YamlConfigEngine, cloneConfig, setRuleEnabled, setRuleSeverity } from '../yaml-config.js';
import { LOADING_DESCRIPTION, RuleRegistry } from '../rule-registry.js';
import { applyPreset as applyPresetToConfig, getPreset } from '../presets.js';
import { ViewModel } from './base.js';

export type RuleStatusFilter = 'all' | 'enabled' | 'disabled' | 'optIn';
export type RuleSortOption = 'name' | 'identifier' | 'category';

export type ConfigEngine = Pick<YamlConfigEngine, 'load' | 'getConfig' | 'generateDiff' | 'validate' | 'save'>;

export interface RuleGroup {
  category: RuleCategory;
  displayName: string;
  rules: Rule[];
}

export interface RuleBrowserState {
  rules: Rule[];
  searchText: string;
  selectedCategory: RuleCategory | null;
  statusFilter: RuleStatusFilter;
  sortOption: RuleSortOption;
  isLoading: boolean;
  isMultiSelectMode: boolean;
  selectedRuleIds: string[];
  bulkDiff: ConfigDiff | null;
  isSaving: boolean;
  error: unknown;
}

// =============================================================================
// FILTERING
// =============================================================================

function compareText(a: string, b: string): number {
  return a.localeCompare(b, undefined, { sensitivity: 'base' });
}

export function matchesSearch(rule: Rule, searchText: string): boolean {
  const query = searchText.trim().toLowerCase();
  if (query === '') return true;
  if (rule.id.toLowerCase().includes(query) || rule.name.toLowerCase().includes(query)) return true;
  return rule.description !== LOADING_DESCRIPTION && rule.description.toLowerCase().includes(query);
}

export function matchesStatus(rule: Rule, status: RuleStatusFilter): boolean {
  switch (status) {
    case 'all':
      return true;
    case 'enabled':
      return rule.isEnabled;
    case 'disabled':
      return !rule.isEnabled;
    case 'optIn':
      return rule.isOptIn;
  }
}

export function sortRules(rules: Rule[], option: RuleSortOption): Rule[] {
  const sorted = [...rules];
  switch (option) {
    case 'name':
      return sorted.sort((a, b) => compareText(a.name, b.name));
    case 'identifier':
      return sorted.sort((a, b) => compareText(a.id, b.id));
    case 'category':
      return sorted.sort((a, b) =>
        a.category === b.category ? compareText(a.name, b.name) : a.category.localeCompare(b.category)
      );
  }
}

// =============================================================================
// VIEW-MODEL
// =============================================================================

export class RuleBrowserViewModel extends ViewModel<RuleBrowserState> {
  private pendingConfig: StudioYamlConfig | null = null;

  constructor(
    private readonly registry?: Pick<RuleRegistry, 'loadRules'>,
    rules: Rule[] = []
  ) {
    super({
      rules,
      searchText: '',
      selectedCategory: null,
      statusFilter: 'all',
      sortOption: 'name',
      isLoading: false,
      isMultiSelectMode: false,
      selectedRuleIds: [],
      bulkDiff: null,
      isSaving: false,
      error: null,
    });
  }

  async loadRules(): Promise<void> {
    if (!this.registry) return;
    this.setState({ isLoading: true, error: null });
    try {
      this.setState({ rules: await this.registry.loadRules() });
    } catch (error) {
      this.setState({ error });
    } finally {
      this.setState({ isLoading: false });
    }
  }

  setRules(rules: Rule[]): void {
    this.setState({ rules });
  }

  setSearchText(searchText: string): void {
    this.setState({ searchText });
  }

  setCategory(selectedCategory: RuleCategory | null): void {
    this.setState({ selectedCategory });
  }

  setStatusFilter(statusFilter: RuleStatusFilter): void {
    this.setState({ statusFilter });
  }

  setSortOption(sortOption: RuleSortOption): void {
    this.setState({ sortOption });
  }

  get filteredRules(): Rule[] {
    const { rules, searchText, selectedCategory, statusFilter, sortOption } = this.state;
    const filtered = rules.filter(
      (rule) =>
        matchesSearch(rule, searchText) &&
        matchesStatus(rule, statusFilter) &&
        (selectedCategory === null || rule.category === selectedCategory)
    );
    return sortRules(filtered, sortOption);
  }

  get groupedRules(): RuleGroup[] {
    const groups = new Map<RuleCategory, Rule[]>();
    for (const rule of this.filteredRules) {
      const group = groups.get(rule.category) || [];
      group.push(rule);
      groups.set(rule.category, group);
    }
    return Array.from(groups, ([category, rules]) => ({
      category,
      displayName: categoryDisplayName(category),
      rules,
    })).sort((a, b) => a.displayName.localeCompare(b.displayName));
  }

  /**
   * Counts per category under the current search and status, ignoring the category filter
   */
  get categoryCounts(): Partial<Record<RuleCategory, number>> {
    const counts: Partial<Record<RuleCategory, number>> = {};
    for (const rule of this.state.rules) {
      if (!matchesSearch(rule, this.state.searchText) || !matchesStatus(rule, this.state.statusFilter)) continue;
      counts[rule.category] = (counts[rule.category] || 0) + 1;
    }
    return counts;
  }

  clearFilters(): void {
    this.setState({ searchText: '', selectedCategory: null, statusFilter: 'all' });
  }

  // ---------------------------------------------------------------------------
  // Selection
  // ---------------------------------------------------------------------------

  toggleMultiSelect(): void {
    const isMultiSelectMode = !this.state.isMultiSelectMode;
    this.setState(isMultiSelectMode ? { isMultiSelectMode } : { isMultiSelectMode, selectedRuleIds: [] });
  }

  toggleRuleSelection(ruleId: string): void {
    const selected = this.state.selectedRuleIds;
    this.setState({
      selectedRuleIds: selected.includes(ruleId) ? selected.filter((id) => id !== ruleId) : [...selected, ruleId],
    });
  }

  selectAllFiltered(): void {
    this.setState({ selectedRuleIds: this.filteredRules.map((rule) => rule.id) });
  }

  clearSelection(): void {
    this.setState({ selectedRuleIds: [] });
  }

  // ---------------------------------------------------------------------------
  // Bulk edits
  // ---------------------------------------------------------------------------

  async enableSelectedRules(engine: ConfigEngine): Promise<void> {
    await this.prepareBulk(engine, (config) =>
      this.state.selectedRuleIds.reduce((next, id) => setRuleEnabled(next, id, true), config)
    );
  }

  async disableSelectedRules(engine: ConfigEngine): Promise<void> {
    await this.prepareBulk(engine, (config) =>
      this.state.selectedRuleIds.reduce((next, id) => setRuleEnabled(next, id, false), config)
    );
  }

  async setSeverityForSelected(severity: Severity, engine: ConfigEngine): Promise<void> {
    await this.prepareBulk(engine, (config) =>
      this.state.selectedRuleIds.reduce((next, id) => setRuleSeverity(next, id, severity), config)
    );
  }

  async applyPreset(presetId: string, engine: ConfigEngine): Promise<void> {
    const preset = getPreset(presetId);
    if (!preset) {
      this.setState({ error: new Error(`Unknown preset: ${presetId}`) });
      return;
    }
    await this.prepareBulk(engine, (config) => applyPresetToConfig(config, preset));
  }

  /**
   * Write the config prepared by the last bulk edit, with a backup
   */
  async saveBulkChanges(engine: ConfigEngine): Promise<void> {
    if (!this.pendingConfig) return;
    this.setState({ isSaving: true, error: null });
    try {
      engine.validate(this.pendingConfig);
      await engine.save(this.pendingConfig, true);
      this.pendingConfig = null;
      this.setState({ bulkDiff: null });
    } catch (error) {
      this.setState({ error });
    } finally {
      this.setState({ isSaving: false });
    }
  }

  discardBulkChanges(): void {
    this.pendingConfig = null;
    this.setState({ bulkDiff: null });
  }

  private async prepareBulk(
    engine: ConfigEngine,
    edit: (config: StudioYamlConfig) => StudioYamlConfig
  ): Promise<void> {
    this.setState({ error: null });
    try {
      await engine.load();
      const proposed = edit(cloneConfig(engine.getConfig()));
      this.pendingConfig = proposed;
      this.setState({ bulkDiff: engine.generateDiff(proposed) });
    } catch (error) {
      this.setState({ error });
    }
  }
}
