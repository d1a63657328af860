/**
 * rulestudio Violation Inspector
 * Filter, sort and act on the violations stored for a workspace.
 *
 * Filter and sort changes recompute `filteredViolations` and drop selected
 * ids that are no longer visible.
 */

import { Severity, Violation, Workspace } from '../types.js';
import { ViolationStore } from '../violation-storage.js';
import { WorkspaceAnalyzer } from '../workspace-analyzer.js';
import { ViewModel } from './base.js';

export type ViolationGroupingOption = 'none' | 'file' | 'rule' | 'severity';
export type ViolationSortOption = 'file' | 'rule' | 'severity' | 'date' | 'line';
export type ViolationSortOrder = 'ascending' | 'descending';

type Analyzer = Pick<WorkspaceAnalyzer, 'analyze'>;

export interface ViolationInspectorState {
  violations: Violation[];
  filteredViolations: Violation[];
  selectedViolationId: string | null;
  selectedViolationIds: string[];
  isAnalyzing: boolean;
  searchText: string;
  selectedRuleIds: string[];
  selectedSeverities: Severity[];
  selectedFiles: string[];
  showSuppressedOnly: boolean;
  groupingOption: ViolationGroupingOption;
  sortOption: ViolationSortOption;
  sortOrder: ViolationSortOrder;
  error: unknown;
}

type FilterKeys =
  | 'searchText'
  | 'selectedRuleIds'
  | 'selectedSeverities'
  | 'selectedFiles'
  | 'showSuppressedOnly'
  | 'groupingOption'
  | 'sortOption'
  | 'sortOrder';

function compareText(a: string, b: string): number {
  return a.localeCompare(b, undefined, { sensitivity: 'base' });
}

export function sortViolations(
  violations: Violation[],
  option: ViolationSortOption,
  order: ViolationSortOrder = 'ascending'
): Violation[] {
  const direction = order === 'ascending' ? 1 : -1;

  return [...violations].sort((a, b) => {
    switch (option) {
      case 'file': {
        const byPath = compareText(a.filePath, b.filePath);
        return byPath !== 0 ? byPath * direction : a.line - b.line;
      }
      case 'rule': {
        const byRule = compareText(a.ruleId, b.ruleId);
        return byRule !== 0 ? byRule * direction : compareText(a.filePath, b.filePath);
      }
      case 'severity':
        if (a.severity !== b.severity) return a.severity === 'error' ? -1 : 1;
        return compareText(a.filePath, b.filePath);
      case 'date':
        return b.detectedAt - a.detectedAt;
      case 'line':
        if (a.filePath !== b.filePath) return compareText(a.filePath, b.filePath);
        return a.line - b.line;
    }
  });
}

export class ViolationInspectorViewModel extends ViewModel<ViolationInspectorState> {
  private workspaceId: string | null = null;
  private currentWorkspace: Workspace | null = null;

  constructor(
    private readonly storage: ViolationStore,
    private readonly analyzer?: Analyzer
  ) {
    super({
      violations: [],
      filteredViolations: [],
      selectedViolationId: null,
      selectedViolationIds: [],
      isAnalyzing: false,
      searchText: '',
      selectedRuleIds: [],
      selectedSeverities: [],
      selectedFiles: [],
      showSuppressedOnly: false,
      groupingOption: 'none',
      sortOption: 'file',
      sortOrder: 'ascending',
      error: null,
    });
  }

  // ---------------------------------------------------------------------------
  // Derived values
  // ---------------------------------------------------------------------------

  get selectedViolation(): Violation | undefined {
    const id = this.state.selectedViolationId;
    return id === null ? undefined : this.state.violations.find((v) => v.id === id);
  }

  get violationCount(): number {
    return this.state.filteredViolations.length;
  }

  get errorCount(): number {
    return this.state.filteredViolations.filter((v) => v.severity === 'error').length;
  }

  get warningCount(): number {
    return this.state.filteredViolations.filter((v) => v.severity === 'warning').length;
  }

  get uniqueRules(): string[] {
    return Array.from(new Set(this.state.violations.map((v) => v.ruleId))).sort();
  }

  get uniqueFiles(): string[] {
    return Array.from(new Set(this.state.violations.map((v) => v.filePath))).sort();
  }

  // ---------------------------------------------------------------------------
  // Filters
  // ---------------------------------------------------------------------------

  updateFilters(patch: Partial<Pick<ViolationInspectorState, FilterKeys>>): void {
    this.setState(patch);
    this.updateFilteredViolations();
  }

  clearFilters(): void {
    this.updateFilters({
      searchText: '',
      selectedRuleIds: [],
      selectedSeverities: [],
      selectedFiles: [],
      showSuppressedOnly: false,
    });
  }

  // ---------------------------------------------------------------------------
  // Loading
  // ---------------------------------------------------------------------------

  /**
   * Run analysis first when a workspace and analyzer are available; an analysis
   * failure is recorded and the stored violations still load.
   */
  async loadViolations(workspaceId: string, workspace?: Workspace): Promise<void> {
    this.workspaceId = workspaceId;
    if (workspace) {
      this.currentWorkspace = workspace;
    }

    const target = workspace || this.currentWorkspace;
    if (target && this.analyzer) {
      try {
        await this.runAnalysis(target);
      } catch (error) {
        this.setState({ error });
      }
    }

    await this.reloadFromStorage();
  }

  async refreshViolations(): Promise<void> {
    if (this.workspaceId === null || !this.currentWorkspace || !this.analyzer) {
      await this.reloadFromStorage();
      return;
    }

    try {
      await this.runAnalysis(this.currentWorkspace);
    } catch (error) {
      this.setState({ error });
      throw error;
    }
    await this.reloadFromStorage();
  }

  clearViolations(): void {
    this.workspaceId = null;
    this.setState({
      violations: [],
      filteredViolations: [],
      selectedViolationId: null,
      selectedViolationIds: [],
    });
  }

  // ---------------------------------------------------------------------------
  // Selection
  // ---------------------------------------------------------------------------

  selectViolation(id: string | null): void {
    this.setState({ selectedViolationId: id, selectedViolationIds: id === null ? [] : [id] });
  }

  toggleSelection(id: string): void {
    const ids = this.state.selectedViolationIds;
    const selectedViolationIds = ids.includes(id) ? ids.filter((v) => v !== id) : [...ids, id];
    const primary = this.state.selectedViolationId;
    this.setState({
      selectedViolationIds,
      selectedViolationId:
        primary !== null && selectedViolationIds.includes(primary)
          ? primary
          : this.firstSelectedIn(this.state.filteredViolations, selectedViolationIds),
    });
  }

  selectNextViolation(): void {
    const list = this.state.filteredViolations;
    if (list.length === 0) return;

    const current = this.state.selectedViolationId;
    if (current === null) {
      this.selectViolation(list[0].id);
      return;
    }
    const index = list.findIndex((v) => v.id === current);
    if (index >= 0 && index < list.length - 1) {
      this.selectViolation(list[index + 1].id);
    }
  }

  selectPreviousViolation(): void {
    const list = this.state.filteredViolations;
    if (list.length === 0) return;

    const current = this.state.selectedViolationId;
    if (current === null) {
      this.selectViolation(list[list.length - 1].id);
      return;
    }
    const index = list.findIndex((v) => v.id === current);
    if (index > 0) {
      this.selectViolation(list[index - 1].id);
    }
  }

  selectAll(): void {
    this.setState({ selectedViolationIds: this.state.filteredViolations.map((v) => v.id) });
  }

  deselectAll(): void {
    this.setState({ selectedViolationIds: [] });
  }

  // ---------------------------------------------------------------------------
  // Actions
  // ---------------------------------------------------------------------------

  async suppressSelectedViolations(reason: string): Promise<void> {
    if (this.workspaceId === null) return;
    await this.storage.suppressViolations([...this.state.selectedViolationIds], reason);
    await this.refreshViolations();
    this.setState({ selectedViolationIds: [] });
  }

  async resolveSelectedViolations(): Promise<void> {
    if (this.workspaceId === null) return;
    await this.storage.resolveViolations([...this.state.selectedViolationIds]);
    await this.refreshViolations();
    this.setState({ selectedViolationIds: [] });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async runAnalysis(workspace: Workspace): Promise<void> {
    if (!this.analyzer) return;
    this.setState({ isAnalyzing: true });
    try {
      await this.analyzer.analyze(workspace, workspace.configPath);
    } finally {
      this.setState({ isAnalyzing: false });
    }
  }

  private async reloadFromStorage(): Promise<void> {
    if (this.workspaceId === null) return;
    const violations = await this.storage.fetchViolations({}, this.workspaceId);
    this.setState({ violations });
    this.updateFilteredViolations();
  }

  private updateFilteredViolations(): void {
    const s = this.state;
    const query = s.searchText.toLowerCase();

    const filtered = s.violations.filter(
      (v) =>
        (query === '' ||
          v.ruleId.toLowerCase().includes(query) ||
          v.message.toLowerCase().includes(query) ||
          v.filePath.toLowerCase().includes(query)) &&
        (s.selectedRuleIds.length === 0 || s.selectedRuleIds.includes(v.ruleId)) &&
        (s.selectedSeverities.length === 0 || s.selectedSeverities.includes(v.severity)) &&
        (s.selectedFiles.length === 0 || s.selectedFiles.includes(v.filePath)) &&
        (!s.showSuppressedOnly || v.suppressed)
    );

    const filteredViolations = sortViolations(filtered, s.sortOption, s.sortOrder);
    this.setState({ filteredViolations });
    this.pruneSelection(filteredViolations);
  }

  private pruneSelection(filtered: Violation[]): void {
    const visible = new Set(filtered.map((v) => v.id));
    const { selectedViolationIds, selectedViolationId } = this.state;
    const invalid =
      selectedViolationIds.some((id) => !visible.has(id)) ||
      (selectedViolationId !== null && !visible.has(selectedViolationId));
    if (!invalid) return;

    const remaining = selectedViolationIds.filter((id) => visible.has(id));
    const primary =
      selectedViolationId !== null && remaining.includes(selectedViolationId)
        ? selectedViolationId
        : this.firstSelectedIn(filtered, remaining);
    this.setState({ selectedViolationIds: remaining, selectedViolationId: primary });
  }

  private firstSelectedIn(list: Violation[], ids: string[]): string | null {
    return list.find((v) => ids.includes(v.id))?.id ?? null;
  }
}
