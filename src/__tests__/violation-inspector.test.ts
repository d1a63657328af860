/**
 * Tests for the violation inspector view-model
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import * as path from 'path';
import { ViolationInspectorViewModel, sortViolations } from '../viewmodels/violation-inspector.js';
import { ViolationStorage, ViolationStore, matchesFilter } from '../violation-storage.js';
import { Violation, ViolationFilter, Workspace } from '../types.js';
import { createMockViolation, createTempWorkspace, removeTempWorkspace } from './helpers.js';

const A = createMockViolation({
  id: 'a',
  ruleId: 'todo',
  filePath: 'Sources/B.swift',
  line: 4,
  message: 'TODOs should be resolved',
  detectedAt: 1000,
});
const B = createMockViolation({
  id: 'b',
  ruleId: 'force_cast',
  filePath: 'Sources/A.swift',
  line: 9,
  severity: 'error',
  message: 'Force casts should be avoided',
  detectedAt: 3000,
});
const C = createMockViolation({ id: 'c', filePath: 'Sources/A.swift', line: 2, detectedAt: 2000, suppressed: true });

const WORKSPACE: Workspace = { id: 'ws-1', path: '/ws', name: 'ws', configPath: '/ws/.swiftlint.yml', lastOpened: 0 };

class InMemoryStore implements ViolationStore {
  constructor(public violations: Violation[]) {}

  async storeViolations(violations: Violation[]): Promise<void> {
    this.violations = violations;
  }

  async fetchViolations(filter: ViolationFilter): Promise<Violation[]> {
    return this.violations.filter((v) => matchesFilter(v, filter)).sort((x, y) => y.detectedAt - x.detectedAt);
  }

  async suppressViolations(ids: string[], reason: string): Promise<void> {
    this.violations = this.violations.map((v) => (ids.includes(v.id) ? { ...v, suppressed: true, suppressionReason: reason } : v));
  }

  async resolveViolations(ids: string[]): Promise<void> {
    this.violations = this.violations.map((v) => (ids.includes(v.id) ? { ...v, resolvedAt: 9000 } : v));
  }

  async deleteViolations(): Promise<void> {
    this.violations = [];
  }

  async getViolationCount(filter: ViolationFilter): Promise<number> {
    return (await this.fetchViolations(filter)).length;
  }
}

async function loaded(): Promise<ViolationInspectorViewModel> {
  const vm = new ViolationInspectorViewModel(new InMemoryStore([A, B, C]));
  await vm.loadViolations('ws-1');
  return vm;
}

function ids(violations: Violation[]): string[] {
  return violations.map((v) => v.id);
}

describe('sortViolations', () => {
  it('sorts by file then line, flipping only the file order when descending', () => {
    expect(ids(sortViolations([A, B, C], 'file'))).toEqual(['c', 'b', 'a']);
    expect(ids(sortViolations([A, B, C], 'file', 'descending'))).toEqual(['a', 'c', 'b']);
  });

  it('puts errors first when sorting by severity', () => {
    expect(ids(sortViolations([A, B, C], 'severity'))).toEqual(['b', 'c', 'a']);
  });

  it('sorts by rule and by newest date', () => {
    expect(ids(sortViolations([A, B, C], 'rule'))).toEqual(['b', 'c', 'a']);
    expect(ids(sortViolations([A, B, C], 'date'))).toEqual(['b', 'c', 'a']);
  });
});

describe('ViolationInspectorViewModel', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('loads, sorts and counts', async () => {
    const vm = await loaded();

    expect(ids(vm.state.filteredViolations)).toEqual(['c', 'b', 'a']);
    expect(vm.violationCount).toBe(3);
    expect(vm.errorCount).toBe(1);
    expect(vm.warningCount).toBe(2);
    expect(vm.uniqueRules).toEqual(['force_cast', 'line_length', 'todo']);
    expect(vm.uniqueFiles).toEqual(['Sources/A.swift', 'Sources/B.swift']);
  });

  it('filters by search, severity and suppression', async () => {
    const vm = await loaded();

    vm.updateFilters({ searchText: 'TODO' });
    expect(ids(vm.state.filteredViolations)).toEqual(['a']);

    vm.clearFilters();
    vm.updateFilters({ selectedSeverities: ['error'] });
    expect(ids(vm.state.filteredViolations)).toEqual(['b']);

    vm.clearFilters();
    vm.updateFilters({ showSuppressedOnly: true });
    expect(ids(vm.state.filteredViolations)).toEqual(['c']);
  });

  it('drops selections hidden by a filter', async () => {
    const vm = await loaded();
    vm.selectViolation('a');

    vm.updateFilters({ searchText: 'force' });

    expect(vm.state.selectedViolationIds).toEqual([]);
    expect(vm.state.selectedViolationId).toBeNull();
  });

  it('moves the primary selection when it is toggled off', async () => {
    const vm = await loaded();
    vm.selectViolation('c');
    vm.toggleSelection('b');
    expect(vm.state.selectedViolationIds).toEqual(['c', 'b']);
    expect(vm.state.selectedViolationId).toBe('c');

    vm.toggleSelection('c');
    expect(vm.state.selectedViolationIds).toEqual(['b']);
    expect(vm.state.selectedViolationId).toBe('b');
    expect(vm.selectedViolation).toBe(B);
  });

  it('steps through the filtered list', async () => {
    const vm = await loaded();

    vm.selectNextViolation();
    expect(vm.state.selectedViolationId).toBe('c');
    vm.selectNextViolation();
    vm.selectNextViolation();
    vm.selectNextViolation();
    expect(vm.state.selectedViolationId).toBe('a');
    vm.selectPreviousViolation();
    expect(vm.state.selectedViolationId).toBe('b');

    vm.selectViolation(null);
    vm.selectPreviousViolation();
    expect(vm.state.selectedViolationId).toBe('a');
  });

  it('selects and deselects everything visible', async () => {
    const vm = await loaded();

    vm.selectAll();
    expect(vm.state.selectedViolationIds).toEqual(['c', 'b', 'a']);
    vm.deselectAll();
    expect(vm.state.selectedViolationIds).toEqual([]);
  });

  it('suppresses the selected violations and reloads', async () => {
    const vm = await loaded();
    vm.selectViolation('a');

    await vm.suppressSelectedViolations('generated code');

    expect(vm.state.violations.find((v) => v.id === 'a')).toMatchObject({
      suppressed: true,
      suppressionReason: 'generated code',
    });
    expect(vm.state.selectedViolationIds).toEqual([]);
  });

  it('resolves the selected violations', async () => {
    const vm = await loaded();
    vm.selectViolation('b');

    await vm.resolveSelectedViolations();

    expect(vm.state.violations.find((v) => v.id === 'b')?.resolvedAt).toBe(9000);
  });

  it('analyses before loading when an analyzer is given', async () => {
    const store = new InMemoryStore([]);
    const analyzer = {
      analyze: vi.fn(async () => {
        await store.storeViolations([A]);
        return { violations: [A], filesAnalyzed: 1, duration: 0, startedAt: 0, completedAt: 0, configHash: null };
      }),
    };
    const vm = new ViolationInspectorViewModel(store, analyzer);

    await vm.loadViolations('ws-1', WORKSPACE);

    expect(analyzer.analyze).toHaveBeenCalledWith(WORKSPACE, '/ws/.swiftlint.yml');
    expect(ids(vm.state.violations)).toEqual(['a']);
    expect(vm.state.isAnalyzing).toBe(false);
  });

  it('keeps a resolution when resolving re-runs the analysis', async () => {
    const root = createTempWorkspace();
    vi.spyOn(Date, 'now').mockReturnValue(5000);
    const storage = new ViolationStorage(path.join(root, 'violations'));
    const analyzer = {
      analyze: vi.fn(async () => {
        await storage.storeViolations([A], 'ws-1');
        return { violations: [A], filesAnalyzed: 1, duration: 0, startedAt: 0, completedAt: 0, configHash: null };
      }),
    };
    const vm = new ViolationInspectorViewModel(storage, analyzer);

    try {
      await vm.loadViolations('ws-1', WORKSPACE);
      vm.selectViolation('a');

      await vm.resolveSelectedViolations();

      expect(analyzer.analyze).toHaveBeenCalledTimes(2);
      expect(vm.state.violations.map((v) => [v.id, v.resolvedAt])).toEqual([['a', 5000]]);
    } finally {
      removeTempWorkspace(root);
    }
  });

  it('keeps stored violations when analysis fails', async () => {
    const failure = new Error('Analysis failed: swiftlint crashed');
    const vm = new ViolationInspectorViewModel(new InMemoryStore([B]), {
      analyze: async () => {
        throw failure;
      },
    });

    await vm.loadViolations('ws-1', WORKSPACE);

    expect(vm.state.error).toBe(failure);
    expect(ids(vm.state.violations)).toEqual(['b']);
    await expect(vm.refreshViolations()).rejects.toBe(failure);
  });

  it('clears everything', async () => {
    const vm = await loaded();
    vm.selectViolation('a');

    vm.clearViolations();

    expect(vm.state.violations).toEqual([]);
    expect(vm.state.selectedViolationId).toBeNull();
  });
});
