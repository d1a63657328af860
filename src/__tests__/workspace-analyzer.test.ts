/**
 * Tests for lint output parsing and workspace analysis
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import * as crypto from 'crypto';
import * as path from 'path';
import {
  WorkspaceAnalyzer,
  findSwiftFiles,
  mergeExclusions,
  parseViolations,
  violationId,
} from '../workspace-analyzer.js';
import { Workspace } from '../types.js';
import { createTempWorkspace, removeTempWorkspace } from './helpers.js';

const LINT_OUTPUT = JSON.stringify([
  {
    file: '/ws/Sources/A.swift',
    line: 3,
    character: 7,
    rule_id: 'force_cast',
    severity: 'Error',
    reason: 'Force casts should be avoided',
  },
  {
    file: '/ws/Sources/B.swift',
    line: 1,
    character: null,
    type: 'Line Length',
    severity: 'Warning',
    reason: 'Line should be 120 characters or less',
  },
  { line: 2, rule_id: 'todo', severity: 'warning', reason: 'no file' },
]);

describe('mergeExclusions', () => {
  it('returns the defaults for an empty list', () => {
    expect(mergeExclusions(undefined)).toEqual([
      '.build',
      'DerivedData',
      '.git',
      'Pods',
      'Carthage',
      '.swiftpm',
      'node_modules',
      'Build',
    ]);
  });

  it('keeps existing entries first', () => {
    expect(mergeExclusions(['Pods', 'Vendor'])).toEqual([
      'Pods',
      'Vendor',
      '.build',
      'DerivedData',
      '.git',
      'Carthage',
      '.swiftpm',
      'node_modules',
      'Build',
    ]);
  });
});

describe('parseViolations', () => {
  it('reads entries relative to the workspace and skips incomplete ones', () => {
    const violations = parseViolations(LINT_OUTPUT, '/ws/', 42);

    expect(violations).toHaveLength(2);
    expect(violations[0]).toEqual({
      id: violationId('force_cast', 'Sources/A.swift', 3, 7, 'Force casts should be avoided'),
      ruleId: 'force_cast',
      filePath: 'Sources/A.swift',
      line: 3,
      column: 7,
      severity: 'error',
      message: 'Force casts should be avoided',
      detectedAt: 42,
      suppressed: false,
    });
    expect(violations[1]).toMatchObject({ ruleId: 'Line Length', severity: 'warning', column: undefined });
  });

  it('gives the same ids for the same findings', () => {
    const first = parseViolations(LINT_OUTPUT, '/ws', 1).map((v) => v.id);
    const second = parseViolations(LINT_OUTPUT, '/ws', 2).map((v) => v.id);

    expect(first).toEqual(second);
    expect(first[0]).toMatch(/^[0-9a-f]{32}$/);
  });

  it('returns nothing for empty output', () => {
    expect(parseViolations('  \n', '/ws')).toEqual([]);
  });

  it('rejects output that is not a JSON array', () => {
    expect(() => parseViolations('not json', '/ws')).toThrow('Invalid SwiftLint output: Could not parse SwiftLint JSON output');
    expect(() => parseViolations('{}', '/ws')).toThrow('Could not parse SwiftLint JSON output');
  });
});

describe('findSwiftFiles', () => {
  let root: string;

  afterEach(() => {
    removeTempWorkspace(root);
  });

  it('skips dependency and build directories', async () => {
    root = createTempWorkspace({
      'Sources/A.swift': '',
      'Tests/B.swift': '',
      'Pods/X.swift': '',
      '.build/Y.swift': '',
      'README.md': '',
    });

    expect(await findSwiftFiles(root)).toEqual([path.join(root, 'Sources/A.swift'), path.join(root, 'Tests/B.swift')]);
  });
});

describe('WorkspaceAnalyzer', () => {
  let root: string;

  afterEach(() => {
    removeTempWorkspace(root);
  });

  function workspaceAt(dir: string): Workspace {
    return { id: 'ws-1', path: dir, name: 'App', configPath: path.join(dir, '.swiftlint.yml'), lastOpened: 0 };
  }

  it('lints, stores and summarises', async () => {
    root = createTempWorkspace({ '.swiftlint.yml': 'todo: true\n' });
    const output = JSON.stringify([
      { file: `${root}/A.swift`, line: 1, rule_id: 'todo', severity: 'warning', reason: 'TODOs should be resolved' },
      { file: `${root}/A.swift`, line: 5, rule_id: 'todo', severity: 'warning', reason: 'TODOs should be resolved' },
      { file: `${root}/B.swift`, line: 2, rule_id: 'force_cast', severity: 'error', reason: 'Force casts should be avoided' },
    ]);
    const cli = { executeLintCommand: vi.fn(async () => output) };
    const storage = { storeViolations: vi.fn(async () => undefined) };
    const analyzer = new WorkspaceAnalyzer(cli, storage);

    const result = await analyzer.analyze(workspaceAt(root));

    expect(cli.executeLintCommand).toHaveBeenCalledWith(path.join(root, '.swiftlint.yml'), root);
    expect(storage.storeViolations).toHaveBeenCalledWith(result.violations, 'ws-1');
    expect(result.violations.map((v) => v.filePath)).toEqual(['A.swift', 'A.swift', 'B.swift']);
    expect(result.filesAnalyzed).toBe(2);
    expect(result.configHash).toBe(crypto.createHash('sha256').update('todo: true\n').digest('hex'));
    expect(analyzer.lastAnalysisResult).toBe(result);
    expect(analyzer.isAnalyzing).toBe(false);
  });

  it('lints without a config when the file is missing', async () => {
    root = createTempWorkspace();
    const cli = { executeLintCommand: vi.fn(async () => '') };
    const analyzer = new WorkspaceAnalyzer(cli, { storeViolations: async () => undefined });

    const result = await analyzer.analyze(workspaceAt(root));

    expect(cli.executeLintCommand).toHaveBeenCalledWith(undefined, root);
    expect(result.configHash).toBeNull();
    expect(result.violations).toEqual([]);
  });

  it('wraps failures', async () => {
    root = createTempWorkspace();
    const analyzer = new WorkspaceAnalyzer(
      {
        executeLintCommand: async () => {
          throw new Error('swiftlint crashed');
        },
      },
      { storeViolations: async () => undefined }
    );

    await expect(analyzer.analyze(workspaceAt(root))).rejects.toThrow('Analysis failed: swiftlint crashed');
    expect(analyzer.isAnalyzing).toBe(false);
  });
});
