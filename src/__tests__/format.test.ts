/**
 * Tests for CLI text output
 */

import { describe, it, expect } from 'vitest';
import {
  formatBackups,
  formatCompatibility,
  formatComparison,
  formatDiff,
  formatHealth,
  formatMigrationPlan,
  formatRefs,
  formatRuleDetail,
  formatRuleList,
  formatStatus,
  formatValidation,
  formatViolations,
  formatWorkspaces,
} from '../cli/format.js';
import { StatusSummary } from '../agent-output.js';
import { createMockRule, createMockViolation } from './helpers.js';

describe('formatDiff', () => {
  it('lists added, removed and modified rules', () => {
    const diff = { addedRules: ['todo'], removedRules: ['force_cast'], modifiedRules: ['line_length'], before: 'a', after: 'b' };

    expect(formatDiff(diff)).toBe('  + todo\n  - force_cast\n  ~ line_length');
  });

  it('says when nothing changed', () => {
    expect(formatDiff({ addedRules: [], removedRules: [], modifiedRules: [], before: 'a', after: 'a' })).toBe('No changes.');
  });

  it('notes text changes outside rule entries', () => {
    expect(formatDiff({ addedRules: [], removedRules: [], modifiedRules: [], before: 'a', after: 'b' })).toBe(
      'Rule lists changed; no rule entries changed.'
    );
  });
});

describe('formatRuleList', () => {
  it('aligns ids and shows flags', () => {
    const rules = [
      createMockRule({ id: 'force_cast', category: 'idiomatic', supportsAutocorrection: true }),
      createMockRule({ id: 'empty_count', category: 'performance', isOptIn: true, isEnabled: false }),
    ];

    expect(formatRuleList(rules).split('\n')).toEqual([
      '  force_cast   Idiomatic   on, fix',
      '  empty_count  Performance off, opt-in',
      '',
      '2 rules',
    ]);
  });

  it('handles an empty list', () => {
    expect(formatRuleList([])).toBe('No rules match.');
  });
});

describe('formatRuleDetail', () => {
  const rule = createMockRule({
    id: 'force_cast',
    name: 'Force Cast',
    description: 'Force casts should be avoided.',
    category: 'idiomatic',
    defaultSeverity: 'error',
    triggeringExamples: ['NSNumber() as! Int'],
  });

  it('shows metadata, config entry and examples', () => {
    expect(formatRuleDetail(rule, { enabled: true, severity: 'warning', parameters: { warning: 100 } })).toBe(
      [
        'Force Cast (force_cast)',
        '',
        'Force casts should be avoided.',
        '',
        'Category:  Idiomatic',
        'Opt-in:    no',
        'Autofix:   no',
        'Severity:  error (default)',
        '',
        'In config: enabled, severity warning',
        '  warning: 100',
        '',
        'TRIGGERING:',
        '  NSNumber() as! Int',
      ].join('\n')
    );
  });

  it('describes the default state of an unconfigured rule', () => {
    const lines = formatRuleDetail({ ...rule, isOptIn: true }).split('\n');

    expect(lines).toContain('In config: not configured (off by default)');
  });
});

describe('formatValidation', () => {
  it('reports a clean config', () => {
    expect(formatValidation({ isValid: true, errors: [], warnings: [] })).toBe('Configuration is valid.');
  });

  it('lists errors with suggestions', () => {
    const result = {
      isValid: false,
      errors: [{ field: 'Rule: todo', message: 'Invalid severity: fatal', suggestion: "Use 'warning' or 'error'" }],
      warnings: [],
    };

    expect(formatValidation(result)).toBe(
      ['ERRORS (1):', '  - Rule: todo: Invalid severity: fatal', "    → Use 'warning' or 'error'", '', 'Configuration is invalid.'].join(
        '\n'
      )
    );
  });

  it('marks a config with only warnings as valid', () => {
    const result = { isValid: true, errors: [], warnings: [{ field: 'excluded', message: 'Path does not exist: Pods' }] };

    expect(formatValidation(result)).toBe(
      ['WARNINGS (1):', '  - excluded: Path does not exist: Pods', '', 'Configuration is valid, with warnings.'].join('\n')
    );
  });
});

describe('formatHealth', () => {
  it('prints the breakdown and recommendations', () => {
    const text = formatHealth({
      score: 73,
      grade: 'C',
      breakdown: { rulesCoverage: 100, categoryBalance: 40, optInAdoption: 0, noDeprecatedRules: 100, pathConfiguration: 100 },
      recommendations: [{ priority: 'high', title: 'Adopt opt-in rules', description: 'None enabled.', presetId: 'performance' }],
    });

    expect(text.split('\n')).toEqual([
      'Health: C (73/100)',
      '',
      '  Rules coverage:      100',
      '  Category balance:    40',
      '  Opt-in adoption:     0',
      '  No deprecated rules: 100',
      '  Path configuration:  100',
      '',
      'RECOMMENDATIONS:',
      '  [high] Adopt opt-in rules',
      '    None enabled.',
      '    → rulestudio presets apply performance',
    ]);
  });
});

describe('formatComparison', () => {
  it('groups rules by where they differ', () => {
    const text = formatComparison({
      firstLabel: 'App',
      secondLabel: 'Kit',
      onlyInFirst: ['force_cast'],
      onlyInSecond: [],
      inBothDifferent: [
        { ruleId: 'todo', firstConfig: { enabled: true }, secondConfig: { enabled: false }, differences: ['App: enabled, Kit: disabled'] },
      ],
      inBothSame: ['line_length'],
      totalDifferences: 2,
      diff: { addedRules: [], removedRules: ['force_cast'], modifiedRules: ['todo'], before: '', after: '' },
    });

    expect(text.split('\n')).toEqual([
      'App vs Kit: 2 differences',
      '',
      'ONLY IN App:',
      '  force_cast',
      '',
      'DIFFERENT:',
      '  todo',
      '    App: enabled, Kit: disabled',
      '',
      'Same in both: 1',
    ]);
  });
});

describe('formatRefs', () => {
  it('marks the current branch', () => {
    expect(formatRefs({ currentBranch: 'main', branches: ['main', 'dev'], tags: ['v1'] })).toBe(
      'Current branch: main\n\nBRANCHES:\n  * main\n    dev\n\nTAGS:\n    v1'
    );
  });
});

describe('formatBackups', () => {
  it('numbers backups with ISO timestamps', () => {
    const backups = [{ id: '.swiftlint.yml.1700000000.backup', path: '/x', timestamp: 1700000000, fileSize: 11 }];

    expect(formatBackups(backups)).toBe('   1. .swiftlint.yml.1700000000.backup  2023-11-14T22:13:20.000Z  11 B');
  });

  it('handles no backups', () => {
    expect(formatBackups([])).toBe('No backups found.');
  });
});

describe('formatViolations', () => {
  it('prints one line per violation and a summary', () => {
    const violations = [
      createMockViolation({ id: 'abcdef1234', severity: 'error', suppressed: true }),
      createMockViolation({ id: '12345678ab', column: undefined, ruleId: 'todo', message: 'TODOs should be resolved' }),
    ];

    expect(formatViolations(violations).split('\n')).toEqual([
      '  abcdef12  error   Sources/App/main.swift:10:5  Line should be 120 characters or less (line_length) [suppressed]',
      '  12345678  warning Sources/App/main.swift:10  TODOs should be resolved (todo)',
      '',
      '2 violations: 1 error, 1 warning',
    ]);
  });

  it('handles no violations', () => {
    expect(formatViolations([])).toBe('No violations found.');
  });
});

describe('formatCompatibility', () => {
  it('lists removed and renamed rules', () => {
    const text = formatCompatibility({
      swiftlintVersion: '0.55.0',
      deprecatedRules: [],
      removedRules: [{ ruleId: 'variable_name', removedIn: '0.40.0', message: 'Use identifier_name' }],
      renamedRules: [{ oldId: 'variable_name', newId: 'identifier_name' }],
      availableNewRules: [],
      hasIssues: true,
      totalIssueCount: 2,
    });

    expect(text).toBe(
      'SwiftLint 0.55.0: 2 issues\n\nREMOVED:\n  variable_name (0.40.0): Use identifier_name\n\nRENAMED:\n  variable_name → identifier_name'
    );
  });

  it('mentions newer rules when there are no issues', () => {
    const text = formatCompatibility({
      swiftlintVersion: '0.55.0',
      deprecatedRules: [],
      removedRules: [],
      renamedRules: [],
      availableNewRules: ['self_binding', 'superfluous_else'],
      hasIssues: false,
      totalIssueCount: 0,
    });

    expect(text).toBe('SwiftLint 0.55.0: no issues\n\nNot yet configured: 2 newer rules');
  });
});

describe('formatMigrationPlan', () => {
  it('says when no migration is needed', () => {
    const plan = {
      fromVersion: '0.50.0',
      toVersion: '0.50.0',
      steps: [],
      totalSteps: 0,
      canAutoApply: false,
      autoApplyableSteps: [],
      manualSteps: [],
    };

    expect(formatMigrationPlan(plan)).toBe('No migration needed from 0.50.0 to 0.50.0.');
  });

  it('lists automatic steps before manual ones', () => {
    const rename = {
      kind: 'renameRule' as const,
      id: 'rename-inert_defer-no_empty_block',
      description: 'Rename inert_defer to no_empty_block',
      from: 'inert_defer',
      to: 'no_empty_block',
    };
    const manual = { kind: 'manualAction' as const, id: 'manual-1', description: 'Review new rules' };

    const text = formatMigrationPlan({
      fromVersion: '0.47.0',
      toVersion: '0.50.0',
      steps: [manual, rename],
      totalSteps: 2,
      canAutoApply: false,
      autoApplyableSteps: [rename],
      manualSteps: [manual],
    });

    expect(text.split('\n')).toEqual([
      'Migration 0.47.0 → 0.50.0: 2 steps',
      '',
      '  [auto]   Rename inert_defer to no_empty_block',
      '  [manual] Review new rules',
    ]);
  });
});

describe('formatWorkspaces', () => {
  it('pads names and flags analyzed workspaces', () => {
    const text = formatWorkspaces([{ id: 'abc123', name: 'App', path: '/src/App', lastOpened: 1, lastAnalyzed: 2 }]);

    expect(text).toBe(`  abc123  App${' '.repeat(22)}/src/App  (analyzed)`);
  });

  it('handles no workspaces', () => {
    expect(formatWorkspaces([])).toBe('No recent workspaces.');
  });
});

describe('formatStatus', () => {
  const base: StatusSummary = {
    workspace_path: '/src/App',
    timestamp: 1,
    config: { path: '/src/App/.swiftlint.yml', exists: true, rule_count: 4, disabled_count: 1, opt_in_count: 2 },
    violations: { total: 3, errors: 1, warnings: 2, suppressed: 0 },
    risks: [],
    next_actions: [],
  };

  it('summarises config, git and violations', () => {
    const text = formatStatus({
      ...base,
      git: { branch: 'main', commit: 'abcdef1', commitFull: 'abcdef1234567890' },
      health: { score: 73, grade: 'C' },
    });

    expect(text.split('\n')).toEqual([
      'rulestudio - Workspace Status',
      '',
      'Workspace: /src/App',
      'Git:       main @ abcdef1',
      'Config:    /src/App/.swiftlint.yml',
      'Rules:     4 configured, 2 opt-in, 1 disabled',
      'Health:    C (73/100)',
      'Violations: 3 (1 errors, 2 warnings, 0 suppressed)',
    ]);
  });

  it('shows a missing config with risks and next actions', () => {
    const text = formatStatus({
      ...base,
      config: { ...base.config, exists: false },
      risks: [{ type: 'removed', severity: 'high', rule: 'variable_name', message: 'variable_name was removed' }],
      next_actions: [{ action: 'Create a config', reason: 'none found', command: 'rulestudio init' }],
    });

    expect(text.split('\n')).toEqual([
      'rulestudio - Workspace Status',
      '',
      'Workspace: /src/App',
      'Config:    missing (/src/App/.swiftlint.yml)',
      'Violations: 3 (1 errors, 2 warnings, 0 suppressed)',
      '',
      'RISKS:',
      '  [high] variable_name was removed',
      '',
      'NEXT:',
      '  - Create a config: rulestudio init',
    ]);
  });
});
