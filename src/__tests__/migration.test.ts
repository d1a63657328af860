/**
 * Tests for migration planning and application
 */

import { describe, it, expect } from 'vitest';
import {
  MigrationAssistant,
  applyMigration,
  buildPlan,
  detectMigrations,
  removeStep,
  renameStep,
  updateParameterStep,
} from '../migration.js';
import { createConfig } from './helpers.js';

describe('detectMigrations', () => {
  const config = createConfig(
    { inert_defer: { enabled: true, severity: 'warning' } },
    { disabledRules: ['variable_name'] }
  );

  it('plans renames and lists new rules as a manual step', () => {
    const plan = detectMigrations(config, '0.40.0', '0.47.0');

    expect(plan.steps.map((step) => step.id)).toEqual([
      'rename-inert_defer-no_empty_block',
      'rename-variable_name-identifier_name',
      'manual-2',
    ]);
    expect(plan.manualSteps[0].description).toBe(
      'New rules available: balanced_xctest_lifecycle, comma_inheritance, discouraged_none_name, ' +
        'invalid_swiftlint_command, no_empty_block, non_overridable_class_declaration, test_case_accessibility. ' +
        'Consider enabling them.'
    );
    expect(plan.totalSteps).toBe(3);
    expect(plan.autoApplyableSteps).toHaveLength(2);
    expect(plan.canAutoApply).toBe(false);
  });

  it('returns an empty plan when nothing changes', () => {
    const plan = detectMigrations(createConfig({ todo: { enabled: true } }), '0.55.0', '0.55.0');

    expect(plan.steps).toEqual([]);
    expect(plan.canAutoApply).toBe(true);
  });

  it('is reachable through the assistant', () => {
    const assistant = new MigrationAssistant();
    const plan = assistant.detectMigrations(config, '0.40.0', '0.47.0');

    expect(assistant.applyMigration(plan, config).disabledRules).toEqual(['identifier_name']);
  });
});

describe('applyMigration', () => {
  it('renames rules in the rules map and rule lists', () => {
    const config = createConfig(
      { inert_defer: { enabled: true, severity: 'warning' } },
      { disabledRules: ['variable_name'] }
    );

    const migrated = applyMigration(detectMigrations(config, '0.40.0', '0.47.0'), config);

    expect(migrated.rules).toEqual({ no_empty_block: { enabled: true, severity: 'warning' } });
    expect(migrated.disabledRules).toEqual(['identifier_name']);
    expect(config.rules).toHaveProperty('inert_defer');
  });

  it('removes a rule everywhere and drops emptied lists', () => {
    const config = createConfig({ todo: { enabled: true } }, { disabledRules: ['todo'], optInRules: ['todo', 'empty_count'] });

    const migrated = applyMigration(buildPlan('0.1.0', '0.2.0', [removeStep('todo', 'gone')]), config);

    expect(migrated.rules).toEqual({});
    expect(migrated.disabledRules).toBeUndefined();
    expect(migrated.optInRules).toEqual(['empty_count']);
  });

  it('moves a parameter to its new name', () => {
    const config = createConfig({ line_length: { enabled: true, parameters: { warning: 100, error: 200 } } });
    const plan = buildPlan('0.1.0', '0.2.0', [updateParameterStep('line_length', 'warning', 'max')]);

    expect(applyMigration(plan, config).rules.line_length.parameters).toEqual({ error: 200, max: 100 });
  });

  it('skips a rename of an unconfigured rule', () => {
    const config = createConfig({ todo: { enabled: true } });

    const migrated = applyMigration(buildPlan('0.1.0', '0.2.0', [renameStep('missing', 'other')]), config);

    expect(migrated.rules).toEqual({ todo: { enabled: true } });
  });
});
