/**
 * rulestudio Migration Assistant
 * Plans and applies config changes when moving between SwiftLint versions
 */

import { MigrationPlan, MigrationStep, StudioYamlConfig, canAutoApply } from './types.js';
import { getDeprecationData, isVersionLessThan, renamedRuleId, rulesAdded } from './deprecations.js';
import { collectConfiguredRuleIds } from './compatibility.js';
import { cloneConfig } from './yaml-config.js';

type RuleListField = 'disabledRules' | 'optInRules' | 'analyzerRules' | 'onlyRules';
const RULE_LISTS: readonly RuleListField[] = ['disabledRules', 'optInRules', 'analyzerRules', 'onlyRules'];

// =============================================================================
// STEPS
// =============================================================================

export function renameStep(from: string, to: string): MigrationStep {
  return { kind: 'renameRule', id: `rename-${from}-${to}`, description: `Rename '${from}' to '${to}'`, from, to };
}

export function removeStep(ruleId: string, reason: string): MigrationStep {
  return { kind: 'removeDeprecatedRule', id: `remove-${ruleId}`, description: `Remove '${ruleId}': ${reason}`, ruleId, reason };
}

export function updateParameterStep(ruleId: string, oldParam: string, newParam: string): MigrationStep {
  return {
    kind: 'updateParameter',
    id: `param-${ruleId}-${oldParam}`,
    description: `Update parameter on '${ruleId}': '${oldParam}' -> '${newParam}'`,
    ruleId,
    oldParam,
    newParam,
  };
}

export function buildPlan(fromVersion: string, toVersion: string, steps: MigrationStep[]): MigrationPlan {
  const autoApplyableSteps = steps.filter(canAutoApply);
  const manualSteps = steps.filter((step) => !canAutoApply(step));
  return {
    fromVersion,
    toVersion,
    steps,
    totalSteps: steps.length,
    canAutoApply: manualSteps.length === 0,
    autoApplyableSteps,
    manualSteps,
  };
}

function handles(step: MigrationStep, ruleId: string): boolean {
  if (step.kind === 'renameRule') return step.from === ruleId;
  if (step.kind === 'removeDeprecatedRule') return step.ruleId === ruleId;
  return false;
}

// =============================================================================
// DETECTION
// =============================================================================

export function detectMigrations(config: StudioYamlConfig, fromVersion: string, toVersion: string): MigrationPlan {
  const { removedRules, deprecatedRules } = getDeprecationData();
  const ids = Array.from(collectConfiguredRuleIds(config)).sort();
  const steps: MigrationStep[] = [];

  for (const ruleId of ids) {
    const newId = renamedRuleId(ruleId);
    if (newId) steps.push(renameStep(ruleId, newId));
  }

  for (const ruleId of ids) {
    const removal = removedRules[ruleId];
    if (
      removal &&
      isVersionLessThan(fromVersion, removal.removedIn) &&
      !isVersionLessThan(toVersion, removal.removedIn) &&
      !steps.some((step) => step.kind === 'renameRule' && step.from === ruleId)
    ) {
      steps.push(removeStep(ruleId, removal.message));
    }
  }

  for (const ruleId of ids) {
    const deprecation = deprecatedRules[ruleId];
    if (
      deprecation &&
      deprecation.replacement &&
      isVersionLessThan(fromVersion, deprecation.deprecatedIn) &&
      !isVersionLessThan(toVersion, deprecation.deprecatedIn) &&
      !steps.some((step) => handles(step, ruleId))
    ) {
      steps.push(renameStep(ruleId, deprecation.replacement));
    }
  }

  const newRules = rulesAdded(fromVersion, toVersion);
  if (newRules.length > 0) {
    steps.push({
      kind: 'manualAction',
      id: `manual-${steps.length}`,
      description: `New rules available: ${newRules.join(', ')}. Consider enabling them.`,
    });
  }

  return buildPlan(fromVersion, toVersion, steps);
}

// =============================================================================
// APPLICATION
// =============================================================================

function applyStep(config: StudioYamlConfig, step: MigrationStep): void {
  switch (step.kind) {
    case 'renameRule': {
      const ruleConfig = config.rules[step.from];
      if (ruleConfig) {
        delete config.rules[step.from];
        config.rules[step.to] = ruleConfig;
      }
      for (const field of RULE_LISTS) {
        const list = config[field];
        const index = list ? list.indexOf(step.from) : -1;
        if (list && index >= 0) list[index] = step.to;
      }
      break;
    }
    case 'removeDeprecatedRule': {
      delete config.rules[step.ruleId];
      for (const field of RULE_LISTS) {
        const list = config[field];
        if (!list) continue;
        const remaining = list.filter((id) => id !== step.ruleId);
        config[field] = remaining.length > 0 ? remaining : undefined;
      }
      break;
    }
    case 'updateParameter': {
      const params = config.rules[step.ruleId]?.parameters;
      if (params && step.oldParam in params) {
        params[step.newParam] = params[step.oldParam];
        delete params[step.oldParam];
      }
      break;
    }
    case 'manualAction':
      break;
  }
}

/**
 * Apply every auto-applicable step to a copy of `config`
 */
export function applyMigration(plan: MigrationPlan, config: StudioYamlConfig): StudioYamlConfig {
  const migrated = cloneConfig(config);
  for (const step of plan.autoApplyableSteps) {
    applyStep(migrated, step);
  }
  return migrated;
}

export class MigrationAssistant {
  detectMigrations(config: StudioYamlConfig, fromVersion: string, toVersion: string): MigrationPlan {
    return detectMigrations(config, fromVersion, toVersion);
  }

  applyMigration(plan: MigrationPlan, config: StudioYamlConfig): StudioYamlConfig {
    return applyMigration(plan, config);
  }
}
