/**
 * rulestudio Agent Output
 * Stable envelope format and status summary for machine consumers
 */

import { CompatibilityReport, GitInfo, StudioYamlConfig, Violation } from './types.js';
import { SCHEMA_VERSION } from './config.js';
import { ConfigHealthReport } from './health.js';
import { ValidationResult } from './validator.js';

export interface SummaryRisk {
  type: 'validation' | 'deprecated' | 'removed' | 'renamed' | 'health';
  severity: 'critical' | 'high' | 'medium' | 'low';
  rule?: string;
  message: string;
}

export interface SummaryAction {
  action: string;
  reason: string;
  command?: string;
}

export interface StatusSummary {
  workspace_path: string;
  timestamp: number;
  git?: GitInfo;
  config: {
    path: string;
    exists: boolean;
    rule_count: number;
    disabled_count: number;
    opt_in_count: number;
  };
  health?: { score: number; grade: string };
  violations: { total: number; errors: number; warnings: number; suppressed: number };
  risks: SummaryRisk[];
  next_actions: SummaryAction[];
}

export interface StatusInputs {
  workspacePath: string;
  configPath: string;
  config: StudioYamlConfig | null;
  git?: GitInfo;
  health?: ConfigHealthReport;
  validation?: ValidationResult;
  compatibility?: CompatibilityReport;
  violations: Violation[];
}

function sortKeys(record: Record<string, unknown>): Record<string, unknown> {
  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(record).sort()) {
    sorted[key] = record[key];
  }
  return sorted;
}

/**
 * Wrap any command output in a stable envelope for machine consumers.
 * Keys are sorted at the top level for deterministic output.
 */
export function wrapInEnvelope<T>(command: string, data: T, metadata?: Record<string, unknown>): string {
  const envelope: Record<string, unknown> = {
    schema_version: SCHEMA_VERSION,
    command,
    timestamp: Date.now(),
    data,
  };

  if (metadata && Object.keys(metadata).length > 0) {
    envelope['metadata'] = metadata;
  }

  return JSON.stringify(sortKeys(envelope), null, 2);
}

/**
 * Build the status summary used for agent orientation
 */
export function buildStatusSummary(inputs: StatusInputs): StatusSummary {
  const { config, violations } = inputs;
  const risks = computeRisks(inputs);

  return {
    workspace_path: inputs.workspacePath,
    timestamp: Date.now(),
    git: inputs.git,
    config: {
      path: inputs.configPath,
      exists: config !== null,
      rule_count: config ? Object.keys(config.rules).length : 0,
      disabled_count: config?.disabledRules?.length ?? 0,
      opt_in_count: config?.optInRules?.length ?? 0,
    },
    health: inputs.health ? { score: inputs.health.score, grade: inputs.health.grade } : undefined,
    violations: {
      total: violations.length,
      errors: violations.filter((v) => v.severity === 'error').length,
      warnings: violations.filter((v) => v.severity === 'warning').length,
      suppressed: violations.filter((v) => v.suppressed).length,
    },
    risks,
    next_actions: computeNextActions(inputs, risks),
  };
}

function computeRisks(inputs: StatusInputs): SummaryRisk[] {
  const risks: SummaryRisk[] = [];

  for (const issue of inputs.validation?.errors ?? []) {
    risks.push({ type: 'validation', severity: 'critical', message: `${issue.field}: ${issue.message}` });
  }

  const compat = inputs.compatibility;
  if (compat) {
    for (const removed of compat.removedRules) {
      risks.push({ type: 'removed', severity: 'high', rule: removed.ruleId, message: removed.message });
    }
    for (const deprecated of compat.deprecatedRules) {
      risks.push({ type: 'deprecated', severity: 'medium', rule: deprecated.ruleId, message: deprecated.message });
    }
    for (const renamed of compat.renamedRules) {
      risks.push({
        type: 'renamed',
        severity: 'medium',
        rule: renamed.oldId,
        message: `${renamed.oldId} is now ${renamed.newId}`,
      });
    }
  }

  if (inputs.health && (inputs.health.grade === 'D' || inputs.health.grade === 'F')) {
    risks.push({
      type: 'health',
      severity: 'low',
      message: `Configuration health is ${inputs.health.grade} (${inputs.health.score}/100)`,
    });
  }

  return risks;
}

function computeNextActions(inputs: StatusInputs, risks: SummaryRisk[]): SummaryAction[] {
  const actions: SummaryAction[] = [];

  if (inputs.config === null) {
    actions.push({
      action: 'Create a configuration file',
      reason: 'No .swiftlint.yml found in the workspace',
      command: 'rulestudio init',
    });
    return actions;
  }

  const validation = risks.filter((r) => r.type === 'validation');
  if (validation.length > 0) {
    actions.push({
      action: `Fix ${validation.length} validation error${validation.length !== 1 ? 's' : ''}`,
      reason: 'The configuration cannot be saved until these are fixed',
      command: 'rulestudio validate',
    });
  }

  const fixable = risks.filter((r) => r.type === 'renamed' || r.type === 'removed');
  if (fixable.length > 0) {
    actions.push({
      action: `Apply ${fixable.length} compatibility fix${fixable.length !== 1 ? 'es' : ''}`,
      reason: 'Renamed or removed rules are configured',
      command: 'rulestudio compat --fix',
    });
  }

  const errors = inputs.violations.filter((v) => v.severity === 'error' && !v.suppressed).length;
  if (errors > 0) {
    actions.push({
      action: `Review ${errors} error violation${errors !== 1 ? 's' : ''}`,
      reason: 'Errors fail the lint run',
      command: 'rulestudio violations --severity error',
    });
  }

  if (inputs.health && inputs.health.recommendations.length > 0) {
    const top = inputs.health.recommendations[0];
    actions.push({
      action: top.title,
      reason: top.description,
      command: top.presetId ? `rulestudio presets apply ${top.presetId}` : 'rulestudio health',
    });
  }

  return actions;
}
