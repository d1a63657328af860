/**
 * rulestudio CLI text output
 */

import {
  CompatibilityReport,
  ConfigBackup,
  ConfigComparisonResult,
  ConfigDiff,
  GitRefs,
  MigrationPlan,
  Rule,
  RuleConfiguration,
  RulePreset,
  Violation,
  Workspace,
  categoryDisplayName,
  hasChanges,
} from '../types.js';
import { ConfigHealthReport } from '../health.js';
import { ValidationIssue, ValidationResult } from '../validator.js';
import { StatusSummary } from '../agent-output.js';

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

export function formatDiff(diff: ConfigDiff): string {
  if (!hasChanges(diff)) {
    return diff.before === diff.after ? 'No changes.' : 'Rule lists changed; no rule entries changed.';
  }

  const lines: string[] = [];
  for (const id of diff.addedRules) lines.push(`  + ${id}`);
  for (const id of diff.removedRules) lines.push(`  - ${id}`);
  for (const id of diff.modifiedRules) lines.push(`  ~ ${id}`);
  return lines.join('\n');
}

export function formatRuleList(rules: Rule[]): string {
  if (rules.length === 0) return 'No rules match.';

  const width = Math.max(...rules.map((r) => r.id.length));
  const lines = rules.map((rule) => {
    const flags = [rule.isEnabled ? 'on' : 'off', rule.isOptIn ? 'opt-in' : '', rule.supportsAutocorrection ? 'fix' : '']
      .filter((f) => f !== '')
      .join(', ');
    return `  ${rule.id.padEnd(width)}  ${categoryDisplayName(rule.category).padEnd(11)} ${flags}`;
  });
  lines.push('');
  lines.push(plural(rules.length, 'rule'));
  return lines.join('\n');
}

export function formatRuleDetail(rule: Rule, entry?: RuleConfiguration): string {
  const lines: string[] = [];
  lines.push(`${rule.name} (${rule.id})`);
  lines.push('');
  lines.push(rule.description);
  lines.push('');
  lines.push(`Category:  ${categoryDisplayName(rule.category)}`);
  lines.push(`Opt-in:    ${rule.isOptIn ? 'yes' : 'no'}`);
  lines.push(`Autofix:   ${rule.supportsAutocorrection ? 'yes' : 'no'}`);
  if (rule.defaultSeverity) lines.push(`Severity:  ${rule.defaultSeverity} (default)`);
  if (rule.minimumSwiftVersion) lines.push(`Swift:     ${rule.minimumSwiftVersion}+`);

  lines.push('');
  if (entry) {
    lines.push(`In config: ${entry.enabled ? 'enabled' : 'disabled'}${entry.severity ? `, severity ${entry.severity}` : ''}`);
    for (const [key, value] of Object.entries(entry.parameters || {})) {
      lines.push(`  ${key}: ${JSON.stringify(value)}`);
    }
  } else {
    lines.push(`In config: not configured (${rule.isOptIn ? 'off' : 'on'} by default)`);
  }

  if (rule.triggeringExamples.length > 0) {
    lines.push('');
    lines.push('TRIGGERING:');
    for (const example of rule.triggeringExamples) {
      lines.push(...example.split('\n').map((l) => `  ${l}`));
      lines.push('');
    }
  }
  if (rule.nonTriggeringExamples.length > 0) {
    lines.push('');
    lines.push('NON-TRIGGERING:');
    for (const example of rule.nonTriggeringExamples) {
      lines.push(...example.split('\n').map((l) => `  ${l}`));
      lines.push('');
    }
  }
  return lines.join('\n').trimEnd();
}

export function formatPresets(presets: RulePreset[]): string {
  const lines: string[] = [];
  for (const preset of presets) {
    lines.push(`${preset.id} - ${preset.name}`);
    lines.push(`  ${preset.description}`);
    lines.push(`  ${preset.ruleIds.join(', ')}`);
    lines.push('');
  }
  return lines.join('\n').trimEnd();
}

function formatIssues(title: string, issues: ValidationIssue[]): string[] {
  if (issues.length === 0) return [];
  const lines = [`${title} (${issues.length}):`];
  for (const issue of issues) {
    lines.push(`  - ${issue.field}: ${issue.message}`);
    if (issue.suggestion) lines.push(`    → ${issue.suggestion}`);
  }
  lines.push('');
  return lines;
}

export function formatValidation(result: ValidationResult): string {
  if (result.errors.length === 0 && result.warnings.length === 0) {
    return 'Configuration is valid.';
  }
  const lines = [...formatIssues('ERRORS', result.errors), ...formatIssues('WARNINGS', result.warnings)];
  lines.push(result.isValid ? 'Configuration is valid, with warnings.' : 'Configuration is invalid.');
  return lines.join('\n');
}

export function formatHealth(report: ConfigHealthReport): string {
  const b = report.breakdown;
  const lines = [
    `Health: ${report.grade} (${report.score}/100)`,
    '',
    `  Rules coverage:      ${b.rulesCoverage}`,
    `  Category balance:    ${b.categoryBalance}`,
    `  Opt-in adoption:     ${b.optInAdoption}`,
    `  No deprecated rules: ${b.noDeprecatedRules}`,
    `  Path configuration:  ${b.pathConfiguration}`,
  ];
  if (report.recommendations.length > 0) {
    lines.push('');
    lines.push('RECOMMENDATIONS:');
    for (const rec of report.recommendations) {
      lines.push(`  [${rec.priority}] ${rec.title}`);
      lines.push(`    ${rec.description}`);
      if (rec.presetId) lines.push(`    → rulestudio presets apply ${rec.presetId}`);
    }
  }
  return lines.join('\n');
}

export function formatComparison(result: ConfigComparisonResult): string {
  const lines = [`${result.firstLabel} vs ${result.secondLabel}: ${plural(result.totalDifferences, 'difference')}`];

  if (result.onlyInFirst.length > 0) {
    lines.push('', `ONLY IN ${result.firstLabel}:`, ...result.onlyInFirst.map((id) => `  ${id}`));
  }
  if (result.onlyInSecond.length > 0) {
    lines.push('', `ONLY IN ${result.secondLabel}:`, ...result.onlyInSecond.map((id) => `  ${id}`));
  }
  if (result.inBothDifferent.length > 0) {
    lines.push('', 'DIFFERENT:');
    for (const diff of result.inBothDifferent) {
      lines.push(`  ${diff.ruleId}`);
      lines.push(...diff.differences.map((d) => `    ${d}`));
    }
  }
  lines.push('', `Same in both: ${result.inBothSame.length}`);
  return lines.join('\n');
}

export function formatRefs(refs: GitRefs): string {
  const lines = [`Current branch: ${refs.currentBranch}`, '', 'BRANCHES:'];
  lines.push(...refs.branches.map((b) => `  ${b === refs.currentBranch ? '*' : ' '} ${b}`));
  if (refs.tags.length > 0) {
    lines.push('', 'TAGS:', ...refs.tags.map((t) => `    ${t}`));
  }
  return lines.join('\n');
}

export function formatBackups(backups: ConfigBackup[]): string {
  if (backups.length === 0) return 'No backups found.';
  return backups
    .map((b, i) => `  ${String(i + 1).padStart(2)}. ${b.id}  ${new Date(b.timestamp * 1000).toISOString()}  ${b.fileSize} B`)
    .join('\n');
}

export function formatViolations(violations: Violation[]): string {
  if (violations.length === 0) return 'No violations found.';

  const lines = violations.map((v) => {
    const location = `${v.filePath}:${v.line}${v.column !== undefined ? `:${v.column}` : ''}`;
    const flags = [v.suppressed ? 'suppressed' : '', v.resolvedAt !== undefined ? 'resolved' : '']
      .filter((f) => f !== '')
      .join(', ');
    return `  ${v.id.slice(0, 8)}  ${v.severity.padEnd(7)} ${location}  ${v.message} (${v.ruleId})${flags ? ` [${flags}]` : ''}`;
  });
  const errors = violations.filter((v) => v.severity === 'error').length;
  lines.push('');
  lines.push(`${plural(violations.length, 'violation')}: ${plural(errors, 'error')}, ${plural(violations.length - errors, 'warning')}`);
  return lines.join('\n');
}

export function formatCompatibility(report: CompatibilityReport): string {
  const lines = [`SwiftLint ${report.swiftlintVersion}: ${report.hasIssues ? plural(report.totalIssueCount, 'issue') : 'no issues'}`];

  if (report.removedRules.length > 0) {
    lines.push('', 'REMOVED:');
    for (const r of report.removedRules) lines.push(`  ${r.ruleId} (${r.removedIn}): ${r.message}`);
  }
  if (report.deprecatedRules.length > 0) {
    lines.push('', 'DEPRECATED:');
    for (const d of report.deprecatedRules) lines.push(`  ${d.ruleId} (${d.deprecatedIn}): ${d.message}`);
  }
  if (report.renamedRules.length > 0) {
    lines.push('', 'RENAMED:');
    for (const r of report.renamedRules) lines.push(`  ${r.oldId} → ${r.newId}`);
  }
  if (report.availableNewRules.length > 0) {
    lines.push('', `Not yet configured: ${plural(report.availableNewRules.length, 'newer rule')}`);
  }
  return lines.join('\n');
}

export function formatMigrationPlan(plan: MigrationPlan): string {
  if (plan.totalSteps === 0) {
    return `No migration needed from ${plan.fromVersion} to ${plan.toVersion}.`;
  }
  const lines = [`Migration ${plan.fromVersion} → ${plan.toVersion}: ${plural(plan.totalSteps, 'step')}`, ''];
  for (const step of plan.autoApplyableSteps) lines.push(`  [auto]   ${step.description}`);
  for (const step of plan.manualSteps) lines.push(`  [manual] ${step.description}`);
  return lines.join('\n');
}

export function formatWorkspaces(workspaces: Workspace[]): string {
  if (workspaces.length === 0) return 'No recent workspaces.';
  return workspaces
    .map((ws) => `  ${ws.id}  ${ws.name.padEnd(24)} ${ws.path}${ws.lastAnalyzed ? '  (analyzed)' : ''}`)
    .join('\n');
}

export function formatStatus(summary: StatusSummary): string {
  const lines = ['rulestudio - Workspace Status', '', `Workspace: ${summary.workspace_path}`];
  if (summary.git) lines.push(`Git:       ${summary.git.branch} @ ${summary.git.commit}`);

  if (!summary.config.exists) {
    lines.push(`Config:    missing (${summary.config.path})`);
  } else {
    lines.push(`Config:    ${summary.config.path}`);
    lines.push(
      `Rules:     ${summary.config.rule_count} configured, ${summary.config.opt_in_count} opt-in, ${summary.config.disabled_count} disabled`
    );
  }
  if (summary.health) lines.push(`Health:    ${summary.health.grade} (${summary.health.score}/100)`);
  lines.push(
    `Violations: ${summary.violations.total} (${summary.violations.errors} errors, ${summary.violations.warnings} warnings, ${summary.violations.suppressed} suppressed)`
  );

  if (summary.risks.length > 0) {
    lines.push('', 'RISKS:');
    for (const risk of summary.risks) lines.push(`  [${risk.severity}] ${risk.message}`);
  }
  if (summary.next_actions.length > 0) {
    lines.push('', 'NEXT:');
    for (const action of summary.next_actions) {
      lines.push(`  - ${action.action}${action.command ? `: ${action.command}` : ''}`);
    }
  }
  return lines.join('\n');
}
