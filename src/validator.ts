/**
 * rulestudio Configuration Validator
 * Errors block a save; warnings point at likely mistakes
 */

import { ConfigValue, StudioYamlConfig, isSeverity } from './types.js';

export interface ValidationIssue {
  /** Which part of the config: "Rule: x", "Included path #1", "opt_in_rules", ... */
  field: string;
  message: string;
  suggestion?: string;
}

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

const MAX_SUGGESTION_DISTANCE = 3;

/**
 * Levenshtein edit distance
 */
export function editDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Closest known id within a small edit distance, ties broken alphabetically
 */
export function findSimilarRuleId(unknown: string, knownIds: Iterable<string>): string | undefined {
  let best: string | undefined;
  let bestDistance = Number.POSITIVE_INFINITY;

  for (const known of Array.from(knownIds).sort()) {
    const distance = editDistance(unknown, known);
    if (distance <= MAX_SUGGESTION_DISTANCE && distance < bestDistance) {
      best = known;
      bestDistance = distance;
    }
  }
  return best;
}

function didYouMean(ruleId: string, knownIds: Set<string>): string | undefined {
  const match = findSimilarRuleId(ruleId, knownIds);
  return match ? `Did you mean '${match}'?` : undefined;
}

function checkParameter(ruleId: string, name: string, value: ConfigValue, warnings: ValidationIssue[]): void {
  const field = `Parameter '${name}' for: ${ruleId}`;
  if (typeof value === 'number' && value < 0) {
    warnings.push({
      field,
      message: 'Negative value may not be valid for this parameter',
      suggestion: 'Consider using a positive value',
    });
  }
  if (value === '') {
    warnings.push({ field, message: 'Empty string parameter', suggestion: 'Consider removing or providing a value' });
  }
}

function checkRuleList(
  ruleIds: string[] | undefined,
  field: string,
  knownIds: Set<string>,
  warnings: ValidationIssue[]
): void {
  if (!ruleIds) return;

  if (knownIds.size > 0) {
    for (const ruleId of ruleIds) {
      if (!knownIds.has(ruleId)) {
        warnings.push({ field, message: `Unknown rule '${ruleId}'`, suggestion: didYouMean(ruleId, knownIds) });
      }
    }
  }
  if (new Set(ruleIds).size !== ruleIds.length) {
    warnings.push({ field, message: 'Duplicate rule IDs detected', suggestion: 'Remove duplicate entries' });
  }
}

export class ConfigurationValidator {
  /**
   * Unknown-rule warnings need `knownRuleIds`; an empty set skips them
   */
  validate(config: StudioYamlConfig, knownRuleIds: Iterable<string> = []): ValidationResult {
    const knownIds = new Set(knownRuleIds);
    const errors: ValidationIssue[] = [];
    const warnings: ValidationIssue[] = [];

    for (const ruleId of Object.keys(config.rules).sort()) {
      const rule = config.rules[ruleId];

      if (knownIds.size > 0 && !knownIds.has(ruleId)) {
        warnings.push({
          field: `Rule: ${ruleId}`,
          message: 'Unknown rule identifier',
          suggestion: didYouMean(ruleId, knownIds),
        });
      }
      if (rule.severity !== undefined && !isSeverity(rule.severity)) {
        errors.push({
          field: `Severity for: ${ruleId}`,
          message: `Invalid severity: ${rule.severity}`,
          suggestion: "Use 'warning' or 'error'",
        });
      }
      for (const [name, value] of Object.entries(rule.parameters || {})) {
        checkParameter(ruleId, name, value, warnings);
      }
    }

    const pathLists: Array<[string[] | undefined, string]> = [
      [config.included, 'Included'],
      [config.excluded, 'Excluded'],
    ];
    for (const [paths, label] of pathLists) {
      (paths || []).forEach((entry, index) => {
        if (entry.trim() === '') {
          errors.push({
            field: `${label} path #${index + 1}`,
            message: 'Empty path',
            suggestion: 'Provide a valid path or remove this entry',
          });
        }
      });
    }

    checkRuleList(config.disabledRules, 'disabled_rules', knownIds, warnings);
    checkRuleList(config.optInRules, 'opt_in_rules', knownIds, warnings);

    const optIn = new Set(config.optInRules || []);
    const conflicts = Array.from(new Set(config.disabledRules || [])).filter((id) => optIn.has(id)).sort();
    for (const ruleId of conflicts) {
      errors.push({
        field: `Rule: ${ruleId}`,
        message: 'Rule appears in both disabled_rules and opt_in_rules',
        suggestion: 'Remove from one of the lists',
      });
    }

    return { isValid: errors.length === 0, errors, warnings };
  }
}
