/**
 * rulestudio Config Comparison
 * Side-by-side rule differences between two .swiftlint.yml files
 */

import {
  ConfigComparisonResult,
  RuleComparisonDiff,
  RuleConfiguration,
  StudioYamlConfig,
} from './types.js';
import { isDeepEqual, loadYamlConfig } from './yaml-config.js';

/**
 * Human-readable differences between two configs of the same rule
 */
export function describeRuleDifferences(
  first: RuleConfiguration,
  firstLabel: string,
  second: RuleConfiguration,
  secondLabel: string
): string[] {
  const differences: string[] = [];
  const state = (rule: RuleConfiguration): string => (rule.enabled ? 'enabled' : 'disabled');

  if (first.enabled !== second.enabled) {
    differences.push(`${firstLabel}: ${state(first)}, ${secondLabel}: ${state(second)}`);
  }
  if (first.severity !== second.severity) {
    differences.push(
      `Severity: ${firstLabel}=${first.severity || 'default'}, ${secondLabel}=${second.severity || 'default'}`
    );
  }
  if (!isDeepEqual(first.parameters, second.parameters)) {
    differences.push('Parameters differ');
  }
  return differences;
}

/**
 * Compare two already-loaded configs. `before`/`after` are the raw texts shown in the diff.
 */
export function compareConfigs(
  first: StudioYamlConfig,
  firstLabel: string,
  second: StudioYamlConfig,
  secondLabel: string,
  before: string,
  after: string
): ConfigComparisonResult {
  const firstIds = Object.keys(first.rules);
  const secondIds = Object.keys(second.rules);

  const onlyInFirst = firstIds.filter((id) => !(id in second.rules)).sort();
  const onlyInSecond = secondIds.filter((id) => !(id in first.rules)).sort();
  const inBothDifferent: RuleComparisonDiff[] = [];
  const inBothSame: string[] = [];

  for (const ruleId of firstIds.filter((id) => id in second.rules).sort()) {
    const firstConfig = first.rules[ruleId];
    const secondConfig = second.rules[ruleId];
    const differences = describeRuleDifferences(firstConfig, firstLabel, secondConfig, secondLabel);
    if (differences.length > 0) {
      inBothDifferent.push({ ruleId, firstConfig, secondConfig, differences });
    } else {
      inBothSame.push(ruleId);
    }
  }

  return {
    firstLabel,
    secondLabel,
    onlyInFirst,
    onlyInSecond,
    inBothDifferent,
    inBothSame,
    diff: {
      addedRules: onlyInSecond,
      removedRules: onlyInFirst,
      modifiedRules: inBothDifferent.map((d) => d.ruleId),
      before,
      after,
    },
    totalDifferences: onlyInFirst.length + onlyInSecond.length + inBothDifferent.length,
  };
}

export interface ConfigComparisonServiceLike {
  compare(firstPath: string, firstLabel: string, secondPath: string, secondLabel: string): Promise<ConfigComparisonResult>;
}

export class ConfigComparisonService implements ConfigComparisonServiceLike {
  async compare(
    firstPath: string,
    firstLabel: string,
    secondPath: string,
    secondLabel: string
  ): Promise<ConfigComparisonResult> {
    const [first, second] = await Promise.all([loadYamlConfig(firstPath), loadYamlConfig(secondPath)]);
    return compareConfigs(
      first.getConfig(),
      firstLabel,
      second.getConfig(),
      secondLabel,
      first.originalContent,
      second.originalContent
    );
  }
}
