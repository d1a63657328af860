/**
 * rulestudio Version Compatibility
 * Checks a config against a SwiftLint version for deprecated, removed and renamed rules
 */

import {
  CompatibilityReport,
  DeprecatedRuleFinding,
  RemovedRuleFinding,
  RenamedRuleFinding,
  StudioYamlConfig,
} from './types.js';
import { getDeprecationData, isVersionLessThan, renamedRuleId, rulesAdded } from './deprecations.js';

/**
 * Every rule id the config mentions, in rules or in any rule list
 */
export function collectConfiguredRuleIds(config: StudioYamlConfig): Set<string> {
  return new Set([
    ...Object.keys(config.rules),
    ...(config.disabledRules || []),
    ...(config.optInRules || []),
    ...(config.analyzerRules || []),
    ...(config.onlyRules || []),
  ]);
}

export class VersionCompatibilityChecker {
  checkCompatibility(config: StudioYamlConfig, swiftlintVersion: string): CompatibilityReport {
    const ids = Array.from(collectConfiguredRuleIds(config)).sort();
    const { deprecatedRules, removedRules } = getDeprecationData();

    const removed: RemovedRuleFinding[] = [];
    const deprecated: DeprecatedRuleFinding[] = [];
    const renamed: RenamedRuleFinding[] = [];

    for (const ruleId of ids) {
      const removal = removedRules[ruleId];
      const isRemoved = removal !== undefined && !isVersionLessThan(swiftlintVersion, removal.removedIn);
      if (removal && isRemoved) {
        removed.push({ ruleId, removedIn: removal.removedIn, replacement: removal.replacement, message: removal.message });
      }

      const deprecation = deprecatedRules[ruleId];
      if (deprecation && !isRemoved && !isVersionLessThan(swiftlintVersion, deprecation.deprecatedIn)) {
        deprecated.push({
          ruleId,
          deprecatedIn: deprecation.deprecatedIn,
          replacement: deprecation.replacement,
          message: deprecation.message,
        });
      }

      const newId = renamedRuleId(ruleId);
      if (newId) {
        renamed.push({ oldId: ruleId, newId });
      }
    }

    const configured = new Set(ids);
    const availableNewRules = Array.from(new Set(rulesAdded('0.0.0', swiftlintVersion)))
      .filter((id) => !configured.has(id))
      .sort();

    const totalIssueCount = deprecated.length + removed.length + renamed.length;
    return {
      swiftlintVersion,
      deprecatedRules: deprecated,
      removedRules: removed,
      renamedRules: renamed,
      availableNewRules,
      hasIssues: totalIssueCount > 0,
      totalIssueCount,
    };
  }
}
