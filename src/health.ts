/**
 * rulestudio Configuration Health
 * Weighted score, letter grade and recommendations for a .swiftlint.yml
 */

import { RULE_CATEGORIES, Rule, StudioYamlConfig } from './types.js';
import { getDeprecationData } from './deprecations.js';

export type HealthGrade = 'A' | 'B' | 'C' | 'D' | 'F';
export type RecommendationPriority = 'high' | 'medium' | 'low';

export interface ScoreBreakdown {
  rulesCoverage: number;
  categoryBalance: number;
  optInAdoption: number;
  noDeprecatedRules: number;
  pathConfiguration: number;
}

export interface HealthRecommendation {
  priority: RecommendationPriority;
  title: string;
  description: string;
  presetId?: string;
}

export interface ConfigHealthReport {
  score: number;
  grade: HealthGrade;
  breakdown: ScoreBreakdown;
  recommendations: HealthRecommendation[];
}

export const RECOMMENDED_OPT_IN_RULES: readonly string[] = [
  'explicit_init',
  'first_where',
  'joined_default_parameter',
  'redundant_nil_coalescing',
  'sorted_first_last',
  'contains_over_first_not_nil',
  'empty_count',
  'empty_string',
  'flatmap_over_map_reduce',
  'last_where',
  'modifier_order',
  'reduce_into',
];

const WEIGHTS: Record<keyof ScoreBreakdown, number> = {
  rulesCoverage: 0.4,
  categoryBalance: 0.2,
  optInAdoption: 0.15,
  noDeprecatedRules: 0.1,
  pathConfiguration: 0.15,
};

const COMMON_EXCLUDES = ['Pods', 'Carthage', 'vendor', 'build', '.build'];

const PRIORITY_ORDER: Record<RecommendationPriority, number> = { high: 0, medium: 1, low: 2 };

export function gradeForScore(score: number): HealthGrade {
  if (score >= 90) return 'A';
  if (score >= 75) return 'B';
  if (score >= 60) return 'C';
  if (score >= 40) return 'D';
  return 'F';
}

// =============================================================================
// SCORES
// =============================================================================

function rulesCoverage(config: StudioYamlConfig, knownRules: Rule[]): number {
  if (knownRules.length === 0) return 50;

  const disabled = new Set(config.disabledRules || []);
  const defaultEnabled = knownRules.filter((rule) => !rule.isOptIn && !disabled.has(rule.id)).length;
  const explicitlyEnabled =
    Object.values(config.rules).filter((rule) => rule.enabled).length + new Set(config.optInRules || []).size;

  const coverage = (defaultEnabled + explicitlyEnabled) / knownRules.length;
  // Half of all rules enabled already counts as full coverage
  return Math.trunc(Math.min(coverage / 0.5, 1) * 100);
}

function categoryBalance(config: StudioYamlConfig, knownRules: Rule[]): number {
  if (knownRules.length === 0) return 50;

  const disabled = new Set(config.disabledRules || []);
  const optIn = new Set(config.optInRules || []);
  const covered = new Set(
    knownRules
      .filter((rule) => (rule.isOptIn ? optIn.has(rule.id) : !disabled.has(rule.id)))
      .map((rule) => rule.category)
  );
  return Math.trunc((covered.size / RULE_CATEGORIES.length) * 100);
}

function optInAdoption(config: StudioYamlConfig): number {
  const optIn = new Set(config.optInRules || []);
  const adopted = RECOMMENDED_OPT_IN_RULES.filter((id) => optIn.has(id)).length;
  return Math.trunc((adopted / RECOMMENDED_OPT_IN_RULES.length) * 100);
}

function noDeprecatedRules(config: StudioYamlConfig): number {
  const { deprecatedRules, removedRules } = getDeprecationData();
  const deprecated = new Set([...Object.keys(deprecatedRules), ...Object.keys(removedRules)]);
  if (deprecated.size === 0) return 100;

  const configured = new Set([
    ...Object.keys(config.rules),
    ...(config.optInRules || []),
    ...(config.disabledRules || []),
  ]);
  const used = Array.from(configured).filter((id) => deprecated.has(id)).length;
  return Math.trunc((1 - used / deprecated.size) * 100);
}

function pathConfiguration(config: StudioYamlConfig): number {
  let score = 50;

  const excluded = config.excluded || [];
  if (excluded.length > 0) {
    score += 25;
    if (COMMON_EXCLUDES.some((pattern) => excluded.some((entry) => entry.includes(pattern)))) {
      score += 15;
    }
  }
  if (config.included && config.included.length > 0) {
    score += 10;
  }
  return Math.min(score, 100);
}

// =============================================================================
// ANALYZER
// =============================================================================

export class ConfigurationHealthAnalyzer {
  analyze(config: StudioYamlConfig, knownRules: Rule[]): ConfigHealthReport {
    const breakdown: ScoreBreakdown = {
      rulesCoverage: rulesCoverage(config, knownRules),
      categoryBalance: categoryBalance(config, knownRules),
      optInAdoption: optInAdoption(config),
      noDeprecatedRules: noDeprecatedRules(config),
      pathConfiguration: pathConfiguration(config),
    };

    const score = Math.round(
      breakdown.rulesCoverage * WEIGHTS.rulesCoverage +
        breakdown.categoryBalance * WEIGHTS.categoryBalance +
        breakdown.optInAdoption * WEIGHTS.optInAdoption +
        breakdown.noDeprecatedRules * WEIGHTS.noDeprecatedRules +
        breakdown.pathConfiguration * WEIGHTS.pathConfiguration
    );

    return {
      score,
      grade: gradeForScore(score),
      breakdown,
      recommendations: this.recommend(config, breakdown).sort(
        (a, b) => PRIORITY_ORDER[a.priority] - PRIORITY_ORDER[b.priority]
      ),
    };
  }

  private recommend(config: StudioYamlConfig, breakdown: ScoreBreakdown): HealthRecommendation[] {
    const recommendations: HealthRecommendation[] = [];

    if (breakdown.optInAdoption < 50) {
      const optIn = new Set(config.optInRules || []);
      const missing = RECOMMENDED_OPT_IN_RULES.filter((id) => !optIn.has(id)).sort();
      if (missing.length > 0) {
        recommendations.push({
          priority: 'medium',
          title: 'Enable Recommended Opt-In Rules',
          description: `Consider enabling: ${missing.slice(0, 3).join(', ')}`,
          presetId: 'performance',
        });
      }
    }

    if (breakdown.pathConfiguration < 60) {
      recommendations.push({
        priority: 'high',
        title: 'Configure Excluded Paths',
        description: 'Add common paths like Pods, Carthage, or vendor to excluded',
      });
    }

    if (breakdown.categoryBalance < 60) {
      recommendations.push({
        priority: 'low',
        title: 'Improve Category Coverage',
        description: 'Consider enabling rules from underrepresented categories',
      });
    }

    if (breakdown.rulesCoverage < 30) {
      recommendations.push({
        priority: 'high',
        title: 'Enable More Rules',
        description: 'Your configuration has very few rules enabled',
        presetId: 'code_style',
      });
    }

    if (breakdown.rulesCoverage > 90) {
      recommendations.push({
        priority: 'low',
        title: 'Consider Reducing Rules',
        description: 'Having too many rules enabled might create noise',
      });
    }

    return recommendations;
  }
}
