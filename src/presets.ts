/**
 * rulestudio Rule Presets
 * Named groups of rules that can be enabled together
 */

import { PresetCategory, RulePreset, StudioYamlConfig } from './types.js';
import { isObject, isStringArray, readDataJson } from './data-loader.js';
import { cloneConfig } from './yaml-config.js';

export const PRESET_CATEGORIES: readonly PresetCategory[] = [
  'performance',
  'swiftUI',
  'concurrency',
  'codeStyle',
  'documentation',
];

const CATEGORY_NAMES: Record<PresetCategory, string> = {
  performance: 'Performance',
  swiftUI: 'SwiftUI',
  concurrency: 'Concurrency',
  codeStyle: 'Code Style',
  documentation: 'Documentation',
};

function isPresetCategory(value: unknown): value is PresetCategory {
  return typeof value === 'string' && (PRESET_CATEGORIES as readonly string[]).includes(value);
}

export function presetCategoryDisplayName(category: PresetCategory): string {
  return CATEGORY_NAMES[category];
}

let presets: RulePreset[] | null = null;

export function getAllPresets(): RulePreset[] {
  if (presets) return presets;

  const raw = readDataJson('presets.json');
  presets = [];
  for (const entry of Array.isArray(raw) ? raw : []) {
    if (!isObject(entry)) continue;
    const { id, name, description, category, ruleIds } = entry;
    if (
      typeof id === 'string' &&
      typeof name === 'string' &&
      typeof description === 'string' &&
      isPresetCategory(category) &&
      isStringArray(ruleIds)
    ) {
      presets.push({ id, name, description, category, ruleIds });
    }
  }
  return presets;
}

export function getPreset(id: string): RulePreset | undefined {
  return getAllPresets().find((preset) => preset.id === id);
}

export function presetsInCategory(category: PresetCategory): RulePreset[] {
  return getAllPresets().filter((preset) => preset.category === category);
}

export function presetRuleIds(id: string): string[] {
  return getPreset(id)?.ruleIds ?? [];
}

/**
 * Enable every rule of the preset: drop it from disabled_rules and add it as an enabled rule
 */
export function applyPreset(config: StudioYamlConfig, preset: RulePreset): StudioYamlConfig {
  const updated = cloneConfig(config);

  if (updated.disabledRules) {
    const remaining = updated.disabledRules.filter((id) => !preset.ruleIds.includes(id)).sort();
    updated.disabledRules = remaining.length > 0 ? remaining : undefined;
  }

  for (const ruleId of preset.ruleIds) {
    const existing = updated.rules[ruleId];
    if (!existing) {
      updated.rules[ruleId] = { enabled: true };
    } else if (!existing.enabled) {
      updated.rules[ruleId] = { ...existing, enabled: true };
    }
  }

  return updated;
}
