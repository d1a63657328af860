/**
 * rulestudio SwiftLint Deprecations
 * Renames, deprecations, removals and rule additions across SwiftLint versions
 */

import { isObject, isStringArray, readDataJson } from './data-loader.js';

export interface DeprecationEntry {
  deprecatedIn: string;
  replacement?: string;
  message: string;
}

export interface RemovalEntry {
  removedIn: string;
  replacement?: string;
  message: string;
}

export interface DeprecationData {
  renamedRules: Record<string, string>;
  deprecatedRules: Record<string, DeprecationEntry>;
  removedRules: Record<string, RemovalEntry>;
  versionRuleAdditions: Record<string, string[]>;
}

// =============================================================================
// LOADING
// =============================================================================

function readStringMap(value: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (!isObject(value)) return result;
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string') result[key] = entry;
  }
  return result;
}

function readEntries<T>(
  value: unknown,
  versionKey: string,
  build: (version: string, replacement: string | undefined, message: string) => T
): Record<string, T> {
  const result: Record<string, T> = {};
  if (!isObject(value)) return result;
  for (const [ruleId, entry] of Object.entries(value)) {
    if (!isObject(entry)) continue;
    const version = entry[versionKey];
    const message = entry['message'];
    const replacement = entry['replacement'];
    if (typeof version !== 'string' || typeof message !== 'string') continue;
    result[ruleId] = build(version, typeof replacement === 'string' ? replacement : undefined, message);
  }
  return result;
}

let loaded: DeprecationData | null = null;

export function getDeprecationData(): DeprecationData {
  if (loaded) return loaded;

  const raw = readDataJson('deprecations.json');
  const root: Record<string, unknown> = isObject(raw) ? raw : {};

  const additions = root['versionRuleAdditions'];
  const versionRuleAdditions: Record<string, string[]> = {};
  if (isObject(additions)) {
    for (const [version, rules] of Object.entries(additions)) {
      if (isStringArray(rules)) versionRuleAdditions[version] = rules;
    }
  }

  loaded = {
    renamedRules: readStringMap(root['renamedRules']),
    deprecatedRules: readEntries(root['deprecatedRules'], 'deprecatedIn', (deprecatedIn, replacement, message) => ({
      deprecatedIn,
      replacement,
      message,
    })),
    removedRules: readEntries(root['removedRules'], 'removedIn', (removedIn, replacement, message) => ({
      removedIn,
      replacement,
      message,
    })),
    versionRuleAdditions,
  };
  return loaded;
}

// =============================================================================
// VERSIONS
// =============================================================================

function versionParts(version: string): number[] {
  return version
    .split('.')
    .map((part) => Number.parseInt(part, 10))
    .filter((part) => !Number.isNaN(part));
}

/**
 * Numeric comparison per dot component; missing components count as 0
 */
export function isVersionLessThan(a: string, b: string): boolean {
  const left = versionParts(a);
  const right = versionParts(b);
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const l = left[i] ?? 0;
    const r = right[i] ?? 0;
    if (l < r) return true;
    if (l > r) return false;
  }
  return false;
}

/**
 * Rules added in versions v where from < v <= to, sorted
 */
export function rulesAdded(fromVersion: string, toVersion: string): string[] {
  const result: string[] = [];
  for (const [version, rules] of Object.entries(getDeprecationData().versionRuleAdditions)) {
    if (isVersionLessThan(fromVersion, version) && !isVersionLessThan(toVersion, version)) {
      result.push(...rules);
    }
  }
  return result.sort();
}

export function renamedRuleId(ruleId: string): string | undefined {
  const newId = getDeprecationData().renamedRules[ruleId];
  return newId !== undefined && newId !== ruleId ? newId : undefined;
}
