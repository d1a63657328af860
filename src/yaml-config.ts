/**
 * rulestudio YAML Configuration Engine
 * Loads, validates, diffs and saves .swiftlint.yml files.
 *
 * Saving re-applies the in-memory model onto the document that was loaded,
 * so keys the model does not touch keep their comments and position.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';
import { Document, isMap, isNode, isScalar, parseDocument } from 'yaml';
import type { YAMLMap } from 'yaml';
import {
  ConfigDiff,
  ConfigValue,
  RuleConfiguration,
  StudioYamlConfig,
  emptyConfig,
  isSeverity,
} from './types.js';
import { YamlConfigError, errorMessage } from './errors.js';

// =============================================================================
// KEYS
// =============================================================================

type ListField = 'included' | 'excluded' | 'disabledRules' | 'optInRules' | 'analyzerRules' | 'onlyRules';

const LIST_KEYS: ReadonlyArray<readonly [string, ListField]> = [
  ['included', 'included'],
  ['excluded', 'excluded'],
  ['disabled_rules', 'disabledRules'],
  ['opt_in_rules', 'optInRules'],
  ['analyzer_rules', 'analyzerRules'],
  ['only_rules', 'onlyRules'],
];

/**
 * Top-level SwiftLint keys that are settings, not rule identifiers.
 * Their values are carried through untouched in `extras`.
 */
const PASSTHROUGH_KEYS = new Set([
  'custom_rules',
  'parent_config',
  'child_config',
  'allow_zero_lintable_files',
  'baseline',
  'write_baseline',
  'check_for_updates',
  'remote_timeout',
  'remote_timeout_if_cached',
  'lenient',
  'swiftlint_version',
]);

// =============================================================================
// VALUE HELPERS
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Narrow an arbitrary parsed YAML value into a ConfigValue
 */
export function toConfigValue(value: unknown): ConfigValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') return Number(value);
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(toConfigValue);
  if (isRecord(value)) {
    const result: { [key: string]: ConfigValue } = {};
    for (const [key, inner] of Object.entries(value)) {
      result[key] = toConfigValue(inner);
    }
    return result;
  }
  return String(value);
}

function toStringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((v): v is string | number => typeof v === 'string' || typeof v === 'number').map(String);
}

function pairKey(key: unknown): string {
  return isScalar(key) ? String(key.value) : String(key);
}

function parseBooleanValue(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (value === 'true' || value === 'false') return value === 'true';
  return undefined;
}

/**
 * Structural equality for plain data (rule configs, parsed YAML values)
 */
export function isDeepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => isDeepEqual(item, b[i]));
  }
  if (isRecord(a) && isRecord(b)) {
    const aKeys = Object.keys(a).filter((k) => a[k] !== undefined);
    const bKeys = Object.keys(b).filter((k) => b[k] !== undefined);
    if (aKeys.length !== bKeys.length) return false;
    return aKeys.every((key) => isDeepEqual(a[key], b[key]));
  }
  return false;
}

export function cloneConfig(config: StudioYamlConfig): StudioYamlConfig {
  return structuredClone(config);
}

/**
 * Copy of `config` with the rule entry switched on or off. Enabling keeps the
 * entry's parameters, sets `severity` when given and takes the rule out of
 * `disabled_rules` (dropping the list once it is empty); disabling keeps the rest.
 */
export function setRuleEnabled(
  config: StudioYamlConfig,
  ruleId: string,
  enabled: boolean,
  severity?: string
): StudioYamlConfig {
  const next = cloneConfig(config);
  const existing = next.rules[ruleId] || { enabled };
  next.rules[ruleId] = { ...existing, enabled };
  if (enabled && severity !== undefined) {
    next.rules[ruleId].severity = severity;
  }
  if (enabled && next.disabledRules) {
    const remaining = next.disabledRules.filter((id) => id !== ruleId);
    next.disabledRules = remaining.length > 0 ? remaining : undefined;
  }
  return next;
}

export function setRuleSeverity(config: StudioYamlConfig, ruleId: string, severity: string): StudioYamlConfig {
  const next = cloneConfig(config);
  const existing = next.rules[ruleId] || { enabled: true };
  next.rules[ruleId] = { ...existing, severity };
  return next;
}

// =============================================================================
// PARSING
// =============================================================================

/**
 * Parse one rule entry. Booleans toggle the rule; mappings carry severity,
 * enabled and arbitrary parameters.
 */
export function parseRuleConfiguration(value: unknown): RuleConfiguration | null {
  const enabled = parseBooleanValue(value);
  if (enabled !== undefined) {
    return { enabled };
  }
  if (!isRecord(value)) {
    return null;
  }

  const rule: RuleConfiguration = { enabled: true };
  const parameters: Record<string, ConfigValue> = {};

  for (const [key, inner] of Object.entries(value)) {
    if (key === 'severity') {
      if (typeof inner === 'string') rule.severity = inner;
      continue;
    }
    if (key === 'enabled') {
      if (typeof inner === 'boolean') rule.enabled = inner;
      else if (typeof inner === 'string') rule.enabled = inner.toLowerCase() === 'true';
      continue;
    }
    parameters[key] = toConfigValue(inner);
  }

  if (Object.keys(parameters).length > 0) {
    rule.parameters = parameters;
  }
  return rule;
}

/**
 * Parse YAML text into the configuration model.
 * Throws YamlConfigError.parseError for syntax errors, empty documents and non-mapping roots.
 */
export function parseConfigContent(content: string): StudioYamlConfig {
  const doc = parseDocument(content);
  if (doc.errors.length > 0) {
    throw YamlConfigError.parseError(doc.errors[0].message, doc.errors[0]);
  }

  const raw: unknown = doc.toJS();
  if (raw === null || raw === undefined) {
    throw YamlConfigError.parseError('Empty YAML document');
  }
  if (!isRecord(raw)) {
    throw YamlConfigError.parseError('Expected mapping node');
  }

  const config = emptyConfig();
  const extras: Record<string, ConfigValue> = {};

  for (const [key, value] of Object.entries(raw)) {
    const listField = LIST_KEYS.find(([yamlKey]) => yamlKey === key);
    // A known key holding a value the model cannot represent is kept as written
    if (listField) {
      const list = toStringList(value);
      if (list) config[listField[1]] = list;
      else extras[key] = toConfigValue(value);
      continue;
    }

    if (key === 'reporter') {
      if (typeof value === 'string') config.reporter = value;
      else extras[key] = toConfigValue(value);
      continue;
    }
    if (key === 'warning_threshold') {
      if (typeof value === 'number') config.warningThreshold = value;
      else extras[key] = toConfigValue(value);
      continue;
    }
    if (key === 'strict') {
      const strict = parseBooleanValue(value);
      if (strict !== undefined) config.strict = strict;
      else extras[key] = toConfigValue(value);
      continue;
    }
    if (key === 'rules') {
      if (isRecord(value)) {
        for (const [ruleId, ruleValue] of Object.entries(value)) {
          const rule = parseRuleConfiguration(ruleValue);
          if (rule) config.rules[ruleId] = rule;
        }
      } else {
        extras[key] = toConfigValue(value);
      }
      continue;
    }
    if (PASSTHROUGH_KEYS.has(key)) {
      extras[key] = toConfigValue(value);
      continue;
    }

    const rule = parseRuleConfiguration(value);
    if (rule) {
      config.rules[key] = rule;
    } else {
      extras[key] = toConfigValue(value);
    }
  }

  if (Object.keys(extras).length > 0) {
    config.extras = extras;
  }

  if (isMap(doc.contents)) {
    config.keyOrder = doc.contents.items
      .map((pair) => pairKey(pair.key))
      .filter((key, i, all) => all.indexOf(key) === i);
  }
  config.comments = extractComments(content);

  return config;
}

const KEY_PATTERN = /^\s*(["']?)([A-Za-z0-9_.\-/]+)\1\s*:/;

function extractKey(line: string): string | null {
  const match = KEY_PATTERN.exec(line);
  return match ? match[2] : null;
}

/**
 * Map each key to the comment written next to it. A comment line attaches
 * to the most recent key; before any key it attaches to the key on the next line.
 */
export function extractComments(content: string): Record<string, string> {
  const comments: Record<string, string> = {};
  const lines = content.split(/\r?\n/);
  let currentKey: string | null = null;

  lines.forEach((line, index) => {
    const trimmed = line.trim();
    if (trimmed.startsWith('#')) {
      const comment = trimmed.slice(1).trim();
      if (currentKey) {
        comments[currentKey] = comment;
      } else if (index < lines.length - 1) {
        const nextKey = extractKey(lines[index + 1]);
        if (nextKey) comments[nextKey] = comment;
      }
      return;
    }
    if (trimmed !== '' && !trimmed.startsWith('-')) {
      const key = extractKey(line);
      if (key) currentKey = key;
    }
  });

  return comments;
}

// =============================================================================
// SERIALIZATION
// =============================================================================

function isSimpleRule(rule: RuleConfiguration, enabled: boolean): boolean {
  return rule.severity === undefined && rule.parameters === undefined && rule.enabled === enabled;
}

/**
 * YAML value written for a rule: `true`/`false` for plain toggles, a mapping otherwise
 */
export function ruleToYamlValue(rule: RuleConfiguration): ConfigValue {
  if (isSimpleRule(rule, true)) return true;
  if (isSimpleRule(rule, false)) return false;

  const value: { [key: string]: ConfigValue } = {};
  if (rule.severity !== undefined) {
    value['severity'] = rule.severity;
  }
  if (rule.parameters) {
    for (const [key, param] of Object.entries(rule.parameters)) {
      value[key] = param;
    }
  }
  if (!rule.enabled) {
    value['enabled'] = false;
  }
  return value;
}

/**
 * Top-level key/value pairs for a config, in the order new files are written
 */
export function configToEntries(config: StudioYamlConfig): Array<[string, ConfigValue]> {
  const entries: Array<[string, ConfigValue]> = [];

  for (const [yamlKey, field] of LIST_KEYS) {
    const list = config[field];
    if (list) entries.push([yamlKey, [...list]]);
  }
  if (config.reporter !== undefined) entries.push(['reporter', config.reporter]);
  if (config.warningThreshold !== undefined) entries.push(['warning_threshold', config.warningThreshold]);
  if (config.strict !== undefined) entries.push(['strict', config.strict]);

  if (config.extras) {
    const written = new Set(entries.map(([key]) => key));
    for (const [key, value] of Object.entries(config.extras)) {
      if (!written.has(key)) entries.push([key, value]);
    }
  }

  for (const ruleId of Object.keys(config.rules).sort()) {
    entries.push([ruleId, ruleToYamlValue(config.rules[ruleId])]);
  }

  return entries;
}

function applyEntries(doc: Document, map: YAMLMap, entries: Array<[string, ConfigValue]>): void {
  const desired = new Map(entries);

  for (const pair of [...map.items]) {
    const key = pairKey(pair.key);
    if (!desired.has(key)) {
      map.delete(pair.key);
    }
  }

  for (const [key, value] of entries) {
    const existing: unknown = map.get(key, true);
    const existingValue = isNode(existing) ? existing.toJS(doc) : existing;
    if (map.has(key) && isDeepEqual(existingValue, value)) {
      continue;
    }
    map.set(key, doc.createNode(value));
  }
}

/**
 * `<config>.<unixSeconds>.backup` for now, moved to the next free second when
 * a backup from the same second already exists
 */
export function nextBackupPath(configPath: string): string {
  const dir = path.dirname(configPath);
  const fileName = path.basename(configPath);
  let timestamp = Math.floor(Date.now() / 1000);
  while (fs.existsSync(path.join(dir, `${fileName}.${timestamp}.backup`))) {
    timestamp += 1;
  }
  return path.join(dir, `${fileName}.${timestamp}.backup`);
}

// =============================================================================
// ENGINE
// =============================================================================

export class YamlConfigEngine {
  readonly configPath: string;
  originalContent = '';
  private currentConfig: StudioYamlConfig = emptyConfig();

  constructor(configPath: string) {
    this.configPath = configPath;
  }

  /**
   * Load configuration from disk. A missing file yields an empty config.
   */
  async load(): Promise<void> {
    if (!fs.existsSync(this.configPath)) {
      this.currentConfig = emptyConfig();
      this.originalContent = '';
      return;
    }

    let content: string;
    try {
      content = await fs.promises.readFile(this.configPath, 'utf-8');
    } catch (error) {
      throw YamlConfigError.parseError(`Could not read file: ${errorMessage(error)}`, error);
    }

    this.currentConfig = parseConfigContent(content);
    this.originalContent = content;
  }

  getConfig(): StudioYamlConfig {
    return cloneConfig(this.currentConfig);
  }

  /**
   * Replace the in-memory config without writing it
   */
  updateConfig(config: StudioYamlConfig): void {
    this.currentConfig = cloneConfig(config);
  }

  generateDiff(proposed: StudioYamlConfig): ConfigDiff {
    const current = this.currentConfig;
    const currentIds = Object.keys(current.rules);
    const proposedIds = Object.keys(proposed.rules);

    const addedRules = proposedIds.filter((id) => !(id in current.rules)).sort();
    const removedRules = currentIds.filter((id) => !(id in proposed.rules)).sort();
    const modifiedRules = currentIds
      .filter((id) => id in proposed.rules && !isDeepEqual(current.rules[id], proposed.rules[id]))
      .sort();

    return {
      addedRules,
      removedRules,
      modifiedRules,
      before: this.trySerialize(current),
      after: this.trySerialize(proposed),
    };
  }

  validate(config: StudioYamlConfig): void {
    for (const [ruleId, rule] of Object.entries(config.rules)) {
      if (rule.severity !== undefined && !isSeverity(rule.severity)) {
        throw YamlConfigError.invalidSeverity(ruleId, rule.severity);
      }
    }
    for (const entry of [...(config.included || []), ...(config.excluded || [])]) {
      if (entry.trim() === '') {
        throw YamlConfigError.invalidPath(entry);
      }
    }
  }

  serialize(config: StudioYamlConfig): string {
    try {
      const base = this.originalContent.trim() !== '' ? parseDocument(this.originalContent) : null;
      const reuse = base !== null && base.errors.length === 0 && isMap(base.contents);
      const doc = reuse && base ? base : new Document({});

      if (!isMap(doc.contents)) {
        throw new Error('Document root is not a mapping');
      }
      applyEntries(doc, doc.contents, configToEntries(config));

      let output = doc.toString();
      const commentKeys = Object.keys(config.comments).sort();
      if (!reuse && commentKeys.length > 0) {
        output += '\n# Preserved comments:\n';
        for (const key of commentKeys) {
          output += `# ${key}: ${config.comments[key]}\n`;
        }
      }
      return output;
    } catch (error) {
      throw YamlConfigError.serializationError(errorMessage(error), error);
    }
  }

  /**
   * Validate, back up the current file, then write atomically through a temp file.
   */
  async save(config: StudioYamlConfig, createBackup = true): Promise<void> {
    this.validate(config);

    const dir = path.dirname(this.configPath);
    const fileName = path.basename(this.configPath);

    if (createBackup && fs.existsSync(this.configPath)) {
      const backupPath = nextBackupPath(this.configPath);
      try {
        await fs.promises.copyFile(this.configPath, backupPath);
      } catch (error) {
        throw YamlConfigError.writeFailed(`backup failed: ${errorMessage(error)}`, error);
      }
    }

    const content = this.serialize(config);
    const tempPath = path.join(dir, `${fileName}.${crypto.randomUUID()}.tmp`);

    try {
      await fs.promises.mkdir(dir, { recursive: true });
      await fs.promises.writeFile(tempPath, content, 'utf-8');
      await fs.promises.rename(tempPath, this.configPath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw YamlConfigError.writeFailed(errorMessage(error), error);
    }

    this.currentConfig = cloneConfig(config);
    this.originalContent = content;
  }

  private trySerialize(config: StudioYamlConfig): string {
    try {
      return this.serialize(config);
    } catch {
      return '';
    }
  }
}

/**
 * Convenience loader used by comparison, history and import services
 */
export async function loadYamlConfig(configPath: string): Promise<YamlConfigEngine> {
  const engine = new YamlConfigEngine(configPath);
  await engine.load();
  return engine;
}
