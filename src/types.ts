/**
 * rulestudio Type Definitions
 * Rules, configuration, violations, backups, comparisons and migrations
 */

// =============================================================================
// RULES
// =============================================================================

export type Severity = 'warning' | 'error';

export const SEVERITIES: readonly Severity[] = ['warning', 'error'];

export function isSeverity(value: unknown): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

export type RuleCategory = 'style' | 'lint' | 'metrics' | 'performance' | 'idiomatic';

export const RULE_CATEGORIES: readonly RuleCategory[] = [
  'style',
  'lint',
  'metrics',
  'performance',
  'idiomatic',
];

export function isRuleCategory(value: string): value is RuleCategory {
  return (RULE_CATEGORIES as readonly string[]).includes(value);
}

export function categoryDisplayName(category: RuleCategory): string {
  return category.charAt(0).toUpperCase() + category.slice(1);
}

/**
 * JSON-like value found in rule parameters (line_length.warning, excluded lists, ...)
 */
export type ConfigValue =
  | string
  | number
  | boolean
  | null
  | ConfigValue[]
  | { [key: string]: ConfigValue };

export interface Rule {
  id: string;
  name: string;
  description: string;
  category: RuleCategory;
  isOptIn: boolean;
  isEnabled: boolean;
  severity?: Severity;
  defaultSeverity?: Severity;
  parameters?: Record<string, ConfigValue>;
  triggeringExamples: string[];
  nonTriggeringExamples: string[];
  supportsAutocorrection: boolean;
  minimumSwiftVersion?: string;
  markdownDocumentation?: string;
}

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface RuleConfiguration {
  enabled: boolean;
  /** Kept as a plain string so invalid values read from disk can be reported */
  severity?: string;
  parameters?: Record<string, ConfigValue>;
}

/**
 * In-memory model of a .swiftlint.yml file
 */
export interface StudioYamlConfig {
  rules: Record<string, RuleConfiguration>;
  included?: string[];
  excluded?: string[];
  disabledRules?: string[];
  optInRules?: string[];
  analyzerRules?: string[];
  onlyRules?: string[];
  reporter?: string;
  warningThreshold?: number;
  strict?: boolean;
  /** Other top-level settings (custom_rules, parent_config, ...) carried through unchanged */
  extras?: Record<string, ConfigValue>;
  /** Top-level key -> comment text found next to it */
  comments: Record<string, string>;
  /** Top-level keys in document order */
  keyOrder: string[];
}

export interface ConfigDiff {
  addedRules: string[];
  removedRules: string[];
  modifiedRules: string[];
  before: string;
  after: string;
}

export function hasChanges(diff: ConfigDiff): boolean {
  return diff.addedRules.length > 0 || diff.removedRules.length > 0 || diff.modifiedRules.length > 0;
}

export function emptyConfig(): StudioYamlConfig {
  return { rules: {}, comments: {}, keyOrder: [] };
}

// =============================================================================
// VIOLATIONS
// =============================================================================

export interface Violation {
  id: string;
  ruleId: string;
  /** Relative to the workspace root */
  filePath: string;
  line: number;
  column?: number;
  severity: Severity;
  message: string;
  detectedAt: number;
  resolvedAt?: number;
  suppressed: boolean;
  suppressionReason?: string;
}

export interface ViolationFilter {
  ruleIds?: string[];
  filePaths?: string[];
  severities?: Severity[];
  suppressedOnly?: boolean;
  dateRange?: { start: number; end: number };
}

export interface AnalysisResult {
  violations: Violation[];
  filesAnalyzed: number;
  /** Milliseconds */
  duration: number;
  startedAt: number;
  completedAt: number;
  configHash: string | null;
}

// =============================================================================
// WORKSPACES
// =============================================================================

export interface Workspace {
  id: string;
  path: string;
  name: string;
  configPath?: string;
  lastOpened: number;
  lastAnalyzed?: number;
}

// =============================================================================
// VERSION HISTORY
// =============================================================================

export interface ConfigBackup {
  /** Backup file name, e.g. .swiftlint.yml.1718000000.backup */
  id: string;
  path: string;
  /** Unix seconds encoded in the file name */
  timestamp: number;
  fileSize: number;
}

// =============================================================================
// COMPARISON
// =============================================================================

export interface RuleComparisonDiff {
  ruleId: string;
  firstConfig: RuleConfiguration;
  secondConfig: RuleConfiguration;
  differences: string[];
}

export interface ConfigComparisonResult {
  firstLabel: string;
  secondLabel: string;
  onlyInFirst: string[];
  onlyInSecond: string[];
  inBothDifferent: RuleComparisonDiff[];
  inBothSame: string[];
  diff: ConfigDiff;
  totalDifferences: number;
}

// =============================================================================
// IMPORT
// =============================================================================

export type ImportMode = 'replace' | 'merge';

export interface ConfigImportPreview {
  sourceUrl: string;
  content: string;
  config: StudioYamlConfig;
  diff?: ConfigDiff;
  validationErrors: string[];
}

// =============================================================================
// GIT
// =============================================================================

export interface GitInfo {
  branch: string;
  commit: string;
  commitFull: string;
}

export interface GitRefs {
  currentBranch: string;
  branches: string[];
  tags: string[];
}

// =============================================================================
// COMPATIBILITY & MIGRATION
// =============================================================================

export interface DeprecatedRuleFinding {
  ruleId: string;
  deprecatedIn: string;
  replacement?: string;
  message: string;
}

export interface RemovedRuleFinding {
  ruleId: string;
  removedIn: string;
  replacement?: string;
  message: string;
}

export interface RenamedRuleFinding {
  oldId: string;
  newId: string;
}

export interface CompatibilityReport {
  swiftlintVersion: string;
  deprecatedRules: DeprecatedRuleFinding[];
  removedRules: RemovedRuleFinding[];
  renamedRules: RenamedRuleFinding[];
  availableNewRules: string[];
  hasIssues: boolean;
  totalIssueCount: number;
}

export type MigrationStep =
  | { kind: 'renameRule'; id: string; description: string; from: string; to: string }
  | { kind: 'removeDeprecatedRule'; id: string; description: string; ruleId: string; reason: string }
  | {
      kind: 'updateParameter';
      id: string;
      description: string;
      ruleId: string;
      oldParam: string;
      newParam: string;
    }
  | { kind: 'manualAction'; id: string; description: string };

export function canAutoApply(step: MigrationStep): boolean {
  return step.kind !== 'manualAction';
}

export interface MigrationPlan {
  fromVersion: string;
  toVersion: string;
  steps: MigrationStep[];
  totalSteps: number;
  canAutoApply: boolean;
  autoApplyableSteps: MigrationStep[];
  manualSteps: MigrationStep[];
}

// =============================================================================
// PRESETS
// =============================================================================

export type PresetCategory = 'performance' | 'swiftUI' | 'concurrency' | 'codeStyle' | 'documentation';

export interface RulePreset {
  id: string;
  name: string;
  description: string;
  category: PresetCategory;
  ruleIds: string[];
}

// =============================================================================
// AGENT OUTPUT
// =============================================================================

export interface AgentEnvelope<T> {
  schema_version: string;
  command: string;
  timestamp: number;
  data: T;
}
