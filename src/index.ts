/**
 * rulestudio - Configuration studio for SwiftLint
 *
 * Browse rules, edit .swiftlint.yml, and keep it healthy across SwiftLint upgrades.
 *
 * @packageDocumentation
 */

// Configuration
export { getConfig, setConfig, resetConfig, getViolationsPath, SCHEMA_VERSION, type StudioConfig } from './config.js';

// Errors
export {
  StudioError,
  YamlConfigError,
  SwiftLintError,
  RuleRegistryError,
  GitError,
  GitBranchDiffError,
  UrlFetchError,
  ConfigImportError,
  VersionHistoryError,
  WorkspaceError,
  WorkspaceAnalyzerError,
  RuleConfigurationError,
  MigrationError,
  errorMessage,
} from './errors.js';

// YAML configuration
export {
  YamlConfigEngine,
  loadYamlConfig,
  parseConfigContent,
  setRuleEnabled,
  setRuleSeverity,
} from './yaml-config.js';

// SwiftLint and rules
export { SwiftLintCLI, type SwiftLintCLIOptions } from './swiftlint-cli.js';
export { RuleRegistry, parseRulesTable, parseRuleDocumentation } from './rule-registry.js';
export { getAllPresets, getPreset, applyPreset } from './presets.js';

// Quality
export { ConfigurationValidator, type ValidationIssue, type ValidationResult } from './validator.js';
export { ConfigurationHealthAnalyzer, type ConfigHealthReport, type HealthGrade } from './health.js';
export { VersionCompatibilityChecker } from './compatibility.js';
export { MigrationAssistant, detectMigrations, applyMigration } from './migration.js';

// Comparison, import and history
export { ConfigComparisonService, compareConfigs } from './comparison.js';
export { GitService, getGitInfo } from './git.js';
export { GitBranchDiffService } from './branch-diff.js';
export { URLConfigFetcher, validateUrl, resolveToRawUrl, type Fetcher } from './url-fetcher.js';
export { ConfigImportService, mergeConfigs } from './config-import.js';
export { versionHistory, listBackups, restoreBackup, pruneOldBackups, type VersionHistoryService } from './version-history.js';

// Workspaces and violations
export { WorkspaceManager, createWorkspace, workspaceId } from './workspace.js';
export { WorkspaceAnalyzer, parseViolations } from './workspace-analyzer.js';
export { ViolationStorage, type ViolationStore } from './violation-storage.js';

// View-models
export { ViewModel } from './viewmodels/base.js';
export { RuleBrowserViewModel } from './viewmodels/rule-browser.js';
export { RuleDetailViewModel } from './viewmodels/rule-detail.js';
export { ViolationInspectorViewModel } from './viewmodels/violation-inspector.js';
export { ConfigComparisonViewModel } from './viewmodels/config-comparison.js';
export { ConfigImportViewModel } from './viewmodels/config-import.js';
export { ConfigVersionHistoryViewModel } from './viewmodels/version-history.js';
export { GitBranchDiffViewModel } from './viewmodels/git-branch-diff.js';
export { MigrationAssistantViewModel } from './viewmodels/migration-assistant.js';
export { VersionCompatibilityViewModel } from './viewmodels/version-compatibility.js';

// Agent output
export { wrapInEnvelope, buildStatusSummary, type StatusSummary } from './agent-output.js';

// Sandbox
export { detectSandbox, isSandboxMode } from './sandbox.js';

// Types
export type {
  Severity,
  RuleCategory,
  ConfigValue,
  Rule,
  RuleConfiguration,
  StudioYamlConfig,
  ConfigDiff,
  Violation,
  ViolationFilter,
  AnalysisResult,
  Workspace,
  ConfigBackup,
  ConfigComparisonResult,
  ImportMode,
  ConfigImportPreview,
  GitInfo,
  GitRefs,
  CompatibilityReport,
  MigrationStep,
  MigrationPlan,
  RulePreset,
} from './types.js';
