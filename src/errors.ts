/**
 * rulestudio Errors
 * One error class per failure family, each with a stable code
 */

export abstract class StudioError<Code extends string = string> extends Error {
  readonly code: Code;
  readonly context: Record<string, unknown>;

  constructor(code: Code, message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// =============================================================================
// CONFIGURATION FILE
// =============================================================================

export type YamlConfigErrorCode =
  | 'parseError'
  | 'serializationError'
  | 'invalidSeverity'
  | 'invalidPath'
  | 'fileNotFound'
  | 'writeFailed'
  | 'readOnly';

export class YamlConfigError extends StudioError<YamlConfigErrorCode> {
  static parseError(message: string, cause?: unknown): YamlConfigError {
    return new YamlConfigError('parseError', `Failed to parse YAML: ${message}`, {}, cause);
  }

  static serializationError(message: string, cause?: unknown): YamlConfigError {
    return new YamlConfigError('serializationError', `Failed to serialize YAML: ${message}`, {}, cause);
  }

  static invalidSeverity(ruleId: string, severity: string): YamlConfigError {
    return new YamlConfigError(
      'invalidSeverity',
      `Invalid severity '${severity}' for rule '${ruleId}'. Must be 'warning' or 'error'.`,
      { ruleId, severity }
    );
  }

  static invalidPath(value: string): YamlConfigError {
    return new YamlConfigError('invalidPath', `Invalid path: ${value}`, { path: value });
  }

  static fileNotFound(): YamlConfigError {
    return new YamlConfigError('fileNotFound', 'Configuration file not found');
  }

  static writeFailed(message: string, cause?: unknown): YamlConfigError {
    return new YamlConfigError('writeFailed', `Failed to write configuration: ${message}`, {}, cause);
  }

  static readOnly(): YamlConfigError {
    return new YamlConfigError('readOnly', 'Configuration cannot be written: filesystem is read-only in sandbox mode');
  }
}

// =============================================================================
// SWIFTLINT
// =============================================================================

export type SwiftLintErrorCode = 'notFound' | 'executionFailed' | 'invalidOutput' | 'timeout';

export class SwiftLintError extends StudioError<SwiftLintErrorCode> {
  static notFound(): SwiftLintError {
    return new SwiftLintError(
      'notFound',
      'SwiftLint is not installed or not in PATH. Install it with: brew install swiftlint'
    );
  }

  static executionFailed(message: string, cause?: unknown): SwiftLintError {
    return new SwiftLintError('executionFailed', `SwiftLint execution failed: ${message}`, {}, cause);
  }

  static invalidOutput(message: string): SwiftLintError {
    return new SwiftLintError('invalidOutput', `Invalid SwiftLint output: ${message}`);
  }

  static timeout(seconds: number): SwiftLintError {
    return new SwiftLintError('timeout', `SwiftLint command timed out after ${seconds} seconds.`, { seconds });
  }
}

export class RuleRegistryError extends StudioError<'noRules'> {
  static noRules(): RuleRegistryError {
    return new RuleRegistryError('noRules', 'No rules found in swiftlint output');
  }
}

// =============================================================================
// GIT
// =============================================================================

export type GitErrorCode = 'notARepository' | 'branchNotFound' | 'fileNotFound' | 'executionFailed' | 'timeout';

export class GitError extends StudioError<GitErrorCode> {
  static notARepository(repoPath: string): GitError {
    return new GitError('notARepository', `Not a git repository: ${repoPath}`, { path: repoPath });
  }

  static branchNotFound(ref: string): GitError {
    return new GitError('branchNotFound', `Branch or ref not found: ${ref}`, { ref });
  }

  static fileNotFound(file: string, ref: string): GitError {
    return new GitError('fileNotFound', `File '${file}' not found at '${ref}'`, { file, ref });
  }

  static executionFailed(message: string): GitError {
    return new GitError('executionFailed', `Git command failed: ${message}`);
  }

  static timeout(seconds: number): GitError {
    return new GitError('timeout', `Git command timed out after ${seconds} seconds.`, { seconds });
  }
}

export type GitBranchDiffErrorCode = 'notGitRepo' | 'configNotFoundOnBranch';

export class GitBranchDiffError extends StudioError<GitBranchDiffErrorCode> {
  static notGitRepo(): GitBranchDiffError {
    return new GitBranchDiffError('notGitRepo', 'The workspace is not a git repository.');
  }

  static configNotFoundOnBranch(branch: string): GitBranchDiffError {
    return new GitBranchDiffError(
      'configNotFoundOnBranch',
      `No .swiftlint.yml found on branch '${branch}'.`,
      { branch }
    );
  }
}

// =============================================================================
// REMOTE IMPORT
// =============================================================================

export type UrlFetchErrorCode =
  | 'invalidUrl'
  | 'insecureUrl'
  | 'unsupportedScheme'
  | 'networkError'
  | 'invalidYaml'
  | 'httpError'
  | 'timeout'
  | 'networkDisabled';

export class UrlFetchError extends StudioError<UrlFetchErrorCode> {
  static invalidUrl(): UrlFetchError {
    return new UrlFetchError('invalidUrl', 'The URL is not valid.');
  }

  static insecureUrl(): UrlFetchError {
    return new UrlFetchError('insecureUrl', 'Only HTTPS URLs are supported for security.');
  }

  static unsupportedScheme(scheme: string): UrlFetchError {
    return new UrlFetchError('unsupportedScheme', `Unsupported URL scheme: ${scheme}`, { scheme });
  }

  static networkError(message: string, cause?: unknown): UrlFetchError {
    return new UrlFetchError('networkError', `Network error: ${message}`, {}, cause);
  }

  static invalidYaml(message: string): UrlFetchError {
    return new UrlFetchError('invalidYaml', `The fetched content is not valid YAML: ${message}`);
  }

  static httpError(status: number): UrlFetchError {
    return new UrlFetchError('httpError', `HTTP error ${status}.`, { status });
  }

  static timeout(): UrlFetchError {
    return new UrlFetchError('timeout', 'The request timed out.');
  }

  static networkDisabled(): UrlFetchError {
    return new UrlFetchError('networkDisabled', 'Network access is disabled in sandbox mode.');
  }
}

export type ConfigImportErrorCode = 'fetchFailed' | 'parseFailed' | 'saveFailed';

export class ConfigImportError extends StudioError<ConfigImportErrorCode> {
  static fetchFailed(message: string, cause?: unknown): ConfigImportError {
    return new ConfigImportError('fetchFailed', `Failed to fetch configuration: ${message}`, {}, cause);
  }

  static parseFailed(message: string, cause?: unknown): ConfigImportError {
    return new ConfigImportError('parseFailed', `Failed to parse configuration: ${message}`, {}, cause);
  }

  static saveFailed(message: string, cause?: unknown): ConfigImportError {
    return new ConfigImportError('saveFailed', `Failed to save configuration: ${message}`, {}, cause);
  }
}

// =============================================================================
// HISTORY, WORKSPACES, ANALYSIS
// =============================================================================

export type VersionHistoryErrorCode = 'backupNotFound' | 'restoreFailed';

export class VersionHistoryError extends StudioError<VersionHistoryErrorCode> {
  static backupNotFound(id: string): VersionHistoryError {
    return new VersionHistoryError('backupNotFound', `Backup not found: ${id}`, { id });
  }

  static restoreFailed(message: string, cause?: unknown): VersionHistoryError {
    return new VersionHistoryError('restoreFailed', `Failed to restore backup: ${message}`, {}, cause);
  }
}

export type WorkspaceErrorCode = 'notADirectory' | 'notASwiftProject' | 'accessDenied' | 'invalidPath';

export class WorkspaceError extends StudioError<WorkspaceErrorCode> {
  static notADirectory(dir: string): WorkspaceError {
    return new WorkspaceError('notADirectory', `The selected path is not a directory: ${dir}`, { path: dir });
  }

  static notASwiftProject(directory: string): WorkspaceError {
    return new WorkspaceError(
      'notASwiftProject',
      `'${directory}' does not appear to be a Swift project. No Swift files, Package.swift or Xcode project found.`,
      { directory }
    );
  }

  static accessDenied(dir: string): WorkspaceError {
    return new WorkspaceError('accessDenied', `Access denied: ${dir}`, { path: dir });
  }

  static invalidPath(): WorkspaceError {
    return new WorkspaceError('invalidPath', 'No workspace is open.');
  }
}

export class WorkspaceAnalyzerError extends StudioError<'analysisFailed'> {
  static analysisFailed(message: string, cause?: unknown): WorkspaceAnalyzerError {
    return new WorkspaceAnalyzerError('analysisFailed', `Analysis failed: ${message}`, {}, cause);
  }
}

// =============================================================================
// VIEW-MODEL ERRORS
// =============================================================================

export class RuleConfigurationError extends StudioError<'noWorkspace'> {
  static noWorkspace(): RuleConfigurationError {
    return new RuleConfigurationError(
      'noWorkspace',
      'No workspace is open. Please open a workspace to configure rules.'
    );
  }
}

export type MigrationErrorCode = 'noPreviousVersion' | 'fileNotFound';

export class MigrationError extends StudioError<MigrationErrorCode> {
  static noPreviousVersion(): MigrationError {
    return new MigrationError(
      'noPreviousVersion',
      'Please enter the previous SwiftLint version you are migrating from.'
    );
  }

  static fileNotFound(): MigrationError {
    return new MigrationError('fileNotFound', 'No configuration file found for this workspace.');
  }
}
