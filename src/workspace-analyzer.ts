/**
 * rulestudio Workspace Analyzer
 * Runs `swiftlint lint`, turns its JSON report into violations and stores them
 */

import * as fs from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';
import { glob } from 'glob';
import { AnalysisResult, Severity, Violation, Workspace } from './types.js';
import { SwiftLintError, WorkspaceAnalyzerError, errorMessage } from './errors.js';
import { SwiftLintCLI } from './swiftlint-cli.js';
import { ViolationStore } from './violation-storage.js';
import { isObject } from './data-loader.js';

export const DEFAULT_EXCLUSIONS: readonly string[] = [
  '.build',
  'DerivedData',
  '.git',
  'Pods',
  'Carthage',
  '.swiftpm',
  'node_modules',
  'Build',
];

const SWIFT_FILE_IGNORES = ['**/.build/**', '**/Pods/**', '**/node_modules/**', '**/.git/**'];

/**
 * Existing entries first, then any default not already present
 */
export function mergeExclusions(existing: string[] | undefined): string[] {
  if (!existing || existing.length === 0) return [...DEFAULT_EXCLUSIONS];
  const present = new Set(existing);
  return [...existing, ...DEFAULT_EXCLUSIONS.filter((dir) => !present.has(dir))];
}

// =============================================================================
// PARSING
// =============================================================================

export function violationId(ruleId: string, filePath: string, line: number, column: number | undefined, message: string): string {
  return crypto
    .createHash('sha256')
    .update([ruleId, filePath, line, column ?? '', message].join('\u0000'))
    .digest('hex')
    .slice(0, 32);
}

function relativeToWorkspace(filePath: string, workspacePath: string): string {
  const root = workspacePath.replace(/\/+$/, '');
  if (filePath.startsWith(root)) {
    return filePath.slice(root.length).replace(/^\//, '');
  }
  return filePath;
}

function stringField(entry: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = entry[key];
    if (typeof value === 'string') return value;
  }
  return undefined;
}

/**
 * Parse `swiftlint lint --reporter json` output. Entries missing a file,
 * line, rule, severity or message are skipped.
 */
export function parseViolations(output: string, workspacePath: string, detectedAt = Date.now()): Violation[] {
  if (output.trim() === '') return [];

  let parsed: unknown;
  try {
    parsed = JSON.parse(output);
  } catch {
    throw SwiftLintError.invalidOutput('Could not parse SwiftLint JSON output');
  }
  if (!Array.isArray(parsed)) {
    throw SwiftLintError.invalidOutput('Could not parse SwiftLint JSON output');
  }

  const violations: Violation[] = [];
  for (const entry of parsed) {
    if (!isObject(entry)) continue;

    const file = stringField(entry, 'file');
    const line = entry['line'];
    const ruleId = stringField(entry, 'rule_id', 'type');
    const severityText = stringField(entry, 'severity');
    const message = stringField(entry, 'reason', 'message');
    if (file === undefined || typeof line !== 'number' || !ruleId || !severityText || message === undefined) {
      continue;
    }

    const character = entry['character'];
    const column = typeof character === 'number' ? character : undefined;
    const severity: Severity = severityText.toLowerCase() === 'error' ? 'error' : 'warning';
    const filePath = relativeToWorkspace(file, workspacePath);

    violations.push({
      id: violationId(ruleId, filePath, line, column, message),
      ruleId,
      filePath,
      line,
      column,
      severity,
      message,
      detectedAt,
      suppressed: false,
    });
  }
  return violations;
}

// =============================================================================
// FILES
// =============================================================================

/**
 * All .swift files under `root`, skipping build and dependency directories
 */
export async function findSwiftFiles(root: string): Promise<string[]> {
  const files = await glob('**/*.swift', {
    cwd: root,
    ignore: SWIFT_FILE_IGNORES,
    nodir: true,
    absolute: true,
  });
  return files.sort();
}

async function hashConfig(configPath: string | undefined): Promise<string | null> {
  if (!configPath || !fs.existsSync(configPath)) return null;
  const content = await fs.promises.readFile(configPath);
  return crypto.createHash('sha256').update(content).digest('hex');
}

// =============================================================================
// ANALYZER
// =============================================================================

export class WorkspaceAnalyzer {
  isAnalyzing = false;
  lastAnalysisResult: AnalysisResult | null = null;

  constructor(
    private readonly cli: Pick<SwiftLintCLI, 'executeLintCommand'>,
    private readonly storage: Pick<ViolationStore, 'storeViolations'>
  ) {}

  async analyze(workspace: Workspace, configPath?: string): Promise<AnalysisResult> {
    const startedAt = Date.now();
    this.isAnalyzing = true;

    try {
      const effectiveConfig = configPath || workspace.configPath;
      const existingConfig = effectiveConfig && fs.existsSync(effectiveConfig) ? effectiveConfig : undefined;

      const output = await this.cli.executeLintCommand(existingConfig, path.resolve(workspace.path));
      const violations = parseViolations(output, path.resolve(workspace.path), startedAt);
      const configHash = await hashConfig(effectiveConfig);
      await this.storage.storeViolations(violations, workspace.id);

      const completedAt = Date.now();
      const result: AnalysisResult = {
        violations,
        filesAnalyzed: new Set(violations.map((v) => v.filePath)).size,
        duration: completedAt - startedAt,
        startedAt,
        completedAt,
        configHash,
      };
      this.lastAnalysisResult = result;
      return result;
    } catch (error) {
      throw WorkspaceAnalyzerError.analysisFailed(errorMessage(error), error);
    } finally {
      this.isAnalyzing = false;
    }
  }
}
