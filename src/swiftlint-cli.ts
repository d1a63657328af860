/**
 * rulestudio SwiftLint CLI Wrapper
 * Version query, rule listing, rule docs and lint execution
 */

import * as fs from 'fs';
import * as path from 'path';
import { CommandFailure, CommandResult, CommandRunner, defaultCommandRunner } from './exec.js';
import { StudioConfig, getConfig, getDocsCachePath } from './config.js';
import { SwiftLintError, errorMessage } from './errors.js';

const HOMEBREW_PATHS = '/opt/homebrew/bin:/usr/local/bin';
const DEFAULT_PATH = `${HOMEBREW_PATHS}:/usr/bin:/bin`;

const CANDIDATE_PATHS = ['/opt/homebrew/bin/swiftlint', '/usr/local/bin/swiftlint', '/usr/bin/swiftlint'];

export interface SwiftLintCLIOptions {
  runner?: CommandRunner;
  config?: StudioConfig;
  /** Overrides file existence checks when resolving the binary */
  fileExists?: (file: string) => boolean;
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Environment for swiftlint: Homebrew locations must be on PATH
 */
export function buildEnvironment(env: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const result: NodeJS.ProcessEnv = { ...env };
  const current = env['PATH'];
  if (current === undefined || current === '') {
    result['PATH'] = DEFAULT_PATH;
  } else if (!current.includes('/opt/homebrew/bin')) {
    result['PATH'] = `${HOMEBREW_PATHS}:${current}`;
  }
  return result;
}

/**
 * Quote an argument for display or shell use
 */
export function escapeShellArgument(arg: string): string {
  if (/[\s'"]/.test(arg)) {
    return `'${arg.replace(/'/g, "'\\''")}'`;
  }
  return arg;
}

/**
 * Turn stderr of a completed run into an error, or null when it is only noise.
 * Warnings and "not a valid rule identifier" notices are not failures.
 */
export function classifyStderr(stderr: string): SwiftLintError | null {
  const lowered = stderr.toLowerCase();
  if (lowered.includes('command not found')) {
    return SwiftLintError.notFound();
  }
  const isError = lowered.includes('error:');
  const isWarning = lowered.includes('warning:');
  const isInvalidRule = lowered.includes('is not a valid rule identifier');
  if (isError && !isWarning && !isInvalidRule) {
    return SwiftLintError.executionFailed(stderr.trim());
  }
  return null;
}

// =============================================================================
// CLI
// =============================================================================

export class SwiftLintCLI {
  private readonly runner: CommandRunner;
  private readonly config: StudioConfig;
  private readonly fileExists: (file: string) => boolean;
  private resolvedPath: string | null = null;
  private readonly docsGenerations = new Map<string, Promise<void>>();

  constructor(options: SwiftLintCLIOptions = {}) {
    this.runner = options.runner || defaultCommandRunner;
    this.config = options.config || getConfig();
    this.fileExists = options.fileExists || ((file) => fs.existsSync(file));
  }

  /**
   * Configured binary, then standard install locations, then plain `swiftlint` on PATH
   */
  resolveSwiftLintPath(): string {
    if (this.resolvedPath) return this.resolvedPath;

    const candidates = this.config.swiftlintPath
      ? [this.config.swiftlintPath, ...CANDIDATE_PATHS]
      : CANDIDATE_PATHS;
    this.resolvedPath = candidates.find((candidate) => this.fileExists(candidate)) || 'swiftlint';
    return this.resolvedPath;
  }

  async getVersion(): Promise<string> {
    const output = await this.execute(['version']);
    return output.trim();
  }

  async executeRulesCommand(): Promise<string> {
    return this.execute(['rules']);
  }

  async executeRuleDetailCommand(ruleId: string): Promise<string> {
    return this.execute(['rules', ruleId]);
  }

  /**
   * Markdown docs for one rule. `generate-docs` writes every rule at once,
   * so the output directory is reused for the same SwiftLint version and
   * concurrent lookups share one generation.
   */
  async generateDocsForRule(ruleId: string): Promise<string> {
    const version = await this.getVersion();
    const docsDir = getDocsCachePath(this.config, version);
    const docFile = path.join(docsDir, `${ruleId}.md`);

    // A generation in flight may have written this file only partly
    const pending = this.docsGenerations.get(docsDir);
    if (pending) {
      await pending;
    }
    if (!fs.existsSync(docFile)) {
      await this.generateDocs(docsDir);
    }

    if (!fs.existsSync(docFile)) {
      throw SwiftLintError.executionFailed(`Documentation file not found for rule: ${ruleId} after generation`);
    }
    return fs.promises.readFile(docFile, 'utf-8');
  }

  private generateDocs(docsDir: string): Promise<void> {
    let generation = this.docsGenerations.get(docsDir);
    if (!generation) {
      generation = fs.promises
        .mkdir(docsDir, { recursive: true })
        .then(() => this.execute(['generate-docs', '--path', docsDir]))
        .then(
          () => undefined,
          (error: unknown) => {
            // Let the next lookup try again
            this.docsGenerations.delete(docsDir);
            throw error;
          }
        );
      this.docsGenerations.set(docsDir, generation);
    }
    return generation;
  }

  /**
   * Run `swiftlint lint --reporter json`. Violations make swiftlint exit non-zero,
   * so stderr decides failure, not the exit code.
   */
  async executeLintCommand(configPath: string | undefined, workspacePath: string): Promise<string> {
    return this.execute(this.lintArguments(configPath, workspacePath), workspacePath);
  }

  lintArguments(configPath: string | undefined, workspacePath: string): string[] {
    const args = ['lint', '--reporter', 'json'];
    if (configPath && this.fileExists(configPath)) {
      args.push('--config', configPath);
    }
    args.push(workspacePath);
    return args;
  }

  /**
   * Human-readable form of a command, printed by `lint --verbose`
   */
  describeCommand(args: string[]): string {
    return [this.resolveSwiftLintPath(), ...args].map(escapeShellArgument).join(' ');
  }

  private async execute(args: string[], cwd?: string): Promise<string> {
    const command = this.resolveSwiftLintPath();
    let result: CommandResult;
    try {
      result = await this.runner(command, args, {
        cwd,
        env: buildEnvironment(),
        timeoutMs: this.config.commandTimeoutMs,
      });
    } catch (error) {
      if (error instanceof CommandFailure) {
        if (error.reason === 'notFound') throw SwiftLintError.notFound();
        if (error.reason === 'timeout') {
          throw SwiftLintError.timeout(Math.round(this.config.commandTimeoutMs / 1000));
        }
      }
      throw SwiftLintError.executionFailed(errorMessage(error), error);
    }

    const failure = classifyStderr(result.stderr);
    if (failure) {
      throw failure;
    }
    return result.stdout;
  }
}
