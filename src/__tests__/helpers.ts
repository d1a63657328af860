/**
 * Shared test fixtures for rulestudio tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Rule, RuleConfiguration, StudioYamlConfig, Violation, emptyConfig } from '../types.js';
import { StudioConfig } from '../config.js';
import { CommandOptions, CommandResult, CommandRunner } from '../exec.js';
import { FetchResponse, Fetcher } from '../url-fetcher.js';

/**
 * Create a mock Rule with sensible defaults
 */
export function createMockRule(overrides: Partial<Rule> & { id?: string } = {}): Rule {
  const id = overrides.id || 'test_rule';
  return {
    id,
    name: id
      .split('_')
      .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
      .join(' '),
    description: `Test rule: ${id}`,
    category: 'style',
    isOptIn: false,
    isEnabled: true,
    triggeringExamples: [],
    nonTriggeringExamples: [],
    supportsAutocorrection: false,
    ...overrides,
  };
}

/**
 * Create a mock Violation
 */
export function createMockViolation(overrides: Partial<Violation> = {}): Violation {
  return {
    id: 'v-0001',
    ruleId: 'line_length',
    filePath: 'Sources/App/main.swift',
    line: 10,
    column: 5,
    severity: 'warning',
    message: 'Line should be 120 characters or less',
    detectedAt: 1_700_000_000_000,
    suppressed: false,
    ...overrides,
  };
}

/**
 * Build a config from a rules map plus top-level overrides
 */
export function createConfig(
  rules: Record<string, RuleConfiguration> = {},
  overrides: Partial<StudioYamlConfig> = {}
): StudioYamlConfig {
  return { ...emptyConfig(), rules, ...overrides };
}

/**
 * Studio settings pointing all storage into a temp directory
 */
export function createStudioConfig(root: string, overrides: Partial<StudioConfig> = {}): StudioConfig {
  return {
    storagePath: '.rulestudio',
    homePath: path.join(root, 'home'),
    commandTimeoutMs: 1000,
    gitTimeoutMs: 1000,
    fetchTimeoutMs: 1000,
    backupKeepCount: 10,
    maxRecentWorkspaces: 10,
    uiPort: 0,
    configFileName: '.swiftlint.yml',
    ...overrides,
  };
}

/**
 * Temp directory with the given files (relative path -> content)
 */
export function createTempWorkspace(files: Record<string, string> = {}): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'rulestudio-test-'));
  for (const [relative, content] of Object.entries(files)) {
    const file = path.join(root, relative);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content, 'utf-8');
  }
  return root;
}

export function removeTempWorkspace(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}

export interface RecordedCommand {
  command: string;
  args: string[];
  options: CommandOptions;
}

/**
 * CommandRunner that answers from a handler and records every call
 */
export function createStubRunner(
  handler: (command: string, args: string[]) => Partial<CommandResult> | Error
): { runner: CommandRunner; calls: RecordedCommand[] } {
  const calls: RecordedCommand[] = [];
  const runner: CommandRunner = async (command, args, options) => {
    calls.push({ command, args, options });
    const result = handler(command, args);
    if (result instanceof Error) {
      throw result;
    }
    return { stdout: '', stderr: '', exitCode: 0, ...result };
  };
  return { runner, calls };
}

/**
 * Fetcher serving fixed bodies by URL; unknown URLs get a 404
 */
export function createStubFetcher(bodies: Record<string, string>): { fetcher: Fetcher; urls: string[] } {
  const urls: string[] = [];
  const fetcher: Fetcher = async (url) => {
    urls.push(url);
    const body = bodies[url];
    const response: FetchResponse = {
      status: body !== undefined ? 200 : 404,
      text: async () => body ?? 'Not Found',
    };
    return response;
  };
  return { fetcher, urls };
}
