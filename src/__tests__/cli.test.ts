/**
 * Tests for the command-line program
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { createProgram } from '../cli/program.js';
import { createTempWorkspace, removeTempWorkspace } from './helpers.js';

describe('rulestudio program', () => {
  let root: string;

  beforeEach(() => {
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (root) removeTempWorkspace(root);
  });

  function setup(content: string): string {
    root = createTempWorkspace({ '.swiftlint.yml': content });
    return path.join(root, '.swiftlint.yml');
  }

  async function run(...args: string[]): Promise<unknown> {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    await createProgram().parseAsync(['-w', root, ...args], { from: 'user' });
    expect(log).toHaveBeenCalledTimes(1);
    return JSON.parse(String(log.mock.calls[0][0]));
  }

  it('prints its own version for a root --version', async () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await expect(createProgram().exitOverride().parseAsync(['--version'], { from: 'user' })).rejects.toMatchObject({
      code: 'commander.version',
    });
    expect(write).toHaveBeenCalledWith('0.1.0\n');
  });

  it('passes compat --version to the compatibility check', async () => {
    setup('variable_name: true\ntodo: true\n');

    const report = await run('compat', '--version', '0.50.0', '--json');

    expect(report).toMatchObject({
      swiftlintVersion: '0.50.0',
      removedRules: [{ ruleId: 'variable_name' }],
      hasIssues: true,
    });
  });

  it('shows an enable without writing on --dry-run', async () => {
    const content = 'disabled_rules:\n  - force_cast\ntodo: true\n';
    const configPath = setup(content);

    const output = await run('enable', 'force_cast', '--dry-run', '--json');

    expect(output).toEqual({
      diff: {
        addedRules: ['force_cast'],
        removedRules: [],
        modifiedRules: [],
        before: content,
        after: 'todo: true\nforce_cast: true\n',
      },
      saved: false,
    });
    expect(fs.readFileSync(configPath, 'utf-8')).toBe(content);
    expect(fs.readdirSync(root).filter((f) => f.endsWith('.backup'))).toEqual([]);
  });

  it('plans a migration between the given versions', async () => {
    const configPath = setup('inert_defer: true\n');

    const output = await run('migrate', '--from', '0.40.0', '--to', '0.47.0', '--json');

    expect(output).toMatchObject({
      plan: {
        fromVersion: '0.40.0',
        toVersion: '0.47.0',
        steps: [{ id: 'rename-inert_defer-no_empty_block' }, { id: 'manual-1' }],
      },
      diff: { addedRules: ['no_empty_block'], removedRules: ['inert_defer'] },
      applied: false,
    });
    expect(fs.readFileSync(configPath, 'utf-8')).toBe('inert_defer: true\n');
  });
});
