/**
 * rulestudio Process Execution
 * Runs external tools (swiftlint, git) without a shell
 */

import { execFile } from 'child_process';
import { getSandboxRestrictions } from './sandbox.js';

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Thrown by a runner when the process could not produce a result at all
 */
export class CommandFailure extends Error {
  readonly reason: 'notFound' | 'timeout' | 'spawnFailed' | 'blocked';

  constructor(reason: CommandFailure['reason'], message: string) {
    super(message);
    this.name = 'CommandFailure';
    this.reason = reason;
  }
}

/**
 * Injectable process runner. Non-zero exit codes are reported, not thrown.
 */
export type CommandRunner = (command: string, args: string[], options: CommandOptions) => Promise<CommandResult>;

const MAX_BUFFER = 64 * 1024 * 1024;

export const defaultCommandRunner: CommandRunner = (command, args, options) => {
  if (getSandboxRestrictions().noChildProcess) {
    return Promise.reject(
      new CommandFailure('blocked', `Cannot run ${command}: child processes are disabled in sandbox mode`)
    );
  }

  return new Promise((resolve, reject) => {
    const child = execFile(
      command,
      args,
      { cwd: options.cwd, env: options.env, timeout: options.timeoutMs, maxBuffer: MAX_BUFFER },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, exitCode: 0 });
          return;
        }

        const code: unknown = 'code' in error ? error.code : undefined;
        if (code === 'ENOENT') {
          reject(new CommandFailure('notFound', `${command}: command not found`));
          return;
        }
        if (error.killed && error.signal === 'SIGTERM') {
          reject(new CommandFailure('timeout', `${command} timed out after ${options.timeoutMs}ms`));
          return;
        }
        if (typeof code === 'number') {
          resolve({ stdout, stderr, exitCode: code });
          return;
        }
        reject(new CommandFailure('spawnFailed', error.message));
      }
    );

    child.on('error', (err) => reject(new CommandFailure('spawnFailed', err.message)));
  });
};
