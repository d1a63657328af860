/**
 * rulestudio Sandbox Mode
 * Restricted environments (coding agents, CI) limit what the CLI may do:
 * no remote config imports, no swiftlint or git processes, no prompts, no writes.
 */

export interface SandboxRestrictions {
  noNetwork: boolean;
  noInteractive: boolean;
  noChildProcess: boolean;
  readOnlyFs: boolean;
}

export interface SandboxConfig {
  enabled: boolean;
  detected: boolean;
  /** Which environment rule matched */
  reason: 'explicit' | 'agent' | 'ci' | 'no-tty' | 'none';
  restrictions: SandboxRestrictions;
}

const UNRESTRICTED: SandboxRestrictions = {
  noNetwork: false,
  noInteractive: false,
  noChildProcess: false,
  readOnlyFs: false,
};

// =============================================================================
// PROFILES
// =============================================================================

interface SandboxProfile {
  reason: SandboxConfig['reason'];
  matches: (env: NodeJS.ProcessEnv) => boolean;
  enabled: boolean;
  detected: boolean;
  restrictions: Partial<SandboxRestrictions>;
}

function hasTTY(): boolean {
  return Boolean(process.stdout.isTTY) || Boolean(process.stdin.isTTY);
}

/**
 * First match wins
 */
const PROFILES: SandboxProfile[] = [
  {
    reason: 'explicit',
    matches: (env) => env.RULESTUDIO_SANDBOX === '1',
    enabled: true,
    detected: false,
    restrictions: { noNetwork: true, noInteractive: true, noChildProcess: true },
  },
  {
    reason: 'agent',
    matches: (env) => env.CODEX === '1' || (Boolean(env.OPENAI_API_KEY) && !process.stdout.isTTY),
    enabled: true,
    detected: true,
    restrictions: { noNetwork: true, noInteractive: true, noChildProcess: true, readOnlyFs: true },
  },
  {
    // CI can lint and fetch but nobody answers prompts
    reason: 'ci',
    matches: (env) => env.CI === 'true',
    enabled: true,
    detected: true,
    restrictions: { noInteractive: true },
  },
  {
    reason: 'no-tty',
    matches: () => !hasTTY(),
    enabled: false,
    detected: false,
    restrictions: { noInteractive: true },
  },
];

/**
 * Detect the sandbox profile for the current process.
 * RULESTUDIO_READONLY=1 forces read-only on top of whatever matched.
 */
export function detectSandbox(env: NodeJS.ProcessEnv = process.env): SandboxConfig {
  const profile = PROFILES.find((p) => p.matches(env));
  const restrictions: SandboxRestrictions = { ...UNRESTRICTED, ...(profile?.restrictions ?? {}) };

  if (env.RULESTUDIO_READONLY === '1') {
    restrictions.readOnlyFs = true;
  }

  return {
    enabled: profile?.enabled ?? false,
    detected: profile?.detected ?? false,
    reason: profile?.reason ?? 'none',
    restrictions,
  };
}

export function isSandboxMode(): boolean {
  return detectSandbox().enabled;
}

export function getSandboxRestrictions(): SandboxRestrictions {
  return detectSandbox().restrictions;
}

/**
 * Whether CLI write commands must refuse to touch the filesystem
 */
export function isReadOnlyFilesystem(): boolean {
  return detectSandbox().restrictions.readOnlyFs;
}
