/**
 * ABOUTME: GitHub token resolution.
 * Tries the credential helper, the environment and the configuration in
 * order; the first that yields a token wins. Never falls back to anonymous.
 */

import { spawn } from 'node:child_process';
import { AuthError } from '../../../../errors.js';
import type { GitHubTrackerConfig } from '../../../../config/types.js';

export type TokenSource = 'helper' | 'env' | 'config';

export interface ResolvedToken {
  token: string;
  source: TokenSource;
}

export interface HelperResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type HelperRunner = (argv: string[]) => Promise<HelperResult>;

const HELPER_TIMEOUT_MS = 10_000;

/**
 * Run a credential helper command and capture its output.
 */
export function runCredentialHelper(argv: string[]): Promise<HelperResult> {
  const [command, ...args] = argv;
  if (!command) {
    return Promise.resolve({ stdout: '', stderr: 'empty helper command', exitCode: 1 });
  }

  return new Promise((resolve) => {
    const proc = spawn(command, args, {
      env: { ...process.env },
      stdio: ['ignore', 'pipe', 'pipe'],
      timeout: HELPER_TIMEOUT_MS,
    });

    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('close', (code) => {
      resolve({ stdout, stderr, exitCode: code ?? 1 });
    });

    proc.on('error', (err) => {
      stderr += err.message;
      resolve({ stdout, stderr, exitCode: 1 });
    });
  });
}

export interface ResolveTokenOptions {
  env?: NodeJS.ProcessEnv;
  runHelper?: HelperRunner;
}

type GitHubAuthSettings = Pick<GitHubTrackerConfig, 'authMethod' | 'tokenEnv' | 'token' | 'credentialHelper'>;

/**
 * Resolve a token for the GitHub tracker.
 * @throws AuthError naming every method tried and how to fix each
 */
export async function resolveGitHubToken(
  settings: GitHubAuthSettings,
  options: ResolveTokenOptions = {}
): Promise<ResolvedToken> {
  const env = options.env ?? process.env;
  const runHelper = options.runHelper ?? runCredentialHelper;
  const attempts: string[] = [];

  if (settings.authMethod === 'external-helper') {
    const helper = settings.credentialHelper.join(' ');
    const result = await runHelper(settings.credentialHelper);
    const token = result.stdout.trim();
    if (result.exitCode === 0 && token) {
      return { token, source: 'helper' };
    }
    const reason = result.exitCode === 0 ? 'printed no token' : `exited ${result.exitCode}: ${result.stderr.trim() || 'no output'}`;
    attempts.push(`credential helper '${helper}' ${reason} (fix: install it and authenticate, e.g. 'gh auth login')`);
  }

  const envToken = env[settings.tokenEnv]?.trim();
  if (envToken) {
    return { token: envToken, source: 'env' };
  }
  attempts.push(`environment variable ${settings.tokenEnv} is not set (fix: export ${settings.tokenEnv}=<token>)`);

  const configToken = settings.token?.trim();
  if (configToken) {
    console.warn('[github-auth] Using the token from the configuration file; prefer the credential helper or an environment variable');
    return { token: configToken, source: 'config' };
  }
  attempts.push('tracker.github.token is not set (fix: set it, though an environment variable is preferred)');

  throw new AuthError(
    'No GitHub credentials found',
    attempts.map((attempt) => `  - ${attempt}`).join('\n')
  );
}
