/**
 * ABOUTME: Configuration loading for taskloop.
 * Reads the YAML document from the project, validates it against the strict
 * schema, applies defaults and resolves the loop mode. Any problem surfaces
 * as a ConfigError before the first iteration runs.
 */

import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { parse as parseYAML } from 'yaml';
import type { ZodIssue } from 'zod';
import { ConfigError, errorMessage } from '../errors.js';
import { DEFAULT_RETRY_POLICY } from '../utils/backoff.js';
import { resolveModeOverrides } from './modes.js';
import {
  ConfigFileSchema,
  type ConfigFile,
  type ConfigFileGate,
  type ConfigFileModeOverride,
} from './schema.js';
import {
  BUILTIN_MODE_NAMES,
  DEFAULT_LOOP_CONFIG,
  DEFAULT_MODE_NAME,
  type GateCommand,
  type GitHubTrackerConfig,
  type LoopConfig,
  type ModeOverride,
  type RuntimeOptions,
  type TaskloopConfig,
  type TrackerConfig,
} from './types.js';

export * from './types.js';
export { resolveModeOverrides, knownModeNames } from './modes.js';

/**
 * Directory for taskloop state, relative to the project root.
 */
export const STATE_DIR = '.taskloop';

/**
 * Candidate config files, in lookup order.
 */
export const CONFIG_FILE_CANDIDATES = [
  join(STATE_DIR, 'config.yaml'),
  join(STATE_DIR, 'config.yml'),
  'taskloop.yaml',
  'taskloop.yml',
];

export const DEFAULT_TASKS_PATH = join(STATE_DIR, 'tasks.json');

/**
 * Default agent command; the prompt is piped to stdin.
 */
export const DEFAULT_AGENT_COMMAND = ['claude', '-p', '--output-format', 'text'];

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

function toGate(gate: ConfigFileGate): GateCommand {
  if (typeof gate === 'string') {
    return { name: gate, command: gate, timeoutSeconds: 0 };
  }
  return {
    name: gate.name ?? gate.command,
    command: gate.command,
    timeoutSeconds: gate.timeout_seconds ?? 0,
  };
}

function toModeOverride(raw: ConfigFileModeOverride): ModeOverride {
  const override: ModeOverride = {};
  if (raw.max_iterations !== undefined) override.maxIterations = raw.max_iterations;
  if (raw.no_progress_limit !== undefined) override.noProgressLimit = raw.no_progress_limit;
  if (raw.gates !== undefined) override.gates = raw.gates.map(toGate);
  if (raw.runner_timeout_seconds !== undefined) override.runnerTimeoutSeconds = raw.runner_timeout_seconds;
  if (raw.sleep_seconds_between_iters !== undefined) {
    override.iterationDelayMs = Math.round(raw.sleep_seconds_between_iters * 1000);
  }
  if (raw.gate_fail_fast !== undefined) override.gateFailFast = raw.gate_fail_fast;
  return override;
}

function buildLoop(file: ConfigFile): { loop: LoopConfig; modes: Record<string, ModeOverride> } {
  const raw = file.loop ?? {};
  const loop: LoopConfig = {
    ...DEFAULT_LOOP_CONFIG,
    ...toModeOverride(raw),
    mode: raw.mode?.trim() || DEFAULT_MODE_NAME,
  };

  const modes: Record<string, ModeOverride> = {};
  for (const name of BUILTIN_MODE_NAMES) {
    modes[name] = {};
  }
  for (const [name, override] of Object.entries(raw.modes ?? {})) {
    if (name === DEFAULT_MODE_NAME) {
      throw new ConfigError(`loop.modes.${DEFAULT_MODE_NAME} is reserved; put base settings under loop`);
    }
    modes[name] = toModeOverride(override);
  }

  return { loop, modes };
}

function buildGitHub(file: ConfigFile): GitHubTrackerConfig | undefined {
  const raw = file.tracker?.github;
  if (!raw) {
    return undefined;
  }
  return {
    repo: raw.repo,
    authMethod: raw.auth_method ?? 'external-helper',
    tokenEnv: raw.token_env ?? 'GITHUB_TOKEN',
    token: raw.token,
    credentialHelper: raw.credential_helper ?? ['gh', 'auth', 'token'],
    cacheTtlSeconds: raw.cache_ttl_seconds ?? 300,
    apiUrl: (raw.api_url ?? 'https://api.github.com').replace(/\/+$/, ''),
    requestTimeoutMs: raw.request_timeout_ms ?? 30_000,
    lowWaterMark: raw.low_water_mark ?? 100,
    patienceMs: Math.round((raw.patience_seconds ?? 60) * 1000),
    maxPages: raw.max_pages ?? 10,
    retry: {
      maxAttempts: raw.retry?.max_attempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
      baseDelayMs: raw.retry?.base_delay_ms ?? DEFAULT_RETRY_POLICY.baseDelayMs,
      maxDelayMs: raw.retry?.max_delay_ms ?? DEFAULT_RETRY_POLICY.maxDelayMs,
      jitter: raw.retry?.jitter ?? DEFAULT_RETRY_POLICY.jitter,
    },
  };
}

function buildTracker(file: ConfigFile): TrackerConfig {
  const raw = file.tracker ?? {};
  const tracker: TrackerConfig = {
    kind: raw.kind ?? (raw.github ? 'github-issues' : 'local'),
    labelFilter: raw.label_filter ?? [],
    excludeLabels: raw.exclude_labels ?? [],
    excludeDrafts: raw.exclude_drafts ?? true,
    closeOnDone: raw.close_on_done ?? true,
    commentOnDone: raw.comment_on_done ?? true,
    addLabelsOnStart: raw.add_labels_on_start ?? [],
    addLabelsOnDone: raw.add_labels_on_done ?? [],
    removeStartLabelsOnDone: raw.remove_start_labels_on_done ?? true,
    local: { path: raw.local?.path ?? DEFAULT_TASKS_PATH },
    github: buildGitHub(file),
  };

  return tracker;
}

/**
 * Validate a parsed document and build the configuration.
 * Exposed separately from loadConfig so callers holding an in-memory
 * document need not touch the filesystem.
 */
export function buildConfig(
  document: unknown,
  cwd: string,
  options: RuntimeOptions = {},
  sourcePath?: string
): TaskloopConfig {
  const parsed = ConfigFileSchema.safeParse(document ?? {});
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid configuration${sourcePath ? ` in ${sourcePath}` : ''}`,
      parsed.error.issues.map(formatIssue)
    );
  }

  const file = parsed.data;
  const { loop, modes } = buildLoop(file);
  const tracker = buildTracker(file);
  if (options.tracker) {
    tracker.kind = options.tracker;
  }
  if (tracker.kind === 'github-issues' && !tracker.github) {
    throw new ConfigError("tracker 'github-issues' selected but tracker.github.repo is not set");
  }

  const modeName = options.mode ?? loop.mode;
  const effective = resolveModeOverrides(modeName, loop, modes);
  const finalEffective =
    options.maxIterations !== undefined
      ? Object.freeze({ ...effective, maxIterations: options.maxIterations })
      : effective;

  return {
    cwd,
    sourcePath,
    tracker,
    agent: { command: file.agent?.command ?? DEFAULT_AGENT_COMMAND },
    loop,
    modes,
    effective: finalEffective,
  };
}

async function readFirstExisting(cwd: string): Promise<{ path: string; content: string } | null> {
  for (const candidate of CONFIG_FILE_CANDIDATES) {
    const path = join(cwd, candidate);
    try {
      const content = await readFile(path, 'utf-8');
      return { path, content };
    } catch (err) {
      if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
        continue;
      }
      throw new ConfigError(`Cannot read ${path}: ${errorMessage(err)}`, [], { cause: err });
    }
  }
  return null;
}

/**
 * Load configuration for a project. A missing file yields the defaults.
 */
export async function loadConfig(options: RuntimeOptions = {}): Promise<TaskloopConfig> {
  const cwd = resolve(options.cwd ?? process.cwd());
  const found = await readFirstExisting(cwd);
  if (!found) {
    return buildConfig({}, cwd, options);
  }

  let document: unknown;
  try {
    document = parseYAML(found.content);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${found.path}: ${errorMessage(err)}`, [], { cause: err });
  }

  return buildConfig(document, cwd, options, found.path);
}
