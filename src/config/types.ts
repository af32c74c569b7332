/**
 * ABOUTME: Type definitions for taskloop configuration.
 * Defines the loop settings, mode overrides, tracker and agent options
 * as seen by the rest of the code (camelCase, defaults applied).
 */

import type { RetryPolicy } from '../utils/backoff.js';

/**
 * Mode names that always exist. Their override blocks are empty unless the
 * configuration fills them in; `default` never has overrides.
 */
export const BUILTIN_MODE_NAMES = ['speed', 'quality', 'exploration'] as const;

export const DEFAULT_MODE_NAME = 'default';

/**
 * A quality gate: a shell command that must exit 0.
 */
export interface GateCommand {
  /** Display name (defaults to the command itself) */
  name: string;

  /** Shell command line */
  command: string;

  /** Kill the gate after this many seconds (0 = no limit) */
  timeoutSeconds: number;
}

/**
 * Base loop settings.
 */
export interface LoopConfig {
  /** Maximum iterations per run (0 = unlimited) */
  maxIterations: number;

  /** Consecutive iterations without a commit before the run aborts (0 = disabled) */
  noProgressLimit: number;

  /** Gates, run in order after every agent invocation */
  gates: GateCommand[];

  /** Agent invocation timeout in seconds (0 = no limit) */
  runnerTimeoutSeconds: number;

  /** Delay between iterations in milliseconds */
  iterationDelayMs: number;

  /** Stop running gates after the first failure */
  gateFailFast: boolean;

  /** Selected mode name */
  mode: string;
}

/**
 * Sparse per-mode overrides. Absent fields inherit the base value.
 */
export type ModeOverride = Partial<Omit<LoopConfig, 'mode'>>;

/**
 * The loop settings for one run, after the mode has been applied.
 */
export type EffectiveConfig = Readonly<Omit<LoopConfig, 'gates'>> & {
  readonly gates: readonly Readonly<GateCommand>[];
};

/**
 * Default loop settings
 */
export const DEFAULT_LOOP_CONFIG: LoopConfig = {
  maxIterations: 10,
  noProgressLimit: 3,
  gates: [],
  runnerTimeoutSeconds: 900,
  iterationDelayMs: 0,
  gateFailFast: true,
  mode: DEFAULT_MODE_NAME,
};

/**
 * Tracker backend selector.
 */
export type TrackerKind = 'local' | 'github-issues';

/**
 * How the GitHub tracker obtains a token.
 * - 'external-helper': credential helper first, then env var, then config
 * - 'token': env var, then config
 */
export type GitHubAuthMethod = 'external-helper' | 'token';

/**
 * Options shared by every tracker backend.
 */
export interface TrackerSelectionOptions {
  /** Every one of these labels must be present */
  labelFilter: string[];

  /** None of these labels may be present */
  excludeLabels: string[];

  /** Skip draft tasks */
  excludeDrafts: boolean;

  /** Close the task when it is marked done */
  closeOnDone: boolean;

  /** Post the iteration summary when the task is marked done */
  commentOnDone: boolean;

  /** Labels added when the agent starts on a task */
  addLabelsOnStart: string[];

  /** Labels added when the task is marked done */
  addLabelsOnDone: string[];

  /** Remove the start labels when the task is marked done */
  removeStartLabelsOnDone: boolean;
}

export interface LocalTrackerConfig {
  /** Task file, relative to the working directory */
  path: string;
}

export interface GitHubTrackerConfig {
  /** Repository in owner/name form */
  repo: string;

  authMethod: GitHubAuthMethod;

  /** Environment variable holding a token */
  tokenEnv: string;

  /** Token embedded in the configuration (discouraged) */
  token?: string;

  /** Command that prints a token on stdout */
  credentialHelper: string[];

  /** Maximum cache age before a refresh is attempted */
  cacheTtlSeconds: number;

  /** REST API base URL */
  apiUrl: string;

  /** Per-request timeout */
  requestTimeoutMs: number;

  /** Remaining-quota threshold below which calls are spaced out */
  lowWaterMark: number;

  /** Longest wait for a rate-limit reset before falling back to cache */
  patienceMs: number;

  /** Maximum pages fetched per refresh (100 issues per page) */
  maxPages: number;

  /** Retry schedule for transient failures */
  retry: RetryPolicy;
}

export interface TrackerConfig extends TrackerSelectionOptions {
  kind: TrackerKind;
  local: LocalTrackerConfig;
  github?: GitHubTrackerConfig;
}

export interface AgentConfig {
  /** Agent command line; the prompt is written to its stdin */
  command: string[];
}

/**
 * Fully loaded configuration.
 */
export interface TaskloopConfig {
  /** Project root */
  cwd: string;

  /** Path of the file the configuration was read from, if any */
  sourcePath?: string;

  tracker: TrackerConfig;

  agent: AgentConfig;

  /** Base loop settings before the mode is applied */
  loop: LoopConfig;

  /** Every known mode, built-in ones included */
  modes: Record<string, ModeOverride>;

  /** Loop settings after applying `loop.mode` */
  effective: EffectiveConfig;
}

/**
 * Runtime options that can be passed via CLI flags
 */
export interface RuntimeOptions {
  /** Working directory */
  cwd?: string;

  /** Override loop.mode */
  mode?: string;

  /** Override the effective maximum iterations */
  maxIterations?: number;

  /** Override tracker.kind */
  tracker?: TrackerKind;
}
