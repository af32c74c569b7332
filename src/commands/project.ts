/**
 * ABOUTME: Shared setup for CLI commands: option parsing, config loading,
 * tracker creation and error reporting.
 */

import { loadConfig, type RuntimeOptions, type TaskloopConfig, type TrackerKind } from '../config/index.js';
import { ConfigError, errorMessage, isFatalError } from '../errors.js';
import { createTracker, listTrackerKinds } from '../plugins/trackers/registry.js';
import type { TrackerPlugin } from '../plugins/trackers/types.js';

/**
 * Options every command accepts.
 */
export interface ProjectOptions {
  cwd?: string;
  mode?: string;
  tracker?: string;
  maxIterations?: string;
}

function toTrackerKind(value: string): TrackerKind {
  const kind = listTrackerKinds().find((candidate) => candidate === value);
  if (!kind) {
    throw new ConfigError(`Unknown tracker '${value}'. Known trackers: ${listTrackerKinds().join(', ')}`);
  }
  return kind;
}

/**
 * Convert raw CLI option strings into loader options.
 */
export function toRuntimeOptions(options: ProjectOptions): RuntimeOptions {
  const runtime: RuntimeOptions = { cwd: options.cwd, mode: options.mode };
  if (options.tracker !== undefined) {
    runtime.tracker = toTrackerKind(options.tracker);
  }
  if (options.maxIterations !== undefined) {
    const value = Number(options.maxIterations);
    if (!Number.isInteger(value) || value < 0) {
      throw new ConfigError(`--max-iterations must be a non-negative integer, got '${options.maxIterations}'`);
    }
    runtime.maxIterations = value;
  }
  return runtime;
}

export interface Project {
  config: TaskloopConfig;
  tracker: TrackerPlugin;
}

/**
 * Load the configuration and initialize the selected tracker.
 */
export async function openProject(options: ProjectOptions): Promise<Project> {
  const config = await loadConfig(toRuntimeOptions(options));
  const tracker = await createTracker(config.tracker, config.cwd);
  return { config, tracker };
}

/**
 * Print an error and return the exit code for it (2 for fatal errors).
 */
export function reportError(err: unknown): number {
  console.error(`Error: ${errorMessage(err)}`);
  return isFatalError(err) ? 2 : 1;
}
