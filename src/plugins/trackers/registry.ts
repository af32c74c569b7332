/**
 * ABOUTME: Registry of built-in tracker plugins, keyed by tracker.kind.
 */

import type { TrackerConfig, TrackerKind } from '../../config/types.js';
import createGitHubIssuesTracker from './builtin/github-issues/index.js';
import createLocalTracker from './builtin/local/index.js';
import type { TrackerPlugin, TrackerPluginFactory } from './types.js';

const BUILTIN_TRACKERS: Record<TrackerKind, TrackerPluginFactory> = {
  local: createLocalTracker,
  'github-issues': createGitHubIssuesTracker,
};

export function getTrackerFactory(kind: TrackerKind): TrackerPluginFactory {
  return BUILTIN_TRACKERS[kind];
}

export function listTrackerKinds(): TrackerKind[] {
  return ['local', 'github-issues'];
}

/**
 * Create and initialize the tracker selected by the configuration.
 */
export async function createTracker(config: TrackerConfig, cwd: string): Promise<TrackerPlugin> {
  const tracker = getTrackerFactory(config.kind)();
  await tracker.initialize(config, cwd);
  return tracker;
}
