/**
 * ABOUTME: Public API of the taskloop package.
 */

export * from './errors.js';
export {
  loadConfig,
  buildConfig,
  resolveModeOverrides,
  knownModeNames,
  STATE_DIR,
  CONFIG_FILE_CANDIDATES,
  DEFAULT_TASKS_PATH,
} from './config/index.js';
export type {
  TaskloopConfig,
  TrackerConfig,
  LoopConfig,
  ModeOverride,
  EffectiveConfig,
  GateCommand,
  RuntimeOptions,
  TrackerKind,
} from './config/index.js';
export { ExecutionEngine, computeExitCode, CommandAgentRunner, runGates, runGate, buildPrompt } from './engine/index.js';
export type {
  AgentRunner,
  AgentRunRequest,
  AgentRunResult,
  EngineConfig,
  EngineDependencies,
  EngineEvent,
  GateRunner,
  IterationResult,
  RunSummary,
  TerminalState,
} from './engine/index.js';
export { BaseTrackerPlugin, compareTasks, derivePriority } from './plugins/trackers/base.js';
export { createTracker, getTrackerFactory, listTrackerKinds } from './plugins/trackers/registry.js';
export { LocalTrackerPlugin } from './plugins/trackers/builtin/local/index.js';
export { GitHubIssuesTrackerPlugin } from './plugins/trackers/builtin/github-issues/index.js';
export { parseIssueBody } from './plugins/trackers/builtin/github-issues/body-parser.js';
export type {
  TrackerPlugin,
  TrackerPluginFactory,
  TrackerTask,
  SelectedTask,
  TaskCounts,
  SyncResult,
} from './plugins/trackers/types.js';
export { BridgeServer } from './bridge/index.js';
export { loadRunState } from './session/state.js';
export { readTrackerEvents } from './logs/index.js';
