/**
 * ABOUTME: Type definitions for tracker plugins.
 * Defines the task model and the capability contract every tracker backend
 * implements: claim the next task, check/force its open state and commit
 * its completion atomically.
 */

import type { TrackerConfig } from '../../config/types.js';

/**
 * Milestone attached to a task, if the backend has milestones.
 */
export interface TaskMilestone {
  number: number;
  title: string;
}

/**
 * A unit of trackable work.
 */
export interface TrackerTask {
  /** Tracker-assigned stable identifier */
  id: string;

  title: string;

  /** Free-text description (body before the acceptance criteria) */
  description: string;

  /** Ordered acceptance criteria */
  acceptance: string[];

  /** Free text after the acceptance criteria */
  notes: string;

  /** Labels, compared exactly */
  labels: string[];

  /** Rank derived from priority labels (higher is more urgent); never stored */
  priority: number;

  /** Whether the task is closed/done */
  closed: boolean;

  /** Draft tasks are skipped when draft exclusion is on */
  draft?: boolean;

  milestone?: TaskMilestone;

  /** IDs that must be closed before this task is eligible */
  dependsOn?: string[];

  /** Creation timestamp (ISO 8601) */
  createdAt?: string;

  /** Web URL, when the backend has one */
  url?: string;
}

/**
 * Immutable snapshot of a task handed to the engine for one iteration.
 */
export interface SelectedTask {
  readonly task: Readonly<TrackerTask>;

  /** When the task was selected (ISO 8601) */
  readonly selectedAt: string;
}

/**
 * Label-based eligibility filter.
 */
export interface TaskFilter {
  /** Every one of these labels must be present */
  requiredLabels: string[];

  /** None of these labels may be present */
  excludeLabels: string[];

  /** Skip drafts */
  excludeDrafts: boolean;
}

/**
 * Backlog counts used to tell "everything is done" from "everything left is blocked".
 */
export interface TaskCounts {
  /** Tasks the tracker knows about */
  total: number;

  /** Tasks that are not closed */
  open: number;

  /** Open tasks that pass the eligibility filter */
  eligible: number;
}

/**
 * Result of an explicit sync with the backing store.
 */
export interface SyncResult {
  success: boolean;
  message: string;
  /** Number of tasks known after the sync */
  taskCount?: number;
  /** True when the sync could not reach the backend and stale data is in use */
  stale?: boolean;
  error?: string;
}

/**
 * Static description of a tracker plugin.
 */
export interface TrackerPluginMeta {
  /** Registry key, matches tracker.kind */
  id: string;
  name: string;
  description: string;
  /** Whether the backend talks to a remote service */
  networked: boolean;
}

/**
 * Tracker backend contract.
 *
 * The four task operations are uniform across backends. `getTaskCounts`
 * lets the engine distinguish a finished backlog from a blocked one;
 * `markTaskStarted` is optional.
 */
export interface TrackerPlugin {
  readonly meta: TrackerPluginMeta;

  initialize(config: TrackerConfig, cwd: string): Promise<void>;

  /**
   * Highest-priority eligible task, or null. Read-only.
   */
  claimNextTask(): Promise<SelectedTask | null>;

  /**
   * Whether the task is closed.
   * @throws NotFoundError for an unknown id
   */
  isTaskDone(taskId: string): Promise<boolean>;

  /**
   * Reopen a closed task and strip the completion labels. No-op when open.
   * @throws NotFoundError for an unknown id
   */
  forceTaskOpen(taskId: string): Promise<void>;

  /**
   * Comment, label and close the task as one unit.
   * @throws PartialUpdateError after restoring the prior state
   */
  markTaskDone(taskId: string, comment: string): Promise<void>;

  /**
   * Apply the configured start labels. Optional.
   */
  markTaskStarted?(taskId: string): Promise<void>;

  getTaskCounts(): Promise<TaskCounts>;

  /**
   * Force a refresh from the backing store.
   */
  sync(): Promise<SyncResult>;

  /**
   * Conditions recorded instead of raised (e.g. stale cache in use).
   */
  getWarnings(): string[];

  dispose(): Promise<void>;
}

/**
 * Factory function for creating tracker plugin instances.
 */
export type TrackerPluginFactory = () => TrackerPlugin;
