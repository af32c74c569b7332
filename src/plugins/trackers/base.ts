/**
 * ABOUTME: Base class and shared selection rules for tracker plugins.
 * Eligibility filtering, priority derivation and the deterministic ordering
 * live here so every backend selects tasks the same way.
 */

import type { TrackerConfig } from '../../config/types.js';
import type {
  SelectedTask,
  TaskCounts,
  TaskFilter,
  TrackerPlugin,
  TrackerPluginMeta,
  TrackerTask,
  SyncResult,
} from './types.js';

/**
 * Priority label ranks. Higher is more urgent.
 */
const PRIORITY_LABEL_RANKS: Record<string, number> = {
  'priority:critical': 4,
  p0: 4,
  'priority:high': 3,
  p1: 3,
  'priority:medium': 2,
  p2: 2,
  'priority:low': 1,
  p3: 1,
};

/**
 * Rank from priority labels; with several, the highest wins. 0 when none.
 */
export function derivePriority(labels: readonly string[]): number {
  let rank = 0;
  for (const label of labels) {
    const value = PRIORITY_LABEL_RANKS[label.trim().toLowerCase()];
    if (value !== undefined && value > rank) {
      rank = value;
    }
  }
  return rank;
}

function compareIds(a: string, b: string): number {
  const aNumeric = /^\d+$/.test(a);
  const bNumeric = /^\d+$/.test(b);
  if (aNumeric && bNumeric) {
    return Number(a) - Number(b);
  }
  if (aNumeric !== bNumeric) {
    return aNumeric ? -1 : 1;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Selection order: priority label rank descending, then milestone (tasks
 * with a milestone first, lower milestone number first), then ascending
 * numeric id. Label rank always takes precedence over milestone.
 */
export function compareTasks(a: TrackerTask, b: TrackerTask): number {
  if (a.priority !== b.priority) {
    return b.priority - a.priority;
  }

  const aMilestone = a.milestone?.number;
  const bMilestone = b.milestone?.number;
  if (aMilestone !== bMilestone) {
    if (aMilestone === undefined) return 1;
    if (bMilestone === undefined) return -1;
    return aMilestone - bMilestone;
  }

  return compareIds(a.id, b.id);
}

/**
 * Whether a task passes the label/draft filter and is open.
 * Dependency checks are left to the caller, which knows the backlog.
 */
export function matchesFilter(task: TrackerTask, filter: TaskFilter): boolean {
  if (task.closed) {
    return false;
  }
  if (filter.excludeDrafts && task.draft) {
    return false;
  }
  const labels = new Set(task.labels);
  if (!filter.requiredLabels.every((label) => labels.has(label))) {
    return false;
  }
  return !filter.excludeLabels.some((label) => labels.has(label));
}

/**
 * Freeze a task into a selection snapshot.
 */
export function toSelectedTask(task: TrackerTask, now: Date = new Date()): SelectedTask {
  const snapshot: Readonly<TrackerTask> = Object.freeze({
    ...task,
    acceptance: [...task.acceptance],
    labels: [...task.labels],
    dependsOn: task.dependsOn ? [...task.dependsOn] : undefined,
    milestone: task.milestone ? { ...task.milestone } : undefined,
  });
  return Object.freeze({ task: snapshot, selectedAt: now.toISOString() });
}

/**
 * Abstract base class for tracker plugins.
 */
export abstract class BaseTrackerPlugin implements TrackerPlugin {
  abstract readonly meta: TrackerPluginMeta;

  protected config: TrackerConfig | null = null;
  protected cwd: string = process.cwd();
  protected warnings: string[] = [];

  async initialize(config: TrackerConfig, cwd: string): Promise<void> {
    this.config = config;
    this.cwd = cwd;
  }

  protected get trackerConfig(): TrackerConfig {
    if (!this.config) {
      throw new Error(`Tracker '${this.meta.id}' used before initialize()`);
    }
    return this.config;
  }

  protected get filter(): TaskFilter {
    const config = this.trackerConfig;
    return {
      requiredLabels: config.labelFilter,
      excludeLabels: config.excludeLabels,
      excludeDrafts: config.excludeDrafts,
    };
  }

  /**
   * Eligible tasks in selection order. Subclasses with dependencies extend
   * `isEligible`.
   */
  protected rankEligible(tasks: TrackerTask[]): TrackerTask[] {
    return tasks.filter((task) => this.isEligible(task, tasks)).sort(compareTasks);
  }

  protected isEligible(task: TrackerTask, _all: TrackerTask[]): boolean {
    return matchesFilter(task, this.filter);
  }

  protected countTasks(tasks: TrackerTask[]): TaskCounts {
    return {
      total: tasks.length,
      open: tasks.filter((task) => !task.closed).length,
      eligible: tasks.filter((task) => this.isEligible(task, tasks)).length,
    };
  }

  protected recordWarning(message: string): void {
    this.warnings.push(message);
    console.warn(`[tracker:${this.meta.id}] ${message}`);
  }

  getWarnings(): string[] {
    return [...this.warnings];
  }

  abstract claimNextTask(): Promise<SelectedTask | null>;
  abstract isTaskDone(taskId: string): Promise<boolean>;
  abstract forceTaskOpen(taskId: string): Promise<void>;
  abstract markTaskDone(taskId: string, comment: string): Promise<void>;
  abstract getTaskCounts(): Promise<TaskCounts>;
  abstract sync(): Promise<SyncResult>;

  async dispose(): Promise<void> {
    this.config = null;
  }
}
