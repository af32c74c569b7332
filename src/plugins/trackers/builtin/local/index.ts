/**
 * ABOUTME: Local task file tracker plugin.
 * Tasks live in one JSON or YAML document (default .taskloop/tasks.json);
 * the extension picks the format. Every mutation rewrites the document
 * atomically, so completion is all-or-nothing.
 */

import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import { parse as parseYAML, stringify as stringifyYAML } from 'yaml';
import { z } from 'zod';
import { ConfigError, NotFoundError, PartialUpdateError, errorMessage } from '../../../../errors.js';
import { appendTrackerEvent } from '../../../../logs/index.js';
import { writeFileAtomic, writeJsonAtomic } from '../../../../utils/atomic-file.js';
import { BaseTrackerPlugin, derivePriority, matchesFilter, toSelectedTask } from '../../base.js';
import type {
  SelectedTask,
  SyncResult,
  TaskCounts,
  TrackerPluginFactory,
  TrackerPluginMeta,
  TrackerTask,
} from '../../types.js';

const TaskIdSchema = z.union([z.string().min(1), z.number().int()]).transform(String);

const LocalCommentSchema = z
  .object({
    body: z.string(),
    created_at: z.string(),
  })
  .strict();

const LocalTaskSchema = z
  .object({
    id: TaskIdSchema,
    title: z.string().min(1),
    description: z.string().optional(),
    acceptance: z.array(z.string()).optional(),
    notes: z.string().optional(),
    labels: z.array(z.string()).optional(),
    status: z.enum(['open', 'in_progress', 'done', 'blocked']).default('open'),
    draft: z.boolean().optional(),
    depends_on: z.array(TaskIdSchema).optional(),
    milestone: z.object({ number: z.number().int(), title: z.string() }).strict().optional(),
    comments: z.array(LocalCommentSchema).optional(),
    created_at: z.string().optional(),
    completed_at: z.string().optional(),
  })
  .strict();

const LocalTaskFileSchema = z
  .object({
    tasks: z.array(LocalTaskSchema),
  })
  .strict()
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.tasks.forEach((task, index) => {
      if (seen.has(task.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tasks', index, 'id'],
          message: `duplicate task id '${task.id}'`,
        });
      }
      seen.add(task.id);
    });
  });

export type LocalTask = z.infer<typeof LocalTaskSchema>;
export type LocalTaskFile = z.infer<typeof LocalTaskFileSchema>;
export type LocalTaskStatus = LocalTask['status'];

export type TaskFileFormat = 'json' | 'yaml';

export function taskFileFormat(path: string): TaskFileFormat {
  const ext = extname(path).toLowerCase();
  return ext === '.yaml' || ext === '.yml' ? 'yaml' : 'json';
}

function toTrackerTask(entry: LocalTask): TrackerTask {
  const labels = entry.labels ?? [];
  return {
    id: entry.id,
    title: entry.title,
    description: entry.description ?? '',
    acceptance: entry.acceptance ?? [],
    notes: entry.notes ?? '',
    labels,
    priority: derivePriority(labels),
    closed: entry.status === 'done',
    draft: entry.draft,
    milestone: entry.milestone,
    dependsOn: entry.depends_on,
    createdAt: entry.created_at,
  };
}

function withoutLabels(labels: string[], remove: string[]): string[] {
  const removed = new Set(remove);
  return labels.filter((label) => !removed.has(label));
}

function withLabels(labels: string[], add: string[]): string[] {
  const result = [...labels];
  for (const label of add) {
    if (!result.includes(label)) {
      result.push(label);
    }
  }
  return result;
}

export interface LocalTrackerOptions {
  now?: () => Date;
}

/**
 * Tracker backed by a task file in the project.
 */
export class LocalTrackerPlugin extends BaseTrackerPlugin {
  readonly meta: TrackerPluginMeta = {
    id: 'local',
    name: 'Local Task File',
    description: 'Track tasks in a JSON or YAML file inside the project',
    networked: false,
  };

  private readonly now: () => Date;
  private blockedIds = new Set<string>();

  constructor(options: LocalTrackerOptions = {}) {
    super();
    this.now = options.now ?? (() => new Date());
  }

  get filePath(): string {
    return resolve(this.cwd, this.trackerConfig.local.path);
  }

  private async readTaskFile(): Promise<LocalTaskFile> {
    const path = this.filePath;
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (err) {
      if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
        throw new ConfigError(`Task file not found: ${path}`, [], { cause: err });
      }
      throw new ConfigError(`Cannot read task file ${path}: ${errorMessage(err)}`, [], { cause: err });
    }

    const format = taskFileFormat(path);
    let document: unknown;
    try {
      document = format === 'yaml' ? parseYAML(content) : JSON.parse(content);
    } catch (err) {
      throw new ConfigError(`Invalid ${format.toUpperCase()} in task file ${path}: ${errorMessage(err)}`, [], {
        cause: err,
      });
    }

    const parsed = LocalTaskFileSchema.safeParse(document);
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid task file ${path}`,
        parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      );
    }
    return parsed.data;
  }

  private async loadTasks(): Promise<{ file: LocalTaskFile; tasks: TrackerTask[] }> {
    const file = await this.readTaskFile();
    this.blockedIds = new Set(file.tasks.filter((task) => task.status === 'blocked').map((task) => task.id));
    return { file, tasks: file.tasks.map(toTrackerTask) };
  }

  private findEntry(file: LocalTaskFile, taskId: string): LocalTask {
    const entry = file.tasks.find((task) => task.id === taskId);
    if (!entry) {
      throw new NotFoundError(taskId);
    }
    return entry;
  }

  private async replaceEntry(file: LocalTaskFile, updated: LocalTask): Promise<void> {
    const next: LocalTaskFile = {
      tasks: file.tasks.map((task) => (task.id === updated.id ? updated : task)),
    };
    const path = this.filePath;
    if (taskFileFormat(path) === 'yaml') {
      await writeFileAtomic(path, stringifyYAML(next));
    } else {
      await writeJsonAtomic(path, next);
    }
  }

  /**
   * Open, not blocked, passes the label filter and every dependency is closed.
   * An unknown dependency id counts as unmet.
   */
  protected isEligible(task: TrackerTask, all: TrackerTask[]): boolean {
    if (!matchesFilter(task, this.filter) || this.blockedIds.has(task.id)) {
      return false;
    }
    return (task.dependsOn ?? []).every((depId) => all.find((other) => other.id === depId)?.closed === true);
  }

  async claimNextTask(): Promise<SelectedTask | null> {
    const { tasks } = await this.loadTasks();
    const [next] = this.rankEligible(tasks);
    return next ? toSelectedTask(next, this.now()) : null;
  }

  async isTaskDone(taskId: string): Promise<boolean> {
    const file = await this.readTaskFile();
    return this.findEntry(file, taskId).status === 'done';
  }

  async forceTaskOpen(taskId: string): Promise<void> {
    const file = await this.readTaskFile();
    const entry = this.findEntry(file, taskId);
    const labels = entry.labels ?? [];
    const doneLabels = this.trackerConfig.addLabelsOnDone;
    const hasDoneLabels = labels.some((label) => doneLabels.includes(label));

    if (entry.status !== 'done' && !hasDoneLabels) {
      return;
    }

    await this.replaceEntry(file, {
      ...entry,
      completed_at: undefined,
      status: entry.status === 'done' ? 'open' : entry.status,
      labels: withoutLabels(labels, doneLabels),
    });
  }

  async markTaskStarted(taskId: string): Promise<void> {
    const file = await this.readTaskFile();
    const entry = this.findEntry(file, taskId);
    const labels = entry.labels ?? [];
    const nextLabels = withLabels(labels, this.trackerConfig.addLabelsOnStart);
    const nextStatus: LocalTaskStatus = entry.status === 'open' ? 'in_progress' : entry.status;

    if (nextStatus === entry.status && nextLabels.length === labels.length) {
      return;
    }
    await this.replaceEntry(file, { ...entry, status: nextStatus, labels: nextLabels });
  }

  async markTaskDone(taskId: string, comment: string): Promise<void> {
    const config = this.trackerConfig;
    const file = await this.readTaskFile();
    const entry = this.findEntry(file, taskId);
    const timestamp = this.now().toISOString();

    let labels = withLabels(entry.labels ?? [], config.addLabelsOnDone);
    if (config.removeStartLabelsOnDone) {
      labels = withoutLabels(labels, config.addLabelsOnStart);
    }

    const updated: LocalTask = {
      ...entry,
      labels,
      status: config.closeOnDone ? 'done' : entry.status,
      completed_at: config.closeOnDone ? timestamp : entry.completed_at,
      comments:
        config.commentOnDone && comment.trim()
          ? [...(entry.comments ?? []), { body: comment, created_at: timestamp }]
          : entry.comments,
    };

    try {
      await this.replaceEntry(file, updated);
    } catch (err) {
      // The rename never happened, so the file still holds the prior state.
      throw new PartialUpdateError(taskId, 'write', true, [], { cause: err });
    }

    await appendTrackerEvent(this.cwd, {
      type: 'tracker:task-done',
      timestamp,
      tracker: this.meta.id,
      taskId,
    });
  }

  async getTaskCounts(): Promise<TaskCounts> {
    const { tasks } = await this.loadTasks();
    return this.countTasks(tasks);
  }

  async sync(): Promise<SyncResult> {
    const started = Date.now();
    await appendTrackerEvent(this.cwd, {
      type: 'tracker:sync-start',
      timestamp: new Date().toISOString(),
      tracker: this.meta.id,
    });

    let result: SyncResult;
    try {
      const { tasks } = await this.loadTasks();
      result = {
        success: true,
        message: `Loaded ${tasks.length} task(s) from ${this.filePath}`,
        taskCount: tasks.length,
      };
    } catch (err) {
      result = { success: false, message: 'Failed to read task file', error: errorMessage(err) };
    }

    await appendTrackerEvent(this.cwd, {
      type: 'tracker:sync-complete',
      timestamp: new Date().toISOString(),
      tracker: this.meta.id,
      success: result.success,
      durationMs: Date.now() - started,
      taskCount: result.taskCount,
      message: result.message,
      error: result.error,
    });
    return result;
  }
}

/**
 * Factory function for the local tracker plugin.
 */
const createLocalTracker: TrackerPluginFactory = () => new LocalTrackerPlugin();

export default createLocalTracker;
