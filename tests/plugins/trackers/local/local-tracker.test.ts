/**
 * ABOUTME: Tests for the local task file tracker (JSON and YAML).
 */

import { mkdtemp, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { parse as parseYAML } from 'yaml';
import { buildConfig } from '../../../../src/config/index.js';
import { ConfigError, NotFoundError } from '../../../../src/errors.js';
import { LocalTrackerPlugin, taskFileFormat } from '../../../../src/plugins/trackers/builtin/local/index.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

const SAMPLE_TASKS = [
  { id: 1, title: 'Wire the API', depends_on: [2] },
  { id: 2, title: 'Add the schema', labels: ['p2'], acceptance: ['Schema validates'] },
  { id: 3, title: 'Blocked work', labels: ['p0'], status: 'blocked' },
  { id: 4, title: 'Already shipped', status: 'done' },
];

describe('LocalTrackerPlugin', () => {
  let dir: string;
  let tracker: LocalTrackerPlugin;

  async function writeTasks(tasks: unknown[]): Promise<void> {
    await mkdir(join(dir, '.taskloop'), { recursive: true });
    await writeFile(join(dir, '.taskloop', 'tasks.json'), JSON.stringify({ tasks }, null, 2));
  }

  async function readTasks(): Promise<Array<Record<string, unknown>>> {
    const content = await readFile(join(dir, '.taskloop', 'tasks.json'), 'utf-8');
    const parsed: { tasks: Array<Record<string, unknown>> } = JSON.parse(content);
    return parsed.tasks;
  }

  async function createTracker(document: unknown = {}): Promise<LocalTrackerPlugin> {
    const config = buildConfig(document, dir);
    const plugin = new LocalTrackerPlugin({ now: () => NOW });
    await plugin.initialize(config.tracker, dir);
    return plugin;
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'taskloop-local-'));
    tracker = await createTracker({
      tracker: { add_labels_on_start: ['in-progress'], add_labels_on_done: ['agent-done'] },
    });
  });

  afterEach(async () => {
    await tracker.dispose();
    await rm(dir, { recursive: true, force: true, maxRetries: 3 });
  });

  test('claims the highest ranked eligible task', async () => {
    await writeTasks(SAMPLE_TASKS);
    const selected = await tracker.claimNextTask();

    expect(selected?.task.id).toBe('2');
    expect(selected?.task.priority).toBe(2);
    expect(selected?.task.acceptance).toEqual(['Schema validates']);
    expect(selected?.selectedAt).toBe(NOW.toISOString());
  });

  test('claiming does not modify the file', async () => {
    await writeTasks(SAMPLE_TASKS);
    const before = await readFile(join(dir, '.taskloop', 'tasks.json'), 'utf-8');
    await tracker.claimNextTask();
    expect(await readFile(join(dir, '.taskloop', 'tasks.json'), 'utf-8')).toBe(before);
  });

  test('counts blocked and dependent tasks as open but not eligible', async () => {
    await writeTasks(SAMPLE_TASKS);
    expect(await tracker.getTaskCounts()).toEqual({ total: 4, open: 3, eligible: 1 });
  });

  test('an unknown dependency is unmet', async () => {
    await writeTasks([{ id: 'a', title: 'Depends on a ghost', depends_on: ['ghost'] }]);
    expect(await tracker.claimNextTask()).toBeNull();
    expect(await tracker.getTaskCounts()).toEqual({ total: 1, open: 1, eligible: 0 });
  });

  test('markTaskDone closes, labels and comments in one write', async () => {
    await writeTasks(SAMPLE_TASKS);
    await tracker.markTaskStarted('2');
    await tracker.markTaskDone('2', 'All gates passed');

    const entry = (await readTasks()).find((task) => task.id === '2');
    expect(entry).toMatchObject({
      status: 'done',
      labels: ['p2', 'agent-done'],
      completed_at: NOW.toISOString(),
      comments: [{ body: 'All gates passed', created_at: NOW.toISOString() }],
    });
    expect(await tracker.isTaskDone('2')).toBe(true);

    // The dependency is now met.
    expect((await tracker.claimNextTask())?.task.id).toBe('1');
  });

  test('markTaskDone skips a blank comment', async () => {
    await writeTasks(SAMPLE_TASKS);
    await tracker.markTaskDone('2', '   ');
    const entry = (await readTasks()).find((task) => task.id === '2');
    expect(entry?.comments).toBeUndefined();
  });

  test('markTaskStarted moves open tasks to in_progress with start labels', async () => {
    await writeTasks(SAMPLE_TASKS);
    await tracker.markTaskStarted('2');

    const entry = (await readTasks()).find((task) => task.id === '2');
    expect(entry?.status).toBe('in_progress');
    expect(entry?.labels).toEqual(['p2', 'in-progress']);
    expect(await tracker.isTaskDone('2')).toBe(false);
  });

  test('forceTaskOpen reopens and strips done labels', async () => {
    await writeTasks([
      { id: 7, title: 'Closed early', status: 'done', labels: ['agent-done', 'p1'], completed_at: '2026-01-01T00:00:00Z' },
    ]);
    await tracker.forceTaskOpen('7');

    const [entry] = await readTasks();
    expect(entry?.status).toBe('open');
    expect(entry?.labels).toEqual(['p1']);
    expect(entry?.completed_at).toBeUndefined();
  });

  test('forceTaskOpen on an open task leaves the file untouched', async () => {
    await writeTasks(SAMPLE_TASKS);
    const before = await readFile(join(dir, '.taskloop', 'tasks.json'), 'utf-8');
    await tracker.forceTaskOpen('2');
    expect(await readFile(join(dir, '.taskloop', 'tasks.json'), 'utf-8')).toBe(before);
  });

  test('unknown ids raise NotFoundError', async () => {
    await writeTasks(SAMPLE_TASKS);
    await expect(tracker.isTaskDone('99')).rejects.toBeInstanceOf(NotFoundError);
    await expect(tracker.forceTaskOpen('99')).rejects.toBeInstanceOf(NotFoundError);
    await expect(tracker.markTaskDone('99', 'x')).rejects.toBeInstanceOf(NotFoundError);
  });

  test('a missing task file is a ConfigError', async () => {
    await expect(tracker.claimNextTask()).rejects.toBeInstanceOf(ConfigError);
  });

  test('duplicate ids are rejected', async () => {
    await writeTasks([
      { id: 1, title: 'One' },
      { id: '1', title: 'Also one' },
    ]);
    await expect(tracker.claimNextTask()).rejects.toThrow("duplicate task id '1'");
  });

  test('honours the label filter and draft exclusion', async () => {
    await tracker.dispose();
    tracker = await createTracker({ tracker: { label_filter: ['agent'] } });
    await writeTasks([
      { id: 1, title: 'Draft', labels: ['agent'], draft: true },
      { id: 2, title: 'Unlabelled' },
      { id: 3, title: 'Ready', labels: ['agent'] },
    ]);
    expect((await tracker.claimNextTask())?.task.id).toBe('3');
  });

  test('sync reports the task count', async () => {
    await writeTasks(SAMPLE_TASKS);
    const result = await tracker.sync();
    expect(result.success).toBe(true);
    expect(result.taskCount).toBe(4);
  });

  test('sync reports a broken file without throwing', async () => {
    await mkdir(join(dir, '.taskloop'), { recursive: true });
    await writeFile(join(dir, '.taskloop', 'tasks.json'), '{ not json');
    const result = await tracker.sync();
    expect(result.success).toBe(false);
    expect(result.error).toContain('Invalid JSON in task file');
  });

  describe('YAML task files', () => {
    const YAML_TASKS = ['tasks:', '  - id: 1', '    title: Write docs', '    labels: [p1]', '  - id: 2', '    title: Later', ''].join('\n');

    test('the extension picks the format', () => {
      expect(taskFileFormat('tasks.yaml')).toBe('yaml');
      expect(taskFileFormat('plan/TASKS.YML')).toBe('yaml');
      expect(taskFileFormat('.taskloop/tasks.json')).toBe('json');
    });

    test('reads and rewrites a YAML file in place', async () => {
      await tracker.dispose();
      tracker = await createTracker({ tracker: { add_labels_on_done: ['agent-done'], local: { path: 'tasks.yaml' } } });
      await writeFile(join(dir, 'tasks.yaml'), YAML_TASKS);

      expect((await tracker.claimNextTask())?.task).toMatchObject({ id: '1', title: 'Write docs', priority: 3 });
      await tracker.markTaskDone('1', 'Docs written');

      const written: { tasks: Array<Record<string, unknown>> } = parseYAML(await readFile(join(dir, 'tasks.yaml'), 'utf-8'));
      expect(written.tasks[0]).toMatchObject({
        id: '1',
        status: 'done',
        labels: ['p1', 'agent-done'],
        comments: [{ body: 'Docs written', created_at: NOW.toISOString() }],
      });
      expect((await tracker.claimNextTask())?.task.id).toBe('2');
    });

    test('invalid YAML is a ConfigError', async () => {
      await tracker.dispose();
      tracker = await createTracker({ tracker: { local: { path: 'tasks.yml' } } });
      await writeFile(join(dir, 'tasks.yml'), 'tasks: [unclosed');
      await expect(tracker.claimNextTask()).rejects.toBeInstanceOf(ConfigError);
    });
  });
});
