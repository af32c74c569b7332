/**
 * ABOUTME: Tests for CLI command helpers and end-to-end command runs on a local task file.
 */

import { mkdtemp, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { reportError, toRuntimeOptions } from '../../src/commands/project.js';
import { executeRunCommand, formatIterationLine } from '../../src/commands/run.js';
import { executeStatusCommand } from '../../src/commands/status.js';
import { executeSyncCommand } from '../../src/commands/sync.js';
import type { IterationResult } from '../../src/engine/types.js';
import { AuthError, ConfigError, NetworkError } from '../../src/errors.js';

function result(overrides: Partial<IterationResult> = {}): IterationResult {
  return {
    iteration: 2,
    taskId: '14',
    taskTitle: 'Fix login',
    outcome: 'done',
    gateResults: [],
    commentText: null,
    interrupted: false,
    startedAt: '2026-01-01T00:00:00.000Z',
    endedAt: '2026-01-01T00:00:01.000Z',
    durationMs: 1000,
    ...overrides,
  };
}

describe('formatIterationLine', () => {
  test('renders a committed task', () => {
    expect(formatIterationLine(result())).toBe('  2. done #14 Fix login');
  });

  test('renders failures with the first error line', () => {
    expect(
      formatIterationLine(result({ outcome: 'failed', failure: 'gate', error: 'Gate(s) failed: test\nmore detail' }))
    ).toBe('  2. failed/gate #14 Fix login - Gate(s) failed: test');
  });

  test('renders interrupted and task-less iterations', () => {
    expect(formatIterationLine(result({ outcome: 'failed', interrupted: true }))).toBe(
      '  2. failed [interrupted] #14 Fix login'
    );
    expect(formatIterationLine(result({ outcome: 'no_task', taskId: null, taskTitle: null }))).toBe(
      '  2. no_task (no task)'
    );
  });
});

describe('toRuntimeOptions', () => {
  test('parses the iteration budget and tracker', () => {
    expect(toRuntimeOptions({ cwd: '/p', mode: 'speed', tracker: 'local', maxIterations: '4' })).toEqual({
      cwd: '/p',
      mode: 'speed',
      tracker: 'local',
      maxIterations: 4,
    });
  });

  test('rejects bad values', () => {
    expect(() => toRuntimeOptions({ maxIterations: '2.5' })).toThrow(ConfigError);
    expect(() => toRuntimeOptions({ maxIterations: '-1' })).toThrow(ConfigError);
    expect(() => toRuntimeOptions({ tracker: 'jira' })).toThrow(
      "Unknown tracker 'jira'. Known trackers: local, github-issues"
    );
  });
});

describe('reportError', () => {
  test('fatal errors map to 2, others to 1', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    expect(reportError(new ConfigError('bad'))).toBe(2);
    expect(reportError(new AuthError('no token', '  - fix it'))).toBe(2);
    expect(reportError(new NetworkError('offline'))).toBe(1);
  });
});

describe('commands on a local project', () => {
  let dir: string;
  let logs: string[];

  async function writeProject(tasks: unknown[]): Promise<void> {
    await mkdir(join(dir, '.taskloop'), { recursive: true });
    await writeFile(join(dir, '.taskloop', 'tasks.json'), JSON.stringify({ tasks }));
    const agent = JSON.stringify([process.execPath, '-e', 'process.exit(0)']);
    await writeFile(
      join(dir, '.taskloop', 'config.yaml'),
      [`agent:`, `  command: ${agent}`, `loop:`, `  gates: ["exit 0"]`, ''].join('\n')
    );
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'taskloop-cli-'));
    logs = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      logs.push(args.map(String).join(' '));
    });
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true, maxRetries: 3 });
  });

  test('status --json reports counts and the next task', async () => {
    await writeProject([
      { id: 1, title: 'First' },
      { id: 2, title: 'Urgent', labels: ['p0'] },
    ]);

    expect(await executeStatusCommand({ cwd: dir, json: true })).toBe(0);

    const report: unknown = JSON.parse(logs.join('\n'));
    expect(report).toMatchObject({
      tracker: 'local',
      mode: 'default',
      counts: { total: 2, open: 2, eligible: 2 },
      next: { id: '2', title: 'Urgent', priority: 4 },
      recent: [],
    });
  });

  test('run completes every task and exits 0', async () => {
    await writeProject([{ id: 1, title: 'Only task' }]);

    expect(await executeRunCommand({ cwd: dir })).toBe(0);

    const file: { tasks: Array<{ status: string }> } = JSON.parse(await readFile(join(dir, '.taskloop', 'tasks.json'), 'utf-8'));
    expect(file.tasks[0]?.status).toBe('done');
    expect(logs).toContain('Finished: done after 2 iteration(s), exit code 0');
  });

  test('step runs one iteration', async () => {
    await writeProject([
      { id: 1, title: 'One' },
      { id: 2, title: 'Two' },
    ]);

    expect(await executeRunCommand({ cwd: dir }, true)).toBe(1);
    expect(logs).toContain('Finished: max_iterations after 1 iteration(s), exit code 1');
  });

  test('an unknown mode exits 2 before running', async () => {
    await writeProject([{ id: 1, title: 'One' }]);
    expect(await executeRunCommand({ cwd: dir, mode: 'turbo' })).toBe(2);
  });

  test('sync succeeds on a valid task file', async () => {
    await writeProject([{ id: 1, title: 'One' }]);
    expect(await executeSyncCommand({ cwd: dir })).toBe(0);
  });
});
