/**
 * ABOUTME: Tests for shared task selection rules.
 */

import { describe, expect, test } from 'vitest';
import { compareTasks, derivePriority, matchesFilter, toSelectedTask } from '../../../src/plugins/trackers/base.js';
import type { TaskFilter, TrackerTask } from '../../../src/plugins/trackers/types.js';

function createTask(overrides: Partial<TrackerTask> = {}): TrackerTask {
  const labels = overrides.labels ?? [];
  return {
    id: '1',
    title: 'Task',
    description: '',
    acceptance: [],
    notes: '',
    labels,
    priority: derivePriority(labels),
    closed: false,
    ...overrides,
  };
}

const openFilter: TaskFilter = { requiredLabels: [], excludeLabels: [], excludeDrafts: true };

describe('derivePriority', () => {
  test('maps known labels and takes the highest', () => {
    expect(derivePriority([])).toBe(0);
    expect(derivePriority(['p3'])).toBe(1);
    expect(derivePriority(['priority:medium'])).toBe(2);
    expect(derivePriority(['P1', 'bug'])).toBe(3);
    expect(derivePriority(['p2', 'priority:critical'])).toBe(4);
  });
});

describe('compareTasks', () => {
  test('priority beats milestone beats id', () => {
    const tasks = [
      createTask({ id: '5' }),
      createTask({ id: '9', milestone: { number: 2, title: 'M2' } }),
      createTask({ id: '7', milestone: { number: 1, title: 'M1' } }),
      createTask({ id: '12', labels: ['p1'] }),
      createTask({ id: '3' }),
    ];

    expect([...tasks].sort(compareTasks).map((task) => task.id)).toEqual(['12', '7', '9', '3', '5']);
  });

  test('numeric ids sort numerically and before other ids', () => {
    const tasks = [createTask({ id: 'b' }), createTask({ id: '10' }), createTask({ id: 'a' }), createTask({ id: '2' })];
    expect(tasks.sort(compareTasks).map((task) => task.id)).toEqual(['2', '10', 'a', 'b']);
  });
});

describe('matchesFilter', () => {
  test('rejects closed tasks and drafts', () => {
    expect(matchesFilter(createTask({ closed: true }), openFilter)).toBe(false);
    expect(matchesFilter(createTask({ draft: true }), openFilter)).toBe(false);
    expect(matchesFilter(createTask({ draft: true }), { ...openFilter, excludeDrafts: false })).toBe(true);
  });

  test('requires every label in the filter and none excluded', () => {
    const filter: TaskFilter = { requiredLabels: ['agent', 'ready'], excludeLabels: ['wontfix'], excludeDrafts: true };
    expect(matchesFilter(createTask({ labels: ['agent'] }), filter)).toBe(false);
    expect(matchesFilter(createTask({ labels: ['agent', 'ready'] }), filter)).toBe(true);
    expect(matchesFilter(createTask({ labels: ['agent', 'ready', 'wontfix'] }), filter)).toBe(false);
  });
});

describe('toSelectedTask', () => {
  test('freezes a copy of the task', () => {
    const task = createTask({ acceptance: ['A'] });
    const selected = toSelectedTask(task, new Date('2026-01-02T03:04:05.000Z'));

    task.acceptance.push('B');
    expect(selected.task.acceptance).toEqual(['A']);
    expect(Object.isFrozen(selected.task)).toBe(true);
    expect(selected.selectedAt).toBe('2026-01-02T03:04:05.000Z');
  });
});
