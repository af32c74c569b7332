/**
 * ABOUTME: Tests for the execution engine loop against in-memory collaborators.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import type { EffectiveConfig } from '../../src/config/types.js';
import { ExecutionEngine, computeExitCode } from '../../src/engine/index.js';
import type { GateRunner } from '../../src/engine/gates.js';
import type { EngineEvent, IterationResult } from '../../src/engine/types.js';
import { ConfigError, NetworkError, PartialUpdateError } from '../../src/errors.js';
import { readTrackerEvents } from '../../src/logs/index.js';
import { loadRunState } from '../../src/session/state.js';
import {
  FakeTracker,
  ScriptedAgent,
  agentResult,
  createEffective,
  createTask,
  scriptedGates,
} from './fakes.js';

describe('ExecutionEngine', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'taskloop-engine-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true, maxRetries: 3 });
  });

  function createEngine(
    tracker: FakeTracker,
    agent: ScriptedAgent,
    options: { gates?: GateRunner; effective?: EffectiveConfig; persistState?: boolean; sleep?: (ms: number) => Promise<void> } = {}
  ): ExecutionEngine {
    return new ExecutionEngine(
      { cwd: dir, effective: options.effective ?? createEffective() },
      {
        tracker,
        agent,
        runGates: options.gates ?? scriptedGates([true]).runner,
        persistState: options.persistState ?? false,
        sleep: options.sleep,
      }
    );
  }

  function outcomes(results: readonly IterationResult[]): string[] {
    return results.map((result) => (result.failure ? `${result.outcome}/${result.failure}` : result.outcome));
  }

  describe('terminal states', () => {
    test('completes every task then reports done', async () => {
      const tracker = new FakeTracker([createTask({ id: '1', title: 'First' }), createTask({ id: '2', labels: ['p1'] })]);
      const agent = new ScriptedAgent([() => agentResult()]);
      const engine = createEngine(tracker, agent);

      const summary = await engine.run();

      expect(summary.terminal).toBe('done');
      expect(summary.exitCode).toBe(0);
      expect(summary.iterations).toBe(3);
      expect(outcomes(summary.results)).toEqual(['done', 'done', 'no_task']);
      expect(summary.results.map((result) => result.taskId)).toEqual(['2', '1', null]);
      expect(tracker.started).toEqual(['2', '1']);
      expect(tracker.doneCalls.map((call) => call.taskId)).toEqual(['2', '1']);
      expect(tracker.doneCalls[0]?.comment.startsWith('Completed by taskloop (iteration 1)\n')).toBe(true);
      expect(summary.results[0]?.commentText).toBe(tracker.doneCalls[0]?.comment);
      expect(agent.requests[0]?.prompt).toContain('**ID**: 2');
      expect(agent.requests[0]?.timeoutMs).toBe(900_000);
      expect(agent.requests[0]?.cwd).toBe(dir);
    });

    test('reports blocked when open tasks remain but none is eligible', async () => {
      const tracker = new FakeTracker([createTask({ id: '1' })]);
      tracker.ineligible.add('1');
      const engine = createEngine(tracker, new ScriptedAgent([]));

      const summary = await engine.run();

      expect(summary.terminal).toBe('blocked');
      expect(summary.exitCode).toBe(1);
      expect(outcomes(summary.results)).toEqual(['no_task']);
    });

    test('stops at the iteration budget', async () => {
      const tracker = new FakeTracker([createTask({ id: '1' }), createTask({ id: '2' })]);
      const engine = createEngine(tracker, new ScriptedAgent([() => agentResult()]), {
        effective: createEffective({ maxIterations: 1 }),
      });

      const summary = await engine.run();

      expect(summary.terminal).toBe('max_iterations');
      expect(summary.exitCode).toBe(1);
      expect(tracker.doneCalls).toHaveLength(1);
    });

    test('run options override the configured budget', async () => {
      const tracker = new FakeTracker([createTask({ id: '1' }), createTask({ id: '2' }), createTask({ id: '3' })]);
      const engine = createEngine(tracker, new ScriptedAgent([() => agentResult()]));

      const summary = await engine.run({ maxIterations: 2 });
      expect(summary.iterations).toBe(2);
      expect(summary.terminal).toBe('max_iterations');
    });

    test('aborts after the no-progress limit with exit code 2', async () => {
      const tracker = new FakeTracker([createTask({ id: '1' })]);
      const gates = scriptedGates([false]);
      const engine = createEngine(tracker, new ScriptedAgent([() => agentResult()]), { gates: gates.runner });

      const summary = await engine.run();

      expect(summary.terminal).toBe('no_progress');
      expect(summary.exitCode).toBe(2);
      expect(outcomes(summary.results)).toEqual(['failed/gate', 'failed/gate', 'failed/gate']);
      expect(summary.results[0]?.error).toBe('Gate(s) failed: test');
      expect(summary.results[0]?.gateResults).toHaveLength(1);
      expect(tracker.doneCalls).toEqual([]);
    });

    test('a no-progress limit of 0 never aborts', async () => {
      const tracker = new FakeTracker([createTask({ id: '1' })]);
      const engine = createEngine(tracker, new ScriptedAgent([() => agentResult()]), {
        gates: scriptedGates([false]).runner,
        effective: createEffective({ noProgressLimit: 0, maxIterations: 5 }),
      });

      const summary = await engine.run();
      expect(summary.terminal).toBe('max_iterations');
      expect(summary.iterations).toBe(5);
    });

    test('a configuration error mid-run is fatal', async () => {
      const tracker = new FakeTracker([createTask({ id: '1' })]);
      tracker.claimError = new ConfigError('Invalid task file');
      const events: EngineEvent[] = [];
      const engine = createEngine(tracker, new ScriptedAgent([]));
      engine.on((event) => events.push(event));

      const summary = await engine.run();

      expect(summary).toMatchObject({ terminal: 'fatal', exitCode: 2, error: 'Invalid task file', results: [] });
      expect(events.at(-1)).toMatchObject({ type: 'engine:stopped', reason: 'fatal', exitCode: 2 });
      expect(engine.getStatus()).toBe('idle');
    });

    test('a selection failure is recorded and does not count toward exit code 2', async () => {
      const tracker = new FakeTracker([createTask({ id: '1' })]);
      tracker.claimError = new NetworkError('GitHub unreachable');
      const engine = createEngine(tracker, new ScriptedAgent([]), { effective: createEffective({ maxIterations: 2 }) });

      const summary = await engine.run();

      expect(outcomes(summary.results)).toEqual(['failed/select', 'failed/select']);
      expect(summary.results[0]?.taskId).toBeNull();
      expect(summary.exitCode).toBe(1);
    });
  });

  describe('iteration outcomes', () => {
    test('commits only once every gate passes', async () => {
      const tracker = new FakeTracker([createTask({ id: '1' })]);
      const gates = scriptedGates([false, true]);
      const engine = createEngine(tracker, new ScriptedAgent([() => agentResult()]), { gates: gates.runner });

      const summary = await engine.run();

      expect(outcomes(summary.results)).toEqual(['failed/gate', 'done', 'no_task']);
      expect(tracker.doneCalls).toHaveLength(1);
      expect(gates.callCount()).toBe(2);
      expect(engine.getState().noProgressStreak).toBe(0);
      expect(summary.exitCode).toBe(0);
    });

    test('reopens a task the agent closed before a gate failure', async () => {
      const tracker = new FakeTracker([createTask({ id: '1' })]);
      const agent = new ScriptedAgent([
        () => {
          const task = tracker.tasks[0];
          if (task) task.closed = true;
          return agentResult();
        },
      ]);
      const engine = createEngine(tracker, agent, { gates: scriptedGates([false]).runner });

      const summary = await engine.run({ maxIterations: 1 });

      expect(tracker.forcedOpen).toEqual(['1']);
      expect(tracker.tasks[0]?.closed).toBe(false);
      expect(summary.exitCode).toBe(2);
    });

    test('a failing agent skips the gates', async () => {
      const tracker = new FakeTracker([createTask({ id: '1' })]);
      const gates = scriptedGates([true]);
      const agent = new ScriptedAgent([() => agentResult({ exitCode: 1, stderr: 'boom\n' })]);
      const engine = createEngine(tracker, agent, { gates: gates.runner });

      const summary = await engine.run({ maxIterations: 1 });

      expect(outcomes(summary.results)).toEqual(['failed/agent']);
      expect(summary.results[0]?.error).toBe('Agent exited with 1: boom');
      expect(gates.callCount()).toBe(0);
      expect(summary.exitCode).toBe(2);
    });

    test('an agent timeout is an agent failure', async () => {
      const tracker = new FakeTracker([createTask({ id: '1' })]);
      const agent = new ScriptedAgent([() => agentResult({ exitCode: null, timedOut: true })]);
      const engine = createEngine(tracker, agent);

      const summary = await engine.run({ maxIterations: 1 });
      expect(summary.results[0]?.error).toBe('Agent timed out after 900s');
    });

    test('the BLOCKED signal leaves the task open without counting as a failure', async () => {
      const tracker = new FakeTracker([createTask({ id: '1' })]);
      const agent = new ScriptedAgent([() => agentResult({ stdout: 'Need credentials <promise>BLOCKED</promise>' })]);
      const gates = scriptedGates([true]);
      const engine = createEngine(tracker, agent, { gates: gates.runner });

      const summary = await engine.run({ maxIterations: 2 });

      expect(outcomes(summary.results)).toEqual(['blocked', 'blocked']);
      expect(gates.callCount()).toBe(0);
      expect(tracker.doneCalls).toEqual([]);
      expect(summary.exitCode).toBe(1);
    });

    test('a failed completion is a commit failure', async () => {
      const tracker = new FakeTracker([createTask({ id: '1' })]);
      tracker.doneError = new PartialUpdateError('1', 'close', true);
      const engine = createEngine(tracker, new ScriptedAgent([() => agentResult()]));

      const summary = await engine.run({ maxIterations: 1 });

      expect(outcomes(summary.results)).toEqual(['failed/commit']);
      expect(summary.results[0]?.error).toBe("Completing task 1 failed at step 'close' (prior state restored)");
      expect(summary.exitCode).toBe(2);
    });

    test('sleeps between iterations', async () => {
      const sleeps: number[] = [];
      const tracker = new FakeTracker([createTask({ id: '1' })]);
      const engine = createEngine(tracker, new ScriptedAgent([() => agentResult()]), {
        effective: createEffective({ iterationDelayMs: 50 }),
        sleep: async (ms) => {
          sleeps.push(ms);
        },
      });

      await engine.run();
      expect(sleeps).toEqual([50]);
    });
  });

  describe('control', () => {
    test('step runs a single iteration', async () => {
      const tracker = new FakeTracker([createTask({ id: '1' }), createTask({ id: '2' })]);
      const engine = createEngine(tracker, new ScriptedAgent([() => agentResult()]));

      const summary = await engine.step();
      expect(summary.iterations).toBe(1);
      expect(summary.terminal).toBe('max_iterations');
    });

    test('stop during execution interrupts the iteration', async () => {
      const tracker = new FakeTracker([createTask({ id: '1' })]);
      const gates = scriptedGates([true]);
      let engine: ExecutionEngine | null = null;
      const agent = new ScriptedAgent([
        () => {
          engine?.stop();
          return agentResult();
        },
      ]);
      engine = createEngine(tracker, agent, { gates: gates.runner });

      const summary = await engine.run();

      expect(summary.terminal).toBe('stopped');
      expect(summary.exitCode).toBe(1);
      expect(summary.results).toHaveLength(1);
      expect(summary.results[0]).toMatchObject({ outcome: 'failed', interrupted: true, error: 'Stopped before gates' });
      expect(agent.interrupted).toBe(true);
      expect(gates.callCount()).toBe(0);
      expect(tracker.doneCalls).toEqual([]);
    });

    test('a stop after the agent still reopens a task the agent closed', async () => {
      const tracker = new FakeTracker([createTask({ id: '1' })]);
      let engine: ExecutionEngine | null = null;
      const agent = new ScriptedAgent([
        () => {
          const task = tracker.tasks[0];
          if (task) task.closed = true;
          engine?.stop();
          return agentResult();
        },
      ]);
      engine = createEngine(tracker, agent);

      const summary = await engine.run();

      expect(summary.results[0]).toMatchObject({ error: 'Stopped before gates', interrupted: true });
      expect(tracker.forcedOpen).toEqual(['1']);
      expect(tracker.tasks[0]?.closed).toBe(false);
    });

    test('pause waits at the next checkpoint until resumed', async () => {
      const tracker = new FakeTracker([createTask({ id: '1' })]);
      const agent = new ScriptedAgent([() => agentResult()]);
      const engine = createEngine(tracker, agent);
      const seen: string[] = [];

      engine.on((event) => {
        if (event.type === 'task:selected') {
          engine.pause();
        } else if (event.type === 'engine:paused') {
          seen.push(`paused:${engine.isPaused()}:${agent.requests.length}`);
          setTimeout(() => engine.resume(), 5);
        } else if (event.type === 'engine:resumed') {
          seen.push('resumed');
        }
      });

      const summary = await engine.run();

      expect(seen).toEqual(['paused:true:0', 'resumed']);
      expect(summary.terminal).toBe('done');
    });

    test('stop while paused ends the run', async () => {
      const tracker = new FakeTracker([createTask({ id: '1' })]);
      const agent = new ScriptedAgent([() => agentResult()]);
      const engine = createEngine(tracker, agent);

      engine.on((event) => {
        if (event.type === 'task:selected') {
          engine.pause();
        } else if (event.type === 'engine:paused') {
          setTimeout(() => engine.stop(), 5);
        }
      });

      const summary = await engine.run();

      expect(summary.terminal).toBe('stopped');
      expect(summary.results[0]).toMatchObject({ interrupted: true, error: 'Stopped before execution' });
      expect(agent.requests).toHaveLength(0);
    });

    test('resume cancels a pending pause', async () => {
      const tracker = new FakeTracker([createTask({ id: '1' })]);
      const engine = createEngine(tracker, new ScriptedAgent([() => agentResult()]));
      const types: string[] = [];

      engine.on((event) => {
        types.push(event.type);
        if (event.type === 'task:selected') {
          engine.pause();
          engine.resume();
        }
      });

      await engine.run();
      expect(types).not.toContain('engine:paused');
    });

    test('refuses a second concurrent run', async () => {
      const tracker = new FakeTracker([createTask({ id: '1' })]);
      const engine = createEngine(tracker, new ScriptedAgent([() => agentResult()]));

      const first = engine.run({ maxIterations: 1 });
      await expect(engine.run()).rejects.toThrow('Cannot start engine in running state');
      await first;
    });

    test('emits started and stopped events', async () => {
      const tracker = new FakeTracker([]);
      const engine = createEngine(tracker, new ScriptedAgent([]));
      const events: EngineEvent[] = [];
      engine.on((event) => events.push(event));

      await engine.run();

      expect(events[0]).toMatchObject({ type: 'engine:started', mode: 'default', maxIterations: 10 });
      expect(events.at(-1)).toMatchObject({ type: 'engine:stopped', reason: 'done', totalIterations: 1, exitCode: 0 });
    });

    test('a throwing listener does not break the run', async () => {
      const tracker = new FakeTracker([]);
      const engine = createEngine(tracker, new ScriptedAgent([]));
      engine.on(() => {
        throw new Error('listener bug');
      });

      expect((await engine.run()).terminal).toBe('done');
    });
  });

  describe('persistence', () => {
    test('iteration numbers continue across runs', async () => {
      const tracker = new FakeTracker([createTask({ id: '1' }), createTask({ id: '2' })]);
      const agent = new ScriptedAgent([() => agentResult()]);

      const first = await createEngine(tracker, agent, { persistState: true }).step();
      const second = await createEngine(tracker, agent, { persistState: true }).step();

      expect(first.results.map((result) => result.iteration)).toEqual([1]);
      expect(second.results.map((result) => result.iteration)).toEqual([2]);
      expect(second.iterations).toBe(1);
      expect(tracker.doneCalls[1]?.comment.startsWith('Completed by taskloop (iteration 2)\n')).toBe(true);

      const state = await loadRunState(dir);
      expect(state.history.map((result) => result.iteration)).toEqual([1, 2]);
    });

    test('records the history and the event log', async () => {
      const tracker = new FakeTracker([createTask({ id: '1' })]);
      const engine = createEngine(tracker, new ScriptedAgent([() => agentResult()]), { persistState: true });

      await engine.run();

      const state = await loadRunState(dir);
      expect(state.history.map((result) => result.outcome)).toEqual(['done', 'no_task']);
      expect(state.noProgressStreak).toBe(0);

      const events = await readTrackerEvents(dir);
      expect(events).toContainEqual(
        expect.objectContaining({ type: 'run:finished', tracker: 'fake', terminal: 'done', iterations: 2, exitCode: 0 })
      );
    });
  });
});

describe('computeExitCode', () => {
  function result(overrides: Partial<IterationResult>): IterationResult {
    return {
      iteration: 1,
      taskId: '1',
      taskTitle: 'Task',
      outcome: 'failed',
      gateResults: [],
      commentText: null,
      interrupted: false,
      startedAt: '2026-01-01T00:00:00.000Z',
      endedAt: '2026-01-01T00:00:01.000Z',
      durationMs: 1000,
      ...overrides,
    };
  }

  test('done is 0 regardless of earlier failures', () => {
    expect(computeExitCode('done', [result({ failure: 'gate' })])).toBe(0);
  });

  test('fatal is 2', () => {
    expect(computeExitCode('fatal', [])).toBe(2);
  });

  test('counted failures make it 2', () => {
    expect(computeExitCode('max_iterations', [result({ failure: 'agent' })])).toBe(2);
    expect(computeExitCode('blocked', [result({ failure: 'commit' })])).toBe(2);
  });

  test('interrupted and selection failures do not count', () => {
    expect(computeExitCode('stopped', [result({ failure: 'agent', interrupted: true })])).toBe(1);
    expect(computeExitCode('max_iterations', [result({ failure: 'select' })])).toBe(1);
    expect(computeExitCode('blocked', [result({ outcome: 'blocked' })])).toBe(1);
  });
});
