/**
 * ABOUTME: Execution engine for the taskloop agent loop.
 * Runs select → execute → gate → commit (or rollback) once per iteration
 * until the tracker runs dry, the budget is spent, progress stalls or the
 * run is stopped. Pause and stop take effect between phases.
 */

import type { EffectiveConfig } from '../config/types.js';
import { GateFailure, errorMessage, isFatalError } from '../errors.js';
import { appendTrackerEvent } from '../logs/index.js';
import type { TrackerPlugin, TrackerTask } from '../plugins/trackers/types.js';
import { loadRunState, recordIteration, saveRunState, type RunState } from '../session/state.js';
import { BLOCKED_SIGNAL, buildCompletionComment, buildPrompt, type AgentRunner } from './agent.js';
import { runGates, type GateRunner } from './gates.js';
import type {
  EngineEvent,
  EngineEventListener,
  EnginePhase,
  EngineState,
  EngineStatus,
  FailureKind,
  GateResult,
  IterationOutcome,
  IterationResult,
  RunSummary,
  TerminalState,
} from './types.js';

export interface EngineConfig {
  cwd: string;
  effective: EffectiveConfig;
}

export interface EngineDependencies {
  tracker: TrackerPlugin;
  agent: AgentRunner;
  runGates?: GateRunner;
  /** Persist results to .taskloop/state.json (default true) */
  persistState?: boolean;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface RunOptions {
  /** Overrides the configured iteration budget for this run (0 = unlimited) */
  maxIterations?: number;
}

const COUNTED_FAILURES: readonly FailureKind[] = ['agent', 'gate', 'commit'];

/**
 * Process exit code for a finished run: 0 when the backlog is done; 2 after
 * a fatal error or any gate, agent or commit failure that was not an
 * interruption; 1 otherwise.
 */
export function computeExitCode(terminal: TerminalState, results: readonly IterationResult[]): number {
  if (terminal === 'done') {
    return 0;
  }
  if (terminal === 'fatal') {
    return 2;
  }
  const failed = results.some(
    (result) =>
      result.outcome === 'failed' &&
      !result.interrupted &&
      result.failure !== undefined &&
      COUNTED_FAILURES.includes(result.failure)
  );
  return failed ? 2 : 1;
}

interface IterationDraft {
  outcome: IterationOutcome;
  failure?: FailureKind;
  gateResults?: GateResult[];
  commentText?: string | null;
  error?: string;
  interrupted?: boolean;
}

/**
 * Execution engine for the agent loop
 */
export class ExecutionEngine {
  private readonly config: EngineConfig;
  private readonly tracker: TrackerPlugin;
  private readonly agent: AgentRunner;
  private readonly gateRunner: GateRunner;
  private readonly persistState: boolean;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private listeners: EngineEventListener[] = [];
  private state: EngineState;
  private shouldStop = false;
  private wake: (() => void) | null = null;
  private runState: RunState | null = null;
  /** Highest iteration number already in the durable history */
  private iterationBase = 0;

  constructor(config: EngineConfig, deps: EngineDependencies) {
    this.config = config;
    this.tracker = deps.tracker;
    this.agent = deps.agent;
    this.gateRunner = deps.runGates ?? runGates;
    this.persistState = deps.persistState ?? true;
    this.now = deps.now ?? (() => new Date());
    this.sleep = deps.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.state = {
      status: 'idle',
      phase: 'idle',
      currentIteration: 0,
      currentTask: null,
      noProgressStreak: 0,
      iterations: [],
      startedAt: null,
      terminal: null,
    };
  }

  /**
   * Subscribe to engine events. Returns an unsubscribe function.
   */
  on(listener: EngineEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index !== -1) {
        this.listeners.splice(index, 1);
      }
    };
  }

  private emit(event: EngineEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        console.error(`[engine] Event listener failed on ${event.type}: ${errorMessage(err)}`);
      }
    }
  }

  getState(): Readonly<EngineState> {
    return { ...this.state, iterations: [...this.state.iterations] };
  }

  getStatus(): EngineStatus {
    return this.state.status;
  }

  private setPhase(phase: EnginePhase): void {
    this.state.phase = phase;
    this.emit({
      type: 'phase:changed',
      timestamp: this.now().toISOString(),
      iteration: this.state.currentIteration,
      phase,
    });
  }

  /**
   * Run iterations until a terminal state is reached.
   */
  async run(options: RunOptions = {}): Promise<RunSummary> {
    if (this.state.status !== 'idle') {
      throw new Error(`Cannot start engine in ${this.state.status} state`);
    }

    const maxIterations = options.maxIterations ?? this.config.effective.maxIterations;
    this.shouldStop = false;
    this.state = {
      ...this.state,
      status: 'running',
      phase: 'idle',
      currentIteration: 0,
      currentTask: null,
      noProgressStreak: 0,
      iterations: [],
      startedAt: this.now().toISOString(),
      terminal: null,
    };
    this.runState = this.persistState ? await loadRunState(this.config.cwd) : null;
    this.iterationBase = (this.runState?.history ?? []).reduce((max, result) => Math.max(max, result.iteration), 0);

    this.emit({
      type: 'engine:started',
      timestamp: this.now().toISOString(),
      mode: this.config.effective.mode,
      maxIterations,
    });

    let terminal: TerminalState;
    let error: string | undefined;
    try {
      terminal = await this.runLoop(maxIterations);
    } catch (err) {
      if (!isFatalError(err)) {
        throw err;
      }
      terminal = 'fatal';
      error = errorMessage(err);
      console.error(`[engine] Run aborted: ${error}`);
    } finally {
      this.state.status = 'idle';
      this.state.phase = 'idle';
      this.state.currentTask = null;
      this.wake = null;
    }

    this.state.terminal = terminal;
    const results = [...this.state.iterations];
    const exitCode = computeExitCode(terminal, results);

    this.emit({
      type: 'engine:stopped',
      timestamp: this.now().toISOString(),
      reason: terminal,
      totalIterations: this.state.currentIteration,
      exitCode,
    });
    await appendTrackerEvent(this.config.cwd, {
      type: 'run:finished',
      timestamp: this.now().toISOString(),
      tracker: this.tracker.meta.id,
      terminal,
      iterations: this.state.currentIteration,
      exitCode,
    });

    return { terminal, iterations: this.state.currentIteration, exitCode, results, error };
  }

  /**
   * Run a single iteration.
   */
  step(): Promise<RunSummary> {
    return this.run({ maxIterations: 1 });
  }

  /**
   * Main execution loop
   */
  private async runLoop(maxIterations: number): Promise<TerminalState> {
    const limit = this.config.effective.noProgressLimit;

    for (;;) {
      if (await this.checkpoint()) {
        return 'stopped';
      }

      if (maxIterations > 0 && this.state.currentIteration >= maxIterations) {
        return 'max_iterations';
      }

      this.state.currentIteration++;
      const { result, terminal } = await this.runIteration(this.iterationBase + this.state.currentIteration);
      await this.recordResult(result);

      if (terminal) {
        return terminal;
      }
      if (limit > 0 && this.state.noProgressStreak >= limit) {
        console.warn(`[engine] No progress in ${this.state.noProgressStreak} consecutive iteration(s); stopping`);
        return 'no_progress';
      }

      const delay = this.config.effective.iterationDelayMs;
      if (delay > 0 && !this.shouldStop) {
        await this.sleep(delay);
      }
    }
  }

  /**
   * Honour pause and stop requests. Returns true when the run should stop.
   */
  private async checkpoint(): Promise<boolean> {
    if (this.shouldStop) {
      return true;
    }
    if (this.state.status !== 'pausing') {
      return false;
    }

    this.state.status = 'paused';
    this.emit({
      type: 'engine:paused',
      timestamp: this.now().toISOString(),
      currentIteration: this.state.currentIteration,
    });

    while (this.state.status === 'paused' && !this.shouldStop) {
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
    this.wake = null;

    if (this.shouldStop) {
      return true;
    }
    this.emit({
      type: 'engine:resumed',
      timestamp: this.now().toISOString(),
      fromIteration: this.state.currentIteration,
    });
    return false;
  }

  private async runIteration(
    iteration: number
  ): Promise<{ result: IterationResult; terminal?: TerminalState }> {
    const started = this.now();
    const finish = (task: Readonly<TrackerTask> | null, draft: IterationDraft): IterationResult => {
      const ended = this.now();
      return Object.freeze({
        iteration,
        taskId: task?.id ?? null,
        taskTitle: task?.title ?? null,
        outcome: draft.outcome,
        failure: draft.failure,
        gateResults: draft.gateResults ?? [],
        commentText: draft.commentText ?? null,
        error: draft.error,
        interrupted: draft.interrupted ?? this.shouldStop,
        startedAt: started.toISOString(),
        endedAt: ended.toISOString(),
        durationMs: ended.getTime() - started.getTime(),
      });
    };

    // SELECT
    this.setPhase('select');
    let task: Readonly<TrackerTask>;
    try {
      const selected = await this.tracker.claimNextTask();
      if (!selected) {
        const counts = await this.tracker.getTaskCounts();
        const terminal: TerminalState = counts.open === 0 ? 'done' : 'blocked';
        console.log(
          terminal === 'done'
            ? '[engine] No open tasks remain'
            : `[engine] ${counts.open} open task(s) remain but none is eligible`
        );
        return { result: finish(null, { outcome: 'no_task', interrupted: false }), terminal };
      }
      task = selected.task;
    } catch (err) {
      if (isFatalError(err)) {
        throw err;
      }
      console.warn(`[engine] Task selection failed: ${errorMessage(err)}`);
      return { result: finish(null, { outcome: 'failed', failure: 'select', error: errorMessage(err) }) };
    }

    this.state.currentTask = task;
    this.emit({ type: 'task:selected', timestamp: this.now().toISOString(), iteration, task });
    void appendTrackerEvent(this.config.cwd, {
      type: 'iteration:started',
      timestamp: started.toISOString(),
      tracker: this.tracker.meta.id,
      iteration,
      taskId: task.id,
      taskTitle: task.title,
    });

    if (await this.checkpoint()) {
      return { result: finish(task, { outcome: 'failed', error: 'Stopped before execution', interrupted: true }) };
    }

    // EXECUTE
    this.setPhase('execute');
    if (this.tracker.markTaskStarted) {
      try {
        await this.tracker.markTaskStarted(task.id);
      } catch (err) {
        if (isFatalError(err)) {
          throw err;
        }
        this.warn(`Could not mark task ${task.id} as started: ${errorMessage(err)}`);
      }
    }

    const agentResult = await this.agent.run({
      prompt: buildPrompt(task),
      cwd: this.config.cwd,
      timeoutMs: this.config.effective.runnerTimeoutSeconds * 1000,
    });

    if (agentResult.interrupted) {
      await this.rollback(task.id);
      return {
        result: finish(task, { outcome: 'failed', failure: 'agent', error: 'Agent interrupted', interrupted: true }),
      };
    }
    if (agentResult.timedOut || agentResult.exitCode !== 0) {
      const error = agentResult.timedOut
        ? `Agent timed out after ${this.config.effective.runnerTimeoutSeconds}s`
        : `Agent exited with ${agentResult.exitCode ?? 'no exit code'}${agentResult.stderr.trim() ? `: ${agentResult.stderr.trim().slice(-500)}` : ''}`;
      await this.rollback(task.id);
      return { result: finish(task, { outcome: 'failed', failure: 'agent', error }) };
    }
    if (BLOCKED_SIGNAL.test(agentResult.stdout)) {
      await this.rollback(task.id);
      return { result: finish(task, { outcome: 'blocked', error: 'Agent reported the task as blocked' }) };
    }

    if (await this.checkpoint()) {
      await this.rollback(task.id);
      return { result: finish(task, { outcome: 'failed', error: 'Stopped before gates', interrupted: true }) };
    }

    // GATE
    this.setPhase('gate');
    const gateResults = await this.gateRunner(this.config.effective.gates, {
      cwd: this.config.cwd,
      failFast: this.config.effective.gateFailFast,
    });
    const failedGates = gateResults.filter((gate) => !gate.passed).map((gate) => gate.name);
    if (failedGates.length > 0) {
      await this.rollback(task.id);
      return {
        result: finish(task, {
          outcome: 'failed',
          failure: 'gate',
          gateResults,
          error: new GateFailure(failedGates).message,
        }),
      };
    }

    if (await this.checkpoint()) {
      await this.rollback(task.id);
      return {
        result: finish(task, { outcome: 'failed', gateResults, error: 'Stopped before commit', interrupted: true }),
      };
    }

    // COMMIT
    this.setPhase('commit');
    const comment = buildCompletionComment(task, iteration, gateResults, this.now());
    try {
      await this.tracker.markTaskDone(task.id, comment);
    } catch (err) {
      if (isFatalError(err)) {
        throw err;
      }
      console.warn(`[engine] Completing task ${task.id} failed: ${errorMessage(err)}`);
      return { result: finish(task, { outcome: 'failed', failure: 'commit', gateResults, error: errorMessage(err) }) };
    }

    return { result: finish(task, { outcome: 'done', gateResults, commentText: comment, interrupted: false }) };
  }

  /**
   * The controller never edits the tracker on failure beyond making sure
   * the task is still open, in case the agent closed it itself.
   */
  private async rollback(taskId: string): Promise<void> {
    this.setPhase('rollback');
    try {
      if (await this.tracker.isTaskDone(taskId)) {
        console.warn(`[engine] Task ${taskId} was closed during a failed iteration; reopening`);
        await this.tracker.forceTaskOpen(taskId);
      }
    } catch (err) {
      if (isFatalError(err)) {
        throw err;
      }
      this.warn(`Could not verify task ${taskId} is open: ${errorMessage(err)}`);
    }
  }

  private warn(message: string): void {
    console.warn(`[engine] ${message}`);
    this.emit({ type: 'engine:warning', timestamp: this.now().toISOString(), message });
  }

  private async recordResult(result: IterationResult): Promise<void> {
    this.state.iterations.push(result);
    this.state.currentTask = null;

    if (result.outcome === 'done') {
      this.state.noProgressStreak = 0;
    } else if (result.outcome !== 'no_task') {
      this.state.noProgressStreak++;
    }

    if (this.runState) {
      this.runState = recordIteration(this.runState, result, this.state.noProgressStreak, this.now());
      try {
        await saveRunState(this.config.cwd, this.runState);
      } catch (err) {
        this.warn(`Could not persist run state: ${errorMessage(err)}`);
      }
    }

    await appendTrackerEvent(this.config.cwd, {
      type: 'iteration:completed',
      timestamp: result.endedAt,
      tracker: this.tracker.meta.id,
      iteration: result.iteration,
      taskId: result.taskId,
      outcome: result.outcome,
      failure: result.failure,
      durationMs: result.durationMs,
      error: result.error,
    });
    this.emit({ type: 'iteration:completed', timestamp: result.endedAt, result });
  }

  /**
   * Request a stop. Takes effect at the next phase boundary; an agent in
   * flight is interrupted.
   */
  stop(): void {
    if (this.state.status === 'idle') {
      return;
    }
    this.shouldStop = true;
    this.state.status = 'stopping';
    this.agent.interrupt?.();
    this.wake?.();
  }

  /**
   * Request to pause at the next phase boundary.
   * If already pausing or paused, this is a no-op.
   */
  pause(): void {
    if (this.state.status !== 'running') {
      return;
    }
    this.state.status = 'pausing';
  }

  /**
   * Resume from a paused state, or cancel a pending pause.
   */
  resume(): void {
    if (this.state.status === 'pausing') {
      this.state.status = 'running';
      return;
    }
    if (this.state.status !== 'paused') {
      return;
    }
    this.state.status = 'running';
    this.wake?.();
  }

  isPaused(): boolean {
    return this.state.status === 'paused';
  }

  async dispose(): Promise<void> {
    this.stop();
    await this.tracker.dispose();
  }
}

export type { AgentRunner, AgentRunRequest, AgentRunResult } from './agent.js';
export { CommandAgentRunner, buildPrompt, buildCompletionComment, BLOCKED_SIGNAL } from './agent.js';
export type { GateRunner, GateRunOptions } from './gates.js';
export { runGates, runGate } from './gates.js';
export type {
  EngineEvent,
  EngineEventListener,
  EnginePhase,
  EngineState,
  EngineStatus,
  FailureKind,
  GateResult,
  IterationOutcome,
  IterationResult,
  RunSummary,
  TerminalState,
} from './types.js';
