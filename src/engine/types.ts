/**
 * ABOUTME: Type definitions for the taskloop execution engine.
 * Defines phases, terminal states, iteration results and engine events.
 */

import type { TrackerTask } from '../plugins/trackers/types.js';

/**
 * Phase of the current iteration.
 */
export type EnginePhase = 'idle' | 'select' | 'execute' | 'gate' | 'commit' | 'rollback';

/**
 * Why a run ended.
 * - 'done': no open task remains
 * - 'blocked': open tasks remain but none is eligible
 * - 'no_progress': too many consecutive iterations without a commit
 * - 'max_iterations': the iteration budget is spent
 * - 'stopped': stop() was called
 * - 'fatal': a configuration or authentication error ended the run
 */
export type TerminalState = 'done' | 'blocked' | 'no_progress' | 'max_iterations' | 'stopped' | 'fatal';

/**
 * Outcome of one iteration.
 */
export type IterationOutcome = 'done' | 'blocked' | 'failed' | 'no_task';

/**
 * Which step a failed iteration failed in.
 */
export type FailureKind = 'select' | 'agent' | 'gate' | 'commit';

/**
 * Result of running one quality gate.
 */
export interface GateResult {
  name: string;
  command: string;
  passed: boolean;
  /** null when the process was killed or never started */
  exitCode: number | null;
  timedOut: boolean;
  durationMs: number;
  /** Tail of combined stdout/stderr */
  output: string;
}

/**
 * Result of a single iteration. Frozen once built.
 */
export interface IterationResult {
  /** Iteration number (1-based) */
  iteration: number;

  taskId: string | null;
  taskTitle: string | null;

  outcome: IterationOutcome;

  /** Set when outcome is 'failed' */
  failure?: FailureKind;

  gateResults: GateResult[];

  /** Comment posted on completion, if the task was committed */
  commentText: string | null;

  error?: string;

  /** The run was stopped while this iteration was in flight */
  interrupted: boolean;

  /** ISO 8601 */
  startedAt: string;
  /** ISO 8601 */
  endedAt: string;
  durationMs: number;
}

/**
 * Summary returned when a run ends.
 */
export interface RunSummary {
  terminal: TerminalState;
  /** Iterations executed in this run */
  iterations: number;
  exitCode: number;
  results: IterationResult[];
  error?: string;
}

/**
 * Engine status
 * - 'idle': Not running
 * - 'running': Executing iterations
 * - 'pausing': Pause requested, waiting for the current phase to complete
 * - 'paused': Paused, waiting to resume
 * - 'stopping': Stop requested, shutting down
 */
export type EngineStatus = 'idle' | 'running' | 'pausing' | 'paused' | 'stopping';

/**
 * Engine state snapshot
 */
export interface EngineState {
  status: EngineStatus;
  phase: EnginePhase;

  /** Iterations executed in the current run */
  currentIteration: number;

  currentTask: Readonly<TrackerTask> | null;

  /** Consecutive iterations without a commit */
  noProgressStreak: number;

  /** Results of the current run */
  iterations: IterationResult[];

  /** ISO 8601, null before the first run */
  startedAt: string | null;

  /** How the last run ended, null while running or before any run */
  terminal: TerminalState | null;
}

interface EngineEventBase {
  /** ISO 8601 */
  timestamp: string;
}

export interface EngineStartedEvent extends EngineEventBase {
  type: 'engine:started';
  mode: string;
  maxIterations: number;
}

export interface EngineStoppedEvent extends EngineEventBase {
  type: 'engine:stopped';
  reason: TerminalState;
  totalIterations: number;
  exitCode: number;
}

export interface EnginePausedEvent extends EngineEventBase {
  type: 'engine:paused';
  currentIteration: number;
}

export interface EngineResumedEvent extends EngineEventBase {
  type: 'engine:resumed';
  fromIteration: number;
}

export interface EngineWarningEvent extends EngineEventBase {
  type: 'engine:warning';
  message: string;
}

export interface PhaseChangedEvent extends EngineEventBase {
  type: 'phase:changed';
  iteration: number;
  phase: EnginePhase;
}

export interface TaskSelectedEvent extends EngineEventBase {
  type: 'task:selected';
  iteration: number;
  task: Readonly<TrackerTask>;
}

export interface IterationCompletedEvent extends EngineEventBase {
  type: 'iteration:completed';
  result: IterationResult;
}

/**
 * Union of all engine events
 */
export type EngineEvent =
  | EngineStartedEvent
  | EngineStoppedEvent
  | EnginePausedEvent
  | EngineResumedEvent
  | EngineWarningEvent
  | PhaseChangedEvent
  | TaskSelectedEvent
  | IterationCompletedEvent;

export type EngineEventListener = (event: EngineEvent) => void;
