/**
 * ABOUTME: NDJSON JSON-RPC 2.0 bridge for driving the engine from another process.
 * Requests arrive one JSON object per line on the input stream; responses
 * and event notifications are written one per line to the output stream.
 */

import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { z } from 'zod';
import { errorMessage } from '../errors.js';
import type { ExecutionEngine } from '../engine/index.js';
import type { EngineEvent, RunSummary } from '../engine/types.js';

export const JSON_RPC_ERRORS = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  RUN_STATE: -32000,
} as const;

export type BridgeEventType =
  | 'run-started'
  | 'iteration-finished'
  | 'run-finished'
  | 'run-stopped'
  | 'run-paused'
  | 'run-resumed';

type RequestId = string | number | null;

const RequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string().min(1),
  params: z.union([z.record(z.unknown()), z.array(z.unknown())]).optional(),
});

const RunParamsSchema = z.object({
  maxIterations: z.number().int().nonnegative().optional(),
});

class BridgeRequestError extends Error {
  constructor(
    readonly code: number,
    message: string
  ) {
    super(message);
    this.name = 'BridgeRequestError';
  }
}

export interface BridgeOptions {
  input: Readable;
  output: Writable;
  engine: ExecutionEngine;
  cwd: string;
  version?: string;
  now?: () => Date;
}

function requestIdOf(value: unknown): RequestId {
  if (typeof value === 'object' && value !== null && 'id' in value) {
    const id = value.id;
    if (typeof id === 'string' || typeof id === 'number') {
      return id;
    }
  }
  return null;
}

export class BridgeServer {
  private readonly options: BridgeOptions;
  private readonly now: () => Date;
  private activeRun: Promise<void> | null = null;
  private runId: string | null = null;
  private runCounter = 0;
  private lastSummary: RunSummary | null = null;

  constructor(options: BridgeOptions) {
    this.options = options;
    this.now = options.now ?? (() => new Date());
  }

  private send(message: Record<string, unknown>): void {
    this.options.output.write(`${JSON.stringify(message)}\n`);
  }

  private respond(id: RequestId, result: unknown): void {
    this.send({ jsonrpc: '2.0', id, result });
  }

  private sendError(id: RequestId, code: number, message: string): void {
    this.send({ jsonrpc: '2.0', id, error: { code, message } });
  }

  private sendEvent(type: BridgeEventType, params: Record<string, unknown>): void {
    this.send({ jsonrpc: '2.0', method: 'event', params: { type, ts: this.now().toISOString(), ...params } });
  }

  private forwardEvent(event: EngineEvent): void {
    const runId = this.runId;
    switch (event.type) {
      case 'engine:started':
        this.sendEvent('run-started', { runId, mode: event.mode, maxIterations: event.maxIterations });
        break;
      case 'iteration:completed':
        this.sendEvent('iteration-finished', { runId, result: event.result });
        break;
      case 'engine:paused':
        this.sendEvent('run-paused', { runId, iteration: event.currentIteration });
        break;
      case 'engine:resumed':
        this.sendEvent('run-resumed', { runId, iteration: event.fromIteration });
        break;
      case 'engine:stopped':
        if (event.reason === 'stopped') {
          this.sendEvent('run-stopped', { runId, iterations: event.totalIterations, exitCode: event.exitCode });
        } else {
          this.sendEvent('run-finished', {
            runId,
            terminal: event.reason,
            iterations: event.totalIterations,
            exitCode: event.exitCode,
          });
        }
        break;
      default:
        break;
    }
  }

  /**
   * Serve until the input stream closes. A run still in flight is stopped
   * and awaited before this resolves.
   */
  async serve(): Promise<void> {
    const unsubscribe = this.options.engine.on((event) => this.forwardEvent(event));
    const lines = createInterface({ input: this.options.input, crlfDelay: Infinity });

    try {
      for await (const line of lines) {
        await this.handleLine(line);
      }
    } finally {
      this.options.engine.stop();
      if (this.activeRun) {
        await this.activeRun;
      }
      unsubscribe();
    }
  }

  /**
   * Handle one input line. Exposed for tests and embedding.
   */
  async handleLine(line: string): Promise<void> {
    if (!line.trim()) {
      return;
    }

    let message: unknown;
    try {
      message = JSON.parse(line);
    } catch (err) {
      this.sendError(null, JSON_RPC_ERRORS.PARSE_ERROR, `Parse error: ${errorMessage(err)}`);
      return;
    }

    const parsed = RequestSchema.safeParse(message);
    if (!parsed.success) {
      this.sendError(requestIdOf(message), JSON_RPC_ERRORS.INVALID_REQUEST, 'Invalid request');
      return;
    }

    const { id, method, params } = parsed.data;
    // Notifications get no response.
    if (id === undefined) {
      return;
    }

    try {
      this.respond(id, await this.dispatch(method, params ?? {}));
    } catch (err) {
      if (err instanceof BridgeRequestError) {
        this.sendError(id, err.code, err.message);
      } else {
        this.sendError(id, JSON_RPC_ERRORS.RUN_STATE, errorMessage(err));
      }
    }
  }

  private isRunning(): boolean {
    return this.activeRun !== null || this.options.engine.getStatus() !== 'idle';
  }

  private ensureNotRunning(): void {
    if (this.isRunning()) {
      throw new BridgeRequestError(JSON_RPC_ERRORS.RUN_STATE, 'A run is already in progress');
    }
  }

  private ensureRunning(): void {
    if (!this.isRunning()) {
      throw new BridgeRequestError(JSON_RPC_ERRORS.RUN_STATE, 'No run in progress');
    }
  }

  private async dispatch(method: string, params: Record<string, unknown> | unknown[]): Promise<unknown> {
    const engine = this.options.engine;

    switch (method) {
      case 'ping':
        return { ok: true, version: this.options.version ?? '0.0.0', cwd: this.options.cwd, time: this.now().toISOString() };

      case 'status':
        return this.status();

      case 'step': {
        this.ensureNotRunning();
        this.runId = this.nextRunId();
        const summary = await engine.step();
        this.lastSummary = summary;
        return summary;
      }

      case 'run': {
        const parsed = RunParamsSchema.safeParse(Array.isArray(params) ? {} : params);
        if (!parsed.success) {
          throw new BridgeRequestError(JSON_RPC_ERRORS.INVALID_PARAMS, 'maxIterations must be a non-negative integer');
        }
        this.ensureNotRunning();
        const runId = this.nextRunId();
        this.runId = runId;
        this.activeRun = engine
          .run({ maxIterations: parsed.data.maxIterations })
          .then((summary) => {
            this.lastSummary = summary;
          })
          .catch((err: unknown) => {
            console.error(`[bridge] Run ${runId} failed: ${errorMessage(err)}`);
            this.sendEvent('run-finished', { runId, terminal: 'fatal', error: errorMessage(err), exitCode: 2 });
          })
          .finally(() => {
            this.activeRun = null;
          });
        return { runId };
      }

      case 'stop':
        this.ensureRunning();
        engine.stop();
        return { ok: true, stopped: true };

      case 'pause':
        this.ensureRunning();
        engine.pause();
        return { ok: true, paused: true };

      case 'resume':
        this.ensureRunning();
        engine.resume();
        return { ok: true, paused: false };

      default:
        throw new BridgeRequestError(JSON_RPC_ERRORS.METHOD_NOT_FOUND, `Unknown method: ${method}`);
    }
  }

  private nextRunId(): string {
    this.runCounter++;
    return `run-${this.runCounter}`;
  }

  private status(): Record<string, unknown> {
    const state = this.options.engine.getState();
    return {
      running: this.isRunning(),
      runId: this.runId,
      status: state.status,
      phase: state.phase,
      iteration: state.currentIteration,
      currentTask: state.currentTask ? { id: state.currentTask.id, title: state.currentTask.title } : null,
      noProgressStreak: state.noProgressStreak,
      lastTerminal: this.lastSummary?.terminal ?? null,
      lastExitCode: this.lastSummary?.exitCode ?? null,
    };
  }

  /**
   * Resolves when the background run (if any) has finished.
   */
  async waitForRun(): Promise<void> {
    if (this.activeRun) {
      await this.activeRun;
    }
  }
}
