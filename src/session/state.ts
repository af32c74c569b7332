/**
 * ABOUTME: Durable run state persisted to .taskloop/state.json.
 * Holds the no-progress streak and the iteration history so a later run,
 * the status command or the bridge can see what happened.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { STATE_DIR } from '../config/index.js';
import { errorMessage } from '../errors.js';
import type { IterationResult } from '../engine/types.js';
import { writeJsonAtomic } from '../utils/atomic-file.js';

export const STATE_FILE = join(STATE_DIR, 'state.json');

/** Maximum iteration results kept in the history */
export const HISTORY_LIMIT = 200;

const GateResultSchema = z.object({
  name: z.string(),
  command: z.string(),
  passed: z.boolean(),
  exitCode: z.number().nullable(),
  timedOut: z.boolean(),
  durationMs: z.number(),
  output: z.string(),
});

const IterationResultSchema = z.object({
  iteration: z.number().int(),
  taskId: z.string().nullable(),
  taskTitle: z.string().nullable(),
  outcome: z.enum(['done', 'blocked', 'failed', 'no_task']),
  failure: z.enum(['select', 'agent', 'gate', 'commit']).optional(),
  gateResults: z.array(GateResultSchema),
  commentText: z.string().nullable(),
  error: z.string().optional(),
  interrupted: z.boolean(),
  startedAt: z.string(),
  endedAt: z.string(),
  durationMs: z.number(),
});

const RunStateSchema = z.object({
  version: z.literal(1),
  createdAt: z.string(),
  updatedAt: z.string(),
  noProgressStreak: z.number().int().nonnegative(),
  history: z.array(IterationResultSchema),
});

export type RunState = z.infer<typeof RunStateSchema>;

export function createRunState(now: Date = new Date()): RunState {
  const timestamp = now.toISOString();
  return { version: 1, createdAt: timestamp, updatedAt: timestamp, noProgressStreak: 0, history: [] };
}

/**
 * Load the run state. A missing or unreadable file yields a fresh state.
 */
export async function loadRunState(cwd: string): Promise<RunState> {
  const path = join(cwd, STATE_FILE);
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if (!(err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT')) {
      console.warn(`[state] Cannot read ${path}: ${errorMessage(err)}; starting fresh`);
    }
    return createRunState();
  }

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (err) {
    console.warn(`[state] Corrupt ${path} (${errorMessage(err)}); starting fresh`);
    return createRunState();
  }

  const parsed = RunStateSchema.safeParse(document);
  if (!parsed.success) {
    console.warn(`[state] Unrecognized state format in ${path}; starting fresh`);
    return createRunState();
  }
  return parsed.data;
}

/**
 * Append an iteration result, keeping the newest HISTORY_LIMIT entries.
 */
export function recordIteration(
  state: RunState,
  result: IterationResult,
  noProgressStreak: number,
  now: Date = new Date()
): RunState {
  const history = [...state.history, result];
  return {
    ...state,
    updatedAt: now.toISOString(),
    noProgressStreak,
    history: history.slice(Math.max(0, history.length - HISTORY_LIMIT)),
  };
}

export async function saveRunState(cwd: string, state: RunState): Promise<void> {
  await writeJsonAtomic(join(cwd, STATE_FILE), state);
}
