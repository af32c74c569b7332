/**
 * ABOUTME: Persists tracker and iteration metadata to a local JSONL log file.
 */

import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { errorMessage } from '../errors.js';
import type { FailureKind, IterationOutcome, TerminalState } from '../engine/types.js';

export const TRACKER_EVENTS_FILE = '.taskloop/tracker-events.jsonl';

export type TrackerLogEvent =
  | {
      type: 'tracker:sync-start';
      timestamp: string;
      tracker: string;
    }
  | {
      type: 'tracker:sync-complete';
      timestamp: string;
      tracker: string;
      success: boolean;
      durationMs: number;
      taskCount?: number;
      message?: string;
      error?: string;
    }
  | {
      type: 'tracker:stale-cache';
      timestamp: string;
      tracker: string;
      key: string;
      fetchedAt: string;
      reason: string;
    }
  | {
      type: 'tracker:api-call';
      timestamp: string;
      tracker: string;
      method: string;
      path: string;
      status: number | null;
      durationMs: number;
      attempt: number;
    }
  | {
      type: 'tracker:task-done';
      timestamp: string;
      tracker: string;
      taskId: string;
    }
  | {
      type: 'tracker:rollback';
      timestamp: string;
      tracker: string;
      taskId: string;
      failedStep: string;
      rolledBack: boolean;
    }
  | {
      type: 'iteration:started';
      timestamp: string;
      tracker: string;
      iteration: number;
      taskId: string;
      taskTitle: string;
    }
  | {
      type: 'iteration:completed';
      timestamp: string;
      tracker: string;
      iteration: number;
      taskId: string | null;
      outcome: IterationOutcome;
      failure?: FailureKind;
      durationMs: number;
      error?: string;
    }
  | {
      type: 'run:finished';
      timestamp: string;
      tracker: string;
      terminal: TerminalState;
      iterations: number;
      exitCode: number;
    };

let writeFailureReported = false;

export async function appendTrackerEvent(cwd: string, event: TrackerLogEvent): Promise<void> {
  const filePath = join(cwd, TRACKER_EVENTS_FILE);
  const dirPath = dirname(filePath);

  try {
    await mkdir(dirPath, { recursive: true });
    await appendFile(filePath, `${JSON.stringify(event)}\n`, 'utf-8');
  } catch (err) {
    // Logging never interrupts execution; report the first failure only.
    if (!writeFailureReported) {
      writeFailureReported = true;
      console.warn(`[logs] Cannot write ${filePath}: ${errorMessage(err)}`);
    }
  }
}

/**
 * Read back the event log. Unparseable lines are skipped.
 */
export async function readTrackerEvents(cwd: string): Promise<TrackerLogEvent[]> {
  let content: string;
  try {
    content = await readFile(join(cwd, TRACKER_EVENTS_FILE), 'utf-8');
  } catch (err) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
      return [];
    }
    throw err;
  }

  const events: TrackerLogEvent[] = [];
  for (const line of content.split('\n')) {
    if (!line.trim()) continue;
    const event = parseEventLine(line);
    if (event) events.push(event);
  }
  return events;
}

function parseEventLine(line: string): TrackerLogEvent | null {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }
  if (isTrackerLogEvent(value)) {
    return value;
  }
  return null;
}

function isTrackerLogEvent(value: unknown): value is TrackerLogEvent {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    typeof value.type === 'string' &&
    'timestamp' in value &&
    typeof value.timestamp === 'string'
  );
}
