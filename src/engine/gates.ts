/**
 * ABOUTME: Quality gate execution.
 * Gates are shell commands run one after another in the project directory;
 * a gate passes only when it exits 0 within its timeout.
 */

import { spawn } from 'node:child_process';
import type { GateCommand } from '../config/types.js';
import { OWN_PROCESS_GROUP, killProcessTree, releaseStdio } from '../utils/process.js';
import type { GateResult } from './types.js';

/** Characters of gate output kept on the result */
export const GATE_OUTPUT_TAIL_CHARS = 4000;

export interface GateRunOptions {
  cwd: string;
  /** Stop after the first failing gate */
  failFast: boolean;
}

export type GateRunner = (
  gates: readonly Readonly<GateCommand>[],
  options: GateRunOptions
) => Promise<GateResult[]>;

function tail(text: string, max = GATE_OUTPUT_TAIL_CHARS): string {
  return text.length > max ? text.slice(text.length - max) : text;
}

/**
 * Run one gate through the shell.
 */
export function runGate(gate: Readonly<GateCommand>, cwd: string): Promise<GateResult> {
  const started = Date.now();

  return new Promise((resolve) => {
    const proc = spawn(gate.command, {
      cwd,
      env: { ...process.env },
      shell: true,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: OWN_PROCESS_GROUP,
    });

    let output = '';
    let timedOut = false;
    let settled = false;
    const timer =
      gate.timeoutSeconds > 0
        ? setTimeout(() => {
            timedOut = true;
            killProcessTree(proc, 'SIGKILL');
          }, gate.timeoutSeconds * 1000)
        : null;

    const finish = (exitCode: number | null): void => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      resolve({
        name: gate.name,
        command: gate.command,
        passed: exitCode === 0 && !timedOut,
        exitCode: timedOut ? null : exitCode,
        timedOut,
        durationMs: Date.now() - started,
        output: tail(output),
      });
    };

    proc.stdout.on('data', (data: Buffer) => {
      output += data.toString();
    });

    proc.stderr.on('data', (data: Buffer) => {
      output += data.toString();
    });

    proc.on('exit', () => {
      if (timedOut) {
        releaseStdio(proc);
      }
    });

    proc.on('close', (code) => {
      finish(code);
    });

    proc.on('error', (err) => {
      output += err.message;
      finish(null);
    });
  });
}

/**
 * Run gates in order. With failFast, gates after the first failure are skipped.
 */
export const runGates: GateRunner = async (gates, options) => {
  const results: GateResult[] = [];
  for (const gate of gates) {
    const result = await runGate(gate, options.cwd);
    results.push(result);
    if (!result.passed) {
      console.warn(`[gates] Gate '${gate.name}' failed${result.timedOut ? ' (timed out)' : ` with exit ${result.exitCode}`}`);
      if (options.failFast) {
        break;
      }
    }
  }
  return results;
};
