/**
 * ABOUTME: Child process helpers shared by the agent runner and the gates.
 * Children run in their own process group so a kill reaches their descendants.
 */

import type { ChildProcess } from 'node:child_process';

/** Spawn option that puts the child in its own process group (POSIX only) */
export const OWN_PROCESS_GROUP = process.platform !== 'win32';

/**
 * Signal the child and everything it started. Falls back to the child alone
 * when the group cannot be signalled.
 */
export function killProcessTree(proc: ChildProcess, signal: NodeJS.Signals): void {
  if (OWN_PROCESS_GROUP && proc.pid !== undefined) {
    try {
      process.kill(-proc.pid, signal);
      return;
    } catch (err) {
      console.warn(`[process] Cannot signal process group ${proc.pid}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  proc.kill(signal);
}

/**
 * Once a killed child exits, stop waiting on pipes a stray descendant may
 * still hold open so that 'close' fires.
 */
export function releaseStdio(proc: ChildProcess): void {
  proc.stdout?.destroy();
  proc.stderr?.destroy();
  proc.stdin?.destroy();
}
