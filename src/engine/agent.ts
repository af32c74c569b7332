/**
 * ABOUTME: Agent invocation for the execution engine.
 * The agent is an external command that receives the task prompt on stdin.
 * Also builds the prompt and the completion comment for a task.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import type { TrackerTask } from '../plugins/trackers/types.js';
import { OWN_PROCESS_GROUP, killProcessTree, releaseStdio } from '../utils/process.js';
import type { GateResult } from './types.js';

/**
 * Output marker an agent prints when it cannot make progress on the task.
 */
export const BLOCKED_SIGNAL = /<promise>\s*BLOCKED\s*<\/promise>/i;

export interface AgentRunRequest {
  prompt: string;
  cwd: string;
  /** 0 = no limit */
  timeoutMs: number;
}

export interface AgentRunResult {
  /** null when the process was killed or never started */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  interrupted: boolean;
  durationMs: number;
}

/**
 * Collaborator that runs the coding agent for one iteration.
 */
export interface AgentRunner {
  run(request: AgentRunRequest): Promise<AgentRunResult>;

  /** Kill the invocation in flight, if any */
  interrupt?(): void;
}

/**
 * Runs an agent command line, writing the prompt to its stdin.
 */
export class CommandAgentRunner implements AgentRunner {
  private current: ChildProcess | null = null;
  private interruptRequested = false;

  constructor(private readonly command: readonly string[]) {}

  run(request: AgentRunRequest): Promise<AgentRunResult> {
    const [program, ...args] = this.command;
    const started = Date.now();
    this.interruptRequested = false;

    if (!program) {
      return Promise.resolve({
        exitCode: null,
        stdout: '',
        stderr: 'agent command is empty',
        timedOut: false,
        interrupted: false,
        durationMs: 0,
      });
    }

    return new Promise((resolve) => {
      const proc = spawn(program, args, {
        cwd: request.cwd,
        env: { ...process.env },
        stdio: ['pipe', 'pipe', 'pipe'],
        detached: OWN_PROCESS_GROUP,
      });
      this.current = proc;

      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let settled = false;
      const timer =
        request.timeoutMs > 0
          ? setTimeout(() => {
              timedOut = true;
              killProcessTree(proc, 'SIGKILL');
            }, request.timeoutMs)
          : null;

      const finish = (exitCode: number | null): void => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        this.current = null;
        resolve({
          exitCode: timedOut ? null : exitCode,
          stdout,
          stderr,
          timedOut,
          interrupted: this.interruptRequested,
          durationMs: Date.now() - started,
        });
      };

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.stdin.on('error', (err) => {
        stderr += `stdin: ${err.message}\n`;
      });
      proc.stdin.end(request.prompt);

      proc.on('exit', () => {
        if (timedOut || this.interruptRequested) {
          releaseStdio(proc);
        }
      });

      proc.on('close', (code) => {
        finish(code);
      });

      proc.on('error', (err) => {
        stderr += err.message;
        finish(null);
      });
    });
  }

  interrupt(): void {
    if (this.current) {
      this.interruptRequested = true;
      killProcessTree(this.current, 'SIGTERM');
    }
  }
}

/**
 * Prompt for one iteration: the task, its acceptance criteria and the
 * completion protocol.
 */
export function buildPrompt(task: Readonly<TrackerTask>): string {
  const lines: string[] = [];
  lines.push('## Task');
  lines.push(`**ID**: ${task.id}`);
  lines.push(`**Title**: ${task.title}`);

  if (task.description) {
    lines.push('');
    lines.push('## Description');
    lines.push(task.description);
  }

  if (task.acceptance.length > 0) {
    lines.push('');
    lines.push('## Acceptance Criteria');
    for (const criterion of task.acceptance) {
      lines.push(`- [ ] ${criterion}`);
    }
  }

  if (task.notes) {
    lines.push('');
    lines.push('## Notes');
    lines.push(task.notes);
  }

  lines.push('');
  lines.push('## Instructions');
  lines.push('Complete the task described above. The quality gates run after you finish;');
  lines.push('the task is closed only if every gate passes. If you cannot make progress, print:');
  lines.push('<promise>BLOCKED</promise>');

  return lines.join('\n');
}

/**
 * Completion comment posted when a task is committed.
 */
export function buildCompletionComment(
  task: Readonly<TrackerTask>,
  iteration: number,
  gateResults: readonly GateResult[],
  now: Date = new Date()
): string {
  const lines: string[] = [`Completed by taskloop (iteration ${iteration})`, ''];
  if (gateResults.length > 0) {
    lines.push('**Gates:**');
    for (const gate of gateResults) {
      lines.push(`- ${gate.passed ? 'passed' : 'failed'}: \`${gate.command}\` (${gate.durationMs}ms)`);
    }
    lines.push('');
  }
  if (task.acceptance.length > 0) {
    lines.push('**Acceptance criteria:**');
    for (const criterion of task.acceptance) {
      lines.push(`- [x] ${criterion}`);
    }
    lines.push('');
  }
  lines.push(`**Completed at:** ${now.toISOString()}`);
  return lines.join('\n');
}
