/**
 * ABOUTME: run and step commands.
 * Drive the execution engine against the configured tracker and agent until
 * a terminal state (run) or for a single iteration (step).
 */

import { CommandAgentRunner, ExecutionEngine } from '../engine/index.js';
import type { IterationResult } from '../engine/types.js';
import { openProject, reportError, type Project, type ProjectOptions } from './project.js';

/**
 * One-line rendering of an iteration result.
 */
export function formatIterationLine(result: IterationResult): string {
  const task = result.taskId ? `#${result.taskId} ${result.taskTitle ?? ''}`.trim() : '(no task)';
  const failure = result.failure ? `/${result.failure}` : '';
  const interrupted = result.interrupted ? ' [interrupted]' : '';
  const error = result.error ? ` - ${result.error.split('\n')[0]}` : '';
  return `  ${result.iteration}. ${result.outcome}${failure}${interrupted} ${task}${error}`;
}

/**
 * Execute the run command (or a single step). Resolves to the exit code.
 */
export async function executeRunCommand(options: ProjectOptions, single = false): Promise<number> {
  let project: Project;
  try {
    project = await openProject(options);
  } catch (err) {
    return reportError(err);
  }

  const { config, tracker } = project;
  const engine = new ExecutionEngine(
    { cwd: config.cwd, effective: config.effective },
    { tracker, agent: new CommandAgentRunner(config.agent.command) }
  );

  engine.on((event) => {
    if (event.type === 'task:selected') {
      console.log(`[run] Iteration ${event.iteration}: #${event.task.id} ${event.task.title}`);
    } else if (event.type === 'iteration:completed') {
      console.log(formatIterationLine(event.result));
    }
  });

  const onSignal = (): void => {
    console.log('[run] Stopping after the current phase...');
    engine.stop();
  };
  process.once('SIGINT', onSignal);

  try {
    console.log(
      `[run] Mode '${config.effective.mode}', tracker '${tracker.meta.id}', max iterations ${config.effective.maxIterations || 'unlimited'}`
    );
    const summary = single ? await engine.step() : await engine.run();
    console.log(`Finished: ${summary.terminal} after ${summary.iterations} iteration(s), exit code ${summary.exitCode}`);
    for (const warning of tracker.getWarnings()) {
      console.warn(`Warning: ${warning}`);
    }
    return summary.exitCode;
  } catch (err) {
    return reportError(err);
  } finally {
    process.removeListener('SIGINT', onSignal);
    await engine.dispose();
  }
}
