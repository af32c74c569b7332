/**
 * ABOUTME: status command.
 * Shows the backlog counts, the task that would be picked next and the
 * most recent iteration results.
 */

import { errorMessage } from '../errors.js';
import { loadRunState } from '../session/state.js';
import { openProject, reportError, type Project, type ProjectOptions } from './project.js';
import { formatIterationLine } from './run.js';

export interface StatusOptions extends ProjectOptions {
  json?: boolean;
}

/** Iteration results shown in the text report */
const RECENT_RESULTS = 5;

export async function executeStatusCommand(options: StatusOptions): Promise<number> {
  let project: Project;
  try {
    project = await openProject(options);
  } catch (err) {
    return reportError(err);
  }

  const { config, tracker } = project;
  try {
    const counts = await tracker.getTaskCounts();
    const next = await tracker.claimNextTask();
    const state = await loadRunState(config.cwd);
    const recent = state.history.slice(-RECENT_RESULTS);

    if (options.json) {
      console.log(
        JSON.stringify(
          {
            tracker: tracker.meta.id,
            mode: config.effective.mode,
            counts,
            next: next ? { id: next.task.id, title: next.task.title, priority: next.task.priority } : null,
            noProgressStreak: state.noProgressStreak,
            recent,
            warnings: tracker.getWarnings(),
          },
          null,
          2
        )
      );
      return 0;
    }

    console.log(`Tracker:  ${tracker.meta.name} (${tracker.meta.id})`);
    console.log(`Mode:     ${config.effective.mode}`);
    console.log(`Tasks:    ${counts.open} open, ${counts.eligible} eligible, ${counts.total} known`);
    console.log(`Next:     ${next ? `#${next.task.id} ${next.task.title}` : '(none)'}`);
    if (recent.length > 0) {
      console.log('Recent iterations:');
      for (const result of recent) {
        console.log(formatIterationLine(result));
      }
    }
    for (const warning of tracker.getWarnings()) {
      console.warn(`Warning: ${warning}`);
    }
    return 0;
  } catch (err) {
    return reportError(err);
  } finally {
    await tracker.dispose().catch((err: unknown) => {
      console.warn(`[status] Tracker dispose failed: ${errorMessage(err)}`);
    });
  }
}
