/**
 * ABOUTME: sync command. Forces the tracker to refresh from its backing store.
 */

import { openProject, reportError, type Project, type ProjectOptions } from './project.js';

export async function executeSyncCommand(options: ProjectOptions): Promise<number> {
  let project: Project;
  try {
    project = await openProject(options);
  } catch (err) {
    return reportError(err);
  }

  const { tracker } = project;
  try {
    const result = await tracker.sync();
    if (result.success) {
      console.log(result.message);
      return 0;
    }
    console.error(`${result.message}${result.error ? `: ${result.error}` : ''}`);
    return 1;
  } finally {
    await tracker.dispose();
  }
}
