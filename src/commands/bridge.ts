/**
 * ABOUTME: bridge command. Serves the JSON-RPC bridge on stdin/stdout.
 */

import { BridgeServer } from '../bridge/index.js';
import { CommandAgentRunner, ExecutionEngine } from '../engine/index.js';
import { getAppVersion } from '../utils/version.js';
import { openProject, reportError, type Project, type ProjectOptions } from './project.js';

export async function executeBridgeCommand(options: ProjectOptions): Promise<number> {
  // stdout carries the protocol; operator messages go to stderr.
  console.log = (...args: unknown[]): void => {
    console.error(...args);
  };

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
  const server = new BridgeServer({
    input: process.stdin,
    output: process.stdout,
    engine,
    cwd: config.cwd,
    version: await getAppVersion(),
  });

  try {
    await server.serve();
    return 0;
  } finally {
    await engine.dispose();
  }
}
