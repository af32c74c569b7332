#!/usr/bin/env node
/**
 * ABOUTME: Command-line entry point for taskloop.
 */

import { Command } from 'commander';
import { executeBridgeCommand } from './commands/bridge.js';
import type { ProjectOptions } from './commands/project.js';
import { executeRunCommand } from './commands/run.js';
import { executeStatusCommand, type StatusOptions } from './commands/status.js';
import { executeSyncCommand } from './commands/sync.js';
import { getAppVersion } from './utils/version.js';

function withProjectOptions(command: Command): Command {
  return command
    .option('-C, --cwd <dir>', 'Project directory (default: current directory)')
    .option('-m, --mode <name>', 'Loop mode (default, speed, quality, exploration or a custom mode)')
    .option('-t, --tracker <kind>', 'Tracker backend: local or github-issues')
    .option('--max-iterations <n>', 'Override the iteration budget (0 = unlimited)');
}

export async function main(argv: string[]): Promise<number> {
  let exitCode = 0;
  const program = new Command();

  program
    .name('taskloop')
    .description('Gate-checked agent loop over a task tracker')
    .version(await getAppVersion());

  withProjectOptions(program.command('run'))
    .description('Run iterations until the backlog is done, blocked or the budget is spent')
    .action(async (opts: ProjectOptions) => {
      exitCode = await executeRunCommand(opts);
    });

  withProjectOptions(program.command('step'))
    .description('Run a single iteration')
    .action(async (opts: ProjectOptions) => {
      exitCode = await executeRunCommand(opts, true);
    });

  withProjectOptions(program.command('status'))
    .description('Show backlog counts, the next task and recent iterations')
    .option('--json', 'Output as JSON', false)
    .action(async (opts: StatusOptions) => {
      exitCode = await executeStatusCommand(opts);
    });

  withProjectOptions(program.command('sync'))
    .description('Refresh the tracker cache from its backing store')
    .action(async (opts: ProjectOptions) => {
      exitCode = await executeSyncCommand(opts);
    });

  withProjectOptions(program.command('bridge'))
    .description('Serve the NDJSON JSON-RPC bridge on stdin/stdout')
    .action(async (opts: ProjectOptions) => {
      exitCode = await executeBridgeCommand(opts);
    });

  await program.parseAsync(argv);
  return exitCode;
}

main(process.argv).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 2;
  }
);
