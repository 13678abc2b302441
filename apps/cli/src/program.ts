import { Command, type OutputConfiguration } from 'commander';

import { createAddCommand } from './commands/add.js';
import { createUpdateCommand } from './commands/update.js';
import { createDeleteCommand } from './commands/delete.js';
import { createListCommand, createFilterCommand } from './commands/list.js';
import {
  createMarkDoneCommand, createMarkInProgressCommand, createMarkTodoCommand,
} from './commands/status.js';
import * as out from './output.js';
import { $try, type GlobalOptions } from './helpers.js';

export const VERSION = '1.0.0';

/** Environment flag that turns on debug output without --verbose */
export const DEBUG_ENV = 'TASK_CLI_DEBUG';

/**
 * Build the CLI program. Commander never calls process.exit: usage errors
 * surface as CommanderError and are turned into an exit code by run().
 */
export function createProgram(output?: OutputConfiguration): Command {
  const program = new Command()
    .name('task-cli')
    .description('Task Tracker CLI - manage your tasks from the terminal')
    .version(VERSION)
    .option('-f, --file <path>', 'Tasks file (default: $TASK_CLI_FILE or ./tasks.json)')
    .option('-v, --verbose', 'Print debug information');

  program.addCommand(createAddCommand());
  program.addCommand(createUpdateCommand());
  program.addCommand(createDeleteCommand());
  program.addCommand(createListCommand());
  program.addCommand(createFilterCommand());
  program.addCommand(createMarkDoneCommand());
  program.addCommand(createMarkInProgressCommand());
  program.addCommand(createMarkTodoCommand());

  program.hook('preAction', (_thisCommand, actionCommand) => {
    const g = actionCommand.optsWithGlobals<GlobalOptions>();
    out.setVerbose(g.verbose === true || process.env[DEBUG_ENV] === '1');
  });

  for (const cmd of [program, ...program.commands]) {
    cmd.exitOverride();
    cmd.allowExcessArguments(false);
    cmd.showHelpAfterError();
    if (output) cmd.configureOutput(output);
  }

  return program;
}

/**
 * Parse `argv` and run the matching command. Returns the process exit code.
 * With `from: 'node'` the first two entries are the node binary and script.
 */
export function run(
  argv: readonly string[],
  opts: { from?: 'node' | 'user'; output?: OutputConfiguration } = {},
): number {
  const program = createProgram(opts.output);
  return $try(() => {
    program.parse(argv, { from: opts.from ?? 'node' });
  });
}
