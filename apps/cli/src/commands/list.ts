import { Command } from 'commander';
import { filterTasks, getStats } from '@task-tracker/core';
import * as out from '../output.js';
import { readTasks, requireStatus } from '../helpers.js';

export function createListCommand(): Command {
  return new Command('list')
    .description('List tasks, optionally only those with one status')
    .argument('[status]', 'all, todo, in-progress or done', 'all')
    .action((statusArg: string, _opts: unknown, cmd: Command) => {
      const status = statusArg.trim().toLowerCase() === 'all' ? null : requireStatus(statusArg);
      const tasks = readTasks(cmd);
      const shown = status == null ? tasks : filterTasks(tasks, status);

      out.printTasks(shown);
      if (shown.length > 0) out.info(out.formatStats(getStats(tasks)));
    });
}

export function createFilterCommand(): Command {
  return new Command('filter')
    .description('List tasks with the given status')
    .argument('<status>', 'todo, in-progress or done')
    .action((statusArg: string, _opts: unknown, cmd: Command) => {
      const status = requireStatus(statusArg);
      out.printTasks(filterTasks(readTasks(cmd), status));
    });
}
