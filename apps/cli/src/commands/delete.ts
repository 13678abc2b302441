import { Command } from 'commander';
import { deleteTask } from '@task-tracker/core';
import * as out from '../output.js';
import { mutateTasks, parseTaskId } from '../helpers.js';

export function createDeleteCommand(): Command {
  return new Command('delete')
    .description('Delete a task')
    .argument('<taskId>', 'The id of the task to delete')
    .action((rawId: string, _opts: unknown, cmd: Command) => {
      const taskId = parseTaskId(rawId);
      mutateTasks(cmd, tasks => deleteTask(tasks, taskId));
      out.success(`Task ${taskId} deleted successfully`);
    });
}
