import { Command } from 'commander';
import { updateTask } from '@task-tracker/core';
import * as out from '../output.js';
import { mutateTasks, parseTaskId } from '../helpers.js';

export function createUpdateCommand(): Command {
  return new Command('update')
    .description("Update a task's description")
    .argument('<taskId>', 'The task ID to update')
    .argument('<description>', 'The new task description')
    .action((rawId: string, description: string, _opts: unknown, cmd: Command) => {
      const taskId = parseTaskId(rawId);
      mutateTasks(cmd, tasks => updateTask(tasks, taskId, description));
      out.success(`Task ${taskId} updated successfully`);
    });
}
