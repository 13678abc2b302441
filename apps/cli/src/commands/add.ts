import { Command } from 'commander';
import { addTask } from '@task-tracker/core';
import * as out from '../output.js';
import { mutateTasks } from '../helpers.js';

export function createAddCommand(): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<description>', 'Task description')
    .action((description: string, _opts: unknown, cmd: Command) => {
      const task = mutateTasks(cmd, tasks => addTask(tasks, description));
      out.success(`Task added successfully (ID: ${task.id})`);
    });
}
