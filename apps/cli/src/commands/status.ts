import { Command } from 'commander';
import { TaskStatus, getTaskById, setStatus } from '@task-tracker/core';
import * as out from '../output.js';
import { mutateTasks, parseTaskId } from '../helpers.js';

function createMarkCommand(name: string, status: TaskStatus, description: string): Command {
  return new Command(name)
    .description(description)
    .argument('<taskId>', 'The id of the task')
    .action((rawId: string, _opts: unknown, cmd: Command) => {
      const taskId = parseTaskId(rawId);
      const previous = mutateTasks(cmd, tasks => {
        const before = getTaskById(tasks, taskId)?.status;
        setStatus(tasks, taskId, status);
        return before;
      });

      if (previous === status) {
        out.warning(`Task ${taskId} was already ${status}`);
      } else {
        out.success(`Task ${taskId} marked as ${status}`);
      }
    });
}

export function createMarkDoneCommand(): Command {
  return createMarkCommand('mark-done', TaskStatus.Done, 'Mark a task as done');
}

export function createMarkInProgressCommand(): Command {
  return createMarkCommand('mark-in-progress', TaskStatus.InProgress, 'Mark a task as in progress');
}

export function createMarkTodoCommand(): Command {
  return createMarkCommand('mark-todo', TaskStatus.Todo, 'Mark a task as todo');
}
