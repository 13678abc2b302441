/**
 * chalk-based output formatting. Every line the CLI prints goes through here.
 */

import chalk from 'chalk';
import { TaskStatus } from '@task-tracker/core';
import type { Task, TaskStats } from '@task-tracker/core';

let verbose = false;

/** Turn debug output on or off (--verbose / TASK_CLI_DEBUG=1) */
export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

// --- Formatting functions ---

export function formatStatus(status: TaskStatus): string {
  switch (status) {
    case TaskStatus.Done: return chalk.green(`(${status})`);
    case TaskStatus.InProgress: return chalk.yellow(`(${status})`);
    default: return chalk.gray(`(${status})`);
  }
}

export function formatTask(task: Task): string {
  const id = chalk.dim(`[${task.id}]`);
  const description = task.status === TaskStatus.Done
    ? chalk.dim(task.description)
    : chalk.bold(task.description);
  return `${id} ${description} ${formatStatus(task.status)}`;
}

export function formatStats(stats: TaskStats): string {
  return chalk.dim(
    `${stats.total} task(s): ${stats.todo} todo, ${stats.inProgress} in progress, ${stats.done} done`,
  );
}

// --- Task output ---

export function printTasks(tasks: readonly Task[]): void {
  if (tasks.length === 0) {
    info('No tasks found');
    return;
  }
  for (const task of tasks) {
    console.log(formatTask(task));
  }
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.error(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

export function debug(message: string): void {
  if (verbose) console.error(chalk.dim(`[debug] ${message}`));
}
