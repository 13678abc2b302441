/**
 * CLI helpers: store resolution, argument parsing, error handling.
 */

import { CommanderError, type Command } from 'commander';
import type { Task, TaskId } from '@task-tracker/core';
import {
  TaskStatus, ValidationError, isTaskStoreError,
  resolveStorePath, loadTasks, withTasks,
} from '@task-tracker/core';
import * as out from './output.js';

/** Options accepted by every command */
export type GlobalOptions = {
  file?: string;
  verbose?: boolean;
};

/** Tasks file for this invocation: --file > TASK_CLI_FILE > ./tasks.json */
export function getStorePath(cmd: Command): string {
  const g = cmd.optsWithGlobals<GlobalOptions>();
  const path = resolveStorePath(g.file);
  out.debug(`Using tasks file ${path}`);
  return path;
}

/** Load the collection read-only */
export function readTasks(cmd: Command): Task[] {
  const tasks = loadTasks(getStorePath(cmd));
  out.debug(`Loaded ${tasks.length} task(s)`);
  return tasks;
}

/** Load, mutate and save the collection in one go */
export function mutateTasks<T>(cmd: Command, fn: (tasks: Task[]) => T): T {
  return withTasks(getStorePath(cmd), tasks => {
    out.debug(`Loaded ${tasks.length} task(s)`);
    const result = fn(tasks);
    out.debug(`Saving ${tasks.length} task(s)`);
    return result;
  });
}

/**
 * Parse a task id argument. Only positive decimal integers are accepted.
 */
export function parseTaskId(raw: string): TaskId {
  const trimmed = raw.trim();
  const id = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(id) || id < 1) {
    throw new ValidationError(`Invalid task id: '${raw}'`);
  }
  return id;
}

/**
 * Parse a status string into a TaskStatus value.
 */
export function parseStatus(status: string): TaskStatus | null {
  switch (status.trim().toLowerCase()) {
    case 'todo': case 'pending': return TaskStatus.Todo;
    case 'in-progress': case 'inprogress': case 'wip': return TaskStatus.InProgress;
    case 'done': case 'complete': case 'completed': return TaskStatus.Done;
    default: return null;
  }
}

/** Like parseStatus, but an unknown status is a ValidationError */
export function requireStatus(status: string): TaskStatus {
  const parsed = parseStatus(status);
  if (parsed == null) {
    throw new ValidationError(`Unknown status: '${status}'. Use: todo, in-progress, done`);
  }
  return parsed;
}

/**
 * Run a CLI step, reporting any error. Returns the exit code.
 * Commander has already printed its own usage errors, so only their code is kept.
 */
export function $try(fn: () => void): number {
  try {
    fn();
    return 0;
  } catch (err: unknown) {
    if (err instanceof CommanderError) return err.exitCode;
    if (isTaskStoreError(err)) {
      out.error(err.message);
    } else if (err instanceof Error) {
      out.error(err.message);
      if (err.stack) out.debug(err.stack);
    } else {
      out.error(String(err));
    }
    return 1;
  }
}
