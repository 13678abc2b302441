/**
 * Task collection operations. Each one works on the in-memory collection
 * loaded by the store and mutates it in place; persisting is the caller's job
 * (see withTasks).
 */

import type { Task, TaskId, TaskStats } from '../types/task.js';
import { TaskStatus } from '../types/task-status.js';
import { NotFoundError } from '../errors.js';
import {
  createTask, normalizeDescription, withDescription, withStatus,
} from './task-helpers.js';

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

/** One greater than the largest id present, or 1 for an empty collection */
export function nextId(tasks: readonly Task[]): TaskId {
  return tasks.reduce((max, t) => Math.max(max, t.id), 0) + 1;
}

export function getTaskById(tasks: readonly Task[], taskId: TaskId): Task | null {
  return tasks.find(t => t.id === taskId) ?? null;
}

/** Tasks with the given status, in collection order */
export function filterTasks(tasks: readonly Task[], status: TaskStatus): Task[] {
  return tasks.filter(t => t.status === status);
}

export function getStats(tasks: readonly Task[]): TaskStats {
  return {
    total: tasks.length,
    todo: filterTasks(tasks, TaskStatus.Todo).length,
    inProgress: filterTasks(tasks, TaskStatus.InProgress).length,
    done: filterTasks(tasks, TaskStatus.Done).length,
  };
}

// ---------------------------------------------------------------------------
// Mutations
// ---------------------------------------------------------------------------

function locate(tasks: readonly Task[], taskId: TaskId): { index: number; task: Task } {
  const index = tasks.findIndex(t => t.id === taskId);
  const task = tasks[index];
  if (index === -1 || !task) throw new NotFoundError(taskId);
  return { index, task };
}

export function addTask(tasks: Task[], description: string, now?: Date): Task {
  const task = createTask(nextId(tasks), normalizeDescription(description), now);
  tasks.push(task);
  return task;
}

export function updateTask(tasks: Task[], taskId: TaskId, description: string, now?: Date): Task {
  const { index, task } = locate(tasks, taskId);
  const updated = withDescription(task, normalizeDescription(description), now);
  tasks[index] = updated;
  return updated;
}

export function setStatus(tasks: Task[], taskId: TaskId, status: TaskStatus, now?: Date): Task {
  const { index, task } = locate(tasks, taskId);
  const updated = withStatus(task, status, now);
  tasks[index] = updated;
  return updated;
}

/** Remove a task, keeping the relative order of the rest */
export function deleteTask(tasks: Task[], taskId: TaskId): Task {
  const { index, task } = locate(tasks, taskId);
  tasks.splice(index, 1);
  return task;
}
