import type { Task, TaskId } from '../types/task.js';
import { TaskStatus } from '../types/task-status.js';
import { ValidationError } from '../errors.js';

/** Maximum description length, in characters (code points) */
export const MAX_DESCRIPTION_LENGTH = 500;

// Unicode whitespace: ASCII separators \x1c-\x1f and NEL count, U+FEFF does not
const WHITESPACE_RUN =
  /[\t\n\v\f\r\x1c-\x1f \x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+/;

/** Collapse whitespace runs and trim; reject empty or oversized descriptions */
export function normalizeDescription(description: string): string {
  const normalized = description.split(WHITESPACE_RUN).filter(Boolean).join(' ');
  if (normalized.length === 0) {
    throw new ValidationError('Task description cannot be empty');
  }
  const length = [...normalized].length;
  if (length > MAX_DESCRIPTION_LENGTH) {
    throw new ValidationError(
      `Task description is too long (${length} > ${MAX_DESCRIPTION_LENGTH} characters)`,
    );
  }
  return normalized;
}

/** Create a new Task object from an already normalized description */
export function createTask(id: TaskId, description: string, now: Date = new Date()): Task {
  const timestamp = now.toISOString();
  return {
    id,
    description,
    status: TaskStatus.Todo,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

/** Next updatedAt value: `now`, unless the clock is behind the previous stamp */
export function touchTimestamp(previous: string, now: Date = new Date()): string {
  const next = now.toISOString();
  return Date.parse(next) < Date.parse(previous) ? previous : next;
}

export function withDescription(task: Task, description: string, now?: Date): Task {
  return { ...task, description, updatedAt: touchTimestamp(task.updatedAt, now) };
}

export function withStatus(task: Task, status: TaskStatus, now?: Date): Task {
  return { ...task, status, updatedAt: touchTimestamp(task.updatedAt, now) };
}
