/**
 * Errors raised by the task store. Every failure a command can report is one
 * of these; the CLI prints the message and exits non-zero.
 */

import type { TaskId } from './types/task.js';

export type TaskStoreErrorCode = 'validation' | 'not-found' | 'corrupt-data';

export abstract class TaskStoreError extends Error {
  abstract readonly code: TaskStoreErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad user input: empty or oversized description, malformed id or status */
export class ValidationError extends TaskStoreError {
  readonly code = 'validation';
}

export class NotFoundError extends TaskStoreError {
  readonly code = 'not-found';

  constructor(readonly taskId: TaskId) {
    super(`Task ${taskId} not found`);
  }
}

/** The store file exists but cannot be read back as a task collection */
export class CorruptDataError extends TaskStoreError {
  readonly code = 'corrupt-data';

  constructor(readonly path: string, detail: string, options?: { cause?: unknown }) {
    super(`Tasks file is corrupted (${path}): ${detail}`, options);
  }
}

export function isTaskStoreError(err: unknown): err is TaskStoreError {
  return err instanceof TaskStoreError;
}
