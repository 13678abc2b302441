/**
 * JSON file persistence for the task collection.
 *
 * The whole collection is read at the start of a command and rewritten in one
 * step on any mutation: the new content goes to a temp file beside the target,
 * which is then renamed over it.
 */

import {
  closeSync, fsyncSync, mkdirSync, openSync,
  readFileSync, renameSync, rmSync, writeFileSync,
} from 'node:fs';
import { dirname } from 'node:path';
import type { ZodError } from 'zod';
import type { Task } from '../types/task.js';
import { taskFileSchema, type TaskRecord } from '../schema/tasks.js';
import { CorruptDataError } from '../errors.js';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function describeIssue(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'unexpected content';
  const where = issue.path.length > 0 ? issue.path.join('.') : 'root';
  return `${where}: ${issue.message}`;
}

/**
 * Read the collection stored at `path`.
 * A missing or blank file is an empty collection; the file is never created here.
 */
export function loadTasks(path: string): Task[] {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (isMissingFile(err)) return [];
    throw new CorruptDataError(path, errorMessage(err), { cause: err });
  }

  if (content.trim().length === 0) return [];

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err: unknown) {
    throw new CorruptDataError(path, `invalid JSON (${errorMessage(err)})`, { cause: err });
  }

  const parsed = taskFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new CorruptDataError(path, describeIssue(parsed.error), { cause: parsed.error });
  }
  return parsed.data;
}

/** Copy only the persisted fields, in on-disk order */
function toRecord(task: Task): TaskRecord {
  return {
    id: task.id,
    description: task.description,
    status: task.status,
    createdAt: task.createdAt,
    updatedAt: task.updatedAt,
  };
}

export function serializeTasks(tasks: readonly Task[]): string {
  return JSON.stringify(tasks.map(toRecord), null, 2) + '\n';
}

/** Overwrite the file at `path` with the full collection */
export function saveTasks(path: string, tasks: readonly Task[]): void {
  mkdirSync(dirname(path), { recursive: true });

  const tmpPath = `${path}.${process.pid}.tmp`;
  try {
    const fd = openSync(tmpPath, 'w');
    try {
      writeFileSync(fd, serializeTasks(tasks), 'utf-8');
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tmpPath, path);
  } catch (err: unknown) {
    rmSync(tmpPath, { force: true });
    throw err;
  }
}

/**
 * Load, let `fn` mutate the collection, save. Nothing is written if `fn` throws.
 */
export function withTasks<T>(path: string, fn: (tasks: Task[]) => T): T {
  const tasks = loadTasks(path);
  const result = fn(tasks);
  saveTasks(path, tasks);
  return result;
}
