import type { TaskStatus } from './task-status.js';

export type TaskId = number;

export interface Task {
  readonly id: TaskId;
  readonly description: string;
  readonly status: TaskStatus;
  readonly createdAt: string; // ISO string
  readonly updatedAt: string; // ISO string
}

export interface TaskStats {
  readonly total: number;
  readonly todo: number;
  readonly inProgress: number;
  readonly done: number;
}
