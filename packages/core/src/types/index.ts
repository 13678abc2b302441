export { TaskStatus, TASK_STATUSES } from './task-status.js';
export type { TaskId, Task, TaskStats } from './task.js';
