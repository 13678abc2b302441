export { taskSchema, taskFileSchema } from './tasks.js';
export type { TaskRecord } from './tasks.js';
