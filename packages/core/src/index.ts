// Types
export { TaskStatus, TASK_STATUSES } from './types/index.js';
export type { TaskId, Task, TaskStats } from './types/index.js';

// Errors
export {
  TaskStoreError, ValidationError, NotFoundError, CorruptDataError, isTaskStoreError,
} from './errors.js';
export type { TaskStoreErrorCode } from './errors.js';

// Schema
export * from './schema/index.js';

// Configuration
export { DEFAULT_STORE_FILE, STORE_FILE_ENV, resolveStorePath } from './config.js';

// Store
export * from './store/index.js';

// Queries
export * from './queries/index.js';
