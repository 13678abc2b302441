export {
  nextId, getTaskById, filterTasks, getStats,
  addTask, updateTask, setStatus, deleteTask,
} from './task-queries.js';
export {
  MAX_DESCRIPTION_LENGTH, normalizeDescription, createTask,
  touchTimestamp, withDescription, withStatus,
} from './task-helpers.js';
