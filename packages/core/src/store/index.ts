export { loadTasks, saveTasks, serializeTasks, withTasks } from './task-file.js';
