// Task helpers
export { utcNowIso, toTask } from './task-helpers.js';

// Task queries
export {
  getTaskById,
  listTasks,
  countTasks,
  createTask,
  replaceTask,
  setTaskCompletion,
  deleteTask,
} from './task-queries.js';
