export type { TaskId, Task } from './task.js';
export type { TaskResult } from './results.js';
export { isNotFound } from './results.js';
