import type { TaskId } from './task.js';

/** Outcome of an operation that targets one task by id */
export type TaskResult<T> =
  | { readonly type: 'success'; readonly data: T }
  | { readonly type: 'not-found'; readonly taskId: TaskId };

export function isNotFound<T>(r: TaskResult<T>): r is Extract<TaskResult<T>, { type: 'not-found' }> {
  return r.type === 'not-found';
}
