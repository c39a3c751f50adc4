/**
 * Task CRUD operations using Drizzle ORM.
 *
 * Every write runs in its own `BEGIN IMMEDIATE` transaction, so the
 * existence check and the mutation hold SQLite's write lock together.
 * Errors roll back and propagate; nothing is retried.
 */

import { eq, desc, count } from 'drizzle-orm';
import type { TodoDb, TodoSession } from '../db.js';
import type { Task, TaskId } from '../types/task.js';
import type { TaskResult } from '../types/results.js';
import { tasks } from '../schema/tasks.js';
import {
  createTaskInputSchema,
  replaceTaskInputSchema,
  type CreateTaskInput,
  type ReplaceTaskInput,
} from '../validation/task-input.js';
import { toTask, utcNowIso } from './task-helpers.js';

const IMMEDIATE = { behavior: 'immediate' } as const;

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

/** Get a single task by ID */
export function getTaskById(db: TodoSession, taskId: TaskId): Task | null {
  const row = db.select().from(tasks).where(eq(tasks.id, taskId)).get();
  return row ? toTask(row) : null;
}

/** All tasks, newest id first */
export function listTasks(db: TodoSession): Task[] {
  return db.select().from(tasks).orderBy(desc(tasks.id)).all().map(toTask);
}

export function countTasks(db: TodoSession): number {
  const row = db.select({ total: count() }).from(tasks).get();
  return row?.total ?? 0;
}

// ---------------------------------------------------------------------------
// Write operations
// ---------------------------------------------------------------------------

/**
 * Insert a new task. Throws a ZodError before touching the store when the
 * input is out of bounds.
 */
export function createTask(db: TodoDb, input: CreateTaskInput, now?: Date): Task {
  const { title, description, completed } = createTaskInputSchema.parse(input);

  return db.transaction((tx) => {
    // Stamp once the write lock is held
    const timestamp = utcNowIso(now);
    const row = tx.insert(tasks).values({
      title,
      description,
      completed,
      createdAt: timestamp,
      updatedAt: timestamp,
    }).returning().get();
    return toTask(row);
  }, IMMEDIATE);
}

/** Overwrite title, description and completion of an existing task (PUT) */
export function replaceTask(
  db: TodoDb,
  taskId: TaskId,
  input: ReplaceTaskInput,
  now?: Date,
): TaskResult<Task> {
  const { title, description, completed } = replaceTaskInputSchema.parse(input);

  return db.transaction((tx): TaskResult<Task> => {
    if (!getTaskById(tx, taskId)) return { type: 'not-found', taskId };
    const timestamp = utcNowIso(now);

    tx.update(tasks).set({
      title,
      description,
      completed,
      updatedAt: timestamp,
    }).where(eq(tasks.id, taskId)).run();

    return reload(tx, taskId);
  }, IMMEDIATE);
}

/** Set only the completion flag (and updated_at) of an existing task */
export function setTaskCompletion(
  db: TodoDb,
  taskId: TaskId,
  completed: boolean,
  now?: Date,
): TaskResult<Task> {
  return db.transaction((tx): TaskResult<Task> => {
    if (!getTaskById(tx, taskId)) return { type: 'not-found', taskId };
    const timestamp = utcNowIso(now);

    tx.update(tasks).set({ completed, updatedAt: timestamp }).where(eq(tasks.id, taskId)).run();

    return reload(tx, taskId);
  }, IMMEDIATE);
}

/** Delete a task permanently */
export function deleteTask(db: TodoDb, taskId: TaskId): TaskResult<null> {
  return db.transaction((tx): TaskResult<null> => {
    if (!getTaskById(tx, taskId)) return { type: 'not-found', taskId };

    tx.delete(tasks).where(eq(tasks.id, taskId)).run();
    return { type: 'success', data: null };
  }, IMMEDIATE);
}

/** Read back a row just written inside the same transaction */
function reload(tx: TodoSession, taskId: TaskId): TaskResult<Task> {
  const task = getTaskById(tx, taskId);
  return task ? { type: 'success', data: task } : { type: 'not-found', taskId };
}
