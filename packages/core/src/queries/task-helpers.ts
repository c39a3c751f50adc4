import type { Task } from '../types/task.js';
import type { tasks } from '../schema/tasks.js';

/**
 * Current UTC time at second precision, e.g. `2024-01-15T10:30:00+00:00`.
 * The fixed-width format keeps lexical and chronological order the same.
 */
export function utcNowIso(now: Date = new Date()): string {
  return now.toISOString().replace(/\.\d{3}Z$/, '+00:00');
}

/** Map a Drizzle row to a Task object */
export function toTask(row: typeof tasks.$inferSelect): Task {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    completed: row.completed,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}
