import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

export const tasks = sqliteTable('tasks', {
  /** AUTOINCREMENT: ids of deleted rows are never handed out again */
  id: integer('id').primaryKey({ autoIncrement: true }),
  title: text('title').notNull(),
  /** NULL and '' are distinct states */
  description: text('description'),
  completed: integer('completed', { mode: 'boolean' }).notNull().default(false),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
});
