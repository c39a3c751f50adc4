// Types
export type { TaskId, Task, TaskResult } from './types/index.js';
export { isNotFound } from './types/index.js';

// Schema
export * from './schema/index.js';

// Database
export {
  createDb,
  initSchema,
  createTestDb,
  closeDb,
  getRawDb,
  getDefaultDbPath,
  DEFAULT_DB_PATH,
  CREATE_SCHEMA_SQL,
} from './db.js';
export type { TodoDb, TodoSession } from './db.js';

// Validation
export * from './validation/index.js';

// Queries
export * from './queries/index.js';
