export {
  TITLE_MAX_LENGTH,
  DESCRIPTION_MAX_LENGTH,
  characterLength,
  createTaskInputSchema,
  replaceTaskInputSchema,
  setCompletionInputSchema,
  taskIdSchema,
} from './task-input.js';
export type { CreateTaskInput, ReplaceTaskInput } from './task-input.js';
