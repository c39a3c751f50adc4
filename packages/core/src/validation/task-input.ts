/**
 * Request shapes for the task operations.
 *
 * Bounds are checked here before anything reaches the store; the table's
 * CHECK constraints repeat them for writes that bypass these schemas.
 */

import { z } from 'zod';

export const TITLE_MAX_LENGTH = 200;
export const DESCRIPTION_MAX_LENGTH = 2000;

/** Length in code points, the way SQLite's length() counts text */
export function characterLength(value: string): number {
  return [...value].length;
}

function boundedText(min: number, max: number) {
  return z.string().superRefine((value, ctx) => {
    const length = characterLength(value);
    if (length < min) {
      ctx.addIssue({
        code: z.ZodIssueCode.too_small,
        type: 'string',
        minimum: min,
        inclusive: true,
        message: `String must contain at least ${min} character(s)`,
      });
    } else if (length > max) {
      ctx.addIssue({
        code: z.ZodIssueCode.too_big,
        type: 'string',
        maximum: max,
        inclusive: true,
        message: `String must contain at most ${max} character(s)`,
      });
    }
  });
}

const title = boundedText(1, TITLE_MAX_LENGTH);
const description = boundedText(0, DESCRIPTION_MAX_LENGTH).nullable().default(null);

export const createTaskInputSchema = z.object({
  title,
  description,
  completed: z.boolean().default(false),
});

/** PUT semantics: `completed` must be given explicitly */
export const replaceTaskInputSchema = z.object({
  title,
  description,
  completed: z.boolean(),
});

export const setCompletionInputSchema = z.object({
  completed: z.boolean(),
});

/** Path ids arrive as strings; only plain decimal digits are ids */
export const taskIdSchema = z.string()
  .regex(/^\d+$/, 'Expected a positive integer')
  .pipe(z.coerce.number().int().min(1));

export type CreateTaskInput = z.input<typeof createTaskInputSchema>;
export type ReplaceTaskInput = z.input<typeof replaceTaskInputSchema>;
