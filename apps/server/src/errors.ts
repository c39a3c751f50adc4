import type { z, ZodIssue } from 'zod';
import type { TaskId } from '@todo/core';

export type ErrorLocation = 'body' | 'path';

/** One entry of a 422 `detail` array */
export interface ValidationDetail {
  loc: Array<string | number>;
  msg: string;
  type: string;
}

export interface ErrorResponse {
  detail: string | ValidationDetail[];
}

export class RequestValidationError extends Error {
  constructor(
    readonly location: ErrorLocation,
    readonly issues: readonly ZodIssue[],
  ) {
    super(`Invalid request ${location}`);
    this.name = 'RequestValidationError';
  }
}

export class TaskNotFoundError extends Error {
  constructor(readonly taskId: TaskId) {
    super('Task not found');
    this.name = 'TaskNotFoundError';
  }
}

export function toValidationDetails(location: ErrorLocation, issues: readonly ZodIssue[]): ValidationDetail[] {
  return issues.map(issue => ({
    loc: [location, ...issue.path],
    msg: issue.message,
    type: issue.code,
  }));
}

/** Parse one part of a request, throwing a RequestValidationError on failure */
export function parseRequest<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  location: ErrorLocation,
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) throw new RequestValidationError(location, result.error.issues);
  return result.data;
}
