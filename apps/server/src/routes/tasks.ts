/**
 * /tasks routes. Handlers validate the path and body, call the store and
 * shape the response; errors go to the error middleware.
 */

import { Router } from 'express';
import { z } from 'zod';
import {
  listTasks,
  createTask,
  replaceTask,
  setTaskCompletion,
  deleteTask,
  createTaskInputSchema,
  replaceTaskInputSchema,
  setCompletionInputSchema,
  taskIdSchema,
  isNotFound,
  type TaskResult,
  type TodoDb,
} from '@todo/core';
import { parseRequest, TaskNotFoundError } from '../errors.js';
import { methodNotAllowed } from '../middleware/error-handler.js';
import {
  toTaskResponse,
  type TaskCompleteResponse,
  type TaskListResponse,
  type TaskResponse,
} from '../responses.js';

const taskParamsSchema = z.object({ id: taskIdSchema });

/** Unwrap a store result, turning not-found into a 404 */
function unwrap<T>(result: TaskResult<T>): T {
  if (isNotFound(result)) throw new TaskNotFoundError(result.taskId);
  return result.data;
}

export function createTasksRouter(db: TodoDb): Router {
  const router = Router();

  router.route('/')
    .get((_req, res) => {
      const body: TaskListResponse = { tasks: listTasks(db).map(toTaskResponse) };
      res.json(body);
    })
    .post((req, res) => {
      const input = parseRequest(createTaskInputSchema, req.body, 'body');
      const body: TaskResponse = toTaskResponse(createTask(db, input));
      res.status(201).json(body);
    })
    .all(methodNotAllowed('GET', 'POST'));

  router.route('/:id')
    .put((req, res) => {
      const { id } = parseRequest(taskParamsSchema, req.params, 'path');
      const input = parseRequest(replaceTaskInputSchema, req.body, 'body');
      const body: TaskResponse = toTaskResponse(unwrap(replaceTask(db, id, input)));
      res.json(body);
    })
    .delete((req, res) => {
      const { id } = parseRequest(taskParamsSchema, req.params, 'path');
      unwrap(deleteTask(db, id));
      res.status(204).end();
    })
    .all(methodNotAllowed('PUT', 'DELETE'));

  router.route('/:id/complete')
    .patch((req, res) => {
      const { id } = parseRequest(taskParamsSchema, req.params, 'path');
      const { completed } = parseRequest(setCompletionInputSchema, req.body, 'body');
      const body: TaskCompleteResponse = { task: toTaskResponse(unwrap(setTaskCompletion(db, id, completed))) };
      res.json(body);
    })
    .all(methodNotAllowed('PATCH'));

  return router;
}
