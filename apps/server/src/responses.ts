/**
 * Wire shapes. Field names are snake_case on the wire, camelCase in core.
 *
 * Replace answers with a bare TaskResponse while completion changes answer
 * with a TaskCompleteResponse wrapper. Clients depend on both shapes.
 */

import type { Task } from '@todo/core';

export interface TaskResponse {
  id: number;
  title: string;
  description: string | null;
  completed: boolean;
  created_at: string;
  updated_at: string;
}

export interface TaskListResponse {
  tasks: TaskResponse[];
}

export interface TaskCompleteResponse {
  task: TaskResponse;
}

export interface HealthResponse {
  message: 'Healthy';
}

export function toTaskResponse(task: Task): TaskResponse {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    completed: task.completed,
    created_at: task.createdAt,
    updated_at: task.updatedAt,
  };
}
