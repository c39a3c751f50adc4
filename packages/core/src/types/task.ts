export type TaskId = number;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string | null;
  readonly completed: boolean;
  readonly createdAt: string; // yyyy-MM-ddTHH:mm:ss+00:00
  readonly updatedAt: string; // same format, >= createdAt
}
