export const TASK_STATUSES = ['new', 'in-progress', 'completed', 'cancelled'] as const;

export type TaskStatus = typeof TASK_STATUSES[number];

export const TASK_PRIORITIES = ['low', 'normal', 'high'] as const;

/**
 * Priority is checked against TASK_PRIORITIES only when a task is created;
 * stored records may carry any label.
 */
export type TaskPriority = typeof TASK_PRIORITIES[number] | (string & {});

export interface TaskRecord {
  id: string;
  title: string;
  description: string;
  creatorId: string;
  assigneeId: string | null;
  departmentId: string | null;
  /** ISO 8601 timestamp */
  createdAt: string;
  /** ISO 8601 timestamp */
  deadline: string | null;
  status: TaskStatus;
  priority: TaskPriority;
  /** Incremented on every committed update; used for optimistic concurrency */
  version: number;
}

export function isTaskStatus(value: unknown): value is TaskStatus {
  return typeof value === 'string' && (TASK_STATUSES as readonly string[]).includes(value);
}
