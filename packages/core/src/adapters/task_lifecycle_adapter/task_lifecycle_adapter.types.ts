import type { CommentRecord, TaskPriority, TaskRecord, TaskStatus } from '../../record_types';
import type { PersistenceGateway } from '../../persistence';
import type { IEventStream } from '../../event_bus';
import type { PaginationConfig } from '../../config_manager';
import type { Logger } from '../../logger';
import type { Principal } from '../identity_adapter';

export type CreateTaskInput = {
  title: string;
  description?: string;
  departmentId?: string | null;
  assigneeId?: string | null;
  /** ISO 8601 timestamp */
  deadline?: string | null;
  /** Defaults to `normal`; must be one of TASK_PRIORITIES */
  priority?: TaskPriority;
};

/**
 * Offset pagination. `page` is 1-based; `pageSize` falls back to the
 * configured default and may not exceed the configured maximum.
 */
export type TaskPageOptions = {
  status?: TaskStatus;
  page?: number;
  pageSize?: number;
};

export type UserTaskListOptions = TaskPageOptions & {
  /** Whose tasks to list; defaults to the principal */
  userId?: string;
};

/**
 * TaskLifecycleAdapter Interface - task creation, assignment, status and comments
 */
export interface ITaskLifecycleAdapter {
  createTask(principal: Principal | null, input: CreateTaskInput): Promise<string>;
  assignTask(principal: Principal | null, taskId: string, userId: string): Promise<void>;
  updateStatus(principal: Principal | null, taskId: string, newStatus: string): Promise<void>;
  addComment(principal: Principal | null, taskId: string, text: string): Promise<string>;
  getTask(principal: Principal | null, taskId: string): Promise<TaskRecord>;
  listTasksFor(principal: Principal | null, options?: UserTaskListOptions): Promise<TaskRecord[]>;
  listDepartmentTasks(principal: Principal | null, departmentId: string, options?: TaskPageOptions): Promise<TaskRecord[]>;
  listComments(principal: Principal | null, taskId: string): Promise<CommentRecord[]>;
}

/**
 * TaskLifecycleAdapter Dependencies - Facade + Dependency Injection Pattern
 */
export type TaskLifecycleAdapterDependencies = {
  gateway: PersistenceGateway;
  /** Receives task events after their unit of work commits */
  eventBus: IEventStream;
  pagination?: PaginationConfig;
  logger?: Logger;
  clock?: () => Date;
};
