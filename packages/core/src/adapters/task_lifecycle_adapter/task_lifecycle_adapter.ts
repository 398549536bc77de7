import { assertAllowed } from '../../access_control';
import type { AccessContext } from '../../access_control';
import { DEFAULT_ENGINE_CONFIG } from '../../config_manager';
import type { PaginationConfig } from '../../config_manager';
import { RecordNotFoundError, ValidationError, toPersistenceFailure } from '../../errors';
import type { EventActor, IEventStream } from '../../event_bus';
import { createLogger } from '../../logger';
import type { Logger } from '../../logger';
import type { PersistenceGateway, PersistenceStores, TaskListQuery } from '../../persistence';
import { createCommentRecord, createTaskRecord } from '../../record_factories';
import { TASK_STATUSES, isTaskStatus } from '../../record_types';
import type { CommentRecord, TaskRecord, TaskStatus } from '../../record_types';
import { requirePrincipal } from '../identity_adapter';
import type { Principal } from '../identity_adapter';
import { isTransitionAllowed } from './task_workflow';
import type {
  CreateTaskInput,
  ITaskLifecycleAdapter,
  TaskLifecycleAdapterDependencies,
  TaskPageOptions,
  UserTaskListOptions,
} from './task_lifecycle_adapter.types';

const SOURCE = 'task_lifecycle_adapter';

function toActor(principal: Principal): EventActor {
  return { userId: principal.userId, displayName: principal.displayName };
}

/**
 * TaskLifecycleAdapter - owns tasks and their comments.
 *
 * Every mutation runs as one unit of work on the gateway: the permission
 * check, the existence and membership checks and the write see the same
 * state, and task updates are conditional on the version that was read.
 * Events are published only after the unit of work commits.
 */
export class TaskLifecycleAdapter implements ITaskLifecycleAdapter {
  private gateway: PersistenceGateway;
  private eventBus: IEventStream;
  private pagination: PaginationConfig;
  private logger: Logger;
  private clock: () => Date;

  constructor(dependencies: TaskLifecycleAdapterDependencies) {
    this.gateway = dependencies.gateway;
    this.eventBus = dependencies.eventBus;
    this.pagination = dependencies.pagination ?? DEFAULT_ENGINE_CONFIG.pagination;
    this.logger = dependencies.logger ?? createLogger('[TaskLifecycle] ');
    this.clock = dependencies.clock ?? (() => new Date());
  }

  /**
   * Creates a task with status `new`. A task in a department may only be
   * created by an admin or the department head, and its assignee must be
   * a member of that department.
   *
   * @returns the new task id
   */
  async createTask(principal: Principal | null, input: CreateTaskInput): Promise<string> {
    const actor = requirePrincipal(principal);
    const draft = await createTaskRecord({
      title: input.title,
      description: input.description ?? '',
      creatorId: actor.userId,
      assigneeId: input.assigneeId ?? null,
      departmentId: input.departmentId ?? null,
      createdAt: this.clock().toISOString(),
      deadline: input.deadline ?? null,
      priority: input.priority ?? 'normal',
    });

    const task = await this.unitOfWork('createTask', async (stores) => {
      const department = draft.departmentId ? await stores.departments.get(draft.departmentId) : null;

      assertAllowed(
        actor,
        'task.create',
        { departmentId: draft.departmentId, departmentHeadId: department ? department.headId : null },
        draft.departmentId ? `department:${draft.departmentId}` : 'task:new'
      );
      if (draft.departmentId && !department) {
        throw new RecordNotFoundError('department', draft.departmentId);
      }

      if (draft.assigneeId) {
        await this.checkAssignee(stores, draft.assigneeId, draft.departmentId);
      }

      await stores.tasks.create(draft);
      return draft;
    });

    this.logger.info(`Task ${task.id} created by ${actor.username}`);
    this.eventBus.publish({
      type: 'task.created',
      timestamp: Date.now(),
      source: SOURCE,
      payload: { task, actor: toActor(actor) },
    });
    if (task.assigneeId) {
      this.eventBus.publish({
        type: 'task.assigned',
        timestamp: Date.now(),
        source: SOURCE,
        payload: { task, assigneeId: task.assigneeId, previousAssigneeId: null, actor: toActor(actor) },
      });
    }
    return task.id;
  }

  /**
   * Assigns the task and moves it to `in-progress`, whatever its status was.
   * A concurrent change to the same task fails this call with ConflictError.
   */
  async assignTask(principal: Principal | null, taskId: string, userId: string): Promise<void> {
    const actor = requirePrincipal(principal);

    const { previous, updated } = await this.unitOfWork('assignTask', async (stores) => {
      const task = await this.loadTask(stores, taskId);
      assertAllowed(actor, 'task.assign', await this.taskContext(stores, task, actor), `task:${taskId}`);
      await this.checkAssignee(stores, userId, task.departmentId);

      const stored = await stores.tasks.update({ ...task, assigneeId: userId, status: 'in-progress' }, task.version);
      return { previous: task, updated: stored };
    });

    this.logger.info(`Task ${taskId} assigned to ${userId} by ${actor.username}`);
    this.eventBus.publish({
      type: 'task.assigned',
      timestamp: Date.now(),
      source: SOURCE,
      payload: {
        task: updated,
        assigneeId: userId,
        previousAssigneeId: previous.assigneeId,
        actor: toActor(actor),
      },
    });
  }

  /**
   * Sets the task status. `newStatus` is checked against TASK_STATUSES
   * before anything is read.
   */
  async updateStatus(principal: Principal | null, taskId: string, newStatus: string): Promise<void> {
    const actor = requirePrincipal(principal);
    if (!isTaskStatus(newStatus)) {
      throw new ValidationError('status', `must be one of ${TASK_STATUSES.join(', ')}`);
    }
    const status: TaskStatus = newStatus;

    const { oldStatus, updated } = await this.unitOfWork('updateStatus', async (stores) => {
      const task = await this.loadTask(stores, taskId);
      assertAllowed(actor, 'task.change_status', await this.taskContext(stores, task, actor), `task:${taskId}`);
      if (!isTransitionAllowed(task.status, status)) {
        throw new ValidationError('status', `cannot change from ${task.status} to ${status}`);
      }

      const stored = await stores.tasks.update({ ...task, status }, task.version);
      return { oldStatus: task.status, updated: stored };
    });

    this.logger.info(`Task ${taskId} status ${oldStatus} -> ${status} by ${actor.username}`);
    this.eventBus.publish({
      type: 'task.status.changed',
      timestamp: Date.now(),
      source: SOURCE,
      payload: { task: updated, oldStatus, newStatus: status, actor: toActor(actor) },
    });
  }

  /**
   * Any authenticated principal may comment on an existing task.
   * @returns the new comment id
   */
  async addComment(principal: Principal | null, taskId: string, text: string): Promise<string> {
    const actor = requirePrincipal(principal);
    const comment = await createCommentRecord({
      taskId,
      authorId: actor.userId,
      text,
      createdAt: this.clock().toISOString(),
    });

    const task = await this.unitOfWork('addComment', async (stores) => {
      const existing = await this.loadTask(stores, taskId);
      assertAllowed(actor, 'task.comment', { taskExists: true }, `task:${taskId}`);
      await stores.comments.create(comment);
      return existing;
    });

    this.logger.debug(`Comment ${comment.id} added to task ${taskId} by ${actor.username}`);
    this.eventBus.publish({
      type: 'task.comment.added',
      timestamp: Date.now(),
      source: SOURCE,
      payload: { task, comment, actor: toActor(actor) },
    });
    return comment.id;
  }

  async getTask(principal: Principal | null, taskId: string): Promise<TaskRecord> {
    const actor = requirePrincipal(principal);
    return this.read('getTask', async (stores) => {
      const task = await this.loadTask(stores, taskId);
      assertAllowed(actor, 'task.view', await this.taskContext(stores, task, actor), `task:${taskId}`);
      return task;
    });
  }

  /**
   * Tasks the user created or is assigned to, newest first. Principals see
   * their own tasks; admins may name any user.
   */
  async listTasksFor(principal: Principal | null, options: UserTaskListOptions = {}): Promise<TaskRecord[]> {
    const actor = requirePrincipal(principal);
    const userId = options.userId ?? actor.userId;
    const query = this.toQuery(options);

    return this.read('listTasksFor', async (stores) => {
      assertAllowed(actor, 'user.view_tasks', { subjectUserId: userId }, `user:${userId}`);
      return stores.tasks.listForUser(userId, query);
    });
  }

  async listDepartmentTasks(
    principal: Principal | null,
    departmentId: string,
    options: TaskPageOptions = {}
  ): Promise<TaskRecord[]> {
    const actor = requirePrincipal(principal);
    const query = this.toQuery(options);

    return this.read('listDepartmentTasks', async (stores) => {
      const department = await stores.departments.get(departmentId);
      const context: AccessContext = {
        departmentId,
        departmentHeadId: department ? department.headId : null,
        isDepartmentMember: department ? await stores.departments.isMember(departmentId, actor.userId) : false,
      };
      assertAllowed(actor, 'department.view_tasks', context, `department:${departmentId}`);
      if (!department) {
        throw new RecordNotFoundError('department', departmentId);
      }
      return stores.tasks.listForDepartment(departmentId, query);
    });
  }

  /** Oldest first */
  async listComments(principal: Principal | null, taskId: string): Promise<CommentRecord[]> {
    const actor = requirePrincipal(principal);
    return this.read('listComments', async (stores) => {
      const task = await this.loadTask(stores, taskId);
      assertAllowed(actor, 'task.view_comments', await this.taskContext(stores, task, actor), `task:${taskId}`);
      return stores.comments.listForTask(taskId);
    });
  }

  private async unitOfWork<T>(operation: string, work: (stores: PersistenceStores) => Promise<T>): Promise<T> {
    try {
      return await this.gateway.transaction(work);
    } catch (error) {
      const failure = toPersistenceFailure(operation, error);
      if (failure.kind === 'Conflict') {
        this.logger.warn(`${operation} lost a concurrent update: ${failure.message}`);
      }
      throw failure;
    }
  }

  private async read<T>(operation: string, work: (stores: PersistenceStores) => Promise<T>): Promise<T> {
    try {
      return await work(this.gateway.stores);
    } catch (error) {
      throw toPersistenceFailure(operation, error);
    }
  }

  private async loadTask(stores: PersistenceStores, taskId: string): Promise<TaskRecord> {
    const task = await stores.tasks.get(taskId);
    if (!task) {
      throw new RecordNotFoundError('task', taskId);
    }
    return task;
  }

  private async taskContext(stores: PersistenceStores, task: TaskRecord, actor: Principal): Promise<AccessContext> {
    const department = task.departmentId ? await stores.departments.get(task.departmentId) : null;
    return {
      creatorId: task.creatorId,
      assigneeId: task.assigneeId,
      departmentId: department ? department.id : null,
      departmentHeadId: department ? department.headId : null,
      isDepartmentMember: department ? await stores.departments.isMember(department.id, actor.userId) : false,
      taskExists: true,
    };
  }

  /**
   * The assignee must exist and, for a task in a department, belong to it.
   */
  private async checkAssignee(stores: PersistenceStores, userId: string, departmentId: string | null): Promise<void> {
    if (!(await stores.users.get(userId))) {
      throw new RecordNotFoundError('user', userId);
    }
    if (departmentId && !(await stores.departments.isMember(departmentId, userId))) {
      throw new ValidationError('assigneeId', `user ${userId} is not a member of department ${departmentId}`);
    }
  }

  private toQuery(options: TaskPageOptions): TaskListQuery {
    const page = options.page ?? 1;
    const pageSize = options.pageSize ?? this.pagination.defaultPageSize;

    if (!Number.isInteger(page) || page < 1) {
      throw new ValidationError('page', 'must be a positive integer');
    }
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > this.pagination.maxPageSize) {
      throw new ValidationError('pageSize', `must be an integer between 1 and ${this.pagination.maxPageSize}`);
    }
    if (options.status !== undefined && !isTaskStatus(options.status)) {
      throw new ValidationError('status', `must be one of ${TASK_STATUSES.join(', ')}`);
    }

    const query: TaskListQuery = { offset: (page - 1) * pageSize, limit: pageSize };
    if (options.status) {
      query.status = options.status;
    }
    return query;
  }
}
