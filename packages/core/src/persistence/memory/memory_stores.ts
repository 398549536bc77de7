import {
  ConflictError,
  DuplicateIdentityError,
  PersistenceFailureError,
  RecordNotFoundError,
} from '../../errors';
import type {
  CommentRecord,
  DepartmentRecord,
  NotificationRecord,
  TaskRecord,
  UserRecord,
} from '../../record_types';
import { sortByTimestamp } from '../../utils/array_utils';
import { emptyStatusCounts } from '../persistence.types';
import type {
  CommentStore,
  DepartmentStore,
  NotificationListQuery,
  NotificationStore,
  PersistenceStores,
  StatusCounts,
  TaskDeadline,
  TaskListQuery,
  TaskRole,
  TaskStore,
  UserStore,
} from '../persistence.types';
import { membershipKey } from './memory_state';
import type { MemoryAccess, MemoryState } from './memory_state';

function integrityViolation(operation: string, message: string): PersistenceFailureError {
  return new PersistenceFailureError(operation, new Error(message));
}

/**
 * Newest first; among equal timestamps the later insertion wins.
 */
function newestFirst<T extends { createdAt: string }>(records: Iterable<T>): T[] {
  return sortByTimestamp(Array.from(records).reverse(), (record) => record.createdAt, 'desc');
}

function pageOf(tasks: TaskRecord[], query: TaskListQuery): TaskRecord[] {
  const filtered = query.status ? tasks.filter((task) => task.status === query.status) : tasks;
  return newestFirst(filtered).slice(query.offset, query.offset + query.limit).map((task) => structuredClone(task));
}

function requireUser(state: MemoryState, operation: string, userId: string): void {
  if (!state.users.has(userId)) {
    throw integrityViolation(operation, `user ${userId} does not exist`);
  }
}

class MemoryUserStore implements UserStore {
  constructor(private readonly access: MemoryAccess) {}

  async create(user: UserRecord): Promise<void> {
    this.access.write((state) => {
      for (const existing of state.users.values()) {
        if (existing.username === user.username) {
          throw new DuplicateIdentityError(user.username);
        }
      }
      if (state.users.has(user.id)) {
        throw integrityViolation('users.create', `user id ${user.id} is taken`);
      }
      state.users.set(user.id, structuredClone(user));
    });
  }

  async get(userId: string): Promise<UserRecord | null> {
    const user = this.access.read().users.get(userId);
    return user ? structuredClone(user) : null;
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    for (const user of this.access.read().users.values()) {
      if (user.username === username) {
        return structuredClone(user);
      }
    }
    return null;
  }

  async delete(userId: string): Promise<void> {
    this.access.write((state) => {
      if (!state.users.has(userId)) {
        throw new RecordNotFoundError('user', userId);
      }
      for (const department of state.departments.values()) {
        if (department.headId === userId) {
          throw integrityViolation('users.delete', `user ${userId} heads department ${department.id}`);
        }
      }
      for (const task of state.tasks.values()) {
        if (task.creatorId === userId) {
          throw integrityViolation('users.delete', `user ${userId} created task ${task.id}`);
        }
      }
      for (const comment of state.comments.values()) {
        if (comment.authorId === userId) {
          throw integrityViolation('users.delete', `user ${userId} authored comment ${comment.id}`);
        }
      }

      for (const [key, membership] of state.memberships) {
        if (membership.userId === userId) state.memberships.delete(key);
      }
      for (const [id, notification] of state.notifications) {
        if (notification.recipientId === userId) state.notifications.delete(id);
      }
      for (const task of state.tasks.values()) {
        if (task.assigneeId === userId) task.assigneeId = null;
      }
      state.users.delete(userId);
    });
  }
}

class MemoryDepartmentStore implements DepartmentStore {
  constructor(private readonly access: MemoryAccess) {}

  async create(department: DepartmentRecord): Promise<void> {
    this.access.write((state) => {
      if (state.departments.has(department.id)) {
        throw integrityViolation('departments.create', `department id ${department.id} is taken`);
      }
      requireUser(state, 'departments.create', department.headId);
      state.departments.set(department.id, structuredClone(department));
    });
  }

  async get(departmentId: string): Promise<DepartmentRecord | null> {
    const department = this.access.read().departments.get(departmentId);
    return department ? structuredClone(department) : null;
  }

  async delete(departmentId: string): Promise<void> {
    this.access.write((state) => {
      if (!state.departments.has(departmentId)) {
        throw new RecordNotFoundError('department', departmentId);
      }
      for (const [key, membership] of state.memberships) {
        if (membership.departmentId === departmentId) state.memberships.delete(key);
      }
      for (const task of state.tasks.values()) {
        if (task.departmentId === departmentId) task.departmentId = null;
      }
      state.departments.delete(departmentId);
    });
  }

  async addMember(departmentId: string, userId: string): Promise<boolean> {
    let added = false;
    this.access.write((state) => {
      if (!state.departments.has(departmentId)) {
        throw integrityViolation('departments.addMember', `department ${departmentId} does not exist`);
      }
      requireUser(state, 'departments.addMember', userId);
      const key = membershipKey(departmentId, userId);
      added = !state.memberships.has(key);
      if (added) {
        state.memberships.set(key, { departmentId, userId });
      }
    });
    return added;
  }

  async removeMember(departmentId: string, userId: string): Promise<boolean> {
    let removed = false;
    this.access.write((state) => {
      removed = state.memberships.delete(membershipKey(departmentId, userId));
    });
    return removed;
  }

  async isMember(departmentId: string, userId: string): Promise<boolean> {
    return this.access.read().memberships.has(membershipKey(departmentId, userId));
  }

  async listMembers(departmentId: string): Promise<string[]> {
    const members: string[] = [];
    for (const membership of this.access.read().memberships.values()) {
      if (membership.departmentId === departmentId) members.push(membership.userId);
    }
    return members;
  }
}

class MemoryTaskStore implements TaskStore {
  constructor(private readonly access: MemoryAccess) {}

  async create(task: TaskRecord): Promise<void> {
    this.access.write((state) => {
      if (state.tasks.has(task.id)) {
        throw integrityViolation('tasks.create', `task id ${task.id} is taken`);
      }
      requireUser(state, 'tasks.create', task.creatorId);
      if (task.assigneeId) requireUser(state, 'tasks.create', task.assigneeId);
      if (task.departmentId && !state.departments.has(task.departmentId)) {
        throw integrityViolation('tasks.create', `department ${task.departmentId} does not exist`);
      }
      state.tasks.set(task.id, structuredClone(task));
    });
  }

  async get(taskId: string): Promise<TaskRecord | null> {
    const task = this.access.read().tasks.get(taskId);
    return task ? structuredClone(task) : null;
  }

  async update(task: TaskRecord, expectedVersion: number): Promise<TaskRecord> {
    const stored: TaskRecord = { ...structuredClone(task), version: expectedVersion + 1 };
    this.access.write((state) => {
      const current = state.tasks.get(task.id);
      if (!current) {
        throw new RecordNotFoundError('task', task.id);
      }
      if (current.version !== expectedVersion) {
        throw new ConflictError('task', task.id);
      }
      if (stored.assigneeId) requireUser(state, 'tasks.update', stored.assigneeId);
      state.tasks.set(task.id, structuredClone(stored));
    });
    return stored;
  }

  async listForUser(userId: string, query: TaskListQuery): Promise<TaskRecord[]> {
    const tasks = Array.from(this.access.read().tasks.values()).filter(
      (task) => task.creatorId === userId || task.assigneeId === userId
    );
    return pageOf(tasks, query);
  }

  async listForDepartment(departmentId: string, query: TaskListQuery): Promise<TaskRecord[]> {
    const tasks = Array.from(this.access.read().tasks.values()).filter((task) => task.departmentId === departmentId);
    return pageOf(tasks, query);
  }

  async countByStatus(role: TaskRole, userId: string): Promise<StatusCounts> {
    const counts = emptyStatusCounts();
    for (const task of this.access.read().tasks.values()) {
      const owner = role === 'assignee' ? task.assigneeId : task.creatorId;
      if (owner === userId) counts[task.status] += 1;
    }
    return counts;
  }

  async listAssignedDeadlines(userId: string): Promise<TaskDeadline[]> {
    const deadlines: TaskDeadline[] = [];
    for (const task of this.access.read().tasks.values()) {
      if (task.assigneeId === userId && task.deadline) {
        deadlines.push({ deadline: task.deadline, status: task.status });
      }
    }
    return deadlines;
  }
}

class MemoryCommentStore implements CommentStore {
  constructor(private readonly access: MemoryAccess) {}

  async create(comment: CommentRecord): Promise<void> {
    this.access.write((state) => {
      if (state.comments.has(comment.id)) {
        throw integrityViolation('comments.create', `comment id ${comment.id} is taken`);
      }
      if (!state.tasks.has(comment.taskId)) {
        throw integrityViolation('comments.create', `task ${comment.taskId} does not exist`);
      }
      requireUser(state, 'comments.create', comment.authorId);
      state.comments.set(comment.id, structuredClone(comment));
    });
  }

  async listForTask(taskId: string): Promise<CommentRecord[]> {
    const comments = Array.from(this.access.read().comments.values()).filter((comment) => comment.taskId === taskId);
    return sortByTimestamp(comments, (comment) => comment.createdAt, 'asc').map((comment) => structuredClone(comment));
  }
}

class MemoryNotificationStore implements NotificationStore {
  constructor(private readonly access: MemoryAccess) {}

  async create(notification: NotificationRecord): Promise<void> {
    this.access.write((state) => {
      if (state.notifications.has(notification.id)) {
        throw integrityViolation('notifications.create', `notification id ${notification.id} is taken`);
      }
      requireUser(state, 'notifications.create', notification.recipientId);
      state.notifications.set(notification.id, structuredClone(notification));
    });
  }

  async get(notificationId: string): Promise<NotificationRecord | null> {
    const notification = this.access.read().notifications.get(notificationId);
    return notification ? structuredClone(notification) : null;
  }

  async listForUser(userId: string, query: NotificationListQuery): Promise<NotificationRecord[]> {
    const notifications = Array.from(this.access.read().notifications.values()).filter(
      (notification) => notification.recipientId === userId && (!query.onlyUnread || !notification.read)
    );
    return newestFirst(notifications).slice(0, query.limit).map((notification) => structuredClone(notification));
  }

  async countUnread(userId: string): Promise<number> {
    let unread = 0;
    for (const notification of this.access.read().notifications.values()) {
      if (notification.recipientId === userId && !notification.read) unread += 1;
    }
    return unread;
  }

  async markRead(notificationId: string): Promise<boolean> {
    let found = false;
    this.access.write((state) => {
      const notification = state.notifications.get(notificationId);
      found = notification !== undefined;
      if (notification) notification.read = true;
    });
    return found;
  }

  async markAllRead(userId: string): Promise<number> {
    let flipped = 0;
    this.access.write((state) => {
      flipped = 0;
      for (const notification of state.notifications.values()) {
        if (notification.recipientId === userId && !notification.read) {
          notification.read = true;
          flipped += 1;
        }
      }
    });
    return flipped;
  }
}

export function createMemoryStores(access: MemoryAccess): PersistenceStores {
  return {
    users: new MemoryUserStore(access),
    departments: new MemoryDepartmentStore(access),
    tasks: new MemoryTaskStore(access),
    comments: new MemoryCommentStore(access),
    notifications: new MemoryNotificationStore(access),
  };
}
