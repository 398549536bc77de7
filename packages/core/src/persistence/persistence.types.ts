import type {
  CommentRecord,
  DepartmentRecord,
  NotificationRecord,
  TaskRecord,
  TaskStatus,
  UserRecord,
} from '../record_types';

/**
 * Users. `create` rejects a taken username with DuplicateIdentityError.
 */
export interface UserStore {
  create(user: UserRecord): Promise<void>;
  get(userId: string): Promise<UserRecord | null>;
  findByUsername(username: string): Promise<UserRecord | null>;
  /**
   * Restricted while the user heads a department, created a task or
   * authored a comment. Memberships and notifications cascade; tasks
   * assigned to the user lose their assignee.
   */
  delete(userId: string): Promise<void>;
}

export interface DepartmentStore {
  create(department: DepartmentRecord): Promise<void>;
  get(departmentId: string): Promise<DepartmentRecord | null>;
  /**
   * Memberships cascade; tasks in the department lose their department.
   */
  delete(departmentId: string): Promise<void>;
  /** @returns false when the user was already a member */
  addMember(departmentId: string, userId: string): Promise<boolean>;
  /** @returns false when the user was not a member */
  removeMember(departmentId: string, userId: string): Promise<boolean>;
  isMember(departmentId: string, userId: string): Promise<boolean>;
  listMembers(departmentId: string): Promise<string[]>;
}

export type TaskListQuery = {
  status?: TaskStatus;
  offset: number;
  limit: number;
};

export type TaskRole = 'assignee' | 'creator';

export type StatusCounts = Record<TaskStatus, number>;

export type TaskDeadline = {
  deadline: string;
  status: TaskStatus;
};

export interface TaskStore {
  create(task: TaskRecord): Promise<void>;
  get(taskId: string): Promise<TaskRecord | null>;
  /**
   * Conditional update: succeeds only while the stored version equals
   * `expectedVersion`, otherwise ConflictError.
   * @returns the stored task with its version incremented
   */
  update(task: TaskRecord, expectedVersion: number): Promise<TaskRecord>;
  /** Tasks created by or assigned to the user, newest first */
  listForUser(userId: string, query: TaskListQuery): Promise<TaskRecord[]>;
  /** Newest first */
  listForDepartment(departmentId: string, query: TaskListQuery): Promise<TaskRecord[]>;
  countByStatus(role: TaskRole, userId: string): Promise<StatusCounts>;
  /** Deadlines of tasks assigned to the user; tasks without one are skipped */
  listAssignedDeadlines(userId: string): Promise<TaskDeadline[]>;
}

export interface CommentStore {
  create(comment: CommentRecord): Promise<void>;
  /** Oldest first */
  listForTask(taskId: string): Promise<CommentRecord[]>;
}

export type NotificationListQuery = {
  limit: number;
  onlyUnread: boolean;
};

export interface NotificationStore {
  create(notification: NotificationRecord): Promise<void>;
  get(notificationId: string): Promise<NotificationRecord | null>;
  /** Newest first */
  listForUser(userId: string, query: NotificationListQuery): Promise<NotificationRecord[]>;
  countUnread(userId: string): Promise<number>;
  /** @returns false when the notification does not exist */
  markRead(notificationId: string): Promise<boolean>;
  /** @returns how many notifications flipped to read */
  markAllRead(userId: string): Promise<number>;
}

export type PersistenceStores = {
  users: UserStore;
  departments: DepartmentStore;
  tasks: TaskStore;
  comments: CommentStore;
  notifications: NotificationStore;
};

/**
 * Durable storage for every record kind.
 *
 * `stores` runs each call on its own. `transaction` runs `work` as one
 * atomic unit: it commits when `work` resolves and rolls back when it
 * rejects, rethrowing the error.
 */
export interface PersistenceGateway {
  readonly stores: PersistenceStores;
  transaction<T>(work: (stores: PersistenceStores) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export function emptyStatusCounts(): StatusCounts {
  return { 'new': 0, 'in-progress': 0, 'completed': 0, 'cancelled': 0 };
}
