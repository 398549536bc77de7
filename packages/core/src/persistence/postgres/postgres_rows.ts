import {
  ConflictError,
  DuplicateIdentityError,
  PersistenceFailureError,
  isTaskDeskError,
} from '../../errors';
import type { EntityKind, TaskDeskError } from '../../errors';
import {
  DEFAULT_NOTIFICATION_PREFERENCES,
  NOTIFICATION_CATEGORIES,
  isTaskStatus,
} from '../../record_types';
import type {
  CommentRecord,
  DepartmentRecord,
  NotificationCategory,
  NotificationPreferences,
  NotificationRecord,
  TaskRecord,
  TaskStatus,
  UserRecord,
} from '../../record_types';
import type { SqlRow } from './postgres_gateway.types';

function malformed(column: string, value: unknown): PersistenceFailureError {
  return new PersistenceFailureError('row mapping', new Error(`unexpected value in column ${column}: ${String(value)}`));
}

export function text(row: SqlRow, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') throw malformed(column, value);
  return value;
}

export function nullableText(row: SqlRow, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  if (typeof value !== 'string') throw malformed(column, value);
  return value;
}

export function flag(row: SqlRow, column: string): boolean {
  const value = row[column];
  if (typeof value !== 'boolean') throw malformed(column, value);
  return value;
}

/** COUNT(*)::int comes back as a number; bigint columns as strings */
export function integer(row: SqlRow, column: string): number {
  const value = row[column];
  const parsed = typeof value === 'string' ? Number.parseInt(value, 10) : value;
  if (typeof parsed !== 'number' || !Number.isInteger(parsed)) throw malformed(column, value);
  return parsed;
}

/** TIMESTAMPTZ arrives as a Date */
export function nullableTimestamp(row: SqlRow, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  const date = value instanceof Date ? value : typeof value === 'string' ? new Date(value) : null;
  if (!date || Number.isNaN(date.getTime())) throw malformed(column, value);
  return date.toISOString();
}

export function timestamp(row: SqlRow, column: string): string {
  const value = nullableTimestamp(row, column);
  if (value === null) throw malformed(column, value);
  return value;
}

export function status(row: SqlRow, column: string): TaskStatus {
  const value = row[column];
  if (!isTaskStatus(value)) throw malformed(column, value);
  return value;
}

function isNotificationCategory(value: unknown): value is NotificationCategory {
  return typeof value === 'string' && (NOTIFICATION_CATEGORIES as readonly string[]).includes(value);
}

function preferences(row: SqlRow, column: string): NotificationPreferences {
  const value = row[column];
  if (typeof value !== 'object' || value === null) {
    return { ...DEFAULT_NOTIFICATION_PREFERENCES };
  }
  const email = 'email' in value && typeof value.email === 'boolean' ? value.email : DEFAULT_NOTIFICATION_PREFERENCES.email;
  const inApp = 'inApp' in value && typeof value.inApp === 'boolean' ? value.inApp : DEFAULT_NOTIFICATION_PREFERENCES.inApp;
  return { email, inApp };
}

export function toUserRecord(row: SqlRow): UserRecord {
  return {
    id: text(row, 'id'),
    username: text(row, 'username'),
    secretHash: text(row, 'secret_hash'),
    displayName: text(row, 'display_name'),
    isAdmin: flag(row, 'is_admin'),
    email: nullableText(row, 'email'),
    notificationPreferences: preferences(row, 'notification_preferences'),
  };
}

export function toDepartmentRecord(row: SqlRow): DepartmentRecord {
  return {
    id: text(row, 'id'),
    name: text(row, 'name'),
    headId: text(row, 'head_id'),
  };
}

export function toTaskRecord(row: SqlRow): TaskRecord {
  return {
    id: text(row, 'id'),
    title: text(row, 'title'),
    description: text(row, 'description'),
    creatorId: text(row, 'creator_id'),
    assigneeId: nullableText(row, 'assignee_id'),
    departmentId: nullableText(row, 'department_id'),
    createdAt: timestamp(row, 'created_at'),
    deadline: nullableTimestamp(row, 'deadline'),
    status: status(row, 'status'),
    priority: text(row, 'priority'),
    version: integer(row, 'version'),
  };
}

export function toCommentRecord(row: SqlRow): CommentRecord {
  return {
    id: text(row, 'id'),
    taskId: text(row, 'task_id'),
    authorId: text(row, 'author_id'),
    text: text(row, 'text'),
    createdAt: timestamp(row, 'created_at'),
  };
}

export function toNotificationRecord(row: SqlRow): NotificationRecord {
  const category = row['category'];
  if (!isNotificationCategory(category)) throw malformed('category', category);
  return {
    id: text(row, 'id'),
    recipientId: text(row, 'user_id'),
    message: text(row, 'message'),
    category,
    relatedId: nullableText(row, 'related_id'),
    createdAt: timestamp(row, 'created_at'),
    read: flag(row, 'is_read'),
  };
}

function sqlState(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

const TRANSIENT_NODE_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE']);

export type PgErrorContext = {
  /** Set when the statement inserts a user, to report DuplicateIdentity */
  username?: string;
  /** Set when the statement touches one record, to report Conflict */
  target?: { kind: EntityKind; id: string };
};

/**
 * Maps a driver error to the engine's error taxonomy by SQLSTATE.
 */
export function mapPgError(operation: string, error: unknown, context: PgErrorContext = {}): TaskDeskError {
  if (isTaskDeskError(error)) return error;

  const code = sqlState(error);
  if (code === '23505' && context.username !== undefined) {
    return new DuplicateIdentityError(context.username);
  }
  if (code === '40001' || code === '40P01') {
    const target = context.target;
    return target
      ? new ConflictError(target.kind, target.id)
      : new ConflictError('task', 'unknown', `Concurrent modification during ${operation}`);
  }
  const transient = code !== null && (code.startsWith('08') || TRANSIENT_NODE_CODES.has(code));
  return new PersistenceFailureError(operation, error, transient);
}
