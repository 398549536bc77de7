import { ConflictError, RecordNotFoundError } from '../../errors';
import type {
  CommentRecord,
  DepartmentRecord,
  NotificationRecord,
  TaskRecord,
  UserRecord,
} from '../../record_types';
import { isValidRecordId } from '../../utils/id_generator';
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
import type { SqlQueryable, SqlResult } from './postgres_gateway.types';
import type { PgErrorContext } from './postgres_rows';
import {
  integer,
  mapPgError,
  status,
  timestamp,
  toCommentRecord,
  toDepartmentRecord,
  toNotificationRecord,
  toTaskRecord,
  toUserRecord,
} from './postgres_rows';

async function run(
  db: SqlQueryable,
  operation: string,
  sql: string,
  values: unknown[],
  context?: PgErrorContext
): Promise<SqlResult> {
  try {
    return await db.query(sql, values);
  } catch (error) {
    throw mapPgError(operation, error, context);
  }
}

class PostgresUserStore implements UserStore {
  constructor(private readonly db: SqlQueryable) {}

  async create(user: UserRecord): Promise<void> {
    await run(
      this.db,
      'users.create',
      `INSERT INTO users (id, username, secret_hash, display_name, is_admin, email, notification_preferences)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        user.id,
        user.username,
        user.secretHash,
        user.displayName,
        user.isAdmin,
        user.email,
        JSON.stringify(user.notificationPreferences),
      ],
      { username: user.username }
    );
  }

  async get(userId: string): Promise<UserRecord | null> {
    if (!isValidRecordId(userId)) return null;
    const result = await run(this.db, 'users.get', 'SELECT * FROM users WHERE id = $1', [userId]);
    const [row] = result.rows;
    return row ? toUserRecord(row) : null;
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    const result = await run(this.db, 'users.findByUsername', 'SELECT * FROM users WHERE username = $1', [username]);
    const [row] = result.rows;
    return row ? toUserRecord(row) : null;
  }

  async delete(userId: string): Promise<void> {
    if (!isValidRecordId(userId)) throw new RecordNotFoundError('user', userId);
    const result = await run(this.db, 'users.delete', 'DELETE FROM users WHERE id = $1', [userId]);
    if (!result.rowCount) throw new RecordNotFoundError('user', userId);
  }
}

class PostgresDepartmentStore implements DepartmentStore {
  constructor(private readonly db: SqlQueryable) {}

  async create(department: DepartmentRecord): Promise<void> {
    await run(
      this.db,
      'departments.create',
      'INSERT INTO departments (id, name, head_id) VALUES ($1, $2, $3)',
      [department.id, department.name, department.headId]
    );
  }

  async get(departmentId: string): Promise<DepartmentRecord | null> {
    if (!isValidRecordId(departmentId)) return null;
    const result = await run(this.db, 'departments.get', 'SELECT * FROM departments WHERE id = $1', [departmentId]);
    const [row] = result.rows;
    return row ? toDepartmentRecord(row) : null;
  }

  async delete(departmentId: string): Promise<void> {
    if (!isValidRecordId(departmentId)) throw new RecordNotFoundError('department', departmentId);
    const result = await run(this.db, 'departments.delete', 'DELETE FROM departments WHERE id = $1', [departmentId]);
    if (!result.rowCount) throw new RecordNotFoundError('department', departmentId);
  }

  async addMember(departmentId: string, userId: string): Promise<boolean> {
    const result = await run(
      this.db,
      'departments.addMember',
      `INSERT INTO department_members (department_id, user_id) VALUES ($1, $2)
       ON CONFLICT (department_id, user_id) DO NOTHING`,
      [departmentId, userId]
    );
    return result.rowCount === 1;
  }

  async removeMember(departmentId: string, userId: string): Promise<boolean> {
    if (!isValidRecordId(departmentId) || !isValidRecordId(userId)) return false;
    const result = await run(
      this.db,
      'departments.removeMember',
      'DELETE FROM department_members WHERE department_id = $1 AND user_id = $2',
      [departmentId, userId]
    );
    return result.rowCount === 1;
  }

  async isMember(departmentId: string, userId: string): Promise<boolean> {
    if (!isValidRecordId(departmentId) || !isValidRecordId(userId)) return false;
    const result = await run(
      this.db,
      'departments.isMember',
      'SELECT 1 FROM department_members WHERE department_id = $1 AND user_id = $2',
      [departmentId, userId]
    );
    return result.rows.length > 0;
  }

  async listMembers(departmentId: string): Promise<string[]> {
    if (!isValidRecordId(departmentId)) return [];
    const result = await run(
      this.db,
      'departments.listMembers',
      'SELECT user_id FROM department_members WHERE department_id = $1 ORDER BY user_id',
      [departmentId]
    );
    return result.rows.map((row) => String(row['user_id']));
  }
}

const ROLE_COLUMNS: Record<TaskRole, string> = {
  assignee: 'assignee_id',
  creator: 'creator_id',
};

class PostgresTaskStore implements TaskStore {
  constructor(private readonly db: SqlQueryable) {}

  async create(task: TaskRecord): Promise<void> {
    await run(
      this.db,
      'tasks.create',
      `INSERT INTO tasks (id, title, description, creator_id, assignee_id, department_id, created_at, deadline, status, priority, version)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)`,
      [
        task.id,
        task.title,
        task.description,
        task.creatorId,
        task.assigneeId,
        task.departmentId,
        task.createdAt,
        task.deadline,
        task.status,
        task.priority,
        task.version,
      ]
    );
  }

  async get(taskId: string): Promise<TaskRecord | null> {
    if (!isValidRecordId(taskId)) return null;
    const result = await run(this.db, 'tasks.get', 'SELECT * FROM tasks WHERE id = $1', [taskId]);
    const [row] = result.rows;
    return row ? toTaskRecord(row) : null;
  }

  async update(task: TaskRecord, expectedVersion: number): Promise<TaskRecord> {
    const target = { kind: 'task' as const, id: task.id };
    const result = await run(
      this.db,
      'tasks.update',
      `UPDATE tasks
          SET title = $2, description = $3, assignee_id = $4, department_id = $5,
              deadline = $6, status = $7, priority = $8, version = version + 1
        WHERE id = $1 AND version = $9
        RETURNING *`,
      [
        task.id,
        task.title,
        task.description,
        task.assigneeId,
        task.departmentId,
        task.deadline,
        task.status,
        task.priority,
        expectedVersion,
      ],
      { target }
    );

    const [row] = result.rows;
    if (row) return toTaskRecord(row);

    const exists = await run(this.db, 'tasks.update', 'SELECT 1 FROM tasks WHERE id = $1', [task.id]);
    if (exists.rows.length === 0) throw new RecordNotFoundError('task', task.id);
    throw new ConflictError('task', task.id);
  }

  private async list(operation: string, where: string, id: string, query: TaskListQuery): Promise<TaskRecord[]> {
    const values: unknown[] = [id];
    let sql = `SELECT * FROM tasks WHERE ${where}`;
    if (query.status) {
      values.push(query.status);
      sql += ` AND status = $${values.length}`;
    }
    values.push(query.limit, query.offset);
    sql += ` ORDER BY created_at DESC, seq DESC LIMIT $${values.length - 1} OFFSET $${values.length}`;

    const result = await run(this.db, operation, sql, values);
    return result.rows.map(toTaskRecord);
  }

  async listForUser(userId: string, query: TaskListQuery): Promise<TaskRecord[]> {
    if (!isValidRecordId(userId)) return [];
    return this.list('tasks.listForUser', '(creator_id = $1 OR assignee_id = $1)', userId, query);
  }

  async listForDepartment(departmentId: string, query: TaskListQuery): Promise<TaskRecord[]> {
    if (!isValidRecordId(departmentId)) return [];
    return this.list('tasks.listForDepartment', 'department_id = $1', departmentId, query);
  }

  async countByStatus(role: TaskRole, userId: string): Promise<StatusCounts> {
    const counts = emptyStatusCounts();
    if (!isValidRecordId(userId)) return counts;
    const result = await run(
      this.db,
      'tasks.countByStatus',
      `SELECT status, COUNT(*)::int AS count FROM tasks WHERE ${ROLE_COLUMNS[role]} = $1 GROUP BY status`,
      [userId]
    );
    for (const row of result.rows) {
      counts[status(row, 'status')] = integer(row, 'count');
    }
    return counts;
  }

  async listAssignedDeadlines(userId: string): Promise<TaskDeadline[]> {
    if (!isValidRecordId(userId)) return [];
    const result = await run(
      this.db,
      'tasks.listAssignedDeadlines',
      'SELECT deadline, status FROM tasks WHERE assignee_id = $1 AND deadline IS NOT NULL',
      [userId]
    );
    return result.rows.map((row) => ({ deadline: timestamp(row, 'deadline'), status: status(row, 'status') }));
  }
}

class PostgresCommentStore implements CommentStore {
  constructor(private readonly db: SqlQueryable) {}

  async create(comment: CommentRecord): Promise<void> {
    await run(
      this.db,
      'comments.create',
      'INSERT INTO comments (id, task_id, author_id, text, created_at) VALUES ($1, $2, $3, $4, $5)',
      [comment.id, comment.taskId, comment.authorId, comment.text, comment.createdAt]
    );
  }

  async listForTask(taskId: string): Promise<CommentRecord[]> {
    if (!isValidRecordId(taskId)) return [];
    const result = await run(
      this.db,
      'comments.listForTask',
      'SELECT * FROM comments WHERE task_id = $1 ORDER BY created_at ASC, seq ASC',
      [taskId]
    );
    return result.rows.map(toCommentRecord);
  }
}

class PostgresNotificationStore implements NotificationStore {
  constructor(private readonly db: SqlQueryable) {}

  async create(notification: NotificationRecord): Promise<void> {
    await run(
      this.db,
      'notifications.create',
      `INSERT INTO notifications (id, user_id, message, category, related_id, created_at, is_read)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        notification.id,
        notification.recipientId,
        notification.message,
        notification.category,
        notification.relatedId,
        notification.createdAt,
        notification.read,
      ]
    );
  }

  async get(notificationId: string): Promise<NotificationRecord | null> {
    if (!isValidRecordId(notificationId)) return null;
    const result = await run(this.db, 'notifications.get', 'SELECT * FROM notifications WHERE id = $1', [notificationId]);
    const [row] = result.rows;
    return row ? toNotificationRecord(row) : null;
  }

  async listForUser(userId: string, query: NotificationListQuery): Promise<NotificationRecord[]> {
    if (!isValidRecordId(userId)) return [];
    const unreadClause = query.onlyUnread ? ' AND NOT is_read' : '';
    const result = await run(
      this.db,
      'notifications.listForUser',
      `SELECT * FROM notifications WHERE user_id = $1${unreadClause} ORDER BY created_at DESC, seq DESC LIMIT $2`,
      [userId, query.limit]
    );
    return result.rows.map(toNotificationRecord);
  }

  async countUnread(userId: string): Promise<number> {
    if (!isValidRecordId(userId)) return 0;
    const result = await run(
      this.db,
      'notifications.countUnread',
      'SELECT COUNT(*)::int AS count FROM notifications WHERE user_id = $1 AND NOT is_read',
      [userId]
    );
    const [row] = result.rows;
    return row ? integer(row, 'count') : 0;
  }

  async markRead(notificationId: string): Promise<boolean> {
    if (!isValidRecordId(notificationId)) return false;
    const result = await run(
      this.db,
      'notifications.markRead',
      'UPDATE notifications SET is_read = TRUE WHERE id = $1',
      [notificationId]
    );
    return result.rowCount === 1;
  }

  async markAllRead(userId: string): Promise<number> {
    if (!isValidRecordId(userId)) return 0;
    const result = await run(
      this.db,
      'notifications.markAllRead',
      'UPDATE notifications SET is_read = TRUE WHERE user_id = $1 AND NOT is_read',
      [userId]
    );
    return result.rowCount ?? 0;
  }
}

export function createPostgresStores(db: SqlQueryable): PersistenceStores {
  return {
    users: new PostgresUserStore(db),
    departments: new PostgresDepartmentStore(db),
    tasks: new PostgresTaskStore(db),
    comments: new PostgresCommentStore(db),
    notifications: new PostgresNotificationStore(db),
  };
}
