import * as path from 'path';
import {
  ConflictError,
  DuplicateIdentityError,
  PersistenceFailureError,
  RecordNotFoundError,
} from '../../errors';
import type { TaskRecord } from '../../record_types';
import { PostgresPersistenceGateway, SCHEMA_SQL_PATH } from './postgres_gateway';

const USER_ID = '123e4567-e89b-42d3-a456-426614174001';
const TASK_ID = '123e4567-e89b-42d3-a456-426614174000';

function createMockClient() {
  return {
    query: jest.fn().mockResolvedValue({ rows: [], rowCount: 0 }),
    release: jest.fn(),
  };
}

function createMockPool(client = createMockClient()) {
  return {
    query: jest.fn().mockResolvedValue({ rows: [], rowCount: 0 }),
    connect: jest.fn().mockResolvedValue(client),
    end: jest.fn().mockResolvedValue(undefined),
  };
}

function pgError(code: string, message: string = 'driver error'): Error {
  return Object.assign(new Error(message), { code });
}

const taskRow = {
  id: TASK_ID,
  title: 'Audit',
  description: '',
  creator_id: USER_ID,
  assignee_id: null,
  department_id: null,
  created_at: new Date('2026-03-01T10:00:00.000Z'),
  deadline: new Date('2026-03-05T17:00:00.000Z'),
  status: 'in-progress',
  priority: 'normal',
  version: 3,
};

const task: TaskRecord = {
  id: TASK_ID,
  title: 'Audit',
  description: '',
  creatorId: USER_ID,
  assigneeId: null,
  departmentId: null,
  createdAt: '2026-03-01T10:00:00.000Z',
  deadline: '2026-03-05T17:00:00.000Z',
  status: 'in-progress',
  priority: 'normal',
  version: 3,
};

describe('PostgresPersistenceGateway', () => {
  describe('transaction', () => {
    it('should run the work between BEGIN and COMMIT on one client', async () => {
      const client = createMockClient();
      client.query.mockImplementation(async (sql: string) =>
        sql.startsWith('SELECT') ? { rows: [taskRow], rowCount: 1 } : { rows: [], rowCount: 0 }
      );
      const gateway = new PostgresPersistenceGateway({ pool: createMockPool(client) });

      const loaded = await gateway.transaction((stores) => stores.tasks.get(TASK_ID));

      expect(loaded).toEqual(task);
      expect(client.query.mock.calls.map(([sql]) => sql)).toEqual([
        'BEGIN',
        'SELECT * FROM tasks WHERE id = $1',
        'COMMIT',
      ]);
      expect(client.release).toHaveBeenCalledTimes(1);
    });

    it('should roll back, release and rethrow engine errors unchanged', async () => {
      const client = createMockClient();
      const gateway = new PostgresPersistenceGateway({ pool: createMockPool(client) });
      const failure = new RecordNotFoundError('task', TASK_ID);

      await expect(
        gateway.transaction(async () => {
          throw failure;
        })
      ).rejects.toBe(failure);

      expect(client.query.mock.calls.map(([sql]) => sql)).toEqual(['BEGIN', 'ROLLBACK']);
      expect(client.release).toHaveBeenCalledTimes(1);
    });

    it('should report a failed connection as a transient persistence failure', async () => {
      const pool = createMockPool();
      pool.connect.mockRejectedValue(pgError('ECONNREFUSED', 'connect ECONNREFUSED'));
      const gateway = new PostgresPersistenceGateway({ pool });

      await expect(gateway.transaction(async () => 'never')).rejects.toMatchObject({
        kind: 'PersistenceFailure',
        operation: 'connect',
        retryable: true,
      });
    });

    it('should map serialization failures to ConflictError', async () => {
      const client = createMockClient();
      client.query.mockImplementation(async (sql: string) => {
        if (sql === 'COMMIT') throw pgError('40001', 'could not serialize access');
        return { rows: [], rowCount: 0 };
      });
      const gateway = new PostgresPersistenceGateway({ pool: createMockPool(client) });

      await expect(gateway.transaction(async () => 'done')).rejects.toBeInstanceOf(ConflictError);
    });
  });

  describe('stores', () => {
    it('should map a unique violation on users to DuplicateIdentityError', async () => {
      const pool = createMockPool();
      pool.query.mockRejectedValue(pgError('23505'));
      const gateway = new PostgresPersistenceGateway({ pool });

      await expect(
        gateway.stores.users.create({
          id: USER_ID,
          username: 'alice',
          secretHash: '0'.repeat(64),
          displayName: 'Alice',
          isAdmin: false,
          email: null,
          notificationPreferences: { email: true, inApp: false },
        })
      ).rejects.toEqual(new DuplicateIdentityError('alice'));
      expect(pool.query.mock.calls[0][1]).toEqual([
        USER_ID,
        'alice',
        '0'.repeat(64),
        'Alice',
        false,
        null,
        '{"email":true,"inApp":false}',
      ]);
    });

    it('should mark connection-class SQLSTATEs as transient', async () => {
      const pool = createMockPool();
      pool.query.mockRejectedValue(pgError('08006', 'connection failure'));
      const gateway = new PostgresPersistenceGateway({ pool });

      const error = await gateway.stores.users.findByUsername('alice').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PersistenceFailureError);
      expect(error).toMatchObject({ retryable: true, message: 'Persistence failure during users.findByUsername: connection failure' });
    });

    it('should not query for ids that cannot exist', async () => {
      const pool = createMockPool();
      const gateway = new PostgresPersistenceGateway({ pool });

      expect(await gateway.stores.tasks.get('not-a-uuid')).toBeNull();
      expect(await gateway.stores.departments.isMember('nope', USER_ID)).toBe(false);
      expect(pool.query).not.toHaveBeenCalled();
    });

    it('should return the updated row of a conditional update', async () => {
      const pool = createMockPool();
      pool.query.mockResolvedValueOnce({ rows: [{ ...taskRow, version: 4 }], rowCount: 1 });
      const gateway = new PostgresPersistenceGateway({ pool });

      const updated = await gateway.stores.tasks.update(task, 3);

      expect(updated.version).toBe(4);
      expect(pool.query.mock.calls[0][1]).toEqual([
        TASK_ID,
        'Audit',
        '',
        null,
        null,
        '2026-03-05T17:00:00.000Z',
        'in-progress',
        'normal',
        3,
      ]);
    });

    it('should tell a stale version from a missing task', async () => {
      const pool = createMockPool();
      const gateway = new PostgresPersistenceGateway({ pool });

      pool.query
        .mockResolvedValueOnce({ rows: [], rowCount: 0 })
        .mockResolvedValueOnce({ rows: [{ '?column?': 1 }], rowCount: 1 });
      await expect(gateway.stores.tasks.update(task, 2)).rejects.toBeInstanceOf(ConflictError);

      pool.query.mockResolvedValueOnce({ rows: [], rowCount: 0 }).mockResolvedValueOnce({ rows: [], rowCount: 0 });
      await expect(gateway.stores.tasks.update(task, 2)).rejects.toBeInstanceOf(RecordNotFoundError);
    });

    it('should build the paged task listing with an optional status filter', async () => {
      const pool = createMockPool();
      pool.query.mockResolvedValue({ rows: [taskRow], rowCount: 1 });
      const gateway = new PostgresPersistenceGateway({ pool });

      const tasks = await gateway.stores.tasks.listForUser(USER_ID, { status: 'in-progress', offset: 20, limit: 20 });

      expect(tasks).toEqual([task]);
      expect(pool.query).toHaveBeenCalledWith(
        'SELECT * FROM tasks WHERE (creator_id = $1 OR assignee_id = $1) AND status = $2 ORDER BY created_at DESC, seq DESC LIMIT $3 OFFSET $4',
        [USER_ID, 'in-progress', 20, 20]
      );
    });

    it('should break timestamp ties by insertion order in every listing', async () => {
      const pool = createMockPool();
      const gateway = new PostgresPersistenceGateway({ pool });

      await gateway.stores.comments.listForTask(TASK_ID);
      await gateway.stores.notifications.listForUser(USER_ID, { limit: 5, onlyUnread: true });

      expect(pool.query).toHaveBeenNthCalledWith(
        1,
        'SELECT * FROM comments WHERE task_id = $1 ORDER BY created_at ASC, seq ASC',
        [TASK_ID]
      );
      expect(pool.query).toHaveBeenNthCalledWith(
        2,
        'SELECT * FROM notifications WHERE user_id = $1 AND NOT is_read ORDER BY created_at DESC, seq DESC LIMIT $2',
        [USER_ID, 5]
      );
    });

    it('should fill status counts from grouped rows', async () => {
      const pool = createMockPool();
      pool.query.mockResolvedValue({
        rows: [
          { status: 'new', count: 2 },
          { status: 'completed', count: '5' },
        ],
        rowCount: 2,
      });
      const gateway = new PostgresPersistenceGateway({ pool });

      expect(await gateway.stores.tasks.countByStatus('creator', USER_ID)).toEqual({
        'new': 2,
        'in-progress': 0,
        'completed': 5,
        'cancelled': 0,
      });
      expect(pool.query.mock.calls[0][0]).toBe(
        'SELECT status, COUNT(*)::int AS count FROM tasks WHERE creator_id = $1 GROUP BY status'
      );
    });

    it('should fall back to default preferences for a row without them', async () => {
      const pool = createMockPool();
      pool.query.mockResolvedValue({
        rows: [
          {
            id: USER_ID,
            username: 'alice',
            secret_hash: '0'.repeat(64),
            display_name: 'Alice',
            is_admin: true,
            email: 'alice@example.com',
            notification_preferences: null,
          },
        ],
        rowCount: 1,
      });
      const gateway = new PostgresPersistenceGateway({ pool });

      expect(await gateway.stores.users.get(USER_ID)).toEqual({
        id: USER_ID,
        username: 'alice',
        secretHash: '0'.repeat(64),
        displayName: 'Alice',
        isAdmin: true,
        email: 'alice@example.com',
        notificationPreferences: { email: true, inApp: true },
      });
    });
  });

  describe('migrate and close', () => {
    it('should apply the bundled schema', async () => {
      const pool = createMockPool();
      const gateway = new PostgresPersistenceGateway({ pool });

      await gateway.migrate();

      expect(path.basename(SCHEMA_SQL_PATH)).toBe('schema.sql');
      expect(pool.query.mock.calls[0][0]).toContain('CREATE TABLE IF NOT EXISTS users');
      expect(pool.query.mock.calls[0][0]).toContain('ON DELETE SET NULL');
    });

    it('should end the pool on close', async () => {
      const pool = createMockPool();
      await new PostgresPersistenceGateway({ pool }).close();
      expect(pool.end).toHaveBeenCalledTimes(1);
    });
  });
});
