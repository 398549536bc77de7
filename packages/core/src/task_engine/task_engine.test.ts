import { createTaskEngine, createTaskEngineFromConfig } from './index';
import type { TaskEngine } from './index';
import { ConfigManager } from '../config_manager';
import { MemoryConfigStore } from '../config_store/memory';
import { ConflictError, PermissionDeniedError, ValidationError } from '../errors';
import { setDefaultLogLevel } from '../logger';
import type { MailTransport } from '../mail';
import { MemoryMailTransport } from '../mail/memory';
import { MemoryPersistenceGateway } from '../persistence/memory';

describe('createTaskEngine', () => {
  let engine: TaskEngine;
  let transport: MemoryMailTransport;

  beforeEach(() => {
    transport = new MemoryMailTransport();
    engine = createTaskEngine({ mailTransport: transport });
  });

  afterEach(async () => {
    await engine.shutdown();
  });

  async function signUp(username: string, isAdmin: boolean, email: string | null = null) {
    await engine.identity.registerPrincipal(username, 'test-secret', username, isAdmin, { email });
    return engine.identity.authenticate(username, 'test-secret');
  }

  it('should only accept admin department heads', async () => {
    const adminA = await signUp('admin-a', true);
    const adminB = await signUp('admin-b', true);
    const user = await signUp('user', false);

    const departmentId = await engine.departments.createDepartment(adminA, 'Operations', adminB.userId);
    expect(await engine.departments.getDepartment(departmentId)).toMatchObject({ headId: adminB.userId });

    await expect(engine.departments.createDepartment(adminA, 'Support', user.userId)).rejects.toMatchObject({
      kind: 'PermissionDenied',
      reason: 'department head must be an admin',
    });
  });

  it('should create a personal task without notifying anyone', async () => {
    const user = await signUp('user', false, 'user@example.com');

    const taskId = await engine.tasks.createTask(user, { title: 'Renew badge' });
    await engine.eventBus.waitForIdle();

    expect(await engine.tasks.getTask(user, taskId)).toMatchObject({ status: 'new', creatorId: user.userId });
    expect(await engine.notifications.countUnread(user)).toBe(0);
  });

  it('should reject a department task for a non-member and persist nothing', async () => {
    const admin = await signUp('admin', true);
    const head = await signUp('head', true);
    const stranger = await signUp('stranger', false);
    const departmentId = await engine.departments.createDepartment(admin, 'Operations', head.userId);

    await expect(
      engine.tasks.createTask(head, { title: 'Rota', departmentId, assigneeId: stranger.userId })
    ).rejects.toBeInstanceOf(ValidationError);
    expect(await engine.tasks.listDepartmentTasks(head, departmentId)).toEqual([]);
  });

  it('should notify creator and assignee when the assignee completes a task', async () => {
    const creator = await signUp('creator', false, 'creator@example.com');
    const assignee = await signUp('assignee', false, 'assignee@example.com');
    const taskId = await engine.tasks.createTask(creator, { title: 'Ship it', assigneeId: assignee.userId });
    await engine.eventBus.waitForIdle();

    await engine.tasks.updateStatus(assignee, taskId, 'completed');
    await engine.eventBus.waitForIdle();
    await engine.notifications.waitForIdle();

    const creatorNotes = await engine.notifications.listNotifications(creator);
    const assigneeNotes = await engine.notifications.listNotifications(assignee, { onlyUnread: true });
    expect(creatorNotes.map((note) => note.category)).toEqual(['status-change']);
    expect(assigneeNotes.map((note) => note.category)).toEqual(['status-change', 'task-assignment']);
    expect(transport.getSent().map((mail) => mail.subject).sort()).toEqual([
      'New task assigned',
      'Task status changed: Ship it',
      'Task status changed: Ship it',
    ]);
  });

  it('should hide comments from unrelated users', async () => {
    const creator = await signUp('creator', false);
    const stranger = await signUp('stranger', false);
    const taskId = await engine.tasks.createTask(creator, { title: 'Ship it' });

    await expect(engine.tasks.listComments(stranger, taskId)).rejects.toBeInstanceOf(PermissionDeniedError);
  });

  it('should let exactly one of two concurrent assignments win', async () => {
    const admin = await signUp('admin', true);
    const creator = await signUp('creator', false);
    const x = await signUp('x', false);
    const y = await signUp('y', false);
    const taskId = await engine.tasks.createTask(creator, { title: 'Ship it' });

    const [first, second] = await Promise.allSettled([
      engine.tasks.assignTask(admin, taskId, x.userId),
      engine.tasks.assignTask(creator, taskId, y.userId),
    ]);

    const outcomes = [first.status, second.status].sort();
    expect(outcomes).toEqual(['fulfilled', 'rejected']);
    const loser = first.status === 'rejected' ? first : second;
    expect(loser.status === 'rejected' && loser.reason).toBeInstanceOf(ConflictError);

    const task = await engine.tasks.getTask(admin, taskId);
    expect(task.status).toBe('in-progress');
    expect(task.assigneeId).toBe(first.status === 'fulfilled' ? x.userId : y.userId);
  });

  it('should drain notification work and close its resources on shutdown', async () => {
    const gateway = new MemoryPersistenceGateway();
    const closeGateway = jest.spyOn(gateway, 'close');
    const mail = new MemoryMailTransport();
    const local = createTaskEngine({ gateway, mailTransport: mail });
    await local.identity.registerPrincipal('creator', 'test-secret', 'Creator', false);
    await local.identity.registerPrincipal('assignee', 'test-secret', 'Assignee', false, { email: 'a@example.com' });
    const creator = await local.identity.authenticate('creator', 'test-secret');
    const assignee = await local.identity.authenticate('assignee', 'test-secret');

    await local.tasks.createTask(creator, { title: 'Ship it', assigneeId: assignee.userId });
    await local.shutdown();
    await local.shutdown();

    expect(mail.getSent()).toHaveLength(1);
    expect(closeGateway).toHaveBeenCalledTimes(1);
    await expect(mail.send({ to: 'a@example.com', subject: 'late', html: '' })).rejects.toThrow('Mail transport is closed');
  });
});

describe('createTaskEngine shutdown with a stalled transport', () => {
  it('should give up on hanging deliveries after the timeout and still release resources', async () => {
    const gateway = new MemoryPersistenceGateway();
    const closeGateway = jest.spyOn(gateway, 'close');
    const hanging: MailTransport = {
      send: jest.fn(() => new Promise<void>(() => undefined)),
      close: jest.fn(async () => undefined),
    };
    const engine = createTaskEngine({ gateway, mailTransport: hanging });
    await engine.identity.registerPrincipal('creator', 'test-secret', 'Creator', false);
    await engine.identity.registerPrincipal('assignee', 'test-secret', 'Assignee', false, { email: 'a@example.com' });
    const creator = await engine.identity.authenticate('creator', 'test-secret');
    const assignee = await engine.identity.authenticate('assignee', 'test-secret');

    await engine.tasks.createTask(creator, { title: 'Ship it', assigneeId: assignee.userId });
    await engine.shutdown({ timeout: 20 });

    expect(hanging.send).toHaveBeenCalledTimes(1);
    expect(hanging.close).toHaveBeenCalledTimes(1);
    expect(closeGateway).toHaveBeenCalledTimes(1);
  });
});

describe('createTaskEngineFromConfig', () => {
  afterEach(() => {
    setDefaultLogLevel(null);
  });

  it('should build an in-memory engine without email from an empty configuration', async () => {
    const connectGateway = jest.fn();
    const createMailTransport = jest.fn();

    const engine = await createTaskEngineFromConfig(new ConfigManager(new MemoryConfigStore(), {}), {
      connectGateway,
      createMailTransport,
    });

    expect(engine.gateway).toBeInstanceOf(MemoryPersistenceGateway);
    expect(connectGateway).not.toHaveBeenCalled();
    expect(createMailTransport).not.toHaveBeenCalled();
    await engine.shutdown();
  });

  it('should open the configured database and mail transport', async () => {
    const store = new MemoryConfigStore();
    store.setConfig({
      database: { connectionString: 'postgres://taskdesk@localhost/taskdesk' },
      mail: { host: 'smtp.example.test', sender: 'tasks@example.test' },
      pagination: { defaultPageSize: 2, maxPageSize: 3 },
      logLevel: 'silent',
    });
    const gateway = new MemoryPersistenceGateway();
    const transport = new MemoryMailTransport();
    const connectGateway = jest.fn().mockResolvedValue(gateway);
    const createMailTransport = jest.fn().mockReturnValue(transport);

    const engine = await createTaskEngineFromConfig(new ConfigManager(store, {}), { connectGateway, createMailTransport });

    expect(engine.gateway).toBe(gateway);
    expect(connectGateway.mock.calls[0][0]).toEqual({ connectionString: 'postgres://taskdesk@localhost/taskdesk' });
    expect(createMailTransport.mock.calls[0][0]).toEqual({
      host: 'smtp.example.test',
      sender: 'tasks@example.test',
      port: 587,
      secure: false,
      timeoutMs: 10000,
    });

    const user = await (async () => {
      await engine.identity.registerPrincipal('user', 'test-secret', 'User', false);
      return engine.identity.authenticate('user', 'test-secret');
    })();
    await expect(engine.tasks.listTasksFor(user, { pageSize: 4 })).rejects.toThrow(
      'Invalid pageSize: must be an integer between 1 and 3'
    );
    await engine.shutdown();
  });

  it('should expire sessions after the configured lifetime', async () => {
    const store = new MemoryConfigStore();
    store.setConfig({ sessions: { ttlMs: 1000 } });
    let current = new Date('2026-03-01T10:00:00.000Z');

    const engine = await createTaskEngineFromConfig(new ConfigManager(store, {}), { clock: () => current });
    await engine.identity.registerPrincipal('user', 'test-secret', 'User', false);
    const user = await engine.identity.authenticate('user', 'test-secret');
    expect(engine.identity.getSession(user.sessionId)).toBe(user);

    current = new Date('2026-03-01T10:00:01.000Z');
    expect(engine.identity.getSession(user.sessionId)).toBeNull();
    await engine.shutdown();
  });

  it('should surface configuration errors', async () => {
    const store = new MemoryConfigStore();
    store.setConfig({ pagination: { defaultPageSize: 50, maxPageSize: 10 } });

    await expect(createTaskEngineFromConfig(new ConfigManager(store, {}))).rejects.toMatchObject({
      field: 'pagination.defaultPageSize',
    });
  });
});
