import { DepartmentAdapter } from '../adapters/department_adapter';
import { IdentityAdapter } from '../adapters/identity_adapter';
import { NotificationAdapter } from '../adapters/notification_adapter';
import { StatisticsAdapter } from '../adapters/statistics_adapter';
import { TaskLifecycleAdapter } from '../adapters/task_lifecycle_adapter';
import { DEFAULT_ENGINE_CONFIG } from '../config_manager';
import type { DatabaseConfig, IConfigManager } from '../config_manager';
import { EventBus } from '../event_bus';
import { createLogger, setDefaultLogLevel } from '../logger';
import type { Logger } from '../logger';
import type { MailSettings, MailTransport } from '../mail';
import { SmtpMailTransport } from '../mail/smtp';
import type { PersistenceGateway } from '../persistence';
import { MemoryPersistenceGateway } from '../persistence/memory';
import { PostgresPersistenceGateway } from '../persistence/postgres';
import type { TaskEngine, TaskEngineFromConfigOptions, TaskEngineOptions } from './task_engine.types';

/**
 * Wires the adapters around one gateway and one event bus.
 *
 * @example
 * const engine = createTaskEngine({ mailTransport: new MemoryMailTransport() });
 * const adminId = await engine.identity.registerPrincipal('root', 'test-secret', 'Root', true);
 */
export function createTaskEngine(options: TaskEngineOptions = {}): TaskEngine {
  const logger = options.logger ?? createLogger('[TaskEngine] ');
  const gateway = options.gateway ?? new MemoryPersistenceGateway();
  const mailTransport = options.mailTransport ?? null;
  const eventBus = options.eventBus ?? new EventBus();
  const clock = options.clock;

  const identity = new IdentityAdapter({ gateway, sessions: options.sessions, clock });
  const departments = new DepartmentAdapter({ gateway });
  const tasks = new TaskLifecycleAdapter({
    gateway,
    eventBus,
    pagination: options.pagination ?? DEFAULT_ENGINE_CONFIG.pagination,
    clock,
  });
  const notifications = new NotificationAdapter({
    gateway,
    eventBus,
    mailTransport,
    notifications: options.notifications ?? DEFAULT_ENGINE_CONFIG.notifications,
    clock,
  });
  const statistics = new StatisticsAdapter({ gateway, clock });

  let stopped = false;

  return {
    identity,
    departments,
    tasks,
    notifications,
    statistics,
    eventBus,
    gateway,
    async shutdown(options: { timeout?: number } = {}): Promise<void> {
      if (stopped) return;
      stopped = true;

      await eventBus.waitForIdle(options);
      await notifications.waitForIdle(options);
      notifications.dispose();

      try {
        if (mailTransport) {
          await mailTransport.close();
        }
      } finally {
        await gateway.close();
      }
      logger.info('Task engine stopped');
    },
  };
}

async function connectPostgres(database: DatabaseConfig, logger: Logger): Promise<PersistenceGateway> {
  const gateway = PostgresPersistenceGateway.connect(database, logger);
  try {
    await gateway.migrate();
  } catch (error) {
    await gateway.close();
    throw error;
  }
  return gateway;
}

function createSmtpTransport(settings: MailSettings, logger: Logger): MailTransport {
  return new SmtpMailTransport(settings, { logger });
}

/**
 * Loads configuration and builds the engine it describes: PostgreSQL when
 * a database is configured, memory otherwise; SMTP when mail is configured,
 * no email otherwise.
 */
export async function createTaskEngineFromConfig(
  configManager: IConfigManager,
  options: TaskEngineFromConfigOptions = {}
): Promise<TaskEngine> {
  const config = await configManager.loadConfig();
  setDefaultLogLevel(config.logLevel);

  const logger = createLogger('[TaskEngine] ');
  const connectGateway = options.connectGateway ?? connectPostgres;
  const createMailTransport = options.createMailTransport ?? createSmtpTransport;

  const gateway = config.database ? await connectGateway(config.database, logger) : new MemoryPersistenceGateway();
  const mailTransport = config.mail ? createMailTransport(config.mail, logger) : null;

  logger.info(
    `Starting with ${config.database ? 'database' : 'in-memory'} storage, email ${mailTransport ? 'enabled' : 'disabled'}`
  );

  return createTaskEngine({
    gateway,
    mailTransport,
    pagination: config.pagination,
    notifications: config.notifications,
    sessions: config.sessions,
    logger,
    clock: options.clock,
  });
}
