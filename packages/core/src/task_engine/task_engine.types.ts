import type { DepartmentAdapter } from '../adapters/department_adapter';
import type { IdentityAdapter } from '../adapters/identity_adapter';
import type { NotificationAdapter } from '../adapters/notification_adapter';
import type { StatisticsAdapter } from '../adapters/statistics_adapter';
import type { TaskLifecycleAdapter } from '../adapters/task_lifecycle_adapter';
import type { DatabaseConfig, NotificationsConfig, PaginationConfig, SessionsConfig } from '../config_manager';
import type { EventBus } from '../event_bus';
import type { Logger } from '../logger';
import type { MailSettings, MailTransport } from '../mail';
import type { PersistenceGateway } from '../persistence';

/**
 * The wired engine: one adapter per component, sharing a gateway and a bus.
 */
export type TaskEngine = {
  identity: IdentityAdapter;
  departments: DepartmentAdapter;
  tasks: TaskLifecycleAdapter;
  notifications: NotificationAdapter;
  statistics: StatisticsAdapter;
  eventBus: EventBus;
  gateway: PersistenceGateway;
  /**
   * Waits for in-flight notification work, up to `timeout` ms per stage,
   * then releases the mail transport and the gateway.
   */
  shutdown(options?: { timeout?: number }): Promise<void>;
};

export type TaskEngineOptions = {
  /** Defaults to a fresh MemoryPersistenceGateway */
  gateway?: PersistenceGateway;
  /** null or absent disables email */
  mailTransport?: MailTransport | null;
  eventBus?: EventBus;
  pagination?: PaginationConfig;
  notifications?: NotificationsConfig;
  sessions?: SessionsConfig;
  logger?: Logger;
  clock?: () => Date;
};

export type TaskEngineFromConfigOptions = {
  /** Opens the database gateway; defaults to PostgreSQL with the bundled schema applied */
  connectGateway?: (database: DatabaseConfig, logger: Logger) => Promise<PersistenceGateway>;
  /** Defaults to an SMTP transport */
  createMailTransport?: (settings: MailSettings, logger: Logger) => MailTransport;
  clock?: () => Date;
};
