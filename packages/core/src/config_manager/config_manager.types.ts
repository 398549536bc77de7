import type { LogLevel } from '../logger';
import type { MailSettings } from '../mail';

export type DatabaseConfig = {
  connectionString: string;
  maxConnections?: number;
};

export type PaginationConfig = {
  defaultPageSize: number;
  maxPageSize: number;
};

export type NotificationsConfig = {
  /** Page size of listNotifications when the caller gives none */
  defaultListLimit: number;
};

export type SessionsConfig = {
  /** Idle sessions older than this are treated as ended */
  ttlMs: number;
};

/**
 * Resolved configuration. `database: null` selects the in-memory gateway;
 * `mail: null` disables email.
 */
export type EngineConfig = {
  database: DatabaseConfig | null;
  mail: MailSettings | null;
  pagination: PaginationConfig;
  notifications: NotificationsConfig;
  sessions: SessionsConfig;
  logLevel: LogLevel;
};

/**
 * Contents of taskdesk.config.json. Every key is optional.
 */
export type StoredConfig = {
  database?: DatabaseConfig | null;
  mail?: Partial<MailSettings> | null;
  pagination?: Partial<PaginationConfig>;
  notifications?: Partial<NotificationsConfig>;
  sessions?: Partial<SessionsConfig>;
  logLevel?: LogLevel;
};

export interface IConfigManager {
  loadConfig(): Promise<EngineConfig>;
}
