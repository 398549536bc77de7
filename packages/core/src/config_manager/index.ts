export { ConfigManager, DEFAULT_ENGINE_CONFIG, DEFAULT_MAIL_PORT, DEFAULT_MAIL_TIMEOUT_MS } from './config_manager';
export type { ConfigEnvironment } from './config_manager';
export type {
  DatabaseConfig,
  EngineConfig,
  IConfigManager,
  NotificationsConfig,
  PaginationConfig,
  SessionsConfig,
  StoredConfig,
} from './config_manager.types';
